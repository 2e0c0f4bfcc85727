import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AppConfig, LogConfig, PanelsConfig, WatchConfig } from "@sessionpane/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { isLogFormat, isLogLevel } from "./logger.js";
import { MAX_SLOT_COUNT, MIN_SLOT_COUNT } from "./slots.js";
import { asRecord, expandHome } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".sessionpane", "config.toml");

export const CONFIG_KEYS = [
  "panels.count",
  "panels.excludePatterns",
  "watch.claudeHome",
  "watch.debounceMs",
  "log.level",
  "log.format",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

type LooseSection<T> = { [K in keyof T]?: unknown };

/** Config as read from disk: any field may be missing or of the wrong type. */
export interface PartialAppConfigInput {
  panels?: LooseSection<PanelsConfig>;
  watch?: LooseSection<WatchConfig>;
  log?: LooseSection<LogConfig>;
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function mergePanels(input?: LooseSection<PanelsConfig>): PanelsConfig {
  const defaults = DEFAULT_CONFIG.panels;
  const count = toFiniteNumber(input?.count);
  const patterns = Array.isArray(input?.excludePatterns)
    ? input.excludePatterns.filter((pattern): pattern is string => typeof pattern === "string" && pattern.length > 0)
    : [...defaults.excludePatterns];
  return {
    count:
      count !== null && Number.isInteger(count) && count >= MIN_SLOT_COUNT && count <= MAX_SLOT_COUNT
        ? count
        : defaults.count,
    excludePatterns: patterns,
  };
}

function mergeWatch(input?: LooseSection<WatchConfig>): WatchConfig {
  const defaults = DEFAULT_CONFIG.watch;
  const debounceMs = toFiniteNumber(input?.debounceMs);
  return {
    claudeHome:
      typeof input?.claudeHome === "string" && input.claudeHome.trim() ? input.claudeHome : defaults.claudeHome,
    debounceMs: debounceMs !== null && debounceMs >= 0 ? Math.round(debounceMs) : defaults.debounceMs,
  };
}

function mergeLog(input?: LooseSection<LogConfig>): LogConfig {
  const defaults = DEFAULT_CONFIG.log;
  const level = typeof input?.level === "string" && isLogLevel(input.level) ? input.level : defaults.level;
  const format = typeof input?.format === "string" && isLogFormat(input.format) ? input.format : defaults.format;
  return { level, format };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    panels: mergePanels(input?.panels),
    watch: mergeWatch(input?.watch),
    log: mergeLog(input?.log),
  };
}

function toPartialInput(parsed: unknown): PartialAppConfigInput {
  const root = asRecord(parsed);
  return {
    panels: asRecord(root.panels),
    watch: asRecord(root.watch),
    log: asRecord(root.log),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    return mergeConfig(toPartialInput(TOML.parse(raw)));
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Returns a copy of `config` with one dotted key replaced. Values are parsed from their command
 * line form; `panels.excludePatterns` takes a comma separated list. Invalid values fall back to
 * the default for that key, the same as a hand-edited file would.
 */
export function setConfigValue(config: AppConfig, key: string, raw: string): AppConfig {
  if (!isConfigKey(key)) {
    throw new Error(`unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(", ")})`);
  }

  const input: PartialAppConfigInput = {
    panels: { ...config.panels },
    watch: { ...config.watch },
    log: { ...config.log },
  };
  const numeric = raw.trim() === "" ? Number.NaN : Number(raw);

  switch (key) {
    case "panels.count":
      input.panels = { ...input.panels, count: numeric };
      break;
    case "panels.excludePatterns":
      input.panels = {
        ...input.panels,
        excludePatterns: raw
          .split(",")
          .map((pattern) => pattern.trim())
          .filter(Boolean),
      };
      break;
    case "watch.claudeHome":
      input.watch = { ...input.watch, claudeHome: raw };
      break;
    case "watch.debounceMs":
      input.watch = { ...input.watch, debounceMs: numeric };
      break;
    case "log.level":
      input.log = { ...input.log, level: isLogLevel(raw) ? raw : DEFAULT_CONFIG.log.level };
      break;
    case "log.format":
      input.log = { ...input.log, format: isLogFormat(raw) ? raw : DEFAULT_CONFIG.log.format };
      break;
  }
  return mergeConfig(input);
}

export function getConfigValue(config: AppConfig, key: ConfigKey): string {
  const [section, field] = key.split(".");
  const value = asRecord(asRecord(config)[section ?? ""])[field ?? ""];
  return Array.isArray(value) ? value.join(",") : String(value);
}

/**
 * Log directory the agent CLI uses for a project: `<claudeHome>/projects/` followed by the
 * absolute project path with every "/" and "." replaced by "-".
 */
export function projectLogDirectory(projectPath: string, claudeHome = DEFAULT_CONFIG.watch.claudeHome): string {
  const encoded = path.resolve(projectPath).replace(/[/.]/g, "-");
  return path.join(expandHome(claudeHome), "projects", encoded);
}
