import { readFileSync } from "node:fs";
import path from "node:path";
import { emitKeypressEvents } from "node:readline";
import { Command, Option } from "commander";
import type { AppConfig, ViewMode } from "@sessionpane/contracts";
import {
  asRecord,
  createManager,
  DEFAULT_CONFIG_PATH,
  expandHome,
  flattenForest,
  getConfigValue,
  initLogger,
  isConfigKey,
  loadConfig,
  loadSnapshot,
  projectLogDirectory,
  saveConfig,
  SessionTail,
  setConfigValue,
  toSessionSummary,
  CONFIG_KEYS,
} from "@sessionpane/core";
import { runServer } from "@sessionpane/server";
import { LiveView, waitForQuit } from "./live.js";
import { printTable, renderMessageLines, renderPanelHeader, renderTree } from "./render.js";

const VIEW_MODES: readonly ViewMode[] = ["panel", "tree"];
const DEFAULT_WIDTH = 100;

function readVersion(): string {
  const manifest = asRecord(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8")));
  return typeof manifest.version === "string" ? manifest.version : "0.0.0";
}

export const VERSION = readVersion();

export interface GlobalOptions {
  config: string;
  project?: string;
  dir?: string;
}

interface Context {
  config: AppConfig;
  root: string;
}

function isViewMode(value: string): value is ViewMode {
  return (VIEW_MODES as readonly string[]).includes(value);
}

function fmtTime(ms: number): string {
  return ms > 0 ? new Date(ms).toISOString() : "-";
}

function terminalWidth(requested?: string): number {
  const parsed = Number(requested);
  if (requested && Number.isInteger(parsed) && parsed > 0) return parsed;
  return process.stdout.columns ?? DEFAULT_WIDTH;
}

/** Log directory to read: `--dir` verbatim, otherwise the one the agent CLI uses for `--project`. */
export function resolveRoot(opts: GlobalOptions, config: AppConfig): string {
  if (opts.dir) return path.resolve(expandHome(opts.dir));
  return projectLogDirectory(opts.project ?? process.cwd(), config.watch.claudeHome);
}

async function runTail(context: Context, opts: { panels?: string; mode: string; lines: string }): Promise<void> {
  if (!isViewMode(opts.mode)) {
    throw new Error(`unsupported mode: ${opts.mode}`);
  }
  const slotCount = opts.panels === undefined ? context.config.panels.count : Number(opts.panels);
  const tail = new SessionTail({
    root: context.root,
    manager: createManager(context.config, slotCount),
    debounceMs: context.config.watch.debounceMs,
  });
  const view = new LiveView({
    tail,
    mode: opts.mode,
    lines: Number(opts.lines) || 12,
    width: () => terminalWidth(),
    write: (frame) => {
      if (process.stdout.isTTY) process.stdout.write("\x1b[2J\x1b[H");
      console.log(frame);
    },
  });

  await tail.start();
  view.attach();
  await view.refresh();

  const interactive = Boolean(process.stdin.isTTY);
  if (interactive) {
    emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.resume();
  }
  await waitForQuit(view, interactive ? process.stdin : null);

  view.detach();
  if (interactive) {
    process.stdin.setRawMode(false);
    process.stdin.pause();
  }
  await tail.stop();
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("sessionpane").description("Follow agent session logs as they are written").version(VERSION);
  program.option("--config <path>", "Config path", process.env.SESSIONPANE_CONFIG ?? DEFAULT_CONFIG_PATH);
  program.option("--project <path>", "Project whose session logs to read (default: current directory)");
  program.option("--dir <path>", "Session log directory, overriding --project");
  program.addHelpText(
    "after",
    `
Examples:
  $ sessionpane --project ~/code/app --panels 3
  $ sessionpane tail --mode tree
  $ sessionpane sessions list --json
  $ sessionpane sessions show <session-id>
  $ sessionpane config set panels.count 2
`,
  );

  async function loadContext(): Promise<Context> {
    const opts = program.opts<GlobalOptions>();
    const config = await loadConfig(opts.config);
    initLogger(config.log.level, config.log.format);
    return { config, root: resolveRoot(opts, config) };
  }

  async function snapshot() {
    const context = await loadContext();
    return loadSnapshot(context.root, { config: context.config });
  }

  program
    .command("tail", { isDefault: true })
    .description("Live view of the newest sessions")
    .option("--panels <n>", "Number of panels (1-5)")
    .addOption(new Option("--mode <mode>", "Initial view").choices(VIEW_MODES).default("panel"))
    .option("--lines <n>", "Lines shown per panel", "12")
    .action(async (opts: { panels?: string; mode: string; lines: string }) => {
      await runTail(await loadContext(), opts);
    });

  const sessions = program.command("sessions").description("Session-level operations");

  sessions
    .command("list")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const manager = await snapshot();
      const summaries = manager.allSessions().map(toSessionSummary);
      if (opts.json) {
        console.log(JSON.stringify(summaries, null, 2));
        return;
      }
      printTable([
        ["session", "kind", "parent", "messages", "offset", "updated"],
        ...summaries.map((summary) => [
          summary.id,
          summary.isSubagent ? "subagent" : "main",
          summary.parentId || "-",
          String(summary.messageCount),
          String(summary.offset),
          fmtTime(summary.lastUpdate),
        ]),
      ]);
    });

  sessions
    .command("show <id>")
    .option("--limit <n>", "Latest N messages", "20")
    .option("--width <n>", "Render width")
    .option("--json", "JSON output")
    .action(async (id: string, opts: { limit: string; width?: string; json?: boolean }) => {
      const manager = await snapshot();
      const session = manager.require(id);
      const messages = session.messages.slice(-Math.max(1, Number(opts.limit) || 20));
      if (opts.json) {
        console.log(
          JSON.stringify(
            { session: toSessionSummary(session), excluded: manager.isExcluded(id), messages },
            null,
            2,
          ),
        );
        return;
      }
      const width = terminalWidth(opts.width);
      console.log(renderPanelHeader(session, width).trimEnd());
      for (const message of messages) {
        for (const line of renderMessageLines(message, width)) console.log(line);
      }
    });

  program
    .command("tree")
    .description("Sessions grouped under their parents")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const manager = await snapshot();
      const rows = flattenForest(manager.buildSorted());
      if (opts.json) {
        console.log(
          JSON.stringify(
            rows.map((row) => ({
              sessionId: row.sessionId,
              depth: row.depth,
              hasChildren: row.hasChildren,
              messageCount: row.session.messages.length,
            })),
            null,
            2,
          ),
        );
        return;
      }
      console.log(renderTree(rows));
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd
    .command("get [key]")
    .option("--json", "JSON output")
    .action(async (key: string | undefined, opts: { json?: boolean }) => {
      const config = await loadConfig(program.opts<GlobalOptions>().config);
      if (!key) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }
      if (!isConfigKey(key)) {
        throw new Error(`unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(", ")})`);
      }
      const value = getConfigValue(config, key);
      console.log(opts.json ? JSON.stringify({ [key]: value }) : value);
    });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const configPath = program.opts<GlobalOptions>().config;
    const config = await loadConfig(configPath);
    await saveConfig(setConfigValue(config, key, value), configPath);
    console.log(`updated ${key}`);
  });

  program
    .command("version")
    .description("Print the version")
    .action(() => {
      console.log(VERSION);
    });

  program
    .command("serve")
    .description("Serve the session model over HTTP and SSE")
    .option("--host <host>", "Server host", process.env.SESSIONPANE_HOST ?? "127.0.0.1")
    .option("--port <port>", "Server port", process.env.SESSIONPANE_PORT ?? "8790")
    .action(async (opts: { host: string; port: string }) => {
      const globals = program.opts<GlobalOptions>();
      await runServer({
        host: opts.host,
        port: Number(opts.port),
        configPath: globals.config,
        ...(globals.dir ? { root: path.resolve(expandHome(globals.dir)) } : {}),
        ...(globals.project ? { project: globals.project } : {}),
      });
    });

  return program;
}
