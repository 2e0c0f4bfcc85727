import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  getConfigValue,
  loadConfig,
  mergeConfig,
  projectLogDirectory,
  saveConfig,
  setConfigValue,
} from "../config.js";

describe("config", () => {
  it("provides defaults for panels, watching and logging", () => {
    expect(mergeConfig()).toEqual({
      panels: { count: 4, excludePatterns: ["prompt_suggestion"] },
      watch: { claudeHome: "~/.claude", debounceMs: 150 },
      log: { level: "info", format: "plain" },
    });
  });

  it("replaces invalid values with defaults", () => {
    const config = mergeConfig({
      panels: { count: 9, excludePatterns: ["warmup", "", 3] },
      watch: { claudeHome: "  ", debounceMs: -5 },
      log: { level: "loud", format: "json" },
    });
    expect(config).toEqual({
      panels: { count: 4, excludePatterns: ["warmup"] },
      watch: { claudeHome: "~/.claude", debounceMs: 150 },
      log: { level: "info", format: "json" },
    });
  });

  it("loads nested sections from TOML", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "sessionpane-config-"));
    const configPath = path.join(root, "config.toml");
    await writeFile(
      configPath,
      ["[panels]", "count = 2", 'excludePatterns = ["warmup"]', "", "[log]", 'format = "json"', ""].join("\n"),
      "utf8",
    );

    const config = await loadConfig(configPath);
    expect(config.panels).toEqual({ count: 2, excludePatterns: ["warmup"] });
    expect(config.log).toEqual({ level: "info", format: "json" });
    expect(config.watch.debounceMs).toBe(150);
  });

  it("falls back to defaults for a missing or unparseable file", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "sessionpane-config-"));
    const broken = path.join(root, "broken.toml");
    await writeFile(broken, "[panels\ncount = ", "utf8");

    expect(await loadConfig(path.join(root, "missing.toml"))).toEqual(mergeConfig());
    expect(await loadConfig(broken)).toEqual(mergeConfig());
  });

  it("writes TOML that loads back unchanged", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "sessionpane-config-"));
    const configPath = path.join(root, "nested", "config.toml");
    const config = mergeConfig({ panels: { count: 3 }, log: { level: "debug" } });

    await saveConfig(config, configPath);
    expect(await readFile(configPath, "utf8")).toContain("[panels]");
    expect(await loadConfig(configPath)).toEqual(config);
  });

  it("sets single keys from their command line form", () => {
    const base = mergeConfig();
    expect(setConfigValue(base, "panels.count", "3").panels.count).toBe(3);
    expect(setConfigValue(base, "panels.count", "7").panels.count).toBe(4);
    expect(setConfigValue(base, "panels.excludePatterns", "a, b,,").panels.excludePatterns).toEqual(["a", "b"]);
    expect(setConfigValue(base, "watch.debounceMs", "40").watch.debounceMs).toBe(40);
    expect(setConfigValue(base, "log.level", "debug").log.level).toBe("debug");
    expect(setConfigValue(base, "log.format", "fancy").log.format).toBe("plain");
    expect(base.panels.count).toBe(4);
  });

  it("rejects unknown keys", () => {
    expect(() => setConfigValue(mergeConfig(), "panels.size", "2")).toThrow("unknown config key: panels.size");
  });

  it("reads single keys as strings", () => {
    const config = mergeConfig({ panels: { excludePatterns: ["a", "b"] } });
    expect(getConfigValue(config, "panels.excludePatterns")).toBe("a,b");
    expect(getConfigValue(config, "panels.count")).toBe("4");
    expect(getConfigValue(config, "log.format")).toBe("plain");
  });

  it("maps a project path to its log directory", () => {
    expect(projectLogDirectory("/home/dev/my.app", "/tmp/claude")).toBe("/tmp/claude/projects/-home-dev-my-app");
  });
});
