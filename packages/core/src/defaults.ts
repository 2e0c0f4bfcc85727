import type { AppConfig } from "@sessionpane/contracts";

export const DEFAULT_EXCLUDE_PATTERNS = ["prompt_suggestion"];

export const DEFAULT_CONFIG: AppConfig = {
  panels: {
    count: 4,
    excludePatterns: DEFAULT_EXCLUDE_PATTERNS,
  },
  watch: {
    claudeHome: "~/.claude",
    debounceMs: 150,
  },
  log: {
    level: "info",
    format: "plain",
  },
};
