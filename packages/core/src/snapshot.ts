import type { AppConfig } from "@sessionpane/contracts";
import type { Logger } from "./logger.js";
import { SessionManager } from "./sessionManager.js";
import { SessionTail } from "./sessionTail.js";

export interface SnapshotOptions {
  config: AppConfig;
  slotCount?: number;
  logger?: Logger;
}

export function createManager(config: AppConfig, slotCount = config.panels.count): SessionManager {
  return new SessionManager({ slotCount, excludePatterns: config.panels.excludePatterns });
}

/** Scans `root` once without watching and returns the populated manager. */
export async function loadSnapshot(root: string, options: SnapshotOptions): Promise<SessionManager> {
  const manager = createManager(options.config, options.slotCount);
  const tail = new SessionTail({
    root,
    manager,
    watch: false,
    ...(options.logger ? { logger: options.logger } : {}),
  });
  await tail.start();
  return manager;
}
