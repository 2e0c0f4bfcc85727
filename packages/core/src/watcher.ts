import { EventEmitter } from "node:events";
import path from "node:path";
import chokidar, { type FSWatcher } from "chokidar";
import type { SessionFileEvent } from "@sessionpane/contracts";
import { classifySessionPath } from "./discovery.js";

export const DEFAULT_DEBOUNCE_MS = 150;

export interface SessionWatcherOptions {
  debounceMs?: number;
  usePolling?: boolean;
}

/**
 * Watches a project log directory and emits `"file"` with a `SessionFileEvent` whenever a
 * session file is added or grows. Bursts of writes to one path within `debounceMs` collapse
 * into a single event; watcher failures surface as `"error"`.
 */
export class SessionWatcher extends EventEmitter {
  private readonly root: string;
  private readonly debounceMs: number;
  private readonly usePolling: boolean;
  private watcher: FSWatcher | null = null;
  private readonly pending = new Map<string, NodeJS.Timeout>();

  constructor(root: string, options: SessionWatcherOptions = {}) {
    super();
    this.root = path.resolve(root);
    this.debounceMs = Math.max(0, options.debounceMs ?? DEFAULT_DEBOUNCE_MS);
    this.usePolling = options.usePolling ?? false;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async start(): Promise<void> {
    if (this.watcher) return;

    const watcher = chokidar.watch(this.root, {
      ignoreInitial: true,
      persistent: true,
      followSymlinks: false,
      depth: 2,
      usePolling: this.usePolling,
      interval: 50,
    });
    this.watcher = watcher;

    watcher.on("add", (rawPath: string) => this.notify(rawPath));
    watcher.on("change", (rawPath: string) => this.notify(rawPath));
    watcher.on("error", (error: unknown) => {
      this.emit("error", error instanceof Error ? error : new Error(String(error)));
    });

    await new Promise<void>((resolve) => {
      watcher.once("ready", () => resolve());
    });
  }

  async close(): Promise<void> {
    for (const timer of this.pending.values()) clearTimeout(timer);
    this.pending.clear();
    if (!this.watcher) return;
    const watcher = this.watcher;
    this.watcher = null;
    await watcher.close();
  }

  /** Queues an event for `rawPath` unless one is already pending. */
  notify(rawPath: string): void {
    const filePath = path.resolve(rawPath);
    const info = classifySessionPath(this.root, filePath);
    if (!info || this.pending.has(filePath)) return;

    const timer = setTimeout(() => {
      this.pending.delete(filePath);
      const event: SessionFileEvent = { path: filePath, ...info };
      this.emit("file", event);
    }, this.debounceMs);
    this.pending.set(filePath, timer);
  }
}
