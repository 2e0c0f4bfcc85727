import { EventEmitter } from "node:events";
import { stat } from "node:fs/promises";
import path from "node:path";
import type { DecodeResult, MessageDecoder, SessionFileEvent, StreamEnvelope } from "@sessionpane/contracts";
import { DecodeError, SessionEngineError, asErrorMessage } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import { decodeFromOffset } from "./parsers/jsonl.js";
import { scanExisting } from "./discovery.js";
import { toSessionSummary, type SessionManager } from "./sessionManager.js";
import { DEFAULT_DEBOUNCE_MS, SessionWatcher } from "./watcher.js";

export interface SessionTailOptions {
  root: string;
  manager: SessionManager;
  debounceMs?: number;
  decode?: MessageDecoder;
  logger?: Logger;
  /** When false, `start` only ingests files already on disk. */
  watch?: boolean;
  usePolling?: boolean;
}

export interface SessionTailEvent {
  envelope: StreamEnvelope;
}

function sameAssignments(a: ReadonlyArray<string | null>, b: ReadonlyArray<string | null>): boolean {
  return a.length === b.length && a.every((sessionId, index) => sessionId === b[index]);
}

/**
 * Feeds a `SessionManager` from a project log directory: an initial scan, then one ingest per
 * watcher notification. Every change is re-emitted as a `"stream"` envelope.
 */
export class SessionTail extends EventEmitter {
  readonly root: string;
  readonly manager: SessionManager;
  private readonly debounceMs: number;
  private readonly decode: MessageDecoder;
  private readonly logger: Logger;
  private readonly watch: boolean;
  private readonly usePolling: boolean;
  private watcher: SessionWatcher | null = null;
  private streamVersion = 0;

  constructor(options: SessionTailOptions) {
    super();
    this.root = path.resolve(options.root);
    this.manager = options.manager;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.decode = options.decode ?? decodeFromOffset;
    this.logger = (options.logger ?? getLogger()).child({ component: "tail" });
    this.watch = options.watch ?? true;
    this.usePolling = options.usePolling ?? false;
  }

  get version(): number {
    return this.streamVersion;
  }

  /**
   * Watches first, then ingests what is already on disk, so a file written during the scan is
   * still picked up. Rejects when the log directory is missing.
   */
  async start(): Promise<void> {
    await this.requireRoot();

    if (this.watch) {
      const watcher = new SessionWatcher(this.root, { debounceMs: this.debounceMs, usePolling: this.usePolling });
      watcher.on("file", (event: SessionFileEvent) => {
        void this.ingest(event).catch((error: unknown) => {
          this.logger.warn({ path: event.path }, `ingest failed: ${asErrorMessage(error)}`);
        });
      });
      watcher.on("error", (error: Error) => {
        this.logger.warn({ root: this.root }, `watcher error: ${error.message}`);
      });
      this.watcher = watcher;
      await watcher.start();
    }

    try {
      const files = await scanExisting(this.root);
      this.logger.debug({ root: this.root, files: files.length }, "initial scan");
      for (const file of files) {
        await this.ingest(file);
      }
    } catch (error) {
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    const watcher = this.watcher;
    this.watcher = null;
    await watcher.close();
  }

  /**
   * Registers the session behind `event` and appends whatever complete lines follow its current
   * offset. Resolves true when the session advanced. The whole step runs under the manager's
   * exclusive lock so concurrent notifications for one file never decode the same bytes twice.
   */
  ingest(event: SessionFileEvent): Promise<boolean> {
    return this.manager.exclusive(async () => {
      const isNew = !this.manager.has(event.sessionId);
      const slotsBefore = this.manager.slotAssignments();
      const session = this.manager.getOrCreate(event.sessionId, event.path, event.parentId, event.isSubagent);

      if (isNew) {
        this.emitStream("session_added", { session: toSessionSummary(session) });
      }
      const slotsAfter = this.manager.slotAssignments();
      if (!sameAssignments(slotsBefore, slotsAfter)) {
        this.emitStream("slots_changed", { slots: slotsAfter });
      }

      const fromOffset = session.offset;
      let result: DecodeResult;
      try {
        result = await this.decode(event.path, fromOffset);
      } catch (error) {
        if (error instanceof DecodeError) {
          this.logger.debug({ path: event.path, offset: fromOffset }, error.message);
          return false;
        }
        throw error;
      }

      if (result.newOffset <= fromOffset) return false;
      this.manager.append(event.sessionId, result.messages, result.newOffset);
      this.emitStream("messages_appended", {
        sessionId: event.sessionId,
        count: result.messages.length,
        offset: result.newOffset,
      });
      return true;
    });
  }

  /** Applies a new slot count under the exclusive lock, announcing the table if it changed. */
  resizeSlots(count: number): Promise<number> {
    return this.manager.exclusive(() => {
      const before = this.manager.slotAssignments();
      const applied = this.manager.setSlotCount(count);
      const after = this.manager.slotAssignments();
      if (!sameAssignments(before, after)) {
        this.emitStream("slots_changed", { slots: after });
      }
      return applied;
    });
  }

  private async requireRoot(): Promise<void> {
    const info = await stat(this.root).catch(() => null);
    if (!info?.isDirectory()) {
      throw new SessionEngineError(
        "missing_log_directory",
        `session log directory does not exist: ${this.root} (has the agent CLI been used in this project?)`,
      );
    }
  }

  private emitStream(type: StreamEnvelope["type"], payload: Record<string, unknown>): void {
    this.streamVersion += 1;
    const envelope: StreamEnvelope = {
      id: String(this.streamVersion),
      type,
      version: this.streamVersion,
      payload,
    };
    const event: SessionTailEvent = { envelope };
    this.emit("stream", event);
  }
}
