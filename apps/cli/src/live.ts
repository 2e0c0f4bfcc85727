import type { EventEmitter } from "node:events";
import type { SessionNode, ViewMode } from "@sessionpane/contracts";
import { asErrorMessage, flattenForest, getLogger, MAX_SLOT_COUNT, type SessionTail } from "@sessionpane/core";
import { renderPanels, renderTree } from "./render.js";

const DEFAULT_THROTTLE_MS = 100;
const DEFAULT_WIDTH = 100;

export type KeyAction = "render" | "quit" | "ignore";

export interface KeyPress {
  name?: string;
  ctrl?: boolean;
}

export interface LiveViewOptions {
  tail: SessionTail;
  write: (frame: string) => void;
  mode?: ViewMode;
  /** Body lines shown per panel. */
  lines?: number;
  width?: () => number;
  throttleMs?: number;
}

/** Redraws the tail's state as plain text whenever the tail reports a change. */
export class LiveView {
  mode: ViewMode;
  private readonly tail: SessionTail;
  private readonly write: (frame: string) => void;
  private readonly lines: number;
  private readonly width: () => number;
  private readonly throttleMs: number;
  private previousTree: SessionNode[] = [];
  private resort = false;
  private timer: NodeJS.Timeout | null = null;
  private readonly onStream = () => this.schedule();

  constructor(options: LiveViewOptions) {
    this.tail = options.tail;
    this.write = options.write;
    this.mode = options.mode ?? "panel";
    this.lines = Math.max(1, options.lines ?? 12);
    this.width = options.width ?? (() => DEFAULT_WIDTH);
    this.throttleMs = options.throttleMs ?? DEFAULT_THROTTLE_MS;
  }

  attach(): void {
    this.tail.on("stream", this.onStream);
  }

  detach(): void {
    this.tail.off("stream", this.onStream);
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private header(): string {
    const manager = this.tail.manager;
    return (
      `sessionpane  ${this.tail.root}\n` +
      `mode=${this.mode}  panels=${manager.slotCount()}  sessions=${manager.allSessions().length}` +
      "  [p] panels  [t] tree  [r] sort  [q] quit"
    );
  }

  async frame(): Promise<string> {
    const manager = this.tail.manager;
    if (this.mode === "panel") {
      return manager.shared(() => `${this.header()}\n\n${renderPanels(manager.slotOccupants(), this.width(), this.lines)}`);
    }

    // Draining the update set mutates the manager.
    return manager.exclusive(() => {
      const highlighted = new Set(manager.takeRecentlyUpdated());
      const tree = this.resort ? manager.buildSorted() : manager.buildPreservingOrder(this.previousTree);
      this.resort = false;
      this.previousTree = tree;
      return `${this.header()}\n\n${renderTree(flattenForest(tree), highlighted)}`;
    });
  }

  async refresh(): Promise<void> {
    this.write(await this.frame());
  }

  schedule(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.refresh().catch((error: unknown) => {
        getLogger().warn(`render failed: ${asErrorMessage(error)}`);
      });
    }, this.throttleMs);
  }

  async handleKey(name: string): Promise<KeyAction> {
    switch (name) {
      case "p": {
        const next = this.tail.manager.slotCount() + 1;
        await this.tail.resizeSlots(next > MAX_SLOT_COUNT ? 1 : next);
        return "render";
      }
      case "t":
        this.mode = this.mode === "panel" ? "tree" : "panel";
        return "render";
      case "r":
        this.resort = true;
        return "render";
      case "q":
        return "quit";
      default:
        return "ignore";
    }
  }
}

/**
 * Feeds `keypress` events from `keys` to the view until `q`, Ctrl-C or SIGINT. Both listeners
 * are removed before the promise resolves.
 */
export function waitForQuit(view: LiveView, keys: EventEmitter | null): Promise<void> {
  return new Promise((resolve) => {
    const finish = () => {
      process.off("SIGINT", finish);
      keys?.off("keypress", onKeypress);
      resolve();
    };
    const onKeypress = (_input: string, key: KeyPress | undefined) => {
      if (key?.ctrl && key.name === "c") {
        finish();
        return;
      }
      void view
        .handleKey(key?.name ?? "")
        .then((action) => {
          if (action === "quit") finish();
          else if (action === "render") return view.refresh();
          return undefined;
        })
        .catch((error: unknown) => {
          getLogger().warn(`key handling failed: ${asErrorMessage(error)}`);
        });
    };

    process.once("SIGINT", finish);
    keys?.on("keypress", onKeypress);
  });
}
