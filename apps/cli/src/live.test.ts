import { EventEmitter } from "node:events";
import { mkdir, mkdtemp, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { pino } from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";
import { SessionManager, SessionTail } from "@sessionpane/core";
import { LiveView, waitForQuit } from "./live.js";

const STATUS_LINE = "mode=panel  panels=2  sessions=2  [p] panels  [t] tree  [r] sort  [q] quit";

function line(type: string, text: string): string {
  return `${JSON.stringify({ type, message: { content: [{ type: "text", text }] } })}\n`;
}

async function buildTail(): Promise<SessionTail> {
  const root = await mkdtemp(path.join(os.tmpdir(), "sessionpane-live-"));
  await mkdir(path.join(root, "main", "subagents"), { recursive: true });
  const mainPath = path.join(root, "main.jsonl");
  const agentPath = path.join(root, "main", "subagents", "explore.jsonl");
  await writeFile(mainPath, line("user", "hi"), "utf8");
  await writeFile(agentPath, line("assistant", "found"), "utf8");
  await utimes(mainPath, 1000, 1000);
  await utimes(agentPath, 2000, 2000);

  let clock = 0;
  const manager = new SessionManager({
    slotCount: 2,
    now: () => {
      clock += 1;
      return clock;
    },
  });
  const tail = new SessionTail({ root, manager, watch: false, logger: pino({ level: "silent" }) });
  await tail.start();
  return tail;
}

function body(frame: string): string[] {
  return frame.split("\n").slice(3);
}

describe("LiveView", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("renders slot occupants newest first in panel mode", async () => {
    const tail = await buildTail();
    const view = new LiveView({ tail, write: () => undefined, width: () => 30, lines: 5 });

    const frame = await view.frame();
    const lines = frame.split("\n");
    expect(lines[0]).toBe(`sessionpane  ${tail.root}`);
    expect(lines[1]).toBe(STATUS_LINE);
    expect(body(frame)).toEqual([
      " [SUB] main/explore".padEnd(30),
      "-".repeat(30),
      "[TEXT] found",
      "",
      " main".padEnd(30),
      "-".repeat(30),
      "[USER] hi",
    ]);
  });

  it("keeps update highlights for the tree across panel frames", async () => {
    const tail = await buildTail();
    const view = new LiveView({ tail, write: () => undefined });

    await view.frame();
    expect(await view.handleKey("t")).toBe("render");
    expect(view.mode).toBe("tree");
    expect(body(await view.frame())).toEqual(["main ▶ (1) ●", "└─explore (1) ●"]);
    expect(body(await view.frame())).toEqual(["main ▶ (1)", "└─explore (1)"]);
  });

  it("keeps the tree order until asked to sort by recency", async () => {
    const tail = await buildTail();
    const otherPath = path.join(tail.root, "other.jsonl");
    await writeFile(otherPath, line("user", "later"), "utf8");
    await tail.ingest({ path: otherPath, sessionId: "other", isSubagent: false, parentId: "" });

    const view = new LiveView({ tail, write: () => undefined, mode: "tree" });
    expect(body(await view.frame())).toEqual(["other (1) ●", "main ▶ (1) ●", "└─explore (1) ●"]);

    const manager = tail.manager;
    manager.append("main", [], manager.require("main").offset);
    expect(body(await view.frame())).toEqual(["other (1)", "main ▶ (1) ●", "└─explore (1)"]);

    expect(await view.handleKey("r")).toBe("render");
    expect(body(await view.frame())).toEqual(["main ▶ (1)", "└─explore (1)", "other (1)"]);
    expect(body(await view.frame())).toEqual(["main ▶ (1)", "└─explore (1)", "other (1)"]);
  });

  it("cycles the panel count and wraps back to one", async () => {
    const tail = await buildTail();
    const view = new LiveView({ tail, write: () => undefined });

    expect(await view.handleKey("p")).toBe("render");
    expect(tail.manager.slotCount()).toBe(3);

    await tail.resizeSlots(5);
    await view.handleKey("p");
    expect(tail.manager.slotCount()).toBe(1);

    expect(await view.handleKey("q")).toBe("quit");
    expect(await view.handleKey("x")).toBe("ignore");
  });

  it("coalesces stream events into one redraw", async () => {
    const tail = await buildTail();
    const frames: string[] = [];
    const view = new LiveView({ tail, write: (frame) => frames.push(frame), throttleMs: 100 });
    vi.useFakeTimers();
    view.attach();

    tail.emit("stream", { envelope: { id: "1", type: "heartbeat", version: 1, payload: {} } });
    tail.emit("stream", { envelope: { id: "2", type: "heartbeat", version: 2, payload: {} } });
    await vi.advanceTimersByTimeAsync(100);
    await vi.waitFor(() => expect(frames).toHaveLength(1));
    expect(frames[0]?.split("\n")[1]).toBe(STATUS_LINE);
    view.detach();
  });
});

describe("waitForQuit", () => {
  it("handles keys until q and then removes its listeners", async () => {
    const tail = await buildTail();
    const frames: string[] = [];
    const view = new LiveView({ tail, write: (frame) => frames.push(frame) });
    const keys = new EventEmitter();
    const sigintListeners = process.listenerCount("SIGINT");

    const done = waitForQuit(view, keys);
    expect(process.listenerCount("SIGINT")).toBe(sigintListeners + 1);

    keys.emit("keypress", "t", { name: "t" });
    await vi.waitFor(() => expect(frames).toHaveLength(1));
    expect(view.mode).toBe("tree");

    keys.emit("keypress", "q", { name: "q" });
    await done;
    expect(process.listenerCount("SIGINT")).toBe(sigintListeners);
    expect(keys.listenerCount("keypress")).toBe(0);
  });
});
