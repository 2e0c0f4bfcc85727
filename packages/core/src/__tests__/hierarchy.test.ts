import { describe, expect, it } from "vitest";
import type { SessionNode } from "@sessionpane/contracts";
import { countNodes, flattenForest } from "../hierarchy.js";
import { SessionManager } from "../sessionManager.js";

function shape(nodes: readonly SessionNode[]): unknown[] {
  return nodes.map((node) => (node.children.length > 0 ? [node.sessionId, shape(node.children)] : node.sessionId));
}

function buildFamily(): SessionManager {
  const manager = new SessionManager({ now: () => 1000 });
  manager.getOrCreate("p", "/logs/p.jsonl", "", false);
  manager.getOrCreate("p/a", "/logs/p/subagents/a.jsonl", "p", true);
  manager.getOrCreate("p/b", "/logs/p/subagents/b.jsonl", "p", true);
  manager.getOrCreate("q", "/logs/q.jsonl", "", false);
  return manager;
}

describe("hierarchy", () => {
  it("groups children under their parent, newest first at every level", () => {
    const manager = buildFamily();
    const forest = manager.buildSorted();

    expect(shape(forest)).toEqual(["q", ["p", ["p/b", "p/a"]]]);
    expect(countNodes(forest)).toBe(manager.size());
    expect(forest.every((node) => node.expanded)).toBe(true);
  });

  it("returns fresh nodes that reference the stored sessions", () => {
    const manager = buildFamily();
    const first = manager.buildSorted();
    const second = manager.buildSorted();

    expect(second[0]).not.toBe(first[0]);
    expect(second[0]?.session).toBe(manager.get("q"));
  });

  it("shows a sub-agent as a root until its parent appears", () => {
    const manager = new SessionManager({ now: () => 1000 });
    manager.getOrCreate("z/agent", "/logs/z/subagents/agent.jsonl", "z", true);
    expect(shape(manager.buildSorted())).toEqual(["z/agent"]);

    manager.getOrCreate("z", "/logs/z.jsonl", "", false);
    expect(shape(manager.buildSorted())).toEqual([["z", ["z/agent"]]]);
  });

  it("drops the subtree of an excluded parent", () => {
    const manager = new SessionManager({ excludePatterns: ["secret"], now: () => 1000 });
    manager.getOrCreate("secret", "/logs/secret.jsonl", "", false);
    manager.getOrCreate("helper", "/logs/secret/subagents/helper.jsonl", "secret", true);
    manager.getOrCreate("open", "/logs/open.jsonl", "", false);

    expect(shape(manager.buildSorted())).toEqual(["open"]);
  });

  it("keeps the previous root order and appends new roots last", () => {
    const manager = new SessionManager({ now: () => 1000 });
    manager.getOrCreate("a", "/logs/a.jsonl", "", false);
    manager.getOrCreate("b", "/logs/b.jsonl", "", false);
    const previous = manager.buildSorted();
    expect(shape(previous)).toEqual(["b", "a"]);

    manager.append("a", [], 10);
    manager.getOrCreate("c", "/logs/c.jsonl", "", false);

    expect(shape(manager.buildSorted())).toEqual(["c", "a", "b"]);
    expect(shape(manager.buildPreservingOrder(previous))).toEqual(["b", "a", "c"]);
  });

  it("preserves child order recursively", () => {
    const manager = buildFamily();
    const previous = manager.buildSorted();

    manager.append("p/a", [], 10);
    manager.getOrCreate("p/c", "/logs/p/subagents/c.jsonl", "p", true);

    expect(shape(manager.buildPreservingOrder(previous))).toEqual(["q", ["p", ["p/b", "p/a", "p/c"]]]);
  });

  it("returns the sorted forest when there is no previous order", () => {
    const manager = buildFamily();
    expect(shape(manager.buildPreservingOrder([]))).toEqual(shape(manager.buildSorted()));
  });

  it("flattens expanded nodes depth first", () => {
    const forest = buildFamily().buildSorted();
    const rows = flattenForest(forest).map((row) => [row.sessionId, row.depth, row.hasChildren, row.isLast]);

    expect(rows).toEqual([
      ["q", 0, false, false],
      ["p", 0, true, true],
      ["p/b", 1, false, false],
      ["p/a", 1, false, true],
    ]);
  });

  it("skips the children of collapsed nodes", () => {
    const forest = buildFamily().buildSorted();
    const parent = forest.find((node) => node.sessionId === "p");
    if (parent) parent.expanded = false;

    expect(flattenForest(forest).map((row) => row.sessionId)).toEqual(["q", "p"]);
  });
});
