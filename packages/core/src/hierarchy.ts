import type { FlatTreeRow, Session, SessionNode } from "@sessionpane/contracts";
import { compareByRecency } from "./slots.js";

export interface ForestSource {
  sessions: Iterable<Session>;
  isExcluded(sessionId: string): boolean;
  isKnown(sessionId: string): boolean;
}

function buildNode(session: Session, childrenByParent: Map<string, Session[]>): SessionNode {
  const children = [...(childrenByParent.get(session.id) ?? [])].sort(compareByRecency);
  return {
    sessionId: session.id,
    session,
    children: children.map((child) => buildNode(child, childrenByParent)),
    expanded: true,
  };
}

/**
 * Groups sessions by parent id, newest first at every level. A sub-agent whose parent was
 * never observed is shown as a root until the parent shows up.
 */
export function buildSortedForest(source: ForestSource): SessionNode[] {
  const roots: Session[] = [];
  const childrenByParent = new Map<string, Session[]>();

  for (const session of source.sessions) {
    if (source.isExcluded(session.id)) continue;
    if (!session.parentId || !source.isKnown(session.parentId)) {
      roots.push(session);
      continue;
    }
    const siblings = childrenByParent.get(session.parentId);
    if (siblings) siblings.push(session);
    else childrenByParent.set(session.parentId, [session]);
  }

  return roots.sort(compareByRecency).map((root) => buildNode(root, childrenByParent));
}

/**
 * Reorders `next` so ids already present in `previous` keep their former relative order at
 * each level; ids seen for the first time follow in the order `next` lists them.
 */
export function preserveOrder(previous: readonly SessionNode[], next: SessionNode[]): SessionNode[] {
  if (previous.length === 0) return next;

  const nextById = new Map(next.map((node) => [node.sessionId, node]));
  const result: SessionNode[] = [];
  const seen = new Set<string>();

  for (const oldNode of previous) {
    const node = nextById.get(oldNode.sessionId);
    if (!node || seen.has(node.sessionId)) continue;
    result.push({ ...node, children: preserveOrder(oldNode.children, node.children) });
    seen.add(node.sessionId);
  }
  for (const node of next) {
    if (!seen.has(node.sessionId)) result.push(node);
  }
  return result;
}

export function flattenForest(nodes: readonly SessionNode[], depth = 0): FlatTreeRow[] {
  const rows: FlatTreeRow[] = [];
  for (const [index, node] of nodes.entries()) {
    const hasChildren = node.children.length > 0;
    rows.push({
      sessionId: node.sessionId,
      session: node.session,
      depth,
      hasChildren,
      isLast: index === nodes.length - 1,
    });
    if (node.expanded && hasChildren) {
      rows.push(...flattenForest(node.children, depth + 1));
    }
  }
  return rows;
}

export function countNodes(nodes: readonly SessionNode[]): number {
  return nodes.reduce((total, node) => total + 1 + countNodes(node.children), 0);
}
