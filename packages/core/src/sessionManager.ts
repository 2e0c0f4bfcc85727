import type { Message, Session, SessionNode, SessionSummary } from "@sessionpane/contracts";
import { SessionEngineError } from "./errors.js";
import { ExclusionFilter } from "./exclusion.js";
import { buildSortedForest, preserveOrder } from "./hierarchy.js";
import { ReadWriteLock } from "./lock.js";
import { compareByRecency, MAX_SLOT_COUNT, SlotTable } from "./slots.js";

export const DEFAULT_SLOT_COUNT = 4;

export interface SessionManagerOptions {
  slotCount?: number;
  excludePatterns?: readonly string[];
  now?: () => number;
}

interface SessionRecord {
  id: string;
  path: string;
  parentId: string;
  isSubagent: boolean;
  messages: Message[];
  offset: number;
  lastUpdate: number;
}

export function toSessionSummary(session: Session): SessionSummary {
  return {
    id: session.id,
    path: session.path,
    parentId: session.parentId,
    isSubagent: session.isSubagent,
    offset: session.offset,
    lastUpdate: session.lastUpdate,
    messageCount: session.messages.length,
  };
}

/**
 * Owns every tracked session, the display slot table and the exclusion policy.
 *
 * Each method runs synchronously to completion, so a single call is never observed half
 * applied. Work that spans an `await` (decode between get-or-create and append) must run
 * inside `exclusive`; async readers use `shared`.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly exclusion: ExclusionFilter;
  private readonly slots: SlotTable;
  private readonly lock = new ReadWriteLock();
  private readonly clock: () => number;
  private readonly recentlyUpdated = new Set<string>();
  private lastStamp = 0;

  constructor(options: SessionManagerOptions = {}) {
    this.clock = options.now ?? Date.now;
    this.exclusion = new ExclusionFilter(options.excludePatterns ?? []);
    this.slots = new SlotTable(
      options.slotCount ?? DEFAULT_SLOT_COUNT,
      (sessionId) => this.sessions.get(sessionId),
      this.exclusion,
    );
  }

  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.lock.write(fn);
  }

  shared<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.lock.read(fn);
  }

  getOrCreate(sessionId: string, filePath: string, parentId: string, isSubagent: boolean): Session {
    if (!sessionId) {
      throw new SessionEngineError("invalid_session_id", "session id must be non-empty");
    }

    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastUpdate = this.stamp();
      return existing;
    }

    const record: SessionRecord = {
      id: sessionId,
      path: filePath,
      parentId,
      isSubagent,
      messages: [],
      offset: 0,
      lastUpdate: this.stamp(),
    };
    this.sessions.set(sessionId, record);
    this.recentlyUpdated.add(sessionId);
    this.slots.assign(sessionId);
    return record;
  }

  /** Returns false when the session is unknown, in which case nothing changes. */
  append(sessionId: string, messages: readonly Message[], newOffset: number): boolean {
    const record = this.sessions.get(sessionId);
    if (!record) return false;

    record.messages.push(...messages);
    record.offset = newOffset;
    record.lastUpdate = this.stamp();
    this.recentlyUpdated.add(sessionId);
    return true;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  require(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionEngineError("unknown_session", `unknown session: ${sessionId}`);
    }
    return session;
  }

  size(): number {
    return this.sessions.size;
  }

  isExcluded(sessionId: string): boolean {
    return this.exclusion.matches(sessionId);
  }

  excludePatterns(): string[] {
    return this.exclusion.list();
  }

  allSessions(): Session[] {
    return Array.from(this.sessions.values())
      .filter((session) => !this.exclusion.matches(session.id))
      .sort(compareByRecency);
  }

  childSessions(parentId: string): Session[] {
    return Array.from(this.sessions.values())
      .filter((session) => session.parentId === parentId && !this.exclusion.matches(session.id))
      .sort(compareByRecency);
  }

  /** Ids created or appended to since the previous call, newest first. */
  takeRecentlyUpdated(): string[] {
    const ids = Array.from(this.recentlyUpdated)
      .map((sessionId) => this.sessions.get(sessionId))
      .filter((session): session is SessionRecord => session !== undefined)
      .sort(compareByRecency)
      .map((session) => session.id);
    this.recentlyUpdated.clear();
    return ids;
  }

  assignSlot(sessionId: string): boolean {
    return this.slots.assign(sessionId);
  }

  slotCount(): number {
    return this.slots.count;
  }

  setSlotCount(count: number): number {
    return this.slots.resize(count, () => Array.from(this.sessions.values()));
  }

  cycleSlotCount(): number {
    const next = this.slots.count + 1;
    return this.setSlotCount(next > MAX_SLOT_COUNT ? 1 : next);
  }

  slotOccupants(): Array<Session | null> {
    return this.slots.occupants();
  }

  slotAssignments(): Array<string | null> {
    return this.slots.assignments();
  }

  buildSorted(): SessionNode[] {
    return buildSortedForest({
      sessions: this.sessions.values(),
      isExcluded: (sessionId) => this.exclusion.matches(sessionId),
      isKnown: (sessionId) => this.sessions.has(sessionId),
    });
  }

  buildPreservingOrder(previous: readonly SessionNode[]): SessionNode[] {
    return preserveOrder(previous, this.buildSorted());
  }

  private stamp(): number {
    this.lastStamp = Math.max(this.lastStamp + 1, this.clock());
    return this.lastStamp;
  }
}
