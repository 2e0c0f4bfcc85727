import type { Session } from "@sessionpane/contracts";
import type { ExclusionFilter } from "./exclusion.js";

export const MIN_SLOT_COUNT = 1;
export const MAX_SLOT_COUNT = 5;

export type SessionLookup = (sessionId: string) => Session | undefined;

/** Out-of-range or non-integer counts wrap to the minimum, like a cycling control. */
export function normalizeSlotCount(count: number): number {
  if (!Number.isInteger(count) || count < MIN_SLOT_COUNT || count > MAX_SLOT_COUNT) {
    return MIN_SLOT_COUNT;
  }
  return count;
}

export function compareByRecency(a: Session, b: Session): number {
  return b.lastUpdate - a.lastUpdate || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Fixed-size table mapping display slot index to session id. Membership follows an
 * LRU policy: a new session takes the lowest free index, or replaces the occupant with the
 * oldest lastUpdate (lowest index on ties).
 */
export class SlotTable {
  private slots: Array<string | null>;
  private readonly lookup: SessionLookup;
  private readonly exclusion: ExclusionFilter;

  constructor(count: number, lookup: SessionLookup, exclusion: ExclusionFilter) {
    this.lookup = lookup;
    this.exclusion = exclusion;
    this.slots = Array.from({ length: normalizeSlotCount(count) }, () => null);
  }

  get count(): number {
    return this.slots.length;
  }

  assignments(): Array<string | null> {
    return [...this.slots];
  }

  has(sessionId: string): boolean {
    return this.slots.includes(sessionId);
  }

  /** Returns true when the table changed. */
  assign(sessionId: string): boolean {
    if (this.exclusion.matches(sessionId)) return false;
    if (this.has(sessionId)) return false;

    const freeIndex = this.slots.indexOf(null);
    if (freeIndex >= 0) {
      this.slots[freeIndex] = sessionId;
      return true;
    }

    const victim = this.oldestIndex();
    if (victim < 0) return false;
    this.slots[victim] = sessionId;
    return true;
  }

  /** Returns the count actually applied. */
  resize(requested: number, candidates: () => Session[]): number {
    const next = normalizeSlotCount(requested);
    const previous = this.slots.length;
    if (next === previous) return next;

    if (next < previous) {
      const keep = new Set(
        this.occupants()
          .slice(0, next)
          .filter((session): session is Session => session !== null)
          .map((session) => session.id),
      );
      const kept = this.slots.filter((sessionId): sessionId is string => sessionId !== null && keep.has(sessionId));
      this.slots = Array.from({ length: next }, (_, index) => kept[index] ?? null);
      return next;
    }

    this.slots = [...this.slots, ...Array.from({ length: next - previous }, () => null)];
    const unassigned = candidates()
      .filter((session) => !this.has(session.id) && !this.exclusion.matches(session.id))
      .sort(compareByRecency);
    let cursor = 0;
    for (let index = 0; index < this.slots.length && cursor < unassigned.length; index += 1) {
      if (this.slots[index] !== null) continue;
      const session = unassigned[cursor];
      if (!session) break;
      this.slots[index] = session.id;
      cursor += 1;
    }
    return next;
  }

  /** Assigned sessions newest-first, padded with null to the slot count. */
  occupants(): Array<Session | null> {
    const assigned: Session[] = [];
    for (const sessionId of this.slots) {
      if (sessionId === null) continue;
      const session = this.lookup(sessionId);
      if (session) assigned.push(session);
    }
    assigned.sort(compareByRecency);
    return Array.from({ length: this.slots.length }, (_, index) => assigned[index] ?? null);
  }

  private oldestIndex(): number {
    let oldestIndex = -1;
    let oldestStamp = Number.POSITIVE_INFINITY;
    for (let index = 0; index < this.slots.length; index += 1) {
      const sessionId = this.slots[index];
      if (sessionId === null || sessionId === undefined) continue;
      const session = this.lookup(sessionId);
      // A slot pointing at an unknown session is evictable before anything else.
      if (!session) return index;
      if (session.lastUpdate < oldestStamp) {
        oldestIndex = index;
        oldestStamp = session.lastUpdate;
      }
    }
    return oldestIndex;
  }
}
