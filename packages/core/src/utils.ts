import os from "node:os";
import path from "node:path";

export type JsonObject = Record<string, unknown>;

/** Resolves a leading "~" against the home directory. */
export function expandHome(input: string): string {
  if (input !== "~" && !input.startsWith("~/")) return input;
  return path.join(os.homedir(), input.slice(1));
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The value itself when it is a plain object, otherwise an empty one. */
export function asRecord(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Epoch milliseconds of a log line's ISO timestamp; null when it is blank or unparseable. */
export function parseTimestampMs(timestamp: string): number | null {
  if (!timestamp.trim()) return null;
  const parsed = Date.parse(timestamp);
  return Number.isNaN(parsed) ? null : parsed;
}
