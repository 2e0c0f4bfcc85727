import type { ToolInput } from "@sessionpane/contracts";

const VALUE_PREVIEW_LIMIT = 50;

export function toToolInput(value: unknown): ToolInput {
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value === "number") return { kind: "number", value };
  if (typeof value === "boolean") return { kind: "boolean", value };
  if (Array.isArray(value)) return { kind: "list", items: value.map((item) => toToolInput(item)) };
  if (value && typeof value === "object") {
    return {
      kind: "map",
      entries: Object.entries(value).map(([key, entry]) => ({ key, value: toToolInput(entry) })),
    };
  }
  return { kind: "null" };
}

/** Inverse of `toToolInput`, for JSON output. */
export function toolInputToJson(input: ToolInput): unknown {
  switch (input.kind) {
    case "string":
    case "number":
    case "boolean":
      return input.value;
    case "null":
      return null;
    case "list":
      return input.items.map((item) => toolInputToJson(item));
    case "map":
      return Object.fromEntries(input.entries.map((entry) => [entry.key, toolInputToJson(entry.value)]));
  }
}

/** Single-line form: newlines become spaces and overlong text ends in "...". */
export function truncateText(text: string, maxWidth: number): string {
  const oneLine = text.replace(/\r/g, "").replace(/\n/g, " ");
  if (maxWidth <= 3 || oneLine.length <= maxWidth) return oneLine;
  return `${oneLine.slice(0, maxWidth - 3)}...`;
}

function previewValue(value: ToolInput): string {
  const text = value.kind === "string" ? value.value : JSON.stringify(toolInputToJson(value));
  const clipped = text.length > VALUE_PREVIEW_LIMIT ? `${text.slice(0, VALUE_PREVIEW_LIMIT - 3)}...` : text;
  return value.kind === "string" ? clipped.replace(/\n/g, "\\n") : clipped;
}

/**
 * Display lines for a tool call's input: one `key: value` line per map entry, sorted by key.
 * Scalars and lists render as a single line.
 */
export function formatToolInput(input: ToolInput, maxWidth: number): string[] {
  if (input.kind === "null") return [];
  if (input.kind !== "map") {
    const text = input.kind === "string" ? input.value : JSON.stringify(toolInputToJson(input));
    return [truncateText(text, maxWidth)];
  }

  return [...input.entries]
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map((entry) => truncateText(`${entry.key}: ${previewValue(entry.value)}`, maxWidth));
}
