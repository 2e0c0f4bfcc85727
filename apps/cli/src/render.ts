import type { FlatTreeRow, Message, Session } from "@sessionpane/contracts";
import { formatToolInput, truncateText } from "@sessionpane/core";

const INDENT = " ".repeat(7);
const MIN_WIDTH = 20;

function findBreakPoint(text: string, width: number): number {
  for (let index = width; index > 0; index -= 1) {
    if (text[index] === " ") return index;
  }
  return width;
}

/** Word-wraps each paragraph to `width`; blank paragraphs are kept as empty lines. */
export function wrapText(text: string, width: number): string[] {
  if (width <= 0) return [text];

  const lines: string[] = [];
  for (const paragraph of text.replace(/\r/g, "").split("\n")) {
    if (!paragraph) {
      lines.push("");
      continue;
    }
    let rest = paragraph;
    while (rest.length > width) {
      const breakAt = findBreakPoint(rest, width);
      lines.push(rest.slice(0, breakAt));
      rest = rest.slice(breakAt).trimStart();
    }
    if (rest) lines.push(rest);
  }
  return lines;
}

function labelled(label: string, lines: string[]): string[] {
  return lines.map((line, index) => (index === 0 ? label : INDENT) + line);
}

export function renderMessageLines(message: Message, width: number): string[] {
  const lines: string[] = [];
  for (const block of message.content) {
    if (message.type === "user" && block.type === "text") {
      if (block.text) lines.push(...labelled("[USER] ", wrapText(block.text, width - 7)));
      continue;
    }

    switch (block.type) {
      case "thinking":
        if (block.thinking) lines.push(`[THINK] ${truncateText(block.thinking, width - 8)}`);
        break;
      case "text":
        if (block.text) lines.push(...labelled("[TEXT] ", wrapText(block.text, width - 7)));
        break;
      case "tool_use":
        lines.push(`[TOOL] ${truncateText(block.name, width - 7)}`);
        lines.push(...formatToolInput(block.input, width - 7).map((line) => INDENT + line));
        break;
      case "tool_result":
        if (block.text) lines.push(`[RESULT] ${truncateText(block.text, width - 9)}`);
        break;
      case "other":
        break;
    }
  }
  return lines;
}

export function renderPanelHeader(session: Session, width: number): string {
  const prefix = session.isSubagent ? "[SUB] " : "";
  const available = Math.max(3, width - 2 - prefix.length);
  const id = session.id.length > available ? `${session.id.slice(0, available - 3)}...` : session.id;
  return ` ${prefix}${id}`.padEnd(width);
}

/** Header, rule and the last `maxLines` body lines of one panel. */
export function renderPanel(session: Session | null, width: number, maxLines: number): string[] {
  const safeWidth = Math.max(MIN_WIDTH, width);
  const rule = "-".repeat(safeWidth);
  if (!session) return [rule, "Waiting for session...", rule];

  const body = session.messages.flatMap((message) => renderMessageLines(message, safeWidth));
  const visible = body.length > 0 ? body.slice(-Math.max(1, maxLines)) : ["No messages yet..."];
  return [renderPanelHeader(session, safeWidth), rule, ...visible];
}

export function renderPanels(occupants: ReadonlyArray<Session | null>, width: number, maxLines: number): string {
  return occupants.map((session) => renderPanel(session, width, maxLines).join("\n")).join("\n\n");
}

export function renderTreeRow(row: FlatTreeRow, highlighted: boolean): string {
  const prefix =
    row.depth > 0 ? `${"  ".repeat(row.depth - 1)}${row.isLast ? "└─" : "├─"}` : "";
  const name = row.session.isSubagent ? (row.sessionId.split("/").pop() ?? row.sessionId) : row.sessionId;
  const childIndicator = row.hasChildren ? " ▶" : "";
  const updateIndicator = highlighted ? " ●" : "";
  return `${prefix}${name}${childIndicator} (${row.session.messages.length})${updateIndicator}`;
}

export function renderTree(rows: readonly FlatTreeRow[], highlighted: ReadonlySet<string> = new Set()): string {
  if (rows.length === 0) return "No sessions yet...";
  return rows.map((row) => renderTreeRow(row, highlighted.has(row.sessionId))).join("\n");
}

export function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ");
    console.log(line.trimEnd());
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}
