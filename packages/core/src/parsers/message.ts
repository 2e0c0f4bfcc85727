import type { ContentBlock, Message } from "@sessionpane/contracts";
import { asArray, asRecord, parseTimestampMs } from "../utils.js";
import { toToolInput } from "./toolInput.js";

function stringField(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// tool_result content is either a plain string or a list of text blocks.
function toolResultText(content: unknown): string {
  if (typeof content === "string") return content;
  return asArray(content)
    .map((item) => stringField(asRecord(item).text))
    .filter((text) => text.length > 0)
    .join("\n");
}

function decodeBlock(raw: unknown): ContentBlock {
  const item = asRecord(raw);
  const blockType = stringField(item.type);

  switch (blockType) {
    case "text":
      return { type: "text", text: stringField(item.text) };
    case "thinking":
      return { type: "thinking", thinking: stringField(item.thinking) || stringField(item.text) };
    case "tool_use":
      return {
        type: "tool_use",
        id: stringField(item.id),
        name: stringField(item.name),
        input: toToolInput(item.input),
      };
    case "tool_result":
      return {
        type: "tool_result",
        toolUseId: stringField(item.tool_use_id),
        text: toolResultText(item.content),
        isError: item.is_error === true,
      };
    default:
      return { type: "other", rawType: blockType };
  }
}

export function decodeContent(content: unknown): ContentBlock[] {
  if (typeof content === "string") {
    return content ? [{ type: "text", text: content }] : [];
  }
  return asArray(content).map((block) => decodeBlock(block));
}

/** Decodes one log line. Blank lines and anything that is not a JSON object yield null. */
export function decodeLine(line: string): Message | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return null;

  const value = asRecord(parsed);
  const timestamp = stringField(value.timestamp);
  return {
    type: stringField(value.type),
    content: decodeContent(asRecord(value.message).content),
    agentId: stringField(value.agentId),
    sessionId: stringField(value.sessionId),
    uuid: stringField(value.uuid),
    timestamp,
    timestampMs: parseTimestampMs(timestamp),
  };
}
