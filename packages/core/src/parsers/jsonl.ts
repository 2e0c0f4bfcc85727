import { open } from "node:fs/promises";
import type { DecodeResult, Message } from "@sessionpane/contracts";
import { DecodeError } from "../errors.js";
import { decodeLine } from "./message.js";

const NEWLINE = 0x0a;

export interface DecodedChunk {
  messages: Message[];
  /** Bytes up to and including the last newline; a trailing partial line is not consumed. */
  consumed: number;
}

export function decodeChunk(data: Buffer): DecodedChunk {
  const lastNewline = data.lastIndexOf(NEWLINE);
  if (lastNewline < 0) return { messages: [], consumed: 0 };

  const messages: Message[] = [];
  for (const line of data.subarray(0, lastNewline).toString("utf8").split("\n")) {
    const message = decodeLine(line);
    if (message) messages.push(message);
  }
  return { messages, consumed: lastNewline + 1 };
}

async function readFrom(filePath: string, fromOffset: number): Promise<Buffer> {
  const handle = await open(filePath, "r");
  try {
    const { size } = await handle.stat();
    if (size <= fromOffset) return Buffer.alloc(0);

    const buffer = Buffer.alloc(size - fromOffset);
    let filled = 0;
    while (filled < buffer.length) {
      const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, fromOffset + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return buffer.subarray(0, filled);
  } finally {
    await handle.close();
  }
}

/**
 * Decodes the complete lines appended to `filePath` since `fromOffset`. Rejects with
 * `DecodeError` when the file cannot be opened or read.
 */
export async function decodeFromOffset(filePath: string, fromOffset: number): Promise<DecodeResult> {
  let data: Buffer;
  try {
    data = await readFrom(filePath, fromOffset);
  } catch (error) {
    throw new DecodeError(filePath, fromOffset, error);
  }

  const { messages, consumed } = decodeChunk(data);
  return { messages, newOffset: fromOffset + consumed };
}
