import { Writable } from "node:stream";
import pino, { type Logger } from "pino";
import type { LogFormat, LogLevel } from "@sessionpane/contracts";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function isLogFormat(value: string): value is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(value);
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const parsed: unknown = JSON.parse(line);
          const msg = parsed && typeof parsed === "object" ? (parsed as { msg?: unknown }).msg : undefined;
          process.stderr.write(`${typeof msg === "string" ? msg : line}\n`);
        } catch {
          process.stderr.write(`${line}\n`);
        }
      }
      cb();
    },
  });
}

let rootLogger: Logger | null = null;

// stdout is reserved for rendered output, so every format goes to stderr.
export function initLogger(level: LogLevel = "info", format: LogFormat = "plain"): Logger {
  if (format === "plain") {
    rootLogger = pino({ level, name: "sessionpane" }, plainMessageStderr());
  } else if (format === "text") {
    rootLogger = pino(
      { level, name: "sessionpane" },
      pino.transport({ target: "pino-pretty", options: { colorize: true, destination: 2 } }),
    );
  } else {
    rootLogger = pino({ level, name: "sessionpane" }, pino.destination(2));
  }
  return rootLogger;
}

export function getLogger(): Logger {
  return rootLogger ?? initLogger();
}

export type { Logger };
