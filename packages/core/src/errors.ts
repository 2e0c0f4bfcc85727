export type SessionEngineErrorCode = "invalid_session_id" | "unknown_session" | "missing_log_directory";

export class SessionEngineError extends Error {
  readonly code: SessionEngineErrorCode;

  constructor(code: SessionEngineErrorCode, message: string) {
    super(message);
    this.name = "SessionEngineError";
    this.code = code;
  }
}

/** Raised by the decoder when a log file cannot be read from the requested offset. */
export class DecodeError extends Error {
  readonly path: string;
  readonly offset: number;

  constructor(filePath: string, offset: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to decode ${filePath} from offset ${offset}: ${reason}`, { cause });
    this.name = "DecodeError";
    this.path = filePath;
    this.offset = offset;
  }
}

export function asErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
