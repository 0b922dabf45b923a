export type SyncErrorKind =
  | "ConnectionFailed"
  | "ConnectionLost"
  | "Timeout"
  | "InvalidMessage"
  | "ServerError"
  | "Unknown";

const USER_MESSAGES: Record<SyncErrorKind, string> = {
  ConnectionFailed: "Unable to connect to session",
  ConnectionLost: "Connection to session lost",
  Timeout: "Connection timed out",
  InvalidMessage: "Received invalid data from server",
  ServerError: "Server error occurred",
  Unknown: "An unexpected error occurred",
};

export interface SyncErrorOptions {
  cause?: unknown;
  status?: number;
  userMessage?: string;
}

/**
 * Error raised anywhere in the sync core. `message` is for logs;
 * `userMessage` is what a board or feed shows.
 */
export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly status?: number;
  readonly userMessage: string;

  constructor(kind: SyncErrorKind, message: string, options: SyncErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SyncError";
    this.kind = kind;
    this.status = options.status;
    this.userMessage = options.userMessage ?? USER_MESSAGES[kind];
  }
}

export function timeoutError(label: string, timeoutMs: number, cause?: unknown): SyncError {
  return new SyncError("Timeout", `${label} timed out after ${timeoutMs}ms`, { cause });
}

export function invalidMessageError(detail: string, cause?: unknown): SyncError {
  return new SyncError("InvalidMessage", `Invalid message: ${detail}`, { cause });
}

export function fromHttpStatus(status: number, body?: string): SyncError {
  const detail = body?.trim() ? `: ${body.trim().slice(0, 200)}` : "";
  if (status === 404) {
    return new SyncError("ServerError", `HTTP 404${detail}`, { status, userMessage: "Not found on server" });
  }
  if (status === 408 || status === 504) {
    return new SyncError("Timeout", `HTTP ${status}${detail}`, { status });
  }
  if (status >= 500) {
    return new SyncError("ServerError", `HTTP ${status}${detail}`, { status });
  }
  return new SyncError("ServerError", `HTTP ${status}${detail}`, {
    status,
    userMessage: `Request failed (${status})`,
  });
}

export function isAbortTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/** Normalize anything thrown into a SyncError, keeping the original as `cause`. */
export function toSyncError(error: unknown, fallback: SyncErrorKind = "Unknown"): SyncError {
  if (error instanceof SyncError) return error;
  if (isAbortTimeout(error)) {
    return new SyncError("Timeout", error instanceof Error ? error.message : "Request timed out", { cause: error });
  }
  if (error instanceof SyntaxError) {
    return invalidMessageError(error.message, error);
  }
  if (error instanceof Error) {
    return new SyncError(fallback, error.message, { cause: error });
  }
  return new SyncError(fallback, String(error), { cause: error });
}

/** True for failures worth retrying: timeouts, refused connections, 5xx. */
export function isTransient(error: SyncError): boolean {
  if (error.kind === "Timeout" || error.kind === "ConnectionFailed") return true;
  return error.kind === "ServerError" && (error.status === undefined || error.status >= 500);
}
