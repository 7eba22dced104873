export type SessionErrorKind = "BackendError" | "TurnLimitError" | "TimeoutError" | "CancelledError";

/** Errors that end a session. */
export class SessionError extends Error {
  readonly kind: SessionErrorKind;

  constructor(kind: SessionErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

export class BackendError extends SessionError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super("BackendError", message);
    this.status = status;
  }
}

export class TurnLimitError extends SessionError {
  constructor(maxTurns: number) {
    super("TurnLimitError", `Turn limit of ${maxTurns} reached before the backend produced a final answer`);
  }
}

export class TimeoutError extends SessionError {
  constructor(timeoutMs: number) {
    super("TimeoutError", `Session exceeded its ${timeoutMs}ms budget`);
  }
}

export class CancelledError extends SessionError {
  constructor(reason = "Session cancelled by caller") {
    super("CancelledError", reason);
  }
}

/** Anything thrown out of a backend exchange that is not already a SessionError is a backend failure. */
export function toSessionError(error: unknown): SessionError {
  if (error instanceof SessionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : "Unknown backend error";
  return new BackendError(message);
}
