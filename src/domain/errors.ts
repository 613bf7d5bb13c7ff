/**
 * Client-facing error types raised by the engine.
 *
 * Only caller or state-integrity bugs are errors. Service outages and
 * malformed service replies are recovered inside the engine, and an empty
 * repository is a normal end of session.
 */

export type ErrorCode = 'invalid_input' | 'not_found' | 'session_completed' | 'internal_error';

/**
 * EngineError: Base class carrying a stable code and an HTTP status.
 */
export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class InvalidInputError extends EngineError {
  constructor(message: string) {
    super('invalid_input', 400, message);
  }
}

/**
 * NotFoundError: A looked-up question id the repository does not have.
 */
export class NotFoundError extends EngineError {
  constructor(message: string) {
    super('not_found', 404, message);
  }
}

/**
 * SessionCompletedError: A completed session cannot advance; the client
 * must start a fresh one.
 */
export class SessionCompletedError extends EngineError {
  constructor(sessionId: string) {
    super('session_completed', 409, `Session ${sessionId} is already completed`);
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
