import type { ContentfulStatusCode } from "hono/utils/http-status";

export type ExecutorErrorKind =
  | "validation"
  | "not_found"
  | "runtime_creation"
  | "staging"
  | "dispatch"
  | "retrieval"
  | "reclaim";

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.toString();
  }
  return String(error);
}

export abstract class ExecutorError extends Error {
  abstract readonly kind: ExecutorErrorKind;
  abstract readonly status: ContentfulStatusCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed submission. Never retried. */
export class ValidationError extends ExecutorError {
  readonly kind = "validation";
  readonly status = 400;
}

export class NotFoundError extends ExecutorError {
  readonly kind = "not_found";
  readonly status = 404;

  constructor(readonly sessionId: string) {
    super("Session not found");
  }
}

export class RuntimeCreationError extends ExecutorError {
  readonly kind = "runtime_creation";
  readonly status = 500;
}

export class StagingError extends ExecutorError {
  readonly kind = "staging";
  readonly status = 500;
}

/**
 * The exec call failed. The sandbox is in an undefined state afterwards and
 * has already been released by the time this reaches the caller.
 */
export class DispatchError extends ExecutorError {
  readonly kind = "dispatch";
  readonly status = 500;
}

export class RetrievalError extends ExecutorError {
  readonly kind = "retrieval";
  readonly status = 500;
}

export class ReclaimError extends ExecutorError {
  readonly kind = "reclaim";
  readonly status = 500;
}

export function isExecutorError(error: unknown): error is ExecutorError {
  return error instanceof ExecutorError;
}

/**
 * Wraps a runtime failure in the given error class unless it already is an
 * executor error, keeping the original message visible to the client.
 */
export function wrapRuntimeError(
  ErrorClass: new (message: string, options?: { cause?: unknown }) => ExecutorError,
  context: string,
  error: unknown,
): ExecutorError {
  if (isExecutorError(error)) {
    return error;
  }
  return new ErrorClass(`${context}: ${describeError(error)}`, { cause: error });
}
