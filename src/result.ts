import { BridgeError, type ErrorKind } from "./errors.ts";

export interface Success<T> {
  readonly type: "success";
  readonly value: T;
}

export interface Failure {
  readonly type: "failure";
  readonly kind: ErrorKind;
  readonly message: string;
  readonly cause?: unknown;
}

export type InvocationResult<T = unknown> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { type: "success", value };
}

export function failure(
  kind: ErrorKind,
  message: string,
  cause?: unknown,
): Failure {
  return cause === undefined
    ? { type: "failure", kind, message }
    : { type: "failure", kind, message, cause };
}

/**
 * Peels invocation carriers off an error until the error raised by the
 * target itself is reached. A carrier is an `AggregateError` holding exactly
 * one error.
 */
export function innermostCause(error: unknown): unknown {
  let current = error;
  while (current instanceof AggregateError && current.errors.length === 1) {
    current = current.errors[0];
  }
  return current;
}

export function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Tags an error raised by an invoked target. The message is taken from the
 * innermost cause, which is also kept for diagnostics.
 */
export function invocationFailure(error: unknown): Failure {
  const cause = innermostCause(error);
  return failure("InvocationFailure", messageOf(cause), cause);
}

export function toBridgeError(result: Failure): BridgeError {
  return new BridgeError(result.kind, result.message, result.cause);
}
