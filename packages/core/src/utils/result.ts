/**
 * Helper functions for creating and consuming {@link Result} values.
 *
 * @module result
 */

import { UnsuccessfulResultError } from "../errors";
import type {
  Empty,
  Failure,
  Result,
  ServerError,
  Success,
} from "../types/result";

/**
 * Create a successful Result containing a value.
 *
 * @example
 * ```typescript
 * const result = success({ id: "1" });
 * // result: Success<{ id: string }> = { kind: "success", data: { id: "1" } }
 * ```
 */
export function success<T>(data: T): Success<T> {
  return { kind: "success", data };
}

const EMPTY: Empty = Object.freeze({ kind: "empty" });

/**
 * The shared Empty value.
 */
export function empty(): Empty {
  return EMPTY;
}

/**
 * Create an error Result carrying the decoded error payload, or null when the
 * payload could not be read.
 */
export function serverError<E>(error: E | null): ServerError<E> {
  return { kind: "error", error };
}

/**
 * Create a failed Result.
 *
 * @param cause - The fault that made the call unusable
 * @param rawBody - Whatever body text was read before the fault, null if none
 */
export function failure(cause: Error, rawBody: string | null): Failure {
  return { kind: "failure", cause, rawBody };
}

/**
 * Type guard to check if a Result is a Success.
 *
 * @example
 * ```typescript
 * if (isSuccess(result)) {
 *   console.log(result.data); // TypeScript knows result.data exists
 * }
 * ```
 */
export function isSuccess<T, E>(result: Result<T, E>): result is Success<T> {
  return result.kind === "success";
}

export function isEmpty<T, E>(result: Result<T, E>): result is Empty {
  return result.kind === "empty";
}

export function isServerError<T, E>(
  result: Result<T, E>,
): result is ServerError<E> {
  return result.kind === "error";
}

export function isFailure<T, E>(result: Result<T, E>): result is Failure {
  return result.kind === "failure";
}

/**
 * Compile-time exhaustiveness check for switches over result kinds.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected result variant: ${JSON.stringify(value)}`);
}

/**
 * Handlers for every variant of a Result. All four are required.
 */
export interface ResultMatcher<T, E, R> {
  success(data: T): R;
  empty(): R;
  error(error: E | null): R;
  failure(cause: Error, rawBody: string | null): R;
}

/**
 * Exhaustively map a Result to a single value.
 *
 * @example
 * ```typescript
 * const label = match(result, {
 *   success: (account) => account.displayName,
 *   empty: () => "deleted",
 *   error: (e) => e?.error ?? "server error",
 *   failure: (cause) => cause.message,
 * });
 * ```
 */
export function match<T, E, R>(
  result: Result<T, E>,
  matcher: ResultMatcher<T, E, R>,
): R {
  switch (result.kind) {
    case "success":
      return matcher.success(result.data);
    case "empty":
      return matcher.empty();
    case "error":
      return matcher.error(result.error);
    case "failure":
      return matcher.failure(result.cause, result.rawBody);
    default:
      return assertNever(result);
  }
}

/**
 * Callbacks for any subset of variants; variants without a callback are ignored.
 */
export function fold<T, E>(
  result: Result<T, E>,
  callbacks: Partial<ResultMatcher<T, E, void>>,
): void {
  match(result, {
    success: (data) => callbacks.success?.(data),
    empty: () => callbacks.empty?.(),
    error: (error) => callbacks.error?.(error),
    failure: (cause, rawBody) => callbacks.failure?.(cause, rawBody),
  });
}

/**
 * Version of {@link fold} that treats both server errors and failures as `fail`.
 * Failures are reported with a null payload.
 */
export function foldEither<T, E>(
  result: Result<T, E>,
  callbacks: {
    success?: (data: T) => void;
    empty?: () => void;
    fail?: (error: E | null) => void;
  },
): void {
  match(result, {
    success: (data) => callbacks.success?.(data),
    empty: () => callbacks.empty?.(),
    error: (error) => callbacks.fail?.(error),
    failure: () => callbacks.fail?.(null),
  });
}

/**
 * Only calls `block` if the result carries data.
 */
export function ifSuccessful<T, E>(
  result: Result<T, E>,
  block: (data: T) => void,
): void {
  if (result.kind === "success") block(result.data);
}

/**
 * Only calls `block` if the result is Empty.
 */
export function ifEmpty<T, E>(result: Result<T, E>, block: () => void): void {
  if (result.kind === "empty") block();
}

/**
 * The data if successful, otherwise null.
 */
export function getOrNull<T, E>(result: Result<T, E>): T | null {
  return result.kind === "success" ? result.data : null;
}

/**
 * The data if successful, otherwise throws an {@link UnsuccessfulResultError}.
 */
export function getOrThrow<T, E>(result: Result<T, E>): T {
  if (result.kind === "success") return result.data;
  throw toUnsuccessfulError(result);
}

/**
 * @internal
 */
export function toUnsuccessfulError<E>(
  result: Empty | ServerError<E> | Failure,
): UnsuccessfulResultError {
  switch (result.kind) {
    case "empty":
      return new UnsuccessfulResultError("empty", "Response had no body");
    case "error":
      return new UnsuccessfulResultError(
        "error",
        "Server returned an error response",
      );
    case "failure":
      return new UnsuccessfulResultError(
        "failure",
        `Request failed: ${result.cause.message}`,
        { cause: result.cause },
      );
    default:
      return assertNever(result);
  }
}
