/**
 * Result types for remote API calls.
 *
 * Every call made through a {@link Client} resolves to exactly one of four variants:
 * - Success: the call completed and the body was decoded
 * - Empty: the server answered 204 No Content or 410 Gone
 * - ServerError: the server answered with a non-2xx status
 * - Failure: the call could not be completed, or the success body could not be decoded
 *
 * Nothing is thrown across the client boundary, so these types are the only channel
 * for both data and errors.
 *
 * @example
 * ```typescript
 * const result = await client.accounts.get("109302");
 * switch (result.kind) {
 *   case "success":
 *     console.log(result.data.displayName);
 *     break;
 *   case "error":
 *     console.error(result.error?.error ?? "unknown server error");
 *     break;
 *   case "empty":
 *   case "failure":
 *     break;
 * }
 * ```
 *
 * @module result
 */

import type { PageCursor } from "./paging";

/**
 * The discriminant shared by {@link Result} and {@link PagedResult}.
 */
export type ResultKind = "success" | "empty" | "error" | "failure";

/**
 * Success variant of Result<T, E>
 */
export interface Success<T> {
  readonly kind: "success";
  readonly data: T;
}

/**
 * The server signalled that there is no body (204) or that the resource is gone (410).
 */
export interface Empty {
  readonly kind: "empty";
}

/**
 * The server answered with an error status.
 *
 * `error` is null when the error payload itself could not be decoded. The exchange
 * still happened, only its details are unavailable.
 */
export interface ServerError<E> {
  readonly kind: "error";
  readonly error: E | null;
}

/**
 * The call is unusable for typed access: the transport failed, or a 2xx body did not
 * match the expected model.
 */
export interface Failure {
  readonly kind: "failure";

  /**
   * The underlying fault (network error, timeout, cancellation, decode error).
   */
  readonly cause: Error;

  /**
   * Body text captured before the fault, null when no response was received.
   */
  readonly rawBody: string | null;
}

/**
 * Result of a single-object call.
 */
export type Result<T, E> = Success<T> | Empty | ServerError<E> | Failure;

/**
 * Success variant of PagedResult<T, E>
 */
export interface PageSuccess<T> {
  readonly kind: "success";

  /**
   * The items of the current page, in server order.
   */
  readonly items: readonly T[];

  /**
   * Cursor for paging forwards, null when the server advertised no next page.
   */
  readonly nextPage: PageCursor | null;

  /**
   * Cursor for paging backwards, null when the server advertised no previous page.
   */
  readonly previousPage: PageCursor | null;
}

/**
 * Result of a list call that can be paged through.
 */
export type PagedResult<T, E> = PageSuccess<T> | Empty | ServerError<E> | Failure;
