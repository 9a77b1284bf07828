/**
 * Helper functions for {@link PagedResult} values.
 *
 * @module paged-result
 */

import type { PageCursor } from "../types/paging";
import type { PagedResult, PageSuccess } from "../types/result";
import { assertNever, toUnsuccessfulError } from "./result";

/**
 * Create a successful page.
 */
export function pageSuccess<T>(
  items: readonly T[],
  nextPage: PageCursor | null,
  previousPage: PageCursor | null,
): PageSuccess<T> {
  return { kind: "success", items, nextPage, previousPage };
}

/**
 * Handlers for every variant of a PagedResult. All four are required.
 */
export interface PageMatcher<T, E, R> {
  success(page: PageSuccess<T>): R;
  empty(): R;
  error(error: E | null): R;
  failure(cause: Error, rawBody: string | null): R;
}

/**
 * Exhaustively map a PagedResult to a single value.
 */
export function matchPage<T, E, R>(
  result: PagedResult<T, E>,
  matcher: PageMatcher<T, E, R>,
): R {
  switch (result.kind) {
    case "success":
      return matcher.success(result);
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
 * Callbacks for any subset of variants. `success` receives only the items,
 * without the surrounding cursors.
 */
export function foldPage<T, E>(
  result: PagedResult<T, E>,
  callbacks: {
    success?: (items: readonly T[]) => void;
    empty?: () => void;
    error?: (error: E | null) => void;
    failure?: (cause: Error, rawBody: string | null) => void;
  },
): void {
  matchPage(result, {
    success: (page) => callbacks.success?.(page.items),
    empty: () => callbacks.empty?.(),
    error: (error) => callbacks.error?.(error),
    failure: (cause, rawBody) => callbacks.failure?.(cause, rawBody),
  });
}

/**
 * Only calls `block` if the page was fetched.
 */
export function ifPageSuccessful<T, E>(
  result: PagedResult<T, E>,
  block: (page: PageSuccess<T>) => void,
): void {
  if (result.kind === "success") block(result);
}

/**
 * The items of the page if successful, otherwise null.
 */
export function getPageOrNull<T, E>(
  result: PagedResult<T, E>,
): readonly T[] | null {
  return result.kind === "success" ? result.items : null;
}

/**
 * The items of the page if successful, otherwise throws.
 */
export function getPageOrThrow<T, E>(result: PagedResult<T, E>): readonly T[] {
  if (result.kind === "success") return result.items;
  throw toUnsuccessfulError(result);
}

/**
 * The page alongside its next and previous cursors if successful, otherwise null.
 */
export function getPageSuccessOrNull<T, E>(
  result: PagedResult<T, E>,
): PageSuccess<T> | null {
  return result.kind === "success" ? result : null;
}
