import type { RequestBuilder } from "../request/RequestBuilder";
import type { PageCursor } from "../types/paging";

export const SINCE_ID = "since_id";
export const MIN_ID = "min_id";
export const MAX_ID = "max_id";

/**
 * Build a frozen cursor; fields left out are null.
 *
 * @example
 * ```typescript
 * createPageCursor({ max: "7486869" })
 * // => { since: null, min: null, max: "7486869" }
 * ```
 */
export function createPageCursor(
  fields: Partial<Record<keyof PageCursor, string | null>> = {},
): PageCursor {
  return Object.freeze({
    since: fields.since ?? null,
    min: fields.min ?? null,
    max: fields.max ?? null,
  });
}

/**
 * Reads `since_id`, `min_id` and `max_id` from a query string.
 */
export function pageCursorFromParams(params: URLSearchParams): PageCursor {
  return createPageCursor({
    since: params.get(SINCE_ID),
    min: params.get(MIN_ID),
    max: params.get(MAX_ID),
  });
}

/**
 * Adds the cursor's tokens to an outgoing request. A missing cursor adds nothing.
 */
export function applyPageCursor(
  request: RequestBuilder,
  cursor: PageCursor | null | undefined,
): RequestBuilder {
  if (!cursor) return request;
  return request
    .parameter(MAX_ID, cursor.max)
    .parameter(MIN_ID, cursor.min)
    .parameter(SINCE_ID, cursor.since);
}

export function isSamePageCursor(
  a: PageCursor | null,
  b: PageCursor | null,
): boolean {
  if (a === null || b === null) return a === b;
  return a.since === b.since && a.min === b.min && a.max === b.max;
}
