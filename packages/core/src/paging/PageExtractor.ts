/**
 * PageExtractor interface for deriving pagination cursors from a response.
 *
 * Servers advertise adjacent pages in different ways (Link headers, offsets,
 * cursors embedded in the body). Each client is given the strategy matching its
 * server, and the dispatcher calls it for every successful paged response.
 *
 * @module paging
 */

import type { PageInfo } from "../types/paging";
import type { TransportResponse } from "../transport/Transport";

/**
 * @example
 * ```typescript
 * const offsetExtractor: PageExtractor = {
 *   getPageInfo(response) {
 *     const next = getHeader(response.headers, "x-next-max-id");
 *     return {
 *       next: next === null ? null : createPageCursor({ max: next }),
 *       previous: null,
 *     };
 *   },
 * };
 * client.setPageExtractor(offsetExtractor);
 * ```
 */
export interface PageExtractor {
  /**
   * Extracts the cursors for the next and previous pages. Missing links are null.
   */
  getPageInfo(response: TransportResponse): PageInfo;
}
