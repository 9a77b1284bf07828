/**
 * Extracts paging cursors from the `link` response header.
 *
 * @example
 * Header
 * `<https://mastodon.example/api/v1/accounts/14715/followers?limit=2&max_id=7486869>; rel="next", <https://mastodon.example/api/v1/accounts/14715/followers?limit=2&since_id=7489740>; rel="prev"`
 * yields `next = { max: "7486869" }` and `previous = { since: "7489740" }`, all
 * other fields null.
 *
 * @module LinkPageExtractor
 */

import { getHeader, type TransportResponse } from "../transport/Transport";
import type { PageCursor, PageInfo } from "../types/paging";
import { parseLinkHeader } from "./link-header";
import { pageCursorFromParams } from "./page-cursor";
import type { PageExtractor } from "./PageExtractor";

export class LinkPageExtractor implements PageExtractor {
  getPageInfo(response: TransportResponse): PageInfo {
    const header = getHeader(response.headers, "link");
    if (header === null) return { next: null, previous: null };

    let next: PageCursor | null = null;
    let previous: PageCursor | null = null;

    // Later entries overwrite earlier ones with the same rel
    for (const { url, rel } of parseLinkHeader(header)) {
      const cursor = cursorFromUrl(url);
      if (rel === "next") {
        next = cursor;
      } else {
        previous = cursor;
      }
    }

    return { next, previous };
  }
}

/**
 * Reads the cursor from the query string alone, so relative targets such as
 * `</api/v1/bookmarks?max_id=42>` work as well as absolute ones.
 */
function cursorFromUrl(url: string): PageCursor {
  const start = url.indexOf("?");
  if (start === -1) return pageCursorFromParams(new URLSearchParams());
  const end = url.indexOf("#", start);
  const query = end === -1 ? url.slice(start + 1) : url.slice(start + 1, end);
  return pageCursorFromParams(new URLSearchParams(query));
}
