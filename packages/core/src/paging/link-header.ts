/**
 * Parsing for the `Link` response header used by Mastodon-style pagination.
 *
 * Servers send comma-space separated entries, each an angle-bracketed URL followed
 * by a quoted relation:
 * `<https://mastodon.example/api/v1/bookmarks?max_id=42>; rel="next", <https://mastodon.example/api/v1/bookmarks?min_id=57>; rel="prev"`
 *
 * @module link-header
 */

/**
 * Relations that drive paging.
 */
export type LinkRel = "next" | "prev";

export interface LinkEntry {
  readonly url: string;
  readonly rel: LinkRel;
}

export const LINK_ENTRY_SEPARATOR = ", ";

const LINK_ENTRY = /^<(.+?)>; rel="(next|prev)"$/;

/**
 * Match a single entry. Anything that is not exactly `<URL>; rel="next"` or
 * `<URL>; rel="prev"` yields null.
 *
 * @example
 * ```typescript
 * parseLinkEntry('<https://x/a?max_id=1>; rel="next"')
 * // => { url: "https://x/a?max_id=1", rel: "next" }
 * parseLinkEntry('<https://x/a>; rel="last"')  // => null
 * ```
 */
export function parseLinkEntry(entry: string): LinkEntry | null {
  const match = LINK_ENTRY.exec(entry);
  if (!match) return null;
  const [, url, rel] = match;
  if (url === undefined || (rel !== "next" && rel !== "prev")) return null;
  return { url, rel };
}

/**
 * All next/prev entries of a header value, in header order. Unrecognized entries
 * are dropped.
 */
export function parseLinkHeader(value: string): LinkEntry[] {
  const entries: LinkEntry[] = [];
  for (const part of value.split(LINK_ENTRY_SEPARATOR)) {
    const entry = parseLinkEntry(part);
    if (entry) entries.push(entry);
  }
  return entries;
}
