/**
 * Opaque pagination state returned by the server.
 *
 * Tokens are not ordered or compared by the client, they are echoed back as
 * `since_id`, `min_id` and `max_id` query parameters.
 */
export interface PageCursor {
  /**
   * Only return results newer than this id.
   */
  readonly since: string | null;

  /**
   * Return results immediately newer than this id (paginates forward from it).
   */
  readonly min: string | null;

  /**
   * Only return results older than this id.
   */
  readonly max: string | null;
}

/**
 * Cursors for the pages around the current one.
 */
export interface PageInfo {
  readonly next: PageCursor | null;
  readonly previous: PageCursor | null;
}
