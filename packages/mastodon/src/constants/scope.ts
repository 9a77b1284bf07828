/**
 * OAuth scopes understood by Mastodon. Pass them to app registration and token
 * requests; multiple scopes are sent space-separated.
 */
export const Scope = {
  Read: {
    /** Read access to everything below. */
    ALL: "read",
    ACCOUNTS: "read:accounts",
    BLOCKS: "read:blocks",
    BOOKMARKS: "read:bookmarks",
    FAVOURITES: "read:favourites",
    FILTERS: "read:filters",
    FOLLOWS: "read:follows",
    LISTS: "read:lists",
    MUTES: "read:mutes",
    NOTIFICATIONS: "read:notifications",
    SEARCH: "read:search",
    STATUSES: "read:statuses",
  },
  Write: {
    /** Write access to everything below. */
    ALL: "write",
    ACCOUNTS: "write:accounts",
    BLOCKS: "write:blocks",
    BOOKMARKS: "write:bookmarks",
    CONVERSATIONS: "write:conversations",
    FAVOURITES: "write:favourites",
    FILTERS: "write:filters",
    FOLLOWS: "write:follows",
    LISTS: "write:lists",
    MEDIA: "write:media",
    MUTES: "write:mutes",
    NOTIFICATIONS: "write:notifications",
    REPORTS: "write:reports",
    STATUSES: "write:statuses",
  },
  Admin: {
    Read: {
      ALL: "admin:read",
      ACCOUNTS: "admin:read:accounts",
      REPORTS: "admin:read:reports",
      DOMAIN_ALLOWS: "admin:read:domain_allows",
      DOMAIN_BLOCKS: "admin:read:domain_blocks",
      IP_BLOCKS: "admin:read:ip_blocks",
      EMAIL_DOMAIN_BLOCKS: "admin:read:email_domain_blocks",
      CANONICAL_EMAIL_BLOCKS: "admin:read:canonical_email_blocks",
    },
    Write: {
      ALL: "admin:write",
      ACCOUNTS: "admin:write:accounts",
      REPORTS: "admin:write:reports",
      DOMAIN_ALLOWS: "admin:write:domain_allows",
      DOMAIN_BLOCKS: "admin:write:domain_blocks",
      IP_BLOCKS: "admin:write:ip_blocks",
      EMAIL_DOMAIN_BLOCKS: "admin:write:email_domain_blocks",
      CANONICAL_EMAIL_BLOCKS: "admin:write:canonical_email_blocks",
    },
  },
  /**
   * @deprecated Since Mastodon 3.5.0. Use the blocks, follows and mutes scopes of
   * `Read` and `Write` instead.
   */
  FOLLOW: "follow",
  /** Web Push API subscriptions. */
  PUSH: "push",
} as const;

/**
 * Joins scopes the way the OAuth endpoints expect them.
 */
export function joinScopes(scopes: readonly string[]): string {
  return scopes.join(" ");
}
