/**
 * Paths of the Mastodon endpoints this package calls, relative to the
 * instance's base URL.
 *
 * @module routes
 */

const ACCOUNTS = "/api/v1/accounts";
const APPS = "/api/v1/apps";
const EMAILS = "/api/v1/emails";

/**
 * Routes below a single account. The id is percent-encoded.
 */
export interface AccountRoutes {
  readonly self: string;
  readonly statuses: string;
  readonly followers: string;
  readonly following: string;
  readonly featuredTags: string;
  readonly lists: string;
  readonly follow: string;
  readonly unfollow: string;
  readonly removeFromFollowers: string;
  readonly block: string;
  readonly unblock: string;
  readonly mute: string;
  readonly unmute: string;
  readonly pin: string;
  readonly unpin: string;
  readonly note: string;
}

function accountRoutes(id: string): AccountRoutes {
  const self = `${ACCOUNTS}/${encodeURIComponent(id)}`;
  return {
    self,
    statuses: `${self}/statuses`,
    followers: `${self}/followers`,
    following: `${self}/following`,
    featuredTags: `${self}/featured_tags`,
    lists: `${self}/lists`,
    follow: `${self}/follow`,
    unfollow: `${self}/unfollow`,
    removeFromFollowers: `${self}/remove_from_followers`,
    block: `${self}/block`,
    unblock: `${self}/unblock`,
    mute: `${self}/mute`,
    unmute: `${self}/unmute`,
    pin: `${self}/pin`,
    unpin: `${self}/unpin`,
    note: `${self}/note`,
  };
}

export const Routes = {
  OAuth: {
    AUTHORIZE: "/oauth/authorize",
    TOKEN: "/oauth/token",
    REVOKE: "/oauth/revoke",
  },
  V1: {
    Accounts: {
      ROOT: ACCOUNTS,
      VERIFY_CREDENTIALS: `${ACCOUNTS}/verify_credentials`,
      UPDATE_CREDENTIALS: `${ACCOUNTS}/update_credentials`,
      RELATIONSHIPS: `${ACCOUNTS}/relationships`,
      FAMILIAR_FOLLOWERS: `${ACCOUNTS}/familiar_followers`,
      SEARCH: `${ACCOUNTS}/search`,
      LOOKUP: `${ACCOUNTS}/lookup`,
      byId: accountRoutes,
    },
    Apps: {
      ROOT: APPS,
      VERIFY_CREDENTIALS: `${APPS}/verify_credentials`,
    },
    Emails: {
      CONFIRMATIONS: `${EMAILS}/confirmations`,
    },
    BOOKMARKS: "/api/v1/bookmarks",
  },
} as const;
