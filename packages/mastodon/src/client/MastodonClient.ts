/**
 * Client for the Mastodon API.
 *
 * @example
 * ```typescript
 * const client = new MastodonClient({ baseUrl: "mastodon.example", token: "test-token" });
 *
 * const me = await client.accounts.verifyCredentials();
 * ifSuccessful(me, (account) => console.log(account.displayName));
 *
 * const first = await client.bookmarks.list({ limit: 40 });
 * const next = getPageSuccessOrNull(first)?.nextPage;
 * if (next) await client.bookmarks.list({ page: next });
 * ```
 *
 * @module MastodonClient
 */

import {
  Client,
  LinkPageExtractor,
  type ClientOptions,
  type PageExtractor,
} from "@fedikit/core";
import { AccountRequests } from "../requests/AccountRequests";
import { AppRequests } from "../requests/AppRequests";
import { BookmarkRequests } from "../requests/BookmarkRequests";
import { EmailRequests } from "../requests/EmailRequests";
import { OauthRequests } from "../requests/OauthRequests";

export interface MastodonClientOptions extends Omit<ClientOptions, "pageExtractor"> {
  /**
   * Defaults to reading the `Link` header.
   */
  pageExtractor?: PageExtractor;
}

export class MastodonClient extends Client {
  /** Accounts and profiles. */
  readonly accounts: AccountRequests;

  /** Your bookmarks. */
  readonly bookmarks: BookmarkRequests;

  /** Client application registration. */
  readonly apps: AppRequests;

  /** Confirmation emails. */
  readonly emails: EmailRequests;

  /** OAuth tokens. */
  readonly oauth: OauthRequests;

  constructor(options: MastodonClientOptions) {
    const { pageExtractor, ...rest } = options;
    super({ ...rest, pageExtractor: pageExtractor ?? new LinkPageExtractor() });

    this.accounts = new AccountRequests(this);
    this.bookmarks = new BookmarkRequests(this);
    this.apps = new AppRequests(this);
    this.emails = new EmailRequests(this);
    this.oauth = new OauthRequests(this);
  }
}
