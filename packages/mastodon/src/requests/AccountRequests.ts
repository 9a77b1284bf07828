/**
 * Methods concerning accounts and profiles.
 *
 * @see https://docs.joinmastodon.org/methods/accounts/
 * @module AccountRequests
 */

import { z } from "zod";
import { applyPageCursor, type PageCursor } from "@fedikit/core";
import type { MastodonClient } from "../client/MastodonClient";
import {
  mastodon,
  mastodonPage,
  type MastodonResult,
  type PagedMastodonResult,
} from "../client/responses";
import { Routes } from "../constants/routes";
import {
  AccountSchema,
  CredentialAccountSchema,
  type Account,
  type CredentialAccount,
} from "../models/account";
import {
  FamiliarFollowersSchema,
  FeaturedTagSchema,
  UserListSchema,
  type FamiliarFollowers,
  type FeaturedTag,
  type UserList,
} from "../models/lists";
import { TokenSchema, type Privacy, type Token } from "../models/oauth";
import { RelationshipSchema, type Relationship } from "../models/relationship";
import { StatusSchema, type Status } from "../models/status";
import { appendFieldsHash } from "../utils/form";

export interface RegisterAccountParams {
  username: string;
  email: string;
  password: string;
  /** Whether the user agreed to the server's rules and terms. */
  agreement: boolean;
  /** Language of the confirmation email. Defaults to `en-US`. */
  locale?: string;
  /** Reviewed by moderators when registrations need approval. */
  reason?: string;
}

/**
 * Profile changes. Only the given fields are sent.
 */
export interface UpdateCredentialsParams {
  displayName?: string;
  note?: string;
  /** Image bytes for the new avatar. */
  avatar?: Uint8Array;
  /** Image bytes for the new header. */
  header?: Uint8Array;
  locked?: boolean;
  bot?: boolean;
  discoverable?: boolean;
  hideCollections?: boolean;
  indexable?: boolean;
  /** Replaces all profile fields; an empty record clears them. */
  fields?: Readonly<Record<string, string>>;
  statusPrivacy?: Privacy;
  statusSensitive?: boolean;
  statusLanguage?: string;
}

export interface PageParams {
  page?: PageCursor | null;
  limit?: number;
}

export interface AccountStatusesParams extends PageParams {
  onlyMedia?: boolean;
  excludeReplies?: boolean;
  excludeReblogs?: boolean;
  /** Only pinned statuses. Defaults to false. */
  pinned?: boolean;
  tagged?: string;
}

export interface FollowParams {
  /** Show this account's boosts in the home timeline. Defaults to true. */
  reblogs?: boolean;
  /** Notify when this account posts. Defaults to false. */
  notify?: boolean;
  /** Only receive posts in these languages. */
  languages?: readonly string[];
}

export interface MuteParams {
  /** Also mute notifications. Defaults to true. */
  notifications?: boolean;
  /** Seconds; 0 mutes indefinitely. */
  duration?: number;
}

export interface AccountSearchParams {
  limit?: number;
  offset?: number;
  /** Attempt a WebFinger lookup; use when the query is an exact address. */
  resolve?: boolean;
  /** Only accounts you follow. */
  following?: boolean;
}

const AccountListSchema = z.array(AccountSchema);

export class AccountRequests {
  constructor(private readonly client: MastodonClient) {}

  /**
   * Creates a user and account records.
   *
   * Scope `write:accounts`, app token. The returned token only works once the
   * user has confirmed their email.
   */
  register(params: RegisterAccountParams): Promise<MastodonResult<Token>> {
    return this.client.post(Routes.V1.Accounts.ROOT, mastodon(TokenSchema), (request) => {
      request.setForm((form) => {
        form
          .append("username", params.username)
          .append("email", params.email)
          .append("password", params.password)
          .append("agreement", params.agreement)
          .append("locale", params.locale ?? "en-US");
        if (params.reason !== undefined) form.append("reason", params.reason);
      });
    });
  }

  /**
   * The currently authorized account. Scope `read:accounts`.
   */
  verifyCredentials(): Promise<MastodonResult<CredentialAccount>> {
    return this.client.get(
      Routes.V1.Accounts.VERIFY_CREDENTIALS,
      mastodon(CredentialAccountSchema),
    );
  }

  /**
   * Updates the user's profile and posting defaults. Scope `write:accounts`.
   */
  updateCredentials(
    params: UpdateCredentialsParams,
  ): Promise<MastodonResult<CredentialAccount>> {
    return this.client.patch(
      Routes.V1.Accounts.UPDATE_CREDENTIALS,
      mastodon(CredentialAccountSchema),
      (request) => {
        request.setForm((form) => {
          if (params.displayName !== undefined) form.append("display_name", params.displayName);
          if (params.note !== undefined) form.append("note", params.note);
          if (params.avatar !== undefined) form.appendFile("avatar", params.avatar);
          if (params.header !== undefined) form.appendFile("header", params.header);
          if (params.locked !== undefined) form.append("locked", params.locked);
          if (params.bot !== undefined) form.append("bot", params.bot);
          if (params.discoverable !== undefined) form.append("discoverable", params.discoverable);
          if (params.hideCollections !== undefined) {
            form.append("hide_collections", params.hideCollections);
          }
          if (params.indexable !== undefined) form.append("indexable", params.indexable);
          if (params.fields !== undefined) appendFieldsHash(form, params.fields);
          if (params.statusPrivacy !== undefined) {
            form.append("source[privacy]", params.statusPrivacy);
          }
          if (params.statusSensitive !== undefined) {
            form.append("source[sensitive]", params.statusSensitive);
          }
          if (params.statusLanguage !== undefined) {
            form.append("source[language]", params.statusLanguage);
          }
        });
      },
    );
  }

  get(accountId: string): Promise<MastodonResult<Account>> {
    return this.client.get(Routes.V1.Accounts.byId(accountId).self, mastodon(AccountSchema));
  }

  /**
   * Statuses posted by the account, newest first. Private statuses need scope
   * `read:statuses`.
   */
  getStatuses(
    accountId: string,
    params: AccountStatusesParams = {},
  ): Promise<PagedMastodonResult<Status>> {
    return this.client.paged(
      Routes.V1.Accounts.byId(accountId).statuses,
      mastodonPage(StatusSchema),
      (request) => {
        applyPageCursor(request, params.page)
          .parameter("limit", params.limit ?? 20)
          .parameter("only_media", params.onlyMedia)
          .parameter("exclude_replies", params.excludeReplies)
          .parameter("exclude_reblogs", params.excludeReblogs)
          .parameter("pinned", params.pinned ?? false)
          .parameter("tagged", params.tagged);
      },
    );
  }

  /**
   * Accounts following the given account, unless the owner hides them.
   */
  getFollowers(
    accountId: string,
    params: PageParams = {},
  ): Promise<PagedMastodonResult<Account>> {
    return this.pageOfAccounts(Routes.V1.Accounts.byId(accountId).followers, params);
  }

  /**
   * Accounts the given account follows, unless the owner hides them.
   */
  getFollowing(
    accountId: string,
    params: PageParams = {},
  ): Promise<PagedMastodonResult<Account>> {
    return this.pageOfAccounts(Routes.V1.Accounts.byId(accountId).following, params);
  }

  getFeaturedTags(accountId: string): Promise<MastodonResult<FeaturedTag[]>> {
    return this.client.get(
      Routes.V1.Accounts.byId(accountId).featuredTags,
      mastodon(z.array(FeaturedTagSchema)),
    );
  }

  /**
   * Your lists that contain this account. Scope `read:lists`.
   */
  getLists(accountId: string): Promise<MastodonResult<UserList[]>> {
    return this.client.get(
      Routes.V1.Accounts.byId(accountId).lists,
      mastodon(z.array(UserListSchema)),
    );
  }

  /**
   * Follows the account, or updates the boost and notification settings of an
   * existing follow. Scope `write:follows`.
   */
  follow(
    accountId: string,
    params: FollowParams = {},
  ): Promise<MastodonResult<Relationship>> {
    return this.client.post(
      Routes.V1.Accounts.byId(accountId).follow,
      mastodon(RelationshipSchema),
      (request) => {
        request.setForm((form) => {
          form
            .append("reblogs", params.reblogs ?? true)
            .append("notify", params.notify ?? false);
          for (const language of params.languages ?? []) {
            form.append("languages[]", language);
          }
        });
      },
    );
  }

  unfollow(accountId: string): Promise<MastodonResult<Relationship>> {
    return this.relationshipAction(Routes.V1.Accounts.byId(accountId).unfollow);
  }

  removeFromFollowers(accountId: string): Promise<MastodonResult<Relationship>> {
    return this.relationshipAction(Routes.V1.Accounts.byId(accountId).removeFromFollowers);
  }

  block(accountId: string): Promise<MastodonResult<Relationship>> {
    return this.relationshipAction(Routes.V1.Accounts.byId(accountId).block);
  }

  unblock(accountId: string): Promise<MastodonResult<Relationship>> {
    return this.relationshipAction(Routes.V1.Accounts.byId(accountId).unblock);
  }

  mute(
    accountId: string,
    params: MuteParams = {},
  ): Promise<MastodonResult<Relationship>> {
    return this.client.post(
      Routes.V1.Accounts.byId(accountId).mute,
      mastodon(RelationshipSchema),
      (request) => {
        request.setForm((form) => {
          form
            .append("notifications", params.notifications ?? true)
            .append("duration", params.duration ?? 0);
        });
      },
    );
  }

  unmute(accountId: string): Promise<MastodonResult<Relationship>> {
    return this.relationshipAction(Routes.V1.Accounts.byId(accountId).unmute);
  }

  /**
   * Features the account on your profile. Scope `write:accounts`.
   */
  endorse(accountId: string): Promise<MastodonResult<Relationship>> {
    return this.relationshipAction(Routes.V1.Accounts.byId(accountId).pin);
  }

  unendorse(accountId: string): Promise<MastodonResult<Relationship>> {
    return this.relationshipAction(Routes.V1.Accounts.byId(accountId).unpin);
  }

  /**
   * Sets a private note on the account. A null note clears it.
   */
  setNote(accountId: string, note: string | null): Promise<MastodonResult<Relationship>> {
    return this.client.post(
      Routes.V1.Accounts.byId(accountId).note,
      mastodon(RelationshipSchema),
      (request) => {
        if (note !== null) request.setFormField("comment", note);
      },
    );
  }

  /**
   * Whether the given accounts are followed, blocked, muted and so on.
   * Scope `read:follows`.
   */
  getRelationships(
    accountIds: readonly string[],
    withSuspended = false,
  ): Promise<MastodonResult<Relationship[]>> {
    return this.client.get(
      Routes.V1.Accounts.RELATIONSHIPS,
      mastodon(z.array(RelationshipSchema)),
      (request) => {
        request.parameter("id[]", accountIds).parameter("with_suspended", withSuspended);
      },
    );
  }

  getFamiliarFollowers(
    accountIds: readonly string[],
  ): Promise<MastodonResult<FamiliarFollowers[]>> {
    return this.client.get(
      Routes.V1.Accounts.FAMILIAR_FOLLOWERS,
      mastodon(z.array(FamiliarFollowersSchema)),
      (request) => {
        request.parameter("id[]", accountIds);
      },
    );
  }

  /**
   * Accounts matching a username or display name. Scope `read:accounts`.
   */
  search(
    query: string,
    params: AccountSearchParams = {},
  ): Promise<MastodonResult<Account[]>> {
    return this.client.get(Routes.V1.Accounts.SEARCH, mastodon(AccountListSchema), (request) => {
      request
        .parameter("q", query)
        .parameter("limit", params.limit ?? 40)
        .parameter("offset", params.offset)
        .parameter("resolve", params.resolve ?? false)
        .parameter("following", params.following ?? false);
    });
  }

  /**
   * Looks up a username or WebFinger address without remote resolution.
   */
  lookup(acct: string): Promise<MastodonResult<Account>> {
    return this.client.get(Routes.V1.Accounts.LOOKUP, mastodon(AccountSchema), (request) => {
      request.parameter("acct", acct);
    });
  }

  private pageOfAccounts(
    route: string,
    params: PageParams,
  ): Promise<PagedMastodonResult<Account>> {
    return this.client.paged(route, mastodonPage(AccountSchema), (request) => {
      applyPageCursor(request, params.page).parameter("limit", params.limit ?? 40);
    });
  }

  private relationshipAction(route: string): Promise<MastodonResult<Relationship>> {
    return this.client.post(route, mastodon(RelationshipSchema));
  }
}
