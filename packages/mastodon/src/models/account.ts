/**
 * Account models.
 *
 * Schemas accept the API's snake_case JSON and produce camelCase objects.
 * Unknown keys are dropped and fields older servers omit get defaults.
 *
 * @module account
 */

import { z } from "zod";
import type { Schema } from "@fedikit/core";

export interface CustomEmoji {
  shortcode: string;
  url: string;
  staticUrl: string;
  visibleInPicker: boolean;
  category: string | null;
}

const RawCustomEmojiSchema = z.object({
  shortcode: z.string(),
  url: z.string(),
  static_url: z.string(),
  visible_in_picker: z.boolean().default(true),
  category: z.string().nullish(),
});

export const CustomEmojiSchema: Schema<CustomEmoji> =
  RawCustomEmojiSchema.transform((raw) => ({
    shortcode: raw.shortcode,
    url: raw.url,
    staticUrl: raw.static_url,
    visibleInPicker: raw.visible_in_picker,
    category: raw.category ?? null,
  }));

/**
 * A name/value pair shown on a profile.
 */
export interface Field {
  name: string;
  value: string;
  /** When the link in `value` was verified, null if never. */
  verifiedAt: string | null;
}

const RawFieldSchema = z.object({
  name: z.string(),
  value: z.string(),
  verified_at: z.string().nullish(),
});

export const FieldSchema: Schema<Field> = RawFieldSchema.transform((raw) => ({
  name: raw.name,
  value: raw.value,
  verifiedAt: raw.verified_at ?? null,
}));

export interface Account {
  id: string;
  username: string;
  /** `username` for local accounts, `username@domain` for remote ones. */
  acct: string;
  url: string;
  displayName: string;
  note: string;
  avatar: string;
  avatarStatic: string;
  header: string;
  headerStatic: string;
  locked: boolean;
  bot: boolean;
  group: boolean;
  discoverable: boolean | null;
  createdAt: string;
  lastStatusAt: string | null;
  statusesCount: number;
  followersCount: number;
  followingCount: number;
  fields: Field[];
  emojis: CustomEmoji[];
}

const RawAccountSchema = z.object({
  id: z.string(),
  username: z.string(),
  acct: z.string(),
  url: z.string().default(""),
  display_name: z.string().default(""),
  note: z.string().default(""),
  avatar: z.string().default(""),
  avatar_static: z.string().default(""),
  header: z.string().default(""),
  header_static: z.string().default(""),
  locked: z.boolean().default(false),
  bot: z.boolean().default(false),
  group: z.boolean().default(false),
  discoverable: z.boolean().nullish(),
  created_at: z.string().default(""),
  last_status_at: z.string().nullish(),
  statuses_count: z.number().int().default(0),
  followers_count: z.number().int().default(0),
  following_count: z.number().int().default(0),
  fields: z.array(FieldSchema).default([]),
  emojis: z.array(CustomEmojiSchema).default([]),
});

type RawAccount = z.infer<typeof RawAccountSchema>;

function toAccount(raw: RawAccount): Account {
  return {
    id: raw.id,
    username: raw.username,
    acct: raw.acct,
    url: raw.url,
    displayName: raw.display_name,
    note: raw.note,
    avatar: raw.avatar,
    avatarStatic: raw.avatar_static,
    header: raw.header,
    headerStatic: raw.header_static,
    locked: raw.locked,
    bot: raw.bot,
    group: raw.group,
    discoverable: raw.discoverable ?? null,
    createdAt: raw.created_at,
    lastStatusAt: raw.last_status_at ?? null,
    statusesCount: raw.statuses_count,
    followersCount: raw.followers_count,
    followingCount: raw.following_count,
    fields: raw.fields,
    emojis: raw.emojis,
  };
}

export const AccountSchema: Schema<Account> = RawAccountSchema.transform(toAccount);

/**
 * Defaults the user applies to their own posts, plus the unformatted profile.
 */
export interface AccountSource {
  note: string;
  fields: Field[];
  privacy: string;
  sensitive: boolean;
  language: string | null;
  followRequestsCount: number;
}

const RawSourceSchema = z.object({
  note: z.string().default(""),
  fields: z.array(FieldSchema).default([]),
  privacy: z.string().default("public"),
  sensitive: z.boolean().default(false),
  language: z.string().nullish(),
  follow_requests_count: z.number().int().default(0),
});

/**
 * The authenticated user's own account, as returned by credential endpoints.
 */
export interface CredentialAccount extends Account {
  source: AccountSource;
}

export const CredentialAccountSchema: Schema<CredentialAccount> = RawAccountSchema.extend({
  source: RawSourceSchema.default({}),
}).transform((raw) => ({
  ...toAccount(raw),
  source: {
    note: raw.source.note,
    fields: raw.source.fields,
    privacy: raw.source.privacy,
    sensitive: raw.source.sensitive,
    language: raw.source.language ?? null,
    followRequestsCount: raw.source.follow_requests_count,
  },
}));
