import { z } from "zod";
import type { Schema } from "@fedikit/core";
import {
  AccountSchema,
  CustomEmojiSchema,
  type Account,
  type CustomEmoji,
} from "./account";

export interface StatusMention {
  id: string;
  username: string;
  acct: string;
  url: string;
}

export interface StatusTag {
  name: string;
  url: string;
}

/**
 * A post. A boost is a status whose `reblog` holds the boosted post; the boosted
 * post's own `reblog` is always null.
 */
export interface Status {
  id: string;
  uri: string;
  url: string | null;
  createdAt: string;
  editedAt: string | null;
  account: Account;
  /** HTML-encoded body. */
  content: string;
  visibility: string;
  sensitive: boolean;
  spoilerText: string;
  inReplyToId: string | null;
  inReplyToAccountId: string | null;
  language: string | null;
  repliesCount: number;
  reblogsCount: number;
  favouritesCount: number;
  favourited: boolean | null;
  reblogged: boolean | null;
  bookmarked: boolean | null;
  pinned: boolean | null;
  mentions: StatusMention[];
  tags: StatusTag[];
  emojis: CustomEmoji[];
  reblog: Status | null;
}

const RawStatusFields = z.object({
  id: z.string(),
  uri: z.string().default(""),
  url: z.string().nullish(),
  created_at: z.string().default(""),
  edited_at: z.string().nullish(),
  account: AccountSchema,
  content: z.string().default(""),
  visibility: z.string().default("public"),
  sensitive: z.boolean().default(false),
  spoiler_text: z.string().default(""),
  in_reply_to_id: z.string().nullish(),
  in_reply_to_account_id: z.string().nullish(),
  language: z.string().nullish(),
  replies_count: z.number().int().default(0),
  reblogs_count: z.number().int().default(0),
  favourites_count: z.number().int().default(0),
  favourited: z.boolean().nullish(),
  reblogged: z.boolean().nullish(),
  bookmarked: z.boolean().nullish(),
  pinned: z.boolean().nullish(),
  mentions: z
    .array(
      z.object({
        id: z.string(),
        username: z.string(),
        acct: z.string(),
        url: z.string(),
      }),
    )
    .default([]),
  tags: z.array(z.object({ name: z.string(), url: z.string() })).default([]),
  emojis: z.array(CustomEmojiSchema).default([]),
});

type RawStatus = z.infer<typeof RawStatusFields>;

function toStatus(raw: RawStatus, reblog: Status | null): Status {
  return {
    id: raw.id,
    uri: raw.uri,
    url: raw.url ?? null,
    createdAt: raw.created_at,
    editedAt: raw.edited_at ?? null,
    account: raw.account,
    content: raw.content,
    visibility: raw.visibility,
    sensitive: raw.sensitive,
    spoilerText: raw.spoiler_text,
    inReplyToId: raw.in_reply_to_id ?? null,
    inReplyToAccountId: raw.in_reply_to_account_id ?? null,
    language: raw.language ?? null,
    repliesCount: raw.replies_count,
    reblogsCount: raw.reblogs_count,
    favouritesCount: raw.favourites_count,
    favourited: raw.favourited ?? null,
    reblogged: raw.reblogged ?? null,
    bookmarked: raw.bookmarked ?? null,
    pinned: raw.pinned ?? null,
    mentions: raw.mentions,
    tags: raw.tags,
    emojis: raw.emojis,
    reblog,
  };
}

const BoostedStatusSchema = RawStatusFields.transform((raw) => toStatus(raw, null));

export const StatusSchema: Schema<Status> = RawStatusFields.extend({
  reblog: BoostedStatusSchema.nullish(),
}).transform((raw) => toStatus(raw, raw.reblog ?? null));
