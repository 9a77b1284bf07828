import { z } from "zod";
import type { Schema } from "@fedikit/core";
import { AccountSchema, type Account } from "./account";

export interface FeaturedTag {
  id: string;
  name: string;
  url: string;
  statusesCount: number;
  lastStatusAt: string | null;
}

export const FeaturedTagSchema: Schema<FeaturedTag> = z
  .object({
    id: z.string(),
    name: z.string(),
    url: z.string().default(""),
    // Some server versions send the count as a string
    statuses_count: z.coerce.number().int().default(0),
    last_status_at: z.string().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    url: raw.url,
    statusesCount: raw.statuses_count,
    lastStatusAt: raw.last_status_at ?? null,
  }));

export const REPLIES_POLICIES = ["followed", "list", "none"] as const;
export type RepliesPolicy = (typeof REPLIES_POLICIES)[number];

/**
 * A user-defined list of accounts.
 */
export interface UserList {
  id: string;
  title: string;
  repliesPolicy: RepliesPolicy;
  exclusive: boolean;
}

export const UserListSchema: Schema<UserList> = z
  .object({
    id: z.string(),
    title: z.string(),
    replies_policy: z.enum(REPLIES_POLICIES).default("list"),
    exclusive: z.boolean().default(false),
  })
  .transform((raw) => ({
    id: raw.id,
    title: raw.title,
    repliesPolicy: raw.replies_policy,
    exclusive: raw.exclusive,
  }));

/**
 * Accounts you follow that also follow the account `id`.
 */
export interface FamiliarFollowers {
  id: string;
  accounts: Account[];
}

export const FamiliarFollowersSchema: Schema<FamiliarFollowers> = z.object({
  id: z.string(),
  accounts: z.array(AccountSchema).default([]),
});
