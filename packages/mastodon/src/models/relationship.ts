import { z } from "zod";
import type { Schema } from "@fedikit/core";

/**
 * How the authenticated user relates to another account.
 */
export interface Relationship {
  id: string;
  following: boolean;
  showingReblogs: boolean;
  notifying: boolean;
  languages: string[] | null;
  followedBy: boolean;
  blocking: boolean;
  blockedBy: boolean;
  muting: boolean;
  mutingNotifications: boolean;
  requested: boolean;
  requestedBy: boolean;
  domainBlocking: boolean;
  endorsed: boolean;
  /** The private note left on the account, "" when none. */
  note: string;
}

const flag = z.boolean().default(false);

export const RelationshipSchema: Schema<Relationship> = z
  .object({
    id: z.string(),
    following: flag,
    showing_reblogs: flag,
    notifying: flag,
    languages: z.array(z.string()).nullish(),
    followed_by: flag,
    blocking: flag,
    blocked_by: flag,
    muting: flag,
    muting_notifications: flag,
    requested: flag,
    requested_by: flag,
    domain_blocking: flag,
    endorsed: flag,
    note: z.string().default(""),
  })
  .transform((raw) => ({
    id: raw.id,
    following: raw.following,
    showingReblogs: raw.showing_reblogs,
    notifying: raw.notifying,
    languages: raw.languages ?? null,
    followedBy: raw.followed_by,
    blocking: raw.blocking,
    blockedBy: raw.blocked_by,
    muting: raw.muting,
    mutingNotifications: raw.muting_notifications,
    requested: raw.requested,
    requestedBy: raw.requested_by,
    domainBlocking: raw.domain_blocking,
    endorsed: raw.endorsed,
    note: raw.note,
  }));
