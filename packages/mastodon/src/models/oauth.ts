import { z } from "zod";
import type { Schema } from "@fedikit/core";

/**
 * An OAuth access token. Store it; it is shown only once.
 */
export interface Token {
  accessToken: string;
  tokenType: string;
  /** Space-separated granted scopes. */
  scope: string;
  /** Seconds since the epoch. */
  createdAt: number;
}

export const TokenSchema: Schema<Token> = z
  .object({
    access_token: z.string(),
    token_type: z.string().default("Bearer"),
    scope: z.string().default(""),
    created_at: z.number().default(0),
  })
  .transform((raw) => ({
    accessToken: raw.access_token,
    tokenType: raw.token_type,
    scope: raw.scope,
    createdAt: raw.created_at,
  }));

/**
 * A registered client application. `clientId` and `clientSecret` are only
 * present right after registration.
 */
export interface Application {
  name: string;
  website: string | null;
  vapidKey: string | null;
  clientId: string | null;
  clientSecret: string | null;
  redirectUri: string | null;
}

export const ApplicationSchema: Schema<Application> = z
  .object({
    name: z.string(),
    website: z.string().nullish(),
    vapid_key: z.string().nullish(),
    client_id: z.string().nullish(),
    client_secret: z.string().nullish(),
    redirect_uri: z.string().nullish(),
  })
  .transform((raw) => ({
    name: raw.name,
    website: raw.website ?? null,
    vapidKey: raw.vapid_key ?? null,
    clientId: raw.client_id ?? null,
    clientSecret: raw.client_secret ?? null,
    redirectUri: raw.redirect_uri ?? null,
  }));

export const GrantType = {
  /** User-level access, exchanging an authorization code. */
  CODE: "authorization_code",
  /** App-level access only. */
  APP: "client_credentials",
} as const;

export type GrantType = (typeof GrantType)[keyof typeof GrantType];

export const Privacy = {
  PUBLIC: "public",
  UNLISTED: "unlisted",
  PRIVATE: "private",
} as const;

export type Privacy = (typeof Privacy)[keyof typeof Privacy];
