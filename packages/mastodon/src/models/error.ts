import { z } from "zod";
import type { Schema } from "@fedikit/core";

/**
 * Body of Mastodon's non-2xx responses.
 */
export interface MastodonError {
  error: string;
  /** Present on OAuth errors. */
  errorDescription: string | null;
}

export const MastodonErrorSchema: Schema<MastodonError> = z
  .object({
    error: z.string(),
    error_description: z.string().nullish(),
  })
  .transform((raw) => ({
    error: raw.error,
    errorDescription: raw.error_description ?? null,
  }));
