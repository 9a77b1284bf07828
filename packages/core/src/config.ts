import { z, ZodError } from "zod";
import { ConfigurationError, formatZodError } from "./errors";

export const ClientConfigSchema = z.object({
  baseUrl: z.string().trim().min(1, "Base URL is required"),
  token: z.string().trim().min(1, "Token must not be blank").nullish(),
  headers: z.record(z.string()).default({}),
  debug: z.boolean().default(false),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

export const AxiosTransportConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(30_000),
});

export type AxiosTransportConfig = z.infer<typeof AxiosTransportConfigSchema>;
export type AxiosTransportConfigInput = z.input<
  typeof AxiosTransportConfigSchema
>;

/**
 * Parses `input` with `schema`, rethrowing validation issues as a
 * {@link ConfigurationError}.
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): z.infer<S> {
  try {
    return schema.parse(input);
  } catch (e) {
    if (e instanceof ZodError) {
      throw new ConfigurationError(`Invalid configuration: ${formatZodError(e)}`);
    }
    throw e;
  }
}

/**
 * Prepends `https://` when `url` has no scheme and strips trailing slashes.
 *
 * @example
 * ```typescript
 * normalizeBaseUrl("mastodon.example")          // => "https://mastodon.example"
 * normalizeBaseUrl("http://localhost:3000/")    // => "http://localhost:3000"
 * ```
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, "");
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;
}

/**
 * Stores a token the way it is sent: `Bearer <token>`. Values that already carry
 * the scheme followed by a credential are kept as they are; a bare `Bearer` is
 * treated as the token itself.
 */
export function formatBearerToken(token: string): string {
  const trimmed = token.trim();
  return /^bearer\s+/i.test(trimmed) ? trimmed : `Bearer ${trimmed}`;
}
