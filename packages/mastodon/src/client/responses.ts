import {
  json,
  rawText,
  type PagedReaders,
  type PagedResult,
  type ResponseReaders,
  type Result,
  type Schema,
} from "@fedikit/core";
import { MastodonErrorSchema, type MastodonError } from "../models/error";

/**
 * A result whose error payload is Mastodon's standard error body.
 */
export type MastodonResult<T> = Result<T, MastodonError>;

export type PagedMastodonResult<T> = PagedResult<T, MastodonError>;

/**
 * Result of endpoints that answer with an empty object. The body is kept as the
 * raw text, normally `"{}"`.
 */
export type EmptyResult = Result<string, MastodonError>;

const errorReader = json(MastodonErrorSchema);

export function mastodon<T>(schema: Schema<T>): ResponseReaders<T, MastodonError> {
  return { success: json(schema), error: errorReader };
}

export const mastodonRaw: ResponseReaders<string, MastodonError> = {
  success: rawText,
  error: errorReader,
};

export function mastodonPage<T>(item: Schema<T>): PagedReaders<T, MastodonError> {
  return { item, error: errorReader };
}
