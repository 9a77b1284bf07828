/**
 * JSON decoding and per-call body readers.
 *
 * The expected shape of a body is chosen at the call site: either the raw text is
 * handed over untouched, or it is parsed and validated against a zod schema. Zod
 * object schemas drop keys they do not know and fill in `.default()` values, so
 * fields added by newer servers never break decoding.
 *
 * @module codec
 */

import type { z } from "zod";

/**
 * A zod schema producing `T`, whatever its input type.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface JsonCodec {
  /**
   * Parses `text` and validates it against `schema`. Throws on malformed JSON or
   * a shape mismatch.
   */
  decode<T>(text: string, schema: Schema<T>): T;

  encode(value: unknown): string;
}

export const defaultJsonCodec: JsonCodec = {
  decode<T>(text: string, schema: Schema<T>): T {
    const parsed: unknown = JSON.parse(text);
    return schema.parse(parsed);
  },
  encode(value: unknown): string {
    return JSON.stringify(value);
  },
};

/**
 * Pass the body through as text, without decoding. Some endpoints answer with a
 * literal `"{}"` that callers want as-is.
 */
export interface RawReader<T> {
  readonly kind: "raw";
  readonly fromText: (text: string) => T;
}

export interface JsonReader<T> {
  readonly kind: "json";
  readonly schema: Schema<T>;
}

/**
 * How to turn a response body into `T`.
 */
export type BodyReader<T> = RawReader<T> | JsonReader<T>;

export const rawText: RawReader<string> = {
  kind: "raw",
  fromText: (text) => text,
};

export function json<T>(schema: Schema<T>): JsonReader<T> {
  return { kind: "json", schema };
}

/**
 * Readers for a single-object call.
 */
export interface ResponseReaders<T, E> {
  readonly success: BodyReader<T>;
  readonly error: BodyReader<E>;
}

/**
 * Readers for a paged call. Pages are always JSON arrays of `item`.
 */
export interface PagedReaders<T, E> {
  readonly item: Schema<T>;
  readonly error: BodyReader<E>;
}

export function readBody<T>(
  reader: BodyReader<T>,
  text: string,
  codec: JsonCodec,
): T {
  switch (reader.kind) {
    case "raw":
      return reader.fromText(text);
    case "json":
      return codec.decode(text, reader.schema);
  }
}
