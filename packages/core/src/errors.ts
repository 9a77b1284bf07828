import { ZodError } from "zod";
import type { ResultKind } from "./types/result";

/**
 * Thrown when client or transport options fail validation.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown by the `getOrThrow` helpers when a result holds no data.
 *
 * For failures the underlying fault is kept as `cause`.
 */
export class UnsuccessfulResultError extends Error {
  constructor(
    public readonly kind: Exclude<ResultKind, "success">,
    message: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "UnsuccessfulResultError";
  }
}

/**
 * Flattens zod issues into a single `path: message` list.
 */
export function formatZodError(e: ZodError): string {
  return e.errors
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join(", ");
}

/**
 * Coerces any thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
