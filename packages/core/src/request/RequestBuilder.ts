/**
 * Mutable description of one outgoing request, handed to the configure callback
 * of every client call.
 *
 * @module request
 */

import type { JsonCodec } from "../codec";
import type {
  HttpMethod,
  RequestBody,
  TransportRequest,
} from "../transport/Transport";
import { FormBuilder, type FormValue } from "./FormBuilder";

export type QueryValue = string | number | boolean;

/**
 * Callback that customizes a request before it is sent.
 */
export type RequestConfigurer = (request: RequestBuilder) => void;

/**
 * @example
 * ```typescript
 * await client.get("/api/v1/timelines/public", readers, (request) => {
 *   request
 *     .parameter("local", true)
 *     .parameter("limit", 40)
 *     .parameter("only_media", undefined); // skipped
 * });
 * ```
 */
export class RequestBuilder {
  private readonly headerValues: Record<string, string> = {};
  private readonly query = new URLSearchParams();
  private body: RequestBody | undefined;
  private abortSignal: AbortSignal | undefined;

  constructor(private readonly codec: JsonCodec) {}

  /**
   * Sets a header, replacing any value set earlier under the same name.
   */
  header(name: string, value: string): this {
    for (const existing of Object.keys(this.headerValues)) {
      if (existing.toLowerCase() === name.toLowerCase()) {
        delete this.headerValues[existing];
      }
    }
    this.headerValues[name] = value;
    return this;
  }

  /**
   * Appends a query parameter. Null and undefined are skipped, arrays repeat the key
   * once per element.
   */
  parameter(
    name: string,
    value: QueryValue | readonly QueryValue[] | null | undefined,
  ): this {
    if (value === null || value === undefined) return this;
    const values = Array.isArray(value) ? value : [value];
    for (const v of values) {
      this.query.append(name, String(v));
    }
    return this;
  }

  setJsonBody(value: unknown): this {
    this.body = this.codec.encode(value);
    return this.header("Content-Type", "application/json");
  }

  /**
   * Replaces the body with a multipart form.
   */
  setForm(build: (form: FormBuilder) => void): this {
    const form = new FormBuilder();
    build(form);
    this.body = form.toFormData();
    return this;
  }

  /**
   * Shorthand for a form with a single field.
   */
  setFormField(key: string, value: FormValue): this {
    return this.setForm((form) => {
      form.append(key, value);
    });
  }

  signal(signal: AbortSignal): this {
    this.abortSignal = signal;
    return this;
  }

  /**
   * @param baseHeaders - Headers applied before the ones set on this builder
   */
  build(
    method: HttpMethod,
    url: string,
    baseHeaders: Readonly<Record<string, string>>,
  ): TransportRequest {
    const target = new URL(url);
    this.query.forEach((value, name) => {
      target.searchParams.append(name, value);
    });

    const headers: Record<string, string> = { ...baseHeaders };
    for (const [name, value] of Object.entries(this.headerValues)) {
      for (const existing of Object.keys(headers)) {
        if (existing.toLowerCase() === name.toLowerCase()) {
          delete headers[existing];
        }
      }
      headers[name] = value;
    }

    return {
      method,
      url: target.toString(),
      headers,
      body: this.body,
      signal: this.abortSignal,
    };
  }
}
