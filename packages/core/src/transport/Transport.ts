/**
 * Transport interface for sending HTTP requests.
 *
 * A transport executes one fully built request and hands back the status, the
 * headers and the complete body text. It may throw on connectivity problems,
 * timeouts or cancellation; the dispatcher turns those throws into a Failure.
 *
 * TLS, connection pooling, proxies and the like are the transport's concern and
 * are configured on the implementation, never through the client.
 *
 * @module transport
 */

/**
 * Supported HTTP methods.
 */
export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

/**
 * Request payloads a transport must be able to send: serialized text (JSON) or a
 * multipart form, which may carry file parts.
 */
export type RequestBody = string | FormData;

/**
 * Response headers keyed by lower-cased header name.
 */
export type ResponseHeaders = Readonly<Record<string, string>>;

export interface TransportRequest {
  readonly method: HttpMethod;

  /**
   * Absolute URL including the query string.
   */
  readonly url: string;

  readonly headers: Readonly<Record<string, string>>;

  readonly body?: RequestBody;

  /**
   * Aborts the in-flight request when signalled.
   */
  readonly signal?: AbortSignal;
}

export interface TransportResponse {
  readonly status: number;
  readonly headers: ResponseHeaders;

  /**
   * The full body, read eagerly. Empty string when the server sent none.
   */
  readonly bodyText: string;
}

/**
 * Contract every transport (axios, stubs, custom engines) implements.
 *
 * @example
 * ```typescript
 * const transport: Transport = new AxiosTransport({ timeoutMs: 10_000 });
 * const response = await transport.send({
 *   method: "GET",
 *   url: "https://mastodon.example/api/v1/instance",
 *   headers: {},
 * });
 * console.log(response.status, response.bodyText);
 * ```
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Case-insensitive header lookup.
 */
export function getHeader(
  headers: ResponseHeaders,
  name: string,
): string | null {
  return headers[name.toLowerCase()] ?? null;
}
