/**
 * Base class for clients of a fediverse platform's HTTP API.
 *
 * A client owns one settings struct (base URL, token, default headers, transport,
 * codec, page extractor, logger). Settings can be changed after construction; each
 * call takes a snapshot of them when it starts, so calls already in flight are
 * unaffected.
 *
 * Concrete clients supply the page extractor that matches their server and expose
 * request builders that call {@link Client.execute} and {@link Client.executePaged}.
 *
 * @example
 * ```typescript
 * class InstanceClient extends Client {
 *   constructor(options: ClientConfigInput) {
 *     super({ ...options, pageExtractor: new LinkPageExtractor() });
 *   }
 * }
 *
 * const client = new InstanceClient({ baseUrl: "mastodon.example", token: "test-token" });
 * const result = await client.get("/api/v1/instance", {
 *   success: json(InstanceSchema),
 *   error: rawText,
 * });
 * ```
 *
 * @module Client
 */

import {
  defaultJsonCodec,
  type JsonCodec,
  type PagedReaders,
  type ResponseReaders,
} from "./codec";
import {
  ClientConfigSchema,
  formatBearerToken,
  normalizeBaseUrl,
  parseConfig,
  type ClientConfigInput,
} from "./config";
import { dispatch, dispatchPaged, type DispatchContext } from "./dispatcher";
import { consoleLogger, silentLogger, type Logger } from "./logger";
import type { PageExtractor } from "./paging/PageExtractor";
import type { RequestConfigurer } from "./request/RequestBuilder";
import { AxiosTransport } from "./transport/AxiosTransport";
import type { HttpMethod, Transport } from "./transport/Transport";
import type { PagedResult, Result } from "./types/result";

export interface ClientOptions extends ClientConfigInput {
  /**
   * Strategy for reading next/previous cursors off paged responses.
   */
  pageExtractor: PageExtractor;

  /**
   * Defaults to an {@link AxiosTransport} with its default timeout.
   */
  transport?: Transport;

  codec?: JsonCodec;

  /**
   * Overrides the logger selected by `debug`.
   */
  logger?: Logger;
}

interface ClientSettings {
  baseUrl: string;
  authorization: string | null;
  headers: Record<string, string>;
  transport: Transport;
  codec: JsonCodec;
  pageExtractor: PageExtractor;
  logger: Logger;
}

export abstract class Client {
  private readonly settings: ClientSettings;

  constructor(options: ClientOptions) {
    const { pageExtractor, transport, codec, logger, ...input } = options;
    const config = parseConfig(ClientConfigSchema, input);

    this.settings = {
      baseUrl: normalizeBaseUrl(config.baseUrl),
      authorization: config.token ? formatBearerToken(config.token) : null,
      headers: { ...config.headers },
      transport: transport ?? new AxiosTransport(),
      codec: codec ?? defaultJsonCodec,
      pageExtractor,
      logger: logger ?? (config.debug ? consoleLogger : silentLogger),
    };
  }

  /**
   * The URL every route is appended to.
   */
  get baseUrl(): string {
    return this.settings.baseUrl;
  }

  /**
   * Sets the base URL; `https://` is assumed when no scheme is given.
   */
  setBaseUrl(url: string): void {
    this.settings.baseUrl = normalizeBaseUrl(url);
  }

  /**
   * The `Authorization` header value (`Bearer <token>`), null when anonymous.
   */
  get token(): string | null {
    return this.settings.authorization;
  }

  /**
   * Sets or clears the token used to authorize requests.
   */
  setToken(token: string | null): void {
    this.settings.authorization =
      token === null || token.trim() === "" ? null : formatBearerToken(token);
  }

  get transport(): Transport {
    return this.settings.transport;
  }

  setTransport(transport: Transport): void {
    this.settings.transport = transport;
  }

  get codec(): JsonCodec {
    return this.settings.codec;
  }

  setCodec(codec: JsonCodec): void {
    this.settings.codec = codec;
  }

  get pageExtractor(): PageExtractor {
    return this.settings.pageExtractor;
  }

  setPageExtractor(pageExtractor: PageExtractor): void {
    this.settings.pageExtractor = pageExtractor;
  }

  /**
   * Sets a header sent with every request.
   */
  setDefaultHeader(name: string, value: string): void {
    this.settings.headers[name] = value;
  }

  /**
   * Executes a request for `route` and decodes the result.
   *
   * @param route - Path appended to the base URL, e.g. `/api/v1/accounts/1`
   * @param readers - How to read the success and error bodies
   * @param configure - Sets query parameters, headers and the body
   */
  execute<T, E>(
    route: string,
    method: HttpMethod,
    readers: ResponseReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<Result<T, E>> {
    return dispatch(this.snapshot(), route, method, readers, configure);
  }

  /**
   * Requests a list of items that can be paged through.
   */
  executePaged<T, E>(
    route: string,
    method: HttpMethod,
    readers: PagedReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<PagedResult<T, E>> {
    return dispatchPaged(this.snapshot(), route, method, readers, configure);
  }

  get<T, E>(
    route: string,
    readers: ResponseReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<Result<T, E>> {
    return this.execute(route, "GET", readers, configure);
  }

  post<T, E>(
    route: string,
    readers: ResponseReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<Result<T, E>> {
    return this.execute(route, "POST", readers, configure);
  }

  patch<T, E>(
    route: string,
    readers: ResponseReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<Result<T, E>> {
    return this.execute(route, "PATCH", readers, configure);
  }

  put<T, E>(
    route: string,
    readers: ResponseReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<Result<T, E>> {
    return this.execute(route, "PUT", readers, configure);
  }

  delete<T, E>(
    route: string,
    readers: ResponseReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<Result<T, E>> {
    return this.execute(route, "DELETE", readers, configure);
  }

  /**
   * GET shorthand for {@link Client.executePaged}.
   */
  paged<T, E>(
    route: string,
    readers: PagedReaders<T, E>,
    configure?: RequestConfigurer,
  ): Promise<PagedResult<T, E>> {
    return this.executePaged(route, "GET", readers, configure);
  }

  private snapshot(): DispatchContext {
    const { headers, ...rest } = this.settings;
    return { ...rest, headers: { ...headers } };
  }
}
