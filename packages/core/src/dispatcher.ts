/**
 * Sends one request and classifies the response into a Result.
 *
 * Status handling, applied to single-object and paged calls alike:
 * - 204: Empty, whatever the body
 * - other 2xx: decoded success, or Failure if the body does not decode
 * - 410: Empty
 * - other statuses: ServerError with the decoded payload, or null if it does not decode
 * - transport throws: Failure without a body
 *
 * Neither entry point throws; every outcome is in the returned value.
 *
 * @module dispatcher
 */

import {
  readBody,
  type BodyReader,
  type JsonCodec,
  type PagedReaders,
  type ResponseReaders,
} from "./codec";
import { toError } from "./errors";
import type { Logger } from "./logger";
import type { PageExtractor } from "./paging/PageExtractor";
import {
  RequestBuilder,
  type RequestConfigurer,
} from "./request/RequestBuilder";
import type {
  HttpMethod,
  Transport,
  TransportResponse,
} from "./transport/Transport";
import type {
  Empty,
  Failure,
  PagedResult,
  Result,
  ServerError,
} from "./types/result";
import { pageSuccess } from "./utils/paged-result";
import { empty, failure, serverError, success } from "./utils/result";

/**
 * Everything a call needs from its client, captured when the call starts.
 */
export interface DispatchContext {
  readonly baseUrl: string;

  /**
   * Full `Authorization` header value, null for anonymous calls.
   */
  readonly authorization: string | null;

  readonly headers: Readonly<Record<string, string>>;
  readonly transport: Transport;
  readonly codec: JsonCodec;
  readonly pageExtractor: PageExtractor;
  readonly logger: Logger;
}

const NO_CONTENT = 204;
const GONE = 410;

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export async function dispatch<T, E>(
  context: DispatchContext,
  route: string,
  method: HttpMethod,
  readers: ResponseReaders<T, E>,
  configure?: RequestConfigurer,
): Promise<Result<T, E>> {
  return exchange(context, route, method, readers.error, configure, (response) =>
    success(readBody(readers.success, response.bodyText, context.codec)),
  );
}

export async function dispatchPaged<T, E>(
  context: DispatchContext,
  route: string,
  method: HttpMethod,
  readers: PagedReaders<T, E>,
  configure?: RequestConfigurer,
): Promise<PagedResult<T, E>> {
  const list = readers.item.array();
  return exchange(context, route, method, readers.error, configure, (response) => {
    const items = context.codec.decode(response.bodyText, list);
    const { next, previous } = context.pageExtractor.getPageInfo(response);
    return pageSuccess(items, next, previous);
  });
}

async function exchange<S, E>(
  context: DispatchContext,
  route: string,
  method: HttpMethod,
  errorReader: BodyReader<E>,
  configure: RequestConfigurer | undefined,
  decodeSuccess: (response: TransportResponse) => S,
): Promise<S | Empty | ServerError<E> | Failure> {
  const { logger } = context;
  const url = `${context.baseUrl}${route}`;

  let response: TransportResponse;
  try {
    const builder = new RequestBuilder(context.codec);
    configure?.(builder);
    const request = builder.build(method, url, baseHeaders(context));
    response = await context.transport.send(request);
  } catch (e) {
    const cause = toError(e);
    logger.warn(`${method} ${url} failed: ${cause.message}`);
    return failure(cause, null);
  }

  const rawBody = response.bodyText;
  logger.debug(`${method} ${url} -> ${response.status}`);

  if (isSuccessStatus(response.status)) {
    if (response.status === NO_CONTENT) return empty();
    try {
      return decodeSuccess(response);
    } catch (e) {
      const cause = toError(e);
      logger.warn(`${method} ${url}: could not decode response body`, cause);
      return failure(cause, rawBody);
    }
  }

  if (response.status === GONE) return empty();
  return serverError(readErrorBody(errorReader, rawBody, context));
}

function readErrorBody<E>(
  reader: BodyReader<E>,
  rawBody: string,
  context: DispatchContext,
): E | null {
  try {
    return readBody(reader, rawBody, context.codec);
  } catch (e) {
    context.logger.debug("Error payload could not be decoded", toError(e));
    return null;
  }
}

function baseHeaders(context: DispatchContext): Record<string, string> {
  const headers: Record<string, string> = { ...context.headers };
  if (context.authorization !== null) {
    headers["Authorization"] = context.authorization;
  }
  return headers;
}
