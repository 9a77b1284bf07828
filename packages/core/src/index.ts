export type {
  Result,
  PagedResult,
  ResultKind,
  Success,
  PageSuccess,
  Empty,
  ServerError,
  Failure,
} from "./types/result";
export type { PageCursor, PageInfo } from "./types/paging";

export {
  success,
  empty,
  serverError,
  failure,
  isSuccess,
  isEmpty,
  isServerError,
  isFailure,
  assertNever,
  match,
  fold,
  foldEither,
  ifSuccessful,
  ifEmpty,
  getOrNull,
  getOrThrow,
} from "./utils/result";
export type { ResultMatcher } from "./utils/result";
export {
  pageSuccess,
  matchPage,
  foldPage,
  ifPageSuccessful,
  getPageOrNull,
  getPageOrThrow,
  getPageSuccessOrNull,
} from "./utils/paged-result";
export type { PageMatcher } from "./utils/paged-result";

export type { PageExtractor } from "./paging/PageExtractor";
export { LinkPageExtractor } from "./paging/LinkPageExtractor";
export { parseLinkHeader, parseLinkEntry } from "./paging/link-header";
export type { LinkEntry, LinkRel } from "./paging/link-header";
export {
  createPageCursor,
  pageCursorFromParams,
  applyPageCursor,
  isSamePageCursor,
} from "./paging/page-cursor";

export { RequestBuilder } from "./request/RequestBuilder";
export type { QueryValue, RequestConfigurer } from "./request/RequestBuilder";
export { FormBuilder } from "./request/FormBuilder";
export type { FormValue } from "./request/FormBuilder";

export { getHeader } from "./transport/Transport";
export type {
  HttpMethod,
  RequestBody,
  ResponseHeaders,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./transport/Transport";
export { AxiosTransport } from "./transport/AxiosTransport";
export type { AxiosTransportOptions } from "./transport/AxiosTransport";
export { StubTransport } from "./transport/StubTransport";
export type { StubReply, StubHandler } from "./transport/StubTransport";

export { defaultJsonCodec, rawText, json, readBody } from "./codec";
export type {
  Schema,
  JsonCodec,
  BodyReader,
  RawReader,
  JsonReader,
  ResponseReaders,
  PagedReaders,
} from "./codec";

export {
  ClientConfigSchema,
  AxiosTransportConfigSchema,
  normalizeBaseUrl,
  formatBearerToken,
} from "./config";
export type { ClientConfig, ClientConfigInput } from "./config";

export type { Logger } from "./logger";
export { consoleLogger, silentLogger } from "./logger";

export { ConfigurationError, UnsuccessfulResultError } from "./errors";

export { dispatch, dispatchPaged } from "./dispatcher";
export type { DispatchContext } from "./dispatcher";

export { Client } from "./Client";
export type { ClientOptions } from "./Client";
