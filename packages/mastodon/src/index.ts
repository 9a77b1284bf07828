export { MastodonClient } from "./client/MastodonClient";
export type { MastodonClientOptions } from "./client/MastodonClient";
export { mastodon, mastodonRaw, mastodonPage } from "./client/responses";
export type {
  MastodonResult,
  PagedMastodonResult,
  EmptyResult,
} from "./client/responses";

export { Routes } from "./constants/routes";
export type { AccountRoutes } from "./constants/routes";
export { Scope, joinScopes } from "./constants/scope";

export * from "./models";

export { AccountRequests } from "./requests/AccountRequests";
export type {
  RegisterAccountParams,
  UpdateCredentialsParams,
  PageParams,
  AccountStatusesParams,
  FollowParams,
  MuteParams,
  AccountSearchParams,
} from "./requests/AccountRequests";
export { BookmarkRequests } from "./requests/BookmarkRequests";
export { AppRequests } from "./requests/AppRequests";
export type { CreateApplicationParams } from "./requests/AppRequests";
export { EmailRequests } from "./requests/EmailRequests";
export { OauthRequests } from "./requests/OauthRequests";
export type {
  TokenRequest,
  AuthorizationCodeTokenRequest,
  ClientCredentialsTokenRequest,
  RevokeTokenParams,
} from "./requests/OauthRequests";

export { appendFieldsHash } from "./utils/form";
