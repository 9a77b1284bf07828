import type { MastodonClient } from "../client/MastodonClient";
import {
  mastodon,
  mastodonRaw,
  type EmptyResult,
  type MastodonResult,
} from "../client/responses";
import { Routes } from "../constants/routes";
import { joinScopes, Scope } from "../constants/scope";
import { GrantType, TokenSchema, type Token } from "../models/oauth";

interface TokenRequestBase {
  clientId: string;
  clientSecret: string;
  /** Must match a redirect URI declared when the app was registered. */
  redirectUri: string;
  /**
   * With a code, the scopes requested from the user; otherwise a subset of the
   * app's scopes. Defaults to `read`.
   */
  scopes?: readonly string[];
}

export interface AuthorizationCodeTokenRequest extends TokenRequestBase {
  grantType: typeof GrantType.CODE;
  /** Code obtained from `/oauth/authorize`. */
  code: string;
}

export interface ClientCredentialsTokenRequest extends TokenRequestBase {
  grantType: typeof GrantType.APP;
}

export type TokenRequest = AuthorizationCodeTokenRequest | ClientCredentialsTokenRequest;

export interface RevokeTokenParams {
  clientId: string;
  clientSecret: string;
  token: string;
}

/**
 * Generate and manage OAuth tokens.
 */
export class OauthRequests {
  constructor(private readonly client: MastodonClient) {}

  /**
   * Obtains an access token: user-level with an authorization code, app-level
   * with client credentials.
   */
  getToken(params: TokenRequest): Promise<MastodonResult<Token>> {
    return this.client.post(Routes.OAuth.TOKEN, mastodon(TokenSchema), (request) => {
      request.setForm((form) => {
        form.append("grant_type", params.grantType);
        if (params.grantType === GrantType.CODE) form.append("code", params.code);
        form
          .append("client_id", params.clientId)
          .append("client_secret", params.clientSecret)
          .append("redirect_uri", params.redirectUri)
          .append("scope", joinScopes(params.scopes ?? [Scope.Read.ALL]));
      });
    });
  }

  /**
   * Revokes a token. Succeeds with the raw body `"{}"`.
   */
  revokeToken(params: RevokeTokenParams): Promise<EmptyResult> {
    return this.client.post(Routes.OAuth.REVOKE, mastodonRaw, (request) => {
      request.setForm((form) => {
        form
          .append("client_id", params.clientId)
          .append("client_secret", params.clientSecret)
          .append("token", params.token);
      });
    });
  }
}
