import type { MastodonClient } from "../client/MastodonClient";
import { mastodon, type MastodonResult } from "../client/responses";
import { Routes } from "../constants/routes";
import { joinScopes, Scope } from "../constants/scope";
import { ApplicationSchema, type Application } from "../models/oauth";

export interface CreateApplicationParams {
  clientName: string;
  /**
   * Where users are sent after authorizing. `urn:ietf:wg:oauth:2.0:oob` shows
   * the code to the user instead.
   */
  redirectUris: string;
  /** Defaults to `read`. */
  scopes?: readonly string[];
  website?: string;
}

/**
 * Register client applications that can be used to obtain OAuth tokens.
 */
export class AppRequests {
  constructor(private readonly client: MastodonClient) {}

  create(params: CreateApplicationParams): Promise<MastodonResult<Application>> {
    return this.client.post(Routes.V1.Apps.ROOT, mastodon(ApplicationSchema), (request) => {
      request.setForm((form) => {
        form
          .append("client_name", params.clientName)
          .append("redirect_uris", params.redirectUris)
          .append("scopes", joinScopes(params.scopes ?? [Scope.Read.ALL]));
        if (params.website !== undefined) form.append("website", params.website);
      });
    });
  }

  /**
   * Confirms the app's credentials work. The returned application carries no
   * client id or secret.
   */
  verifyCredentials(): Promise<MastodonResult<Application>> {
    return this.client.get(Routes.V1.Apps.VERIFY_CREDENTIALS, mastodon(ApplicationSchema));
  }
}
