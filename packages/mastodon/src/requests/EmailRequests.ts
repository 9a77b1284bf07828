import type { MastodonClient } from "../client/MastodonClient";
import { mastodonRaw, type EmptyResult } from "../client/responses";
import { Routes } from "../constants/routes";

export class EmailRequests {
  constructor(private readonly client: MastodonClient) {}

  /**
   * Resends the confirmation email of an unconfirmed user, optionally to a new
   * address. Succeeds with the raw body `"{}"`.
   */
  resendConfirmation(email?: string): Promise<EmptyResult> {
    return this.client.post(Routes.V1.Emails.CONFIRMATIONS, mastodonRaw, (request) => {
      if (email !== undefined) request.setFormField("email", email);
    });
  }
}
