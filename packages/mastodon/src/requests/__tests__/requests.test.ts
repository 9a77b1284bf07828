/**
 * Unit tests for the bookmark, app, email and OAuth request groups.
 */

import { createPageCursor, getPageSuccessOrNull } from "@fedikit/core";
import { Scope } from "../../constants/scope";
import { GrantType } from "../../models/oauth";
import {
  BASE_URL,
  createClient,
  formEntries,
  lastForm,
  rawStatus,
} from "../../__tests__/fixtures";

describe("BookmarkRequests", () => {
  it("should list bookmarks and expose the next cursor", async () => {
    const { client, transport } = createClient();
    transport.reply({
      status: 200,
      headers: { link: `<${BASE_URL}/api/v1/bookmarks?max_id=42>; rel="next"` },
      body: JSON.stringify([rawStatus({ id: "7", bookmarked: true })]),
    });

    const result = await client.bookmarks.list();

    expect(transport.lastRequest?.url).toBe(`${BASE_URL}/api/v1/bookmarks?limit=20`);
    const page = getPageSuccessOrNull(result);
    expect(page?.items[0]?.bookmarked).toBe(true);
    expect(page?.nextPage).toEqual({ since: null, min: null, max: "42" });
    expect(page?.previousPage).toBeNull();
  });

  it("should restart from a cursor", async () => {
    const { client, transport } = createClient();
    transport.reply({ status: 200, body: "[]" });

    await client.bookmarks.list({ page: createPageCursor({ max: "42" }), limit: 5 });

    expect(transport.lastRequest?.url).toBe(`${BASE_URL}/api/v1/bookmarks?max_id=42&limit=5`);
  });

  it("should return Failure when a page item is malformed", async () => {
    const { client, transport } = createClient();
    transport.reply({ status: 200, body: '[{"id":"7"}]' });

    const result = await client.bookmarks.list();

    expect(result.kind).toBe("failure");
    if (result.kind === "failure") {
      expect(result.rawBody).toBe('[{"id":"7"}]');
    }
  });
});

describe("AppRequests", () => {
  it("should register an application with the default scope", async () => {
    const { client, transport } = createClient(null);
    transport.reply({
      status: 200,
      body: JSON.stringify({
        name: "fedikit",
        client_id: "test-client-id",
        client_secret: "test-client-secret",
        redirect_uri: "urn:ietf:wg:oauth:2.0:oob",
      }),
    });

    const result = await client.apps.create({
      clientName: "fedikit",
      redirectUris: "urn:ietf:wg:oauth:2.0:oob",
    });

    expect(transport.lastRequest?.url).toBe(`${BASE_URL}/api/v1/apps`);
    expect(formEntries(lastForm(transport))).toEqual([
      ["client_name", "fedikit"],
      ["redirect_uris", "urn:ietf:wg:oauth:2.0:oob"],
      ["scopes", "read"],
    ]);
    expect(result).toEqual({
      kind: "success",
      data: {
        name: "fedikit",
        website: null,
        vapidKey: null,
        clientId: "test-client-id",
        clientSecret: "test-client-secret",
        redirectUri: "urn:ietf:wg:oauth:2.0:oob",
      },
    });
  });

  it("should join several scopes with spaces and send the website", async () => {
    const { client, transport } = createClient(null);
    transport.reply({ status: 200, body: '{"name":"fedikit"}' });

    await client.apps.create({
      clientName: "fedikit",
      redirectUris: "https://app.example/callback",
      scopes: [Scope.Read.ALL, Scope.Write.STATUSES, Scope.PUSH],
      website: "https://app.example",
    });

    const form = lastForm(transport);
    expect(form.get("scopes")).toBe("read write:statuses push");
    expect(form.get("website")).toBe("https://app.example");
  });

  it("should verify app credentials", async () => {
    const { client, transport } = createClient();
    transport.reply({ status: 200, body: '{"name":"fedikit","website":"https://app.example"}' });

    const result = await client.apps.verifyCredentials();

    expect(transport.lastRequest?.method).toBe("GET");
    expect(transport.lastRequest?.url).toBe(`${BASE_URL}/api/v1/apps/verify_credentials`);
    expect(result.kind === "success" && result.data.website).toBe("https://app.example");
  });
});

describe("EmailRequests", () => {
  it("should resend the confirmation and keep the raw body", async () => {
    const { client, transport } = createClient();
    transport.reply({ status: 200, body: "{}" });

    const result = await client.emails.resendConfirmation();

    expect(transport.lastRequest?.method).toBe("POST");
    expect(transport.lastRequest?.url).toBe(`${BASE_URL}/api/v1/emails/confirmations`);
    expect(transport.lastRequest?.body).toBeUndefined();
    expect(result).toEqual({ kind: "success", data: "{}" });
  });

  it("should send a new address when given", async () => {
    const { client, transport } = createClient();
    transport.reply({ status: 200, body: "{}" });

    await client.emails.resendConfirmation("new@example.com");

    expect(formEntries(lastForm(transport))).toEqual([["email", "new@example.com"]]);
  });

  it("should decode the error of a rejected request", async () => {
    const { client, transport } = createClient();
    transport.reply({ status: 403, body: '{"error":"This method requires an authenticated user"}' });

    const result = await client.emails.resendConfirmation();

    expect(result).toEqual({
      kind: "error",
      error: { error: "This method requires an authenticated user", errorDescription: null },
    });
  });
});

describe("OauthRequests", () => {
  it("should exchange an authorization code for a token", async () => {
    const { client, transport } = createClient(null);
    transport.reply({
      status: 200,
      body: '{"access_token":"test-access-token","token_type":"Bearer","scope":"read write","created_at":1700000000}',
    });

    const result = await client.oauth.getToken({
      grantType: GrantType.CODE,
      code: "test-code",
      clientId: "test-client-id",
      clientSecret: "test-client-secret",
      redirectUri: "urn:ietf:wg:oauth:2.0:oob",
      scopes: ["read", "write"],
    });

    expect(transport.lastRequest?.url).toBe(`${BASE_URL}/oauth/token`);
    expect(formEntries(lastForm(transport))).toEqual([
      ["grant_type", "authorization_code"],
      ["code", "test-code"],
      ["client_id", "test-client-id"],
      ["client_secret", "test-client-secret"],
      ["redirect_uri", "urn:ietf:wg:oauth:2.0:oob"],
      ["scope", "read write"],
    ]);
    expect(result).toEqual({
      kind: "success",
      data: {
        accessToken: "test-access-token",
        tokenType: "Bearer",
        scope: "read write",
        createdAt: 1700000000,
      },
    });
  });

  it("should request an app token without a code", async () => {
    const { client, transport } = createClient(null);
    transport.reply({ status: 200, body: '{"access_token":"test-access-token"}' });

    await client.oauth.getToken({
      grantType: GrantType.APP,
      clientId: "test-client-id",
      clientSecret: "test-client-secret",
      redirectUri: "urn:ietf:wg:oauth:2.0:oob",
    });

    const form = lastForm(transport);
    expect(form.get("grant_type")).toBe("client_credentials");
    expect(form.has("code")).toBe(false);
    expect(form.get("scope")).toBe("read");
  });

  it("should decode OAuth error descriptions", async () => {
    const { client, transport } = createClient(null);
    transport.reply({
      status: 400,
      body: '{"error":"invalid_grant","error_description":"The provided authorization grant is invalid"}',
    });

    const result = await client.oauth.getToken({
      grantType: GrantType.CODE,
      code: "expired-code",
      clientId: "test-client-id",
      clientSecret: "test-client-secret",
      redirectUri: "urn:ietf:wg:oauth:2.0:oob",
    });

    expect(result).toEqual({
      kind: "error",
      error: {
        error: "invalid_grant",
        errorDescription: "The provided authorization grant is invalid",
      },
    });
  });

  it("should revoke a token and keep the raw body", async () => {
    const { client, transport } = createClient(null);
    transport.reply({ status: 200, body: "{}" });

    const result = await client.oauth.revokeToken({
      clientId: "test-client-id",
      clientSecret: "test-client-secret",
      token: "test-access-token",
    });

    expect(transport.lastRequest?.url).toBe(`${BASE_URL}/oauth/revoke`);
    expect(formEntries(lastForm(transport))).toEqual([
      ["client_id", "test-client-id"],
      ["client_secret", "test-client-secret"],
      ["token", "test-access-token"],
    ]);
    expect(result).toEqual({ kind: "success", data: "{}" });
  });
});
