/**
 * Builders for API payloads shared by the Mastodon tests.
 */

import { StubTransport } from "@fedikit/core";
import { MastodonClient } from "../client/MastodonClient";

export const BASE_URL = "https://mastodon.example";

/**
 * A minimal account as the server would send it.
 */
export function rawAccount(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "1",
    username: "alice",
    acct: "alice",
    display_name: "Alice",
    created_at: "2024-01-01T00:00:00.000Z",
    followers_count: 3,
    following_count: 4,
    statuses_count: 5,
    ...overrides,
  };
}

export function rawStatus(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "100",
    uri: "https://mastodon.example/users/alice/statuses/100",
    created_at: "2024-02-01T12:00:00.000Z",
    account: rawAccount(),
    content: "<p>hello</p>",
    visibility: "public",
    ...overrides,
  };
}

export function rawRelationship(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { id: "2", following: true, ...overrides };
}

/**
 * A client backed by a fresh StubTransport.
 */
export function createClient(token: string | null = "test-token") {
  const transport = new StubTransport();
  const client = new MastodonClient({ baseUrl: "mastodon.example", token, transport });
  return { client, transport };
}

/**
 * The multipart body of the last request, or an error if it had none.
 */
export function lastForm(transport: StubTransport): FormData {
  const body = transport.lastRequest?.body;
  if (!(body instanceof FormData)) {
    throw new Error("Last request did not carry a form body");
  }
  return body;
}

/**
 * Text entries of a form, in order.
 */
export function formEntries(form: FormData): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const [key, value] of form.entries()) {
    if (typeof value === "string") entries.push([key, value]);
  }
  return entries;
}
