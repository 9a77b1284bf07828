import { LinkPageExtractor, StubTransport, type PageExtractor } from "@fedikit/core";
import { MastodonClient } from "../MastodonClient";

describe("MastodonClient", () => {
  it("should read cursors from the Link header by default", () => {
    const client = new MastodonClient({ baseUrl: "mastodon.example" });
    expect(client.pageExtractor).toBeInstanceOf(LinkPageExtractor);
  });

  it("should accept a custom page extractor", async () => {
    const pageExtractor: PageExtractor = {
      getPageInfo: () => ({ next: { since: null, min: null, max: "custom" }, previous: null }),
    };
    const transport = new StubTransport().reply({ status: 200, body: "[]" });
    const client = new MastodonClient({ baseUrl: "mastodon.example", transport, pageExtractor });

    const result = await client.bookmarks.list();

    expect(result).toEqual({
      kind: "success",
      items: [],
      nextPage: { since: null, min: null, max: "custom" },
      previousPage: null,
    });
  });

  it("should keep a token that already carries the scheme", () => {
    const client = new MastodonClient({ baseUrl: "mastodon.example", token: "Bearer test-token" });
    expect(client.token).toBe("Bearer test-token");
  });

  it("should route all request groups through the same settings", async () => {
    const transport = new StubTransport((request) =>
      request.url.endsWith("/confirmations") ? { status: 200, body: "{}" } : { status: 204 },
    );
    const client = new MastodonClient({ baseUrl: "mastodon.example", transport });
    client.setToken("test-token");

    const [email, unblock] = await Promise.all([
      client.emails.resendConfirmation(),
      client.accounts.unblock("2"),
    ]);

    expect(email).toEqual({ kind: "success", data: "{}" });
    expect(unblock).toEqual({ kind: "empty" });
    expect(transport.requests.map((r) => r.headers["Authorization"])).toEqual([
      "Bearer test-token",
      "Bearer test-token",
    ]);
  });
});
