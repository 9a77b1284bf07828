import { defaultJsonCodec } from "../../codec";
import { RequestBuilder } from "../../request/RequestBuilder";
import {
  applyPageCursor,
  createPageCursor,
  isSamePageCursor,
  pageCursorFromParams,
} from "../page-cursor";

describe("page-cursor", () => {
  describe("createPageCursor", () => {
    it("should default missing fields to null", () => {
      expect(createPageCursor({ max: "9" })).toEqual({
        since: null,
        min: null,
        max: "9",
      });
    });

    it("should freeze the cursor", () => {
      expect(Object.isFrozen(createPageCursor())).toBe(true);
    });
  });

  describe("pageCursorFromParams", () => {
    it("should read all three paging parameters", () => {
      const params = new URLSearchParams("since_id=1&min_id=2&max_id=3&limit=40");
      expect(pageCursorFromParams(params)).toEqual({
        since: "1",
        min: "2",
        max: "3",
      });
    });
  });

  describe("applyPageCursor", () => {
    function urlFor(cursor: Parameters<typeof applyPageCursor>[1]): string {
      const request = new RequestBuilder(defaultJsonCodec);
      applyPageCursor(request, cursor);
      return request.build("GET", "https://mastodon.example/api/v1/bookmarks", {}).url;
    }

    it("should send the set fields as query parameters", () => {
      expect(urlFor(createPageCursor({ max: "100", since: "5" }))).toBe(
        "https://mastodon.example/api/v1/bookmarks?max_id=100&since_id=5",
      );
    });

    it("should add nothing for a missing cursor", () => {
      expect(urlFor(null)).toBe("https://mastodon.example/api/v1/bookmarks");
      expect(urlFor(undefined)).toBe("https://mastodon.example/api/v1/bookmarks");
    });

    it("should round-trip a cursor through a query string", () => {
      const cursor = createPageCursor({ min: "77" });
      const url = new URL(urlFor(cursor));
      expect(pageCursorFromParams(url.searchParams)).toEqual(cursor);
    });
  });

  describe("isSamePageCursor", () => {
    it("should compare field by field", () => {
      expect(isSamePageCursor(createPageCursor({ max: "1" }), createPageCursor({ max: "1" }))).toBe(true);
      expect(isSamePageCursor(createPageCursor({ max: "1" }), createPageCursor({ min: "1" }))).toBe(false);
    });

    it("should treat null as equal only to null", () => {
      expect(isSamePageCursor(null, null)).toBe(true);
      expect(isSamePageCursor(null, createPageCursor())).toBe(false);
    });
  });
});
