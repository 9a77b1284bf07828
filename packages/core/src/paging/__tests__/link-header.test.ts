/**
 * Unit tests for Link header parsing.
 */

import { parseLinkEntry, parseLinkHeader } from "../link-header";

describe("link-header", () => {
  describe("parseLinkEntry", () => {
    it("should parse a next entry", () => {
      expect(
        parseLinkEntry('<https://mastodon.example/api/v1/bookmarks?max_id=42>; rel="next"'),
      ).toEqual({
        url: "https://mastodon.example/api/v1/bookmarks?max_id=42",
        rel: "next",
      });
    });

    it("should parse a prev entry", () => {
      expect(parseLinkEntry('<https://x.example/a?min_id=7>; rel="prev"')).toEqual({
        url: "https://x.example/a?min_id=7",
        rel: "prev",
      });
    });

    it("should reject relations other than next and prev", () => {
      expect(parseLinkEntry('<https://x.example/a>; rel="last"')).toBeNull();
    });

    it("should reject entries without angle brackets", () => {
      expect(parseLinkEntry('https://x.example/a; rel="next"')).toBeNull();
    });

    it("should reject unquoted relations", () => {
      expect(parseLinkEntry("<https://x.example/a>; rel=next")).toBeNull();
    });

    it("should reject an empty string", () => {
      expect(parseLinkEntry("")).toBeNull();
    });
  });

  describe("parseLinkHeader", () => {
    it("should return entries in header order", () => {
      const header =
        '<https://x.example/a?max_id=1>; rel="next", <https://x.example/a?min_id=9>; rel="prev"';

      expect(parseLinkHeader(header)).toEqual([
        { url: "https://x.example/a?max_id=1", rel: "next" },
        { url: "https://x.example/a?min_id=9", rel: "prev" },
      ]);
    });

    it("should drop unrecognized entries", () => {
      const header =
        '<https://x.example/a?page=3>; rel="last", <https://x.example/a?max_id=1>; rel="next"';

      expect(parseLinkHeader(header)).toEqual([
        { url: "https://x.example/a?max_id=1", rel: "next" },
      ]);
    });

    it("should return no entries for garbage", () => {
      expect(parseLinkHeader("not a link header")).toEqual([]);
    });
  });
});
