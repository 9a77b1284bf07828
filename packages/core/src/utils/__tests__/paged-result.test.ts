import { UnsuccessfulResultError } from "../../errors";
import { createPageCursor } from "../../paging/page-cursor";
import type { PagedResult } from "../../types/result";
import {
  pageSuccess,
  matchPage,
  foldPage,
  ifPageSuccessful,
  getPageOrNull,
  getPageOrThrow,
  getPageSuccessOrNull,
} from "../paged-result";
import { empty, failure, serverError } from "../result";

const next = createPageCursor({ max: "100" });
const previous = createPageCursor({ min: "200" });

function page(): PagedResult<string, string> {
  return pageSuccess(["a", "b"], next, previous);
}

describe("paged-result", () => {
  describe("pageSuccess", () => {
    it("should carry items and both cursors", () => {
      expect(page()).toEqual({
        kind: "success",
        items: ["a", "b"],
        nextPage: { since: null, min: null, max: "100" },
        previousPage: { since: null, min: "200", max: null },
      });
    });
  });

  describe("matchPage", () => {
    it("should hand the whole page to the success handler", () => {
      const cursor = matchPage(page(), {
        success: (p) => p.nextPage?.max ?? null,
        empty: () => null,
        error: () => null,
        failure: () => null,
      });
      expect(cursor).toBe("100");
    });

    it("should dispatch errors and failures", () => {
      const handlers = {
        success: () => "success",
        empty: () => "empty",
        error: (e: string | null) => `error:${e}`,
        failure: (cause: Error, raw: string | null) => `failure:${cause.message}:${raw}`,
      };

      expect(matchPage(serverError("nope"), handlers)).toBe("error:nope");
      expect(matchPage(failure(new Error("eof"), "[1,"), handlers)).toBe(
        "failure:eof:[1,",
      );
      expect(matchPage(empty(), handlers)).toBe("empty");
    });
  });

  describe("foldPage", () => {
    it("should hand only the items to the success callback", () => {
      const onItems = jest.fn();
      foldPage(page(), { success: onItems });
      expect(onItems).toHaveBeenCalledWith(["a", "b"]);
    });

    it("should ignore variants without a callback", () => {
      const onItems = jest.fn();
      foldPage(empty(), { success: onItems });
      expect(onItems).not.toHaveBeenCalled();
    });
  });

  describe("ifPageSuccessful", () => {
    it("should run only for fetched pages", () => {
      const block = jest.fn();
      ifPageSuccessful(page(), block);
      ifPageSuccessful(serverError<string>(null), block);
      expect(block).toHaveBeenCalledTimes(1);
    });
  });

  describe("accessors", () => {
    it("should return items or null", () => {
      expect(getPageOrNull(page())).toEqual(["a", "b"]);
      expect(getPageOrNull(empty())).toBeNull();
    });

    it("should return the page with its cursors or null", () => {
      expect(getPageSuccessOrNull(page())?.previousPage).toEqual(previous);
      expect(getPageSuccessOrNull(failure(new Error("x"), null))).toBeNull();
    });

    it("should throw for pages that were not fetched", () => {
      expect(getPageOrThrow(page())).toEqual(["a", "b"]);
      expect(() => getPageOrThrow(empty())).toThrow(UnsuccessfulResultError);
      expect(() => getPageOrThrow(serverError("denied"))).toThrow(
        "Server returned an error response",
      );
    });
  });
});
