import { applyPageCursor } from "@fedikit/core";
import type { MastodonClient } from "../client/MastodonClient";
import { mastodonPage, type PagedMastodonResult } from "../client/responses";
import { Routes } from "../constants/routes";
import { StatusSchema, type Status } from "../models/status";
import type { PageParams } from "./AccountRequests";

export class BookmarkRequests {
  constructor(private readonly client: MastodonClient) {}

  /**
   * Statuses the user has bookmarked. Scope `read:bookmarks`.
   */
  list(params: PageParams = {}): Promise<PagedMastodonResult<Status>> {
    return this.client.paged(Routes.V1.BOOKMARKS, mastodonPage(StatusSchema), (request) => {
      applyPageCursor(request, params.page).parameter("limit", params.limit ?? 20);
    });
  }
}
