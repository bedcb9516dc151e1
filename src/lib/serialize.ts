import type { FeedItem, FeedItemJson, NewsResponse, Snapshot } from "../types/feed";
import { formatIso } from "./dates";

export function toItemJson(item: FeedItem): FeedItemJson {
  return {
    title: item.title,
    link: item.link,
    published_at: formatIso(item.published_at),
    source: item.source,
    summary: item.summary,
    author: item.author,
  };
}

/** Body of GET /api/news. Failure details stay server-side; only a count goes out. */
export function toNewsResponse(snapshot: Snapshot): NewsResponse {
  return {
    updated_at: formatIso(snapshot.updatedAt),
    items: snapshot.items.map(toItemJson),
    error_count: snapshot.errors.length,
  };
}
