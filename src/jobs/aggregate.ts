import type {
  AggregateResult,
  FeedFailure,
  FeedItem,
  FeedResult,
  Snapshot,
} from "../types/feed";

export type AggregateOptions = {
  keyword?: string | null;
  limit: number;
  now?: () => Date;
};

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  items: Object.freeze([]),
  errors: Object.freeze([]),
  updatedAt: null,
});

/** Keep the first item per trimmed link; later duplicates are dropped. */
export function dedupeByLink(items: FeedItem[]): FeedItem[] {
  const seen = new Set<string>();
  const out: FeedItem[] = [];
  for (const item of items) {
    const key = item.link.trim();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

/** Case-insensitive substring match on title, summary, author and source. */
export function matchesKeyword(item: FeedItem, keyword: string): boolean {
  const needle = keyword.toLowerCase();
  return [item.title, item.summary, item.author, item.source].some(
    (field) => field !== null && field.toLowerCase().includes(needle)
  );
}

/**
 * Newest first; undated items after every dated one. Array#sort is
 * stable, so ties and undated items keep their incoming order.
 */
export function sortByRecency(items: FeedItem[]): FeedItem[] {
  return [...items].sort((a, b) => {
    if (a.published_at && b.published_at) {
      return b.published_at.getTime() - a.published_at.getTime();
    }
    if (a.published_at) return -1;
    if (b.published_at) return 1;
    return 0;
  });
}

/**
 * Merge the results of one pass into a Snapshot.
 * Failed feeds contribute no items and one entry in `errors`; this never throws.
 */
export function aggregate(
  results: FeedResult[],
  opts: AggregateOptions
): AggregateResult {
  const merged: FeedItem[] = [];
  const errors: FeedFailure[] = [];
  let feedsOk = 0;

  for (const result of results) {
    if (result.ok) {
      feedsOk++;
      merged.push(...result.items);
    } else {
      errors.push(result.failure);
    }
  }

  let items = dedupeByLink(merged);
  const keyword = opts.keyword?.trim();
  if (keyword) items = items.filter((item) => matchesKeyword(item, keyword));
  items = sortByRecency(items).slice(0, Math.max(opts.limit, 0));

  const snapshot: Snapshot = Object.freeze({
    items: Object.freeze(items),
    errors: Object.freeze([...errors]),
    updatedAt: (opts.now ?? (() => new Date()))(),
  });
  return { snapshot, errors, feedsOk, feedsFailed: errors.length };
}
