/** One headline from one feed. Frozen once built. */
export type FeedItem = Readonly<{
  title: string;
  link: string;
  published_at: Date | null;
  source: string; // channel/feed title, else the feed's host
  summary: string | null; // tags stripped, whitespace collapsed
  author: string | null;
}>;

export type FeedFailure = Readonly<{
  url: string;
  kind: "fetch" | "parse";
  message: string; // "Failed to read <url>: <reason>"
}>;

/** Outcome of reading one feed. Never thrown; failures are data. */
export type FeedResult =
  | { ok: true; url: string; items: FeedItem[] }
  | { ok: false; url: string; failure: FeedFailure };

export type Snapshot = Readonly<{
  items: readonly FeedItem[];
  errors: readonly FeedFailure[];
  updatedAt: Date | null; // null until the first usable pass
}>;

export type AggregateResult = {
  snapshot: Snapshot;
  errors: FeedFailure[];
  feedsOk: number;
  feedsFailed: number;
};

/** Wire shape of an item, as served by /api/news and `news-fetch --json`. */
export type FeedItemJson = {
  title: string;
  link: string;
  published_at: string | null; // ISO
  source: string;
  summary: string | null;
  author: string | null;
};

export type NewsResponse = {
  updated_at: string | null;
  items: FeedItemJson[];
  error_count: number;
};
