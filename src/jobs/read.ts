import pLimit from "p-limit";
import type { FeedFailure, FeedResult } from "../types/feed";
import { FeedFetchError, FeedParseError, errorMessage } from "../lib/errors";
import { logger } from "../lib/logger";
import { NEWS } from "./config";
import { fetchFeed, type FetchOptions } from "./fetch";
import { parseFeed } from "./parse";

const log = logger.child({ module: "read" });

/** Swappable download step; tests hand in canned documents. */
export type Fetcher = (url: string, opts: FetchOptions) => Promise<string>;

export type ReadOptions = FetchOptions & {
  concurrency?: number;
  fetcher?: Fetcher;
};

export function failureFor(url: string, e: unknown): FeedFailure {
  return Object.freeze({
    url,
    kind: e instanceof FeedParseError ? "parse" : "fetch",
    message: `Failed to read ${url}: ${errorMessage(e)}`,
  });
}

/** Fetch and parse one feed. Never rejects; failures come back as data. */
export async function readFeed(
  url: string,
  opts: ReadOptions
): Promise<FeedResult> {
  const fetcher = opts.fetcher ?? fetchFeed;
  const started = Date.now();
  try {
    const xml = await fetcher(url, opts);
    const items = parseFeed(xml, url);
    log.debug({ url, items: items.length, ms: Date.now() - started }, "feed ok");
    return { ok: true, url, items };
  } catch (e) {
    const failure = failureFor(url, e);
    if (!(e instanceof FeedFetchError || e instanceof FeedParseError)) {
      log.error({ url, err: e }, "unexpected error reading feed");
    } else {
      log.warn({ url, kind: failure.kind }, failure.message);
    }
    return { ok: false, url, failure };
  }
}

/** Read every feed of one pass with bounded parallelism; results keep URL order. */
export async function collectFeeds(
  urls: string[],
  opts: ReadOptions
): Promise<FeedResult[]> {
  const limit = pLimit(opts.concurrency ?? NEWS.concurrency);
  return Promise.all(urls.map((url) => limit(() => readFeed(url, opts))));
}
