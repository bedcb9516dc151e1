import { readFile } from "fs/promises";
import { DEFAULT_FEEDS, NEWS } from "../jobs/config";
import { ConfigError, errorMessage } from "./errors";
import { logger } from "./logger";

const log = logger.child({ module: "feeds" });

export type FeedSources = {
  urls: string[];
  origin: "args" | "file" | "builtin";
  path?: string;
};

/** Feed URLs from a list file: blank lines, # comments and repeats skipped. */
export function parseFeedsList(text: string): string[] {
  const feeds: string[] = [];
  const seen = new Set<string>();
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    if (seen.has(line)) continue;
    seen.add(line);
    feeds.push(line);
  }
  return feeds;
}

/** [] when the file does not exist. Other read errors are ConfigError. */
export async function loadFeedsFile(path: string): Promise<string[]> {
  try {
    return parseFeedsList(await readFile(path, "utf8"));
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw new ConfigError(`cannot read feeds file ${path}: ${errorMessage(e)}`);
  }
}

/**
 * URL arguments, else the feeds file (--feeds-file or ./feeds.txt),
 * else the built-in list.
 */
export async function resolveFeedSources(
  urls: string[],
  feedsFile: string | null
): Promise<FeedSources> {
  if (urls.length > 0) {
    log.info(`Using ${urls.length} feed URLs from CLI arguments.`);
    return { urls, origin: "args" };
  }

  const path = feedsFile ?? NEWS.feedsFile;
  const fromFile = await loadFeedsFile(path);
  if (fromFile.length > 0) {
    log.info(`Loaded ${fromFile.length} feeds from ${path}.`);
    return { urls: fromFile, origin: "file", path };
  }

  if (feedsFile) log.warn(`Feeds file ${path} is missing or empty.`);
  log.info("No feed URLs supplied and no feeds file found. Using built-in feeds.");
  return { urls: [...DEFAULT_FEEDS], origin: "builtin" };
}
