import { parseArgs } from "util";
import cron from "node-cron";
import { z } from "zod";
import { NEWS } from "../jobs/config";
import type { RefreshTrigger } from "../schedule";
import { ConfigError } from "./errors";
import { ENV, type Env } from "./env";

export type FetchCliOptions = {
  urls: string[];
  limit: number;
  json: boolean;
  keyword: string | null;
  verifySsl: boolean;
  timeoutMs: number;
  concurrency: number;
};

export type SignageOptions = {
  urls: string[]; // explicit URL arguments; may be empty
  feedsFile: string | null;
  limit: number;
  keyword: string | null;
  verifySsl: boolean;
  timeoutMs: number;
  concurrency: number;
  trigger: RefreshTrigger;
  port: number;
  bind: string;
};

export type Parsed<T> = { help: true } | ({ help: false } & T);

function isHttpUrl(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const feedUrl = z.string().trim().refine(isHttpUrl);

const positiveInt = z.coerce
  .number({ invalid_type_error: "must be a number" })
  .int("must be a whole number")
  .positive("must be positive");

const positiveSeconds = z.coerce
  .number({ invalid_type_error: "must be a number" })
  .positive("must be positive");

const port = z.coerce
  .number({ invalid_type_error: "must be a number" })
  .int("must be a whole number")
  .min(0, "must be between 0 and 65535")
  .max(65535, "must be between 0 and 65535");

function check<T>(schema: z.ZodType<T>, label: string, value: unknown): T {
  const res = schema.safeParse(value);
  if (res.success) return res.data;
  throw new ConfigError(`${label} ${res.error.issues[0]?.message ?? "is invalid"}`);
}

/** Validate feed URL arguments; anything but absolute http(s) is a ConfigError. */
export function checkFeedUrls(urls: string[]): string[] {
  return urls.map((raw) => {
    const res = feedUrl.safeParse(raw);
    if (!res.success) throw new ConfigError(`not a valid http(s) feed URL: ${raw}`);
    return res.data;
  });
}

function keywordOf(raw: string | undefined): string | null {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : null;
}

function parse<R>(run: () => R): R {
  try {
    return run();
  } catch (e) {
    // ERR_PARSE_ARGS_UNKNOWN_OPTION and friends
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }
}

function timeoutMs(flag: string | undefined, env: Env): number {
  const seconds = check(
    positiveSeconds,
    "--timeout",
    flag ?? (env.FEED_TIMEOUT_SECONDS || NEWS.timeoutSeconds)
  );
  return Math.round(seconds * 1000);
}

function concurrency(env: Env): number {
  return check(
    positiveInt,
    "FEED_CONCURRENCY",
    env.FEED_CONCURRENCY || NEWS.concurrency
  );
}

export const FETCH_USAGE = `Usage: news-fetch [options] <feed-url...>

Fetch RSS/Atom feeds and print the newest items.

Options:
  --limit N          max items to print (default ${NEWS.fetchLimit})
  --keyword STR      keep items mentioning STR (case-insensitive)
  --json             print JSON instead of text
  --timeout SECONDS  per-feed HTTP timeout (default ${NEWS.timeoutSeconds})
  --insecure         skip TLS certificate verification
  -h, --help         show this help`;

export const SIGNAGE_USAGE = `Usage: news-wall [options] [feed-url...]

Serve an auto-refreshing news wall on / and JSON on /api/news.

Options:
  --refresh-seconds N  seconds between refreshes (default ${NEWS.refreshSeconds}, min ${NEWS.minRefreshSeconds})
  --refresh-cron EXPR  refresh on a cron schedule instead
  --port N             HTTP port (default ${NEWS.port})
  --bind ADDR          bind address (default ${NEWS.bind})
  --limit N            max items kept (default ${NEWS.signageLimit})
  --keyword STR        keep items mentioning STR (case-insensitive)
  --feeds-file PATH    feed list, one URL per line (default ${NEWS.feedsFile})
  --timeout SECONDS    per-feed HTTP timeout (default ${NEWS.timeoutSeconds})
  --insecure           skip TLS certificate verification
  -h, --help           show this help`;

/** news-fetch arguments. Throws ConfigError. */
export function parseFetchArgs(
  argv: string[],
  env: Env = ENV
): Parsed<FetchCliOptions> {
  const { values, positionals } = parse(() =>
    parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        limit: { type: "string" },
        keyword: { type: "string" },
        json: { type: "boolean" },
        timeout: { type: "string" },
        insecure: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    })
  );
  if (values.help) return { help: true };
  if (positionals.length === 0) {
    throw new ConfigError("at least one feed URL is required");
  }

  return {
    help: false,
    urls: checkFeedUrls(positionals),
    limit: check(positiveInt, "--limit", values.limit ?? NEWS.fetchLimit),
    json: values.json ?? false,
    keyword: keywordOf(values.keyword),
    verifySsl: !values.insecure,
    timeoutMs: timeoutMs(values.timeout, env),
    concurrency: concurrency(env),
  };
}

function refreshTrigger(
  seconds: string | undefined,
  expression: string | undefined,
  env: Env
): RefreshTrigger {
  const cronExpr = (expression ?? (seconds === undefined ? env.REFRESH_CRON : "")).trim();
  if (cronExpr) {
    if (!cron.validate(cronExpr)) {
      throw new ConfigError(`--refresh-cron is not a valid cron expression: ${cronExpr}`);
    }
    return { kind: "cron", expression: cronExpr };
  }
  const value = check(
    positiveSeconds,
    "--refresh-seconds",
    seconds ?? (env.REFRESH_SECONDS || NEWS.refreshSeconds)
  );
  return { kind: "interval", seconds: Math.max(value, NEWS.minRefreshSeconds) };
}

/** news-wall arguments. Throws ConfigError. */
export function parseSignageArgs(
  argv: string[],
  env: Env = ENV
): Parsed<SignageOptions> {
  const { values, positionals } = parse(() =>
    parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        "refresh-seconds": { type: "string" },
        "refresh-cron": { type: "string" },
        port: { type: "string" },
        bind: { type: "string" },
        limit: { type: "string" },
        keyword: { type: "string" },
        "feeds-file": { type: "string" },
        timeout: { type: "string" },
        insecure: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    })
  );
  if (values.help) return { help: true };

  return {
    help: false,
    urls: checkFeedUrls(positionals),
    feedsFile: values["feeds-file"]?.trim() || null,
    limit: check(positiveInt, "--limit", values.limit ?? NEWS.signageLimit),
    keyword: keywordOf(values.keyword),
    verifySsl: !values.insecure,
    timeoutMs: timeoutMs(values.timeout, env),
    concurrency: concurrency(env),
    trigger: refreshTrigger(values["refresh-seconds"], values["refresh-cron"], env),
    port: check(port, "--port", values.port ?? (env.PORT || NEWS.port)),
    bind: values.bind?.trim() || env.HOST || NEWS.bind,
  };
}
