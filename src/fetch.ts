import { aggregate } from "./jobs/aggregate";
import { collectFeeds, type Fetcher } from "./jobs/read";
import { ConfigError } from "./lib/errors";
import { FETCH_USAGE, parseFetchArgs } from "./lib/options";
import { formatJson, formatText } from "./lib/report";

/** Where the CLI writes; one call per line. */
export type Io = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const processIo: Io = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/**
 * news-fetch: read the given feeds once and print the newest items.
 * Resolves to the exit code: 0 (even with nothing to show), 2 on bad input.
 */
export async function runFetch(
  argv: string[],
  io: Io = processIo,
  fetcher?: Fetcher
): Promise<number> {
  let opts: ReturnType<typeof parseFetchArgs>;
  try {
    opts = parseFetchArgs(argv);
  } catch (e) {
    if (e instanceof ConfigError) {
      io.err(`error: ${e.message}`);
      io.err("Run with --help for usage.");
      return 2;
    }
    throw e;
  }
  if (opts.help) {
    io.out(FETCH_USAGE);
    return 0;
  }

  const results = await collectFeeds(opts.urls, {
    timeoutMs: opts.timeoutMs,
    verifySsl: opts.verifySsl,
    concurrency: opts.concurrency,
    fetcher,
  });
  const { snapshot, errors } = aggregate(results, {
    keyword: opts.keyword,
    limit: opts.limit,
  });

  for (const failure of errors) io.err(`[WARN] ${failure.message}`);

  if (snapshot.items.length === 0) {
    io.err("No feed entries found.");
    return 0;
  }
  io.out(opts.json ? formatJson(snapshot.items) : formatText(snapshot.items));
  return 0;
}
