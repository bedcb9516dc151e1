import { createServer, type Server } from "http";
import { createApp } from "./app";
import { aggregate } from "./jobs/aggregate";
import { collectFeeds, type Fetcher } from "./jobs/read";
import { resolveFeedSources } from "./lib/feeds_file";
import { logger } from "./lib/logger";
import { SIGNAGE_USAGE, parseSignageArgs, type SignageOptions } from "./lib/options";
import { SnapshotStore } from "./lib/snapshot";
import { RefreshScheduler } from "./schedule";

const log = logger.child({ module: "signage" });

export type SignageServer = {
  server: Server;
  store: SnapshotStore;
  scheduler: RefreshScheduler;
  urls: string[];
  port: number;
  close: () => Promise<void>;
};

/** How often the page reloads itself. Capped so a new snapshot shows within a minute. */
export function reloadSecondsFor(opts: SignageOptions): number {
  return opts.trigger.kind === "interval" ? Math.min(opts.trigger.seconds, 60) : 60;
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

/**
 * Start signage mode: resolve feeds, bind the HTTP server, then refresh in
 * the background. Resolves to null when only --help was asked for.
 * Throws ConfigError on bad flags, before anything is fetched.
 */
export async function startSignage(
  argv: string[],
  fetcher?: Fetcher
): Promise<SignageServer | null> {
  const opts = parseSignageArgs(argv);
  if (opts.help) {
    process.stdout.write(`${SIGNAGE_USAGE}\n`);
    return null;
  }

  const { urls } = await resolveFeedSources(opts.urls, opts.feedsFile);
  const store = new SnapshotStore();
  const scheduler = new RefreshScheduler(
    async () =>
      aggregate(
        await collectFeeds(urls, {
          timeoutMs: opts.timeoutMs,
          verifySsl: opts.verifySsl,
          concurrency: opts.concurrency,
          fetcher,
        }),
        { keyword: opts.keyword, limit: opts.limit }
      ),
    store,
    { trigger: opts.trigger }
  );

  const app = createApp({
    store,
    refreshState: () => scheduler.status,
    reloadSeconds: reloadSecondsFor(opts),
  });
  const server = createServer(app);
  await listen(server, opts.port, opts.bind);
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : opts.port;
  log.info(`Signage running on http://${opts.bind}:${port} (${urls.length} feeds)`);

  void scheduler.start();

  return {
    server,
    store,
    scheduler,
    urls,
    port,
    close: async () => {
      await scheduler.stop();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
    },
  };
}
