import * as dotenv from "dotenv";
dotenv.config();

/** Raw environment defaults. CLI flags override these; see lib/options.ts. */
export const ENV = {
  NODE_ENV: process.env.NODE_ENV ?? "development",
  LOG_LEVEL: process.env.LOG_LEVEL ?? "info",
  PORT: process.env.PORT ?? "",
  HOST: process.env.HOST ?? "",
  FEED_TIMEOUT_SECONDS: process.env.FEED_TIMEOUT_SECONDS ?? "",
  FEED_CONCURRENCY: process.env.FEED_CONCURRENCY ?? "",
  REFRESH_SECONDS: process.env.REFRESH_SECONDS ?? "",
  REFRESH_CRON: process.env.REFRESH_CRON ?? "",
};

export type Env = typeof ENV;
