#!/usr/bin/env node
import { startSignage } from "../index";
import { ConfigError } from "../lib/errors";
import { logger } from "../lib/logger";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "UNHANDLED_REJECTION");
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, "UNCAUGHT_EXCEPTION");
});

async function main() {
  const signage = await startSignage(process.argv.slice(2));
  if (!signage) return;

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, stopping server...`);
    signage
      .close()
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        logger.error({ err: e }, "shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((e: unknown) => {
  if (e instanceof ConfigError) {
    process.stderr.write(`error: ${e.message}\nRun with --help for usage.\n`);
    process.exit(2);
  }
  logger.error({ err: e }, "[news-wall] FATAL");
  process.exit(1);
});
