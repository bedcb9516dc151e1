#!/usr/bin/env node
import { runFetch } from "../fetch";
import { logger } from "../lib/logger";

runFetch(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    logger.error({ err: e }, "[news-fetch] FATAL");
    process.exitCode = 1;
  });
