import pino from "pino";
import { ENV } from "./env";

const isTest = ENV.NODE_ENV === "test";
const isDev = ENV.NODE_ENV !== "production";

// Everything goes to stderr: fetch mode prints its report on stdout.
export const logger = isTest
  ? pino({ level: "silent" })
  : isDev
    ? pino({
        level: ENV.LOG_LEVEL,
        transport: {
          target: "pino-pretty",
          options: { translateTime: "SYS:standard", destination: 2 },
        },
      })
    : pino({ level: ENV.LOG_LEVEL }, pino.destination(2));

export type Logger = typeof logger;
