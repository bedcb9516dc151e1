import express, { NextFunction, Request, Response } from "express";
import pinoHttp from "pino-http";
import { logger } from "./lib/logger";
import type { SnapshotStore } from "./lib/snapshot";
import { healthRouter } from "./routes/health";
import { newsRouter } from "./routes/news";
import { signageRouter } from "./routes/signage";
import type { RefreshState } from "./schedule";

export type AppOptions = {
  store: SnapshotStore;
  refreshState: () => RefreshState;
  title?: string;
  reloadSeconds: number;
};

/** Express app for signage mode. Handlers only read the snapshot store. */
export function createApp(opts: AppOptions) {
  const app = express();
  app.disable("x-powered-by");

  app.use(pinoHttp({ logger, autoLogging: { ignore: (req) => req.url === "/healthz" } }));
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.set("Cache-Control", "no-store");
    next();
  });

  app.use(
    signageRouter(opts.store, {
      title: opts.title ?? "Global News Stream",
      reloadSeconds: opts.reloadSeconds,
    })
  );
  app.use("/api", newsRouter(opts.store));
  app.use(healthRouter(opts.store, opts.refreshState));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not found" });
  });

  // Express recognises error handlers by arity; keep all four params.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    req.log.error({ err }, "request failed");
    res.status(500).json({ error: "Server error" });
  });

  return app;
}
