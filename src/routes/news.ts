import { Router, Request, Response } from "express";
import type { SnapshotStore } from "../lib/snapshot";
import { toNewsResponse } from "../lib/serialize";
import type { NewsResponse } from "../types/feed";

/**
 * GET /api/news
 * - the current snapshot; never triggers a fetch.
 */
export function newsRouter(store: SnapshotStore): Router {
  const router = Router();
  router.get("/news", (_req: Request, res: Response) => {
    const payload: NewsResponse = toNewsResponse(store.current());
    res.json(payload);
  });
  return router;
}
