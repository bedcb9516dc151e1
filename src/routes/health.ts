import { Router, Request, Response } from "express";
import type { SnapshotStore } from "../lib/snapshot";
import { formatIso } from "../lib/dates";
import type { RefreshState } from "../schedule";

export function healthRouter(
  store: SnapshotStore,
  refreshState: () => RefreshState
): Router {
  const router = Router();

  // Liveness plus snapshot age
  router.get("/healthz", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      updated_at: formatIso(store.current().updatedAt),
      state: refreshState(),
    });
  });

  return router;
}
