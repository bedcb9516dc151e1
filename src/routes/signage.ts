import { Router, Request, Response } from "express";
import type { SnapshotStore } from "../lib/snapshot";
import { renderSignagePage } from "../views/signage";

export type SignageRouteOptions = {
  title: string;
  reloadSeconds: number;
};

export function signageRouter(
  store: SnapshotStore,
  opts: SignageRouteOptions
): Router {
  const router = Router();
  router.get("/", (_req: Request, res: Response) => {
    res.type("html").send(renderSignagePage(store.current(), opts));
  });
  return router;
}
