/**
 * HTTP surface of signage mode, served from a real listener on an
 * ephemeral port.
 */

import axios from "axios";
import { createServer, type Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "../../src/app";
import { SnapshotStore } from "../../src/lib/snapshot";
import type { RefreshState } from "../../src/schedule";
import { makeItem, passResult } from "../utils/feeds";

const client = axios.create({ proxy: false, validateStatus: () => true });

const store = new SnapshotStore();
let state: RefreshState = "refreshing";
let server: Server;
let base = "";

beforeAll(async () => {
  server = createServer(
    createApp({ store, refreshState: () => state, title: "Test Wall", reloadSeconds: 30 })
  );
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (typeof address !== "object" || !address) throw new Error("no address");
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
});

describe("signage HTTP app", () => {
  it("serves an empty snapshot before the first pass", async () => {
    const res = await client.get(`${base}/api/news`);
    expect(res.status).toBe(200);
    expect(res.headers["cache-control"]).toBe("no-store");
    expect(res.data).toEqual({ updated_at: null, items: [], error_count: 0 });
  });

  it("reports health and refresh state", async () => {
    const res = await client.get(`${base}/healthz`);
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ ok: true, updated_at: null, state: "refreshing" });
  });

  it("serves the published snapshot", async () => {
    const item = makeItem("Headline", "https://e.com/a", "2024-04-30T08:00:00Z", {
      summary: "Short",
    });
    store.publish(passResult([item], { ok: 1, failed: 1 }).snapshot);
    state = "idle";

    const res = await client.get(`${base}/api/news`);
    expect(res.data).toEqual({
      updated_at: "2024-05-01T00:00:00.000Z",
      items: [
        {
          title: "Headline",
          link: "https://e.com/a",
          published_at: "2024-04-30T08:00:00.000Z",
          source: "Daily",
          summary: "Short",
          author: null,
        },
      ],
      error_count: 1,
    });

    const health = await client.get(`${base}/healthz`);
    expect(health.data).toEqual({
      ok: true,
      updated_at: "2024-05-01T00:00:00.000Z",
      state: "idle",
    });
  });

  it("renders the signage page", async () => {
    const res = await client.get(`${base}/`, { responseType: "text" });
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/html/);
    expect(res.data).toContain("<title>Test Wall</title>");
    expect(res.data).toContain(`<meta http-equiv="refresh" content="30" />`);
  });

  it("answers unknown paths with 404 JSON", async () => {
    const res = await client.get(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: "not found" });
  });
});
