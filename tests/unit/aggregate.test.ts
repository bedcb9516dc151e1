/**
 * Unit tests for merging per-feed results into one snapshot.
 */

import { describe, it, expect } from "vitest";
import {
  aggregate,
  dedupeByLink,
  matchesKeyword,
  sortByRecency,
} from "../../src/jobs/aggregate";
import { readFeed } from "../../src/jobs/read";
import { FeedFetchError } from "../../src/lib/errors";
import { failedResult, makeItem, okResult } from "../utils/feeds";

const now = () => new Date("2024-05-01T00:00:00Z");

describe("dedupeByLink", () => {
  it("keeps the first occurrence of a link, ignoring surrounding spaces", () => {
    const first = makeItem("First", " https://e.com/1 ");
    const second = makeItem("Second", "https://e.com/1");
    expect(dedupeByLink([first, second])).toEqual([first]);
  });
});

describe("sortByRecency", () => {
  it("orders dated items newest first and undated items last", () => {
    const t1 = makeItem("T1", "https://e.com/1", "2024-01-03T00:00:00Z");
    const t2 = makeItem("T2", "https://e.com/2", "2024-01-02T00:00:00Z");
    const t3 = makeItem("T3", "https://e.com/3", "2024-01-01T00:00:00Z");
    const undated = makeItem("U", "https://e.com/u");
    expect(sortByRecency([undated, t3, t1, t2]).map((i) => i.title)).toEqual([
      "T1",
      "T2",
      "T3",
      "U",
    ]);
  });

  it("keeps undated items in their incoming order", () => {
    const u1 = makeItem("U1", "https://e.com/u1");
    const dated = makeItem("D", "https://e.com/d", "2024-01-01T00:00:00Z");
    const u2 = makeItem("U2", "https://e.com/u2");
    expect(sortByRecency([u1, dated, u2]).map((i) => i.title)).toEqual([
      "D",
      "U1",
      "U2",
    ]);
  });
});

describe("matchesKeyword", () => {
  it("matches the summary and author as well as the title", () => {
    const item = makeItem("Headline", "https://e.com/h", null, {
      summary: "Central bank raises rates",
      author: "Sam Reporter",
    });
    expect(matchesKeyword(item, "bank")).toBe(true);
    expect(matchesKeyword(item, "REPORTER")).toBe(true);
    expect(matchesKeyword(item, "weather")).toBe(false);
  });
});

describe("aggregate", () => {
  it("yields a shared link exactly once across two feeds", () => {
    const { snapshot } = aggregate(
      [
        okResult("https://a.example/rss", [makeItem("From A", "https://e.com/shared")]),
        okResult("https://b.example/rss", [
          makeItem("From B", "https://e.com/shared"),
          makeItem("Only B", "https://e.com/b"),
        ]),
      ],
      { limit: 10, now }
    );
    expect(snapshot.items.map((i) => i.title)).toEqual(["From A", "Only B"]);
  });

  it("filters by keyword case-insensitively", () => {
    const { snapshot } = aggregate(
      [
        okResult("https://a.example/rss", [
          makeItem("Economy grows", "https://e.com/1"),
          makeItem("Sports today", "https://e.com/2"),
        ]),
      ],
      { keyword: "ECONOMY", limit: 10, now }
    );
    expect(snapshot.items.map((i) => i.title)).toEqual(["Economy grows"]);
  });

  it("treats a blank keyword as no filter", () => {
    const { snapshot } = aggregate(
      [okResult("https://a.example/rss", [makeItem("A", "https://e.com/1")])],
      { keyword: "   ", limit: 10, now }
    );
    expect(snapshot.items).toHaveLength(1);
  });

  it("truncates to the newest `limit` items", () => {
    const items = [1, 2, 3, 4, 5].map((day) =>
      makeItem(`Day ${day}`, `https://e.com/${day}`, `2024-01-0${day}T00:00:00Z`)
    );
    const { snapshot } = aggregate([okResult("https://a.example/rss", items)], {
      limit: 3,
      now,
    });
    expect(snapshot.items.map((i) => i.title)).toEqual(["Day 5", "Day 4", "Day 3"]);
  });

  it("returns failures beside the snapshot instead of throwing", async () => {
    const feedA = await readFeed("https://a.example/rss", {
      timeoutMs: 15000,
      verifySsl: true,
      fetcher: async (url) => {
        throw new FeedFetchError(url, "timed out after 15s");
      },
    });
    const feedB = okResult("https://b.example/rss", [
      makeItem("B1", "https://b.example/1", "2024-04-02T00:00:00Z"),
      makeItem("B2", "https://b.example/2", "2024-04-01T00:00:00Z"),
    ]);

    const result = aggregate([feedA, feedB], { limit: 10, now });

    expect(result.snapshot.items.map((i) => i.title)).toEqual(["B1", "B2"]);
    expect(result.errors).toEqual([
      {
        url: "https://a.example/rss",
        kind: "fetch",
        message: "Failed to read https://a.example/rss: timed out after 15s",
      },
    ]);
    expect(result.feedsOk).toBe(1);
    expect(result.feedsFailed).toBe(1);
  });

  it("produces an empty snapshot when every feed failed", () => {
    const result = aggregate(
      [failedResult("https://a.example/rss"), failedResult("https://b.example/rss")],
      { limit: 10, now }
    );
    expect(result.snapshot.items).toEqual([]);
    expect(result.snapshot.errors).toHaveLength(2);
    expect(result.feedsOk).toBe(0);
  });

  it("stamps and freezes the snapshot", () => {
    const { snapshot } = aggregate([], { limit: 10, now });
    expect(snapshot.updatedAt).toEqual(new Date("2024-05-01T00:00:00Z"));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.items)).toBe(true);
  });
});
