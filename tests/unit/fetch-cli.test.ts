import { describe, expect, it } from "vitest";
import { runFetch, type Io } from "../../src/fetch";
import type { Fetcher } from "../../src/jobs/read";
import { FeedFetchError } from "../../src/lib/errors";
import { FETCH_USAGE } from "../../src/lib/options";
import { fixture } from "../utils/feeds";

const GOOD = "https://example.com/rss";
const DOWN = "https://down.example/rss";

function captureIo(): Io & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

const fetcher: Fetcher = async (url) => {
  if (url === GOOD) return fixture("rss2.xml");
  if (url === DOWN) throw new FeedFetchError(url, "HTTP 503 Service Unavailable");
  return "<html><body>not a feed</body></html>";
};

describe("runFetch", () => {
  it("prints a text digest, newest first", async () => {
    const io = captureIo();
    const code = await runFetch([GOOD], io, fetcher);

    expect(code).toBe(0);
    expect(io.stderr).toEqual([]);
    expect(io.stdout).toEqual([
      [
        "- [Example News] Economy grows",
        "  https://example.com/a",
        "  2024-01-02T10:00:00.000Z",
        "  by: Jane Doe",
        "  summary: Markets & jobs",
        "- [Example News] Sports & today",
        "  https://example.com/b",
        "  unknown-time",
        "  summary: Full story",
      ].join("\n"),
    ]);
  });

  it("prints JSON with --json and honours --limit", async () => {
    const io = captureIo();
    const code = await runFetch([GOOD, "--json", "--limit", "1"], io, fetcher);

    expect(code).toBe(0);
    expect(JSON.parse(io.stdout.join("\n"))).toEqual([
      {
        title: "Economy grows",
        link: "https://example.com/a",
        published_at: "2024-01-02T10:00:00.000Z",
        source: "Example News",
        summary: "Markets & jobs",
        author: "Jane Doe",
      },
    ]);
  });

  it("warns about failed feeds and still prints the rest", async () => {
    const io = captureIo();
    const code = await runFetch([DOWN, GOOD, "https://html.example/"], io, fetcher);

    expect(code).toBe(0);
    expect(io.stderr).toEqual([
      `[WARN] Failed to read ${DOWN}: HTTP 503 Service Unavailable`,
      "[WARN] Failed to read https://html.example/: Unsupported feed format (expected RSS or Atom).",
    ]);
    expect(io.stdout[0]).toContain("- [Example News] Economy grows");
  });

  it("exits 0 with a notice when nothing matches", async () => {
    const io = captureIo();
    const code = await runFetch([GOOD, "--keyword", "weather"], io, fetcher);

    expect(code).toBe(0);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual(["No feed entries found."]);
  });

  it("filters by keyword across title, summary and author", async () => {
    const io = captureIo();
    await runFetch([GOOD, "--keyword", "JANE"], io, fetcher);
    expect(io.stdout[0].split("\n")[0]).toBe("- [Example News] Economy grows");
    expect(io.stdout[0]).not.toContain("Sports");
  });

  it("exits 2 on a bad URL without fetching", async () => {
    const io = captureIo();
    let calls = 0;
    const code = await runFetch(["nope"], io, async () => {
      calls++;
      return "";
    });

    expect(code).toBe(2);
    expect(calls).toBe(0);
    expect(io.stderr).toEqual([
      "error: not a valid http(s) feed URL: nope",
      "Run with --help for usage.",
    ]);
  });

  it("prints usage for --help", async () => {
    const io = captureIo();
    expect(await runFetch(["--help"], io, fetcher)).toBe(0);
    expect(io.stdout).toEqual([FETCH_USAGE]);
  });
});
