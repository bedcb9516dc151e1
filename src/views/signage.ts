import type { FeedItem, Snapshot } from "../types/feed";
import { formatRelative } from "../lib/dates";
import { escapeHtml } from "../lib/text";

export type SignagePageOptions = {
  title: string;
  reloadSeconds: number; // <meta refresh> period
  now?: Date;
};

const STYLE = `
  :root { --bg: #06182a; --panel: rgba(255,255,255,.1); --line: rgba(255,255,255,.22);
          --text: #f2f7ff; --muted: #bfd1e4; --accent: #ffd166; }
  * { box-sizing: border-box; }
  body { margin: 0; min-height: 100vh; background: linear-gradient(150deg, #09273d, var(--bg));
         color: var(--text); font-family: "Segoe UI", "Noto Sans", sans-serif; }
  header { padding: 1rem 1.4rem; border-bottom: 1px solid var(--line);
           display: flex; justify-content: space-between; align-items: baseline; gap: 1rem; }
  h1 { margin: 0; font-size: clamp(1.5rem, 3.6vw, 2.6rem); letter-spacing: .035em; text-transform: uppercase; }
  .clock { font-size: clamp(1.4rem, 3vw, 2.2rem); font-weight: 700; font-variant-numeric: tabular-nums; }
  .meta-row { display: flex; flex-wrap: wrap; gap: .5rem; padding: .6rem 1.4rem 0; }
  .pill { padding: .25rem .7rem; border: 1px solid var(--line); border-radius: 999px; color: var(--muted); }
  .pill.warn { color: var(--accent); border-color: var(--accent); }
  main { padding: 1rem 1.2rem; display: grid; gap: .8rem; }
  .story { display: grid; gap: .4rem; padding: .9rem 1rem; border: 1px solid var(--line);
           border-radius: 16px; background: var(--panel); color: inherit; text-decoration: none; }
  .story-source { color: var(--accent); text-transform: uppercase; letter-spacing: .04em; font-weight: 600; }
  .story-title { font-size: clamp(1.2rem, 2.1vw, 1.9rem); font-weight: 700; line-height: 1.24; }
  .story-summary { color: #deebf8; line-height: 1.35; }
  .story-meta { color: var(--muted); font-variant-numeric: tabular-nums; }
  .story.new { border-color: var(--accent); box-shadow: 0 0 0 2px rgba(255,209,102,.35); }
  .empty { padding: 2rem; border: 1px dashed var(--line); border-radius: 16px; text-align: center; color: var(--muted); }
`;

function hostOf(link: string): string {
  try {
    return new URL(link).hostname.replace(/^www\./, "");
  } catch {
    return "";
  }
}

// Ticks the header clock between reloads.
const CLOCK_SCRIPT = `
  const clock = document.getElementById("clock");
  const tick = () => { clock.textContent = new Date().toLocaleTimeString(); };
  tick();
  setInterval(tick, 1000);
`;

function renderStory(item: FeedItem, now: Date, newest: boolean): string {
  const meta = [formatRelative(item.published_at, now)];
  if (item.author) meta.push(`By ${item.author}`);
  const host = hostOf(item.link);
  if (host) meta.push(host);

  return `<a class="story${newest ? " new" : ""}" href="${escapeHtml(item.link)}" target="_blank" rel="noreferrer noopener">
  <div class="story-source">${escapeHtml(item.source)}</div>
  <div class="story-title">${escapeHtml(item.title)}</div>${
    item.summary
      ? `\n  <div class="story-summary">${escapeHtml(item.summary)}</div>`
      : ""
  }
  <div class="story-meta">${escapeHtml(meta.join(" | "))}</div>
</a>`;
}

/** "Updated <iso>", with "| WARN n" when feeds failed in the last pass. */
export function statusLine(snapshot: Snapshot): string {
  if (!snapshot.updatedAt) return "Waiting for first update...";
  const warn = snapshot.errors.length > 0 ? ` | WARN ${snapshot.errors.length}` : "";
  return `Updated ${snapshot.updatedAt.toISOString()}${warn}`;
}

function countSources(items: readonly FeedItem[]): number {
  return new Set(items.map((item) => item.source)).size;
}

/**
 * Full signage page for a snapshot. Reloads itself; never fetches feeds.
 * The newest dated story is highlighted.
 */
export function renderSignagePage(
  snapshot: Snapshot,
  opts: SignagePageOptions
): string {
  const now = opts.now ?? new Date();
  const newest = snapshot.items[0]?.published_at ? 0 : -1;
  const body =
    snapshot.items.length > 0
      ? snapshot.items.map((item, i) => renderStory(item, now, i === newest)).join("\n")
      : `<div class="empty">No entries available. Check feed URLs or SSL settings.</div>`;
  const warnClass = snapshot.errors.length > 0 ? " warn" : "";

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8" />
<meta name="viewport" content="width=device-width, initial-scale=1" />
<meta http-equiv="refresh" content="${Math.max(1, Math.round(opts.reloadSeconds))}" />
<title>${escapeHtml(opts.title)}</title>
<style>${STYLE}</style>
</head>
<body>
<header>
<h1>${escapeHtml(opts.title)}</h1>
<div class="clock" id="clock">${now.toISOString().slice(11, 19)}</div>
</header>
<div class="meta-row">
<span class="pill" id="source-count">${countSources(snapshot.items)} sources</span>
<span class="pill" id="headline-count">${snapshot.items.length} headlines</span>
<span class="pill${warnClass}" id="status">${escapeHtml(statusLine(snapshot))}</span>
</div>
<main>
${body}
</main>
<script>${CLOCK_SCRIPT}</script>
</body>
</html>
`;
}
