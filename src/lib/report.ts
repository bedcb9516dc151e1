import type { FeedItem } from "../types/feed";
import { formatIso } from "./dates";
import { toItemJson } from "./serialize";

/** Human-readable digest, one block per item. */
export function formatText(items: readonly FeedItem[]): string {
  const lines: string[] = [];
  for (const item of items) {
    lines.push(`- [${item.source}] ${item.title}`);
    lines.push(`  ${item.link}`);
    lines.push(`  ${formatIso(item.published_at) ?? "unknown-time"}`);
    if (item.author) lines.push(`  by: ${item.author}`);
    if (item.summary) lines.push(`  summary: ${item.summary}`);
  }
  return lines.join("\n");
}

export function formatJson(items: readonly FeedItem[]): string {
  return JSON.stringify(items.map(toItemJson), null, 2);
}
