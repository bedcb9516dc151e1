import type { FeedItem } from "../types/feed";
import { parseFeedDate } from "../lib/dates";
import { cleanHtmlText, cleanText } from "../lib/text";

export type RawItem = {
  title: string;
  link: string;
  published: string;
  summary: string;
  author: string;
};

/** Normalize one raw item. Null when title or link is missing. */
export function buildItem(raw: RawItem, source: string): FeedItem | null {
  const title = cleanText(raw.title);
  const link = cleanText(raw.link);
  if (!title || !link) return null;

  return Object.freeze({
    title,
    link,
    published_at: parseFeedDate(cleanText(raw.published)),
    source,
    summary: cleanHtmlText(raw.summary) || null,
    author: cleanText(raw.author) || null,
  });
}

export function collectItems(
  raws: RawItem[],
  source: string
): FeedItem[] {
  const items: FeedItem[] = [];
  for (const raw of raws) {
    const item = buildItem(raw, source);
    if (item) items.push(item);
  }
  return items;
}
