import type { FeedItem } from "../../types/feed";
import { cleanText } from "../../lib/text";
import { collectItems, type RawItem } from "../item";
import {
  attr,
  child,
  childText,
  children,
  deepText,
  isElement,
  type XmlElement,
} from "../xml";

/**
 * First rel="alternate" link (a missing rel means alternate),
 * otherwise the first link that has an href at all.
 */
export function pickAtomLink(entry: XmlElement): string {
  let fallback = "";
  for (const link of children(entry, "link")) {
    const href = cleanText(attr(link, "href"));
    if (!href) continue;
    const rel = attr(link, "rel") || "alternate";
    if (rel === "alternate") return href;
    if (!fallback) fallback = href;
  }
  return fallback;
}

function rawAtomEntry(entry: XmlElement): RawItem {
  const author = child(entry, "author");
  return {
    title: deepText(child(entry, "title")),
    link: pickAtomLink(entry),
    published: childText(entry, "published") || childText(entry, "updated"),
    summary:
      deepText(child(entry, "summary")) || deepText(child(entry, "content")),
    author: isElement(author) ? childText(author, "name") : "",
  };
}

/** Atom 1.0: <feed><entry>… */
export function mapAtomEntries(feed: XmlElement, source: string): FeedItem[] {
  return collectItems(
    children(feed, "entry").filter(isElement).map(rawAtomEntry),
    source
  );
}
