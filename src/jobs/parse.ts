import type { FeedItem } from "../types/feed";
import { FeedParseError } from "../lib/errors";
import { cleanText } from "../lib/text";
import { mapAtomEntries } from "./formats/atom";
import { mapRdfItems } from "./formats/rdf";
import { mapRssItems } from "./formats/rss";
import {
  child,
  childText,
  deepText,
  isElement,
  parseXml,
  rootOf,
  unprefix,
} from "./xml";
import type { XmlElement } from "./xml";

/** A parsed document, tagged by the format its root element announced. */
export type FeedDocument =
  | { format: "rss"; channel: XmlElement }
  | { format: "atom"; feed: XmlElement }
  | { format: "rdf"; root: XmlElement };

function splitName(qualified: string): { prefix: string; local: string } {
  const i = qualified.indexOf(":");
  return i === -1
    ? { prefix: "", local: qualified.toLowerCase() }
    : { prefix: qualified.slice(0, i), local: qualified.slice(i + 1).toLowerCase() };
}

/**
 * Decide the format from the root element.
 * Throws FeedParseError for malformed XML or an unknown root.
 */
export function sniffFeed(xml: string): FeedDocument {
  const { name, body } = rootOf(parseXml(xml));
  const { prefix, local: root } = splitName(name);

  if (root === "rss") {
    const channel = child(body, "channel");
    return { format: "rss", channel: isElement(channel) ? channel : {} };
  }
  if (root === "feed") {
    // <a:feed xmlns:a="…Atom">: entries are <a:entry>
    const feed = prefix ? unprefix(body, prefix) : body;
    return { format: "atom", feed: isElement(feed) ? feed : {} };
  }
  if (root === "rdf") return { format: "rdf", root: body };

  // Bare <channel> roots, or unknown wrappers around one
  if (root === "channel") return { format: "rss", channel: body };
  const channel = child(body, "channel");
  if (isElement(channel)) return { format: "rss", channel };

  throw new FeedParseError();
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "";
  }
}

/** Channel/feed title, else the URL's host, else the URL. */
export function detectSource(doc: FeedDocument, url: string): string {
  let title = "";
  switch (doc.format) {
    case "rss":
      title = childText(doc.channel, "title");
      break;
    case "atom":
      title = deepText(child(doc.feed, "title"));
      break;
    case "rdf": {
      const channel = child(doc.root, "channel");
      title = isElement(channel) ? childText(channel, "title") : "";
      break;
    }
  }
  return cleanText(title) || hostOf(url) || url;
}

export function mapItems(doc: FeedDocument, source: string): FeedItem[] {
  switch (doc.format) {
    case "rss":
      return mapRssItems(doc.channel, source);
    case "atom":
      return mapAtomEntries(doc.feed, source);
    case "rdf":
      return mapRdfItems(doc.root, source);
  }
}

/** Parse one feed document fetched from `url` into normalized items. */
export function parseFeed(xml: string, url: string): FeedItem[] {
  let doc: FeedDocument;
  try {
    doc = sniffFeed(xml);
  } catch (e) {
    if (e instanceof FeedParseError) {
      throw new FeedParseError(e.message, { cause: e, url });
    }
    throw e;
  }
  return mapItems(doc, detectSource(doc, url));
}
