import type { FeedItem } from "../../types/feed";
import { collectItems, type RawItem } from "../item";
import { child, childText, children, deepText, isElement, type XmlElement } from "../xml";

function rawRssItem(item: XmlElement): RawItem {
  return {
    title: childText(item, "title"),
    link: childText(item, "link"),
    published: childText(item, "pubDate") || childText(item, "dc:date"),
    summary:
      deepText(child(item, "description")) ||
      deepText(child(item, "content:encoded")),
    author: childText(item, "author") || childText(item, "dc:creator"),
  };
}

/** RSS 2.0: <rss><channel><item>… */
export function mapRssItems(channel: XmlElement, source: string): FeedItem[] {
  return collectItems(
    children(channel, "item").filter(isElement).map(rawRssItem),
    source
  );
}
