import type { FeedItem } from "../../types/feed";
import { collectItems, type RawItem } from "../item";
import { child, childText, children, deepText, isElement, type XmlElement } from "../xml";

function rawRdfItem(item: XmlElement): RawItem {
  return {
    title: childText(item, "title"),
    link: childText(item, "link"),
    published: childText(item, "dc:date") || childText(item, "date"),
    summary: deepText(child(item, "description")),
    author: childText(item, "dc:creator"),
  };
}

/** RSS 1.0: items are siblings of <channel> under <rdf:RDF>. */
export function mapRdfItems(root: XmlElement, source: string): FeedItem[] {
  return collectItems(
    children(root, "item").filter(isElement).map(rawRdfItem),
    source
  );
}
