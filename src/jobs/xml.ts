import { XMLParser, XMLValidator } from "fast-xml-parser";
import { FeedParseError } from "../lib/errors";

/**
 * Shapes fast-xml-parser produces with the options below: text-only
 * elements become strings, elements with attributes or children become
 * objects (text under "#text", attributes under "@_name"), repeated
 * elements become arrays.
 */
export type XmlValue = string | XmlElement | XmlValue[];
export interface XmlElement {
  [name: string]: XmlValue | undefined;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  // Keep "2024" titles as strings
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: false,
});

export function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a document into its top-level object. Throws FeedParseError. */
export function parseXml(xml: string): XmlElement {
  xml = xml.trimStart();
  const check = XMLValidator.validate(xml);
  if (check !== true) {
    throw new FeedParseError(
      `Malformed XML: ${check.err.msg} (line ${check.err.line})`
    );
  }
  const doc: unknown = parser.parse(xml);
  if (!isElement(doc)) throw new FeedParseError("Empty XML document");
  return doc;
}

export function children(parent: XmlElement, name: string): XmlValue[] {
  const value = parent[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function child(parent: XmlElement, name: string): XmlValue | undefined {
  return children(parent, name)[0];
}

/** Direct text of a node: the string itself, or its "#text". */
export function textOf(value: XmlValue | undefined): string {
  if (value === undefined) return "";
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return textOf(value[0]);
  return textOf(value["#text"]);
}

/** All text below a node, attributes excluded (XHTML content, nested markup). */
export function deepText(value: XmlValue | undefined): string {
  if (value === undefined) return "";
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return value.map(deepText).join(" ");
  return Object.entries(value)
    .filter(([key]) => !key.startsWith("@_"))
    .map(([, v]) => deepText(v))
    .join(" ");
}

export function attr(value: XmlValue | undefined, name: string): string {
  if (!isElement(value)) return "";
  return textOf(value[`@_${name}`]);
}

/** Text of the first child named `name`. */
export function childText(parent: XmlElement, name: string): string {
  return textOf(child(parent, name));
}

/**
 * Copy of an element tree with `prefix:` dropped from element names, so a
 * document written as <a:feed><a:entry> reads like <feed><entry>.
 */
export function unprefix(value: XmlValue, prefix: string): XmlValue {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return value.map((v) => unprefix(v, prefix));
  const out: XmlElement = {};
  const marker = `${prefix}:`;
  for (const [key, v] of Object.entries(value)) {
    if (v === undefined) continue;
    const name = key.startsWith(marker) ? key.slice(marker.length) : key;
    out[name] = unprefix(v, prefix);
  }
  return out;
}

/** Top-level element: its qualified name and body. */
export function rootOf(doc: XmlElement): { name: string; body: XmlElement } {
  for (const [name, value] of Object.entries(doc)) {
    if (name === "#text" || value === undefined) continue;
    const first = Array.isArray(value) ? value[0] : value;
    // <rss></rss> parses to "", still a root
    return { name, body: isElement(first) ? first : {} };
  }
  throw new FeedParseError("Empty XML document");
}
