import { Parser } from "htmlparser2";
import { encode } from "html-entities";

const WS_RE = /\s+/g;

// Elements that end a run of text
const BLOCK_TAGS = new Set([
  "p",
  "div",
  "br",
  "hr",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "li",
  "ul",
  "ol",
  "tr",
  "td",
  "th",
  "blockquote",
  "pre",
  "figure",
  "figcaption",
  "table",
]);

const SKIP_TAGS = new Set(["script", "style"]);

/** Collapse runs of whitespace and trim. */
export function cleanText(value: string | null | undefined): string {
  return (value ?? "").replace(WS_RE, " ").trim();
}

/**
 * Text of an HTML fragment: tags dropped, script/style skipped, entities
 * decoded, whitespace collapsed. Summaries usually arrive as escaped
 * markup, which the XML layer has already unescaped once.
 */
export function cleanHtmlText(value: string | null | undefined): string {
  if (!value) return "";

  const parts: string[] = [];
  let skipDepth = 0;
  const parser = new Parser(
    {
      onopentagname(name) {
        const tag = name.toLowerCase();
        if (SKIP_TAGS.has(tag)) skipDepth++;
        if (tag === "br" || tag === "hr") parts.push(" ");
      },
      ontext(text) {
        if (skipDepth === 0) parts.push(text);
      },
      onclosetag(name) {
        const tag = name.toLowerCase();
        if (SKIP_TAGS.has(tag)) skipDepth = Math.max(0, skipDepth - 1);
        if (BLOCK_TAGS.has(tag)) parts.push(" ");
      },
    },
    { decodeEntities: true }
  );
  parser.write(value);
  parser.end();

  return cleanText(parts.join(""));
}

export function escapeHtml(value: string): string {
  return encode(value, { mode: "specialChars" });
}
