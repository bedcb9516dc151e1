import { describe, expect, it } from "vitest";
import { cleanHtmlText, cleanText, escapeHtml } from "../../src/lib/text";

describe("cleanText", () => {
  it("collapses whitespace", () => {
    expect(cleanText("  a \n\t b  ")).toBe("a b");
    expect(cleanText(null)).toBe("");
  });
});

describe("cleanHtmlText", () => {
  it("decodes named and numeric entities", () => {
    expect(cleanHtmlText("<p>Caf&eacute; &copy; 2024 &euro;5 &#169; &#x263A;</p>")).toBe(
      "Café © 2024 €5 © ☺"
    );
  });

  it("keeps block elements apart and inline text together", () => {
    expect(cleanHtmlText("<h2>Title</h2><p>First<br>second <b>bold</b>er</p>")).toBe(
      "Title First second bolder"
    );
  });

  it("drops script and style content", () => {
    expect(
      cleanHtmlText("<style>p { color: red }</style><p>Shown</p><script>alert(1)</script>")
    ).toBe("Shown");
  });

  it("returns empty text for empty input", () => {
    expect(cleanHtmlText("")).toBe("");
    expect(cleanHtmlText(undefined)).toBe("");
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&lt;/a&gt;"
    );
  });
});
