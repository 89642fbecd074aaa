// CHANGE: Check the cheerio-backed parser against fixture markup.
// WHY: Variant matching relies on row text being space-joined and lower-cased.
// SOURCE: internal reasoning

import { describe, expect, it } from "vitest";
import { cheerioParser, normalizeText } from "../src/html.js";

describe("cheerioParser.parseLinks", () => {
  it("returns anchors with href in document order", () => {
    const html = `<a href="/a/">First</a><a>No target</a><a href="">Empty</a><p><a href="/b/">  Second\n Link </a></p>`;
    expect(cheerioParser.parseLinks(html)).toEqual([
      { href: "/a/", text: "first" },
      { href: "/b/", text: "second link" }
    ]);
  });
});

describe("cheerioParser.parseRows", () => {
  it("joins cell text with spaces and captures the first anchor", () => {
    const html = `
      <div class="table-row"><div class="table-cell"><a href="/v/1/">19.45.38</a><span class="apkm-badge">APK</span></div><div class="table-cell">arm64-v8a</div><div class="table-cell">nodpi</div></div>
      <div class="table-row"><div class="table-cell">Variant</div><div class="table-cell">Architecture</div></div>`;
    expect(cheerioParser.parseRows(html, "div.table-row")).toEqual([
      { text: "19.45.38 apk arm64-v8a nodpi", href: "/v/1/" },
      { text: "variant architecture", href: undefined }
    ]);
  });

  it("keeps text in document order around nested elements", () => {
    const html = `<div class="table-row">19.45.38 <span>BUNDLE</span> universal<!-- note --></div>`;
    expect(cheerioParser.parseRows(html, "div.table-row")).toEqual([{ text: "19.45.38 bundle universal", href: undefined }]);
  });
});

describe("cheerioParser.firstLink", () => {
  it("returns the first matching anchor with a target", () => {
    const html = `<a rel="nofollow">none</a><a rel="nofollow" href="/x?key=1">x</a><a rel="nofollow" href="/y">y</a>`;
    expect(cheerioParser.firstLink(html, "a[rel='nofollow']")).toBe("/x?key=1");
  });

  it("returns undefined when nothing matches", () => {
    expect(cheerioParser.firstLink("<a href='/z'>z</a>", "a.downloadButton")).toBeUndefined();
  });
});

describe("normalizeText", () => {
  it("collapses whitespace and lower-cases", () => {
    expect(normalizeText("  Universal \n\t NoDPI  ")).toBe("universal nodpi");
  });
});
