// CHANGE: Wrap cheerio behind a small parsing capability.
// WHY: Stages only need links, table rows and single anchors; tests feed fixture HTML through the same parser.
// SOURCE: internal reasoning

import { load } from "cheerio";
import { LinkRef, VariantCandidate } from "./types.js";

/**
 * Parsing operations the retrieval stages call into.
 */
export interface HtmlParser {
  /** Every anchor carrying an `href`, in document order. */
  parseLinks(html: string): LinkRef[];
  /** Rows matched by `selector`, with normalised text and their first anchor target. */
  parseRows(html: string, selector: string): VariantCandidate[];
  /** Target of the first anchor matched by `selector`, if it has a non-empty `href`. */
  firstLink(html: string, selector: string): string | undefined;
}

/** The parts of a parsed node the text walk reads. */
interface DomNode {
  readonly type: string;
  readonly data?: string;
  readonly children?: readonly DomNode[];
}

/**
 * Collect trimmed text nodes below `node` in document order.
 */
function collectText(node: DomNode, out: string[]): string[] {
  if (node.type === "text" && node.data !== undefined) {
    const piece = node.data.trim();
    if (piece !== "") {
      out.push(piece);
    }
  }
  for (const child of node.children ?? []) {
    collectText(child, out);
  }
  return out;
}

/**
 * Collapse whitespace runs and lower-case, so tag tests are plain substring checks.
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

export const cheerioParser: HtmlParser = {
  parseLinks(html) {
    const $ = load(html);
    return $("a[href]")
      .toArray()
      .map(anchor => ({
        href: $(anchor).attr("href") ?? "",
        text: normalizeText($(anchor).text())
      }))
      .filter(link => link.href !== "");
  },

  parseRows(html, selector) {
    const $ = load(html);
    return $(selector)
      .toArray()
      .map(row => {
        // Join text nodes with spaces so adjacent cells never fuse into one token.
        const pieces = collectText(row, []);
        const href = $(row).find("a[href]").first().attr("href");
        return {
          text: normalizeText(pieces.join(" ")),
          href: href ? href : undefined
        };
      });
  },

  firstLink(html, selector) {
    const $ = load(html);
    const href = $(selector).filter("[href]").first().attr("href");
    return href ? href : undefined;
  }
};
