// =============================================================================
// Visible text extraction — flatten an HTML snippet to the text a reader sees
// =============================================================================

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode } from "domhandler";

/** Subtrees that never carry page content. */
const NON_CONTENT_TAGS: readonly string[] = ["script", "style", "head", "title", "meta"];

// The parser keeps the content of these as one unparsed text node.
const RAW_TEXT_TAGS: readonly string[] = [
  "iframe",
  "noembed",
  "noframes",
  "noscript",
  "textarea",
  "xmp",
];

const HIDDEN_DECLARATIONS: readonly string[] = ["display:none", "visibility:hidden"];

/**
 * Only the text node's own parent is inspected. Inherited visibility and
 * stylesheet rules are out of reach of a markup-only pass.
 */
function isHidden(node: AnyNode): boolean {
  const parent = node.parent;
  if (!parent || !isTag(parent)) return false;
  const style = (parent.attribs.style ?? "").replace(/\s/g, "").toLowerCase();
  return HIDDEN_DECLARATIONS.some((decl) => style.includes(decl));
}

function parse(html: string, isDocument: boolean): CheerioAPI {
  const $ = cheerio.load(html, { scriptingEnabled: false }, isDocument);
  $(RAW_TEXT_TAGS.join(",")).each((_, el) => {
    const inner = parse($(el).text(), false);
    $(el).empty().append(inner.root().contents());
  });
  return $;
}

function collectText(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.trim();
      if (text && !isHidden(node)) out.push(text);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * Returns the visible text of `html` as one space-joined string.
 * Malformed markup is parsed best-effort; an empty string means nothing visible.
 */
export function extractVisibleText(html: string): string {
  const $ = parse(html, true);
  $(NON_CONTENT_TAGS.join(",")).remove();

  const texts: string[] = [];
  collectText($.root().toArray(), texts);
  return texts.join(" ");
}
