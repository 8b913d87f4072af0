import type { CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import { collapseWhitespace } from "../scraping/utils";

const TEXT_NODE = 3;
const ELEMENT_NODE = 1;
const SKIPPED_TAGS = "script, style, noscript, template";

export interface TextNodeRef {
  text: string; // raw node text, untrimmed
  node: AnyNode;
}

/**
 * Every text node under `root` in document order, skipping script-like
 * elements.
 */
export function collectTextNodes($: CheerioAPI, root: AnyNode = $.root()[0]): TextNodeRef[] {
  const out: TextNodeRef[] = [];

  const walk = (node: AnyNode): void => {
    $(node)
      .contents()
      .each((_, child) => {
        if (child.nodeType === TEXT_NODE) {
          out.push({ text: $(child).text(), node: child });
        } else if (child.nodeType === ELEMENT_NODE && !$(child).is(SKIPPED_TAGS)) {
          walk(child);
        }
      });
  };

  walk(root);
  return out;
}

/**
 * Visible body text: each text node trimmed, joined with single spaces.
 */
export function visibleText($: CheerioAPI): string {
  const body = $("body")[0] ?? $.root()[0];
  const parts = collectTextNodes($, body)
    .map((t) => t.text.trim())
    .filter(Boolean);
  return collapseWhitespace(parts.join(" "));
}

/**
 * Element positions in document order, for "next element after" lookups.
 */
export function documentOrder($: CheerioAPI): Map<AnyNode, number> {
  const order = new Map<AnyNode, number>();
  $("*").each((i, el) => {
    order.set(el, i);
  });
  return order;
}

export function resolveUrl(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}
