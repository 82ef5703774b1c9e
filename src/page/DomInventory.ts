/**
 * DomInventory: single read-only pass over a DOM snapshot.
 *
 *   1. Record every element's tag (lowercased) in first-occurrence order
 *   2. Collect image sources from <img> and <input type="image">
 *   3. Resolve sources against the document URL, keeping http(s) and data: only
 *
 * Elements are visited exactly once in document order with an explicit stack,
 * so arbitrarily deep trees are fine.
 */

import type { DomNode, DomSnapshot } from "../browser/types.js";
import { ScrapeError } from "../errors.js";
import type { ImageRef, PageInventory } from "./types.js";

const FETCHABLE_PROTOCOLS = new Set(["http:", "https:", "data:"]);

/** First URL of a srcset list ("a.png 1x, b.png 2x" → "a.png") */
function firstSrcsetCandidate(srcset: string | undefined): string | undefined {
  const first = srcset?.split(",")[0]?.trim().split(/\s+/)[0];
  return first ? first : undefined;
}

function rawImageSource(node: DomNode, tag: string): string | undefined {
  const attrs = node.attributes;
  if (tag === "img") {
    return attrs.src?.trim() || firstSrcsetCandidate(attrs.srcset);
  }
  if (tag === "input" && attrs.type?.trim().toLowerCase() === "image") {
    return attrs.src?.trim() || undefined;
  }
  return undefined;
}

export function resolveImageSource(raw: string, baseUrl: string): string | undefined {
  let resolved: URL;
  try {
    resolved = new URL(raw, baseUrl || undefined);
  } catch {
    return undefined;
  }
  return FETCHABLE_PROTOCOLS.has(resolved.protocol) ? resolved.href : undefined;
}

export class DomInventory {
  inventory(snapshot: DomSnapshot): PageInventory {
    if (!snapshot.root) {
      throw new ScrapeError("EmptyDocument", `no elements rendered at ${snapshot.url || "the advertiser page"}`);
    }

    const seen = new Set<string>();
    const tags: string[] = [];
    const images: ImageRef[] = [];

    const stack: DomNode[] = [snapshot.root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      const tag = node.tag.toLowerCase();
      if (tag && !seen.has(tag)) {
        seen.add(tag);
        tags.push(tag);
      }

      const raw = rawImageSource(node, tag);
      const source = raw ? resolveImageSource(raw, snapshot.url) : undefined;
      if (source) images.push({ sourceLocator: source });

      for (let i = node.children.length - 1; i >= 0; i -= 1) {
        stack.push(node.children[i]);
      }
    }

    if (tags.length === 0) {
      throw new ScrapeError("EmptyDocument", `no elements rendered at ${snapshot.url || "the advertiser page"}`);
    }

    return { tags, images };
  }
}
