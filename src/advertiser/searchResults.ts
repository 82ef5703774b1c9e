/**
 * Parse the portal's rendered search suggestions into SearchCandidates.
 */

import type { DomNode, DomSnapshot } from "../browser/types.js";
import { extractAdvertiserIdFromUrl, findAdvertiserId } from "./advertiserId.js";
import type { SearchCandidate } from "./types.js";

export const SEARCH_INPUT_SELECTOR = "input.input.input-area, input[type='search'], input[aria-label*='search' i]";

const RESULT_ITEM_TAGS = new Set(["material-list-item", "material-select-item"]);

/** Selector that is attached as soon as at least one result item has rendered */
export const SEARCH_RESULT_SELECTOR = "material-list-item, material-select-item, [role='option']";

const ID_ATTRIBUTES = ["data-advertiser-id", "data-id", "href", "id"];

function isResultItem(node: DomNode): boolean {
  return RESULT_ITEM_TAGS.has(node.tag.toLowerCase()) || node.attributes.role === "option";
}

function textOf(node: DomNode): string {
  const parts: string[] = [];
  const stack: DomNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (current.text) parts.push(current.text);
    for (let i = current.children.length - 1; i >= 0; i -= 1) {
      stack.push(current.children[i]);
    }
  }
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

/** Well-known id attributes first, then any attribute, then the visible text */
function idOf(item: DomNode): string | undefined {
  const stack: DomNode[] = [item];
  const fallbacks: string[] = [];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    for (const name of ID_ATTRIBUTES) {
      const id = findAdvertiserId(current.attributes[name]);
      if (id) return id;
    }
    fallbacks.push(...Object.values(current.attributes));
    for (let i = current.children.length - 1; i >= 0; i -= 1) {
      stack.push(current.children[i]);
    }
  }
  for (const value of fallbacks) {
    const id = findAdvertiserId(value);
    if (id) return id;
  }
  return findAdvertiserId(textOf(item));
}

/** Result items in document order; nested matches inside an item are not counted twice */
export function parseSearchCandidates(snapshot: DomSnapshot): SearchCandidate[] {
  if (!snapshot.root) return [];
  const out: SearchCandidate[] = [];
  const stack: DomNode[] = [snapshot.root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (isResultItem(node)) {
      out.push({ advertiserId: idOf(node), displayName: textOf(node) });
      continue;
    }
    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      stack.push(node.children[i]);
    }
  }
  return out;
}

/**
 * Last resort when the portal renders no result items: the first advertiser id
 * anywhere on the page, in document order. Per element, id-bearing attributes
 * (data-advertiser-id, data-id, advertiser links, advertiser-ish ids) win over text.
 */
export function findAdvertiserIdInPage(snapshot: DomSnapshot): string | undefined {
  if (!snapshot.root) return undefined;
  const stack: DomNode[] = [snapshot.root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    const { attributes } = node;
    const id =
      findAdvertiserId(attributes["data-advertiser-id"]) ??
      findAdvertiserId(attributes["data-id"]) ??
      (attributes.href ? extractAdvertiserIdFromUrl(attributes.href) : undefined) ??
      (attributes.id?.toLowerCase().includes("advertiser") ? findAdvertiserId(attributes.id) : undefined) ??
      findAdvertiserId(node.text);
    if (id) return id;
    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      stack.push(node.children[i]);
    }
  }
  return undefined;
}
