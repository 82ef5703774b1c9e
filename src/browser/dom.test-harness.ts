import type { DomNode, DomSnapshot } from "./types.js";

/** Build a DomNode the way the page serializer reports it (uppercase tag names) */
export function el(
  tag: string,
  attributes: Record<string, string> = {},
  children: DomNode[] = [],
  text = "",
): DomNode {
  return { tag: tag.toUpperCase(), attributes, text, children };
}

export function doc(url: string, root: DomNode | null): DomSnapshot {
  return { url, root };
}

/** <html><head/><body>…children</body></html> */
export function page(url: string, bodyChildren: DomNode[]): DomSnapshot {
  return doc(url, el("html", {}, [el("head"), el("body", {}, bodyChildren)]));
}
