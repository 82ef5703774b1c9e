/**
 * Count video creatives on an advertiser's video-format page.
 *
 * Indicator groups are tried in order and the first group with any match gives
 * the count: <video> elements, YouTube/Vimeo embeds, carousels, then elements
 * whose class or id mentions video, carousel or slider.
 */

import type { DomNode, DomSnapshot } from "../browser/types.js";

type Indicator = (tag: string, attrs: Record<string, string>) => boolean;

const has = (value: string | undefined, needle: string) => (value ?? "").toLowerCase().includes(needle);

const INDICATORS: Indicator[] = [
  (tag) => tag === "video",
  (tag, a) => tag === "iframe" && has(a.src, "youtube"),
  (tag, a) => tag === "iframe" && has(a.src, "vimeo"),
  (tag, a) => tag === "div" && a.role === "region" && has(a["aria-label"], "carousel"),
  (_tag, a) => (a.class ?? "").split(/\s+/).includes("video-container"),
  (tag, a) => tag === "div" && has(a.class, "video"),
  (tag, a) => tag === "div" && has(a.id, "video"),
  (tag, a) => tag === "div" && has(a.class, "carousel"),
  (tag, a) => tag === "div" && has(a.class, "slider"),
];

export function countVideoIndicators(snapshot: DomSnapshot): number {
  if (!snapshot.root) return 0;
  const counts = new Array<number>(INDICATORS.length).fill(0);
  const stack: DomNode[] = [snapshot.root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    const tag = node.tag.toLowerCase();
    INDICATORS.forEach((matches, i) => {
      if (matches(tag, node.attributes)) counts[i] += 1;
    });
    stack.push(...node.children);
  }
  return counts.find((count) => count > 0) ?? 0;
}
