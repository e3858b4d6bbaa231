import type { Passage } from "../retrieval/types.js";

export function buildContext(passages: Passage[]): string {
  return passages.map((p) => `SOURCE: ${p.sourceUrl}\n${p.text}`).join("\n\n---\n\n");
}

/** Source URLs in first-seen order. */
export function uniqueSources(passages: Passage[]): string[] {
  return [...new Set(passages.map((p) => p.sourceUrl))];
}
