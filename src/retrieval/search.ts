import type { EmbeddedPassage, SearchHit } from "./types.js";
import { cosineSimilarity } from "./similarity.js";

/**
 * Ranks entries by cosine similarity to the query vector. The sort is stable,
 * so entries with equal scores keep their insertion order.
 */
export function topKSimilarPassages(params: {
  queryVector: number[];
  entries: readonly EmbeddedPassage[];
  k: number;
}): SearchHit[] {
  if (params.k <= 0 || params.entries.length === 0) return [];

  return params.entries
    .map((entry) => ({
      passage: entry.passage,
      score: cosineSimilarity(params.queryVector, entry.vector)
    }))
    .sort((a, b) => b.score - a.score)
    .slice(0, params.k);
}
