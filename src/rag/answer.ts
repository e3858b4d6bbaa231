import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { DEFAULT_TOP_K } from "../config/settings.js";
import { EmbeddingError, GenerationError, errorMessage } from "../errors.js";
import type { VectorIndex } from "../retrieval/vectorIndex.js";
import type { Completion, CompletionService } from "./completion.js";
import { buildContext, uniqueSources } from "./context.js";

export const INSUFFICIENT_INFORMATION_ANSWER =
  "I don't have enough information from the ingested articles to answer that question.";

export type AnswerResult = {
  answer: string;
  /** Supporting URLs, deduplicated, in the order they first appear among the ranked passages. */
  sources: string[];
};

export class RetrievalAnswerEngine {
  private readonly index: VectorIndex;
  private readonly embeddings: EmbeddingsInterface;
  private readonly completion: CompletionService;
  private readonly defaultK: number;

  constructor(params: {
    index: VectorIndex;
    embeddings: EmbeddingsInterface;
    completion: CompletionService;
    defaultK?: number;
  }) {
    this.index = params.index;
    this.embeddings = params.embeddings;
    this.completion = params.completion;
    this.defaultK = params.defaultK ?? DEFAULT_TOP_K;
  }

  async answer(question: string, k: number = this.defaultK): Promise<AnswerResult> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new Error("Question must not be empty");
    }

    let queryVector: number[];
    try {
      queryVector = await this.embeddings.embedQuery(trimmed);
    } catch (err: unknown) {
      throw new EmbeddingError(`Embedding question failed: ${errorMessage(err)}`, { cause: err });
    }
    if (queryVector.length === 0) {
      throw new EmbeddingError("Embedding service returned an empty vector for the question");
    }

    const hits = this.index.search(queryVector, k);
    if (hits.length === 0) {
      return { answer: INSUFFICIENT_INFORMATION_ANSWER, sources: [] };
    }

    const passages = hits.map((h) => h.passage);
    const retrievedSources = uniqueSources(passages);

    let completion: Completion;
    try {
      completion = await this.completion.complete(trimmed, buildContext(passages));
    } catch (err: unknown) {
      throw new GenerationError(
        `Answer generation failed: ${errorMessage(err)}`,
        retrievedSources,
        { cause: err }
      );
    }

    return {
      answer: completion.text,
      sources: attributeSources(retrievedSources, completion.citedSources)
    };
  }
}

/**
 * Narrows the retrieved URLs to those the model cited. Citations naming no
 * retrieved URL are ignored and every retrieved URL is kept.
 */
export function attributeSources(retrieved: string[], cited: string[] | undefined): string[] {
  if (cited === undefined) return retrieved;
  const citedSet = new Set(cited);
  const kept = retrieved.filter((url) => citedSet.has(url));
  return kept.length > 0 ? kept : retrieved;
}
