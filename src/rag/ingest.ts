import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { EmbeddingError, NoContentIngestedError, errorMessage } from "../errors.js";
import type { DocumentLoader } from "../loaders/webLoader.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { VectorIndex } from "../retrieval/vectorIndex.js";
import type { EmbeddedPassage } from "../retrieval/types.js";
import { chunkDocuments, type ChunkingOptions } from "./chunker.js";

export type IngestReport = {
  /** URLs as given, before blanks and duplicates are dropped. */
  submitted: number;
  ingestedUrls: string[];
  failedUrls: string[];
  passageCount: number;
};

/** Trimmed, non-blank URLs with duplicates removed, in input order. */
export function normalizeUrls(urls: readonly string[]): string[] {
  return [...new Set(urls.map((u) => u.trim()).filter((u) => u.length > 0))];
}

/**
 * Rebuilds `index` from the given URLs: load, chunk, embed every passage, then
 * one `build` call. Nothing touches the index until all embeddings are in hand,
 * so any failure leaves the previous contents in place.
 */
export async function ingestUrls(params: {
  urls: readonly string[];
  loader: DocumentLoader;
  embeddings: EmbeddingsInterface;
  index: VectorIndex;
  embeddingModel?: string;
  chunking?: ChunkingOptions;
  logger?: Logger;
}): Promise<IngestReport> {
  const logger = params.logger ?? silentLogger;
  const urls = normalizeUrls(params.urls);

  const docs = await params.loader.load(urls);
  const passages = await chunkDocuments(docs, params.chunking);
  if (passages.length === 0) {
    throw new NoContentIngestedError(params.urls.length);
  }

  const ingested = new Set(passages.map((p) => p.sourceUrl));
  const ingestedUrls = urls.filter((u) => ingested.has(u));
  const failedUrls = urls.filter((u) => !ingested.has(u));
  logger.info(
    `chunked ${ingestedUrls.length} of ${urls.length} URL(s) into ${passages.length} passage(s)`
  );

  let vectors: number[][];
  try {
    vectors = await params.embeddings.embedDocuments(passages.map((p) => p.text));
  } catch (err: unknown) {
    throw new EmbeddingError(`Embedding passages failed: ${errorMessage(err)}`, { cause: err });
  }
  if (vectors.length !== passages.length) {
    throw new EmbeddingError(
      `Embedding count mismatch: passages=${passages.length} embeddings=${vectors.length}`
    );
  }
  const emptyAt = vectors.findIndex((v) => v.length === 0);
  if (emptyAt !== -1) {
    throw new EmbeddingError(`Embedding service returned an empty vector for passage ${emptyAt}`);
  }

  const entries: EmbeddedPassage[] = passages.map((passage, i) => ({
    passage,
    vector: vectors[i] ?? []
  }));
  params.index.build(
    entries,
    params.embeddingModel == null ? {} : { embeddingModel: params.embeddingModel }
  );

  return {
    submitted: params.urls.length,
    ingestedUrls,
    failedUrls,
    passageCount: passages.length
  };
}
