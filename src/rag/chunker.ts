import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "../config/settings.js";
import type { Passage, SourceDocument } from "../retrieval/types.js";

/** Coarsest first: paragraphs, lines, sentences, clauses, words, characters. */
export const PASSAGE_SEPARATORS = ["\n\n", "\n", ".", ",", " ", ""];

export type ChunkingOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
};

export function createSplitter(options: ChunkingOptions = {}): RecursiveCharacterTextSplitter {
  return new RecursiveCharacterTextSplitter({
    chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
    chunkOverlap: options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP,
    separators: PASSAGE_SEPARATORS,
    keepSeparator: true
  });
}

/**
 * Splits every document on its own, so a passage never spans two URLs.
 * Separators stay attached to the piece that follows them; only whitespace at
 * passage edges is trimmed. Documents with no text produce no passages.
 */
export async function chunkDocuments(
  documents: readonly SourceDocument[],
  options: ChunkingOptions = {}
): Promise<Passage[]> {
  const splitter = createSplitter(options);
  const passages: Passage[] = [];

  for (const doc of documents) {
    if (!doc.text.trim()) continue;
    const pieces = await splitter.splitText(doc.text);
    pieces.forEach((text, sequenceIndex) => {
      passages.push({ text, sourceUrl: doc.url, sequenceIndex });
    });
  }

  return passages;
}
