export type SourceDocument = {
  url: string;
  text: string;
};

export type Passage = {
  text: string;
  sourceUrl: string;
  /** 0-based position of the passage within its source document. */
  sequenceIndex: number;
};

export type EmbeddedPassage = {
  passage: Passage;
  vector: number[];
};

export type SearchHit = {
  passage: Passage;
  score: number;
};

export const INDEX_FORMAT = "citeseek-index";
export const INDEX_VERSION = 1;

export type StoredPassage = {
  id: string;
  sourceUrl: string;
  sequenceIndex: number;
  text: string;
  embedding: number[];
};

export type StoredIndex = {
  format: typeof INDEX_FORMAT;
  version: typeof INDEX_VERSION;
  embeddingModel: string | null;
  embeddingDimension: number;
  passages: StoredPassage[];
};
