export type CiteseekErrorCode =
  | "E_EMBEDDING"
  | "E_GENERATION"
  | "E_INDEX_UNAVAILABLE"
  | "E_NO_CONTENT"
  | "E_DIMENSION_MISMATCH";

export class CiteseekError extends Error {
  readonly code: CiteseekErrorCode;

  constructor(code: CiteseekErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The embedding service failed while building the index or embedding a question. */
export class EmbeddingError extends CiteseekError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("E_EMBEDDING", message, options);
  }
}

/**
 * Retrieval succeeded but the completion service did not produce an answer.
 * `sources` lists the URLs of the passages that were retrieved for the question.
 */
export class GenerationError extends CiteseekError {
  readonly sources: string[];

  constructor(message: string, sources: string[], options?: { cause?: unknown }) {
    super("E_GENERATION", message, options);
    this.sources = sources;
  }
}

/** A persisted index is missing, unreadable, or was written in an unknown format. */
export class IndexUnavailableError extends CiteseekError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("E_INDEX_UNAVAILABLE", message, options);
  }
}

export class NoContentIngestedError extends CiteseekError {
  readonly submitted: number;

  constructor(submitted: number) {
    super("E_NO_CONTENT", `No usable content from ${submitted} submitted URL(s)`);
    this.submitted = submitted;
  }
}

export class DimensionMismatchError extends CiteseekError {
  constructor(message: string) {
    super("E_DIMENSION_MISMATCH", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
