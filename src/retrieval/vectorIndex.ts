import crypto from "node:crypto";

import { z } from "zod";

import { DimensionMismatchError, IndexUnavailableError } from "../errors.js";
import { topKSimilarPassages } from "./search.js";
import {
  INDEX_FORMAT,
  INDEX_VERSION,
  type EmbeddedPassage,
  type SearchHit,
  type StoredIndex
} from "./types.js";

const storedPassageSchema = z.object({
  id: z.string(),
  sourceUrl: z.string().min(1),
  sequenceIndex: z.number().int().nonnegative(),
  text: z.string(),
  embedding: z.array(z.number())
});

const storedIndexSchema = z.object({
  format: z.literal(INDEX_FORMAT),
  version: z.literal(INDEX_VERSION),
  embeddingModel: z.string().nullable(),
  embeddingDimension: z.number().int().nonnegative(),
  passages: z.array(storedPassageSchema)
});

type IndexState = {
  embeddingModel: string | null;
  dimension: number;
  entries: readonly EmbeddedPassage[];
};

const EMPTY_STATE: IndexState = { embeddingModel: null, dimension: 0, entries: [] };

function passageId(entry: EmbeddedPassage): string {
  const { sourceUrl, sequenceIndex, text } = entry.passage;
  return crypto
    .createHash("sha256")
    .update(`${sourceUrl}\n${sequenceIndex}\n${text}`)
    .digest("hex");
}

function freezeEntries(entries: readonly EmbeddedPassage[]): readonly EmbeddedPassage[] {
  return Object.freeze(
    entries.map((e) =>
      Object.freeze({
        passage: Object.freeze({ ...e.passage }),
        vector: [...e.vector]
      })
    )
  );
}

/**
 * In-memory nearest-neighbour index over embedded passages.
 *
 * An index is an explicit handle: callers create one, build it, and pass it to
 * whatever answers questions. `build` swaps the whole contents in one
 * assignment after validation, so a failed build leaves the previous contents
 * searchable. Searches only read the current state.
 */
export class VectorIndex {
  private state: IndexState = EMPTY_STATE;

  get size(): number {
    return this.state.entries.length;
  }

  get dimension(): number {
    return this.state.dimension;
  }

  get embeddingModel(): string | null {
    return this.state.embeddingModel;
  }

  build(entries: readonly EmbeddedPassage[], options: { embeddingModel?: string } = {}): void {
    const dimension = entries[0]?.vector.length ?? 0;
    if (entries.length > 0 && dimension <= 0) {
      throw new DimensionMismatchError(`Embedding dimension invalid (${dimension})`);
    }
    for (let i = 0; i < entries.length; i += 1) {
      const dim = entries[i]?.vector.length ?? 0;
      if (dim !== dimension) {
        throw new DimensionMismatchError(
          `Embedding dimension mismatch at passage ${i}: expected=${dimension} actual=${dim}`
        );
      }
    }

    this.state = {
      embeddingModel: options.embeddingModel ?? null,
      dimension,
      entries: freezeEntries(entries)
    };
  }

  search(queryVector: number[], k: number): SearchHit[] {
    const { entries, dimension } = this.state;
    if (entries.length === 0 || k <= 0) return [];
    if (queryVector.length !== dimension) {
      throw new DimensionMismatchError(
        `Embedding dimension mismatch.\nIndex: ${dimension}\nQuery: ${queryVector.length}`
      );
    }
    return topKSimilarPassages({ queryVector, entries, k });
  }

  serialize(): StoredIndex {
    const { embeddingModel, dimension, entries } = this.state;
    return {
      format: INDEX_FORMAT,
      version: INDEX_VERSION,
      embeddingModel,
      embeddingDimension: dimension,
      passages: entries.map((entry) => ({
        id: passageId(entry),
        sourceUrl: entry.passage.sourceUrl,
        sequenceIndex: entry.passage.sequenceIndex,
        text: entry.passage.text,
        embedding: [...entry.vector]
      }))
    };
  }

  static restore(blob: unknown): VectorIndex {
    if (blob && typeof blob === "object" && "version" in blob && blob.version !== INDEX_VERSION) {
      throw new IndexUnavailableError(`Unsupported index version: ${String(blob.version)}`);
    }

    const parsed = storedIndexSchema.safeParse(blob);
    if (!parsed.success) {
      throw new IndexUnavailableError(
        `Index is corrupt: ${parsed.error.issues[0]?.message ?? "invalid structure"}`,
        { cause: parsed.error }
      );
    }

    const stored = parsed.data;
    const entries: EmbeddedPassage[] = stored.passages.map((p) => ({
      passage: { text: p.text, sourceUrl: p.sourceUrl, sequenceIndex: p.sequenceIndex },
      vector: p.embedding
    }));

    const index = new VectorIndex();
    try {
      index.build(entries, stored.embeddingModel == null ? {} : { embeddingModel: stored.embeddingModel });
    } catch (err: unknown) {
      throw new IndexUnavailableError("Index is corrupt: inconsistent embedding dimensions", {
        cause: err
      });
    }
    if (entries.length > 0 && index.dimension !== stored.embeddingDimension) {
      throw new IndexUnavailableError(
        `Index is corrupt: declared dimension ${stored.embeddingDimension}, stored vectors have ${index.dimension}`
      );
    }
    return index;
  }
}
