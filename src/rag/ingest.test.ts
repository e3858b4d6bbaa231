import { describe, expect, it, vi } from "vitest";

import { EmbeddingError, NoContentIngestedError } from "../errors.js";
import { WebDocumentLoader } from "../loaders/webLoader.js";
import { VectorIndex } from "../retrieval/vectorIndex.js";
import { KeywordEmbeddings, captureLogger, pageScraper } from "../testing/fakes.js";
import { ingestUrls, normalizeUrls } from "./ingest.js";

const A = "https://a.example/article";
const B = "https://b.example/post";
const DOWN = "https://down.example/";

const PAGES = {
  [A]: "<p>Alpha paragraph one.</p><p>Beta paragraph two.</p><p>Gamma paragraph three.</p>",
  [B]: "<p>Delta paragraph number four.</p><p>Epsilon paragraph number five.</p>"
};

const VOCABULARY = ["alpha", "beta", "gamma", "delta", "epsilon"];

function setup() {
  const logger = captureLogger();
  const loader = new WebDocumentLoader({ scrape: pageScraper(PAGES), logger });
  const embeddings = new KeywordEmbeddings(VOCABULARY);
  const index = new VectorIndex();
  return { logger, loader, embeddings, index };
}

describe("normalizeUrls", () => {
  it("trims, drops blanks and removes duplicates in order", () => {
    expect(normalizeUrls([` ${B} `, "", A, B, "  "])).toEqual([B, A]);
  });
});

describe("ingestUrls", () => {
  it("indexes every passage of every loaded URL", async () => {
    const { loader, embeddings, index } = setup();

    const report = await ingestUrls({
      urls: [A, B],
      loader,
      embeddings,
      index,
      embeddingModel: "keyword",
      chunking: { chunkSize: 40 }
    });

    expect(report).toEqual({ submitted: 2, ingestedUrls: [A, B], failedUrls: [], passageCount: 5 });
    expect(index.size).toBe(5);
    expect(index.dimension).toBe(VOCABULARY.length);
    expect(index.embeddingModel).toBe("keyword");

    const hits = index.search(embeddings.vectorFor("beta"), 4);
    expect(hits[0]?.passage).toEqual({ text: "Beta paragraph two.", sourceUrl: A, sequenceIndex: 1 });
  });

  it("skips an unreachable URL and indexes the rest", async () => {
    const { logger, loader, embeddings, index } = setup();

    const report = await ingestUrls({
      urls: [DOWN, A],
      loader,
      embeddings,
      index,
      chunking: { chunkSize: 40 }
    });

    expect(report).toEqual({ submitted: 2, ingestedUrls: [A], failedUrls: [DOWN], passageCount: 3 });
    expect(index.size).toBe(3);
    expect(index.search(embeddings.vectorFor("alpha beta gamma"), 10).every((h) => h.passage.sourceUrl === A)).toBe(
      true
    );
    expect(logger.lines).toEqual([`warn: skipped ${DOWN}: connect ECONNREFUSED`]);
  });

  it("logs progress through the given logger", async () => {
    const { loader, embeddings, index } = setup();
    const logger = captureLogger();

    await ingestUrls({ urls: [A, DOWN], loader, embeddings, index, chunking: { chunkSize: 40 }, logger });

    expect(logger.lines).toEqual(["info: chunked 1 of 2 URL(s) into 3 passage(s)"]);
  });

  it("fails with NoContentIngested when no URL yields text and keeps the old index", async () => {
    const { loader, embeddings, index } = setup();
    index.build([{ passage: { text: "kept", sourceUrl: B, sequenceIndex: 0 }, vector: [1, 0, 0, 0, 0] }]);

    const err = await ingestUrls({ urls: [DOWN, "https://gone.example/"], loader, embeddings, index }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(NoContentIngestedError);
    expect(err).toMatchObject({ submitted: 2, code: "E_NO_CONTENT" });
    expect(index.size).toBe(1);
  });

  it("fails with EmbeddingError when the embedding service fails and keeps the old index", async () => {
    const { loader, embeddings, index } = setup();
    index.build([{ passage: { text: "kept", sourceUrl: B, sequenceIndex: 0 }, vector: [1, 0, 0, 0, 0] }]);
    vi.spyOn(embeddings, "embedDocuments").mockRejectedValue(new Error("quota exceeded"));

    await expect(ingestUrls({ urls: [A], loader, embeddings, index })).rejects.toThrow(
      new EmbeddingError("Embedding passages failed: quota exceeded")
    );
    expect(index.size).toBe(1);
    expect(index.search([1, 0, 0, 0, 0], 1)[0]?.passage.text).toBe("kept");
  });

  it("fails with EmbeddingError when the service returns too few vectors", async () => {
    const { loader, embeddings, index } = setup();
    vi.spyOn(embeddings, "embedDocuments").mockResolvedValue([[1, 0, 0, 0, 0]]);

    await expect(
      ingestUrls({ urls: [A], loader, embeddings, index, chunking: { chunkSize: 40 } })
    ).rejects.toBeInstanceOf(EmbeddingError);
    expect(index.size).toBe(0);
  });

  it("fails with EmbeddingError when the service returns empty vectors and keeps the old index", async () => {
    const { loader, embeddings, index } = setup();
    index.build([{ passage: { text: "kept", sourceUrl: B, sequenceIndex: 0 }, vector: [1, 0, 0, 0, 0] }]);
    vi.spyOn(embeddings, "embedDocuments").mockResolvedValue([[0, 1, 0, 0, 0], [], []]);

    await expect(
      ingestUrls({ urls: [A], loader, embeddings, index, chunking: { chunkSize: 40 } })
    ).rejects.toThrow(new EmbeddingError("Embedding service returned an empty vector for passage 1"));
    expect(index.size).toBe(1);
  });

  it("counts submitted URLs before removing duplicates", async () => {
    const { loader, embeddings, index } = setup();

    const report = await ingestUrls({ urls: [A, A, B], loader, embeddings, index, chunking: { chunkSize: 40 } });

    expect(report).toEqual({ submitted: 3, ingestedUrls: [A, B], failedUrls: [], passageCount: 5 });
  });

  it("embeds all passages in a single batch", async () => {
    const { loader, embeddings, index } = setup();
    const spy = vi.spyOn(embeddings, "embedDocuments");

    await ingestUrls({ urls: [A, B], loader, embeddings, index, chunking: { chunkSize: 40 } });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toEqual([
      "Alpha paragraph one.",
      "Beta paragraph two.",
      "Gamma paragraph three.",
      "Delta paragraph number four.",
      "Epsilon paragraph number five."
    ]);
  });
});
