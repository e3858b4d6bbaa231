import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IndexUnavailableError } from "../errors.js";
import { loadIndex, saveIndex } from "./indexStore.js";
import { VectorIndex } from "./vectorIndex.js";

const A = "https://a.example/article";

describe("indexStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "citeseek-index-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves and loads an index that answers the same searches", async () => {
    const index = new VectorIndex();
    index.build(
      [
        { passage: { text: "first", sourceUrl: A, sequenceIndex: 0 }, vector: [1, 0] },
        { passage: { text: "second", sourceUrl: A, sequenceIndex: 1 }, vector: [0.2, 0.9] }
      ],
      { embeddingModel: "test-embedding" }
    );
    const filePath = path.join(dir, "nested", "index.json");

    await saveIndex(filePath, index);
    const loaded = await loadIndex(filePath);

    expect(loaded.search([0, 1], 2)).toEqual(index.search([0, 1], 2));
    expect(loaded.embeddingModel).toBe("test-embedding");
    expect(await fs.readdir(path.dirname(filePath))).toEqual(["index.json"]);
  });

  it("replaces an existing index file", async () => {
    const filePath = path.join(dir, "index.json");
    const first = new VectorIndex();
    first.build([{ passage: { text: "old", sourceUrl: A, sequenceIndex: 0 }, vector: [1] }]);
    await saveIndex(filePath, first);

    const second = new VectorIndex();
    second.build([{ passage: { text: "new", sourceUrl: A, sequenceIndex: 0 }, vector: [1] }]);
    await saveIndex(filePath, second);

    const loaded = await loadIndex(filePath);
    expect(loaded.search([1], 1)[0]?.passage.text).toBe("new");
  });

  it("reports a missing file as unavailable", async () => {
    await expect(loadIndex(path.join(dir, "missing.json"))).rejects.toBeInstanceOf(
      IndexUnavailableError
    );
  });

  it("reports unparseable content as unavailable", async () => {
    const filePath = path.join(dir, "index.json");
    await fs.writeFile(filePath, "{not json", "utf-8");

    await expect(loadIndex(filePath)).rejects.toThrow(`Index is not valid JSON: ${filePath}`);
  });

  it("reports an unknown version as unavailable", async () => {
    const filePath = path.join(dir, "index.json");
    await fs.writeFile(filePath, JSON.stringify({ format: "citeseek-index", version: 99 }), "utf-8");

    await expect(loadIndex(filePath)).rejects.toBeInstanceOf(IndexUnavailableError);
  });
});
