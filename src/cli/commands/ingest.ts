import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Settings } from "../../config/settings.js";
import { createEmbeddings } from "../../integrations/gemini/embeddings.js";
import { WebDocumentLoader, type DocumentLoader } from "../../loaders/webLoader.js";
import { stderrLogger, type Logger } from "../../logging/logger.js";
import { ingestUrls } from "../../rag/ingest.js";
import { saveIndex } from "../../retrieval/indexStore.js";
import { VectorIndex } from "../../retrieval/vectorIndex.js";
import { formatIngestReport } from "../format.js";

export type IngestCommandDeps = {
  loader: DocumentLoader;
  embeddings: EmbeddingsInterface;
  logger: Logger;
  write: (text: string) => void;
};

export function createIngestDeps(settings: Settings): IngestCommandDeps {
  return {
    loader: new WebDocumentLoader({ timeoutMs: settings.fetchTimeoutMs, logger: stderrLogger }),
    embeddings: createEmbeddings(settings),
    logger: stderrLogger,
    write: (text) => process.stdout.write(text)
  };
}

/** Builds a fresh index and writes it over `settings.indexPath` only once the build succeeded. */
export async function runIngestCommand(
  args: string[],
  settings: Settings,
  deps: IngestCommandDeps = createIngestDeps(settings)
): Promise<void> {
  if (args.length === 0) {
    throw new Error("Usage: citeseek ingest <url...>");
  }

  const index = new VectorIndex();
  const report = await ingestUrls({
    urls: args,
    loader: deps.loader,
    embeddings: deps.embeddings,
    index,
    embeddingModel: settings.embeddingModel,
    chunking: { chunkSize: settings.chunkSize, chunkOverlap: settings.chunkOverlap },
    logger: deps.logger
  });

  await saveIndex(settings.indexPath, index);
  deps.write(formatIngestReport(report, settings.indexPath));
}
