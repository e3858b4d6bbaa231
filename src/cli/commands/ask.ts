import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Settings } from "../../config/settings.js";
import { GenerationError, IndexUnavailableError } from "../../errors.js";
import { createChatModel } from "../../integrations/gemini/chat.js";
import { createEmbeddings } from "../../integrations/gemini/embeddings.js";
import { RetrievalAnswerEngine, type AnswerResult } from "../../rag/answer.js";
import { ChatModelCompletionService, type CompletionService } from "../../rag/completion.js";
import { loadIndex } from "../../retrieval/indexStore.js";
import { formatAnswer, formatSources } from "../format.js";
import { parseAskArgs } from "../parse.js";

export type AskCommandDeps = {
  embeddings: EmbeddingsInterface;
  completion: CompletionService;
  write: (text: string) => void;
  writeError: (text: string) => void;
};

export function createAskDeps(settings: Settings): AskCommandDeps {
  return {
    embeddings: createEmbeddings(settings),
    completion: new ChatModelCompletionService(createChatModel(settings), settings.systemPrompt),
    write: (text) => process.stdout.write(text),
    writeError: (text) => process.stderr.write(text)
  };
}

export async function runAskCommand(
  args: string[],
  settings: Settings,
  deps: AskCommandDeps = createAskDeps(settings)
): Promise<void> {
  const { question, k } = parseAskArgs(args, settings.topK);

  const index = await loadIndex(settings.indexPath);
  if (index.embeddingModel !== null && index.embeddingModel !== settings.embeddingModel) {
    throw new IndexUnavailableError(
      `Embedding model mismatch.\nIndex: ${index.embeddingModel}\nCurrent: ${settings.embeddingModel}\nRe-run: citeseek ingest <url...>`
    );
  }

  const engine = new RetrievalAnswerEngine({
    index,
    embeddings: deps.embeddings,
    completion: deps.completion,
    defaultK: settings.topK
  });

  let result: AnswerResult;
  try {
    result = await engine.answer(question, k);
  } catch (err: unknown) {
    if (err instanceof GenerationError && err.sources.length > 0) {
      deps.writeError(`Retrieved sources:\n${formatSources(err.sources)}\n`);
    }
    throw err;
  }

  deps.write(formatAnswer(result));
}
