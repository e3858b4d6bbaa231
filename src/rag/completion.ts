import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";

export type Completion = {
  text: string;
  /** URLs the model says it used. Undefined when the reply carries no citation line. */
  citedSources?: string[];
};

export type CompletionService = {
  complete(question: string, context: string): Promise<Completion>;
};

const SOURCES_LINE = /^\s*SOURCES?\s*:(.*)$/i;

/**
 * Splits a reply whose last non-blank line is `SOURCES: a, b` into the answer
 * and the cited URLs. A "Source:" line anywhere else is part of the answer.
 */
export function parseCitedAnswer(raw: string): Completion {
  const lines = raw.trimEnd().split(/\r?\n/);
  const match = SOURCES_LINE.exec(lines[lines.length - 1] ?? "");
  if (match === null) {
    return { text: raw.trim() };
  }

  const citedSources = (match[1] ?? "")
    .split(/[,\s]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  return { text: lines.slice(0, -1).join("\n").trim(), citedSources };
}

export class ChatModelCompletionService implements CompletionService {
  constructor(
    private readonly model: BaseChatModel,
    private readonly systemPrompt: string
  ) {}

  async complete(question: string, context: string): Promise<Completion> {
    const result = await this.model.invoke([
      new SystemMessage(this.systemPrompt),
      new HumanMessage(`Question:\n${question}\n\nContext:\n${context}`)
    ]);
    return parseCitedAnswer(result.text);
  }
}
