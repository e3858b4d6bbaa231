import type { AnswerResult } from "../rag/answer.js";
import type { IngestReport } from "../rag/ingest.js";

export function formatSources(sources: string[]): string {
  return sources.map((url) => `- ${url}`).join("\n");
}

export function formatAnswer(result: AnswerResult): string {
  if (result.sources.length === 0) {
    return `${result.answer}\n`;
  }
  return `${result.answer}\n\nSources:\n${formatSources(result.sources)}\n`;
}

export function formatIngestReport(report: IngestReport, indexPath: string): string {
  return `Ingested ${report.ingestedUrls.length} of ${report.submitted} URLs (${report.passageCount} passages) -> ${indexPath}\n`;
}
