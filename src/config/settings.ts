const DEFAULT_SYSTEM_PROMPT = `You are a research assistant answering questions about a small set of web articles.

Rules
- Answer only from the context passages supplied with the question.
- Each passage starts with a "SOURCE:" line naming the URL it came from.
- If the context does not contain the answer, say that you do not know. Do not guess.
- Keep the answer short and factual. Quote figures exactly as they appear.

Output format
- Write the answer first.
- Finish with one line of the form:
  SOURCES: <comma-separated URLs of the passages you used>`;

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 0;
export const DEFAULT_TOP_K = 4;

export type Settings = {
  googleApiKey: string;
  chatModel: string;
  embeddingModel: string;
  indexPath: string;
  systemPrompt: string;
  temperature: number;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  fetchTimeoutMs: number;
};

function readInt(raw: string | undefined, fallback: number, min: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readFloat(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (!googleApiKey) {
    throw new Error("GOOGLE_API_KEY is required");
  }

  const chunkSize = readInt(env.CITESEEK_CHUNK_SIZE, DEFAULT_CHUNK_SIZE, 1);
  const chunkOverlap = readInt(env.CITESEEK_CHUNK_OVERLAP, DEFAULT_CHUNK_OVERLAP, 0);
  if (chunkOverlap >= chunkSize) {
    throw new Error(
      `CITESEEK_CHUNK_OVERLAP (${chunkOverlap}) must be smaller than CITESEEK_CHUNK_SIZE (${chunkSize})`
    );
  }

  return {
    googleApiKey,
    chatModel: env.CITESEEK_GEMINI_MODEL ?? "gemini-2.5-flash",
    embeddingModel: env.CITESEEK_GEMINI_EMBEDDING_MODEL ?? "gemini-embedding-001",
    indexPath: env.CITESEEK_INDEX_PATH ?? ".citeseek/index.json",
    systemPrompt: env.CITESEEK_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    temperature: readFloat(env.CITESEEK_TEMPERATURE, 0.2),
    chunkSize,
    chunkOverlap,
    topK: readInt(env.CITESEEK_TOP_K, DEFAULT_TOP_K, 1),
    fetchTimeoutMs: readInt(env.CITESEEK_FETCH_TIMEOUT_MS, 15_000, 1)
  };
}
