import { GoogleGenAI } from "@google/genai";

export type TaskType = "RETRIEVAL_DOCUMENT" | "RETRIEVAL_QUERY";

export interface EmbeddingClient {
  ai: GoogleGenAI;
  model: string;
  dimensions: number;
}

/** text -> fixed-length vector; the pipeline only sees this contract */
export interface Embedder {
  embed(text: string, taskType: TaskType): Promise<number[]>;
}

export interface HealthCheckResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

const MAX_RETRIES = 3;
const INITIAL_DELAY_MS = 1000;
const BACKOFF_FACTOR = 2;

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    if (typeof status === "number") return status;
  }
  return undefined;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof Error) {
    const msg = error.message;
    if (msg.includes("429") || msg.includes("rate limit")) return true;
    if (/5\d{2}/.test(msg)) return true;
  }
  const status = statusOf(error);
  if (status !== undefined) {
    if (status === 429 || (status >= 500 && status < 600)) return true;
  }
  return false;
}

async function withRetry<T>(fn: () => Promise<T>): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === MAX_RETRIES || !isRetryable(error)) throw error;
      const delay = INITIAL_DELAY_MS * BACKOFF_FACTOR ** attempt;
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw lastError;
}

export function createEmbeddingClient(
  apiKey: string,
  options?: { model?: string; dimensions?: number },
): EmbeddingClient {
  const ai = new GoogleGenAI({ apiKey });
  return {
    ai,
    model: options?.model ?? "gemini-embedding-001",
    dimensions: options?.dimensions ?? 768,
  };
}

export async function embedText(
  client: EmbeddingClient,
  text: string,
  taskType: TaskType,
): Promise<number[]> {
  const response = await withRetry(() =>
    client.ai.models.embedContent({
      model: client.model,
      contents: text,
      config: {
        outputDimensionality: client.dimensions,
        taskType,
      },
    }),
  );

  const values = response.embeddings?.[0]?.values;
  if (!values) {
    throw new Error("Embedding response missing values");
  }
  return values;
}

export function createGeminiEmbedder(client: EmbeddingClient): Embedder {
  return {
    embed: (text, taskType) => embedText(client, text, taskType),
  };
}

export async function embeddingHealthCheck(
  embedder: Embedder,
): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    await embedder.embed("health check", "RETRIEVAL_QUERY");
    return { ok: true, latencyMs: Date.now() - start };
  } catch (error) {
    return {
      ok: false,
      latencyMs: Date.now() - start,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
