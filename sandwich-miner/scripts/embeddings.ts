import { mapLimit } from "./concurrency";
import { errorForHttpStatus, FatalError, ParseError } from "./errors";
import { isRetryableFailure, withRetry } from "./retry";
import { EmbeddingResponseSchema, parseModelJson } from "./schemas";
import type { EmbeddingService } from "./types";

export interface EmbeddingClientOptions {
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  retries?: number;
  batchSize?: number;
  concurrency?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** OpenAI-compatible `/embeddings` client. */
export function createEmbeddingClient(options: EmbeddingClientOptions = {}): EmbeddingService {
  const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) throw new FatalError("OPENAI_API_KEY is required for embeddings.", "missing_api_key");
  const baseUrl = (options.baseUrl ?? process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  const model = options.model ?? "text-embedding-3-small";
  const batchSize = Math.max(1, options.batchSize ?? 64);

  const embedBatch = async (texts: string[]): Promise<number[][]> => {
    const raw = await withRetry(
      async () => {
        const response = await fetch(`${baseUrl}/embeddings`, {
          method: "POST",
          headers: { Authorization: `Bearer ${apiKey}`, "Content-Type": "application/json" },
          body: JSON.stringify({ model, input: texts }),
        });
        if (!response.ok) {
          const body = await response.text();
          throw errorForHttpStatus(response.status, `Embeddings HTTP ${response.status}: ${body.slice(0, 300)}`);
        }
        return response.text();
      },
      {
        retries: options.retries ?? 2,
        baseDelayMs: 500,
        maxDelayMs: 4000,
        jitter: true,
        sleep: options.sleep,
        retryOn: (err) => isRetryableFailure(err) || err instanceof TypeError,
      },
    );
    const parsed = parseModelJson(raw, EmbeddingResponseSchema, "embeddings");
    if (parsed.data.length !== texts.length) {
      throw new ParseError(
        `embeddings response has ${parsed.data.length} vectors for ${texts.length} inputs`,
        "schema_mismatch",
      );
      }
      return [...parsed.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  };

  return {
    async embed(texts) {
      if (texts.length === 0) return [];
      const batches: string[][] = [];
      for (let i = 0; i < texts.length; i += batchSize) batches.push(texts.slice(i, i + batchSize));
      const results = await mapLimit(batches, options.concurrency ?? 2, (batch) => embedBatch(batch));
      return results.flat();
    },
  };
}

export function candidateConcept(candidate: { bread_top: string; filling: string; bread_bottom: string }): string {
  return `${candidate.bread_top} | ${candidate.filling} | ${candidate.bread_bottom}`;
}
