import OpenAI from "openai";
import type { Embedder } from "@/lib/grounding/similarity";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export type OpenAiEmbedderOptions = {
  apiKey: string;
  model?: string;
  baseURL?: string;
};

export function createOpenAiEmbedder(options: OpenAiEmbedderOptions): Embedder {
  const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  const model = options.model ?? DEFAULT_EMBEDDING_MODEL;

  return async (texts) => {
    if (texts.length === 0) {
      return [];
    }

    const response = await client.embeddings.create({ model, input: texts });

    return [...response.data].sort((left, right) => left.index - right.index).map((item) => item.embedding);
  };
}

// Rate limits, server errors and connection failures (no status) are worth another attempt.
export function isRetryableOpenAiError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError) {
    return error.status === undefined || error.status === 408 || error.status === 429 || error.status >= 500;
  }

  return true;
}
