import { ensureEnvLoaded, readEnv, requireEnv } from "@/lib/config/load-env";
import {
  createOpenAiEmbedder,
  DEFAULT_EMBEDDING_MODEL,
  isRetryableOpenAiError,
} from "@/lib/grounding/openai-embedder";
import {
  EmbeddingSimilarityScorer,
  LexicalSimilarityScorer,
  type SimilarityScorer,
} from "@/lib/grounding/similarity";
import { ConfigurationError } from "@/lib/pipeline/errors";

export type SimilarityMode = "lexical" | "embedding" | "none";

export function parseSimilarityMode(value: string): SimilarityMode {
  if (value === "lexical" || value === "embedding" || value === "none") {
    return value;
  }

  throw new ConfigurationError(`Unknown similarity mode "${value}". Use lexical, embedding or none.`);
}

// "none" returns null, which switches the semantic term off.
export function resolveSimilarityScorer(mode: SimilarityMode): SimilarityScorer | null {
  if (mode === "none") {
    return null;
  }

  if (mode === "lexical") {
    return new LexicalSimilarityScorer();
  }

  ensureEnvLoaded();

  const embed = createOpenAiEmbedder({
    apiKey: requireEnv("OPENAI_API_KEY"),
    model: readEnv("OPENAI_EMBEDDING_MODEL") ?? DEFAULT_EMBEDDING_MODEL,
    baseURL: readEnv("OPENAI_BASE_URL"),
  });

  return new EmbeddingSimilarityScorer({ embed, retry: { shouldRetry: isRetryableOpenAiError } });
}
