import type { Logger } from "@/lib/pipeline/types";
import { retryWithBackoff, type RetryOptions } from "@/lib/utils/retry";

export type Embedder = (texts: string[]) => Promise<number[][]>;

/**
 * Per-document similarity state. `warm` prepares whatever the scorer needs
 * (embeddings) for a set of texts; `similarity` is then synchronous.
 */
export type SimilarityContext = {
  warm(texts: string[]): Promise<void>;
  similarity(left: string, right: string): number;
  readonly cacheSize: number;
};

export type SimilarityScorer = {
  readonly name: string;
  createContext(logger: Logger): SimilarityContext;
};

type TermVector = Map<string, number>;

export function termVector(text: string): TermVector {
  const vector: TermVector = new Map();

  for (const term of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    vector.set(term, (vector.get(term) ?? 0) + 1);
  }

  return vector;
}

export function termCosine(left: TermVector, right: TermVector): number {
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (const [term, count] of left) {
    leftNorm += count * count;
    dot += count * (right.get(term) ?? 0);
  }

  for (const count of right.values()) {
    rightNorm += count * count;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

export function cosineSimilarity(left: number[], right: number[]): number {
  if (left.length !== right.length || left.length === 0) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

// Scorers are free to return anything; matching only sees values in [0, 1].
export function boundedSimilarity(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.min(1, Math.max(0, value));
}

class LexicalContext implements SimilarityContext {
  private readonly vectors = new Map<string, TermVector>();

  async warm(texts: string[]): Promise<void> {
    for (const text of texts) {
      this.vectorFor(text);
    }
  }

  similarity(left: string, right: string): number {
    return termCosine(this.vectorFor(left), this.vectorFor(right));
  }

  get cacheSize(): number {
    return this.vectors.size;
  }

  private vectorFor(text: string): TermVector {
    const cached = this.vectors.get(text);

    if (cached) {
      return cached;
    }

    const vector = termVector(text);
    this.vectors.set(text, vector);
    return vector;
  }
}

export class LexicalSimilarityScorer implements SimilarityScorer {
  readonly name = "lexical";

  createContext(): SimilarityContext {
    return new LexicalContext();
  }
}

export type EmbeddingSimilarityOptions = {
  embed: Embedder;
  batchSize?: number;
  retry?: RetryOptions;
};

class EmbeddingContext implements SimilarityContext {
  private readonly embeddings = new Map<string, number[]>();
  private readonly lexical = new LexicalContext();
  private readonly embed: Embedder;
  private readonly batchSize: number;
  private readonly retry: RetryOptions | undefined;
  private readonly logger: Logger;
  private failed = false;

  constructor(embed: Embedder, batchSize: number, retry: RetryOptions | undefined, logger: Logger) {
    this.embed = embed;
    this.batchSize = batchSize;
    this.retry = retry;
    this.logger = logger;
  }

  async warm(texts: string[]): Promise<void> {
    if (this.failed) {
      return;
    }

    const pending = Array.from(new Set(texts)).filter((text) => !this.embeddings.has(text));

    for (let start = 0; start < pending.length; start += this.batchSize) {
      const batch = pending.slice(start, start + this.batchSize);

      try {
        const vectors = await retryWithBackoff(() => this.embed(batch), {
          ...this.retry,
          onRetry: ({ attempt, delayMs, error }) => {
            const reason = error instanceof Error ? error.message : "unknown error";
            this.logger(`[similarity] embedding attempt ${attempt} failed (${reason}), retrying in ${delayMs}ms`);
          },
        });

        if (vectors.length !== batch.length) {
          throw new Error(`expected ${batch.length} embeddings, got ${vectors.length}`);
        }

        batch.forEach((text, index) => {
          const vector = vectors[index];

          if (vector) {
            this.embeddings.set(text, vector);
          }
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown embedding error";
        this.logger(`[similarity] embedding failed, falling back to lexical similarity: ${message}`);
        this.failed = true;
        return;
      }
    }
  }

  // Texts that were never embedded are compared lexically.
  similarity(left: string, right: string): number {
    const leftVector = this.failed ? undefined : this.embeddings.get(left);
    const rightVector = this.failed ? undefined : this.embeddings.get(right);

    if (!leftVector || !rightVector) {
      return this.lexical.similarity(left, right);
    }

    return boundedSimilarity(cosineSimilarity(leftVector, rightVector));
  }

  get cacheSize(): number {
    return this.embeddings.size;
  }
}

export class EmbeddingSimilarityScorer implements SimilarityScorer {
  readonly name = "embedding";
  private readonly embed: Embedder;
  private readonly batchSize: number;
  private readonly retry: RetryOptions | undefined;

  constructor(options: EmbeddingSimilarityOptions) {
    this.embed = options.embed;
    this.batchSize = options.batchSize ?? 64;
    this.retry = options.retry;
  }

  createContext(logger: Logger): SimilarityContext {
    return new EmbeddingContext(this.embed, this.batchSize, this.retry, logger);
  }
}
