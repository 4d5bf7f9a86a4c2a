import { EmbeddingProvider } from "../ai/embeddings.client";
import { EmbeddingUnavailableError, describeError } from "../shared/errors";

/**
 * Per-run embedding cache keyed by exact text. Entries are written once and never updated;
 * concurrent callers asking for the same text share one in-flight request. A failed request
 * is dropped so the next caller retries it.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, Promise<number[]>>();

  getOrCreate(text: string, create: (text: string) => Promise<number[]>): Promise<number[]> {
    const existing = this.entries.get(text);
    if (existing) {
      return existing;
    }
    const pending = create(text);
    this.entries.set(text, pending);
    pending.catch(() => {
      if (this.entries.get(text) === pending) {
        this.entries.delete(text);
      }
    });
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }
}

export class SemanticScorer {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly cache: EmbeddingCache = new EmbeddingCache(),
  ) {}

  /**
   * Cosine similarity of the two texts' embeddings, rescaled from [-1, 1] to [0, 1].
   * Blank text on either side scores 0 without touching the provider.
   *
   * @throws EmbeddingUnavailableError when the provider fails or returns an unusable vector.
   */
  async similarity(textA: string, textB: string): Promise<number> {
    if (!textA.trim() || !textB.trim()) {
      return 0;
    }

    const [vectorA, vectorB] = await Promise.all([this.embed(textA), this.embed(textB)]);
    if (vectorA.length !== vectorB.length) {
      throw new EmbeddingUnavailableError(
        `Embedding dimension mismatch: ${vectorA.length} vs ${vectorB.length}`,
      );
    }

    return clampUnit((cosineSimilarity(vectorA, vectorB) + 1) / 2);
  }

  private async embed(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.cache.getOrCreate(text, (value) => this.provider.createEmbedding(value));
    } catch (error) {
      throw new EmbeddingUnavailableError(
        `Embedding provider "${this.provider.name}" failed: ${describeError(error)}`,
        { cause: error },
      );
    }
    if (vector.length === 0) {
      throw new EmbeddingUnavailableError(`Embedding provider "${this.provider.name}" returned empty vector`);
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new EmbeddingUnavailableError(
        `Embedding provider "${this.provider.name}" returned non-finite values`,
      );
    }
    return vector;
  }
}

export function cosineSimilarity(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
  const size = Math.min(a.length, b.length);
  if (size === 0) {
    return 0;
  }

  // Components are divided by each vector's largest magnitude so the sums cannot overflow.
  const scaleA = maxMagnitude(a, size);
  const scaleB = maxMagnitude(b, size);
  if (scaleA === 0 || scaleB === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let index = 0; index < size; index += 1) {
    const valueA = a[index] / scaleA;
    const valueB = b[index] / scaleB;
    dot += valueA * valueB;
    normA += valueA * valueA;
    normB += valueB * valueB;
  }

  return dot / Math.sqrt(normA * normB);
}

function maxMagnitude(vector: ReadonlyArray<number>, size: number): number {
  let max = 0;
  for (let index = 0; index < size; index += 1) {
    max = Math.max(max, Math.abs(vector[index]));
  }
  return max;
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
