import { EmbeddingProvider } from "./embeddings.client";
import stopWordList from "./stop-words.json";

const DEFAULT_DIMENSIONS = 512;
const TOKEN_PATTERN = /[a-z0-9][a-z0-9+#]*/g;
const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Offline embedding backend: a signed, hashed bag of words with sublinear term frequency.
 * Deterministic for a given dimension, so two runs over the same text produce the same vector.
 */
export class HashedTermEmbeddingsProvider implements EmbeddingProvider {
  readonly name = "local";

  constructor(private readonly dimensions: number = DEFAULT_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new Error(`Invalid embedding dimensions: ${dimensions}`);
    }
  }

  async createEmbedding(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const [term, count] of countTerms(text)) {
      const hash = fnv1a(term);
      const bucket = hash % this.dimensions;
      const sign = (hash >>> 16) & 1 ? -1 : 1;
      vector[bucket] += sign * (1 + Math.log(count));
    }
    return vector;
  }
}

export function tokenize(text: string): string[] {
  const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return tokens.filter((token) => !STOP_WORDS.has(token));
}

function countTerms(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}
