import fetch from "node-fetch";
import { z } from "zod";

export interface EmbeddingProvider {
  readonly name: string;
  createEmbedding(text: string): Promise<number[]>;
}

const embeddingsResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

const MAX_INPUT_CHARS = 6000;
const DEFAULT_TIMEOUT_MS = 15_000;

export class OpenAiEmbeddingsClient implements EmbeddingProvider {
  readonly name = "openai";

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
    private readonly baseUrl: string = "https://api.openai.com/v1",
  ) {}

  async createEmbedding(text: string): Promise<number[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.requestEmbedding(text, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`timeout after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async requestEmbedding(text: string, signal: AbortSignal): Promise<number[]> {
    const response = await fetch(`${this.baseUrl.replace(/\/+$/, "")}/embeddings`, {
      method: "POST",
      signal,
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        input: text.slice(0, MAX_INPUT_CHARS),
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Embeddings API error: HTTP ${response.status} - ${body}`);
    }

    const payload: unknown = await response.json();
    const parsed = embeddingsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error("Embeddings API returned an unexpected payload.");
    }
    const vector = parsed.data.data[0]?.embedding;
    if (!vector || vector.length === 0) {
      throw new Error("Embeddings API returned empty vector.");
    }

    return vector;
  }
}
