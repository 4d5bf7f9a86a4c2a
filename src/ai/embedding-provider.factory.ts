import { EnvConfig } from "../config/env";
import { EmbeddingProvider, OpenAiEmbeddingsClient } from "./embeddings.client";
import { HashedTermEmbeddingsProvider } from "./hashed-term-embeddings.provider";

export function createEmbeddingProvider(env: EnvConfig): EmbeddingProvider {
  if (env.embeddingsProvider === "openai") {
    if (!env.openaiApiKey) {
      throw new Error("Missing required environment variable: OPENAI_API_KEY");
    }
    return new OpenAiEmbeddingsClient(env.openaiApiKey, env.openaiEmbeddingModel, env.embeddingsTimeoutMs);
  }
  return new HashedTermEmbeddingsProvider(env.localEmbeddingDimensions);
}
