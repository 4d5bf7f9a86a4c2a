import dotenv from "dotenv";
import { LogLevel, parseLogLevel } from "./logger";

dotenv.config();

export type EmbeddingsProviderKind = "openai" | "local";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  embeddingsProvider: EmbeddingsProviderKind;
  openaiApiKey?: string;
  openaiEmbeddingModel: string;
  embeddingsTimeoutMs: number;
  localEmbeddingDimensions: number;
  matchBlend: number;
  matchMaxSnippets: number;
  matchConcurrency: number;
  matchingConfigDir: string;
}

type Source = Record<string, string | undefined>;

function getOptionalTrimmed(source: Source, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: Source = process.env): EnvConfig {
  const portRaw = getOptionalTrimmed(source, "PORT") ?? "3000";
  const timeoutRaw = getOptionalTrimmed(source, "EMBEDDINGS_TIMEOUT_MS") ?? "15000";
  const dimensionsRaw = getOptionalTrimmed(source, "LOCAL_EMBEDDINGS_DIMENSIONS") ?? "512";
  const blendRaw = getOptionalTrimmed(source, "MATCH_BLEND") ?? "0.7";
  const maxSnippetsRaw = getOptionalTrimmed(source, "MATCH_MAX_SNIPPETS") ?? "2";
  const concurrencyRaw = getOptionalTrimmed(source, "MATCH_CONCURRENCY") ?? "4";
  const logLevelRaw = (getOptionalTrimmed(source, "LOG_LEVEL") ?? "info").toLowerCase();
  const openaiApiKey = getOptionalTrimmed(source, "OPENAI_API_KEY");
  const providerRaw = (
    getOptionalTrimmed(source, "EMBEDDINGS_PROVIDER") ?? (openaiApiKey ? "openai" : "local")
  ).toLowerCase();

  const port = Number(portRaw);
  const embeddingsTimeoutMs = Number(timeoutRaw);
  const localEmbeddingDimensions = Number(dimensionsRaw);
  const matchBlend = Number(blendRaw);
  const matchMaxSnippets = Number(maxSnippetsRaw);
  const matchConcurrency = Number(concurrencyRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(embeddingsTimeoutMs) || embeddingsTimeoutMs < 100) {
    throw new Error(`Invalid EMBEDDINGS_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(localEmbeddingDimensions) || localEmbeddingDimensions < 16) {
    throw new Error(`Invalid LOCAL_EMBEDDINGS_DIMENSIONS value: ${dimensionsRaw}`);
  }
  if (!Number.isFinite(matchBlend) || matchBlend < 0 || matchBlend > 1) {
    throw new Error(`Invalid MATCH_BLEND value: ${blendRaw}. Expected number between 0 and 1.`);
  }
  if (!Number.isInteger(matchMaxSnippets) || matchMaxSnippets < 1) {
    throw new Error(`Invalid MATCH_MAX_SNIPPETS value: ${maxSnippetsRaw}`);
  }
  if (!Number.isInteger(matchConcurrency) || matchConcurrency < 1) {
    throw new Error(`Invalid MATCH_CONCURRENCY value: ${concurrencyRaw}`);
  }

  const embeddingsProvider = parseProvider(providerRaw);
  if (embeddingsProvider === "openai" && !openaiApiKey) {
    throw new Error("Missing required environment variable: OPENAI_API_KEY");
  }

  return {
    nodeEnv: getOptionalTrimmed(source, "NODE_ENV") ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    embeddingsProvider,
    openaiApiKey,
    openaiEmbeddingModel:
      getOptionalTrimmed(source, "OPENAI_EMBEDDINGS_MODEL") ??
      getOptionalTrimmed(source, "OPENAI_EMBEDDING_MODEL") ??
      "text-embedding-3-small",
    embeddingsTimeoutMs,
    localEmbeddingDimensions,
    matchBlend,
    matchMaxSnippets,
    matchConcurrency,
    matchingConfigDir: getOptionalTrimmed(source, "MATCHING_CONFIG_DIR") ?? "config",
  };
}

function parseProvider(value: string): EmbeddingsProviderKind {
  if (value === "openai" || value === "local") {
    return value;
  }
  throw new Error(`Invalid EMBEDDINGS_PROVIDER value: ${value}`);
}
