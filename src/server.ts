import { createEmbeddingProvider } from "./ai/embedding-provider.factory";
import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { createLogger } from "./config/logger";
import { loadSkillConfig } from "./config/skill-config";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const skillConfig = await loadSkillConfig(env.matchingConfigDir);
  const embeddingProvider = createEmbeddingProvider(env);
  const { app } = createApp(env, { logger, embeddingProvider, skillConfig });

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("Embeddings provider", {
      provider: embeddingProvider.name,
      model_name: env.embeddingsProvider === "openai" ? env.openaiEmbeddingModel : undefined,
    });
    logger.info("Matching config loaded", {
      aliases: Object.keys(skillConfig.aliases).length,
      weights: Object.keys(skillConfig.weights).length,
      blend: env.matchBlend,
    });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
