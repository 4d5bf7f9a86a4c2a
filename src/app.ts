import express, { Express, Request, Response } from "express";
import { EmbeddingProvider } from "./ai/embeddings.client";
import { buildErrorMiddleware, notFoundHandler } from "./api/error.middleware";
import { buildMatchController } from "./api/match.controller";
import { EnvConfig } from "./config/env";
import { Logger } from "./config/logger";
import { SkillConfig } from "./config/skill-config";
import { MatchingEngine } from "./matching/matching.engine";

export interface AppDependencies {
  logger: Logger;
  embeddingProvider: EmbeddingProvider;
  skillConfig: SkillConfig;
}

export interface AppContext {
  app: Express;
  engine: MatchingEngine;
  logger: Logger;
}

export function createApp(env: EnvConfig, deps: AppDependencies): AppContext {
  const { logger } = deps;
  const app = express();

  app.use(express.json({ limit: "2mb" }));

  const engine = new MatchingEngine(deps.embeddingProvider, logger);

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, provider: deps.embeddingProvider.name });
  });

  app.use(
    "/api/match",
    buildMatchController({
      engine,
      skillConfig: deps.skillConfig,
      logger,
      defaultBlend: env.matchBlend,
      maxSnippets: env.matchMaxSnippets,
      concurrency: env.matchConcurrency,
    }),
  );

  app.use(notFoundHandler);
  app.use(buildErrorMiddleware(logger));

  return { app, engine, logger };
}
