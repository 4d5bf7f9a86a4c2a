import { NextFunction, Request, Response, Router } from "express";
import { z } from "zod";
import { SkillConfig } from "../config/skill-config";
import { Logger } from "../config/logger";
import { MatchingEngine } from "../matching/matching.engine";
import { formatIssues, parseJobRecord, parseResumeRecord } from "../matching/record.schemas";
import { mergeWeightTables } from "../matching/skill-matcher";
import { createSkillNormalizer } from "../matching/skill-normalizer";
import { ValidationError } from "../shared/errors";

interface MatchControllerDeps {
  engine: MatchingEngine;
  skillConfig: SkillConfig;
  logger: Logger;
  defaultBlend: number;
  maxSnippets: number;
  concurrency: number;
}

const matchRequestSchema = z.object({
  resume: z.unknown(),
  jobs: z.array(z.unknown()),
  weights: z.record(z.number()).optional(),
  blend: z.number().optional(),
});

export function buildMatchController(deps: MatchControllerDeps): Router {
  const router = Router();
  const normalize = createSkillNormalizer(deps.skillConfig.aliases);

  router.post("/", async (request: Request, response: Response, next: NextFunction) => {
    const parsed = matchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      next(new ValidationError("request", formatIssues(parsed.error)));
      return;
    }

    const body = parsed.data;
    try {
      const resume = parseResumeRecord(body.resume);
      const jobs = body.jobs.map((job, index) => parseJobRecord(job, `jobs[${index}]`));
      const run = await deps.engine.rank(resume, jobs, {
        weights: mergeWeightTables(deps.skillConfig.weights, body.weights ?? {}, normalize),
        blend: body.blend ?? deps.defaultBlend,
        aliases: deps.skillConfig.aliases,
        strictSkills: deps.skillConfig.strictSkills,
        maxSnippets: deps.maxSnippets,
        concurrency: deps.concurrency,
      });
      deps.logger.info("Match request served", {
        route: "/api/match",
        jobCount: jobs.length,
        warnings: run.warnings.length,
      });
      response.status(200).json(run);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
