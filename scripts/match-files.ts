#!/usr/bin/env node
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { createEmbeddingProvider } from "../src/ai/embedding-provider.factory";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { loadSkillConfig, readJsonFile } from "../src/config/skill-config";
import { MatchingEngine } from "../src/matching/matching.engine";
import { parseJobRecord, parseResumeRecord } from "../src/matching/record.schemas";
import { createSkillNormalizer } from "../src/matching/skill-normalizer";
import { buildMatchReport, formatTopMatches } from "../src/reports/match-report";
import { ValidationError } from "../src/shared/errors";

const DEFAULT_JOBS_PATH = "data/structured_jobs.json";
const DEFAULT_RESUME_PATH = "data/resume_structured.json";
const DEFAULT_REPORT_PATH = "data/match_report.json";

async function run(): Promise<void> {
  const [jobsPath = DEFAULT_JOBS_PATH, resumePath = DEFAULT_RESUME_PATH, reportPath = DEFAULT_REPORT_PATH] =
    process.argv.slice(2);

  const env = loadEnv();
  // stdout carries only the match summary
  const logger = createLogger({ minLevel: env.logLevel, write: (line) => process.stderr.write(line) });
  const skillConfig = await loadSkillConfig(env.matchingConfigDir);

  const jobsRaw = await readJsonFile(path.resolve(jobsPath));
  if (!Array.isArray(jobsRaw)) {
    throw new ValidationError(jobsPath, ["(root): expected an array of job records"]);
  }
  const jobs = jobsRaw.map((job: unknown, index: number) => parseJobRecord(job, `${jobsPath}[${index}]`));
  const resume = parseResumeRecord(await readJsonFile(path.resolve(resumePath)), resumePath);

  const engine = new MatchingEngine(createEmbeddingProvider(env), logger);
  const ranking = await engine.rank(resume, jobs, {
    weights: skillConfig.weights,
    blend: env.matchBlend,
    aliases: skillConfig.aliases,
    strictSkills: skillConfig.strictSkills,
    maxSnippets: env.matchMaxSnippets,
    concurrency: env.matchConcurrency,
  });

  process.stdout.write(`\nTop 5 job matches:\n\n${formatTopMatches(ranking, 5)}\n\n`);

  const report = buildMatchReport(resume, ranking, createSkillNormalizer(skillConfig.aliases));
  await writeFile(path.resolve(reportPath), `${JSON.stringify(report, null, 2)}\n`, "utf8");
  logger.info("Match report written", { path: reportPath, results: report.results.length });
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`match-files failed: ${message}\n`);
  process.exitCode = 1;
});
