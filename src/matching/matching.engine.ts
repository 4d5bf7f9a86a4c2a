import { EmbeddingProvider } from "../ai/embeddings.client";
import { Logger, logContext } from "../config/logger";
import { EmbeddingUnavailableError, ValidationError } from "../shared/errors";
import { AliasMap, JobRecord, ResumeRecord, WeightTable } from "../shared/types/domain.types";
import {
  MatchEvidence,
  MatchResult,
  RankingRun,
  RankingWarning,
  SkillMatch,
} from "../shared/types/matching.types";
import { mapWithConcurrency } from "../shared/utils/concurrency";
import { EvidenceBuilder } from "./evidence.builder";
import { parseBlend, parseJobRecord, parseResumeRecord, parseWeightTable } from "./record.schemas";
import { EmbeddingCache, SemanticScorer } from "./semantic.scorer";
import { createWeightLookup, matchSkills } from "./skill-matcher";
import { buildSkillVariants, createSkillNormalizer } from "./skill-normalizer";

export const DEFAULT_CONCURRENCY = 4;
const SCORE_DECIMALS = 3;
const WEIGHT_DECIMALS = 2;

export interface MatchingConfig {
  weights: WeightTable;
  blend: number;
  aliases?: AliasMap;
  strictSkills?: ReadonlyArray<string>;
  maxSnippets?: number;
  maxSnippetChars?: number;
  concurrency?: number;
}

interface ScoredJob {
  index: number;
  result: MatchResult;
  warning?: RankingWarning;
}

export class MatchingEngine {
  constructor(
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly logger: Logger,
  ) {}

  /**
   * Scores every job against the resume and returns them best first.
   * Records are validated up front; an embedding failure only zeroes that job's semantic score.
   */
  async rank(
    resume: ResumeRecord,
    jobs: ReadonlyArray<JobRecord>,
    config: MatchingConfig,
  ): Promise<RankingRun> {
    const startedAt = Date.now();
    const validResume = parseResumeRecord(resume);
    const jobList: unknown = jobs;
    if (!Array.isArray(jobList)) {
      throw new ValidationError("jobs", ["(root): expected an array of job records"]);
    }
    const validJobs = jobList.map((job: unknown, index: number) => parseJobRecord(job, `jobs[${index}]`));
    const weights = parseWeightTable(config.weights);
    const blend = parseBlend(config.blend);

    const aliases = config.aliases ?? {};
    const normalize = createSkillNormalizer(aliases);
    const weightOf = createWeightLookup(weights, normalize);
    const scorer = new SemanticScorer(this.embeddingProvider, new EmbeddingCache());
    const evidenceBuilder = new EvidenceBuilder(normalize, buildSkillVariants(aliases, normalize), {
      maxSnippets: config.maxSnippets,
      maxSnippetChars: config.maxSnippetChars,
      strictSkills: config.strictSkills,
    });

    const scored = await mapWithConcurrency(
      validJobs,
      config.concurrency ?? DEFAULT_CONCURRENCY,
      async (job, index): Promise<ScoredJob> => {
        const skillMatch = matchSkills(job.skills, validResume.skills_all, weightOf, normalize);

        let semanticScore = 0;
        let warning: RankingWarning | undefined;
        try {
          semanticScore = await scorer.similarity(job.text, validResume.text);
        } catch (error) {
          if (!(error instanceof EmbeddingUnavailableError)) {
            throw error;
          }
          warning = { code: "embedding_unavailable", jobId: job.id, message: error.message };
          logContext(
            this.logger,
            "warn",
            "Semantic scoring unavailable, using zero semantic score",
            {
              action: "matching.semantic",
              job_id: job.id,
              provider: this.embeddingProvider.name,
              ok: false,
              error_code: error.code,
            },
            { error: error.message },
          );
        }

        const evidence = buildEvidence(skillMatch, job, validResume, evidenceBuilder);
        return {
          index,
          result: assembleResult(job, skillMatch, semanticScore, blend, evidence),
          warning,
        };
      },
    );

    const ordered = [...scored].sort(compareScoredJobs);
    const warnings = scored
      .map((entry) => entry.warning)
      .filter((entry): entry is RankingWarning => entry !== undefined);

    logContext(
      this.logger,
      "info",
      "Ranking completed",
      {
        action: "matching.rank",
        job_count: validJobs.length,
        latency_ms: Date.now() - startedAt,
        ok: warnings.length === 0,
      },
      { warnings: warnings.length },
    );

    return {
      results: ordered.map((entry) => entry.result),
      warnings,
    };
  }
}

function buildEvidence(
  skillMatch: SkillMatch,
  job: JobRecord,
  resume: ResumeRecord,
  evidenceBuilder: EvidenceBuilder,
): MatchEvidence {
  const jobEvidence: Record<string, ReadonlyArray<string>> = {};
  const resumeEvidence: Record<string, ReadonlyArray<string>> = {};
  for (const skill of skillMatch.matched) {
    const found = evidenceBuilder.evidenceFor(skill, job, resume);
    jobEvidence[skill] = found.job;
    resumeEvidence[skill] = found.resume;
  }
  return { job: jobEvidence, resume: resumeEvidence };
}

export function blendScores(skillScore: number, semanticScore: number, blend: number): number {
  const blended = blend * skillScore + (1 - blend) * semanticScore;
  return Math.min(1, Math.max(0, blended));
}

function assembleResult(
  job: JobRecord,
  skillMatch: SkillMatch,
  semanticScore: number,
  blend: number,
  evidence: MatchEvidence,
): MatchResult {
  return {
    title: job.title,
    company: job.company,
    score: roundTo(blendScores(skillMatch.skillScore, semanticScore, blend), SCORE_DECIMALS),
    semantic_score: roundTo(semanticScore, SCORE_DECIMALS),
    matched_skills: [...skillMatch.matched],
    missing_skills: [...skillMatch.missing],
    matched_weight: roundTo(skillMatch.matchedWeight, WEIGHT_DECIMALS),
    total_weight: roundTo(skillMatch.totalWeight, WEIGHT_DECIMALS),
    evidence,
  };
}

function compareScoredJobs(a: ScoredJob, b: ScoredJob): number {
  return (
    b.result.score - a.result.score ||
    b.result.total_weight - a.result.total_weight ||
    compareText(a.result.title, b.result.title) ||
    compareText(a.result.company, b.result.company) ||
    a.index - b.index
  );
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
