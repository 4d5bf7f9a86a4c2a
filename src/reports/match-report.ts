import { SkillNormalizer, normalizeSkillSet } from "../matching/skill-normalizer";
import { ResumeRecord } from "../shared/types/domain.types";
import { RankingRun, RankingWarning } from "../shared/types/matching.types";

export interface MatchReportEntry {
  rank: number;
  title: string;
  company: string;
  score: number;
  semantic_score: number;
  matched_skills: ReadonlyArray<string>;
  missing_skills: ReadonlyArray<string>;
}

export interface MatchReport {
  generated_at: string;
  resume: {
    skills_used: ReadonlyArray<string>;
  };
  warnings: ReadonlyArray<RankingWarning>;
  results: MatchReportEntry[];
}

export function buildMatchReport(
  resume: ResumeRecord,
  run: RankingRun,
  normalize: SkillNormalizer,
  generatedAt: Date = new Date(),
): MatchReport {
  return {
    generated_at: generatedAt.toISOString(),
    resume: {
      skills_used: normalizeSkillSet(resume.skills_all, normalize),
    },
    warnings: run.warnings,
    results: run.results.map((result, index) => ({
      rank: index + 1,
      title: result.title,
      company: result.company,
      score: result.score,
      semantic_score: result.semantic_score,
      matched_skills: result.matched_skills,
      missing_skills: result.missing_skills,
    })),
  };
}

const MAX_MISSING_SHOWN = 12;

/**
 * Console summary of the best matches, one block per job.
 */
export function formatTopMatches(run: RankingRun, limit = 5): string {
  const blocks = run.results.slice(0, limit).map((result, index) => {
    const missing = result.missing_skills.slice(0, MAX_MISSING_SHOWN).join(", ");
    const more = result.missing_skills.length > MAX_MISSING_SHOWN ? " ..." : "";
    return [
      `${index + 1}) ${result.title} — ${result.company} | score=${result.score} | semantic=${result.semantic_score} (${result.matched_weight}/${result.total_weight})`,
      `   matched: ${result.matched_skills.length > 0 ? result.matched_skills.join(", ") : "None"}`,
      `   missing: ${missing ? `${missing}${more}` : "None"}`,
    ].join("\n");
  });
  return blocks.join("\n\n");
}
