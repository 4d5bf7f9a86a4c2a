export interface SkillMatch {
  readonly matched: ReadonlyArray<string>;
  readonly missing: ReadonlyArray<string>;
  readonly matchedWeight: number;
  readonly totalWeight: number;
  readonly skillScore: number;
}

export interface SkillEvidence {
  readonly job: ReadonlyArray<string>;
  readonly resume: ReadonlyArray<string>;
}

export interface MatchEvidence {
  readonly job: Readonly<Record<string, ReadonlyArray<string>>>;
  readonly resume: Readonly<Record<string, ReadonlyArray<string>>>;
}

export interface MatchResult {
  readonly title: string;
  readonly company: string;
  readonly score: number;
  readonly semantic_score: number;
  readonly matched_skills: ReadonlyArray<string>;
  readonly missing_skills: ReadonlyArray<string>;
  readonly matched_weight: number;
  readonly total_weight: number;
  readonly evidence: MatchEvidence;
}

export type RankingWarningCode = "embedding_unavailable";

export interface RankingWarning {
  readonly code: RankingWarningCode;
  readonly jobId: string;
  readonly message: string;
}

export interface RankingRun {
  readonly results: ReadonlyArray<MatchResult>;
  readonly warnings: ReadonlyArray<RankingWarning>;
}
