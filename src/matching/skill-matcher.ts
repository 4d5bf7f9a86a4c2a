import { SkillCollection, WeightTable } from "../shared/types/domain.types";
import { SkillMatch } from "../shared/types/matching.types";
import { SkillNormalizer, compareSkills, normalizeSkillSet } from "./skill-normalizer";

export const DEFAULT_SKILL_WEIGHT = 1.0;

export type WeightLookup = (canonicalSkill: string) => number;

/**
 * Re-keys a weight table by canonical skill. When several raw keys resolve to the same
 * canonical skill the largest weight wins, so the result does not depend on key order.
 */
export function createWeightLookup(weights: WeightTable, normalize: SkillNormalizer): WeightLookup {
  const canonicalWeights = canonicalWeightMap(weights, normalize);
  return (canonicalSkill) => canonicalWeights.get(canonicalSkill) ?? DEFAULT_SKILL_WEIGHT;
}

function canonicalWeightMap(weights: WeightTable, normalize: SkillNormalizer): Map<string, number> {
  const canonicalWeights = new Map<string, number>();
  for (const [skill, weight] of Object.entries(weights)) {
    const canonical = normalize(skill);
    if (!canonical) {
      continue;
    }
    const existing = canonicalWeights.get(canonical);
    canonicalWeights.set(canonical, existing === undefined ? weight : Math.max(existing, weight));
  }
  return canonicalWeights;
}

/**
 * Lays `overrides` over `base` by canonical skill: an override replaces the base weight of
 * every key that normalizes to the same skill, whatever its spelling.
 */
export function mergeWeightTables(
  base: WeightTable,
  overrides: WeightTable,
  normalize: SkillNormalizer,
): Record<string, number> {
  const merged = canonicalWeightMap(base, normalize);
  for (const [skill, weight] of canonicalWeightMap(overrides, normalize)) {
    merged.set(skill, weight);
  }
  return Object.fromEntries(merged);
}

export function matchSkills(
  jobSkills: SkillCollection,
  resumeSkills: SkillCollection,
  weightOf: WeightLookup,
  normalize: SkillNormalizer,
): SkillMatch {
  const job = normalizeSkillSet(jobSkills, normalize);
  const resume = new Set(normalizeSkillSet(resumeSkills, normalize));

  const matched: string[] = [];
  const missing: string[] = [];
  for (const skill of job) {
    if (resume.has(skill)) {
      matched.push(skill);
    } else {
      missing.push(skill);
    }
  }

  // Summed in canonical order so repeated runs give bit-identical floats.
  const totalWeight = sumWeights(job, weightOf);
  const matchedWeight = sumWeights(matched, weightOf);
  const skillScore = totalWeight > 0 ? matchedWeight / totalWeight : 0;

  return {
    matched: matched.sort(compareSkills),
    missing: missing.sort(compareSkills),
    matchedWeight,
    totalWeight,
    skillScore: Math.min(1, Math.max(0, skillScore)),
  };
}

function sumWeights(skills: ReadonlyArray<string>, weightOf: WeightLookup): number {
  let total = 0;
  for (const skill of skills) {
    total += weightOf(skill);
  }
  return total;
}
