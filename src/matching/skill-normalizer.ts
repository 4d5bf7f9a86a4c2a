import { AliasMap, SkillCollection } from "../shared/types/domain.types";

// Trailing "+" and "#" are kept: "C++" and "C#" must not collapse into "C".
const LEADING_PUNCTUATION = /^[^a-z0-9.+#]+/;
const TRAILING_PUNCTUATION = /[^a-z0-9+#]+$/;
const COMPACT_SEPARATORS = /[\s\-_./]+/g;

export type SkillNormalizer = (skill: string) => string;

export function cleanSkill(skill: string): string {
  return skill
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim()
    .replace(LEADING_PUNCTUATION, "")
    .replace(TRAILING_PUNCTUATION, "");
}

function compactSkill(cleaned: string): string {
  return cleaned.replace(COMPACT_SEPARATORS, "");
}

export function createSkillNormalizer(aliases: AliasMap = {}): SkillNormalizer {
  const exact = new Map<string, string>();
  const compact = new Map<string, string>();

  for (const [alias, canonical] of Object.entries(aliases).sort(([a], [b]) => compareSkills(a, b))) {
    const key = cleanSkill(alias);
    const target = cleanSkill(canonical);
    if (!key || !target) {
      continue;
    }
    exact.set(key, target);
    const compactKey = compactSkill(key);
    if (compactKey && !compact.has(compactKey)) {
      compact.set(compactKey, target);
    }
  }
  for (const target of Array.from(new Set(exact.values())).sort(compareSkills)) {
    const compactKey = compactSkill(target);
    if (compactKey && !compact.has(compactKey)) {
      compact.set(compactKey, target);
    }
  }

  return (skill: string): string => {
    const cleaned = cleanSkill(skill);
    if (!cleaned) {
      return cleaned;
    }
    return exact.get(cleaned) ?? compact.get(compactSkill(cleaned)) ?? cleaned;
  };
}

export function normalizeSkillSet(skills: SkillCollection, normalize: SkillNormalizer): string[] {
  const canonical = new Set<string>();
  for (const skill of skills) {
    const value = normalize(skill);
    if (value) {
      canonical.add(value);
    }
  }
  return Array.from(canonical).sort(compareSkills);
}

/**
 * Canonical skill ordering used for every rendered skill list.
 * Plain code-unit comparison keeps the order identical across locales.
 */
export function compareSkills(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Inverse of the alias map: canonical skill -> every cleaned phrase that resolves to it,
 * the canonical form first. Used to search raw text for a skill.
 */
export function buildSkillVariants(
  aliases: AliasMap,
  normalize: SkillNormalizer,
): Map<string, string[]> {
  const variants = new Map<string, string[]>();
  for (const alias of Object.keys(aliases).sort(compareSkills)) {
    const phrase = cleanSkill(alias);
    const canonical = normalize(alias);
    if (!phrase || !canonical || phrase === canonical) {
      continue;
    }
    const list = variants.get(canonical) ?? [];
    if (!list.includes(phrase)) {
      list.push(phrase);
    }
    variants.set(canonical, list);
  }
  return variants;
}
