import { JobRecord, ResumeRecord } from "../shared/types/domain.types";
import { SkillEvidence } from "../shared/types/matching.types";
import { SkillNormalizer, cleanSkill } from "./skill-normalizer";

export const DEFAULT_MAX_SNIPPETS = 2;
export const DEFAULT_MAX_SNIPPET_CHARS = 240;
export const DEFAULT_STRICT_SKILLS: ReadonlyArray<string> = ["c", "c++", "c#", "go", "sql", "r"];

const SKILLS_SECTION_NAMES: ReadonlySet<string> = new Set([
  "skills",
  "technical skills",
  "technologies",
  "tech stack",
  "skill set",
]);
const SHORT_NEEDLE_MAX_CHARS = 3;

export interface EvidenceOptions {
  maxSnippets?: number;
  maxSnippetChars?: number;
  strictSkills?: ReadonlyArray<string>;
}

interface Needle {
  phrase: string;
  pattern?: RegExp;
}

/**
 * Locates text supporting a matched skill. One builder serves a whole ranking run: text
 * segmentation and skill patterns are memoized, since the resume is searched once per job.
 */
export class EvidenceBuilder {
  private readonly maxSnippets: number;
  private readonly maxSnippetChars: number;
  private readonly strictSkills: ReadonlySet<string>;
  private readonly segmentCache = new Map<string, string[]>();
  private readonly needleCache = new Map<string, Needle[]>();

  constructor(
    private readonly normalize: SkillNormalizer,
    private readonly variants: ReadonlyMap<string, ReadonlyArray<string>> = new Map(),
    options: EvidenceOptions = {},
  ) {
    this.maxSnippets = Math.max(1, Math.floor(options.maxSnippets ?? DEFAULT_MAX_SNIPPETS));
    this.maxSnippetChars = Math.max(16, Math.floor(options.maxSnippetChars ?? DEFAULT_MAX_SNIPPET_CHARS));
    this.strictSkills = new Set(
      (options.strictSkills ?? DEFAULT_STRICT_SKILLS).map((skill) => cleanSkill(skill)),
    );
  }

  evidenceFor(skill: string, job: JobRecord, resume: ResumeRecord): SkillEvidence {
    const canonical = this.normalize(skill);
    const needles = this.needlesFor(canonical);

    const jobSnippets = this.findSnippets(job.text, needles, this.maxSnippets);

    const skillsSection = findSkillsSection(resume.sections);
    const sources = skillsSection !== undefined && this.prefersSkillsSection(canonical, resume)
      ? [skillsSection, resume.text]
      : [resume.text, skillsSection ?? ""];

    const resumeSnippets: string[] = [];
    for (const source of sources) {
      const remaining = this.maxSnippets - resumeSnippets.length;
      if (remaining <= 0) {
        break;
      }
      for (const snippet of this.findSnippets(source, needles, this.maxSnippets)) {
        if (resumeSnippets.length >= this.maxSnippets) {
          break;
        }
        if (!resumeSnippets.includes(snippet)) {
          resumeSnippets.push(snippet);
        }
      }
    }

    return { job: jobSnippets, resume: resumeSnippets };
  }

  private prefersSkillsSection(canonical: string, resume: ResumeRecord): boolean {
    let listed = 0;
    for (const entry of resume.skills_section) {
      listed += 1;
      if (this.normalize(entry) === canonical) {
        return true;
      }
    }
    return listed === 0;
  }

  private findSnippets(text: string, needles: ReadonlyArray<Needle>, limit: number): string[] {
    if (!text.trim() || needles.length === 0) {
      return [];
    }
    const snippets: string[] = [];
    for (const segment of this.segmentsOf(text)) {
      const lower = segment.toLowerCase();
      const hit = needles.some((needle) =>
        needle.pattern ? needle.pattern.test(lower) : lower.includes(needle.phrase),
      );
      if (!hit) {
        continue;
      }
      const snippet = truncate(segment, this.maxSnippetChars);
      if (!snippets.includes(snippet)) {
        snippets.push(snippet);
      }
      if (snippets.length >= limit) {
        break;
      }
    }
    return snippets;
  }

  private segmentsOf(text: string): string[] {
    const cached = this.segmentCache.get(text);
    if (cached) {
      return cached;
    }
    const segments = splitSegments(text);
    this.segmentCache.set(text, segments);
    return segments;
  }

  private needlesFor(canonical: string): Needle[] {
    const cached = this.needleCache.get(canonical);
    if (cached) {
      return cached;
    }
    const phrases = [canonical, ...(this.variants.get(canonical) ?? [])].filter(
      (phrase, index, all) => phrase.length > 0 && all.indexOf(phrase) === index,
    );
    const needles = phrases.map((phrase): Needle => {
      const strict = phrase.length <= SHORT_NEEDLE_MAX_CHARS || this.strictSkills.has(phrase);
      return strict
        ? { phrase, pattern: new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase)}(?![a-z0-9+#])`) }
        : { phrase };
    });
    this.needleCache.set(canonical, needles);
    return needles;
  }
}

/**
 * Lines, then sentences within each line, with inner whitespace collapsed.
 */
export function splitSegments(text: string): string[] {
  const segments: string[] = [];
  for (const line of text.replace(/&nbsp;/g, " ").split(/\r\n|\r|\n/)) {
    for (const sentence of line.split(/(?<=[.!?])\s+/)) {
      const segment = sentence.replace(/\s+/g, " ").trim();
      if (segment) {
        segments.push(segment);
      }
    }
  }
  return segments;
}

function findSkillsSection(sections: Readonly<Record<string, string>>): string | undefined {
  for (const name of Object.keys(sections).sort()) {
    if (SKILLS_SECTION_NAMES.has(name.trim().toLowerCase().replace(/\s+/g, " "))) {
      const text = sections[name];
      if (text && text.trim()) {
        return text;
      }
    }
  }
  return undefined;
}

function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars - 3)}...`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
