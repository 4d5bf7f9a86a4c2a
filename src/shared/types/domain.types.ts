export type SkillCollection = ReadonlyArray<string> | ReadonlySet<string>;

export interface JobRecord {
  readonly id: string;
  readonly title: string;
  readonly company: string;
  readonly skills: SkillCollection;
  readonly text: string;
}

export interface ResumeRecord {
  readonly text: string;
  readonly sections: Readonly<Record<string, string>>;
  readonly skills_all: SkillCollection;
  readonly skills_section: SkillCollection;
}

export type WeightTable = Readonly<Record<string, number>>;

export type AliasMap = Readonly<Record<string, string>>;
