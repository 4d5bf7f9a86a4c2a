import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { formatIssues, weightTableSchema } from "../matching/record.schemas";
import { ValidationError } from "../shared/errors";
import { AliasMap, WeightTable } from "../shared/types/domain.types";

export const SKILLS_FILE = "skills.json";
export const WEIGHTS_FILE = "skill-weights.json";

const skillsFileSchema = z.object({
  aliases: z.record(z.string().min(1)).default({}),
  strictSkills: z.array(z.string().min(1)).default([]),
});

export interface SkillConfig {
  aliases: AliasMap;
  strictSkills: ReadonlyArray<string>;
  weights: WeightTable;
}

export async function loadSkillConfig(configDir: string): Promise<SkillConfig> {
  const skillsPath = path.resolve(configDir, SKILLS_FILE);
  const weightsPath = path.resolve(configDir, WEIGHTS_FILE);

  const skillsRaw = await readJsonFile(skillsPath);
  const skills = skillsFileSchema.safeParse(skillsRaw);
  if (!skills.success) {
    throw new ValidationError(skillsPath, formatIssues(skills.error));
  }

  const weightsRaw = await readJsonFile(weightsPath);
  const weights = weightTableSchema.safeParse(weightsRaw);
  if (!weights.success) {
    throw new ValidationError(weightsPath, formatIssues(weights.error));
  }

  return {
    aliases: skills.data.aliases,
    strictSkills: skills.data.strictSkills,
    weights: weights.data,
  };
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ValidationError(filePath, [
      `(root): invalid JSON (${error instanceof Error ? error.message : "Unknown error"})`,
    ]);
  }
}
