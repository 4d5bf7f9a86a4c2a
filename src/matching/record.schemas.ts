import { z } from "zod";
import { ValidationError } from "../shared/errors";
import { JobRecord, ResumeRecord, WeightTable } from "../shared/types/domain.types";

const skillCollectionSchema = z.union([z.array(z.string()), z.set(z.string())]);

export const jobRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  company: z.string(),
  skills: skillCollectionSchema,
  text: z.string(),
});

export const resumeRecordSchema = z.object({
  text: z.string(),
  sections: z.record(z.string()),
  skills_all: skillCollectionSchema,
  skills_section: skillCollectionSchema,
});

export const weightTableSchema = z.record(
  z.number().finite().nonnegative({ message: "weight must be a non-negative number" }),
);

export const blendSchema = z
  .number({ invalid_type_error: "blend must be a number" })
  .finite()
  .min(0, { message: "blend must be between 0 and 1" })
  .max(1, { message: "blend must be between 0 and 1" });

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, target: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(target, formatIssues(result.error));
  }
  return result.data;
}

export function parseJobRecord(value: unknown, target = "job"): JobRecord {
  return parseOrThrow(jobRecordSchema, value, target);
}

export function parseResumeRecord(value: unknown, target = "resume"): ResumeRecord {
  return parseOrThrow(resumeRecordSchema, value, target);
}

export function parseWeightTable(value: unknown, target = "weights"): WeightTable {
  return parseOrThrow(weightTableSchema, value, target);
}

export function parseBlend(value: unknown, target = "blend"): number {
  return parseOrThrow(blendSchema, value, target);
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
