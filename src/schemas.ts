import { z } from "zod";
import { OrchestratorConfigSchema } from "./config.js";
import { ParseError } from "./errors.js";
import type { JsonValue } from "./planner/types.js";

/** Finite numbers only: JSON has no NaN or Infinity. */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number().finite(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const AnalysisTypeSchema = z.enum(["full", "screening"]);

/** Parameters accepted by the planner. Unset thresholds fall back to the current config. */
export const RunParametersSchema = z
  .object({
    analysis: AnalysisTypeSchema.default("full"),
    inputVcf: z
      .string()
      .min(1)
      .refine((p) => /\.vcf(\.gz)?$/i.test(p), "must point to a .vcf or .vcf.gz file"),
    outputDir: z.string().min(1),
    sampleName: z
      .string()
      .regex(/^[A-Za-z0-9._-]+$/, "may only contain letters, digits, '.', '_' and '-'")
      .default("sample"),
    phenotype: z.string().min(1).optional(),
    minQuality: z.number().nonnegative().optional(),
    maxPopulationFreq: z.number().min(0).max(1).optional(),
    consequenceTypes: z.array(z.string().min(1)).min(1).optional(),
    windowSize: z.number().int().positive().optional(),
  })
  .strict();

export type RunParameters = z.input<typeof RunParametersSchema>;

/** Parameters as recorded in a compiled plan, with every threshold filled in. */
export const PlanParametersSchema = z
  .object({
    analysis: AnalysisTypeSchema,
    inputVcf: z.string().min(1),
    outputDir: z.string().min(1),
    sampleName: z.string().min(1),
    phenotype: z.string().min(1).optional(),
    minQuality: z.number(),
    maxPopulationFreq: z.number(),
    consequenceTypes: z.array(z.string()),
    windowSize: z.number().int().positive(),
  })
  .strict();

export type PlanParameters = z.infer<typeof PlanParametersSchema>;

export const TaskRecordSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    description: z.string().optional(),
    dependsOn: z.array(z.string().min(1)).default([]),
    config: z.record(JsonValueSchema).default({}),
  })
  .strict();

export type TaskRecord = z.infer<typeof TaskRecordSchema>;

/** On-disk plan document. References inside `config` are still in textual form. */
export const PlanFileSchema = z
  .object({
    id: z.string().min(1),
    version: z.literal(1),
    createdAt: z.string().datetime(),
    parameters: PlanParametersSchema,
    configSnapshot: OrchestratorConfigSchema,
    tasks: z.array(TaskRecordSchema).min(1),
  })
  .strict();

export type PlanFile = z.infer<typeof PlanFileSchema>;

export const TaskStatusSchema = z.enum(["pending", "running", "succeeded", "failed", "skipped"]);

export const TaskFailureSchema = z.object({
  code: z.string(),
  kind: z.string().optional(),
  message: z.string(),
});

export const TaskResultSchema = z.object({
  taskId: z.string().min(1),
  status: TaskStatusSchema,
  outputs: z.record(JsonValueSchema),
  error: TaskFailureSchema.optional(),
  reason: z.string().optional(),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
});

/** Parse `data` with `schema`, turning zod issues into a ParseError naming `what`. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ParseError(`Invalid ${what}:\n  ${issues.join("\n  ")}`, { cause: result.error });
  }
  return result.data;
}
