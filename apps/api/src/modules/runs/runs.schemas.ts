import { z } from "zod";
import {
  ARTIFACT_CONTENT_TYPES,
  CreativeRunInputSchema,
  RunExecutionSchema,
  RunStatusSchema,
  RunStepSchema,
} from "@adforge/shared";

/**
 * Persisted shapes: runs/index.json, runs/<runId>/run.json and
 * runs/<runId>/artifacts/index.json.
 */

const RunIdSchema = z.uuid();
const IsoDateSchema = z.iso.datetime();

// One line of runs/index.json and of GET /runs.
export const RunRecordSchema = z
  .object({
    run_id: RunIdSchema,
    created_at: IsoDateSchema,
    status: RunStatusSchema,
    current_step: RunStepSchema,
    last_updated_at: IsoDateSchema,
  })
  .strict();

export type RunRecord = z.infer<typeof RunRecordSchema>;

export const RunsIndexSchema = z
  .object({
    version: z.literal(1),
    runs: z.array(RunRecordSchema).default([]),
  })
  .strict();

export type RunsIndex = z.infer<typeof RunsIndexSchema>;

// Step name -> first time the run reached it.
const StepTimestampsSchema = z
  .record(z.string(), IsoDateSchema)
  .default({})
  .superRefine((obj, ctx) => {
    for (const key of Object.keys(obj)) {
      if (!RunStepSchema.safeParse(key).success) {
        ctx.addIssue({ code: "custom", message: `Invalid step key: ${key}` });
      }
    }
  });

export const RunDetailSchema = RunRecordSchema.extend({
  step_timestamps: StepTimestampsSchema,
  input: CreativeRunInputSchema.optional(),
  execution: RunExecutionSchema.optional(),
}).strict();

export type RunDetail = z.infer<typeof RunDetailSchema>;

export const ArtifactContentTypeSchema = z.enum(ARTIFACT_CONTENT_TYPES);
export type ArtifactContentType = z.infer<typeof ArtifactContentTypeSchema>;

export const ArtifactMetadataSchema = z
  .object({
    name: z.string().min(1),
    filename: z.string().min(1),
    content_type: ArtifactContentTypeSchema,
    sha256: z.string().regex(/^[a-f0-9]{64}$/).optional(),
    created_at: IsoDateSchema,
  })
  .strict();

export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;

export const ArtifactsIndexSchema = z
  .object({
    version: z.literal(1),
    artifacts: z.array(ArtifactMetadataSchema).default([]),
  })
  .strict();

export type ArtifactsIndex = z.infer<typeof ArtifactsIndexSchema>;
