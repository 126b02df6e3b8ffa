import { z } from "zod";
import {
  CreativeRunInputSchema,
  RunExecutionSchema,
  RunManifestSchema,
  RunStatusSchema,
  RunStepSchema,
  WorkflowNameSchema,
} from "@adforge/shared";
import {
  ArtifactContentTypeSchema,
  ArtifactMetadataSchema,
  RunDetailSchema,
  RunRecordSchema,
} from "./runs.schemas";

export const CreateRunRequestSchema = CreativeRunInputSchema;

export const CreateRunResponseSchema = z
  .object({
    run: RunDetailSchema,
  })
  .strict();

export const ListRunsResponseSchema = z
  .object({
    total: z.number().int().nonnegative(),
    runs: z.array(RunRecordSchema),
  })
  .strict();

export const RunIdParamsSchema = z.object({ runId: z.uuid() }).strict();

export const GetRunResponseSchema = z
  .object({
    run: RunDetailSchema,
    artifacts: z.array(ArtifactMetadataSchema),
  })
  .strict();

export const UpdateRunRequestSchema = z
  .object({
    status: RunStatusSchema.optional(),
    current_step: RunStepSchema.optional(),
  })
  .strict()
  .refine((v) => v.status || v.current_step, { message: "Provide status and/or current_step" });

export const UpdateRunResponseSchema = z.object({ run: RunDetailSchema }).strict();

export const DispatchRunResponseSchema = z
  .object({
    run_id: z.uuid(),
    execution: RunExecutionSchema,
  })
  .strict();

export const DispatchRunParamsSchema = z
  .object({
    runId: z.uuid(),
    workflowName: WorkflowNameSchema,
  })
  .strict();

export const UpdateExecutionRequestSchema = z
  .object({
    status: z.enum(["running", "succeeded", "failed"]),
    pid: z.number().int().positive().optional(),
    error_message: z.string().min(1).optional(),
  })
  .strict();

export const UpdateExecutionResponseSchema = z.object({ run: RunDetailSchema }).strict();

export const UploadArtifactRequestSchema = z
  .object({
    name: z.string().min(1).max(200),
    content_type: ArtifactContentTypeSchema,
    payload: z.unknown(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.content_type !== "application/json" && typeof value.payload !== "string") {
      ctx.addIssue({
        code: "custom",
        path: ["payload"],
        message: "payload must be a string for text and base64 image artifacts",
      });
    }
  });

export const UploadArtifactResponseSchema = z
  .object({
    artifact: ArtifactMetadataSchema,
  })
  .strict();

export const GetArtifactParamsSchema = z
  .object({
    runId: z.uuid(),
    artifactName: z.string().min(1),
  })
  .strict();

export const GetArtifactResponseSchema = z
  .object({
    artifact: ArtifactMetadataSchema,
    payload: z.union([z.string(), z.record(z.string(), z.unknown()), z.array(z.unknown())]),
  })
  .strict();

export const GetManifestResponseSchema = z
  .object({
    manifest: RunManifestSchema,
  })
  .strict();
