import { z } from "zod";
import { MANIFEST_VERSION } from "../constants";
import {
  BrandAssetsSchema,
  ColorSchemeSchema,
  ConceptArtifactSchema,
  CopyArtifactSchema,
  DesignRecordSchema,
  ErrorKindSchema,
  FinalCreativeSchema,
  StageNameSchema,
  StoredArtifactSchema,
  VariantFailureSchema,
  VariantRequestSchema,
} from "./creative";

/* --------------------------- Stage artifact records ---------------------- */

export const DesignStageRecordSchema = z
  .object({
    requests: z.array(VariantRequestSchema),
    schemes: z.array(ColorSchemeSchema),
    designs: z.array(DesignRecordSchema),
    failures: z.array(VariantFailureSchema).default([]),
  })
  .strict();

export type DesignStageRecord = z.infer<typeof DesignStageRecordSchema>;

export const FinalizationRecordSchema = z
  .object({
    creatives: z.array(FinalCreativeSchema),
    failures: z.array(VariantFailureSchema).default([]),
  })
  .strict();

export type FinalizationRecord = z.infer<typeof FinalizationRecordSchema>;

export const StageErrorSchema = z
  .object({
    stage: StageNameSchema,
    kind: ErrorKindSchema,
    reason: z.string().min(1),
  })
  .strict();

export type StageError = z.infer<typeof StageErrorSchema>;

/**
 * Serializable form of the pipeline context. Image bytes are never persisted
 * here; designs and logos are referenced through their stored paths.
 */
export const PipelineSnapshotSchema = z
  .object({
    project_id: z.string().min(1),
    completed_stages: z.array(StageNameSchema),
    failed_stage: StageNameSchema.optional(),
    stage_errors: z.array(StageErrorSchema).default([]),
    artifacts: z
      .object({
        concept: ConceptArtifactSchema.optional(),
        copy: CopyArtifactSchema.optional(),
        design: DesignStageRecordSchema.optional(),
        branding: BrandAssetsSchema.optional(),
        finalization: FinalizationRecordSchema.optional(),
      })
      .strict(),
  })
  .strict();

export type PipelineSnapshot = z.infer<typeof PipelineSnapshotSchema>;

/* -------------------------------- Manifest ------------------------------- */

export const ManifestEntrySchema = z
  .object({
    kind: z.enum(["design", "logo", "final"]),
    variant: VariantRequestSchema.optional(),
    stored: StoredArtifactSchema,
  })
  .strict();

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export const RunManifestSchema = z
  .object({
    manifest_version: z.literal(MANIFEST_VERSION),
    project_id: z.string().min(1),
    generated_at: z.string().datetime(),
    status: z.enum(["done", "failed"]),
    entries: z.array(ManifestEntrySchema).default([]),
    failures: z.array(VariantFailureSchema).default([]),
    snapshot: PipelineSnapshotSchema,
  })
  .strict();

export type RunManifest = z.infer<typeof RunManifestSchema>;
