import { z } from "zod";
import { RUN_EXECUTION_STATUSES, RUN_STATUSES, RUN_STEPS, WORKFLOW_NAMES } from "../constants";
import { QuantityTierSchema } from "./config";

export const RunStatusSchema = z.enum(RUN_STATUSES);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const RunStepSchema = z.enum(RUN_STEPS);
export type RunStep = z.infer<typeof RunStepSchema>;

export const BrandInfoSchema = z
  .object({
    name: z.string().min(1),
    sector: z.string().min(1).optional(),
    audience: z.string().min(1).optional(),
    objective: z.string().min(1).optional(),
    tone: z.string().min(1).optional(),
  })
  .strict();

export type BrandInfo = z.infer<typeof BrandInfoSchema>;

export const ReferenceImageSchema = z
  .object({
    media_type: z.enum(["image/png", "image/jpeg", "image/webp"]),
    data_base64: z.string().min(1),
  })
  .strict();

export type ReferenceImage = z.infer<typeof ReferenceImageSchema>;

export const CreativeBriefSchema = z
  .object({
    prompt: z.string().min(1),
    brand: BrandInfoSchema,
    reference_image: ReferenceImageSchema.optional(),
  })
  .strict();

export type CreativeBrief = z.infer<typeof CreativeBriefSchema>;

/** Explicit axis selection; an omitted axis means every configured member. */
export const VariantSelectionSchema = z
  .object({
    color_schemes: z.array(z.string().min(1)).min(1).optional(),
    formats: z.array(z.string().min(1)).min(1).optional(),
    languages: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export type VariantSelection = z.infer<typeof VariantSelectionSchema>;

export const CreativeRunInputSchema = z
  .object({
    brief: CreativeBriefSchema,
    quantity_tier: QuantityTierSchema.default("standard"),
    selection: VariantSelectionSchema.default({}),
    requested_by: z.string().min(1).optional(),
  })
  .strict();

export type CreativeRunInput = z.infer<typeof CreativeRunInputSchema>;

export const RunExecutionStatusSchema = z.enum(RUN_EXECUTION_STATUSES);
export type RunExecutionStatus = z.infer<typeof RunExecutionStatusSchema>;

export const WorkflowNameSchema = z.enum(WORKFLOW_NAMES);
export type WorkflowName = z.infer<typeof WorkflowNameSchema>;

export const RunExecutionSchema = z
  .object({
    workflow_name: WorkflowNameSchema,
    status: RunExecutionStatusSchema,
    pid: z.number().int().positive().optional(),
    requested_at: z.string().datetime(),
    started_at: z.string().datetime().optional(),
    completed_at: z.string().datetime().optional(),
    error_message: z.string().min(1).optional(),
  })
  .strict();

export type RunExecution = z.infer<typeof RunExecutionSchema>;
