// packages/shared/src/schemas/creative.ts
import { z } from "zod";
import { MAX_BULLET_POINTS, PIPELINE_STAGES } from "../constants";

/* ----------------------------- Shared enums ------------------------------ */

export const StageNameSchema = z.enum(PIPELINE_STAGES);
export type StageName = z.infer<typeof StageNameSchema>;

/* --------------------------------- Colors -------------------------------- */

const HEX_PATTERN = /^#?([0-9a-fA-F]{6})$/;

/** Returns `#RRGGBB` (upper case) or undefined when the value is not a 6-digit hex color. */
export function normalizeHex(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const match = value.trim().match(HEX_PATTERN);
  return match ? `#${match[1].toUpperCase()}` : undefined;
}

export const HexColorSchema = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "expected #RRGGBB");

// Model palettes are lenient: invalid entries are dropped, valid ones normalized.
export const PaletteSchema = z.preprocess((value) => {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return {};
  }
  const palette: Record<string, string> = {};
  for (const [role, color] of Object.entries(value)) {
    const hex = normalizeHex(color);
    if (hex) {
      palette[role.trim().toLowerCase()] = hex;
    }
  }
  return palette;
}, z.record(z.string(), HexColorSchema));

export type Palette = z.infer<typeof PaletteSchema>;

/** Resolved color scheme: a preset, or derived from another scheme by hue rotation. */
export const ColorSchemeSchema = z
  .object({
    id: z.string().min(1),
    colors: z.record(z.string(), HexColorSchema),
    derived_from: z.string().min(1).optional(),
    rotations: z.record(z.string(), z.number().int()).optional(),
  })
  .strict();

export type ColorScheme = z.infer<typeof ColorSchemeSchema>;

/* -------------------------------- Concept -------------------------------- */

const StringListSchema = z.preprocess((value) => {
  if (typeof value === "string") {
    return value
      .split(/[,;]/)
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return value;
}, z.array(z.string().min(1)));

export const ConceptArtifactSchema = z.object({
  central_idea: z.string().min(1),
  focal_element: z.string().min(1),
  supporting_elements: StringListSchema.default([]),
  palette: PaletteSchema.default({}),
  mood: StringListSchema.default([]),
  format_notes: z.record(z.string(), z.string()).default({}),
  used_defaults: z.boolean().default(false),
});

export type ConceptArtifact = z.infer<typeof ConceptArtifactSchema>;

/* ---------------------------------- Copy --------------------------------- */

export const CopyRecordSchema = z.object({
  headline: z.string().min(1),
  subheading: z.string().default(""),
  primary_cta: z.string().min(1),
  secondary_cta: z.string().default(""),
  bullet_points: StringListSchema.default([]).transform((items) => items.slice(0, MAX_BULLET_POINTS)),
  urgency: z.string().default(""),
  legal_footer: z.string().default(""),
});

export type CopyRecord = z.infer<typeof CopyRecordSchema>;

export const CopyArtifactSchema = z
  .object({
    copies: z.record(z.string(), CopyRecordSchema),
    defaults_used: z.array(z.string()).default([]),
  })
  .strict();

export type CopyArtifact = z.infer<typeof CopyArtifactSchema>;

/* -------------------------------- Variants ------------------------------- */

export const VariantRequestSchema = z
  .object({
    index: z.number().int().nonnegative(),
    color_scheme: z.string().min(1),
    format: z.string().min(1),
    language: z.string().min(1),
  })
  .strict();

export type VariantRequest = z.infer<typeof VariantRequestSchema>;

export const ErrorKindSchema = z.enum([
  "prerequisite_missing",
  "response_unparsable",
  "external_service_failure",
  "empty_artifact",
  "store_failure",
  "unknown",
]);

export type ErrorKind = z.infer<typeof ErrorKindSchema>;

export const VariantFailureSchema = z
  .object({
    stage: StageNameSchema,
    variant: VariantRequestSchema,
    kind: ErrorKindSchema,
    reason: z.string().min(1),
    attempts: z.number().int().nonnegative(),
  })
  .strict();

export type VariantFailure = z.infer<typeof VariantFailureSchema>;

/* ------------------------------ Stored output ---------------------------- */

export const StoredArtifactSchema = z
  .object({
    name: z.string().min(1),
    path: z.string().min(1),
    sha256: z.string().regex(/^[a-f0-9]{64}$/).optional(),
  })
  .strict();

export type StoredArtifact = z.infer<typeof StoredArtifactSchema>;

export const DesignRecordSchema = z
  .object({
    variant: VariantRequestSchema,
    prompt: z.string().min(1),
    palette: ColorSchemeSchema,
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    stored: StoredArtifactSchema,
    // Instructions of every edit applied since synthesis, oldest first.
    edit_instructions: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type DesignRecord = z.infer<typeof DesignRecordSchema>;

export const BrandAssetsSchema = z
  .object({
    prompt: z.string().min(1),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    stored: StoredArtifactSchema,
  })
  .strict();

export type BrandAssetsRecord = z.infer<typeof BrandAssetsSchema>;

export const FinalCreativeSchema = z
  .object({
    variant: VariantRequestSchema,
    design: StoredArtifactSchema,
    logo: StoredArtifactSchema,
    footer_lines: z.array(z.string()),
    stored: StoredArtifactSchema,
  })
  .strict();

export type FinalCreative = z.infer<typeof FinalCreativeSchema>;
