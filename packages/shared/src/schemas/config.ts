// packages/shared/src/schemas/config.ts
import { z } from "zod";
import { IMAGE_QUALITIES, QUANTITY_TIERS } from "../constants";
import { HexColorSchema } from "./creative";

/* ----------------------------- Creative Config --------------------------- */
/**
 * Creative configuration is parsed from YAML (config/creative.yml), validated
 * BEFORE any model call, and defaulted deterministically. Preset values are
 * product data; the engine only relies on the shapes below.
 */

const AxisIdSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, "ids are lower-case slugs");

export const QuantityTierSchema = z.enum(QUANTITY_TIERS);
export type QuantityTier = z.infer<typeof QuantityTierSchema>;

export const ImageQualitySchema = z.enum(IMAGE_QUALITIES);
export type ImageQuality = z.infer<typeof ImageQualitySchema>;

export const LanguageConfigSchema = z
  .object({
    id: AxisIdSchema,
    name: z.string().min(1),
    // {year} and {brand} are substituted at finalization time.
    copyright: z.string().min(1).default("© {year} {brand}. All rights reserved."),
    terms: z.string().min(1).default("Terms of use | Privacy policy"),
    // Call to action used when this language's copy falls back to defaults.
    fallback_cta: z.string().min(1).default("Learn more"),
  })
  .strict();

export type LanguageConfig = z.infer<typeof LanguageConfigSchema>;

export const FormatConfigSchema = z
  .object({
    id: AxisIdSchema,
    label: z.string().min(1),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    layout: z.string().min(1),
  })
  .strict();

export type FormatConfig = z.infer<typeof FormatConfigSchema>;

export const PresetSchemeConfigSchema = z
  .object({
    id: AxisIdSchema,
    colors: z.record(z.string(), HexColorSchema).refine((colors) => Object.keys(colors).length > 0, {
      message: "a preset needs at least one color",
    }),
  })
  .strict();

export const DerivedSchemeConfigSchema = z
  .object({
    id: AxisIdSchema,
    // A preset id, or "concept" for the palette suggested by the concept stage.
    from: z.string().min(1),
    rotations: z.record(z.string(), z.number().int()),
  })
  .strict();

export const SchemeConfigSchema = z.union([PresetSchemeConfigSchema, DerivedSchemeConfigSchema]);
export type PresetSchemeConfig = z.infer<typeof PresetSchemeConfigSchema>;
export type DerivedSchemeConfig = z.infer<typeof DerivedSchemeConfigSchema>;
export type SchemeConfig = z.infer<typeof SchemeConfigSchema>;

export function isDerivedScheme(scheme: SchemeConfig): scheme is DerivedSchemeConfig {
  return "from" in scheme;
}

/** Restriction lists per axis; an omitted axis keeps every member active. */
export const TierRestrictionSchema = z
  .object({
    color_schemes: z.array(z.string().min(1)).optional(),
    formats: z.array(z.string().min(1)).optional(),
    languages: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type TierRestriction = z.infer<typeof TierRestrictionSchema>;

export const GenerationConfigSchema = z
  .object({
    image_quality: ImageQualitySchema.default("high"),
    max_attempts: z.number().int().min(1).max(3).default(3),
    retry_backoff_ms: z.number().int().nonnegative().default(1000),
    design_concurrency: z.number().int().min(1).max(8).default(1),
    design_delay_ms: z.number().int().nonnegative().default(2000),
    concept_temperature: z.number().min(0).max(2).default(0.7),
    copy_temperature: z.number().min(0).max(2).default(0.8),
    strict_temperature: z.number().min(0).max(2).default(0.2),
    logo_size: z.number().int().positive().default(1024),
  })
  .strict();

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;

export const CONCEPT_SCHEME_SOURCE = "concept";

export const CreativeConfigSchema = z
  .object({
    languages: z.array(LanguageConfigSchema).min(1),
    formats: z.array(FormatConfigSchema).min(1),
    color_schemes: z.array(SchemeConfigSchema).min(1),
    quantity_tiers: z.partialRecord(QuantityTierSchema, TierRestrictionSchema).default({}),
    generation: GenerationConfigSchema.default(GenerationConfigSchema.parse({})),
  })
  .strict()
  .superRefine((config, ctx) => {
    const axes = [
      ["languages", config.languages.map((item) => item.id)],
      ["formats", config.formats.map((item) => item.id)],
      ["color_schemes", config.color_schemes.map((item) => item.id)],
    ] as const;

    for (const [axis, ids] of axes) {
      const seen = new Set<string>();
      ids.forEach((id, index) => {
        if (seen.has(id)) {
          ctx.addIssue({ code: "custom", path: [axis, index, "id"], message: `Duplicate id: ${id}` });
        }
        seen.add(id);
      });
    }

    const presetIds = new Set(
      config.color_schemes.filter((scheme) => !isDerivedScheme(scheme)).map((scheme) => scheme.id)
    );
    config.color_schemes.forEach((scheme, index) => {
      if (isDerivedScheme(scheme) && scheme.from !== CONCEPT_SCHEME_SOURCE && !presetIds.has(scheme.from)) {
        ctx.addIssue({
          code: "custom",
          path: ["color_schemes", index, "from"],
          message: `Derived scheme ${scheme.id} must come from a preset or "${CONCEPT_SCHEME_SOURCE}"`,
        });
      }
    });
  });

export type CreativeConfig = z.infer<typeof CreativeConfigSchema>;
