import type { Logger } from "pino";
import type {
  CreativeConfig,
  QuantityTier,
  TierRestriction,
  VariantRequest,
  VariantSelection,
} from "@adforge/shared";

export type VariantAxes = {
  colorSchemes: readonly string[];
  formats: readonly string[];
  languages: readonly string[];
};

export type ExpansionResult = {
  requests: VariantRequest[];
  active: VariantAxes;
  warnings: string[];
};

type AxisName = "color scheme" | "format" | "language";

function unique(values: readonly string[]) {
  return [...new Set(values)];
}

function restrictAxis(
  axis: AxisName,
  members: readonly string[],
  allowed: readonly string[] | undefined,
  source: string,
  warnings: string[]
) {
  const ordered = unique(members);
  if (!allowed) {
    return ordered;
  }

  for (const id of unique(allowed)) {
    if (!ordered.includes(id)) {
      warnings.push(`Skipping unknown ${axis} id "${id}" in ${source}.`);
    }
  }

  const allowedSet = new Set(allowed);
  return ordered.filter((id) => allowedSet.has(id));
}

/** Color-major cross product: scheme, then format, then language. */
export function crossProduct(axes: VariantAxes): VariantRequest[] {
  const requests: VariantRequest[] = [];
  for (const colorScheme of axes.colorSchemes) {
    for (const format of axes.formats) {
      for (const language of axes.languages) {
        requests.push({
          index: requests.length,
          color_scheme: colorScheme,
          format,
          language,
        });
      }
    }
  }
  return requests;
}

/**
 * Expands the ordered axes into VariantRequests after applying the tier's
 * restriction lists. Unknown ids in a restriction are skipped with a warning.
 */
export function expandVariants(
  axes: VariantAxes,
  restriction: TierRestriction | undefined,
  source = "tier restriction",
  logger?: Pick<Logger, "warn">
): ExpansionResult {
  const warnings: string[] = [];
  const active: VariantAxes = {
    colorSchemes: restrictAxis("color scheme", axes.colorSchemes, restriction?.color_schemes, source, warnings),
    formats: restrictAxis("format", axes.formats, restriction?.formats, source, warnings),
    languages: restrictAxis("language", axes.languages, restriction?.languages, source, warnings),
  };

  for (const warning of warnings) {
    logger?.warn({ source }, warning);
  }

  return { requests: crossProduct(active), active, warnings };
}

/**
 * Builds the run's work list: configured axes, narrowed by the explicit
 * selection, then by the quantity tier.
 */
export function planVariants(
  config: CreativeConfig,
  input: { quantity_tier: QuantityTier; selection: VariantSelection },
  logger?: Pick<Logger, "warn">
): ExpansionResult {
  const configured: VariantAxes = {
    colorSchemes: config.color_schemes.map((scheme) => scheme.id),
    formats: config.formats.map((format) => format.id),
    languages: config.languages.map((language) => language.id),
  };

  // Both restrictions are checked against the configured ids, then intersected.
  const selected = expandVariants(configured, input.selection, "run selection", logger);
  const tiered = expandVariants(
    configured,
    config.quantity_tiers[input.quantity_tier],
    `quantity tier "${input.quantity_tier}"`,
    logger
  );

  const active: VariantAxes = {
    colorSchemes: tiered.active.colorSchemes.filter((id) => selected.active.colorSchemes.includes(id)),
    formats: tiered.active.formats.filter((id) => selected.active.formats.includes(id)),
    languages: tiered.active.languages.filter((id) => selected.active.languages.includes(id)),
  };

  return {
    requests: crossProduct(active),
    active,
    warnings: [...selected.warnings, ...tiered.warnings],
  };
}
