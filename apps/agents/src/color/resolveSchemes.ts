import type { Logger } from "pino";
import {
  CONCEPT_SCHEME_SOURCE,
  isDerivedScheme,
  type ColorScheme,
  type CreativeConfig,
  type Palette,
  type PresetSchemeConfig,
} from "@adforge/shared";
import { deriveScheme } from "./deriveColor";

/**
 * Resolves the active scheme ids to concrete palettes. Each derived scheme is
 * computed once, from a preset or from the concept's suggested palette.
 */
export function resolveSchemes(
  config: CreativeConfig,
  activeIds: readonly string[],
  conceptPalette: Palette | undefined,
  logger?: Pick<Logger, "warn">
): ColorScheme[] {
  const presets = config.color_schemes.filter(
    (scheme): scheme is PresetSchemeConfig => !isDerivedScheme(scheme)
  );
  const resolved: ColorScheme[] = [];

  const sourceFor = (from: string): Pick<ColorScheme, "id" | "colors"> | undefined => {
    if (from !== CONCEPT_SCHEME_SOURCE) {
      return presets.find((preset) => preset.id === from);
    }
    if (conceptPalette && Object.keys(conceptPalette).length > 0) {
      return { id: CONCEPT_SCHEME_SOURCE, colors: conceptPalette };
    }
    const substitute = presets[0];
    logger?.warn(
      { substitute: substitute?.id },
      "Concept suggested no palette; deriving from the first preset instead"
    );
    return substitute;
  };

  for (const id of activeIds) {
    const scheme = config.color_schemes.find((entry) => entry.id === id);
    if (!scheme) {
      continue;
    }
    if (!isDerivedScheme(scheme)) {
      resolved.push({ id: scheme.id, colors: { ...scheme.colors } });
      continue;
    }
    const source = sourceFor(scheme.from);
    if (!source) {
      logger?.warn({ scheme: scheme.id, from: scheme.from }, "No source palette for derived scheme");
      continue;
    }
    resolved.push(deriveScheme(scheme.id, source, scheme.rotations));
  }

  return resolved;
}
