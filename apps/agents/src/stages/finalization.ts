import type { FinalCreative, VariantFailure } from "@adforge/shared";
import type { DesignArtifact } from "../pipeline/context";
import { PrerequisiteMissingError, buildFailureMessage, errorKind } from "../pipeline/errors";
import type { StageExecutor } from "../pipeline/executor";
import { canonicalArtifactName } from "../pipeline/naming";
import { callStore } from "../pipeline/retry";
import { currentTime, type StageDependencies } from "./dependencies";
import { footerLines } from "./prompts";

/**
 * Composites the footer lines and the logo onto every successful design whose
 * language copy exists. Succeeds when at least one creative is stored.
 */
export function createFinalizationExecutor(deps: StageDependencies): StageExecutor<"finalization"> {
  return async ({ projectId, artifacts, signal }) => {
    const { copy, design, branding } = artifacts;
    if (!copy || !design || !branding) {
      const missing = [
        ...(copy ? [] : ["copy" as const]),
        ...(design ? [] : ["design" as const]),
        ...(branding ? [] : ["branding" as const]),
      ];
      throw new PrerequisiteMissingError("finalization", missing);
    }

    let logo: Buffer;
    try {
      logo = branding.image ?? (await callStore("Loading logo", () => deps.store.load(branding.stored.name)));
    } catch (error) {
      return { success: false, failures: [], error };
    }

    const year = currentTime(deps).getFullYear();
    const creatives: FinalCreative[] = [];
    const failures: VariantFailure[] = [];
    let firstError: unknown;

    const fail = (source: DesignArtifact, error: unknown) => {
      const failure: VariantFailure = {
        stage: "finalization",
        variant: source.variant,
        kind: errorKind(error),
        reason: buildFailureMessage(error),
        attempts: 1,
      };
      deps.logger.warn({ stage: "finalization", variant: source.variant, reason: failure.reason }, "Creative failed");
      failures.push(failure);
      firstError ??= error;
    };

    for (const source of design.designs) {
      signal.throwIfAborted();
      const { variant } = source;
      const record = copy.copies[variant.language];
      const language = deps.config.languages.find((entry) => entry.id === variant.language);
      if (!record || !language) {
        fail(source, new PrerequisiteMissingError("finalization", ["copy"]));
        continue;
      }

      try {
        const image =
          source.image ?? (await callStore(`Loading ${source.stored.name}`, () => deps.store.load(source.stored.name)));
        const lines = footerLines(record, language, deps.brief.brand, year);
        const composed = await deps.compositor.compose({
          design: image,
          logo,
          width: source.width,
          height: source.height,
          footerLines: lines,
          accentColor: Object.values(source.palette.colors)[0],
        });

        const name = canonicalArtifactName({
          projectId,
          stage: "finalization",
          language: variant.language,
          colorScheme: variant.color_scheme,
          format: variant.format,
          timestamp: currentTime(deps),
          extension: "png",
        });
        const stored = await callStore(`Saving ${name}`, () => deps.store.save(composed, name));
        creatives.push({ variant, design: source.stored, logo: branding.stored, footer_lines: lines, stored });
      } catch (error) {
        fail(source, error);
      }
    }

    const artifact = { creatives, failures };
    if (creatives.length > 0) {
      return { success: true, artifact, failures };
    }
    return {
      success: false,
      artifact,
      failures,
      error: firstError ?? new Error("No designs were available to finalize."),
    };
  };
}
