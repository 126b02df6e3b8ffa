import type { ColorScheme, VariantFailure, VariantRequest } from "@adforge/shared";
import { resolveSchemes } from "../color/resolveSchemes";
import type { DesignArtifact } from "../pipeline/context";
import {
  EmptyArtifactError,
  PrerequisiteMissingError,
  StoreFailureError,
  buildFailureMessage,
  errorKind,
} from "../pipeline/errors";
import type { StageExecutor } from "../pipeline/executor";
import { canonicalArtifactName } from "../pipeline/naming";
import { runPool } from "../pipeline/pool";
import { callService, callStore, withBoundedRetry } from "../pipeline/retry";
import { currentTime, retryOptions, type StageDependencies } from "./dependencies";
import { visualPrompt } from "./prompts";

type VariantResult =
  | { ok: true; design: DesignArtifact }
  | { ok: false; failure: VariantFailure; error: unknown };

export function variantKey(variant: Pick<VariantRequest, "color_scheme" | "format" | "language">) {
  return `${variant.color_scheme}|${variant.format}|${variant.language}`;
}

/**
 * Synthesizes one image per VariantRequest through a bounded pool. Variants
 * already held from an earlier partial run are kept and not requested again.
 */
export function createDesignExecutor(deps: StageDependencies): StageExecutor<"design"> {
  return async ({ projectId, artifacts, signal }) => {
    const { concept, copy } = artifacts;
    if (!concept || !copy) {
      throw new PrerequisiteMissingError("design", concept ? ["copy"] : ["concept"]);
    }

    const { config, plan } = deps;
    const generation = config.generation;
    const requests = plan.requests;
    const schemes = resolveSchemes(config, plan.active.colorSchemes, concept.palette, deps.logger);
    const schemeById = new Map(schemes.map((scheme) => [scheme.id, scheme]));

    const produced = new Map<string, DesignArtifact>();
    for (const design of artifacts.design?.designs ?? []) {
      produced.set(variantKey(design.variant), design);
    }
    const pending = requests.filter((request) => !produced.has(variantKey(request)));
    if (produced.size > 0) {
      deps.logger.info(
        { stage: "design", kept: requests.length - pending.length, pending: pending.length },
        "Resuming design with previously produced variants"
      );
    }

    const failVariant = (variant: VariantRequest, error: unknown, attempts: number): VariantResult => {
      const failure: VariantFailure = {
        stage: "design",
        variant,
        kind: errorKind(error),
        reason: buildFailureMessage(error),
        attempts,
      };
      deps.logger.warn({ stage: "design", variant, kind: failure.kind, reason: failure.reason }, "Variant failed");
      return { ok: false, failure, error };
    };

    const designVariant = async (variant: VariantRequest): Promise<VariantResult> => {
      const scheme: ColorScheme | undefined = schemeById.get(variant.color_scheme);
      const format = config.formats.find((entry) => entry.id === variant.format);
      const record = copy.copies[variant.language];
      if (!record) {
        return failVariant(variant, new PrerequisiteMissingError("design", ["copy"]), 0);
      }
      if (!scheme || !format) {
        const missing = scheme ? `format ${variant.format}` : `color scheme ${variant.color_scheme}`;
        return failVariant(variant, new Error(`Cannot design variant ${variant.index}: no ${missing}.`), 0);
      }

      const prompt = visualPrompt({ concept, copy: record, scheme, format });
      const result = await withBoundedRetry(async () => {
        const image = await callService("Image synthesis", () =>
          deps.image.synthesizeImage(prompt, format.width, format.height, generation.image_quality, signal)
        );
        if (image.length === 0) {
          throw new EmptyArtifactError(`Image synthesis returned no bytes for variant ${variant.index}.`);
        }
        return image;
      }, retryOptions(deps, signal, { stage: "design", variant: variant.index }));

      if (!result.ok) {
        return failVariant(variant, result.error, result.attempts);
      }

      const name = canonicalArtifactName({
        projectId,
        stage: "design",
        language: variant.language,
        colorScheme: variant.color_scheme,
        format: variant.format,
        timestamp: currentTime(deps),
        extension: "png",
      });
      try {
        const stored = await callStore(`Saving ${name}`, () => deps.store.save(result.value, name));
        return {
          ok: true,
          design: {
            variant,
            prompt,
            palette: scheme,
            width: format.width,
            height: format.height,
            stored,
            image: result.value,
          },
        };
      } catch (error) {
        if (error instanceof StoreFailureError) {
          return failVariant(variant, error, result.attempts);
        }
        throw error;
      }
    };

    const results = await runPool(pending, designVariant, {
      concurrency: generation.design_concurrency,
      delayMs: generation.design_delay_ms,
      sleep: deps.sleep,
      signal,
    });

    const fresh = new Map<string, DesignArtifact>();
    const failures: VariantFailure[] = [];
    let firstError: unknown;
    for (const result of results) {
      if (result.ok) {
        fresh.set(variantKey(result.design.variant), result.design);
      } else {
        failures.push(result.failure);
        firstError ??= result.error;
      }
    }

    const designs = requests.flatMap((request) => {
      const design = fresh.get(variantKey(request)) ?? produced.get(variantKey(request));
      return design ? [{ ...design, variant: request }] : [];
    });
    const artifact = { requests, schemes, designs, failures };

    if (designs.length > 0) {
      return { success: true, artifact, failures };
    }
    return {
      success: false,
      artifact,
      failures,
      error: firstError ?? new Error("The variant plan is empty; nothing to design."),
    };
  };
}
