import { ConceptArtifactSchema, type ConceptArtifact, type CreativeBrief } from "@adforge/shared";
import { ResponseUnparsableError, buildFailureMessage } from "../pipeline/errors";
import type { StageExecutor } from "../pipeline/executor";
import { callService, withBoundedRetry } from "../pipeline/retry";
import { repairResponse } from "../repair/responseRepair";
import { type StageDependencies, retryOptions } from "./dependencies";
import { REFERENCE_ANALYSIS_INSTRUCTIONS, conceptPrompt, conceptSystem } from "./prompts";

export function defaultConcept(brief: CreativeBrief): ConceptArtifact {
  return {
    central_idea: brief.prompt,
    focal_element: `${brief.brand.name} product or service in use`,
    supporting_elements: [],
    palette: {},
    mood: [brief.brand.tone ?? "modern", "professional"],
    format_notes: {},
    used_defaults: true,
  };
}

async function analyzeReference(deps: StageDependencies, signal: AbortSignal) {
  const reference = deps.brief.reference_image;
  if (!reference) {
    return undefined;
  }

  const image = { data: Buffer.from(reference.data_base64, "base64"), mediaType: reference.media_type };
  const result = await withBoundedRetry(
    () =>
      callService("Reference image analysis", () =>
        deps.text.analyzeImage(image, REFERENCE_ANALYSIS_INSTRUCTIONS, signal)
      ),
    retryOptions(deps, signal, { stage: "concept", step: "reference-analysis" })
  );

  if (!result.ok) {
    deps.logger.warn(
      { stage: "concept", reason: buildFailureMessage(result.error) },
      "Reference analysis failed; continuing from the brief alone"
    );
    return undefined;
  }
  return result.value.trim() || undefined;
}

/** Optional reference analysis, then concept generation with brief-derived defaults as fallback. */
export function createConceptExecutor(deps: StageDependencies): StageExecutor<"concept"> {
  return async ({ signal }) => {
    const { brief, config } = deps;
    const analysis = await analyzeReference(deps, signal);
    const fallback = () => defaultConcept(brief);

    const result = await withBoundedRetry(async ({ strict }) => {
      const raw = await callService("Concept generation", () =>
        deps.text.generateText(
          conceptSystem(strict),
          conceptPrompt(brief, config.formats, analysis),
          strict ? config.generation.strict_temperature : config.generation.concept_temperature,
          signal
        )
      );
      const repaired = repairResponse(raw, ConceptArtifactSchema, fallback);
      if (!repaired.ok) {
        throw repaired.error;
      }
      return { ...repaired.value, used_defaults: false };
    }, retryOptions(deps, signal, { stage: "concept" }));

    if (result.ok) {
      return { success: true, artifact: result.value, failures: [] };
    }
    if (result.error instanceof ResponseUnparsableError) {
      deps.logger.warn({ stage: "concept", attempts: result.attempts }, "Concept unparsable; using defaults");
      return { success: true, artifact: fallback(), failures: [] };
    }
    return { success: false, failures: [], error: result.error };
  };
}
