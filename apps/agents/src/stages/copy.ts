import {
  CopyRecordSchema,
  type CopyRecord,
  type CreativeBrief,
  type LanguageConfig,
} from "@adforge/shared";
import { PrerequisiteMissingError, ResponseUnparsableError } from "../pipeline/errors";
import type { StageExecutor } from "../pipeline/executor";
import { callService, withBoundedRetry } from "../pipeline/retry";
import { repairResponse } from "../repair/responseRepair";
import { type StageDependencies, retryOptions } from "./dependencies";
import { copyPrompt, copySystem } from "./prompts";

const SUBHEADING_LIMIT = 60;

export function defaultCopy(brief: CreativeBrief, language: LanguageConfig): CopyRecord {
  const subheading =
    brief.prompt.length > SUBHEADING_LIMIT ? `${brief.prompt.slice(0, SUBHEADING_LIMIT - 3).trimEnd()}...` : brief.prompt;
  return {
    headline: brief.brand.name,
    subheading,
    primary_cta: language.fallback_cta,
    secondary_cta: "",
    bullet_points: [],
    urgency: "",
    legal_footer: "",
  };
}

/**
 * One generation per active language. An unparsable language falls back to
 * default copy; a service failure for any language fails the stage.
 */
export function createCopyExecutor(deps: StageDependencies): StageExecutor<"copy"> {
  return async ({ artifacts, signal }) => {
    const concept = artifacts.concept;
    if (!concept) {
      throw new PrerequisiteMissingError("copy", ["concept"]);
    }

    const { brief, config } = deps;
    const copies: Record<string, CopyRecord> = {};
    const defaultsUsed: string[] = [];

    for (const languageId of deps.plan.active.languages) {
      const language = config.languages.find((entry) => entry.id === languageId);
      if (!language) {
        deps.logger.warn({ stage: "copy", language: languageId }, "Skipping unconfigured language");
        continue;
      }

      const fallback = () => defaultCopy(brief, language);
      const result = await withBoundedRetry(async ({ strict }) => {
        const raw = await callService(`Copy generation (${language.id})`, () =>
          deps.text.generateText(
            copySystem(language, strict),
            copyPrompt(brief, concept, language),
            strict ? config.generation.strict_temperature : config.generation.copy_temperature,
            signal
          )
        );
        const repaired = repairResponse(raw, CopyRecordSchema, fallback);
        if (!repaired.ok) {
          throw repaired.error;
        }
        return repaired.value;
      }, retryOptions(deps, signal, { stage: "copy", language: language.id }));

      if (result.ok) {
        copies[language.id] = result.value;
      } else if (result.error instanceof ResponseUnparsableError) {
        deps.logger.warn({ stage: "copy", language: language.id }, "Copy unparsable; using defaults");
        copies[language.id] = fallback();
        defaultsUsed.push(language.id);
      } else {
        return { success: false, failures: [], error: result.error };
      }
    }

    return { success: true, artifact: { copies, defaults_used: defaultsUsed }, failures: [] };
  };
}
