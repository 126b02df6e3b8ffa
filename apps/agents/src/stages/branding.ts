import { EmptyArtifactError, PrerequisiteMissingError } from "../pipeline/errors";
import type { StageExecutor } from "../pipeline/executor";
import { canonicalArtifactName } from "../pipeline/naming";
import { callService, callStore, withBoundedRetry } from "../pipeline/retry";
import { currentTime, retryOptions, type StageDependencies } from "./dependencies";
import { logoPrompt } from "./prompts";

/** One square logo from the brand info. Any failure here is fatal to the run. */
export function createBrandingExecutor(deps: StageDependencies): StageExecutor<"branding"> {
  return async ({ projectId, artifacts, signal }) => {
    if (!artifacts.design) {
      throw new PrerequisiteMissingError("branding", ["design"]);
    }

    const { brand } = deps.brief;
    const size = deps.config.generation.logo_size;
    const prompt = logoPrompt(brand, size);

    const result = await withBoundedRetry(async () => {
      const image = await callService("Logo synthesis", () =>
        deps.image.synthesizeImage(prompt, size, size, deps.config.generation.image_quality, signal)
      );
      if (image.length === 0) {
        throw new EmptyArtifactError("Logo synthesis returned no bytes.");
      }
      return image;
    }, retryOptions(deps, signal, { stage: "branding" }));

    if (!result.ok) {
      return { success: false, failures: [], error: result.error };
    }

    const name = canonicalArtifactName({
      projectId,
      stage: "branding",
      timestamp: currentTime(deps),
      extension: "png",
    });

    try {
      const stored = await callStore(`Saving ${name}`, () => deps.store.save(result.value, name));
      return {
        success: true,
        artifact: { prompt, width: size, height: size, stored, image: result.value },
        failures: [],
      };
    } catch (error) {
      return { success: false, failures: [], error };
    }
  };
}
