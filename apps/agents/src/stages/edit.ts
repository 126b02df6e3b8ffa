import type { DesignArtifact } from "../pipeline/context";
import { EmptyArtifactError, PrerequisiteMissingError } from "../pipeline/errors";
import { canonicalArtifactName } from "../pipeline/naming";
import { callService, callStore, withBoundedRetry } from "../pipeline/retry";
import type { PipelineStateMachine } from "../pipeline/stateMachine";
import { currentTime, retryOptions, type StageDependencies } from "./dependencies";

export type DesignEdit = {
  /** VariantRequest index of the design to edit. */
  variant: number;
  instructions: string;
};

/**
 * Redraws one stored design from free-text instructions at its original size,
 * stores it under the variant's canonical name and hands it to the machine,
 * which invalidates finalization.
 */
export async function editDesign(
  machine: PipelineStateMachine,
  deps: StageDependencies,
  edit: DesignEdit,
  signal: AbortSignal = new AbortController().signal
): Promise<DesignArtifact> {
  const instructions = edit.instructions.trim();
  if (!instructions) {
    throw new Error("Edit instructions are empty.");
  }

  const design = machine.completedStages().includes("design") ? machine.artifact("design") : undefined;
  if (!design) {
    throw new PrerequisiteMissingError("design", ["design"]);
  }
  const record = design.designs.find((entry) => entry.variant.index === edit.variant);
  if (!record) {
    throw new Error(`No design exists for variant ${edit.variant}.`);
  }

  const { variant, width, height } = record;
  const source =
    record.image ?? (await callStore(`Loading ${record.stored.name}`, () => deps.store.load(record.stored.name)));

  const result = await withBoundedRetry(async () => {
    const image = await callService("Image edit", () =>
      deps.image.editImage(source, instructions, width, height, deps.config.generation.image_quality, signal)
    );
    if (image.length === 0) {
      throw new EmptyArtifactError(`Image edit returned no bytes for variant ${variant.index}.`);
    }
    return image;
  }, retryOptions(deps, signal, { stage: "design", variant: variant.index, edit: true }));

  if (!result.ok) {
    throw result.error;
  }

  const name = canonicalArtifactName({
    projectId: machine.projectId,
    stage: "design",
    language: variant.language,
    colorScheme: variant.color_scheme,
    format: variant.format,
    timestamp: currentTime(deps),
    extension: "png",
  });
  const stored = await callStore(`Saving ${name}`, () => deps.store.save(result.value, name));

  const edited: DesignArtifact = {
    ...record,
    stored,
    image: result.value,
    edit_instructions: [...(record.edit_instructions ?? []), instructions],
  };
  machine.replaceDesign(edited);
  deps.logger.info({ variant: variant.index, stored: stored.name }, "Design edited");
  return edited;
}
