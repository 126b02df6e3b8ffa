import type { StageExecutors } from "../pipeline/executor";
import { createBrandingExecutor } from "./branding";
import { createConceptExecutor } from "./concept";
import { createCopyExecutor } from "./copy";
import type { StageDependencies } from "./dependencies";
import { createDesignExecutor } from "./design";
import { createFinalizationExecutor } from "./finalization";

export type { StageDependencies } from "./dependencies";

export function createStageExecutors(deps: StageDependencies): StageExecutors {
  return {
    concept: createConceptExecutor(deps),
    copy: createCopyExecutor(deps),
    design: createDesignExecutor(deps),
    branding: createBrandingExecutor(deps),
    finalization: createFinalizationExecutor(deps),
  };
}
export { editDesign, type DesignEdit } from "./edit";
