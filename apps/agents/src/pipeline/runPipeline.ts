import type { RunManifest, StageName, StoredArtifact, VariantFailure } from "@adforge/shared";
import { createStageExecutors, editDesign, type DesignEdit, type StageDependencies } from "../stages";
import type { PipelineStatus } from "./context";
import { buildManifest } from "./manifest";
import { callStore } from "./retry";
import { PipelineStateMachine } from "./stateMachine";

export type RunPipelineOptions = {
  deps: StageDependencies;
  projectId?: string;
  /** Manifest of an earlier run; its snapshot seeds the state machine. */
  resumeFrom?: RunManifest;
  /** Re-request the design variants that failed in `resumeFrom`. */
  retryFailedVariants?: boolean;
  /** Applied to the resumed designs before the remaining stages run. */
  edits?: DesignEdit[];
  onStageStart?: (stage: StageName) => Promise<void>;
};

export type PipelineReport = {
  projectId: string;
  status: PipelineStatus;
  manifest: RunManifest;
  manifestStored: StoredArtifact;
  failures: VariantFailure[];
};

/**
 * Runs every pending stage, then writes the manifest exactly once, whether
 * the run finished or halted on a failed stage.
 */
export async function runPipeline(options: RunPipelineOptions): Promise<PipelineReport> {
  const { deps } = options;
  const machine = new PipelineStateMachine(createStageExecutors(deps), {
    logger: deps.logger,
    projectId: options.projectId,
    snapshot: options.resumeFrom?.snapshot,
  });

  if (options.resumeFrom) {
    machine.resume();
    const design = machine.artifact("design");
    const retry = options.retryFailedVariants && design && design.failures.length > 0;
    if (retry && machine.completedStages().includes("design")) {
      machine.reenter("design", { keepPartial: true });
    }
    deps.logger.info(
      { projectId: machine.projectId, completed: machine.completedStages() },
      "Resuming pipeline from manifest"
    );
  }

  for (const edit of options.edits ?? []) {
    await editDesign(machine, deps, edit);
  }

  let status = machine.status();
  while (status.state === "running") {
    await options.onStageStart?.(status.next);
    await machine.runStage(status.next);
    status = machine.status();
  }

  const manifest = buildManifest(machine.snapshot(), status, deps.now ? deps.now() : new Date());
  const manifestStored = await callStore("Writing manifest", () => deps.store.writeManifest(manifest));

  if (status.state === "failed") {
    deps.logger.error(
      { projectId: machine.projectId, stage: status.stage, reason: status.reason, failures: manifest.failures.length },
      "Pipeline failed"
    );
  } else {
    deps.logger.info(
      { projectId: machine.projectId, creatives: manifest.entries.filter((entry) => entry.kind === "final").length },
      "Pipeline completed"
    );
  }

  return {
    projectId: machine.projectId,
    status,
    manifest,
    manifestStored,
    failures: manifest.failures,
  };
}
