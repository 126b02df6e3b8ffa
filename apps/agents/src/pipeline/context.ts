import {
  PIPELINE_STAGES,
  type BrandAssetsRecord,
  type ConceptArtifact,
  type CopyArtifact,
  type DesignRecord,
  type DesignStageRecord,
  type FinalizationRecord,
  type PipelineSnapshot,
  type StageError,
  type StageName,
} from "@adforge/shared";

/** A design record plus its image bytes while they are held in memory. */
export type DesignArtifact = DesignRecord & { image?: Buffer };

export type DesignStageArtifact = Omit<DesignStageRecord, "designs"> & {
  designs: DesignArtifact[];
};

export type BrandAssets = BrandAssetsRecord & { image?: Buffer };

export type StageArtifacts = {
  concept: ConceptArtifact;
  copy: CopyArtifact;
  design: DesignStageArtifact;
  branding: BrandAssets;
  finalization: FinalizationRecord;
};

export type PipelineStatus =
  | { state: "running"; next: StageName }
  | { state: "done" }
  | { state: "failed"; stage: StageName; reason: string };

export type PipelineContext = {
  projectId: string;
  completed: StageName[];
  artifacts: Partial<StageArtifacts>;
  stageErrors: StageError[];
  failedStage?: StageName;
};

export function createContext(projectId: string): PipelineContext {
  return { projectId, completed: [], artifacts: {}, stageErrors: [] };
}

export function stageIndex(stage: StageName) {
  return PIPELINE_STAGES.indexOf(stage);
}

export function nextStage(context: PipelineContext): StageName | undefined {
  return PIPELINE_STAGES.find((stage) => !context.completed.includes(stage));
}

export function pipelineStatus(context: PipelineContext): PipelineStatus {
  if (context.failedStage) {
    const stage = context.failedStage;
    const error = [...context.stageErrors].reverse().find((entry) => entry.stage === stage);
    return { state: "failed", stage, reason: error?.reason ?? "Stage failed." };
  }
  const next = nextStage(context);
  return next ? { state: "running", next } : { state: "done" };
}

function withoutImage<T extends { image?: Buffer }>(value: T): Omit<T, "image"> {
  const { image: _image, ...rest } = value;
  return rest;
}

/** Serializable copy of the context. Image bytes stay behind; stored paths remain. */
export function toSnapshot(context: PipelineContext): PipelineSnapshot {
  const { concept, copy, design, branding, finalization } = context.artifacts;
  return {
    project_id: context.projectId,
    completed_stages: [...context.completed],
    failed_stage: context.failedStage,
    stage_errors: context.stageErrors.map((entry) => ({ ...entry })),
    artifacts: {
      concept,
      copy,
      design: design ? { ...design, designs: design.designs.map(withoutImage) } : undefined,
      branding: branding ? withoutImage(branding) : undefined,
      finalization,
    },
  };
}

export function fromSnapshot(snapshot: PipelineSnapshot): PipelineContext {
  return {
    projectId: snapshot.project_id,
    // Keep pipeline order and drop stages whose artifact did not survive.
    completed: PIPELINE_STAGES.filter(
      (stage) => snapshot.completed_stages.includes(stage) && snapshot.artifacts[stage] !== undefined
    ),
    artifacts: { ...snapshot.artifacts },
    stageErrors: snapshot.stage_errors.map((entry) => ({ ...entry })),
    failedStage: snapshot.failed_stage,
  };
}
