import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import {
  CopyRecordSchema,
  PIPELINE_STAGES,
  type PipelineSnapshot,
  type StageError,
  type StageName,
} from "@adforge/shared";
import {
  createContext,
  fromSnapshot,
  nextStage,
  pipelineStatus,
  stageIndex,
  toSnapshot,
  type DesignArtifact,
  type PipelineContext,
  type PipelineStatus,
  type StageArtifacts,
} from "./context";
import {
  PipelineHaltedError,
  PrerequisiteMissingError,
  StageCancelledError,
  StageInProgressError,
  buildFailureMessage,
  errorKind,
} from "./errors";
import type { StageExecutors, StageOutcome } from "./executor";

/** Artifacts each stage reads. Every stage needs at least its predecessor. */
export const STAGE_PREREQUISITES: Record<StageName, readonly StageName[]> = {
  concept: [],
  copy: ["concept"],
  design: ["concept", "copy"],
  branding: ["design"],
  finalization: ["copy", "design", "branding"],
};

export type StateMachineOptions = {
  logger: Logger;
  projectId?: string;
  createProjectId?: () => string;
  snapshot?: PipelineSnapshot;
};

/**
 * Owns the pipeline context. Stages run one at a time; re-entry and reset
 * bump an epoch so that a stage still in flight has its result discarded.
 */
export class PipelineStateMachine {
  private context: PipelineContext;
  private epoch = 0;
  private controller = new AbortController();
  private inFlight?: StageName;
  private readonly logger: Logger;
  private readonly createProjectId: () => string;

  constructor(
    private readonly executors: StageExecutors,
    options: StateMachineOptions
  ) {
    this.logger = options.logger;
    this.createProjectId = options.createProjectId ?? randomUUID;
    this.context = options.snapshot
      ? fromSnapshot(options.snapshot)
      : createContext(options.projectId ?? this.createProjectId());
  }

  get projectId() {
    return this.context.projectId;
  }

  status(): PipelineStatus {
    return pipelineStatus(this.context);
  }

  completedStages(): StageName[] {
    return [...this.context.completed];
  }

  stageErrors(): StageError[] {
    return this.context.stageErrors.map((entry) => ({ ...entry }));
  }

  artifact<S extends StageName>(stage: S): StageArtifacts[S] | undefined {
    return this.context.artifacts[stage];
  }

  snapshot(): PipelineSnapshot {
    return toSnapshot(this.context);
  }

  missingPrerequisites(stage: StageName): StageName[] {
    return STAGE_PREREQUISITES[stage].filter(
      (required) =>
        !this.context.completed.includes(required) || this.context.artifacts[required] === undefined
    );
  }

  async runStage<S extends StageName>(stage: S): Promise<StageOutcome<S>> {
    if (this.inFlight) {
      throw new StageInProgressError(this.inFlight, stage);
    }
    const missing = this.missingPrerequisites(stage);
    if (missing.length > 0) {
      throw new PrerequisiteMissingError(stage, missing);
    }
    if (this.context.failedStage) {
      throw new PipelineHaltedError(this.context.failedStage);
    }
    if (this.context.completed.includes(stage)) {
      this.logger.info({ stage, projectId: this.projectId }, "Re-entering completed stage");
      this.invalidateFrom(stage, false);
    }

    const epoch = this.epoch;
    const context = this.context;
    const controller = new AbortController();
    this.controller = controller;
    this.inFlight = stage;
    this.logger.info({ stage, projectId: context.projectId }, "Stage started");

    let outcome: StageOutcome<S>;
    try {
      outcome = await this.executors[stage]({
        projectId: context.projectId,
        artifacts: { ...context.artifacts },
        signal: controller.signal,
      });
    } catch (error) {
      if (epoch !== this.epoch) {
        throw this.discard(stage);
      }
      this.inFlight = undefined;
      if (error instanceof PrerequisiteMissingError) {
        throw error;
      }
      outcome = { success: false, failures: [], error };
    }

    if (epoch !== this.epoch) {
      throw this.discard(stage);
    }
    this.inFlight = undefined;

    if (outcome.artifact !== undefined) {
      context.artifacts[stage] = outcome.artifact;
    }

    if (outcome.success) {
      context.completed.push(stage);
      context.stageErrors = context.stageErrors.filter((entry) => entry.stage !== stage);
      this.logger.info(
        { stage, projectId: context.projectId, failures: outcome.failures.length },
        "Stage completed"
      );
    } else {
      const reason = buildFailureMessage(outcome.error);
      context.failedStage = stage;
      context.stageErrors.push({ stage, kind: errorKind(outcome.error), reason });
      this.logger.error({ stage, projectId: context.projectId, reason }, "Stage failed");
    }

    return outcome;
  }

  /** Runs the next pending stage; undefined once the pipeline is done. */
  async runNext(): Promise<StageOutcome<StageName> | undefined> {
    if (this.context.failedStage) {
      throw new PipelineHaltedError(this.context.failedStage);
    }
    const stage = nextStage(this.context);
    return stage ? this.runStage(stage) : undefined;
  }

  async runToCompletion(): Promise<PipelineStatus> {
    let status = this.status();
    while (status.state === "running") {
      await this.runStage(status.next);
      status = this.status();
    }
    return status;
  }

  /**
   * Invalidates `stage` and everything after it. With `keepPartial` the
   * stage's own artifact stays so that a rerun can skip work it already holds.
   */
  reenter(stage: StageName, options: { keepPartial?: boolean } = {}) {
    this.logger.info({ stage, projectId: this.projectId }, "Invalidating stage and its successors");
    this.invalidateFrom(stage, options.keepPartial ?? false);
  }

  /** Replaces one language's copy. Counts as a re-entry of the copy stage. */
  reviseCopy(language: string, record: unknown) {
    const copy = this.context.completed.includes("copy") ? this.context.artifacts.copy : undefined;
    if (!copy) {
      throw new PrerequisiteMissingError("copy", ["copy"]);
    }
    if (!(language in copy.copies)) {
      throw new Error(`No copy exists for language ${language}.`);
    }

    const revised = CopyRecordSchema.parse(record);
    this.invalidateFrom("copy", false);
    this.context.artifacts.copy = {
      copies: { ...copy.copies, [language]: revised },
      defaults_used: copy.defaults_used.filter((entry) => entry !== language),
    };
    this.context.completed.push("copy");
    this.logger.info({ language, projectId: this.projectId }, "Copy revised");
  }

  /** Swaps one variant's design for an edited one. Counts as a re-entry of finalization. */
  replaceDesign(edited: DesignArtifact) {
    const design = this.context.completed.includes("design") ? this.context.artifacts.design : undefined;
    if (!design) {
      throw new PrerequisiteMissingError("design", ["design"]);
    }
    if (!design.designs.some((entry) => entry.variant.index === edited.variant.index)) {
      throw new Error(`No design exists for variant ${edited.variant.index}.`);
    }

    this.invalidateFrom("finalization", false);
    this.context.artifacts.design = {
      ...design,
      designs: design.designs.map((entry) => (entry.variant.index === edited.variant.index ? edited : entry)),
    };
    this.logger.info({ variant: edited.variant.index, projectId: this.projectId }, "Design replaced");
  }

  /** Discards the whole context and starts over under a new project id. */
  reset() {
    this.cancelInFlight();
    this.context = createContext(this.createProjectId());
    this.logger.info({ projectId: this.projectId }, "Pipeline reset");
  }

  /** Re-opens the failed stage. Returns false when nothing had failed. */
  resume() {
    const failed = this.context.failedStage;
    if (!failed) {
      return false;
    }
    this.context.failedStage = undefined;
    this.logger.info({ stage: failed, projectId: this.projectId }, "Resuming failed stage");
    return true;
  }

  private invalidateFrom(stage: StageName, keepOwnArtifact: boolean) {
    const from = stageIndex(stage);
    const affected = (candidate: StageName) => stageIndex(candidate) >= from;

    this.context.completed = this.context.completed.filter((entry) => !affected(entry));
    for (const candidate of PIPELINE_STAGES) {
      if (affected(candidate) && !(keepOwnArtifact && candidate === stage)) {
        delete this.context.artifacts[candidate];
      }
    }
    this.context.stageErrors = this.context.stageErrors.filter((entry) => !affected(entry.stage));
    if (this.context.failedStage && affected(this.context.failedStage)) {
      this.context.failedStage = undefined;
    }
    this.cancelInFlight();
  }

  private cancelInFlight() {
    this.epoch += 1;
    if (this.inFlight) {
      this.controller.abort(new StageCancelledError(this.inFlight));
      this.inFlight = undefined;
    }
  }

  private discard(stage: StageName) {
    this.logger.warn({ stage }, "Discarding result of invalidated stage run");
    return new StageCancelledError(stage);
  }
}
