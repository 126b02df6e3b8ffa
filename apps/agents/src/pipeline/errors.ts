import type { ErrorKind, StageName } from "@adforge/shared";

/** A stage was asked to run before the artifacts it reads exist. */
export class PrerequisiteMissingError extends Error {
  constructor(
    readonly stage: StageName,
    readonly missing: StageName[]
  ) {
    super(`Cannot run ${stage}: missing artifacts from ${missing.join(", ")}.`);
    this.name = "PrerequisiteMissingError";
  }
}

export class ResponseUnparsableError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ResponseUnparsableError";
  }
}

export class ExternalServiceFailureError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = "ExternalServiceFailureError";
    this.status = options?.status;
  }
}

/** The provider reported success but returned nothing usable. */
export class EmptyArtifactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmptyArtifactError";
  }
}

export class StoreFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "StoreFailureError";
  }
}

/** The pipeline sits in its failed state; only resume() or reset() move it on. */
export class PipelineHaltedError extends Error {
  constructor(readonly failedStage: StageName) {
    super(`Pipeline halted after ${failedStage} failed. Resume or reset it first.`);
    this.name = "PipelineHaltedError";
  }
}

export class StageCancelledError extends Error {
  constructor(readonly stage: StageName) {
    super(`Stage ${stage} was cancelled.`);
    this.name = "StageCancelledError";
  }
}

export function errorKind(error: unknown): ErrorKind {
  if (error instanceof PrerequisiteMissingError) return "prerequisite_missing";
  if (error instanceof ResponseUnparsableError) return "response_unparsable";
  if (error instanceof ExternalServiceFailureError) return "external_service_failure";
  if (error instanceof EmptyArtifactError) return "empty_artifact";
  if (error instanceof StoreFailureError) return "store_failure";
  return "unknown";
}

/** Failures the bounded retry wrapper may attempt again. */
export function isRetryable(error: unknown) {
  return (
    error instanceof ResponseUnparsableError ||
    error instanceof ExternalServiceFailureError ||
    error instanceof EmptyArtifactError
  );
}

export function buildFailureMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export class StageInProgressError extends Error {
  constructor(readonly running: StageName, requested: StageName) {
    super(`Cannot run ${requested} while ${running} is in progress.`);
    this.name = "StageInProgressError";
  }
}
