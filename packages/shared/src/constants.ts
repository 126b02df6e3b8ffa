// packages/shared/src/constants.ts

/** Manifest contract version. */
export const MANIFEST_VERSION = "1" as const;

/** Pipeline stages in execution order. */
export const PIPELINE_STAGES = ["concept", "copy", "design", "branding", "finalization"] as const;

/** Tags used in canonical artifact names. Logos come from the branding stage. */
export const STAGE_TAGS = {
  concept: "concept",
  copy: "copy",
  design: "design",
  branding: "logo",
  finalization: "final",
} as const;

/** Copy records keep at most this many bullet points. */
export const MAX_BULLET_POINTS = 3;

/** External calls per unit of work (stage call or variant). */
export const MAX_SERVICE_ATTEMPTS = 3;

/** Quantity tiers restrict which members of each axis are active. */
export const QUANTITY_TIERS = ["minimal", "standard", "full"] as const;

export const IMAGE_QUALITIES = ["low", "medium", "high", "auto"] as const;

/** Run lifecycle for filesystem tracking (runs/index.json + run.json). */
export const RUN_STATUSES = ["created", "running", "partial", "completed", "failed"] as const;

/** Step names; "created" plus one per pipeline stage. */
export const RUN_STEPS = ["created", ...PIPELINE_STAGES] as const;

/** Execution lifecycle for dispatched pipeline processes. */
export const RUN_EXECUTION_STATUSES = [
  "queued",
  "dispatched",
  "running",
  "succeeded",
  "failed",
] as const;

export const WORKFLOW_NAMES = ["creative-pipeline"] as const;

export const ARTIFACT_CONTENT_TYPES = [
  "application/json",
  "text/plain",
  "text/markdown",
  "image/png",
] as const;

/** Artifact name the manifest is stored under. */
export const MANIFEST_ARTIFACT_NAME = "manifest";
