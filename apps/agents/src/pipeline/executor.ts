import type { StageName, VariantFailure } from "@adforge/shared";
import type { StageArtifacts } from "./context";

/** What an executor sees: artifacts of earlier stages and the stage's abort signal. */
export type StageInput = {
  projectId: string;
  artifacts: Readonly<Partial<StageArtifacts>>;
  signal: AbortSignal;
};

export type StageOutcome<S extends StageName> =
  | { success: true; artifact: StageArtifacts[S]; failures: VariantFailure[] }
  | { success: false; artifact?: StageArtifacts[S]; failures: VariantFailure[]; error: unknown };

export type StageExecutor<S extends StageName> = (input: StageInput) => Promise<StageOutcome<S>>;

export type StageExecutors = { [S in StageName]: StageExecutor<S> };
