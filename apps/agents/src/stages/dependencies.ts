import type { Logger } from "pino";
import type { CreativeBrief, CreativeConfig } from "@adforge/shared";
import type { ExpansionResult } from "../expansion/expandVariants";
import type {
  ArtifactStore,
  CreativeCompositor,
  GenerativeImageService,
  GenerativeTextService,
} from "../providers/contracts";
import type { RetryOptions, Sleep } from "../pipeline/retry";

/** Everything the stage executors read or call, injected once per run. */
export type StageDependencies = {
  brief: CreativeBrief;
  config: CreativeConfig;
  plan: ExpansionResult;
  text: GenerativeTextService;
  image: GenerativeImageService;
  store: ArtifactStore;
  compositor: CreativeCompositor;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
};

export function retryOptions(
  deps: StageDependencies,
  signal: AbortSignal,
  label: Record<string, unknown>
): RetryOptions {
  const generation = deps.config.generation;
  return {
    maxAttempts: generation.max_attempts,
    backoffMs: generation.retry_backoff_ms,
    sleep: deps.sleep,
    signal,
    onRetry: (error, attempt) => {
      deps.logger.warn(
        { ...label, attempt, error: error instanceof Error ? error.message : String(error) },
        "Attempt failed, retrying"
      );
    },
  };
}

export function currentTime(deps: StageDependencies) {
  return deps.now ? deps.now() : new Date();
}
