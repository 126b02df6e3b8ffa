import type { Logger } from "pino";
import type { CreativeConfig, RunStatus, StageName } from "@adforge/shared";
import { loadCreativeConfig } from "./config/loadCreativeConfig";
import { planVariants } from "./expansion/expandVariants";
import { SharpCompositor } from "./imaging/sharpCompositor";
import { createLogger } from "./logger";
import { buildFailureMessage } from "./pipeline/errors";
import { runPipeline, type PipelineReport } from "./pipeline/runPipeline";
import type { CreativeCompositor, GenerativeImageService, GenerativeTextService } from "./providers/contracts";
import { OpenAIImageClient } from "./providers/imageClient";
import { AnthropicTextClient } from "./providers/llmClient";
import type { DesignEdit } from "./stages";
import { ApiArtifactStore } from "./studio/apiArtifactStore";
import { StudioApiClient } from "./studio/studioApiClient";

export type CreativeAgentOptions = {
  api?: StudioApiClient;
  config?: CreativeConfig;
  text?: GenerativeTextService;
  image?: GenerativeImageService;
  compositor?: CreativeCompositor;
  logger?: Logger;
  /** Start over even when an earlier failed manifest exists. */
  fresh?: boolean;
  retryFailedVariants?: boolean;
  /** Design edits applied on top of the stored manifest; finalization reruns afterwards. */
  edits?: DesignEdit[];
};

function readRequiredEnv(name: string) {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} is required.`);
  }
  return value;
}

function runStatusFor(report: PipelineReport): RunStatus {
  if (report.status.state === "failed") {
    return "failed";
  }
  return report.failures.length > 0 ? "partial" : "completed";
}

/**
 * Runs the creative pipeline for a stored run: loads its brief, resumes from
 * a failed manifest when one exists (or when edits or retries ask for it), and
 * reports status back to the API.
 */
export async function runCreativeAgent(runId: string, opts: CreativeAgentOptions = {}): Promise<PipelineReport> {
  const logger = opts.logger ?? createLogger();
  const api =
    opts.api ??
    new StudioApiClient({
      baseUrl: readRequiredEnv("STUDIO_API_BASE_URL"),
      token: readRequiredEnv("STUDIO_API_TOKEN"),
    });

  const bestEffort = async (description: string, call: () => Promise<void>) => {
    try {
      await call();
    } catch (error) {
      logger.warn({ runId, reason: buildFailureMessage(error) }, `${description} failed`);
    }
  };

  try {
    const run = await api.getRun(runId);
    if (!run.input) {
      throw new Error("Run input is missing.");
    }
    const input = run.input;

    const config = opts.config ?? (await loadCreativeConfig());
    // Runs started from the CLI without a dispatch have no execution record to move.
    await bestEffort("Execution update", () => api.updateExecution(runId, { status: "running", pid: process.pid }));
    await api.updateRun(runId, { status: "running" });

    const plan = planVariants(config, input, logger);
    logger.info({ runId, variants: plan.requests.length, active: plan.active }, "Variant plan ready");

    const store = new ApiArtifactStore(api, runId);
    const previous = opts.fresh ? undefined : await store.readManifest();
    const edits = opts.edits ?? [];
    if (edits.length > 0 && !previous) {
      throw new Error("Editing designs needs the manifest of an earlier run.");
    }
    const resumeFrom =
      previous && (previous.status === "failed" || opts.retryFailedVariants || edits.length > 0)
        ? previous
        : undefined;

    const report = await runPipeline({
      deps: {
        brief: input.brief,
        config,
        plan,
        text: opts.text ?? AnthropicTextClient.fromEnv(),
        image: opts.image ?? OpenAIImageClient.fromEnv(),
        store,
        compositor: opts.compositor ?? new SharpCompositor(),
        logger,
      },
      projectId: resumeFrom?.project_id ?? runId.slice(0, 8),
      resumeFrom,
      retryFailedVariants: opts.retryFailedVariants,
      edits,
      onStageStart: (stage: StageName) =>
        bestEffort("Step update", () => api.updateRun(runId, { current_step: stage })),
    });

    const { concept, copy } = report.manifest.snapshot.artifacts;
    if (concept) {
      await api.uploadArtifact(runId, { name: "concept", content_type: "application/json", payload: concept });
    }
    if (copy) {
      await api.uploadArtifact(runId, { name: "copy", content_type: "application/json", payload: copy });
    }

    await api.updateRun(runId, { status: runStatusFor(report) });
    const { status } = report;
    await bestEffort("Execution update", () =>
      api.updateExecution(
        runId,
        status.state === "failed"
          ? { status: "failed", error_message: `${status.stage} failed: ${status.reason}` }
          : { status: "succeeded" }
      )
    );
    return report;
  } catch (error) {
    const message = buildFailureMessage(error);
    logger.error({ runId, reason: message }, "Creative agent failed");

    await bestEffort("Run status update", () => api.updateRun(runId, { status: "failed" }));
    await bestEffort("Execution update", () =>
      api.updateExecution(runId, { status: "failed", error_message: message })
    );

    throw error;
  }
}
