import type { FastifyInstance } from "fastify";
import { createAgentAuth, type AgentTokenSource } from "./auth";
import { LocalWorkflowRunner, type WorkflowDispatcher } from "./localWorkflowRunner";
import { createRunsController } from "./runs.controller";
import { RunStore } from "./runStore";

export function registerRunsRoutes(
  app: FastifyInstance,
  deps: { runStore?: RunStore; dispatcher?: WorkflowDispatcher; agentToken?: AgentTokenSource } = {}
) {
  const runStore = deps.runStore ?? new RunStore();
  const dispatcher = deps.dispatcher ?? new LocalWorkflowRunner({ runsDir: runStore.rootDir });
  const controller = createRunsController({ runStore, dispatcher });
  const requireAgentAuth = createAgentAuth(deps.agentToken);

  app.post("/runs", controller.createRun); // Stores a brief and returns the new run.
  app.get("/runs", controller.listRuns);
  app.get("/runs/:runId", controller.getRun); // Run details plus artifact metadata.
  app.get("/runs/:runId/artifacts/:artifactName", controller.getArtifact);
  app.get("/runs/:runId/manifest", controller.getManifest); // Everything the pipeline produced.
  app.patch("/runs/:runId", controller.updateRun);

  app.post("/runs/:runId/dispatch", { preHandler: requireAgentAuth }, controller.dispatchRun);
  app.post("/runs/:runId/dispatch/:workflowName", { preHandler: requireAgentAuth }, controller.dispatchRun);

  // Agent-only: execution state and artifact uploads.
  app.patch("/runs/:runId/execution", { preHandler: requireAgentAuth }, controller.updateExecution);
  app.post("/runs/:runId/artifacts", { preHandler: requireAgentAuth }, controller.uploadArtifact);
}
