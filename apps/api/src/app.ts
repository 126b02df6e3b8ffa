import Fastify, { type FastifyServerOptions } from "fastify";
import type { AgentTokenSource } from "./modules/runs/auth";
import type { WorkflowDispatcher } from "./modules/runs/localWorkflowRunner";
import { registerRunsRoutes } from "./modules/runs/runs.routes";
import type { RunStore } from "./modules/runs/runStore";

// Base64 PNG uploads are far larger than fastify's 1 MiB default.
const BODY_LIMIT_BYTES = 32 * 1024 * 1024;

export function buildApp(
  opts: {
    logger?: FastifyServerOptions["logger"];
    runStore?: RunStore;
    dispatcher?: WorkflowDispatcher;
    /** Defaults to STUDIO_API_TOKEN read on each agent request. */
    agentToken?: AgentTokenSource;
  } = {}
) {
  const app = Fastify({ logger: opts.logger ?? true, bodyLimit: BODY_LIMIT_BYTES });

  app.get("/health", async () => ({ ok: true }));
  registerRunsRoutes(app, { runStore: opts.runStore, dispatcher: opts.dispatcher, agentToken: opts.agentToken });

  return app;
}
