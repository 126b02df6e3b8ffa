import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { MANIFEST_ARTIFACT_NAME, type WorkflowName } from "@adforge/shared";

import {
  CreateRunRequestSchema,
  CreateRunResponseSchema,
  DispatchRunParamsSchema,
  DispatchRunResponseSchema,
  GetArtifactParamsSchema,
  GetArtifactResponseSchema,
  GetManifestResponseSchema,
  GetRunResponseSchema,
  ListRunsResponseSchema,
  RunIdParamsSchema,
  UpdateExecutionRequestSchema,
  UpdateExecutionResponseSchema,
  UpdateRunRequestSchema,
  UpdateRunResponseSchema,
  UploadArtifactRequestSchema,
  UploadArtifactResponseSchema,
} from "./runs.dtos";
import { LocalWorkflowRunnerError, type WorkflowDispatcher } from "./localWorkflowRunner";
import type { RunStore } from "./runStore";
import {
  ArtifactNotFoundError,
  InvalidArtifactPayloadError,
  InvalidExecutionTransitionError,
  RunConflictError,
  RunNotFoundError,
} from "./runStore";

// Maps the store's errors and validation failures to HTTP replies; anything else is rethrown.
function sendKnownError(reply: FastifyReply, err: unknown) {
  if (err instanceof RunNotFoundError) {
    return reply.code(404).send({ error: "run_not_found", message: err.message });
  }
  if (err instanceof ArtifactNotFoundError) {
    return reply.code(404).send({ error: "artifact_not_found", message: err.message });
  }
  if (err instanceof RunConflictError) {
    return reply.code(409).send({ error: "run_conflict", message: err.message });
  }
  if (err instanceof InvalidExecutionTransitionError) {
    return reply.code(400).send({ error: "bad_transition", message: err.message });
  }
  if (err instanceof InvalidArtifactPayloadError) {
    return reply.code(400).send({ error: "bad_payload", message: err.message });
  }
  if (err instanceof z.ZodError) {
    return reply.code(400).send({ error: "bad_request", issues: err.issues });
  }
  throw err;
}

export function createRunsController(deps: { runStore: RunStore; dispatcher: WorkflowDispatcher }) {
  const { runStore, dispatcher } = deps;

  return {
    async createRun(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = CreateRunRequestSchema.parse(request.body);
        const run = await runStore.createRun(input);
        return reply.code(201).send(CreateRunResponseSchema.parse({ run }));
      } catch (err) {
        return sendKnownError(reply, err);
      }
    },

    async listRuns(_request: FastifyRequest, reply: FastifyReply) {
      const runs = await runStore.listRuns();
      return reply.send(ListRunsResponseSchema.parse({ total: runs.length, runs }));
    },

    async getRun(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { runId } = RunIdParamsSchema.parse(request.params);
        const run = await runStore.getRun(runId);
        const artifacts = await runStore.listArtifacts(runId);
        return reply.send(GetRunResponseSchema.parse({ run, artifacts }));
      } catch (err) {
        return sendKnownError(reply, err);
      }
    },

    async updateRun(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { runId } = RunIdParamsSchema.parse(request.params);
        const patch = UpdateRunRequestSchema.parse(request.body);
        const run = await runStore.updateRun(runId, patch);
        return reply.send(UpdateRunResponseSchema.parse({ run }));
      } catch (err) {
        return sendKnownError(reply, err);
      }
    },

    async dispatchRun(request: FastifyRequest, reply: FastifyReply) {
      let runId = "";
      let queued = false;
      let workflowName: WorkflowName = "creative-pipeline";

      try {
        const hasWorkflow =
          typeof request.params === "object" && request.params !== null && "workflowName" in request.params;
        if (hasWorkflow) {
          const params = DispatchRunParamsSchema.parse(request.params);
          runId = params.runId;
          workflowName = params.workflowName;
        } else {
          runId = RunIdParamsSchema.parse(request.params).runId;
        }

        await runStore.queueExecution(runId, workflowName);
        queued = true;

        const { pid } = await dispatcher.dispatchWorkflow({ workflowName, runId });
        const dispatchedRun = await runStore.markExecutionDispatched(runId, pid);
        return reply.send(
          DispatchRunResponseSchema.parse({
            run_id: runId,
            execution: dispatchedRun.execution,
          })
        );
      } catch (err) {
        if (err instanceof LocalWorkflowRunnerError) {
          const failedRun = queued ? await runStore.failExecution(runId, err.message) : undefined;
          return reply
            .code(500)
            .send({ error: "local_dispatch_failed", message: err.message, execution: failedRun?.execution });
        }
        return sendKnownError(reply, err);
      }
    },

    async getArtifact(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { runId, artifactName } = GetArtifactParamsSchema.parse(request.params);
        const artifact = await runStore.readArtifact(runId, artifactName);
        return reply.send(GetArtifactResponseSchema.parse(artifact));
      } catch (err) {
        return sendKnownError(reply, err);
      }
    },

    async getManifest(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { runId } = RunIdParamsSchema.parse(request.params);
        const manifest = await runStore.readManifest(runId);
        return reply.send(GetManifestResponseSchema.parse({ manifest }));
      } catch (err) {
        if (err instanceof ArtifactNotFoundError) {
          return reply
            .code(404)
            .send({ error: "manifest_not_found", message: `No ${MANIFEST_ARTIFACT_NAME} has been written yet.` });
        }
        return sendKnownError(reply, err);
      }
    },

    async updateExecution(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { runId } = RunIdParamsSchema.parse(request.params);
        const patch = UpdateExecutionRequestSchema.parse(request.body);
        const run = await runStore.updateExecution(runId, patch);
        return reply.send(UpdateExecutionResponseSchema.parse({ run }));
      } catch (err) {
        return sendKnownError(reply, err);
      }
    },

    async uploadArtifact(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { runId } = RunIdParamsSchema.parse(request.params);
        const body = UploadArtifactRequestSchema.parse(request.body);
        const artifact = await runStore.writeArtifact(runId, body.name, body.payload, body.content_type);
        return reply.code(201).send(UploadArtifactResponseSchema.parse({ artifact }));
      } catch (err) {
        return sendKnownError(reply, err);
      }
    },
  };
}
