import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { buildApp } from "../../app";
import { LocalWorkflowRunnerError, type WorkflowDispatcher } from "./localWorkflowRunner";
import { RunStore } from "./runStore";

const AUTH = { authorization: "Bearer test-secret" };
const brief = { prompt: "Launch campaign for a reusable bottle", brand: { name: "Acme" } };

describe("runs routes", () => {
  let runsDir: string;
  let runStore: RunStore;
  let dispatchWorkflow: Mock<WorkflowDispatcher["dispatchWorkflow"]>;

  beforeEach(async () => {
    process.env.STUDIO_API_TOKEN = "test-secret";
    runsDir = await mkdtemp(path.join(os.tmpdir(), "runs-routes-"));
    runStore = new RunStore({ runsDir });
    dispatchWorkflow = vi.fn<WorkflowDispatcher["dispatchWorkflow"]>(async () => ({ pid: 321 }));
  });

  afterEach(async () => {
    await rm(runsDir, { recursive: true, force: true });
  });

  function app() {
    return buildApp({ logger: false, runStore, dispatcher: { dispatchWorkflow } });
  }

  async function createRun() {
    const response = await app().inject({ method: "POST", url: "/runs", payload: { brief } });
    return response.json<{ run: { run_id: string } }>().run.run_id;
  }

  it("creates a run with tier and selection defaults", async () => {
    const response = await app().inject({ method: "POST", url: "/runs", payload: { brief } });

    expect(response.statusCode).toBe(201);
    expect(response.json().run.input).toEqual({ brief, quantity_tier: "standard", selection: {} });
  });

  it("rejects an invalid brief", async () => {
    const response = await app().inject({ method: "POST", url: "/runs", payload: { brief: { prompt: "" } } });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("bad_request");
  });

  it("lists runs and returns run details with artifacts", async () => {
    const runId = await createRun();
    const list = await app().inject({ method: "GET", url: "/runs" });
    const detail = await app().inject({ method: "GET", url: `/runs/${runId}` });

    expect(list.json().total).toBe(1);
    expect(detail.json()).toMatchObject({ run: { run_id: runId, status: "created" }, artifacts: [] });
  });

  it("returns 404 for unknown runs", async () => {
    const response = await app().inject({ method: "GET", url: "/runs/6f1c2b8e-1d2a-4c3b-9e4f-5a6b7c8d9e0f" });
    expect(response.statusCode).toBe(404);
    expect(response.json().error).toBe("run_not_found");
  });

  it("requires the agent token for dispatch and uploads", async () => {
    const runId = await createRun();
    const dispatch = await app().inject({ method: "POST", url: `/runs/${runId}/dispatch` });
    const upload = await app().inject({
      method: "POST",
      url: `/runs/${runId}/artifacts`,
      headers: { authorization: "Bearer wrong" },
      payload: { name: "notes", content_type: "text/plain", payload: "hi" },
    });

    expect(dispatch.statusCode).toBe(401);
    expect(upload.statusCode).toBe(401);
    expect(dispatchWorkflow).not.toHaveBeenCalled();
  });

  it("dispatches the pipeline and refuses a second active dispatch", async () => {
    const runId = await createRun();
    const first = await app().inject({ method: "POST", url: `/runs/${runId}/dispatch`, headers: AUTH });
    const second = await app().inject({
      method: "POST",
      url: `/runs/${runId}/dispatch/creative-pipeline`,
      headers: AUTH,
    });

    expect(first.statusCode).toBe(200);
    expect(first.json().execution).toMatchObject({ workflow_name: "creative-pipeline", status: "dispatched", pid: 321 });
    expect(dispatchWorkflow).toHaveBeenCalledWith({ workflowName: "creative-pipeline", runId });
    expect(second.statusCode).toBe(409);
  });

  it("records a failed local dispatch on the execution", async () => {
    dispatchWorkflow.mockRejectedValueOnce(new LocalWorkflowRunnerError("no entrypoint"));
    const runId = await createRun();
    const response = await app().inject({ method: "POST", url: `/runs/${runId}/dispatch`, headers: AUTH });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toMatchObject({
      error: "local_dispatch_failed",
      execution: { status: "failed", error_message: "no entrypoint" },
    });
  });

  it("stores uploads and serves them back by name", async () => {
    const runId = await createRun();
    const upload = await app().inject({
      method: "POST",
      url: `/runs/${runId}/artifacts`,
      headers: AUTH,
      payload: { name: "copy", content_type: "application/json", payload: { copies: {} } },
    });
    const read = await app().inject({ method: "GET", url: `/runs/${runId}/artifacts/copy` });

    expect(upload.statusCode).toBe(201);
    expect(upload.json().artifact).toMatchObject({ name: "copy", filename: "copy.json", content_type: "application/json" });
    expect(read.json().payload).toEqual({ copies: {} });
  });

  it("rejects non-string payloads for image uploads", async () => {
    const runId = await createRun();
    const response = await app().inject({
      method: "POST",
      url: `/runs/${runId}/artifacts`,
      headers: AUTH,
      payload: { name: "logo", content_type: "image/png", payload: { bytes: [1, 2] } },
    });
    expect(response.statusCode).toBe(400);
  });

  it("answers 404 until a manifest exists", async () => {
    const runId = await createRun();
    const response = await app().inject({ method: "GET", url: `/runs/${runId}/manifest` });
    expect(response.statusCode).toBe(404);
    expect(response.json().error).toBe("manifest_not_found");
  });

  it("updates the run step and status", async () => {
    const runId = await createRun();
    const response = await app().inject({
      method: "PATCH",
      url: `/runs/${runId}`,
      payload: { status: "running", current_step: "design" },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().run).toMatchObject({ status: "running", current_step: "design" });
    expect(Object.keys(response.json().run.step_timestamps)).toEqual(["created", "design"]);
  });
});
