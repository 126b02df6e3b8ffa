import path from "node:path";
import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";

import {
  MANIFEST_ARTIFACT_NAME,
  RunManifestSchema,
  type CreativeRunInput,
  type RunExecution,
  type RunExecutionStatus,
  type RunManifest,
  type WorkflowName,
} from "@adforge/shared";
import { ArtifactsIndexSchema, ArtifactMetadataSchema, RunDetailSchema, RunsIndexSchema } from "./runs.schemas";
import type { ArtifactContentType, ArtifactMetadata, RunDetail, RunRecord } from "./runs.schemas";
import {
  ensureDir,
  readJson,
  sha256Hex,
  sortRunsNewestFirst,
  writeBinaryAtomic,
  writeJsonAtomic,
  writeTextAtomic,
} from "./jsonFileStorage";

/**
 * RunStore - filesystem persistence for creative runs.
 *
 * - runs/index.json (run history)
 * - runs/<runId>/run.json (brief, status, step timestamps, execution)
 * - runs/<runId>/artifacts/ (JSON records, PNG images, the manifest + artifacts/index.json)
 */

export class RunNotFoundError extends Error {
  constructor(runId: string) {
    super(`Run not found: ${runId}`);
    this.name = "RunNotFoundError";
  }
}

export class RunConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunConflictError";
  }
}

export class ArtifactNotFoundError extends Error {
  constructor(runId: string, name: string) {
    super(`Artifact not found for run ${runId}: ${name}`);
    this.name = "ArtifactNotFoundError";
  }
}

export class InvalidArtifactPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArtifactPayloadError";
  }
}

export class InvalidExecutionTransitionError extends Error {
  constructor(from: RunExecutionStatus, to: RunExecutionStatus) {
    super(`Invalid execution status transition: ${from} -> ${to}`);
    this.name = "InvalidExecutionTransitionError";
  }
}

type UpdateRunPatch = {
  status?: RunRecord["status"];
  current_step?: RunRecord["current_step"];
};

type UpdateExecutionPatch = {
  status: RunExecutionStatus;
  pid?: number;
  error_message?: string;
};

const FILE_EXTENSIONS: Record<ArtifactContentType, string> = {
  "application/json": ".json",
  "text/plain": ".txt",
  "text/markdown": ".md",
  "image/png": ".png",
};

function toSafeFilename(name: string, contentType: ArtifactContentType): string {
  const extension = FILE_EXTENSIONS[contentType];
  const safe = name.trim().toLowerCase().replace(/[^a-z0-9._-]+/g, "_").replace(/^\.+/, "");
  const stem = safe.endsWith(extension) ? safe.slice(0, -extension.length) : safe;
  // artifacts/index.json is reserved for the artifact index itself.
  const filename = `${stem || "artifact"}${extension}`;
  return filename === "index.json" ? "index_artifact.json" : filename;
}

function assertCanMoveExecution(from: RunExecutionStatus, to: RunExecutionStatus) {
  const allowed: Record<RunExecutionStatus, RunExecutionStatus[]> = {
    queued: ["dispatched", "failed"],
    dispatched: ["running", "failed"],
    running: ["succeeded", "failed"],
    succeeded: [],
    failed: [],
  };

  if (!allowed[from].includes(to)) {
    throw new InvalidExecutionTransitionError(from, to);
  }
}

function encodePayload(payload: unknown, contentType: ArtifactContentType): string | Buffer {
  if (contentType === "application/json") {
    return JSON.stringify(payload, null, 2) + "\n";
  }
  if (contentType === "image/png") {
    if (Buffer.isBuffer(payload)) {
      return payload;
    }
    if (typeof payload !== "string") {
      throw new InvalidArtifactPayloadError("image/png artifacts need a base64 string payload.");
    }
    const bytes = Buffer.from(payload, "base64");
    if (bytes.length === 0) {
      throw new InvalidArtifactPayloadError("image/png payload decoded to zero bytes.");
    }
    return bytes;
  }
  return typeof payload === "string" ? payload : String(payload);
}

export class RunStore {
  private readonly runsDir: string;
  private readonly indexPath: string;

  constructor(opts?: { runsDir?: string }) {
    const defaultRunsDir = path.resolve(__dirname, "../../../../../runs");
    const configuredRunsDir = opts?.runsDir ?? process.env.RUNS_DIR;
    this.runsDir = configuredRunsDir && configuredRunsDir.trim() ? configuredRunsDir : defaultRunsDir;
    this.indexPath = path.join(this.runsDir, "index.json");
  }

  // Tail of the pending read-modify-write chain per key (run, artifacts index, runs index).
  private readonly locks = new Map<string, Promise<void>>();

  get rootDir() {
    return this.runsDir;
  }

  async createRun(input: CreativeRunInput): Promise<RunDetail> {
    await ensureDir(this.runsDir);

    const now = new Date().toISOString();
    const run: RunDetail = RunDetailSchema.parse({
      run_id: randomUUID(),
      created_at: now,
      status: "created",
      current_step: "created",
      last_updated_at: now,
      step_timestamps: { created: now },
      input,
    });

    await ensureDir(this.getArtifactsDir(run.run_id));
    return this.persistRun(run, now);
  }

  async listRuns(): Promise<RunRecord[]> {
    const index = await this.readOrInitIndex();
    return sortRunsNewestFirst(index.runs);
  }

  async getRun(runId: string): Promise<RunDetail> {
    try {
      return await readJson(this.getRunPath(runId), RunDetailSchema);
    } catch {
      throw new RunNotFoundError(runId);
    }
  }

  async updateRun(runId: string, patch: UpdateRunPatch): Promise<RunDetail> {
    return this.exclusive(`run:${runId}`, async () => {
      const existing = await this.getRun(runId);
      return this.persistRun({
        ...existing,
        ...patch,
        step_timestamps: this.nextStepTimestamps(existing, patch.current_step),
      });
    });
  }

  async queueExecution(runId: string, workflowName: WorkflowName): Promise<RunDetail> {
    return this.exclusive(`run:${runId}`, async () => {
      const existing = await this.getRun(runId);

      if (!existing.input) {
        throw new RunConflictError("Cannot dispatch a run without a persisted brief.");
      }

      const status = existing.execution?.status;
      if (status && ["queued", "dispatched", "running"].includes(status)) {
        throw new RunConflictError(`Run execution is already active: ${status}`);
      }

      return this.persistRun({
        ...existing,
        execution: {
          workflow_name: workflowName,
          status: "queued",
          requested_at: new Date().toISOString(),
        },
      });
    });
  }

  async markExecutionDispatched(runId: string, pid?: number): Promise<RunDetail> {
    return this.updateExecution(runId, { status: "dispatched", pid });
  }

  async failExecution(runId: string, errorMessage: string): Promise<RunDetail> {
    return this.exclusive(`run:${runId}`, async () => {
      const existing = await this.getRun(runId);
      const status = existing.execution?.status;

      if (!status) {
        throw new RunConflictError("Cannot fail execution before it exists.");
      }
      if (status === "succeeded" || status === "failed") {
        throw new RunConflictError(`Execution is already terminal: ${status}`);
      }

      return this.applyExecution(existing, { status: "failed", error_message: errorMessage });
    });
  }

  async updateExecution(runId: string, patch: UpdateExecutionPatch): Promise<RunDetail> {
    return this.exclusive(`run:${runId}`, async () => this.applyExecution(await this.getRun(runId), patch));
  }

  private async applyExecution(existing: RunDetail, patch: UpdateExecutionPatch): Promise<RunDetail> {
    const current = existing.execution;

    if (!current) {
      throw new RunConflictError("Execution has not been created for this run.");
    }

    assertCanMoveExecution(current.status, patch.status);

    const now = new Date().toISOString();
    const nextExecution: RunExecution = {
      ...current,
      status: patch.status,
      pid: patch.pid ?? current.pid,
      error_message: patch.status === "failed" ? patch.error_message : undefined,
      started_at: patch.status === "running" ? current.started_at ?? now : current.started_at,
      completed_at: patch.status === "succeeded" || patch.status === "failed" ? now : current.completed_at,
    };

    return this.persistRun({ ...existing, execution: nextExecution });
  }

  /** JSON and text payloads are written as-is; image/png takes base64 text or raw bytes. */
  async writeArtifact(
    runId: string,
    name: string,
    payload: unknown,
    contentType: ArtifactContentType = "application/json"
  ): Promise<ArtifactMetadata> {
    await this.getRun(runId);

    const artifactsDir = this.getArtifactsDir(runId);
    await ensureDir(artifactsDir);

    const filename = toSafeFilename(name, contentType);
    const contents = encodePayload(payload, contentType);
    if (Buffer.isBuffer(contents)) {
      await writeBinaryAtomic(path.join(artifactsDir, filename), contents);
    } else {
      await writeTextAtomic(path.join(artifactsDir, filename), contents);
    }

    const meta: ArtifactMetadata = ArtifactMetadataSchema.parse({
      name,
      filename,
      content_type: contentType,
      sha256: sha256Hex(contents),
      created_at: new Date().toISOString(),
    });

    await this.exclusive(`artifacts:${runId}`, async () => {
      const index = await this.readOrInitArtifactsIndex(runId);
      const nextArtifacts = [...index.artifacts.filter((a) => a.name !== name), meta].sort((a, b) =>
        a.created_at !== b.created_at
          ? a.created_at < b.created_at
            ? 1
            : -1
          : a.name < b.name
            ? -1
            : a.name > b.name
              ? 1
              : 0
      );

      await writeJsonAtomic(
        this.getArtifactsIndexPath(runId),
        ArtifactsIndexSchema.parse({ version: 1, artifacts: nextArtifacts })
      );
    });
    return meta;
  }

  async listArtifacts(runId: string): Promise<ArtifactMetadata[]> {
    await this.getRun(runId);
    const index = await this.readOrInitArtifactsIndex(runId);
    return index.artifacts;
  }

  /** PNG payloads come back base64 encoded; JSON is parsed; text is returned as-is. */
  async readArtifact(runId: string, name: string): Promise<{ artifact: ArtifactMetadata; payload: unknown }> {
    await this.getRun(runId);

    const index = await this.readOrInitArtifactsIndex(runId);
    const artifact = index.artifacts.find((candidate) => candidate.name === name);
    if (!artifact) {
      throw new ArtifactNotFoundError(runId, name);
    }

    const filePath = path.join(this.getArtifactsDir(runId), artifact.filename);
    if (artifact.content_type === "image/png") {
      const bytes = await fs.readFile(filePath);
      return { artifact, payload: bytes.toString("base64") };
    }

    const raw = await fs.readFile(filePath, "utf8");
    const payload = artifact.content_type === "application/json" ? JSON.parse(raw) : raw;
    return { artifact, payload };
  }

  async readManifest(runId: string): Promise<RunManifest> {
    const { payload } = await this.readArtifact(runId, MANIFEST_ARTIFACT_NAME);
    return RunManifestSchema.parse(payload);
  }

  private async persistRun(run: RunDetail, now = new Date().toISOString()): Promise<RunDetail> {
    const validated = RunDetailSchema.parse({
      ...run,
      last_updated_at: now,
    });

    await ensureDir(this.getRunDir(validated.run_id));
    await writeJsonAtomic(this.getRunPath(validated.run_id), validated);

    await this.exclusive("runs-index", async () => {
      const index = await this.readOrInitIndex();
      const nextRuns = sortRunsNewestFirst([
        ...index.runs.filter((r) => r.run_id !== validated.run_id),
        this.toRunRecord(validated),
      ]);
      await writeJsonAtomic(this.indexPath, RunsIndexSchema.parse({ version: 1, runs: nextRuns }));
    });

    return validated;
  }

  /** Runs `task` after every earlier task queued under the same key has settled. */
  private async exclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);
    try {
      return await result;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  private nextStepTimestamps(existing: RunDetail, step?: RunRecord["current_step"]) {
    const next = { ...(existing.step_timestamps ?? {}) };
    if (step) {
      next[step] ??= new Date().toISOString();
    }
    return next;
  }

  private toRunRecord(run: RunDetail): RunRecord {
    const { run_id, created_at, status, current_step, last_updated_at } = run;
    return { run_id, created_at, status, current_step, last_updated_at };
  }

  private async readOrInitIndex() {
    try {
      return await readJson(this.indexPath, RunsIndexSchema);
    } catch {
      await ensureDir(this.runsDir);
      const fresh = RunsIndexSchema.parse({ version: 1, runs: [] });
      await writeJsonAtomic(this.indexPath, fresh);
      return fresh;
    }
  }

  private async readOrInitArtifactsIndex(runId: string) {
    const idxPath = this.getArtifactsIndexPath(runId);
    try {
      return await readJson(idxPath, ArtifactsIndexSchema);
    } catch {
      await ensureDir(this.getArtifactsDir(runId));
      const fresh = ArtifactsIndexSchema.parse({ version: 1, artifacts: [] });
      await writeJsonAtomic(idxPath, fresh);
      return fresh;
    }
  }

  private getRunDir(runId: string) {
    return path.join(this.runsDir, runId);
  }

  private getRunPath(runId: string) {
    return path.join(this.getRunDir(runId), "run.json");
  }

  private getArtifactsDir(runId: string) {
    return path.join(this.getRunDir(runId), "artifacts");
  }

  private getArtifactsIndexPath(runId: string) {
    return path.join(this.getArtifactsDir(runId), "index.json");
  }
}
