import { z } from "zod";
import {
  ARTIFACT_CONTENT_TYPES,
  CreativeRunInputSchema,
  RunExecutionSchema,
  RunManifestSchema,
  RunStatusSchema,
  RunStepSchema,
  type RunManifest,
  type RunStatus,
  type RunStep,
} from "@adforge/shared";

const RunDetailSchema = z
  .object({
    run_id: z.uuid(),
    created_at: z.iso.datetime(),
    status: RunStatusSchema,
    current_step: RunStepSchema,
    last_updated_at: z.iso.datetime(),
    step_timestamps: z.record(z.string(), z.iso.datetime()),
    input: CreativeRunInputSchema.optional(),
    execution: RunExecutionSchema.optional(),
  })
  .strict();

const GetRunResponseSchema = z
  .object({
    run: RunDetailSchema,
    artifacts: z.array(z.unknown()),
  })
  .strict();

export const ArtifactMetadataSchema = z.object({
  name: z.string().min(1),
  filename: z.string().min(1),
  content_type: z.enum(ARTIFACT_CONTENT_TYPES),
  sha256: z.string().optional(),
  created_at: z.iso.datetime(),
});

const UploadArtifactResponseSchema = z.object({ artifact: ArtifactMetadataSchema });

const GetArtifactResponseSchema = z.object({
  artifact: ArtifactMetadataSchema,
  payload: z.unknown(),
});

const GetManifestResponseSchema = z.object({ manifest: RunManifestSchema });

export type RunDetail = z.infer<typeof RunDetailSchema>;
export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;
export type ArtifactContentType = (typeof ARTIFACT_CONTENT_TYPES)[number];

export class StudioApiError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = "StudioApiError";
  }
}

type StudioApiClientOptions = {
  baseUrl: string;
  token: string;
  fetchImpl?: typeof fetch;
};

/** HTTP client for the run-tracking API used by the agent CLI. */
export class StudioApiClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: StudioApiClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.token = opts.token;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async getRun(runId: string): Promise<RunDetail> {
    const response = await this.request("GET", `/runs/${runId}`);
    return GetRunResponseSchema.parse(response).run;
  }

  async updateRun(runId: string, patch: { status?: RunStatus; current_step?: RunStep }): Promise<void> {
    await this.request("PATCH", `/runs/${runId}`, patch);
  }

  async updateExecution(
    runId: string,
    patch: { status: "running" | "succeeded" | "failed"; pid?: number; error_message?: string }
  ): Promise<void> {
    await this.request("PATCH", `/runs/${runId}/execution`, patch, true);
  }

  async uploadArtifact(
    runId: string,
    artifact: { name: string; content_type: ArtifactContentType; payload: unknown }
  ): Promise<ArtifactMetadata> {
    const response = await this.request("POST", `/runs/${runId}/artifacts`, artifact, true);
    return UploadArtifactResponseSchema.parse(response).artifact;
  }

  async getArtifact(runId: string, name: string) {
    const response = await this.request("GET", `/runs/${runId}/artifacts/${encodeURIComponent(name)}`);
    return GetArtifactResponseSchema.parse(response);
  }

  /** Undefined when the run has no manifest yet. */
  async getManifest(runId: string): Promise<RunManifest | undefined> {
    try {
      const response = await this.request("GET", `/runs/${runId}/manifest`);
      return GetManifestResponseSchema.parse(response).manifest;
    } catch (error) {
      if (error instanceof StudioApiError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  private async request(method: string, path: string, body?: unknown, authenticated = false): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: "application/json",
    };

    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (authenticated) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const text = await response.text();

    if (!response.ok) {
      throw new StudioApiError(
        `Studio API ${method} ${path} failed with ${response.status}: ${text || response.statusText}`,
        response.status
      );
    }

    return text ? JSON.parse(text) : undefined;
  }
}
