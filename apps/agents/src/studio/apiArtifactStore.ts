import { MANIFEST_ARTIFACT_NAME, type RunManifest, type StoredArtifact } from "@adforge/shared";
import type { ArtifactStore } from "../providers/contracts";
import type { ArtifactMetadata, StudioApiClient } from "./studioApiClient";

function toStored(runId: string, meta: ArtifactMetadata): StoredArtifact {
  return {
    name: meta.name,
    path: `runs/${runId}/artifacts/${meta.filename}`,
    sha256: meta.sha256,
  };
}

/** Stores a run's outputs through the run-tracking API. Images travel as base64 PNG. */
export class ApiArtifactStore implements ArtifactStore {
  constructor(
    private readonly api: StudioApiClient,
    private readonly runId: string
  ) {}

  async save(payload: Buffer | string, canonicalName: string): Promise<StoredArtifact> {
    const meta = await this.api.uploadArtifact(
      this.runId,
      Buffer.isBuffer(payload)
        ? { name: canonicalName, content_type: "image/png", payload: payload.toString("base64") }
        : { name: canonicalName, content_type: "text/plain", payload }
    );
    return toStored(this.runId, meta);
  }

  async load(name: string): Promise<Buffer> {
    const { artifact, payload } = await this.api.getArtifact(this.runId, name);
    if (typeof payload !== "string") {
      throw new Error(`Artifact ${name} is not binary content.`);
    }
    return artifact.content_type === "image/png" ? Buffer.from(payload, "base64") : Buffer.from(payload, "utf8");
  }

  async writeManifest(manifest: RunManifest): Promise<StoredArtifact> {
    const meta = await this.api.uploadArtifact(this.runId, {
      name: MANIFEST_ARTIFACT_NAME,
      content_type: "application/json",
      payload: manifest,
    });
    return toStored(this.runId, meta);
  }

  async readManifest(): Promise<RunManifest | undefined> {
    return this.api.getManifest(this.runId);
  }
}
