import {
  MANIFEST_VERSION,
  type ManifestEntry,
  type PipelineSnapshot,
  type RunManifest,
} from "@adforge/shared";
import type { PipelineStatus } from "./context";

/** Lists every stored design, the logo and every final creative of a run. */
export function buildManifest(
  snapshot: PipelineSnapshot,
  status: PipelineStatus,
  generatedAt: Date
): RunManifest {
  const { design, branding, finalization } = snapshot.artifacts;
  const entries: ManifestEntry[] = [
    ...(design?.designs ?? []).map((record) => ({
      kind: "design" as const,
      variant: record.variant,
      stored: record.stored,
    })),
    ...(branding ? [{ kind: "logo" as const, stored: branding.stored }] : []),
    ...(finalization?.creatives ?? []).map((creative) => ({
      kind: "final" as const,
      variant: creative.variant,
      stored: creative.stored,
    })),
  ];

  return {
    manifest_version: MANIFEST_VERSION,
    project_id: snapshot.project_id,
    generated_at: generatedAt.toISOString(),
    status: status.state === "done" ? "done" : "failed",
    entries,
    failures: [...(design?.failures ?? []), ...(finalization?.failures ?? [])],
    snapshot,
  };
}
