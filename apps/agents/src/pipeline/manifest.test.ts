import { describe, expect, it } from "vitest";
import type { PipelineSnapshot, VariantRequest } from "@adforge/shared";
import { buildManifest } from "./manifest";

const square: VariantRequest = { index: 0, color_scheme: "vibrant", format: "1x1", language: "en" };
const vertical: VariantRequest = { index: 1, color_scheme: "vibrant", format: "9x16", language: "en" };

const stored = (name: string) => ({ name, path: `memory/${name}` });

function snapshot(): PipelineSnapshot {
  return {
    project_id: "p1",
    completed_stages: ["concept", "copy", "design", "branding", "finalization"],
    stage_errors: [],
    artifacts: {
      design: {
        requests: [square, vertical],
        schemes: [{ id: "vibrant", colors: { primary: "#FF6B35" } }],
        designs: [
          {
            variant: square,
            prompt: "square prompt",
            palette: { id: "vibrant", colors: { primary: "#FF6B35" } },
            width: 64,
            height: 64,
            stored: stored("design-square"),
          },
        ],
        failures: [
          { stage: "design", variant: vertical, kind: "empty_artifact", reason: "no bytes", attempts: 3 },
        ],
      },
      branding: { prompt: "logo prompt", width: 32, height: 32, stored: stored("logo") },
      finalization: {
        creatives: [
          {
            variant: square,
            design: stored("design-square"),
            logo: stored("logo"),
            footer_lines: ["© 2026 Acme"],
            stored: stored("final-square"),
          },
        ],
        failures: [],
      },
    },
  };
}

describe("buildManifest", () => {
  it("lists designs, then the logo, then finals", () => {
    const manifest = buildManifest(snapshot(), { state: "done" }, new Date("2026-03-01T12:00:00Z"));

    expect(manifest.status).toBe("done");
    expect(manifest.generated_at).toBe("2026-03-01T12:00:00.000Z");
    expect(manifest.entries.map((entry) => [entry.kind, entry.stored.name])).toEqual([
      ["design", "design-square"],
      ["logo", "logo"],
      ["final", "final-square"],
    ]);
    expect(manifest.failures.map((failure) => failure.variant.index)).toEqual([1]);
  });

  it("marks a halted pipeline as failed", () => {
    const manifest = buildManifest(
      snapshot(),
      { state: "failed", stage: "branding", reason: "logo model down" },
      new Date("2026-03-01T12:00:00Z")
    );
    expect(manifest.status).toBe("failed");
  });

  it("treats a still running pipeline as failed", () => {
    const manifest = buildManifest(
      { project_id: "p1", completed_stages: [], stage_errors: [], artifacts: {} },
      { state: "running", next: "concept" },
      new Date("2026-03-01T12:00:00Z")
    );
    expect(manifest).toMatchObject({ status: "failed", entries: [], failures: [] });
  });
});
