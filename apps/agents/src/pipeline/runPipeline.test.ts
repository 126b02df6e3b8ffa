import { describe, expect, it } from "vitest";
import type { StageName } from "@adforge/shared";
import {
  FakeCompositor,
  FakeImageService,
  FakeTextService,
  MemoryArtifactStore,
  scriptedReply,
  testDependencies,
  type ImageCall,
} from "../testing/fakes";
import { ExternalServiceFailureError } from "./errors";
import { runPipeline } from "./runPipeline";

const failCorporateEnglish = (call: ImageCall) =>
  call.prompt.includes("#2C3E50") && call.prompt.includes('"Headline in English"')
    ? new ExternalServiceFailureError("rate limited")
    : undefined;

// Logos are 32x32 in the test config; designs are 64x64.
const failLogo = (call: ImageCall) => (call.width === 32 ? new ExternalServiceFailureError("logo model down") : undefined);

describe("runPipeline", () => {
  it("produces one final creative per variant and writes the manifest once", async () => {
    const store = new MemoryArtifactStore();
    const image = new FakeImageService();
    const started: StageName[] = [];
    const report = await runPipeline({
      deps: testDependencies({ store, image }),
      projectId: "p1",
      onStageStart: async (stage) => {
        started.push(stage);
      },
    });

    expect(report.status).toEqual({ state: "done" });
    expect(report.failures).toEqual([]);
    expect(started).toEqual(["concept", "copy", "design", "branding", "finalization"]);
    expect(image.calls).toHaveLength(5);
    expect(report.manifest.entries.map((entry) => entry.kind)).toEqual([
      "design",
      "design",
      "design",
      "design",
      "logo",
      "final",
      "final",
      "final",
      "final",
    ]);
    expect(report.manifest.status).toBe("done");
    expect(report.manifest.project_id).toBe("p1");
    expect(report.manifest.generated_at).toBe("2026-03-01T12:00:00.000Z");
    expect(store.manifests).toEqual([report.manifest]);
    expect(report.manifestStored).toEqual({ name: "manifest", path: "memory/manifest.json" });
  });

  it("finishes with the surviving variants when one design keeps failing", async () => {
    const report = await runPipeline({
      deps: testDependencies({ image: new FakeImageService(failCorporateEnglish) }),
      projectId: "p1",
    });

    expect(report.status).toEqual({ state: "done" });
    expect(report.manifest.entries.filter((entry) => entry.kind === "final")).toHaveLength(3);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].variant).toEqual({ index: 3, color_scheme: "corporate", format: "1x1", language: "en" });
  });

  it("halts on a branding failure and still writes the manifest", async () => {
    const store = new MemoryArtifactStore();
    const report = await runPipeline({
      deps: testDependencies({ store, image: new FakeImageService(failLogo) }),
      projectId: "p1",
    });

    expect(report.status).toEqual({ state: "failed", stage: "branding", reason: "logo model down" });
    expect(report.manifest.status).toBe("failed");
    expect(report.manifest.entries.map((entry) => entry.kind)).toEqual(["design", "design", "design", "design"]);
    expect(report.manifest.snapshot.failed_stage).toBe("branding");
    expect(store.manifests).toHaveLength(1);
  });

  it("resumes a failed run from its manifest without repeating finished stages", async () => {
    const store = new MemoryArtifactStore();
    const failed = await runPipeline({
      deps: testDependencies({ store, image: new FakeImageService(failLogo) }),
      projectId: "p1",
    });

    const text = new FakeTextService(scriptedReply);
    const image = new FakeImageService();
    const report = await runPipeline({
      deps: testDependencies({ store, text, image }),
      resumeFrom: failed.manifest,
    });

    expect(report.status).toEqual({ state: "done" });
    expect(report.projectId).toBe("p1");
    expect(text.calls).toEqual([]);
    expect(image.calls.map((call) => call.width)).toEqual([32]);
    expect(report.manifest.entries.filter((entry) => entry.kind === "final")).toHaveLength(4);
    expect(report.manifest.snapshot.stage_errors).toEqual([]);
  });

  it("re-requests only the failed variants when asked to", async () => {
    const store = new MemoryArtifactStore();
    const partial = await runPipeline({
      deps: testDependencies({ store, image: new FakeImageService(failCorporateEnglish) }),
      projectId: "p1",
    });

    const image = new FakeImageService();
    const report = await runPipeline({
      deps: testDependencies({ store, image }),
      resumeFrom: partial.manifest,
      retryFailedVariants: true,
    });

    expect(image.calls).toHaveLength(2);
    expect(image.calls[0].prompt).toContain("#2C3E50");
    expect(report.failures).toEqual([]);
    expect(report.manifest.entries.filter((entry) => entry.kind === "final")).toHaveLength(4);
  });

  it("applies design edits to a finished run and recomposes its creatives", async () => {
    const store = new MemoryArtifactStore();
    const done = await runPipeline({ deps: testDependencies({ store }), projectId: "p1" });

    const image = new FakeImageService();
    const compositor = new FakeCompositor();
    const report = await runPipeline({
      deps: testDependencies({ store, image, compositor }),
      resumeFrom: done.manifest,
      edits: [{ variant: 1, instructions: "add rain" }],
    });

    expect(report.status).toEqual({ state: "done" });
    expect(image.calls).toEqual([]);
    expect(image.edits.map((edit) => edit.source.toString())).toEqual(["image:64x64:2"]);
    expect(compositor.inputs.map((input) => input.design.toString())).toEqual([
      "image:64x64:1",
      "edited:64x64:1",
      "image:64x64:3",
      "image:64x64:4",
    ]);
    expect(report.manifest.snapshot.artifacts.design?.designs.map((design) => design.edit_instructions)).toEqual([
      undefined,
      ["add rain"],
      undefined,
      undefined,
    ]);
  });
});
