import pino from "pino";
import {
  CreativeConfigSchema,
  type CreativeBrief,
  type CreativeConfig,
  type ImageQuality,
  type RunManifest,
  type StoredArtifact,
} from "@adforge/shared";
import type {
  ArtifactStore,
  ComposeInput,
  CreativeCompositor,
  GenerativeImageService,
  GenerativeTextService,
  ImageInput,
} from "../providers/contracts";
import { planVariants } from "../expansion/expandVariants";
import type { StageInput } from "../pipeline/executor";
import type { StageDependencies } from "../stages/dependencies";

// In-process stand-ins for the collaborators, shared by the agent tests.

export const silentLogger = pino({ level: "silent" });

export const testBrief: CreativeBrief = {
  prompt: "Launch campaign for a reusable bottle",
  brand: { name: "Acme", sector: "retail", tone: "playful" },
};

export function testConfig(overrides: Record<string, unknown> = {}): CreativeConfig {
  return CreativeConfigSchema.parse({
    languages: [
      { id: "pt", name: "Português", fallback_cta: "Saiba mais" },
      { id: "en", name: "English" },
    ],
    formats: [
      { id: "1x1", label: "Square", width: 64, height: 64, layout: "Square layout." },
      { id: "9x16", label: "Vertical", width: 36, height: 64, layout: "Vertical layout." },
    ],
    color_schemes: [
      { id: "vibrant", colors: { primary: "#FF6B35", accent: "#FFD23F" } },
      { id: "corporate", colors: { primary: "#2C3E50" } },
      { id: "warm", from: "vibrant", rotations: { primary: 30 } },
    ],
    quantity_tiers: {
      minimal: { color_schemes: ["vibrant", "corporate"], formats: ["1x1"], languages: ["pt", "en"] },
    },
    generation: {
      retry_backoff_ms: 10,
      design_concurrency: 1,
      design_delay_ms: 0,
      logo_size: 32,
    },
    ...overrides,
  });
}

export type TextCall = { system: string; prompt: string; temperature: number };
export type TextReply = string | Error;

/** Answers each generateText call with the next reply from `reply`. */
export class FakeTextService implements GenerativeTextService {
  readonly calls: TextCall[] = [];
  readonly analyzed: ImageInput[] = [];

  constructor(
    private readonly reply: (call: TextCall, index: number) => TextReply,
    private readonly analysis: TextReply = "A bright product photo on a plain background."
  ) {}

  async generateText(system: string, prompt: string, temperature: number): Promise<string> {
    const call = { system, prompt, temperature };
    this.calls.push(call);
    const reply = this.reply(call, this.calls.length - 1);
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  async analyzeImage(image: ImageInput): Promise<string> {
    this.analyzed.push(image);
    if (this.analysis instanceof Error) {
      throw this.analysis;
    }
    return this.analysis;
  }
}

export const conceptJson = JSON.stringify({
  central_idea: "Refill, reuse, repeat",
  focal_element: "A bottle under a waterfall",
  supporting_elements: ["leaves", "drops"],
  palette: { primary: "#1E88E5", accent: "#43A047" },
  mood: ["fresh", "clean"],
  format_notes: { "1x1": "Centered bottle" },
});

export function copyJson(headline: string) {
  return JSON.stringify({
    headline,
    subheading: "Cold for 24 hours",
    primary_cta: "Buy now",
    bullet_points: ["Light", "Durable"],
    legal_footer: "Offer valid while stocks last",
  });
}

/** Concept JSON for concept prompts, copy JSON (headline names the language) otherwise. */
export function scriptedReply(call: TextCall): TextReply {
  if (call.system.includes("concept strategist")) {
    return conceptJson;
  }
  const language = call.system.match(/writing in ([^.]+)\./)?.[1] ?? "unknown";
  return copyJson(`Headline in ${language}`);
}

export type ImageCall = { prompt: string; width: number; height: number; quality: ImageQuality };

export type EditCall = { source: Buffer; instructions: string; width: number; height: number; quality: ImageQuality };

export class FakeImageService implements GenerativeImageService {
  readonly calls: ImageCall[] = [];
  readonly edits: EditCall[] = [];

  constructor(
    private readonly fail: (call: ImageCall) => Error | undefined = () => undefined,
    private readonly failEdit: (call: EditCall) => Error | undefined = () => undefined
  ) {}

  async editImage(
    source: Buffer,
    instructions: string,
    width: number,
    height: number,
    quality: ImageQuality
  ): Promise<Buffer> {
    const call = { source, instructions, width, height, quality };
    this.edits.push(call);
    const error = this.failEdit(call);
    if (error) {
      throw error;
    }
    return Buffer.from(`edited:${width}x${height}:${this.edits.length}`);
  }

  async synthesizeImage(prompt: string, width: number, height: number, quality: ImageQuality): Promise<Buffer> {
    const call = { prompt, width, height, quality };
    this.calls.push(call);
    const error = this.fail(call);
    if (error) {
      throw error;
    }
    return Buffer.from(`image:${width}x${height}:${this.calls.length}`);
  }
}

export class MemoryArtifactStore implements ArtifactStore {
  readonly saved = new Map<string, Buffer | string>();
  manifests: RunManifest[] = [];

  constructor(private readonly failOn: (name: string) => boolean = () => false) {}

  async save(payload: Buffer | string, canonicalName: string): Promise<StoredArtifact> {
    if (this.failOn(canonicalName)) {
      throw new Error(`disk full while writing ${canonicalName}`);
    }
    this.saved.set(canonicalName, payload);
    return { name: canonicalName, path: `memory/${canonicalName}` };
  }

  async load(name: string): Promise<Buffer> {
    const payload = this.saved.get(name);
    if (payload === undefined) {
      throw new Error(`${name} not found`);
    }
    return Buffer.isBuffer(payload) ? payload : Buffer.from(payload);
  }

  async writeManifest(manifest: RunManifest): Promise<StoredArtifact> {
    this.manifests.push(manifest);
    return { name: "manifest", path: "memory/manifest.json" };
  }

  async readManifest(): Promise<RunManifest | undefined> {
    return this.manifests.at(-1);
  }
}

export class FakeCompositor implements CreativeCompositor {
  readonly inputs: ComposeInput[] = [];

  async compose(input: ComposeInput): Promise<Buffer> {
    this.inputs.push(input);
    return Buffer.concat([Buffer.from("final:"), input.design]);
  }
}

export const noSleep = async () => undefined;

export const fixedNow = new Date("2026-03-01T12:00:00Z");

/** Minimal tier: vibrant and corporate, square only, pt and en. Four variants. */
export function testDependencies(overrides: Partial<StageDependencies> = {}): StageDependencies {
  const config = overrides.config ?? testConfig();
  return {
    brief: testBrief,
    config,
    plan: planVariants(config, { quantity_tier: "minimal", selection: {} }),
    text: new FakeTextService(scriptedReply),
    image: new FakeImageService(),
    store: new MemoryArtifactStore(),
    compositor: new FakeCompositor(),
    logger: silentLogger,
    sleep: noSleep,
    now: () => fixedNow,
    ...overrides,
  };
}

export function stageInput(artifacts: StageInput["artifacts"] = {}): StageInput {
  return { projectId: "p1", artifacts, signal: new AbortController().signal };
}
