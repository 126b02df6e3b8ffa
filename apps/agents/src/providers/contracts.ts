import type { ImageQuality, RunManifest, StoredArtifact } from "@adforge/shared";

export type ImageMediaType = "image/png" | "image/jpeg" | "image/webp";

export type ImageInput = {
  data: Buffer;
  mediaType: ImageMediaType;
};

/** Text and vision models. Both calls return raw text for the repair parser. */
export interface GenerativeTextService {
  generateText(
    systemInstructions: string,
    userPrompt: string,
    temperature: number,
    signal?: AbortSignal
  ): Promise<string>;
  analyzeImage(image: ImageInput, instructions: string, signal?: AbortSignal): Promise<string>;
}

/** Rejects with ExternalServiceFailureError or EmptyArtifactError when no image is produced. */
export interface GenerativeImageService {
  synthesizeImage(
    prompt: string,
    width: number,
    height: number,
    quality: ImageQuality,
    signal?: AbortSignal
  ): Promise<Buffer>;
  /** Redraws `image` following `instructions`; the result keeps width × height. */
  editImage(
    image: Buffer,
    instructions: string,
    width: number,
    height: number,
    quality: ImageQuality,
    signal?: AbortSignal
  ): Promise<Buffer>;
}

/** Persistence for one run's outputs. Implementations reject on failure. */
export interface ArtifactStore {
  save(payload: Buffer | string, canonicalName: string): Promise<StoredArtifact>;
  load(name: string): Promise<Buffer>;
  writeManifest(manifest: RunManifest): Promise<StoredArtifact>;
  readManifest(): Promise<RunManifest | undefined>;
}

export type ComposeInput = {
  design: Buffer;
  logo: Buffer;
  width: number;
  height: number;
  footerLines: string[];
  accentColor?: string;
};

export interface CreativeCompositor {
  compose(input: ComposeInput): Promise<Buffer>;
}
