import { z } from "zod";
import type { ImageQuality } from "@adforge/shared";
import { ensureSize } from "../imaging/ensureSize";
import { EmptyArtifactError, ExternalServiceFailureError, buildFailureMessage } from "../pipeline/errors";
import type { GenerativeImageService } from "./contracts";

const ImagesResponseSchema = z.object({
  data: z.array(z.object({ b64_json: z.string().optional() })).default([]),
});

/** Output sizes the image endpoint accepts. */
export const SUPPORTED_IMAGE_SIZES = [
  { width: 1024, height: 1024 },
  { width: 1536, height: 1024 },
  { width: 1024, height: 1536 },
] as const;

/** Picks the supported size whose aspect ratio is closest to width × height. */
export function closestSupportedSize(width: number, height: number) {
  const target = Math.log(width / height);
  let best: (typeof SUPPORTED_IMAGE_SIZES)[number] = SUPPORTED_IMAGE_SIZES[0];
  for (const size of SUPPORTED_IMAGE_SIZES) {
    if (Math.abs(Math.log(size.width / size.height) - target) < Math.abs(Math.log(best.width / best.height) - target)) {
      best = size;
    }
  }
  return best;
}

export type OpenAIImageClientOptions = {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** Image synthesis and editing through the OpenAI Images API, resized to the requested format. */
export class OpenAIImageClient implements GenerativeImageService {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: OpenAIImageClientOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? "gpt-image-1";
    this.baseUrl = (opts.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 120000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env) {
    const apiKey = env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY is required.");
    }
    return new OpenAIImageClient({
      apiKey,
      model: env.OPENAI_IMAGE_MODEL,
      baseUrl: env.OPENAI_BASE_URL,
      timeoutMs: env.OPENAI_TIMEOUT_MS ? Number(env.OPENAI_TIMEOUT_MS) : undefined,
    });
  }

  async synthesizeImage(
    prompt: string,
    width: number,
    height: number,
    quality: ImageQuality,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const size = closestSupportedSize(width, height);
    const response = await this.fetchImpl(`${this.baseUrl}/images/generations`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        prompt,
        size: `${size.width}x${size.height}`,
        quality,
        n: 1,
      }),
      signal: this.requestSignal(signal),
    });
    return this.readImage(response, width, height);
  }

  async editImage(
    image: Buffer,
    instructions: string,
    width: number,
    height: number,
    quality: ImageQuality,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const size = closestSupportedSize(width, height);
    const source = await ensureSize(image, size.width, size.height);

    const form = new FormData();
    form.append("model", this.model);
    form.append("prompt", instructions);
    form.append("size", `${size.width}x${size.height}`);
    form.append("quality", quality);
    form.append("n", "1");
    form.append("image", new Blob([new Uint8Array(source)], { type: "image/png" }), "design.png");

    // fetch sets the multipart boundary itself.
    const response = await this.fetchImpl(`${this.baseUrl}/images/edits`, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: form,
      signal: this.requestSignal(signal),
    });
    return this.readImage(response, width, height);
  }

  private requestSignal(signal?: AbortSignal) {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([timeout, signal]) : timeout;
  }

  private async readImage(response: Response, width: number, height: number): Promise<Buffer> {
    if (!response.ok) {
      const body = await response.text();
      throw new ExternalServiceFailureError(
        `Image request failed with ${response.status}: ${body || response.statusText}`,
        { status: response.status }
      );
    }

    const parsed = ImagesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceFailureError("Image response had an unexpected shape.");
    }
    const encoded = parsed.data.data.find((item) => item.b64_json)?.b64_json;
    const bytes = encoded ? Buffer.from(encoded, "base64") : Buffer.alloc(0);
    if (bytes.length === 0) {
      throw new EmptyArtifactError("Image response contained no image data.");
    }

    try {
      return await ensureSize(bytes, width, height);
    } catch (error) {
      throw new EmptyArtifactError(`Image response could not be decoded: ${buildFailureMessage(error)}`);
    }
  }
}
