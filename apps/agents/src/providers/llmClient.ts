import { z } from "zod";
import { EmptyArtifactError, ExternalServiceFailureError } from "../pipeline/errors";
import type { GenerativeTextService, ImageInput } from "./contracts";

const AnthropicResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
});

type AnthropicContentBlock =
  | { type: "text"; text: string }
  | { type: "image"; source: { type: "base64"; media_type: string; data: string } };

export type AnthropicClientOptions = {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  version?: string;
  timeoutMs?: number;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
};

function combineSignals(timeoutMs: number, signal?: AbortSignal) {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
}

function extractText(body: unknown) {
  const parsed = AnthropicResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ExternalServiceFailureError("Anthropic response had an unexpected shape.");
  }
  const text = parsed.data.content
    .filter((item) => item.type === "text" && typeof item.text === "string")
    .map((item) => item.text ?? "")
    .join("\n")
    .trim();
  if (!text) {
    throw new EmptyArtifactError("Anthropic response did not include text content.");
  }
  return text;
}

/** Text generation and image analysis through the Anthropic Messages API. */
export class AnthropicTextClient implements GenerativeTextService {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly version: string;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: AnthropicClientOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? "claude-sonnet-4-6";
    this.baseUrl = (opts.baseUrl ?? "https://api.anthropic.com/v1").replace(/\/+$/, "");
    this.version = opts.version ?? "2023-06-01";
    this.timeoutMs = opts.timeoutMs ?? 45000;
    this.maxTokens = opts.maxTokens ?? 2000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env) {
    const apiKey = env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new Error("ANTHROPIC_API_KEY is required.");
    }
    return new AnthropicTextClient({
      apiKey,
      model: env.ANTHROPIC_MODEL,
      baseUrl: env.ANTHROPIC_BASE_URL,
      version: env.ANTHROPIC_VERSION,
      timeoutMs: env.ANTHROPIC_TIMEOUT_MS ? Number(env.ANTHROPIC_TIMEOUT_MS) : undefined,
      maxTokens: env.ANTHROPIC_MAX_TOKENS ? Number(env.ANTHROPIC_MAX_TOKENS) : undefined,
    });
  }

  async generateText(systemInstructions: string, userPrompt: string, temperature: number, signal?: AbortSignal) {
    return this.send(systemInstructions, [{ type: "text", text: userPrompt }], temperature, signal);
  }

  async analyzeImage(image: ImageInput, instructions: string, signal?: AbortSignal) {
    return this.send(
      "You analyze advertising imagery for a creative team.",
      [
        {
          type: "image",
          source: { type: "base64", media_type: image.mediaType, data: image.data.toString("base64") },
        },
        { type: "text", text: instructions },
      ],
      0,
      signal
    );
  }

  private async send(
    system: string,
    content: AnthropicContentBlock[],
    temperature: number,
    signal?: AbortSignal
  ) {
    const response = await this.fetchImpl(`${this.baseUrl}/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": this.version,
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature,
        system,
        messages: [{ role: "user", content }],
      }),
      signal: combineSignals(this.timeoutMs, signal),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new ExternalServiceFailureError(
        `Anthropic request failed with ${response.status}: ${body || response.statusText}`,
        { status: response.status }
      );
    }

    return extractText(await response.json());
  }
}
