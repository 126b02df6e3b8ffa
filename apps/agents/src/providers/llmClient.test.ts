import { describe, expect, it } from "vitest";
import { EmptyArtifactError, ExternalServiceFailureError } from "../pipeline/errors";
import { AnthropicTextClient } from "./llmClient";

type Captured = { url: string; init?: RequestInit };

function fakeFetch(status: number, body: unknown, captured: Captured[] = []): typeof fetch {
  return async (input, init) => {
    captured.push({ url: String(input), init });
    return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
  };
}

function sentBody(captured: Captured[]) {
  return JSON.parse(String(captured[0]?.init?.body));
}

describe("AnthropicTextClient", () => {
  it("posts a messages request and returns the joined text", async () => {
    const captured: Captured[] = [];
    const client = new AnthropicTextClient({
      apiKey: "test-secret",
      model: "test-model",
      baseUrl: "https://llm.example.test/v1/",
      fetchImpl: fakeFetch(200, { content: [{ type: "text", text: " {\"a\":1} " }], stop_reason: "end_turn" }, captured),
    });

    expect(await client.generateText("be brief", "write json", 0.4)).toBe('{"a":1}');
    expect(captured[0]?.url).toBe("https://llm.example.test/v1/messages");
    expect(captured[0]?.init?.headers).toMatchObject({ "x-api-key": "test-secret", "anthropic-version": "2023-06-01" });
    expect(sentBody(captured)).toEqual({
      model: "test-model",
      max_tokens: 2000,
      temperature: 0.4,
      system: "be brief",
      messages: [{ role: "user", content: [{ type: "text", text: "write json" }] }],
    });
  });

  it("sends reference images as base64 blocks", async () => {
    const captured: Captured[] = [];
    const client = new AnthropicTextClient({
      apiKey: "test-secret",
      fetchImpl: fakeFetch(200, { content: [{ type: "text", text: "A teal layout." }] }, captured),
    });

    await client.analyzeImage({ data: Buffer.from("hello"), mediaType: "image/png" }, "describe it");
    expect(sentBody(captured).messages[0].content).toEqual([
      { type: "image", source: { type: "base64", media_type: "image/png", data: "aGVsbG8=" } },
      { type: "text", text: "describe it" },
    ]);
  });

  it("reports HTTP errors as external service failures", async () => {
    const client = new AnthropicTextClient({ apiKey: "test-secret", fetchImpl: fakeFetch(529, "overloaded") });
    const error = await client.generateText("s", "p", 0).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExternalServiceFailureError);
    expect(error).toMatchObject({ status: 529, message: "Anthropic request failed with 529: overloaded" });
  });

  it("treats a reply without text as empty", async () => {
    const client = new AnthropicTextClient({
      apiKey: "test-secret",
      fetchImpl: fakeFetch(200, { content: [{ type: "tool_use" }] }),
    });
    await expect(client.generateText("s", "p", 0)).rejects.toBeInstanceOf(EmptyArtifactError);
  });

  it("requires an API key in the environment", () => {
    expect(() => AnthropicTextClient.fromEnv({})).toThrow("ANTHROPIC_API_KEY is required.");
  });
});
