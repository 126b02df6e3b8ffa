import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { EmptyArtifactError, ExternalServiceFailureError } from "../pipeline/errors";
import { OpenAIImageClient, closestSupportedSize } from "./imageClient";

type Captured = { url: string; init?: RequestInit };

function fakeFetch(status: number, body: unknown, captured: Captured[] = []): typeof fetch {
  return async (input, init) => {
    captured.push({ url: String(input), init });
    return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
  };
}

async function tinyPng() {
  return sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 0, g: 128, b: 255 } } })
    .png()
    .toBuffer();
}

describe("closestSupportedSize", () => {
  it("matches by aspect ratio", () => {
    expect(closestSupportedSize(500, 500)).toEqual({ width: 1024, height: 1024 });
    expect(closestSupportedSize(1080, 1920)).toEqual({ width: 1024, height: 1536 });
    expect(closestSupportedSize(1200, 628)).toEqual({ width: 1536, height: 1024 });
  });
});

describe("OpenAIImageClient", () => {
  it("requests the closest size and returns a PNG of the requested size", async () => {
    const captured: Captured[] = [];
    const encoded = (await tinyPng()).toString("base64");
    const client = new OpenAIImageClient({
      apiKey: "test-secret",
      baseUrl: "https://images.example.test/v1",
      fetchImpl: fakeFetch(200, { data: [{ b64_json: encoded }] }, captured),
    });

    const image = await client.synthesizeImage("a bottle", 36, 64, "low");
    const metadata = await sharp(image).metadata();

    expect({ width: metadata.width, height: metadata.height, format: metadata.format }).toEqual({
      width: 36,
      height: 64,
      format: "png",
    });
    expect(captured[0]?.url).toBe("https://images.example.test/v1/images/generations");
    expect(JSON.parse(String(captured[0]?.init?.body))).toEqual({
      model: "gpt-image-1",
      prompt: "a bottle",
      size: "1024x1536",
      quality: "low",
      n: 1,
    });
  });

  it("sends edits as multipart with the source resized to the supported size", async () => {
    const captured: Captured[] = [];
    const encoded = (await tinyPng()).toString("base64");
    const client = new OpenAIImageClient({
      apiKey: "test-secret",
      baseUrl: "https://images.example.test/v1",
      fetchImpl: fakeFetch(200, { data: [{ b64_json: encoded }] }, captured),
    });

    const edited = await client.editImage(await tinyPng(), "add rain", 36, 64, "medium");
    const editedMeta = await sharp(edited).metadata();
    expect([editedMeta.width, editedMeta.height]).toEqual([36, 64]);

    expect(captured[0]?.url).toBe("https://images.example.test/v1/images/edits");
    const form = captured[0]?.init?.body;
    if (!(form instanceof FormData)) {
      throw new Error("expected a multipart body");
    }
    expect([form.get("model"), form.get("prompt"), form.get("size"), form.get("quality"), form.get("n")]).toEqual([
      "gpt-image-1",
      "add rain",
      "1024x1536",
      "medium",
      "1",
    ]);
    const source = form.get("image");
    if (!(source instanceof Blob)) {
      throw new Error("expected an image part");
    }
    expect(source.type).toBe("image/png");
    const sourceMeta = await sharp(Buffer.from(await source.arrayBuffer())).metadata();
    expect([sourceMeta.width, sourceMeta.height]).toEqual([1024, 1536]);
  });

  it("reports failed edits as external service failures", async () => {
    const client = new OpenAIImageClient({ apiKey: "test-secret", fetchImpl: fakeFetch(400, "bad mask") });
    await expect(client.editImage(await tinyPng(), "add rain", 64, 64, "high")).rejects.toThrow(
      "Image request failed with 400: bad mask"
    );
  });

  it("reports HTTP errors as external service failures", async () => {
    const client = new OpenAIImageClient({ apiKey: "test-secret", fetchImpl: fakeFetch(500, "boom") });
    await expect(client.synthesizeImage("p", 64, 64, "high")).rejects.toBeInstanceOf(ExternalServiceFailureError);
  });

  it("treats a response without image data as empty", async () => {
    const client = new OpenAIImageClient({ apiKey: "test-secret", fetchImpl: fakeFetch(200, { data: [] }) });
    await expect(client.synthesizeImage("p", 64, 64, "high")).rejects.toBeInstanceOf(EmptyArtifactError);
  });

  it("treats undecodable bytes as empty", async () => {
    const client = new OpenAIImageClient({
      apiKey: "test-secret",
      fetchImpl: fakeFetch(200, { data: [{ b64_json: Buffer.from("not an image").toString("base64") }] }),
    });
    await expect(client.synthesizeImage("p", 64, 64, "high")).rejects.toThrow(/^Image response could not be decoded/);
  });
});
