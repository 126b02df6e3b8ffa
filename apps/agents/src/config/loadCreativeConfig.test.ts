import { ZodError } from "zod";
import { describe, expect, it } from "vitest";
import { planVariants } from "../expansion/expandVariants";
import { CreativeConfigError, DEFAULT_CONFIG_PATH, loadCreativeConfig, parseCreativeConfig } from "./loadCreativeConfig";

const minimalYaml = `
languages:
  - id: en
    name: English
formats:
  - id: "1x1"
    label: Square
    width: 1024
    height: 1024
    layout: Centered.
color_schemes:
  - id: mono
    colors:
      primary: "#111111"
`;

describe("loadCreativeConfig", () => {
  it("loads the bundled configuration", async () => {
    const config = await loadCreativeConfig(DEFAULT_CONFIG_PATH);

    expect(config.languages.map((language) => language.id)).toEqual(["pt", "en", "es"]);
    expect(config.formats.map((format) => [format.id, format.width, format.height])).toEqual([
      ["1x1", 1024, 1024],
      ["9x16", 1024, 1536],
    ]);
    expect(config.color_schemes).toHaveLength(6);
    expect(planVariants(config, { quantity_tier: "minimal", selection: {} }).requests).toHaveLength(4);
    expect(planVariants(config, { quantity_tier: "standard", selection: {} }).requests).toHaveLength(18);
    expect(planVariants(config, { quantity_tier: "full", selection: {} }).requests).toHaveLength(36);
  });

  it("wraps a missing file", async () => {
    await expect(loadCreativeConfig("/nonexistent/creative.yml")).rejects.toBeInstanceOf(CreativeConfigError);
  });
});

describe("parseCreativeConfig", () => {
  it("fills generation and legal defaults", () => {
    const config = parseCreativeConfig(minimalYaml);

    expect(config.generation).toEqual({
      image_quality: "high",
      max_attempts: 3,
      retry_backoff_ms: 1000,
      design_concurrency: 1,
      design_delay_ms: 2000,
      concept_temperature: 0.7,
      copy_temperature: 0.8,
      strict_temperature: 0.2,
      logo_size: 1024,
    });
    expect(config.languages[0]).toEqual({
      id: "en",
      name: "English",
      copyright: "© {year} {brand}. All rights reserved.",
      terms: "Terms of use | Privacy policy",
      fallback_cta: "Learn more",
    });
    expect(config.quantity_tiers).toEqual({});
  });

  it("rejects malformed YAML", () => {
    expect(() => parseCreativeConfig("languages: [unclosed")).toThrow(CreativeConfigError);
  });

  it("rejects duplicate ids", () => {
    const yaml = minimalYaml.replace(
      "color_schemes:",
      "color_schemes:\n  - id: mono\n    colors:\n      primary: \"#222222\""
    );
    expect(() => parseCreativeConfig(yaml)).toThrow(/Duplicate id: mono/);
  });

  it("rejects derived schemes without a known source", () => {
    const yaml = `${minimalYaml}  - id: echo\n    from: neon\n    rotations:\n      primary: 30\n`;
    expect(() => parseCreativeConfig(yaml)).toThrow(ZodError);
  });

  it("rejects attempts beyond three", () => {
    expect(() => parseCreativeConfig(`${minimalYaml}generation:\n  max_attempts: 5\n`)).toThrow(ZodError);
  });
});
