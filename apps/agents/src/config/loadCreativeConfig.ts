import { promises as fs } from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { CreativeConfigSchema, type CreativeConfig } from "@adforge/shared";

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, "../../../../config/creative.yml");

export class CreativeConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CreativeConfigError";
  }
}

/** Parses and validates a creative configuration document. */
export function parseCreativeConfig(input: string): CreativeConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(input);
  } catch (error) {
    throw new CreativeConfigError("Creative config is not valid YAML.", { cause: error });
  }
  return CreativeConfigSchema.parse(parsed ?? {});
}

export async function loadCreativeConfig(
  filePath = process.env.CREATIVE_CONFIG_PATH || DEFAULT_CONFIG_PATH
): Promise<CreativeConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new CreativeConfigError(`Cannot read creative config at ${filePath}.`, { cause: error });
  }
  return parseCreativeConfig(raw);
}
