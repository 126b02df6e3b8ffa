import { promises as fs } from "node:fs";
import { createHash, randomUUID } from "node:crypto";
import { z } from "zod";

/**
 * File storage helpers for run records and artifacts.
 * Every write goes through temp + rename; reads are validated with zod.
 */

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function readJson<T>(filePath: string, schema: z.ZodType<T>): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return schema.parse(JSON.parse(raw));
}

function errnoCode(error: unknown) {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

async function atomicWriteFile(filePath: string, contents: string | Buffer): Promise<void> {
  // Unique per write so that overlapping writers never rename each other's temp file.
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  await fs.writeFile(tmpPath, contents);

  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    // Windows can refuse to rename over an existing file.
    const code = errnoCode(err);
    if (code === "EEXIST" || code === "EPERM" || code === "EACCES") {
      await fs.rm(filePath, { force: true });
      await fs.rename(tmpPath, filePath);
      return;
    }
    throw err;
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(value, null, 2) + "\n");
}

export async function writeTextAtomic(filePath: string, text: string): Promise<void> {
  await atomicWriteFile(filePath, text);
}

export async function writeBinaryAtomic(filePath: string, bytes: Buffer): Promise<void> {
  await atomicWriteFile(filePath, bytes);
}

export function sha256Hex(input: string | Buffer): string {
  const hash = createHash("sha256");
  if (typeof input === "string") {
    hash.update(input, "utf8");
  } else {
    hash.update(input);
  }
  return hash.digest("hex");
}

// Newest created_at first, run_id as the tie-breaker.
export function sortRunsNewestFirst<T extends { created_at: string; run_id: string }>(runs: T[]): T[] {
  return [...runs].sort((a, b) => {
    if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1;
    return a.run_id < b.run_id ? -1 : a.run_id > b.run_id ? 1 : 0;
  });
}
