import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { prettyCanonicalJson } from "./canonical.js";

export {
  canonicalJson,
  canonicalize,
  isPlainObject,
  prettyCanonicalJson,
} from "./canonical.js";

export async function withTmpDir<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function readJsonFile(file: string): Promise<unknown> {
  const raw = await readFile(file, "utf-8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new Error(`unable to parse JSON from ${file}: ${errorMessage(error)}`);
  }
}

export async function writeJsonFile(file: string, value: unknown): Promise<void> {
  await writeFile(file, prettyCanonicalJson(value), "utf-8");
}
