/**
 * Crash-atomic file writes (temp file beside the target, then rename) and
 * JSON reads that distinguish "missing" from "unreadable".
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { PersistenceError } from "@/lib/errors";

export const TEMP_SUFFIX = ".tmp";

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function isMissingFile(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}

export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const tmp = `${path}${TEMP_SUFFIX}`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmp, data);
    await rename(tmp, path);
  } catch (error) {
    await rm(tmp, { force: true }).catch(() => undefined);
    throw new PersistenceError(`Failed to write ${path}`, path, error);
  }
}

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeFileAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}

/** Parsed JSON, or undefined when the file does not exist. Unreadable or malformed files throw PersistenceError. */
export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new PersistenceError(`Failed to read ${path}`, path, error);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new PersistenceError(`Corrupt JSON in ${path}`, path, error);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}
