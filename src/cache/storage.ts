/**
 * Cache file operations.
 *
 * Atomic writes (temp file + rename in the same directory) so concurrent
 * readers never observe a partially written entry.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomUUID } from "node:crypto";

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Write a file atomically using temp file + rename.
 */
export async function atomicWriteFile(
  filePath: string,
  content: string
): Promise<void> {
  const directory = dirname(filePath);
  const tempPath = join(directory, `.${basename(filePath)}.${randomUUID()}.tmp`);

  try {
    await ensureDir(directory);
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch(() => undefined);
    throw error;
  }
}

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}

/**
 * Read a text file. Returns null if it does not exist; other failures throw.
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT", "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}

/**
 * Last-modified time in milliseconds, or null if the path does not exist.
 */
export async function getMtimeMs(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT", "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}
