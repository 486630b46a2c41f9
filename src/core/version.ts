/**
 * Version of the branchver package itself, read from package.json.
 */

import { readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | null = null;

async function tryReadPackageVersion(path: string): Promise<string | null> {
  try {
    const content = await readFile(path, "utf-8");
    const pkg: unknown = JSON.parse(content);
    if (
      typeof pkg === "object" &&
      pkg !== null &&
      "version" in pkg &&
      typeof pkg.version === "string"
    ) {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Get the branchver version from package.json.
 * Result is cached for subsequent calls.
 *
 * Both src/core/ and dist/core/ sit two levels below package.json; the
 * one-level path covers bundled output.
 */
export async function getToolVersion(): Promise<string> {
  if (cachedVersion) {
    return cachedVersion;
  }

  const candidates = [
    join(moduleDir, "..", "package.json"),
    join(moduleDir, "..", "..", "package.json"),
  ];

  for (const path of candidates) {
    const version = await tryReadPackageVersion(path);
    if (version) {
      cachedVersion = version;
      return version;
    }
  }

  return "unknown";
}
