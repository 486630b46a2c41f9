/**
 * Configuration file discovery and parsing.
 */

import { readFile, stat } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { parse, YAMLParseError } from "yaml";
import { ConfigError } from "../core/errors.js";
import { debug, info } from "../core/logger.js";
import { CONFIG_FILE_ALTERNATIVES, CONFIG_FILE_NAME } from "./defaults.js";
import { ConfigDocumentSchema, formatIssues } from "./schema.js";
import type { ConfigDocument } from "./types.js";

/**
 * A configuration file as found on disk.
 */
export interface LoadedConfig {
  /** Absolute path of the file, null when none was found */
  path: string | null;
  /** Raw file content, hashed into the cache key */
  raw: string | null;
  /** Last-modified time, used to invalidate cache entries */
  mtimeMs: number | null;
  document: ConfigDocument;
}

/**
 * Parse YAML text into a validated ConfigDocument.
 * Scalars are read as strings so "next-version: 1.10" keeps its digits.
 */
export function parseConfigText(text: string, source: string): ConfigDocument {
  let raw: unknown;
  try {
    raw = parse(text, { schema: "failsafe" });
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(source, [error.message]);
    }
    throw error;
  }

  return parseConfigObject(raw ?? {}, source);
}

/**
 * Validate an already-parsed document (YAML output or CLI overrides).
 */
export function parseConfigObject(raw: unknown, source: string): ConfigDocument {
  const result = ConfigDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }
  return result.data;
}

async function readIfExists(
  path: string
): Promise<{ raw: string; mtimeMs: number } | null> {
  try {
    const [raw, stats] = await Promise.all([readFile(path, "utf-8"), stat(path)]);
    return { raw, mtimeMs: stats.mtimeMs };
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Locate and load the configuration for a project root.
 *
 * An explicit file must exist; the default names are optional and their
 * absence falls back to built-in defaults.
 */
export async function loadConfig(
  projectRoot: string,
  configFile?: string
): Promise<LoadedConfig> {
  if (configFile) {
    const path = isAbsolute(configFile) ? configFile : join(projectRoot, configFile);
    const found = await readIfExists(path);
    if (!found) {
      throw new ConfigError(path, ["Configuration file does not exist"]);
    }
    debug(`Using configuration file ${path}`);
    return { path, ...found, document: parseConfigText(found.raw, path) };
  }

  for (const name of [CONFIG_FILE_NAME, ...CONFIG_FILE_ALTERNATIVES]) {
    const path = join(projectRoot, name);
    const found = await readIfExists(path);
    if (found) {
      debug(`Using configuration file ${path}`);
      return { path, ...found, document: parseConfigText(found.raw, path) };
    }
  }

  info(
    `${CONFIG_FILE_NAME} not found in ${projectRoot}, using default configuration`
  );
  return { path: null, raw: null, mtimeMs: null, document: {} };
}
