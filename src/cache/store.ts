/**
 * File-backed version cache.
 *
 * One entry per key under the cache directory. Every failure in here is
 * recovered locally: unreadable or corrupt entries are misses, failed
 * writes leave the cache as it was.
 */

import { stat } from "node:fs/promises";
import {
  CacheReadError,
  CacheWriteError,
  describeError,
} from "../core/errors.js";
import { debug, warn } from "../core/logger.js";
import type { VersionVariables } from "../core/types.js";
import { getToolVersion } from "../core/version.js";
import { getCacheFilePath } from "./paths.js";
import { deserializeVariables, serializeVariables } from "./serializer.js";
import { atomicWriteFile, ensureDir, getMtimeMs, readTextFile } from "./storage.js";
import type {
  CacheLookup,
  VersionCache,
  VersionCacheStoreOptions,
} from "./types.js";

export class VersionCacheStore implements VersionCache {
  readonly cacheDirectory: string;
  private readonly configMtimeMs: number | null;

  constructor(options: VersionCacheStoreOptions) {
    this.cacheDirectory = options.cacheDirectory;
    this.configMtimeMs = options.configMtimeMs ?? null;
  }

  filePath(key: string): string {
    return getCacheFilePath(this.cacheDirectory, key);
  }

  async lookup(key: string): Promise<CacheLookup> {
    const filePath = this.filePath(key);

    let text: string | null;
    let directoryMtimeMs: number | null;
    try {
      text = await readTextFile(filePath);
      directoryMtimeMs = text === null ? null : await getMtimeMs(this.cacheDirectory);
    } catch (error) {
      warn(new CacheReadError(filePath, describeError(error)).message);
      return { status: "miss", filePath };
    }

    if (text === null) {
      return { status: "miss", filePath };
    }

    if (
      this.configMtimeMs !== null &&
      directoryMtimeMs !== null &&
      this.configMtimeMs > directoryMtimeMs
    ) {
      return { status: "invalidated", filePath };
    }

    const variables = deserializeVariables(text);
    if (!variables) {
      warn(new CacheReadError(filePath, "not a complete version cache entry").message);
      return { status: "miss", filePath };
    }

    let writtenAt: Date;
    try {
      writtenAt = (await stat(filePath)).mtime;
    } catch (error) {
      warn(new CacheReadError(filePath, describeError(error)).message);
      return { status: "miss", filePath };
    }

    return { status: "hit", filePath, entry: { variables, writtenAt } };
  }

  async store(key: string, variables: VersionVariables): Promise<string | null> {
    const filePath = this.filePath(key);
    try {
      await ensureDir(this.cacheDirectory);
      const content = serializeVariables(variables, {
        writer: `branchver ${await getToolVersion()}`,
        writtenAt: new Date(),
      });
      await atomicWriteFile(filePath, content);
      debug(`Wrote version cache file ${filePath}`);
      return filePath;
    } catch (error) {
      warn(new CacheWriteError(filePath, describeError(error)).message);
      return null;
    }
  }
}
