/**
 * Cache path utilities.
 */

import { join } from "node:path";

/** Cache directory created inside the git directory */
export const CACHE_DIR_NAME = "branchver_cache";

/** Extension of cache entry files */
export const CACHE_FILE_EXTENSION = ".yml";

/**
 * Get the default cache directory for a git directory.
 */
export function getCacheDir(dotGitDirectory: string): string {
  return join(dotGitDirectory, CACHE_DIR_NAME);
}

/**
 * Get the cache file path for a key.
 */
export function getCacheFilePath(cacheDir: string, key: string): string {
  return join(cacheDir, `${key}${CACHE_FILE_EXTENSION}`);
}
