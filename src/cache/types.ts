/**
 * Types for the version cache.
 */

import type { VersionVariables } from "../core/types.js";

/**
 * Cache schema version - bump when the key derivation or file format
 * changes.
 */
export const CACHE_SCHEMA_VERSION = "1";

/**
 * A persisted result.
 */
export interface CacheEntry {
  variables: VersionVariables;
  /** Last-modified time of the entry file */
  writtenAt: Date;
}

export type CacheLookup =
  | { status: "hit"; filePath: string; entry: CacheEntry }
  | { status: "miss"; filePath: string }
  | { status: "invalidated"; filePath: string };

/**
 * Key-value interface over persisted results.
 */
export interface VersionCache {
  lookup(key: string): Promise<CacheLookup>;
  /** Returns the written file path, or null when the entry was not persisted */
  store(key: string, variables: VersionVariables): Promise<string | null>;
  filePath(key: string): string;
}

export interface VersionCacheStoreOptions {
  cacheDirectory: string;
  /** Modification time of the configuration file; newer invalidates entries */
  configMtimeMs?: number | null;
}
