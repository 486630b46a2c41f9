/**
 * Hashing utilities for cache keys.
 *
 * Uses SHA-256 truncated to 16 hex characters for cache keys.
 */

import { createHash } from "node:crypto";

/**
 * Length of truncated hash for cache keys (16 hex chars = 64 bits).
 */
export const HASH_LENGTH = 16;

/**
 * Compute SHA-256 hash of a string, truncated to HASH_LENGTH characters.
 */
export function hashString(data: string): string {
  return createHash("sha256").update(data).digest("hex").slice(0, HASH_LENGTH);
}

/**
 * Compute a cache key from multiple components.
 * Components are joined with colons and hashed together.
 */
export function computeCacheKey(...components: string[]): string {
  return hashString(components.join(":"));
}

/**
 * Hash a set of lines independent of their order.
 */
export function hashUnorderedLines(lines: string[]): string {
  return hashString([...lines].sort().join("\n"));
}
