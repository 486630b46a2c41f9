/**
 * Cache key derivation.
 *
 * The key is built from repository identity and content, never from
 * filesystem paths, so the same logical target checked out twice into
 * different directories yields the same key.
 */

import { normalizeBranchName } from "../core/branch.js";
import type { TagRef } from "../core/types.js";
import type { RepositoryInspector } from "../git/inspector.js";
import { computeCacheKey, hashString, hashUnorderedLines } from "./hash.js";
import { CACHE_SCHEMA_VERSION } from "./types.js";

export interface CacheKeyComponents {
  /** Target or origin URL; null for purely local repositories */
  repositoryUrl: string | null;
  branchName: string;
  headSha: string;
  tags: readonly TagRef[];
  /** Raw configuration file content; null when there is no file */
  configContent: string | null;
  isDirty: boolean;
  /** Use URL and branch exactly as given */
  noNormalize?: boolean;
}

/**
 * Reduce a remote URL to "host/path": no scheme, no credentials, lowercase
 * host, no trailing slash or ".git". scp-style "git@host:path" is accepted.
 */
export function normalizeRepositoryUrl(url: string): string {
  const trimmed = url.trim();

  const scpLike = /^(?:[^@/\s]+@)?([^:/\s]+):(?!\/\/)(.+)$/.exec(trimmed);
  let host: string;
  let path: string;

  if (scpLike && !/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    host = scpLike[1];
    path = scpLike[2];
  } else {
    try {
      const parsed = new URL(trimmed);
      host = parsed.host;
      path = parsed.pathname;
    } catch {
      // Local paths and other non-URLs are used as written
      return trimmed.replace(/\/+$/, "").replace(/\.git$/, "");
    }
  }

  const cleanPath = path
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .replace(/\.git$/, "");
  return `${host.toLowerCase()}/${cleanPath}`;
}

/**
 * Hash of the tag set; tag changes move the version.
 */
export function hashTagRefs(tags: readonly TagRef[]): string {
  return hashUnorderedLines(tags.map((tag) => `${tag.name}=${tag.targetCommit}`));
}

/**
 * Compute the cache key from already-collected components.
 */
export function computeVersionCacheKey(components: CacheKeyComponents): string {
  const url = components.repositoryUrl ?? "";
  return computeCacheKey(
    CACHE_SCHEMA_VERSION,
    components.noNormalize ? url : url && normalizeRepositoryUrl(url),
    components.noNormalize
      ? components.branchName
      : normalizeBranchName(components.branchName),
    components.headSha,
    hashTagRefs(components.tags),
    components.configContent === null ? "" : hashString(components.configContent),
    components.isDirty ? "dirty" : "clean"
  );
}

export interface CreateCacheKeyOptions {
  headSha: string;
  branchName: string;
  configContent: string | null;
  targetUrl?: string;
  noNormalize?: boolean;
}

/**
 * Collect the repository-side components and compute the key.
 */
export async function createCacheKey(
  inspector: RepositoryInspector,
  options: CreateCacheKeyOptions
): Promise<string> {
  const [remoteUrl, tags, isDirty] = await Promise.all([
    options.targetUrl ? Promise.resolve(options.targetUrl) : inspector.remoteUrl(),
    inspector.tags(),
    inspector.isDirty(),
  ]);

  return computeVersionCacheKey({
    repositoryUrl: remoteUrl,
    branchName: options.branchName,
    headSha: options.headSha,
    tags,
    configContent: options.configContent,
    isDirty,
    noNormalize: options.noNormalize,
  });
}
