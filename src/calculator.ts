/**
 * Version calculation entry point.
 *
 * Locates the repository, resolves configuration, and either returns a
 * cached result or derives the version from git history and stores it.
 */

import { createCacheKey } from "./cache/key.js";
import { getCacheDir } from "./cache/paths.js";
import { VersionCacheStore } from "./cache/store.js";
import { loadConfig } from "./config/loader.js";
import { resolveEffectiveConfig } from "./config/resolver.js";
import type { ConfigDocument } from "./config/types.js";
import { NoCommitsError } from "./core/errors.js";
import { debug, info } from "./core/logger.js";
import type { CommitInfo, EffectiveConfig, VersionVariables } from "./core/types.js";
import { assembleVersionVariables } from "./core/variables.js";
import { createGitInspector } from "./git/git-inspector.js";
import type { RepositoryInspector } from "./git/inspector.js";
import { locateRepository } from "./git/locate.js";
import { calculateIncrement } from "./versioning/increment.js";
import { describeVersionSource, locateVersionSource } from "./versioning/locator.js";
import { buildRepositoryView } from "./versioning/view.js";

export interface RepositoryInfo {
  /** Repository identity used in the cache key instead of the origin URL */
  targetUrl?: string;
  /** Branch to version instead of the checked-out one */
  targetBranch?: string;
}

export interface ComputeVersionOptions {
  workingDirectory: string;
  /** Inspector to use instead of running git in the working tree */
  repository?: RepositoryInspector;
  /** Applied over the file configuration; disables the cache */
  overrideConfig?: ConfigDocument;
  noCache?: boolean;
  noNormalize?: boolean;
  repositoryInfo?: RepositoryInfo;
  /** Defaults to branchver_cache inside the git directory */
  cacheDirectory?: string;
  /** Explicit configuration file, relative to the project root */
  configFile?: string;
  /** Deadline for each git command */
  timeoutMs?: number;
}

/**
 * Derive the version from history; no caching.
 */
async function deriveVariables(
  inspector: RepositoryInspector,
  head: CommitInfo,
  config: EffectiveConfig
): Promise<VersionVariables> {
  const view = await buildRepositoryView(inspector, head);
  const source = locateVersionSource(view, config);
  debug(`Version source: ${describeVersionSource(source)}`);

  const result = await calculateIncrement(inspector, source, head, config);
  debug(
    `Increment ${result.increment} over ${result.commitsSinceVersionSource} commit(s)` +
      (result.directive ? ` (directive ${result.directive})` : "")
  );

  return assembleVersionVariables({
    version: result.version,
    source,
    head,
    config,
    commitsSinceVersionSource: result.commitsSinceVersionSource,
  });
}

/**
 * Compute the version variables for the repository containing
 * `workingDirectory`.
 */
export async function computeVersion(
  options: ComputeVersionOptions
): Promise<VersionVariables> {
  const location = await locateRepository(options.workingDirectory);
  const inspector =
    options.repository ??
    createGitInspector(location.projectRoot, { timeoutMs: options.timeoutMs });

  const loaded = await loadConfig(location.projectRoot, options.configFile);

  const head = await inspector.currentCommit();
  if (!head) {
    throw new NoCommitsError(location.projectRoot);
  }

  const branchName =
    options.repositoryInfo?.targetBranch ?? (await inspector.currentBranch());
  const config = resolveEffectiveConfig({
    branchName,
    document: loaded.document,
    override: options.overrideConfig,
    source: loaded.path ?? "default configuration",
  });
  debug(`Branch ${config.branchName} matched rules: ${config.matchedRules.join(", ") || "none"}`);

  if (options.overrideConfig) {
    info("Override configuration supplied, skipping the version cache");
    return deriveVariables(inspector, head, config);
  }

  if (options.noCache || config.noCache) {
    info("NoCache set, skipping the version cache");
    return deriveVariables(inspector, head, config);
  }

  const key = await createCacheKey(inspector, {
    headSha: head.id,
    branchName,
    configContent: loaded.raw,
    targetUrl: options.repositoryInfo?.targetUrl,
    noNormalize: options.noNormalize || config.noNormalize,
  });

  const cache = new VersionCacheStore({
    cacheDirectory: options.cacheDirectory ?? getCacheDir(location.dotGitDirectory),
    configMtimeMs: loaded.mtimeMs,
  });

  const lookup = await cache.lookup(key);
  switch (lookup.status) {
    case "hit":
      info(`Deserializing version variables from cache file ${lookup.filePath}`);
      return { ...lookup.entry.variables, FileName: lookup.filePath };
    case "invalidated":
      info(
        `Cache invalidated: configuration file ${loaded.path ?? ""} is newer than the cache directory`
      );
      break;
    case "miss":
      info(`Computing version variables, no cache entry for key ${key}`);
      break;
  }

  const variables = await deriveVariables(inspector, head, config);
  const written = await cache.store(key, variables);
  return written ? { ...variables, FileName: written } : variables;
}
