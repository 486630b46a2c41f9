/**
 * Version source strategies.
 *
 * Each strategy is a pure function over the repository view and the
 * effective configuration that yields at most one candidate. Selection
 * between candidates lives in locator.ts.
 */

import { compareSemVer, formatSemVer, parseSemVer } from "../core/semver.js";
import type {
  CommitInfo,
  EffectiveConfig,
  SemVer,
  VersionSource,
} from "../core/types.js";
import type { RepositoryView } from "./view.js";

export type VersionStrategy = (
  view: RepositoryView,
  config: EffectiveConfig
) => VersionSource | null;

/** Base version used when the history offers nothing better */
export const FALLBACK_BASE_VERSION: Readonly<SemVer> = Object.freeze({
  major: 0,
  minor: 1,
  patch: 0,
});

function dateOf(view: RepositoryView, commitId: string): string {
  return view.commitsById.get(commitId)?.date ?? "";
}

export function commitTimestamp(date: string): number {
  const parsed = Date.parse(date);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Higher version first, then the more recent commit.
 */
function pickBest(candidates: VersionSource[]): VersionSource | null {
  let best: VersionSource | null = null;
  for (const candidate of candidates) {
    if (!best) {
      best = candidate;
      continue;
    }
    const order = compareSemVer(candidate.baseVersion, best.baseVersion);
    if (
      order > 0 ||
      (order === 0 && commitTimestamp(candidate.sourceDate) > commitTimestamp(best.sourceDate))
    ) {
      best = candidate;
    }
  }
  return best;
}

// ============================================================================
// Tags
// ============================================================================

/**
 * Parse a tag name as tag prefix + version. Returns null for other tags.
 */
export function parseTagVersion(tagName: string, tagPrefix: string): SemVer | null {
  const prefix = new RegExp(`^(?:${tagPrefix})`);
  const match = prefix.exec(tagName);
  if (match) {
    return parseSemVer(tagName.slice(match[0].length));
  }
  // unprefixed tags count only when they are bare versions
  return /^\d/.test(tagName) ? parseSemVer(tagName) : null;
}

/**
 * Highest version tag reachable from head.
 */
export const tagStrategy: VersionStrategy = (view, config) => {
  const candidates: VersionSource[] = [];

  for (const tag of view.tags) {
    if (!view.commitsById.has(tag.targetCommit)) continue;
    const version = parseTagVersion(tag.name, config.tagPrefix);
    if (!version) continue;

    candidates.push({
      kind: "Tag",
      baseVersion: version,
      sourceCommit: tag.targetCommit,
      sourceSha: tag.targetCommit,
      sourceDate: dateOf(view, tag.targetCommit),
      shouldIncrement: tag.targetCommit !== view.head.id,
      description: `Git tag '${tag.name}'`,
    });
  }

  return pickBest(candidates);
};

// ============================================================================
// Next-version override
// ============================================================================

/**
 * The configured next-version, anchored at the first commit. Only ever
 * raises the floor of the selected source.
 */
export const nextVersionStrategy: VersionStrategy = (view, config) => {
  if (!config.nextVersion) return null;
  const version = parseSemVer(config.nextVersion);
  if (!version) return null;

  const anchor = view.firstCommit ?? view.head.id;
  return {
    kind: "NextVersionOverride",
    baseVersion: version,
    sourceCommit: anchor,
    sourceSha: anchor,
    sourceDate: dateOf(view, anchor),
    shouldIncrement: false,
    description: `NextVersion in configuration file (${formatSemVer(version)})`,
  };
};

// ============================================================================
// Merge messages
// ============================================================================

const MERGE_MESSAGE_PATTERNS: readonly RegExp[] = [
  /^Merge (?:remote-tracking )?branch '([^']+)'/,
  /^Merge pull request #\d+ (?:from|in) (\S+)/,
  /^Finish (\S+)/,
];

/**
 * Branch kinds whose names carry the version they will release.
 */
const VERSIONED_BRANCH_PATTERN = /(?:^|\/)(?:releases?|hotfix(?:es)?|support)[/-]/i;

const BRANCH_VERSION_PATTERN = /(\d+\.\d+(?:\.\d+)?)(?![\d.])/;

/**
 * Name of the branch merged by a merge commit, from its subject line.
 */
export function parseMergedBranch(message: string): string | null {
  const subject = message.split("\n")[0].trim();
  for (const pattern of MERGE_MESSAGE_PATTERNS) {
    const match = pattern.exec(subject);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Version encoded in a merge commit's merged branch name, if any.
 */
export function parseMergeMessageVersion(commit: CommitInfo): SemVer | null {
  const branch = parseMergedBranch(commit.message);
  if (!branch || !VERSIONED_BRANCH_PATTERN.test(branch)) {
    return null;
  }
  const match = BRANCH_VERSION_PATTERN.exec(branch);
  return match ? parseSemVer(match[1]) : null;
}

export const mergeMessageStrategy: VersionStrategy = (view, config) => {
  const candidates: VersionSource[] = [];

  for (const commit of view.commits) {
    const version = parseMergeMessageVersion(commit);
    if (!version) continue;

    candidates.push({
      kind: "MergeMessage",
      baseVersion: version,
      sourceCommit: commit.id,
      sourceSha: commit.id,
      sourceDate: commit.date,
      shouldIncrement: !config.preventIncrementOfMergedBranchVersion,
      description: `Merge message '${commit.message.split("\n")[0].trim()}'`,
    });
  }

  return pickBest(candidates);
};

// ============================================================================
// Fallback
// ============================================================================

/**
 * 0.1.0 at the first commit, or at head when the first commit is unknown.
 */
export function createFallbackSource(view: RepositoryView): VersionSource {
  const anchor = view.firstCommit ?? view.head.id;
  return {
    kind: "ConfigDefault",
    baseVersion: { ...FALLBACK_BASE_VERSION },
    sourceCommit: anchor,
    sourceSha: anchor,
    sourceDate: dateOf(view, anchor),
    shouldIncrement: false,
    description: "Fallback base version",
  };
}

/**
 * Always produces a candidate, so the locator never comes back empty.
 */
export const configDefaultStrategy: VersionStrategy = (view) =>
  createFallbackSource(view);

/**
 * Strategies in evaluation order.
 */
export const VERSION_STRATEGIES: readonly VersionStrategy[] = Object.freeze([
  tagStrategy,
  nextVersionStrategy,
  mergeMessageStrategy,
  configDefaultStrategy,
]);
