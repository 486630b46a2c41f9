/**
 * Increment calculation over the commits since the version source.
 */

import { incrementSemVer } from "../core/semver.js";
import type {
  BumpPatterns,
  CommitInfo,
  EffectiveConfig,
  SemVer,
  VersionField,
  VersionSource,
} from "../core/types.js";
import type { RepositoryInspector } from "../git/inspector.js";

const DIRECTIVE_STRENGTH: Record<VersionField, number> = {
  None: 0,
  Patch: 1,
  Minor: 2,
  Major: 3,
};

export interface IncrementResult {
  /** Commits walked: source exclusive, head inclusive */
  commitsSinceVersionSource: number;
  /** Strongest bump directive found, null when none */
  directive: VersionField | null;
  /** Increment actually applied to the base version */
  increment: VersionField;
  version: SemVer;
}

function isMergeCommit(commit: CommitInfo): boolean {
  return commit.parents.length > 1;
}

/**
 * Strongest directive in a single commit message.
 */
export function findBumpDirective(
  message: string,
  patterns: Readonly<BumpPatterns>
): VersionField | null {
  if (patterns.major.test(message)) return "Major";
  if (patterns.minor.test(message)) return "Minor";
  if (patterns.patch.test(message)) return "Patch";
  if (patterns.none.test(message)) return "None";
  return null;
}

/**
 * Strongest directive across the walked commits, honouring the
 * commit-message-incrementing mode.
 */
export function findStrongestDirective(
  commits: readonly CommitInfo[],
  config: EffectiveConfig
): VersionField | null {
  if (config.commitMessageIncrementing === "Disabled") {
    return null;
  }

  let strongest: VersionField | null = null;
  for (const commit of commits) {
    if (config.commitMessageIncrementing === "MergeMessageOnly" && !isMergeCommit(commit)) {
      continue;
    }
    const directive = findBumpDirective(commit.message, config.bumpPatterns);
    if (
      directive &&
      (strongest === null || DIRECTIVE_STRENGTH[directive] > DIRECTIVE_STRENGTH[strongest])
    ) {
      strongest = directive;
      if (strongest === "Major") break;
    }
  }
  return strongest;
}

/**
 * Derive the version from the source and the walked commits.
 */
export function deriveVersion(
  source: VersionSource,
  commits: readonly CommitInfo[],
  config: EffectiveConfig
): IncrementResult {
  const count = commits.length;
  const directive = findStrongestDirective(commits, config);

  // A tag on head is the version, pre-release included
  if (source.kind === "Tag" && !source.shouldIncrement) {
    const { major, minor, patch, preReleaseLabel, preReleaseNumber } = source.baseVersion;
    const exact: SemVer = { major, minor, patch };
    if (preReleaseLabel !== undefined) {
      exact.preReleaseLabel = preReleaseLabel;
      if (preReleaseNumber !== undefined) {
        exact.preReleaseNumber = preReleaseNumber;
      }
    }
    return {
      commitsSinceVersionSource: count,
      directive,
      increment: "None",
      version: exact,
    };
  }

  const increment: VersionField =
    !source.shouldIncrement || count === 0 ? "None" : (directive ?? config.increment);

  const version: SemVer = incrementSemVer(source.baseVersion, increment);

  if (config.preReleaseLabel !== "") {
    version.preReleaseLabel = config.preReleaseLabel;
    version.preReleaseNumber = count;
  }
  if (config.mode === "ContinuousDelivery" && count > 0) {
    version.buildMetadata = String(count);
  }

  return { commitsSinceVersionSource: count, directive, increment, version };
}

/**
 * Walk the commits between the version source and head, then derive the
 * version.
 */
export async function calculateIncrement(
  inspector: RepositoryInspector,
  source: VersionSource,
  head: CommitInfo,
  config: EffectiveConfig
): Promise<IncrementResult> {
  const commits = await inspector.commitsBetween(source.sourceCommit, head.id);
  return deriveVersion(source, commits, config);
}
