/**
 * Version source selection.
 */

import { compareSemVer, formatSemVer } from "../core/semver.js";
import type {
  EffectiveConfig,
  VersionSource,
  VersionSourceKind,
} from "../core/types.js";
import {
  VERSION_STRATEGIES,
  commitTimestamp,
  createFallbackSource,
  type VersionStrategy,
} from "./strategies.js";
import type { RepositoryView } from "./view.js";

/**
 * Tie-break rank at equal base versions; higher wins.
 */
const KIND_PRIORITY: Record<VersionSourceKind, number> = {
  Tag: 3,
  MergeMessage: 2,
  ConfigDefault: 1,
  NextVersionOverride: 0,
};

/**
 * Comparator ordering the preferred candidate first.
 */
export function compareCandidates(a: VersionSource, b: VersionSource): number {
  const byVersion = compareSemVer(b.baseVersion, a.baseVersion);
  if (byVersion !== 0) return byVersion;

  const byKind = KIND_PRIORITY[b.kind] - KIND_PRIORITY[a.kind];
  if (byKind !== 0) return byKind;

  return commitTimestamp(b.sourceDate) - commitTimestamp(a.sourceDate);
}

/**
 * Select among candidates, then let a next-version override raise the
 * base version if it exceeds the winner's. `fallback` wins when no other
 * candidate exists.
 */
export function selectVersionSource(
  candidates: readonly VersionSource[],
  fallback: VersionSource
): VersionSource {
  const override = candidates.find((c) => c.kind === "NextVersionOverride");
  const ranked = candidates
    .filter((c) => c.kind !== "NextVersionOverride")
    .sort(compareCandidates);

  const winner = ranked[0] ?? fallback;

  if (override && compareSemVer(override.baseVersion, winner.baseVersion) > 0) {
    return {
      ...winner,
      kind: "NextVersionOverride",
      baseVersion: override.baseVersion,
      shouldIncrement: false,
      description: `${override.description}, counting from ${winner.description}`,
    };
  }

  return winner;
}

/**
 * Run every strategy and select the version source.
 */
export function locateVersionSource(
  view: RepositoryView,
  config: EffectiveConfig,
  strategies: readonly VersionStrategy[] = VERSION_STRATEGIES
): VersionSource {
  const candidates: VersionSource[] = [];
  for (const strategy of strategies) {
    const candidate = strategy(view, config);
    if (candidate) {
      candidates.push(candidate);
    }
  }
  return selectVersionSource(candidates, createFallbackSource(view));
}

export function describeVersionSource(source: VersionSource): string {
  return `${source.description} -> ${formatSemVer(source.baseVersion)} (${source.kind})`;
}
