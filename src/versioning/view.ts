/**
 * Immutable snapshot of the repository facts the strategies read.
 */

import type { CommitInfo, TagRef } from "../core/types.js";
import type { RepositoryInspector } from "../git/inspector.js";

export interface RepositoryView {
  readonly head: CommitInfo;
  readonly firstCommit: string | null;
  /** Every commit reachable from head, oldest first */
  readonly commits: readonly CommitInfo[];
  readonly commitsById: ReadonlyMap<string, CommitInfo>;
  readonly tags: readonly TagRef[];
}

/**
 * Build a view from already-fetched data. Head is always part of the
 * reachable set, even when the commit list omits it.
 */
export function createRepositoryView(
  head: CommitInfo,
  commits: readonly CommitInfo[],
  tags: readonly TagRef[],
  firstCommit: string | null
): RepositoryView {
  const commitsById = new Map(commits.map((commit) => [commit.id, commit]));
  if (!commitsById.has(head.id)) {
    commitsById.set(head.id, head);
  }
  return Object.freeze({
    head,
    firstCommit,
    commits: Object.freeze([...commits]),
    commitsById,
    tags: Object.freeze([...tags]),
  });
}

export async function buildRepositoryView(
  inspector: RepositoryInspector,
  head: CommitInfo
): Promise<RepositoryView> {
  const [commits, tags, firstCommit] = await Promise.all([
    inspector.commitsBetween(null, head.id),
    inspector.tags(),
    inspector.firstCommit(),
  ]);
  return createRepositoryView(head, commits, tags, firstCommit);
}
