/**
 * Narrow read-only view of a git repository consumed by the version engine.
 */

import type { CommitInfo, TagRef } from "../core/types.js";

export interface RepositoryInspector {
  /** Current branch name; "(no branch)" when HEAD is detached */
  currentBranch(): Promise<string>;
  /** HEAD commit, or null when the branch has no commits yet */
  currentCommit(): Promise<CommitInfo | null>;
  /** Whether the working tree has uncommitted changes */
  isDirty(): Promise<boolean>;
  tags(): Promise<TagRef[]>;
  /**
   * Commits reachable from `to` but not from `from`, oldest first in
   * topological order. A null `from` yields every commit reachable from `to`.
   */
  commitsBetween(from: string | null, to: string): Promise<CommitInfo[]>;
  /** Root commit of the current branch, or null in an empty repository */
  firstCommit(): Promise<string | null>;
  /** URL of the origin remote, or null when there is none */
  remoteUrl(): Promise<string | null>;
}

export const DETACHED_HEAD_BRANCH = "(no branch)";
