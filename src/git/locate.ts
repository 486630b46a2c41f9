/**
 * Discovery of the repository root from a working directory.
 */

import { readFile, stat } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { RepositoryNotFoundError } from "../core/errors.js";

export interface RepositoryLocation {
  /** Working tree root (directory containing .git) */
  projectRoot: string;
  /** The git directory; for worktrees, the path named by the .git file */
  dotGitDirectory: string;
}

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch {
    return null;
  }
}

/**
 * Read "gitdir: <path>" from a worktree or submodule .git file.
 */
async function readGitDirPointer(gitFile: string): Promise<string | null> {
  const content = await readFile(gitFile, "utf-8");
  const match = /^gitdir:\s*(.+)$/m.exec(content);
  if (!match) {
    return null;
  }
  const target = match[1].trim();
  return isAbsolute(target) ? target : resolve(dirname(gitFile), target);
}

/**
 * Walk up from `workingDirectory` until a .git directory or file is found.
 */
export async function locateRepository(
  workingDirectory: string
): Promise<RepositoryLocation> {
  const start = resolve(workingDirectory);
  let current = start;

  for (;;) {
    const candidate = join(current, ".git");
    const stats = await statOrNull(candidate);

    if (stats?.isDirectory()) {
      return { projectRoot: current, dotGitDirectory: candidate };
    }
    if (stats?.isFile()) {
      const pointer = await readGitDirPointer(candidate);
      if (pointer) {
        return { projectRoot: current, dotGitDirectory: pointer };
      }
    }

    const parent = dirname(current);
    if (parent === current) {
      throw new RepositoryNotFoundError(start);
    }
    current = parent;
  }
}
