/**
 * RepositoryInspector backed by the git executable.
 */

import { execa } from "execa";
import { GitCommandError } from "../core/errors.js";
import type { CommitInfo, TagRef } from "../core/types.js";
import { DETACHED_HEAD_BRANCH, type RepositoryInspector } from "./inspector.js";
import {
  LOG_FORMAT,
  TAG_REF_FORMAT,
  parseLogOutput,
  parseRootCommits,
  parseTagRefs,
} from "./parser.js";

export interface GitInspectorOptions {
  /** Deadline in milliseconds applied to every git process */
  timeoutMs?: number;
}

interface GitResult {
  stdout: string;
  exitCode: number;
}

export class GitInspector implements RepositoryInspector {
  constructor(
    private readonly cwd: string,
    private readonly options: GitInspectorOptions = {}
  ) {}

  /**
   * Run git. Non-zero exits are returned when `allowFailure` is set and
   * raised as GitCommandError otherwise.
   */
  private async git(args: string[], allowFailure = false): Promise<GitResult> {
    const result = await execa("git", args, {
      cwd: this.cwd,
      reject: false,
      timeout: this.options.timeoutMs,
    });

    if (result.timedOut) {
      throw new GitCommandError(
        `git ${args.join(" ")}`,
        `timed out after ${this.options.timeoutMs}ms`
      );
    }
    if (result.exitCode !== 0 && !allowFailure) {
      throw new GitCommandError(`git ${args.join(" ")}`, result.stderr);
    }

    return { stdout: result.stdout, exitCode: result.exitCode };
  }

  async currentBranch(): Promise<string> {
    const result = await this.git(["symbolic-ref", "--short", "-q", "HEAD"], true);
    const branch = result.stdout.trim();
    return result.exitCode === 0 && branch ? branch : DETACHED_HEAD_BRANCH;
  }

  async currentCommit(): Promise<CommitInfo | null> {
    const result = await this.git(["log", "-1", LOG_FORMAT, "HEAD"], true);
    if (result.exitCode !== 0) {
      // Unborn branch
      return null;
    }
    return parseLogOutput(result.stdout)[0] ?? null;
  }

  async isDirty(): Promise<boolean> {
    const result = await this.git(["status", "--porcelain"]);
    return result.stdout.trim().length > 0;
  }

  async tags(): Promise<TagRef[]> {
    const result = await this.git(["for-each-ref", TAG_REF_FORMAT, "refs/tags"]);
    return parseTagRefs(result.stdout);
  }

  async commitsBetween(from: string | null, to: string): Promise<CommitInfo[]> {
    const range = from ? `${from}..${to}` : to;
    const result = await this.git(["log", "--topo-order", "--reverse", LOG_FORMAT, range]);
    return parseLogOutput(result.stdout);
  }

  async firstCommit(): Promise<string | null> {
    const result = await this.git(["rev-list", "--max-parents=0", "HEAD"], true);
    if (result.exitCode !== 0) {
      return null;
    }
    return parseRootCommits(result.stdout);
  }

  async remoteUrl(): Promise<string | null> {
    const result = await this.git(["config", "--get", "remote.origin.url"], true);
    const url = result.stdout.trim();
    return result.exitCode === 0 && url ? url : null;
  }
}

/**
 * Create an inspector for a repository working directory.
 */
export function createGitInspector(
  cwd: string,
  options: GitInspectorOptions = {}
): RepositoryInspector {
  return new GitInspector(cwd, options);
}
