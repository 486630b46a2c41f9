/**
 * Custom error classes for branchver.
 */

export class BranchverError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = "BranchverError";
  }
}

export class RepositoryNotFoundError extends BranchverError {
  constructor(public readonly searchedPath: string = process.cwd()) {
    super(
      `Can't find the .git directory in ${searchedPath} or any parent directory.\n` +
        "Please run this command from within a git repository.",
      1
    );
    this.name = "RepositoryNotFoundError";
  }
}

export class NoCommitsError extends BranchverError {
  constructor(root: string) {
    super(
      `No commits found in repository: ${root}\n` +
        "Make at least one commit before calculating a version.",
      1
    );
    this.name = "NoCommitsError";
  }
}

/**
 * Invalid or unparsable configuration. Never defaulted silently.
 */
export class ConfigError extends BranchverError {
  constructor(
    public readonly source: string,
    public readonly issues: string[]
  ) {
    super(
      `Invalid configuration in ${source}:\n` +
        issues.map((issue) => `  - ${issue}`).join("\n"),
      2
    );
    this.name = "ConfigError";
  }
}

export class GitCommandError extends BranchverError {
  constructor(
    command: string,
    public readonly stderr: string
  ) {
    super(`Git command failed: ${command}\n${stderr}`, 1);
    this.name = "GitCommandError";
  }
}

/**
 * A cache entry could not be read. Recovered locally as a cache miss.
 */
export class CacheReadError extends BranchverError {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`Unable to read version cache file ${filePath}: ${reason}`, 1);
    this.name = "CacheReadError";
  }
}

/**
 * A cache entry could not be written. Logged and swallowed.
 */
export class CacheWriteError extends BranchverError {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`Unable to write version cache file ${filePath}: ${reason}`, 1);
    this.name = "CacheWriteError";
  }
}

/**
 * Get a printable reason from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
