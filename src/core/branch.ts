/**
 * Branch name normalization.
 */

const BRANCH_REF_PREFIXES = [
  /^refs\/heads?\//,
  /^refs\/remotes\/[^/]+\//,
  /^origin\//,
];

/**
 * Strip ref prefixes so "refs/heads/feature/x" and "origin/feature/x"
 * resolve like "feature/x". Pull request refs keep a "pull/" prefix.
 */
export function normalizeBranchName(branchName: string): string {
  const trimmed = branchName.trim();
  if (/^refs\/pull\//.test(trimmed)) {
    return trimmed.replace(/^refs\//, "");
  }
  for (const prefix of BRANCH_REF_PREFIXES) {
    if (prefix.test(trimmed)) {
      return trimmed.replace(prefix, "");
    }
  }
  return trimmed;
}

/**
 * Replace characters that are not valid in a pre-release identifier.
 * Leading and trailing dashes are dropped, so "(no branch)" becomes "no-branch".
 */
export function escapeBranchName(branchName: string): string {
  return branchName.replace(/[^0-9A-Za-z-]/g, "-").replace(/^-+|-+$/g, "");
}
