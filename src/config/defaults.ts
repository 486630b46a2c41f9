/**
 * Built-in configuration defaults.
 *
 * Frozen constants: every computation builds a fresh EffectiveConfig from
 * them and never writes back.
 */

import type { BranchRule, ResolvedGlobalFields } from "./types.js";

export const CONFIG_FILE_NAME = "branchver.yml";

/** Accepted alternatives, checked after CONFIG_FILE_NAME */
export const CONFIG_FILE_ALTERNATIVES = ["branchver.yaml"] as const;

export const DEFAULT_CONFIG: Readonly<ResolvedGlobalFields> = Object.freeze<ResolvedGlobalFields>({
  tagPrefix: "[vV]",
  tag: "{BranchName}",
  increment: "Patch",
  mode: "ContinuousDelivery",
  commitMessageIncrementing: "Enabled",
  majorVersionBumpMessage: "\\+semver:\\s?(breaking|major)",
  minorVersionBumpMessage: "\\+semver:\\s?(feature|minor)",
  patchVersionBumpMessage: "\\+semver:\\s?(fix|patch)",
  noBumpMessage: "\\+semver:\\s?(none|skip)",
  preventIncrementOfMergedBranchVersion: false,
  preReleaseWeight: 0,
  assemblyVersioningScheme: "MajorMinorPatch",
  assemblyFileVersioningScheme: "MajorMinorPatch",
  noCache: false,
  noNormalize: false,
});

function rule(
  name: string,
  regex: string,
  overrides: BranchRule["overrides"]
): BranchRule {
  return Object.freeze({ name, regex, overrides: Object.freeze(overrides) });
}

/**
 * Built-in rules in match order. User sections with the same name override
 * these field by field; new sections are appended.
 */
export const DEFAULT_BRANCH_RULES: readonly BranchRule[] = Object.freeze([
  rule("main", "^master$|^main$", {
    tag: "",
    increment: "Patch",
    mode: "ContinuousDelivery",
    preventIncrementOfMergedBranchVersion: true,
  }),
  rule("develop", "^dev(elop)?(ment)?$", {
    tag: "alpha",
    increment: "Minor",
    mode: "ContinuousDeployment",
  }),
  rule("release", "^releases?[/-]", {
    tag: "beta",
    increment: "Patch",
    preventIncrementOfMergedBranchVersion: true,
  }),
  rule("feature", "^features?[/-]", {
    tag: "{BranchName}",
    increment: "Inherit",
  }),
  rule("pull-request", "^(pull|pull-requests|pr)[/-]", {
    tag: "PullRequest",
    increment: "Inherit",
  }),
  rule("hotfix", "^hotfix(es)?[/-]", {
    tag: "beta",
    increment: "Patch",
  }),
  rule("support", "^support[/-]", {
    tag: "",
    increment: "Patch",
    preventIncrementOfMergedBranchVersion: true,
  }),
]);
