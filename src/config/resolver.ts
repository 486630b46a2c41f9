/**
 * Effective configuration resolution.
 *
 * A pure fold: built-in defaults, then the document, then the caller's
 * override, then every matching branch rule in declared order. Later layers
 * only replace fields they set.
 */

import { escapeBranchName, normalizeBranchName } from "../core/branch.js";
import { ConfigError } from "../core/errors.js";
import type { EffectiveConfig, VersionField } from "../core/types.js";
import { DEFAULT_BRANCH_RULES, DEFAULT_CONFIG } from "./defaults.js";
import type {
  BranchFields,
  BranchRule,
  BranchRuleDocument,
  ConfigDocument,
  ResolvedGlobalFields,
} from "./types.js";

export interface ResolveConfigInput {
  branchName: string;
  document?: ConfigDocument;
  override?: ConfigDocument;
  /** Where the document came from, for error messages */
  source?: string;
}

// ============================================================================
// Layering
// ============================================================================

function overlayBranchFields(base: BranchFields, layer: BranchFields): BranchFields {
  return {
    tag: layer.tag ?? base.tag,
    tagPrefix: layer.tagPrefix ?? base.tagPrefix,
    increment: layer.increment ?? base.increment,
    mode: layer.mode ?? base.mode,
    commitMessageIncrementing:
      layer.commitMessageIncrementing ?? base.commitMessageIncrementing,
    preventIncrementOfMergedBranchVersion:
      layer.preventIncrementOfMergedBranchVersion ??
      base.preventIncrementOfMergedBranchVersion,
    preReleaseWeight: layer.preReleaseWeight ?? base.preReleaseWeight,
  };
}

function overlayGlobal(
  base: ResolvedGlobalFields,
  layer: ConfigDocument | undefined
): ResolvedGlobalFields {
  if (!layer) {
    return base;
  }
  return {
    tag: layer.tag ?? base.tag,
    increment: layer.increment ?? base.increment,
    mode: layer.mode ?? base.mode,
    commitMessageIncrementing:
      layer.commitMessageIncrementing ?? base.commitMessageIncrementing,
    preventIncrementOfMergedBranchVersion:
      layer.preventIncrementOfMergedBranchVersion ??
      base.preventIncrementOfMergedBranchVersion,
    preReleaseWeight: layer.preReleaseWeight ?? base.preReleaseWeight,
    tagPrefix: layer.tagPrefix ?? base.tagPrefix,
    nextVersion: layer.nextVersion ?? base.nextVersion,
    majorVersionBumpMessage:
      layer.majorVersionBumpMessage ?? base.majorVersionBumpMessage,
    minorVersionBumpMessage:
      layer.minorVersionBumpMessage ?? base.minorVersionBumpMessage,
    patchVersionBumpMessage:
      layer.patchVersionBumpMessage ?? base.patchVersionBumpMessage,
    noBumpMessage: layer.noBumpMessage ?? base.noBumpMessage,
    assemblyVersioningScheme:
      layer.assemblyVersioningScheme ?? base.assemblyVersioningScheme,
    assemblyFileVersioningScheme:
      layer.assemblyFileVersioningScheme ?? base.assemblyFileVersioningScheme,
    noCache: layer.noCache ?? base.noCache,
    noNormalize: layer.noNormalize ?? base.noNormalize,
  };
}

/**
 * Merge document branch sections into the rule list. A known name updates
 * the rule in place; a new name is appended and must carry a regex.
 */
export function mergeBranchRules(
  rules: readonly BranchRule[],
  sections: Record<string, BranchRuleDocument> | undefined,
  source: string
): BranchRule[] {
  const merged = [...rules];
  if (!sections) {
    return merged;
  }

  const issues: string[] = [];
  for (const [name, section] of Object.entries(sections)) {
    const index = merged.findIndex((existing) => existing.name === name);
    if (index >= 0) {
      const existing = merged[index];
      merged[index] = {
        name,
        regex: section.regex ?? existing.regex,
        overrides: overlayBranchFields(existing.overrides, section),
      };
      continue;
    }
    if (!section.regex) {
      issues.push(`branches.${name}.regex: Required for a new branch rule`);
      continue;
    }
    merged.push({
      name,
      regex: section.regex,
      overrides: overlayBranchFields({}, section),
    });
  }

  if (issues.length > 0) {
    throw new ConfigError(source, issues);
  }
  return merged;
}

// ============================================================================
// Resolution
// ============================================================================

function compile(pattern: string, field: string, source: string): RegExp {
  try {
    return new RegExp(pattern, "i");
  } catch {
    throw new ConfigError(source, [`${field}: Invalid regular expression`]);
  }
}

/**
 * Expand "{BranchName}" with the branch name minus the part matched by the
 * rule that supplied the template.
 */
function expandLabel(
  template: string,
  branchName: string,
  matcher: RegExp | null
): string {
  if (!template.includes("{BranchName}")) {
    return template;
  }
  const stripped = matcher ? branchName.replace(matcher, "") : branchName;
  return template.replace(/\{BranchName\}/g, escapeBranchName(stripped || branchName));
}

/**
 * Resolve the effective configuration for a branch.
 */
export function resolveEffectiveConfig(input: ResolveConfigInput): EffectiveConfig {
  const source = input.source ?? "configuration";
  const branchName = normalizeBranchName(input.branchName);

  const global = overlayGlobal(overlayGlobal(DEFAULT_CONFIG, input.document), input.override);
  const rules = mergeBranchRules(
    mergeBranchRules(DEFAULT_BRANCH_RULES, input.document?.branches, source),
    input.override?.branches,
    "override configuration"
  );

  let branchFields: BranchFields = {};
  let labelMatcher: RegExp | null = null;
  const matchedRules: string[] = [];

  for (const candidate of rules) {
    const matcher = compile(candidate.regex, `branches.${candidate.name}.regex`, source);
    if (!matcher.test(branchName)) {
      continue;
    }
    matchedRules.push(candidate.name);
    branchFields = overlayBranchFields(branchFields, candidate.overrides);
    if (candidate.overrides.tag !== undefined) {
      labelMatcher = matcher;
    }
  }

  const resolvedIncrement = branchFields.increment ?? global.increment;
  const increment: VersionField =
    resolvedIncrement === "Inherit"
      ? global.increment === "Inherit"
        ? "Patch"
        : global.increment
      : resolvedIncrement;

  const template = branchFields.tag ?? global.tag;

  return Object.freeze({
    branchName,
    matchedRules: Object.freeze(matchedRules),
    tagPrefix: branchFields.tagPrefix ?? global.tagPrefix,
    increment,
    mode: branchFields.mode ?? global.mode,
    preReleaseLabel: expandLabel(template, branchName, labelMatcher),
    ...(global.nextVersion ? { nextVersion: global.nextVersion } : {}),
    commitMessageIncrementing:
      branchFields.commitMessageIncrementing ?? global.commitMessageIncrementing,
    bumpPatterns: Object.freeze({
      major: compile(global.majorVersionBumpMessage, "major-version-bump-message", source),
      minor: compile(global.minorVersionBumpMessage, "minor-version-bump-message", source),
      patch: compile(global.patchVersionBumpMessage, "patch-version-bump-message", source),
      none: compile(global.noBumpMessage, "no-bump-message", source),
    }),
    preventIncrementOfMergedBranchVersion:
      branchFields.preventIncrementOfMergedBranchVersion ??
      global.preventIncrementOfMergedBranchVersion,
    preReleaseWeight: branchFields.preReleaseWeight ?? global.preReleaseWeight,
    assemblyVersioningScheme: global.assemblyVersioningScheme,
    assemblyFileVersioningScheme: global.assemblyFileVersioningScheme,
    noCache: global.noCache,
    noNormalize: global.noNormalize,
  });
}
