/**
 * Configuration document types (camelCase, after parsing).
 */

import type {
  AssemblyVersioningScheme,
  CommitMessageIncrementMode,
  IncrementStrategy,
  VersioningMode,
} from "../core/types.js";

/**
 * Fields a branch rule may override.
 */
export interface BranchFields {
  /** Pre-release label template; "" means no pre-release label */
  tag?: string;
  /** Regex matched against the start of tag names */
  tagPrefix?: string;
  increment?: IncrementStrategy;
  mode?: VersioningMode;
  commitMessageIncrementing?: CommitMessageIncrementMode;
  preventIncrementOfMergedBranchVersion?: boolean;
  preReleaseWeight?: number;
}

/**
 * Fields of the global (default) section.
 */
export interface GlobalFields extends BranchFields {
  nextVersion?: string;
  majorVersionBumpMessage?: string;
  minorVersionBumpMessage?: string;
  patchVersionBumpMessage?: string;
  noBumpMessage?: string;
  assemblyVersioningScheme?: AssemblyVersioningScheme;
  assemblyFileVersioningScheme?: AssemblyVersioningScheme;
  noCache?: boolean;
  noNormalize?: boolean;
}

export interface BranchRuleDocument extends BranchFields {
  /** Required for new rules, optional when overriding a built-in rule */
  regex?: string;
}

export interface ConfigDocument extends GlobalFields {
  branches?: Record<string, BranchRuleDocument>;
}

/**
 * A named branch-matching rule with its partial override.
 */
export interface BranchRule {
  readonly name: string;
  readonly regex: string;
  readonly overrides: Readonly<BranchFields>;
}

/**
 * Global section with every field set.
 */
export type ResolvedGlobalFields = Required<Omit<GlobalFields, "nextVersion">> &
  Pick<GlobalFields, "nextVersion">;
