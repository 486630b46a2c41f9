/**
 * Core types for branchver version derivation.
 */

// ============================================================================
// Configuration Tokens
// ============================================================================

export const INCREMENT_STRATEGIES = [
  "Major",
  "Minor",
  "Patch",
  "None",
  "Inherit",
] as const;

export type IncrementStrategy = (typeof INCREMENT_STRATEGIES)[number];

/**
 * An increment that can actually be applied (Inherit already resolved).
 */
export type VersionField = Exclude<IncrementStrategy, "Inherit">;

export const VERSIONING_MODES = [
  "ContinuousDelivery",
  "ContinuousDeployment",
] as const;

export type VersioningMode = (typeof VERSIONING_MODES)[number];

export const COMMIT_MESSAGE_INCREMENT_MODES = [
  "Enabled",
  "Disabled",
  "MergeMessageOnly",
] as const;

export type CommitMessageIncrementMode =
  (typeof COMMIT_MESSAGE_INCREMENT_MODES)[number];

export const ASSEMBLY_VERSIONING_SCHEMES = [
  "MajorMinorPatchTag",
  "MajorMinorPatch",
  "MajorMinor",
  "Major",
  "None",
] as const;

export type AssemblyVersioningScheme =
  (typeof ASSEMBLY_VERSIONING_SCHEMES)[number];

// ============================================================================
// Semantic Version
// ============================================================================

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
  preReleaseLabel?: string;
  preReleaseNumber?: number;
  buildMetadata?: string;
}

// ============================================================================
// Repository Data
// ============================================================================

export interface CommitInfo {
  id: string;
  message: string;
  /** ISO-8601 committer date */
  date: string;
  parents: string[];
}

export interface TagRef {
  name: string;
  /** Commit the tag points at (peeled for annotated tags) */
  targetCommit: string;
}

// ============================================================================
// Effective Configuration
// ============================================================================

export interface BumpPatterns {
  major: RegExp;
  minor: RegExp;
  patch: RegExp;
  none: RegExp;
}

/**
 * Fully resolved, branch-specific settings for one computation.
 * Frozen after resolution.
 */
export interface EffectiveConfig {
  readonly branchName: string;
  /** Names of the branch rules that matched, in application order */
  readonly matchedRules: readonly string[];
  readonly tagPrefix: string;
  readonly increment: VersionField;
  readonly mode: VersioningMode;
  /** Expanded pre-release label; empty when the branch is not a pre-release branch */
  readonly preReleaseLabel: string;
  readonly nextVersion?: string;
  readonly commitMessageIncrementing: CommitMessageIncrementMode;
  readonly bumpPatterns: Readonly<BumpPatterns>;
  readonly preventIncrementOfMergedBranchVersion: boolean;
  readonly preReleaseWeight: number;
  readonly assemblyVersioningScheme: AssemblyVersioningScheme;
  readonly assemblyFileVersioningScheme: AssemblyVersioningScheme;
  readonly noCache: boolean;
  readonly noNormalize: boolean;
}

// ============================================================================
// Version Source
// ============================================================================

export type VersionSourceKind =
  | "Tag"
  | "NextVersionOverride"
  | "MergeMessage"
  | "ConfigDefault";

export interface VersionSource {
  kind: VersionSourceKind;
  baseVersion: SemVer;
  /** Commit counted from (exclusive); null counts every reachable commit */
  sourceCommit: string | null;
  /** Sha reported as VersionSourceSha; empty when there is no source commit */
  sourceSha: string;
  /** Date of the source commit, used to break ties */
  sourceDate: string;
  shouldIncrement: boolean;
  /** Human-readable origin, for diagnostics */
  description: string;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Every derived value a consumer may need. Optional fields are omitted
 * when they do not apply to the computation.
 */
export interface VersionVariables {
  Major: number;
  Minor: number;
  Patch: number;
  PreReleaseTag: string;
  PreReleaseTagWithDash: string;
  PreReleaseLabel: string;
  PreReleaseNumber?: number;
  WeightedPreReleaseNumber?: number;
  BuildMetaData?: string;
  BuildMetaDataPadded?: string;
  FullBuildMetaData: string;
  MajorMinorPatch: string;
  SemVer: string;
  LegacySemVer: string;
  LegacySemVerPadded: string;
  AssemblySemVer: string;
  AssemblySemFileVer: string;
  FullSemVer: string;
  InformationalVersion: string;
  BranchName: string;
  EscapedBranchName: string;
  Sha: string;
  ShortSha: string;
  VersionSourceSha?: string;
  CommitsSinceVersionSource: number;
  CommitsSinceVersionSourcePadded: string;
  CommitDate: string;
  /** Cache file backing this result; not part of the serialized entry */
  FileName?: string;
}
