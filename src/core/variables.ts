/**
 * Assembly of VersionVariables from a computed version.
 */

import { escapeBranchName } from "./branch.js";
import {
  formatMajorMinorPatch,
  formatPreReleaseTag,
  formatSemVer,
  hasPreRelease,
} from "./semver.js";
import type {
  AssemblyVersioningScheme,
  CommitInfo,
  EffectiveConfig,
  SemVer,
  VersionSource,
  VersionVariables,
} from "./types.js";

export const SHORT_SHA_LENGTH = 7;

const PAD_WIDTH = 4;

export interface AssembleVariablesInput {
  version: SemVer;
  source: VersionSource;
  head: CommitInfo;
  config: EffectiveConfig;
  commitsSinceVersionSource: number;
}

export function padNumber(value: number): string {
  return String(value).padStart(PAD_WIDTH, "0");
}

/**
 * Four-part version for the given assembly scheme; "" for None.
 */
export function formatAssemblyVersion(
  version: SemVer,
  scheme: AssemblyVersioningScheme
): string {
  switch (scheme) {
    case "MajorMinorPatchTag":
      return `${formatMajorMinorPatch(version)}.${version.preReleaseNumber ?? 0}`;
    case "MajorMinorPatch":
      return `${formatMajorMinorPatch(version)}.0`;
    case "MajorMinor":
      return `${version.major}.${version.minor}.0.0`;
    case "Major":
      return `${version.major}.0.0.0`;
    case "None":
      return "";
  }
}

/**
 * Legacy pre-release form without the dot ("beta4", or "beta0004" padded).
 */
function formatLegacySemVer(version: SemVer, padded: boolean): string {
  const base = formatMajorMinorPatch(version);
  if (!hasPreRelease(version)) {
    return base;
  }
  const number =
    version.preReleaseNumber === undefined
      ? ""
      : padded
        ? padNumber(version.preReleaseNumber)
        : String(version.preReleaseNumber);
  return `${base}-${version.preReleaseLabel ?? ""}${number}`;
}

/**
 * Build the full variable set. Optional fields are left out entirely when
 * they do not apply, so a cache round trip yields an equal object.
 */
export function assembleVersionVariables(input: AssembleVariablesInput): VersionVariables {
  const { version, source, head, config, commitsSinceVersionSource } = input;

  const preReleaseTag = formatPreReleaseTag(version);
  const semVer = formatSemVer({ ...version, buildMetadata: undefined });
  const branchName = config.branchName;
  const fullBuildMetaData = [
    version.buildMetadata,
    `Branch.${branchName}`,
    `Sha.${head.id}`,
  ]
    .filter(Boolean)
    .join(".");

  const variables: VersionVariables = {
    Major: version.major,
    Minor: version.minor,
    Patch: version.patch,
    PreReleaseTag: preReleaseTag,
    PreReleaseTagWithDash: preReleaseTag ? `-${preReleaseTag}` : "",
    PreReleaseLabel: version.preReleaseLabel ?? "",
    FullBuildMetaData: fullBuildMetaData,
    MajorMinorPatch: formatMajorMinorPatch(version),
    SemVer: semVer,
    LegacySemVer: formatLegacySemVer(version, false),
    LegacySemVerPadded: formatLegacySemVer(version, true),
    AssemblySemVer: formatAssemblyVersion(version, config.assemblyVersioningScheme),
    AssemblySemFileVer: formatAssemblyVersion(version, config.assemblyFileVersioningScheme),
    FullSemVer: version.buildMetadata ? `${semVer}+${version.buildMetadata}` : semVer,
    InformationalVersion: `${semVer}+${fullBuildMetaData}`,
    BranchName: branchName,
    EscapedBranchName: escapeBranchName(branchName),
    Sha: head.id,
    ShortSha: head.id.slice(0, SHORT_SHA_LENGTH),
    CommitsSinceVersionSource: commitsSinceVersionSource,
    CommitsSinceVersionSourcePadded: padNumber(commitsSinceVersionSource),
    CommitDate: head.date.slice(0, 10),
  };

  if (version.preReleaseNumber !== undefined) {
    variables.PreReleaseNumber = version.preReleaseNumber;
    variables.WeightedPreReleaseNumber = version.preReleaseNumber + config.preReleaseWeight;
  }
  if (version.buildMetadata) {
    variables.BuildMetaData = version.buildMetadata;
    const count = Number(version.buildMetadata);
    variables.BuildMetaDataPadded = Number.isInteger(count)
      ? padNumber(count)
      : version.buildMetadata;
  }
  if (source.sourceSha) {
    variables.VersionSourceSha = source.sourceSha;
  }

  return variables;
}
