/**
 * Text format of cache entries.
 *
 * One "Key: Value" line per VersionVariables field, preceded by a comment
 * naming the writer and the time of writing. Fields that do not apply are
 * omitted; unknown keys are ignored on read. This layout is read by other
 * tools and must stay stable.
 */

import { parse, stringify } from "yaml";
import { z } from "zod";
import type { VersionVariables } from "../core/types.js";

/**
 * Serialized fields in file order. FileName is runtime-only.
 */
export const SERIALIZED_KEYS = [
  "Major",
  "Minor",
  "Patch",
  "PreReleaseTag",
  "PreReleaseTagWithDash",
  "PreReleaseLabel",
  "PreReleaseNumber",
  "WeightedPreReleaseNumber",
  "BuildMetaData",
  "BuildMetaDataPadded",
  "FullBuildMetaData",
  "MajorMinorPatch",
  "SemVer",
  "LegacySemVer",
  "LegacySemVerPadded",
  "AssemblySemVer",
  "AssemblySemFileVer",
  "FullSemVer",
  "InformationalVersion",
  "BranchName",
  "EscapedBranchName",
  "Sha",
  "ShortSha",
  "VersionSourceSha",
  "CommitsSinceVersionSource",
  "CommitsSinceVersionSourcePadded",
  "CommitDate",
] as const satisfies readonly (keyof VersionVariables)[];

// ============================================================================
// Read schema (failsafe YAML: every scalar is a string or null)
// ============================================================================

const requiredNumber = z
  .string()
  .trim()
  .regex(/^\d+$/, "Expected a non-negative integer")
  .transform(Number);

const optionalNumber = z.preprocess(
  (value) => (value === null || value === "" ? undefined : value),
  requiredNumber.optional()
);

/** Empty values ("PreReleaseTag:") read as "" */
const requiredString = z.preprocess(
  (value) => (value === null ? "" : value),
  z.string()
);

const optionalString = z.preprocess(
  (value) => (value === null || value === "" ? undefined : value),
  z.string().optional()
);

const CacheRecordSchema = z.object({
  Major: requiredNumber,
  Minor: requiredNumber,
  Patch: requiredNumber,
  PreReleaseTag: requiredString,
  PreReleaseTagWithDash: requiredString,
  PreReleaseLabel: requiredString,
  PreReleaseNumber: optionalNumber,
  WeightedPreReleaseNumber: optionalNumber,
  BuildMetaData: optionalString,
  BuildMetaDataPadded: optionalString,
  FullBuildMetaData: requiredString,
  MajorMinorPatch: requiredString,
  SemVer: requiredString,
  LegacySemVer: requiredString,
  LegacySemVerPadded: requiredString,
  AssemblySemVer: requiredString,
  AssemblySemFileVer: requiredString,
  FullSemVer: requiredString,
  InformationalVersion: requiredString,
  BranchName: requiredString,
  EscapedBranchName: requiredString,
  Sha: requiredString,
  ShortSha: requiredString,
  VersionSourceSha: optionalString,
  CommitsSinceVersionSource: requiredNumber,
  CommitsSinceVersionSourcePadded: requiredString,
  CommitDate: requiredString,
});

export interface SerializeOptions {
  writer: string;
  writtenAt: Date;
}

/**
 * Serialize variables to the cache text format.
 */
export function serializeVariables(
  variables: VersionVariables,
  options: SerializeOptions
): string {
  const record = new Map<string, string | number>();
  for (const key of SERIALIZED_KEYS) {
    const value = variables[key];
    if (value !== undefined) {
      record.set(key, value);
    }
  }

  const header = `# Written by ${options.writer} at ${options.writtenAt.toISOString()}\n`;
  return header + stringify(record, { lineWidth: 0 });
}

/**
 * Parse the cache text format. Returns null for anything that is not a
 * complete entry.
 */
export function deserializeVariables(text: string): VersionVariables | null {
  let raw: unknown;
  try {
    raw = parse(text, { schema: "failsafe" });
  } catch {
    return null;
  }

  const result = CacheRecordSchema.safeParse(raw);
  if (!result.success) {
    return null;
  }

  const {
    PreReleaseNumber,
    WeightedPreReleaseNumber,
    BuildMetaData,
    BuildMetaDataPadded,
    VersionSourceSha,
    ...always
  } = result.data;

  // Absent and empty optional fields leave no key behind
  const variables: VersionVariables = { ...always };
  if (PreReleaseNumber !== undefined) variables.PreReleaseNumber = PreReleaseNumber;
  if (WeightedPreReleaseNumber !== undefined) {
    variables.WeightedPreReleaseNumber = WeightedPreReleaseNumber;
  }
  if (BuildMetaData !== undefined) variables.BuildMetaData = BuildMetaData;
  if (BuildMetaDataPadded !== undefined) variables.BuildMetaDataPadded = BuildMetaDataPadded;
  if (VersionSourceSha !== undefined) variables.VersionSourceSha = VersionSourceSha;
  return variables;
}
