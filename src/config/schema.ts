/**
 * Zod schemas for the YAML configuration document.
 *
 * Documents are read with the YAML failsafe schema, so every scalar arrives
 * as a string; these schemas validate the tokens and transform kebab-case
 * keys into the camelCase ConfigDocument.
 */

import { z } from "zod";
import {
  ASSEMBLY_VERSIONING_SCHEMES,
  COMMIT_MESSAGE_INCREMENT_MODES,
  INCREMENT_STRATEGIES,
  VERSIONING_MODES,
} from "../core/types.js";
import { parseSemVer } from "../core/semver.js";
import type { BranchRuleDocument, ConfigDocument } from "./types.js";

// ============================================================================
// Scalar Helpers
// ============================================================================

/** Empty scalars ("key:" with no value) count as unset */
function blankToUndefined(value: unknown): unknown {
  if (value === null || value === "") {
    return undefined;
  }
  return value;
}

/**
 * Case-insensitive token matching that yields the canonical spelling.
 */
function token<const T extends readonly [string, ...string[]]>(
  values: T,
  what: string
) {
  return z.preprocess(
    (value) => {
      const blank = blankToUndefined(value);
      if (typeof blank !== "string") {
        return blank;
      }
      const canonical = values.find(
        (candidate) => candidate.toLowerCase() === blank.trim().toLowerCase()
      );
      return canonical ?? blank;
    },
    z
      .enum(values, {
        errorMap: (_issue, ctx) => ({
          message: `Unknown ${what} '${String(ctx.data)}'. Expected one of: ${values.join(", ")}`,
        }),
      })
      .optional()
  );
}

const booleanField = z.preprocess(
  (value) => {
    const blank = blankToUndefined(value);
    return typeof blank === "string" ? blank.trim().toLowerCase() : blank;
  },
  z
    .enum(["true", "false"], {
      errorMap: () => ({ message: "Expected true or false" }),
    })
    .transform((value) => value === "true")
    .optional()
);

const integerField = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .regex(/^\d+$/, "Expected a non-negative integer")
    .transform(Number)
    .optional()
);

const regexField = z.preprocess(
  blankToUndefined,
  z
    .string()
    .refine(
      (pattern) => {
        try {
          new RegExp(pattern);
          return true;
        } catch {
          return false;
        }
      },
      { message: "Invalid regular expression" }
    )
    .optional()
);

const versionField = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .refine((text) => parseSemVer(text) !== null, {
      message: "Expected a version such as 1.2.3 or 2.0",
    })
    .optional()
);

/** Label templates keep "" as an explicit "no pre-release label" */
const labelField = z.preprocess(
  (value) => (value === null ? "" : value),
  z.string().optional()
);

// ============================================================================
// Document Schemas
// ============================================================================

const incrementField = token(INCREMENT_STRATEGIES, "increment");
const modeField = token(VERSIONING_MODES, "mode");
const commitMessageModeField = token(
  COMMIT_MESSAGE_INCREMENT_MODES,
  "commit-message-incrementing value"
);
const assemblySchemeField = token(
  ASSEMBLY_VERSIONING_SCHEMES,
  "assembly versioning scheme"
);

const branchFieldShape = {
  tag: labelField,
  "tag-prefix": regexField,
  increment: incrementField,
  mode: modeField,
  "commit-message-incrementing": commitMessageModeField,
  "prevent-increment-of-merged-branch-version": booleanField,
  "pre-release-weight": integerField,
};

export const BranchRuleDocumentSchema: z.ZodType<
  BranchRuleDocument,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    regex: regexField,
    ...branchFieldShape,
  })
  .strict()
  .transform((raw) => ({
    regex: raw.regex,
    tag: raw.tag,
    tagPrefix: raw["tag-prefix"],
    increment: raw.increment,
    mode: raw.mode,
    commitMessageIncrementing: raw["commit-message-incrementing"],
    preventIncrementOfMergedBranchVersion:
      raw["prevent-increment-of-merged-branch-version"],
    preReleaseWeight: raw["pre-release-weight"],
  }));

export const ConfigDocumentSchema: z.ZodType<
  ConfigDocument,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    "next-version": versionField,
    "major-version-bump-message": regexField,
    "minor-version-bump-message": regexField,
    "patch-version-bump-message": regexField,
    "no-bump-message": regexField,
    "assembly-versioning-scheme": assemblySchemeField,
    "assembly-file-versioning-scheme": assemblySchemeField,
    "no-cache": booleanField,
    "no-normalize": booleanField,
    branches: z.preprocess(
      blankToUndefined,
      z.record(BranchRuleDocumentSchema).optional()
    ),
    ...branchFieldShape,
  })
  .strict()
  .transform((raw) => ({
    tagPrefix: raw["tag-prefix"],
    nextVersion: raw["next-version"],
    tag: raw.tag,
    increment: raw.increment,
    mode: raw.mode,
    commitMessageIncrementing: raw["commit-message-incrementing"],
    majorVersionBumpMessage: raw["major-version-bump-message"],
    minorVersionBumpMessage: raw["minor-version-bump-message"],
    patchVersionBumpMessage: raw["patch-version-bump-message"],
    noBumpMessage: raw["no-bump-message"],
    preventIncrementOfMergedBranchVersion:
      raw["prevent-increment-of-merged-branch-version"],
    preReleaseWeight: raw["pre-release-weight"],
    assemblyVersioningScheme: raw["assembly-versioning-scheme"],
    assemblyFileVersioningScheme: raw["assembly-file-versioning-scheme"],
    noCache: raw["no-cache"],
    noNormalize: raw["no-normalize"],
    branches: raw.branches,
  }));

/**
 * Format zod issues as "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
