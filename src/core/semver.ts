/**
 * Semantic version value helpers: parsing, formatting, ordering and
 * increments.
 */

import * as semver from "semver";
import type { SemVer, VersionField } from "./types.js";

/**
 * Short forms accepted in tags and next-version ("2", "2.1", "2.1-beta4").
 */
const PARTIAL_VERSION_PATTERN =
  /^(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z.-]+))?(?:\+([0-9A-Za-z.-]+))?$/;

/**
 * Splits "beta.4" / "beta4" / "beta" into label and trailing number.
 */
const PRE_RELEASE_PATTERN = /^(.*?)\.?(\d+)?$/;

function splitPreRelease(
  preRelease: string
): Pick<SemVer, "preReleaseLabel" | "preReleaseNumber"> {
  const match = PRE_RELEASE_PATTERN.exec(preRelease);
  if (!match) {
    return { preReleaseLabel: preRelease };
  }
  const [, label = "", number] = match;
  if (number === undefined) {
    return { preReleaseLabel: label };
  }
  return { preReleaseLabel: label, preReleaseNumber: Number(number) };
}

/**
 * Parse a version string. Returns null when the text is not a version.
 */
export function parseSemVer(text: string): SemVer | null {
  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }

  const full = semver.parse(trimmed);
  if (full) {
    const preRelease = full.prerelease.join(".");
    const build = full.build.join(".");
    return {
      major: full.major,
      minor: full.minor,
      patch: full.patch,
      ...(preRelease ? splitPreRelease(preRelease) : {}),
      ...(build ? { buildMetadata: build } : {}),
    };
  }

  const match = PARTIAL_VERSION_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, major, minor, patch, preRelease, build] = match;
  return {
    major: Number(major),
    minor: Number(minor ?? 0),
    patch: Number(patch ?? 0),
    ...(preRelease ? splitPreRelease(preRelease) : {}),
    ...(build ? { buildMetadata: build } : {}),
  };
}

/**
 * Whether the version carries a pre-release tag.
 */
export function hasPreRelease(version: SemVer): boolean {
  return version.preReleaseLabel !== undefined;
}

export function formatMajorMinorPatch(version: SemVer): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Format the pre-release tag ("beta.4"), or "" when there is none.
 */
export function formatPreReleaseTag(version: SemVer): string {
  if (!hasPreRelease(version)) {
    return "";
  }
  const label = version.preReleaseLabel ?? "";
  if (version.preReleaseNumber === undefined) {
    return label;
  }
  return label ? `${label}.${version.preReleaseNumber}` : `${version.preReleaseNumber}`;
}

export function formatSemVer(version: SemVer): string {
  const tag = formatPreReleaseTag(version);
  const build = version.buildMetadata ? `+${version.buildMetadata}` : "";
  return `${formatMajorMinorPatch(version)}${tag ? `-${tag}` : ""}${build}`;
}

/**
 * Total order over versions. Build metadata does not participate.
 */
export function compareSemVer(a: SemVer, b: SemVer): number {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  if (a.patch !== b.patch) return a.patch < b.patch ? -1 : 1;

  const aPre = hasPreRelease(a);
  const bPre = hasPreRelease(b);
  if (aPre !== bPre) {
    // A release outranks any pre-release of the same triple
    return aPre ? -1 : 1;
  }
  if (!aPre) return 0;

  const aLabel = a.preReleaseLabel ?? "";
  const bLabel = b.preReleaseLabel ?? "";
  if (aLabel !== bLabel) return aLabel < bLabel ? -1 : 1;

  if (a.preReleaseNumber === b.preReleaseNumber) return 0;
  if (a.preReleaseNumber === undefined) return -1;
  if (b.preReleaseNumber === undefined) return 1;
  return a.preReleaseNumber < b.preReleaseNumber ? -1 : 1;
}

/**
 * Apply an increment to a base version. Pre-release and build metadata are
 * dropped; the caller decorates the result.
 *
 * A pre-release base already names the upcoming release, so its triple is
 * kept whatever the increment.
 */
export function incrementSemVer(base: SemVer, field: VersionField): SemVer {
  const triple = { major: base.major, minor: base.minor, patch: base.patch };

  if (hasPreRelease(base)) {
    return triple;
  }

  switch (field) {
    case "Major":
      return { major: triple.major + 1, minor: 0, patch: 0 };
    case "Minor":
      return { major: triple.major, minor: triple.minor + 1, patch: 0 };
    case "Patch":
      return { ...triple, patch: triple.patch + 1 };
    case "None":
      return triple;
  }
}
