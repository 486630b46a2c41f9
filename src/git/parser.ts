/**
 * Parsing of git plumbing output.
 */

import type { CommitInfo, TagRef } from "../core/types.js";

/** Field separator inside a log record */
export const FIELD_SEPARATOR = "\x1f";

/** Record terminator between log entries */
export const RECORD_SEPARATOR = "\x1e";

/**
 * `git log` format producing records readable by parseLogOutput.
 */
export const LOG_FORMAT = "--format=%H%x1f%P%x1f%cI%x1f%B%x1e";

/**
 * `git for-each-ref` format producing lines readable by parseTagRefs.
 * The peeled object (%(*objectname)) is set for annotated tags only.
 */
export const TAG_REF_FORMAT = "--format=%(refname)%09%(objectname)%09%(*objectname)";

/**
 * Parse `git log` output written with LOG_FORMAT.
 */
export function parseLogOutput(output: string): CommitInfo[] {
  const commits: CommitInfo[] = [];

  for (const record of output.split(RECORD_SEPARATOR)) {
    const trimmed = record.replace(/^\s+/, "");
    if (!trimmed) continue;

    const [id, parents = "", date = "", ...messageParts] = trimmed.split(FIELD_SEPARATOR);
    if (!id || !/^[0-9a-f]{7,64}$/.test(id)) continue;

    commits.push({
      id,
      parents: parents.split(" ").filter(Boolean),
      date,
      message: messageParts.join(FIELD_SEPARATOR).trimEnd(),
    });
  }

  return commits;
}

/**
 * Parse `git for-each-ref refs/tags` output written with TAG_REF_FORMAT.
 */
export function parseTagRefs(output: string): TagRef[] {
  const tags: TagRef[] = [];

  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const [ref = "", objectName = "", peeled = ""] = line.split("\t");
    if (!ref.startsWith("refs/tags/") || !objectName) continue;

    tags.push({
      name: ref.slice("refs/tags/".length),
      targetCommit: peeled || objectName,
    });
  }

  return tags;
}

/**
 * Take the oldest root from `git rev-list --max-parents=0` output.
 */
export function parseRootCommits(output: string): string | null {
  const roots = output.split("\n").map((line) => line.trim()).filter(Boolean);
  return roots.length > 0 ? roots[roots.length - 1] : null;
}
