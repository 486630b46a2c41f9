/**
 * Version command implementation.
 *
 * Turns CLI options into a computeVersion call and renders the result.
 */

import { computeVersion } from "../../calculator.js";
import { parseConfigObject } from "../../config/loader.js";
import type { ConfigDocument } from "../../config/types.js";
import { BranchverError } from "../../core/errors.js";
import type { VersionVariables } from "../../core/types.js";

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = "json" | "text";

export interface VersionCommandOptions {
  path: string;
  /** commander's --no-cache sets this to false */
  cache: boolean;
  url?: string;
  branch?: string;
  override: string[];
  showVariable?: string;
  output: OutputFormat;
  timeout?: number;
}

// ============================================================================
// Overrides
// ============================================================================

type OverrideTree = { [key: string]: string | OverrideTree };

function setPath(tree: OverrideTree, path: string[], value: string, pair: string): void {
  const [head, ...rest] = path;
  if (rest.length === 0) {
    tree[head] = value;
    return;
  }
  const existing = tree[head];
  if (typeof existing === "string") {
    throw new BranchverError(`Override '${pair}' conflicts with an earlier value for ${head}`);
  }
  const child: OverrideTree = existing ?? {};
  tree[head] = child;
  setPath(child, rest, value, pair);
}

/**
 * Parse "key=value" pairs into a configuration document. Keys use the
 * configuration file's kebab-case names; dots address nested sections, as
 * in "branches.main.tag=rc".
 */
export function parseOverrides(pairs: readonly string[]): ConfigDocument | undefined {
  if (pairs.length === 0) {
    return undefined;
  }

  const tree: OverrideTree = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    const key = separator === -1 ? "" : pair.slice(0, separator).trim();
    if (!key) {
      throw new BranchverError(`Invalid override '${pair}'. Expected key=value`);
    }
    const path = key.split(".");
    if (path.some((segment) => segment === "")) {
      throw new BranchverError(`Invalid override key '${key}'`);
    }
    setPath(tree, path, pair.slice(separator + 1), pair);
  }

  return parseConfigObject(tree, "override configuration");
}

// ============================================================================
// Rendering
// ============================================================================

function formatValue(value: string | number | undefined): string {
  return value === undefined ? "" : String(value);
}

function isVariableName(name: string, variables: VersionVariables): name is keyof VersionVariables {
  return Object.prototype.hasOwnProperty.call(variables, name);
}

/**
 * Render variables for output. A single variable prints its bare value.
 */
export function renderVariables(
  variables: VersionVariables,
  format: OutputFormat,
  showVariable?: string
): string {
  if (showVariable) {
    const match = Object.keys(variables).find(
      (name) => name.toLowerCase() === showVariable.toLowerCase()
    );
    if (!match || !isVariableName(match, variables)) {
      throw new BranchverError(
        `Unknown variable '${showVariable}'. Available: ${Object.keys(variables).join(", ")}`
      );
    }
    return formatValue(variables[match]);
  }

  if (format === "text") {
    return Object.entries(variables)
      .map(([name, value]) => `${name}: ${formatValue(value)}`)
      .join("\n");
  }

  return JSON.stringify(variables, null, 2);
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Execute the version command and return the text to print.
 */
export async function executeVersion(options: VersionCommandOptions): Promise<string> {
  const variables = await computeVersion({
    workingDirectory: options.path,
    overrideConfig: parseOverrides(options.override),
    noCache: !options.cache,
    repositoryInfo: {
      targetUrl: options.url,
      targetBranch: options.branch,
    },
    timeoutMs: options.timeout,
  });

  return renderVariables(variables, options.output, options.showVariable);
}
