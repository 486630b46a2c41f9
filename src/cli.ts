#!/usr/bin/env node
/**
 * branchver CLI entry point.
 */

import { Command, InvalidArgumentError } from "commander";
import { executeVersion, type OutputFormat } from "./commands/version/index.js";
import { BranchverError } from "./core/errors.js";
import { configureLogger, debug } from "./core/logger.js";
import { getToolVersion } from "./core/version.js";

type CliOptions = {
  cache: boolean;
  url?: string;
  branch?: string;
  override: string[];
  showVariable?: string;
  output: OutputFormat;
  timeout?: number;
  quiet: boolean;
  debug: boolean;
};

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number of milliseconds.");
  }
  return parsed;
}

function parseOutput(value: string): OutputFormat {
  if (value !== "json" && value !== "text") {
    throw new InvalidArgumentError("Expected json or text.");
  }
  return value;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Handle errors and exit with appropriate code.
 */
function handleError(error: unknown): never {
  if (error instanceof BranchverError) {
    console.error(`Error: ${error.message}`);
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    console.error(`Unexpected error: ${error.message}`);
    debug(error.stack ?? "");
  } else {
    console.error("An unexpected error occurred");
  }

  process.exit(1);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("branchver")
    .description("Calculate semantic version variables from git history")
    .version(await getToolVersion())
    .argument("[path]", "Directory inside the repository", process.cwd())
    .option("--no-cache", "Always recompute; never read or write the version cache")
    .option("--url <url>", "Repository identity to use in the cache key")
    .option("--branch <name>", "Branch to version instead of the checked-out one")
    .option(
      "--override <key=value>",
      "Override a configuration value (repeatable, e.g. next-version=2.0)",
      collect,
      []
    )
    .option("--show-variable <name>", "Print a single variable")
    .option("--output <format>", "Output format (json|text)", parseOutput, "json")
    .option("--timeout <ms>", "Timeout for each git command", parseTimeout)
    .option("-q, --quiet", "Suppress informational output", false)
    .option("--debug", "Print diagnostic output", false)
    .action(async (path: string) => {
      const options = program.opts<CliOptions>();
      configureLogger({ quiet: options.quiet, debug: options.debug });
      const output = await executeVersion({
        path,
        cache: options.cache,
        url: options.url,
        branch: options.branch,
        override: options.override,
        showVariable: options.showVariable,
        output: options.output,
        timeout: options.timeout,
      });
      console.log(output);
    });

  await program.parseAsync();
}

main().catch(handleError);
