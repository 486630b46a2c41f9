/**
 * branchver library exports.
 *
 * This module exports the core types and functions for programmatic use.
 */

// Core types
export * from "./core/index.js";

// Configuration
export * from "./config/index.js";

// Git access
export * from "./git/index.js";

// Version derivation
export * from "./versioning/index.js";

// Cache
export * from "./cache/index.js";

// Entry point
export { computeVersion } from "./calculator.js";
export type { ComputeVersionOptions, RepositoryInfo } from "./calculator.js";
export { parseOverrides, renderVariables } from "./commands/version/index.js";
