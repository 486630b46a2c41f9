/**
 * Core module exports.
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./semver.js";
export * from "./branch.js";
export * from "./variables.js";
export * from "./version.js";
