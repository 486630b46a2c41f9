/**
 * Git module exports.
 */

export * from "./inspector.js";
export * from "./parser.js";
export * from "./git-inspector.js";
export * from "./locate.js";
