/**
 * Version derivation exports.
 */

export * from "./view.js";
export * from "./strategies.js";
export * from "./locator.js";
export * from "./increment.js";
