/**
 * Version cache module.
 */

export * from "./hash.js";
export * from "./key.js";
export * from "./paths.js";
export * from "./serializer.js";
export * from "./storage.js";
export * from "./store.js";
export * from "./types.js";
