/**
 * Shared types for pipeline runs and their results.
 */

export * from "./pipeline.js";
export * from "./result.js";
