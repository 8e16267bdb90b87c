/**
 * Shared type foundations for the prompt pipeline.
 */

export * from "./module.js";
export * from "./pipeline.js";
