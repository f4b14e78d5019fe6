/**
 * Shared utility functions
 */

export * from "./hex.js";
export * from "./logger.js";
