/**
 * @conductor/shared
 *
 * Shared utilities for conductor packages
 */

export * from "./logger/index.js";
export * from "./paths.js";

export const sharedVersion = "0.1.0";
