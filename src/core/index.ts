/**
 * Core module - everything the CLI builds an extraction run from
 */

// Re-export error classes
export * from "./errors.js";
export * from "./config.js";

// Re-export all core modules
export * from "./parser/index.js";
export * from "./grouping/index.js";
export * from "./analysis/data-flow/index.js";
export * from "./assembler/index.js";
export * from "./emitter/index.js";
export * from "./locator/index.js";
export * from "./pipeline/index.js";
export type * from "./interfaces/index.js";

// Re-export types
export type * from "../types/index.js";
