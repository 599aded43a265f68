/**
 * Record Assembly Module
 *
 * @module
 */

export * from "./record-assembler.js";
export * from "./documentation.js";
