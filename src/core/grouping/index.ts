/**
 * Clause Grouping Module
 *
 * @module
 */

export * from "./clause-grouper.js";
