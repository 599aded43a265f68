/**
 * Source Unit Locator Module
 *
 * @module
 */

export * from "./scanner.js";
