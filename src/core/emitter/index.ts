/**
 * Emitter Module
 *
 * @module
 */

export * from "./jsonl-emitter.js";
export * from "./sinks.js";
