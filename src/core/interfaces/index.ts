/**
 * Core Interfaces Module
 *
 * Contracts between the pipeline stages. These interfaces enable:
 * - Testability via in-memory implementations
 * - Replaceability of concrete implementations
 *
 * @module
 */

// Parser interface
export type { IParser, ParsedSourceFile } from "./IParser.js";

// Output sink interface
export type { IRecordSink } from "./IRecordSink.js";

// Documentation lookup interface
export type { IDocumentationProvider } from "./IDocumentationProvider.js";
