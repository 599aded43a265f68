/**
 * Shared types for the corpus extractor
 */

// =============================================================================
// Source Files
// =============================================================================

/**
 * One source file of the checkout. Immutable once read.
 */
export interface SourceFile {
  /** Absolute file path */
  path: string;
  /** Path relative to the checkout root, with forward slashes */
  relativePath: string;
  /** Raw file content */
  content: string;
  /** Module name from `-module`, or the file's base name */
  module: string;
}

/**
 * Why a discovered file was not processed
 */
export type SkipReason = "too-large";

/**
 * A file the locator found but left out
 */
export interface SkippedFile {
  path: string;
  relativePath: string;
  size: number;
  reason: SkipReason;
}
