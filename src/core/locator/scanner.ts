/**
 * Source Unit Locator
 *
 * Discovers the Erlang source files of a checkout and filters out files that
 * are too large to process.
 *
 * @module
 */

import * as path from "node:path";
import type { SkippedFile } from "../../types/index.js";
import { mapConcurrent } from "../../utils/async.js";
import { fileExists, findFiles, getFileStats, getRelativePath } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { DEFAULT_EXCLUDE_PATTERNS } from "../../utils/validation.js";
import { FileSystemError } from "../errors.js";

const logger = createLogger("locator");

// =============================================================================
// Types
// =============================================================================

/**
 * A discovered source file
 */
export interface LocatedFile {
  /** Absolute path to the file */
  absolutePath: string;
  /** Path relative to the checkout root */
  relativePath: string;
  /** File extension (e.g., ".erl") */
  extension: string;
  /** File size in bytes */
  size: number;
}

/**
 * Locate result with statistics
 */
export interface LocateResult {
  /** Files to process, sorted by path */
  files: LocatedFile[];
  /** Files left out, sorted by path */
  skipped: SkippedFile[];
  /** Number of files found before filtering */
  totalFiles: number;
  /** Total size of the files to process in bytes */
  totalSize: number;
  /** Time taken to scan in milliseconds */
  scanTimeMs: number;
}

/**
 * Options for locating files
 */
export interface LocatorOptions {
  /** Extensions to include, with the leading dot (default: [".erl"]) */
  extensions?: readonly string[];
  /** Glob patterns to exclude */
  excludePatterns?: readonly string[];
  /** Larger files are skipped (default: 1 MiB) */
  maxFileSizeBytes?: number;
  /** Maximum number of concurrent stat calls (default: 16) */
  concurrency?: number;
}

// =============================================================================
// Source Unit Locator
// =============================================================================

/**
 * Finds the source files under a checkout root.
 *
 * @example
 * ```typescript
 * const locator = new SourceUnitLocator("/work/repo", { maxFileSizeBytes: 512 * 1024 });
 * const { files, skipped } = await locator.locate();
 * console.log(`${files.length} files, ${skipped.length} skipped`);
 * ```
 */
export class SourceUnitLocator {
  private readonly rootPath: string;
  private readonly options: Required<LocatorOptions>;

  constructor(rootPath: string, options: LocatorOptions = {}) {
    this.rootPath = path.resolve(rootPath);
    this.options = {
      extensions: options.extensions ?? [".erl"],
      excludePatterns: options.excludePatterns ?? DEFAULT_EXCLUDE_PATTERNS,
      maxFileSizeBytes: options.maxFileSizeBytes ?? 1024 * 1024,
      concurrency: options.concurrency ?? 16,
    };
  }

  /**
   * @throws FileSystemError if the root does not exist
   */
  async locate(): Promise<LocateResult> {
    const startTime = Date.now();

    if (!(await fileExists(this.rootPath))) {
      throw new FileSystemError(`Source root does not exist: ${this.rootPath}`, {
        rootPath: this.rootPath,
      });
    }

    const patterns = this.options.extensions.map((ext) => `**/*${ext}`);
    const filePaths = await findFiles({
      patterns,
      ignore: [...this.options.excludePatterns],
      cwd: this.rootPath,
      absolute: true,
    });

    const stats = await mapConcurrent(filePaths, (filePath) => getFileStats(filePath), this.options.concurrency);

    const files: LocatedFile[] = [];
    const skipped: SkippedFile[] = [];
    let totalSize = 0;

    for (const stat of stats) {
      const relativePath = getRelativePath(stat.path, this.rootPath);
      if (stat.size > this.options.maxFileSizeBytes) {
        skipped.push({ path: stat.path, relativePath, size: stat.size, reason: "too-large" });
        logger.info(
          { file: relativePath, size: stat.size, limit: this.options.maxFileSizeBytes },
          "Skipping oversized file"
        );
        continue;
      }
      files.push({ absolutePath: stat.path, relativePath, extension: stat.extension, size: stat.size });
      totalSize += stat.size;
    }

    const scanTimeMs = Date.now() - startTime;
    logger.debug({ files: files.length, skipped: skipped.length, scanTimeMs }, "Locate complete");

    return { files, skipped, totalFiles: filePaths.length, totalSize, scanTimeMs };
  }
}
