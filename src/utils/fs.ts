/**
 * File System Utilities
 * File discovery and I/O helpers for corpus extraction
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * File statistics with useful metadata
 */
export interface FileStats {
  path: string;
  size: number;
  lastModified: Date;
  isDirectory: boolean;
  isFile: boolean;
  extension: string;
}

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
  onlyFiles?: boolean;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Read a file as text, UTF-8 by default
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

/**
 * Get detailed file statistics
 */
export async function getFileStats(filePath: string): Promise<FileStats> {
  const stats = await fsPromises.stat(filePath);
  return {
    path: filePath,
    size: stats.size,
    lastModified: stats.mtime,
    isDirectory: stats.isDirectory(),
    isFile: stats.isFile(),
    extension: path.extname(filePath).toLowerCase(),
  };
}

/**
 * Find files matching glob patterns
 *
 * @returns Matching file paths, sorted for deterministic ordering
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const {
    patterns,
    ignore = [],
    cwd = process.cwd(),
    absolute = true,
    onlyFiles = true,
  } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles,
    ignore: ["**/node_modules/**", "**/.git/**", ...ignore],
    dot: false,
  });

  return files.sort();
}

/**
 * Get the relative path from a root, always with forward slashes
 */
export function getRelativePath(filePath: string, root: string): string {
  return path.relative(root, filePath).replace(/\\/g, "/");
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Synchronous file exists check
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}
