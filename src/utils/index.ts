/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// Re-export async utilities
export * from "./async.js";

// Re-export validation schemas
export * from "./validation.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_FILE = "erlang-dfg.config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_FILE);
}

// =============================================================================
// JSON Files
// =============================================================================

/**
 * Reads and parses a JSON file. The value is unchecked; validate it before use.
 *
 * @throws SyntaxError if the file is not valid JSON
 */
export function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, "utf-8");
  return JSON.parse(content);
}

export function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
