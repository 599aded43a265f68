/**
 * Extraction configuration loading.
 *
 * Configuration comes from an optional JSON file, then explicit overrides
 * (usually CLI flags) replace individual keys. The merged object is validated
 * once with the zod schema, which also fills in defaults.
 *
 * @module
 */

import { ConfigurationError } from "./errors.js";
import { createLogger } from "../utils/logger.js";
import { fileExistsSync } from "../utils/fs.js";
import { getConfigPath, readJson } from "../utils/index.js";
import {
  ExtractionConfigSchema,
  formatZodError,
  safeValidate,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from "../utils/validation.js";

const logger = createLogger("config");

export interface LoadConfigOptions {
  /** Explicit config file; it must exist */
  configPath?: string;
  /** Directory searched for the default config file */
  cwd?: string;
  /** Values that win over the file; undefined entries are ignored */
  overrides?: { [K in keyof ExtractionConfigInput]?: ExtractionConfigInput[K] | undefined };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a raw configuration object and applies defaults.
 *
 * @throws ConfigurationError listing each issue as `path: message`
 */
export function resolveConfig(input: unknown): ExtractionConfig {
  const result = safeValidate(ExtractionConfigSchema, input);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Loads the configuration file (if any), applies overrides and validates.
 *
 * @throws ConfigurationError when the file is missing, unreadable or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): ExtractionConfig {
  const filePath = options.configPath ?? getConfigPath(options.cwd);
  let fromFile: Record<string, unknown> = {};

  if (options.configPath !== undefined || fileExistsSync(filePath)) {
    if (!fileExistsSync(filePath)) {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = readJson(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Cannot read configuration file ${filePath}: ${message}`, [message]);
    }
    if (!isPlainObject(raw)) {
      throw new ConfigurationError(`Configuration file ${filePath} must contain a JSON object`);
    }
    fromFile = raw;
    logger.debug({ filePath }, "Loaded configuration file");
  }

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  );

  return resolveConfig({ ...fromFile, ...overrides });
}
