/**
 * Logger Module
 * Structured logging using pino, written to stderr so stdout stays free for
 * command output
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "parser", "analyzer", "emitter")
 *
 * @example
 * ```typescript
 * const logger = createLogger("parser");
 * logger.info({ file: "gen_server.erl" }, "Parsing file");
 * logger.error({ err }, "Failed to parse file");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  // No transport thread under tests, so nothing outlives the run
  if (isDevelopment() && !isTest()) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      });
    } catch {
      // pino-pretty not installed
      return pino(baseOptions, pino.destination(2));
    }
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
