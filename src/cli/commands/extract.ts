/**
 * extract command - Build a training corpus from a checkout
 */

import * as path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { InvalidArgumentError } from "commander";
import { ConfigurationError } from "../../core/errors.js";
import { loadConfig, type LoadConfigOptions } from "../../core/config.js";
import { EmptyDocumentationProvider, JsonDocumentationProvider } from "../../core/assembler/documentation.js";
import { FileSink } from "../../core/emitter/sinks.js";
import type { IDocumentationProvider } from "../../core/interfaces/IDocumentationProvider.js";
import {
  ExtractionCoordinator,
  type ExtractionProgressEvent,
} from "../../core/pipeline/coordinator.js";
import { countErrors, type RunSummary } from "../../core/pipeline/run-summary.js";
import { createLogger, writeJson } from "../../utils/index.js";
import type { ExtractionConfig } from "../../utils/validation.js";

const logger = createLogger("extract");

export interface ExtractOptions {
  output: string;
  append?: boolean;
  config?: string;
  docs?: string;
  stats?: string;
  concurrency?: number;
  maxFileSize?: number;
  fileTimeout?: number;
  approximate?: boolean;
  failFast?: boolean;
  ext?: string[];
  exclude?: string[];
  repoName?: string;
  repoUrl?: string;
  repoRef?: string;
}

/**
 * Option parser for integer flags.
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

/**
 * Maps CLI flags onto configuration keys. Flags that were not given stay
 * undefined so the configuration file keeps its values.
 */
export function toConfigOverrides(options: ExtractOptions): NonNullable<LoadConfigOptions["overrides"]> {
  return {
    concurrency: options.concurrency,
    maxFileSizeBytes: options.maxFileSize,
    fileTimeoutMs: options.fileTimeout,
    includeApproximateEdges: options.approximate,
    failFast: options.failFast,
    extensions: options.ext,
    excludePatterns: options.exclude,
    repositoryName: options.repoName,
    repositoryUrl: options.repoUrl,
    repositoryRef: options.repoRef,
  };
}

/**
 * Format duration in human readable format
 */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
}

/**
 * Extract training records from every source file under `root`
 */
export async function extractCommand(root: string, options: ExtractOptions): Promise<void> {
  logger.info({ root, options }, "Starting extraction");

  let config: ExtractionConfig;
  let documentation: IDocumentationProvider;
  try {
    config = loadConfig({ configPath: options.config, overrides: toConfigOverrides(options) });
    documentation = options.docs
      ? JsonDocumentationProvider.fromFile(path.resolve(options.docs))
      : new EmptyDocumentationProvider();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.red(error.issues.length > 0 ? "Invalid configuration" : error.message));
      for (const issue of error.issues) {
        console.error(`  ${chalk.red("✗")} ${issue}`);
      }
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  console.log();
  console.log(chalk.cyan.bold("Extracting Corpus"));
  console.log(chalk.dim("─".repeat(40)));
  console.log();

  const sink = new FileSink(path.resolve(options.output), { truncate: !options.append });
  const spinner = ora("Discovering files...").start();

  let summary: RunSummary;
  try {
    const coordinator = new ExtractionCoordinator({
      rootPath: root,
      config,
      sink,
      documentation,
      onProgress: (event) => updateSpinner(spinner, event),
    });
    summary = await coordinator.run();
  } catch (error) {
    spinner.fail(chalk.red("Extraction failed"));
    logger.error({ err: error }, "Extraction failed");
    throw error;
  } finally {
    await sink.close();
  }

  if (summary.aborted) {
    spinner.fail(chalk.red(`Extraction aborted: ${summary.abortReason ?? "unknown reason"}`));
    process.exitCode = 1;
  } else if (countErrors(summary) > 0) {
    spinner.warn(chalk.yellow("Extraction completed with errors"));
  } else {
    spinner.succeed(chalk.green("Extraction complete!"));
  }

  printSummary(summary);

  if (options.stats) {
    writeJson(path.resolve(options.stats), summary);
    console.log(chalk.dim(`Summary written to ${options.stats}`));
  }

  logger.info({ summary }, "Extraction finished");
}

function printSummary(summary: RunSummary): void {
  console.log();
  console.log(chalk.white.bold("Results"));
  console.log(`  Records emitted:   ${summary.recordsEmitted}`);
  console.log(`  Groups skipped:    ${summary.groups.skipped}`);
  console.log(`  Files scanned:     ${summary.files.scanned}`);
  console.log(`  Files processed:   ${summary.files.processed}`);
  console.log(`  Files skipped:     ${summary.files.skipped}`);
  console.log(`  Files failed:      ${summary.files.failed}`);
  console.log(`  Duration:          ${formatDuration(summary.durationMs)}`);

  const kinds = Object.entries(summary.errors);
  if (kinds.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Errors (${countErrors(summary)})`));
    for (const [kind, entry] of kinds) {
      if (!entry) continue;
      console.log(`  ${chalk.white(kind)}: ${entry.count}`);
      for (const sample of entry.samples) {
        const location = sample.filePath
          ? `${sample.filePath}${sample.line !== undefined ? `:${sample.line}` : ""}`
          : "";
        console.log(`    ${chalk.red("✗")} ${location ? `${location} ` : ""}${chalk.dim(sample.message)}`);
      }
      if (entry.count > entry.samples.length) {
        console.log(chalk.dim(`    ... and ${entry.count - entry.samples.length} more`));
      }
    }
  }

  console.log();
  console.log(chalk.dim("─".repeat(40)));
}

/**
 * Update spinner text based on extraction progress
 */
function updateSpinner(spinner: ReturnType<typeof ora>, event: ExtractionProgressEvent): void {
  const progress = `${event.processed}/${event.total}`;
  const percent = `${event.percentage}%`;

  if (event.currentFile) {
    const shortFile = event.currentFile.length > 30
      ? "..." + event.currentFile.slice(-27)
      : event.currentFile;
    spinner.text = `${event.message} (${progress}, ${percent}) - ${shortFile}`;
  } else {
    spinner.text = `${event.message} (${progress}, ${percent})`;
  }
}
