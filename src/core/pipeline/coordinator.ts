/**
 * Extraction Coordinator
 *
 * Orchestrates the full pipeline: Locate → Parse → Group → Analyze →
 * Assemble → Emit. Files run concurrently, each under its own timeout; their
 * records are emitted in file order, so output does not depend on
 * scheduling.
 *
 * @module
 */

import * as path from "node:path";
import type { IDocumentationProvider } from "../interfaces/IDocumentationProvider.js";
import type { IParser } from "../interfaces/IParser.js";
import type { IRecordSink } from "../interfaces/IRecordSink.js";
import { JsonlEmitter } from "../emitter/jsonl-emitter.js";
import {
  FileTimeoutError,
  SinkWriteError,
  isCorpusError,
  wrapError,
  type CorpusError,
} from "../errors.js";
import { SourceUnitLocator, type LocatedFile } from "../locator/scanner.js";
import { ErlangSourceParser } from "../parser/index.js";
import { FileProcessor } from "./file-processor.js";
import { RunSummaryCollector, type RunSummary } from "./run-summary.js";
import { CancellationTokenSource, Mutex, mapConcurrent, timeout } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { ExtractionConfig, TrainingRecord } from "../../utils/validation.js";

const logger = createLogger("coordinator");

// =============================================================================
// Types
// =============================================================================

/**
 * Extraction phases
 */
export type ExtractionPhase = "locating" | "processing" | "complete";

/**
 * Progress event for extraction
 */
export interface ExtractionProgressEvent {
  phase: ExtractionPhase;
  /** File just finished (if applicable) */
  currentFile?: string;
  processed: number;
  total: number;
  /** Overall percentage complete (0-100) */
  percentage: number;
  message: string;
}

/**
 * A file-level or group-level error reported while the run continues
 */
export interface ExtractionError {
  filePath: string;
  error: CorpusError;
}

export interface ExtractionCoordinatorOptions {
  /** Checkout root */
  rootPath: string;
  config: ExtractionConfig;
  sink: IRecordSink;
  documentation?: IDocumentationProvider;
  /** Defaults to an Erlang parser over `config.extensions`; its extensions decide which files are located */
  parser?: IParser;
  onProgress?: (event: ExtractionProgressEvent) => void;
  onError?: (error: ExtractionError) => void;
}

// =============================================================================
// Extraction Coordinator
// =============================================================================

/**
 * @example
 * ```typescript
 * const coordinator = new ExtractionCoordinator({
 *   rootPath: "/work/repo",
 *   config: resolveConfig({}),
 *   sink: new FileSink("out/corpus.jsonl"),
 *   onProgress: (event) => console.log(`${event.phase}: ${event.percentage}%`),
 * });
 * const summary = await coordinator.run();
 * ```
 */
export class ExtractionCoordinator {
  private readonly rootPath: string;
  private readonly config: ExtractionConfig;
  private readonly processor: FileProcessor;
  private readonly parser: IParser;
  private readonly emitter: JsonlEmitter;
  private readonly options: ExtractionCoordinatorOptions;

  constructor(options: ExtractionCoordinatorOptions) {
    this.options = options;
    this.rootPath = path.resolve(options.rootPath);
    this.config = options.config;
    this.emitter = new JsonlEmitter(options.sink);
    this.parser = options.parser ?? new ErlangSourceParser(options.config.extensions);
    this.processor = new FileProcessor({
      config: options.config,
      rootPath: this.rootPath,
      parser: this.parser,
      documentation: options.documentation,
    });
  }

  /**
   * Runs the extraction. File and group errors are isolated; only a sink
   * failure (or the first error under `failFast`) stops the run early.
   *
   * @throws FileSystemError if the root cannot be scanned
   */
  async run(): Promise<RunSummary> {
    const summary = new RunSummaryCollector();

    this.emitProgress("locating", 0, 0, "Discovering files...");
    const located = await new SourceUnitLocator(this.rootPath, {
      extensions: this.parser.extensions,
      excludePatterns: this.config.excludePatterns,
      maxFileSizeBytes: this.config.maxFileSizeBytes,
    }).locate();

    summary.setScanned(located.totalFiles);
    summary.addSkipped(located.skipped);
    logger.info(
      { root: this.rootPath, files: located.files.length, skipped: located.skipped.length },
      "Locating complete"
    );

    const files = located.files;
    const ordered = new OrderedRecordWriter(this.emitter, summary);
    let processed = 0;

    await mapConcurrent(
      files,
      async (file, index) => {
        if (summary.aborted) return;

        const records = await this.processFile(file, summary);
        await ordered.complete(index, records);

        processed++;
        this.emitProgress(
          "processing",
          processed,
          files.length,
          `Processed ${file.relativePath}`,
          file.relativePath
        );
      },
      this.config.concurrency
    );

    await ordered.flushRemaining();

    const result = summary.toJSON();
    this.emitProgress("complete", processed, files.length, "Extraction complete");
    logger.info(
      {
        records: result.recordsEmitted,
        processed: result.files.processed,
        failed: result.files.failed,
        skipped: result.files.skipped,
        aborted: result.aborted,
      },
      "Extraction complete"
    );
    return result;
  }

  /**
   * Processes one file under the timeout and records its outcome. Returns the
   * records to emit (none when the file failed).
   */
  private async processFile(file: LocatedFile, summary: RunSummaryCollector): Promise<TrainingRecord[]> {
    const cancellation = new CancellationTokenSource();
    const timeoutMs = this.config.fileTimeoutMs;

    try {
      const outcome = await timeout(this.processor.process(file, cancellation.token), timeoutMs, () => {
        cancellation.cancel(`Timed out after ${timeoutMs}ms`);
        return new FileTimeoutError(`Processing ${file.relativePath} exceeded ${timeoutMs}ms`, {
          filePath: file.relativePath,
          timeoutMs,
        });
      });

      summary.addProcessedFile(outcome.records.length, outcome.groupErrors.length);
      for (const error of outcome.groupErrors) {
        summary.addError(error, file.relativePath);
        this.options.onError?.({ filePath: file.relativePath, error });
      }
      for (const error of outcome.scopeErrors) {
        summary.addError(error, file.relativePath);
      }

      if (this.config.failFast && outcome.groupErrors.length > 0) {
        summary.abort(`fail-fast: group error in ${file.relativePath}`);
      }
      return outcome.records;
    } catch (error) {
      const corpusError = isCorpusError(error) ? error : wrapError(error, `Failed to process ${file.relativePath}`);
      logger.error(
        { file: file.relativePath, code: corpusError.code, err: corpusError.message },
        "File failed"
      );
      summary.addFailedFile(corpusError, file.relativePath);
      this.options.onError?.({ filePath: file.relativePath, error: corpusError });

      if (this.config.failFast) {
        summary.abort(`fail-fast: ${corpusError.kind} in ${file.relativePath}`);
      }
      return [];
    }
  }

  private emitProgress(
    phase: ExtractionPhase,
    processed: number,
    total: number,
    message: string,
    currentFile?: string
  ): void {
    const percentage = phase === "complete" ? 100 : total === 0 ? 0 : Math.round((processed / total) * 100);
    this.options.onProgress?.({ phase, processed, total, percentage, message, currentFile });
  }
}

// =============================================================================
// Ordered emission
// =============================================================================

/**
 * Buffers per-file records and writes them in file order as soon as every
 * earlier file has completed.
 */
class OrderedRecordWriter {
  private readonly pending = new Map<number, TrainingRecord[]>();
  private readonly mutex = new Mutex();
  private next = 0;
  private failed = false;

  constructor(
    private readonly emitter: JsonlEmitter,
    private readonly summary: RunSummaryCollector
  ) {}

  async complete(index: number, records: TrainingRecord[]): Promise<void> {
    this.pending.set(index, records);
    await this.mutex.runExclusive(async () => {
      let ready = this.pending.get(this.next);
      while (ready !== undefined) {
        this.pending.delete(this.next);
        this.next++;
        await this.write(ready);
        ready = this.pending.get(this.next);
      }
    });
  }

  /** Writes what is left after scheduling stopped, skipping files never run */
  async flushRemaining(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const indices = [...this.pending.keys()].sort((a, b) => a - b);
      for (const index of indices) {
        const records = this.pending.get(index) ?? [];
        this.pending.delete(index);
        await this.write(records);
      }
    });
  }

  private async write(records: TrainingRecord[]): Promise<void> {
    if (this.failed || records.length === 0) return;
    try {
      await this.emitter.emitAll(records);
      this.summary.addRecords(records.length);
    } catch (error) {
      if (!(error instanceof SinkWriteError)) throw error;
      this.failed = true;
      logger.fatal({ code: error.code, err: error.message }, "Output sink failed, stopping run");
      this.summary.addError(error);
      this.summary.abort(error.message);
    }
  }
}
