/**
 * Run summary: what an extraction run produced and what went wrong.
 *
 * @module
 */

import type { CorpusError, ErrorKind } from "../errors.js";
import type { SkippedFile } from "../../types/index.js";

/** Samples kept per error kind */
export const MAX_ERROR_SAMPLES = 5;

export interface ErrorSample {
  code: string;
  message: string;
  filePath?: string;
  line?: number;
  column?: number;
}

export interface ErrorKindSummary {
  count: number;
  samples: ErrorSample[];
}

export interface RunSummary {
  recordsEmitted: number;
  groups: {
    /** Groups turned into records */
    emitted: number;
    /** Groups dropped by a group-level error */
    skipped: number;
  };
  files: {
    scanned: number;
    processed: number;
    skipped: number;
    failed: number;
  };
  skippedFiles: Array<Pick<SkippedFile, "relativePath" | "size" | "reason">>;
  errors: Partial<Record<ErrorKind, ErrorKindSummary>>;
  aborted: boolean;
  abortReason?: string;
  durationMs: number;
}

function numberOrUndefined(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Accumulates counts during a run.
 */
export class RunSummaryCollector {
  private readonly startTime = Date.now();
  private recordsEmitted = 0;
  private groupsEmitted = 0;
  private groupsSkipped = 0;
  private filesScanned = 0;
  private filesProcessed = 0;
  private filesFailed = 0;
  private readonly skippedFiles: SkippedFile[] = [];
  private readonly errors: Partial<Record<ErrorKind, ErrorKindSummary>> = {};
  private abortReason: string | null = null;

  setScanned(count: number): void {
    this.filesScanned = count;
  }

  addSkipped(files: readonly SkippedFile[]): void {
    this.skippedFiles.push(...files);
  }

  addProcessedFile(groupsEmitted: number, groupsSkipped: number): void {
    this.filesProcessed++;
    this.groupsEmitted += groupsEmitted;
    this.groupsSkipped += groupsSkipped;
  }

  addFailedFile(error: CorpusError, filePath: string): void {
    this.filesFailed++;
    this.addError(error, filePath);
  }

  addRecords(count: number): void {
    this.recordsEmitted += count;
  }

  addError(error: CorpusError, filePath?: string): void {
    const summary = (this.errors[error.kind] ??= { count: 0, samples: [] });
    summary.count++;
    if (summary.samples.length < MAX_ERROR_SAMPLES) {
      summary.samples.push({
        code: error.code,
        message: error.message,
        filePath,
        line: numberOrUndefined(error.context?.line),
        column: numberOrUndefined(error.context?.column),
      });
    }
  }

  abort(reason: string): void {
    this.abortReason ??= reason;
  }

  get aborted(): boolean {
    return this.abortReason !== null;
  }

  toJSON(): RunSummary {
    const summary: RunSummary = {
      recordsEmitted: this.recordsEmitted,
      groups: { emitted: this.groupsEmitted, skipped: this.groupsSkipped },
      files: {
        scanned: this.filesScanned,
        processed: this.filesProcessed,
        skipped: this.skippedFiles.length,
        failed: this.filesFailed,
      },
      skippedFiles: this.skippedFiles.map(({ relativePath, size, reason }) => ({ relativePath, size, reason })),
      errors: this.errors,
      aborted: this.aborted,
      durationMs: Date.now() - this.startTime,
    };
    if (this.abortReason !== null) {
      summary.abortReason = this.abortReason;
    }
    return summary;
  }
}

/**
 * Total number of errors of the given kinds (all kinds when omitted).
 */
export function countErrors(summary: RunSummary, kinds?: readonly ErrorKind[]): number {
  return Object.entries(summary.errors).reduce((total, [kind, entry]) => {
    if (kinds && !kinds.some((k) => k === kind)) return total;
    return total + (entry?.count ?? 0);
  }, 0);
}
