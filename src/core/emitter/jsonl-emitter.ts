/**
 * JSON Lines Emitter
 *
 * Serializes records one per line onto an append-only sink. All writes go
 * through one mutex, so lines from concurrent callers never interleave.
 *
 * @module
 */

import type { IRecordSink } from "../interfaces/IRecordSink.js";
import { SinkWriteError } from "../errors.js";
import { Mutex } from "../../utils/async.js";
import type { TrainingRecord } from "../../utils/validation.js";

/**
 * Serializes a record as one JSON line (without the newline). Keys always
 * come in the order idx, url, docstring, code, code_tokens, dfg,
 * dfg_approximate.
 */
export function serializeRecord(record: TrainingRecord): string {
  const ordered: TrainingRecord = {
    idx: record.idx,
    url: record.url,
    docstring: record.docstring,
    code: record.code,
    code_tokens: record.code_tokens,
    dfg: record.dfg,
  };
  if (record.dfg_approximate !== undefined) {
    ordered.dfg_approximate = record.dfg_approximate;
  }
  return JSON.stringify(ordered);
}

export class JsonlEmitter {
  private readonly mutex = new Mutex();
  private written = 0;

  constructor(private readonly sink: IRecordSink) {}

  /** Records written so far */
  get count(): number {
    return this.written;
  }

  /**
   * @throws SinkWriteError if the sink rejects the write
   */
  async emit(record: TrainingRecord): Promise<void> {
    await this.emitAll([record]);
  }

  /**
   * Writes records back to back, with no other writer in between.
   *
   * @throws SinkWriteError if the sink rejects a write
   */
  async emitAll(records: readonly TrainingRecord[]): Promise<void> {
    if (records.length === 0) return;

    await this.mutex.runExclusive(async () => {
      for (const record of records) {
        try {
          await this.sink.write(`${serializeRecord(record)}\n`);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          throw new SinkWriteError(`Failed to write record ${record.idx}: ${message}`, {
            idx: record.idx,
          });
        }
        this.written++;
      }
    });
  }
}
