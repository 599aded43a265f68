/**
 * IRecordSink - Append-only output for serialized records
 *
 * @module
 */

/**
 * Destination of JSON Lines output. Implementations only append.
 *
 * @example
 * ```typescript
 * const sink: IRecordSink = new FileSink("out/corpus.jsonl");
 * await sink.write('{"idx":"stack:push/2"}\n');
 * await sink.close();
 * ```
 */
export interface IRecordSink {
  /**
   * Append one chunk of text
   * @throws if the underlying resource rejects the write
   */
  write(chunk: string): Promise<void>;

  /**
   * Release the underlying resource
   */
  close(): Promise<void>;
}
