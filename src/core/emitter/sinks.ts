/**
 * Record sinks.
 *
 * @module
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import type { IRecordSink } from "../interfaces/IRecordSink.js";
import { ensureDirectory } from "../../utils/fs.js";

export interface FileSinkOptions {
  /** Empty the file on first write instead of appending to it */
  truncate?: boolean;
}

/**
 * Appends to a file, creating it and its parent directories on first write.
 */
export class FileSink implements IRecordSink {
  private handle: fsPromises.FileHandle | null = null;
  private opened = false;

  constructor(
    readonly filePath: string,
    private readonly options: FileSinkOptions = {}
  ) {}

  async write(chunk: string): Promise<void> {
    const handle = await this.open();
    await handle.appendFile(chunk, { encoding: "utf-8" });
  }

  /** Closes the file. A truncating sink leaves an empty file when nothing was written. */
  async close(): Promise<void> {
    const handle = this.handle ?? (this.options.truncate && !this.opened ? await this.open() : null);
    this.handle = null;
    await handle?.close();
  }

  private async open(): Promise<fsPromises.FileHandle> {
    if (!this.handle) {
      await ensureDirectory(path.dirname(this.filePath));
      // Only the first open truncates; a reopened sink appends
      this.handle = await fsPromises.open(this.filePath, this.options.truncate && !this.opened ? "w" : "a");
      this.opened = true;
    }
    return this.handle;
  }
}

/**
 * Keeps written chunks in memory.
 */
export class MemorySink implements IRecordSink {
  private readonly chunks: string[] = [];
  private closed = false;

  async write(chunk: string): Promise<void> {
    if (this.closed) {
      throw new Error("Sink is closed");
    }
    this.chunks.push(chunk);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Everything written so far */
  get contents(): string {
    return this.chunks.join("");
  }

  /** Non-empty lines written so far */
  get lines(): string[] {
    return this.contents.split("\n").filter((line) => line.length > 0);
  }
}
