/**
 * ExtractionCoordinator Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { JsonDocumentationProvider } from "../../assembler/documentation.js";
import { resolveConfig } from "../../config.js";
import { MemorySink } from "../../emitter/sinks.js";
import { FileSystemError } from "../../errors.js";
import type { IParser, ParsedSourceFile } from "../../interfaces/IParser.js";
import type { IRecordSink } from "../../interfaces/IRecordSink.js";
import { ErlangSourceParser } from "../../parser/index.js";
import {
  ExtractionCoordinator,
  type ExtractionError,
  type ExtractionProgressEvent,
} from "../coordinator.js";
import { countErrors } from "../run-summary.js";
import type { CancellationToken } from "../../../utils/async.js";
import type { ExtractionConfigInput } from "../../../utils/validation.js";

const CMP_SOURCE = "-module(cmp).\n\nmax(A, B) when A > B -> A;\nmax(A, B) -> B.\n";
const BROKEN_SOURCE = "-module(broken).\nf(X) -> X\n";
const SPLIT_SOURCE = "-module(split).\nf(1) -> one.\ng() -> ok.\nf(2) -> two.\n";

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

function idsOf(sink: MemorySink): string[] {
  return sink.lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === "object" && parsed !== null && "idx" in parsed ? String(parsed.idx) : "";
  });
}

/** Parser that never finishes files whose name ends with `stallSuffix` */
class StallingParser implements IParser {
  private readonly inner = new ErlangSourceParser();
  readonly extensions = this.inner.extensions;

  constructor(private readonly stallSuffix: string) {}

  parseCode(code: string) {
    return this.inner.parseCode(code);
  }

  parseFile(filePath: string, rootPath: string, cancellationToken?: CancellationToken): Promise<ParsedSourceFile> {
    if (filePath.endsWith(this.stallSuffix)) {
      return new Promise<ParsedSourceFile>(() => undefined);
    }
    return this.inner.parseFile(filePath, rootPath, cancellationToken);
  }
}

describe("ExtractionCoordinator", () => {
  let tempDir: string;
  let projectDir: string;

  function coordinator(sink: IRecordSink, config: ExtractionConfigInput = {}, extra: { parser?: IParser } = {}) {
    return new ExtractionCoordinator({
      rootPath: projectDir,
      config: resolveConfig(config),
      sink,
      ...extra,
    });
  }

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "coordinator-test-"));
    projectDir = path.join(tempDir, "project");
    await writeFiles(projectDir, {
      "src/broken.erl": BROKEN_SOURCE,
      "src/cmp.erl": CMP_SOURCE,
      "src/split.erl": SPLIT_SOURCE,
      "deps/other/src/ignored.erl": "ignored() -> ok.\n",
      "include/util.hrl": "helper(X) -> X.\n",
    });
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("run", () => {
    it("should emit records for good groups and isolate failures", async () => {
      const sink = new MemorySink();
      const summary = await coordinator(sink).run();

      expect(idsOf(sink)).toEqual(["cmp:max/2", "split:g/0"]);
      expect(summary.recordsEmitted).toBe(2);
      expect(summary.files).toEqual({ scanned: 3, processed: 2, skipped: 0, failed: 1 });
      expect(summary.groups).toEqual({ emitted: 2, skipped: 1 });
      expect(summary.aborted).toBe(false);
      expect(summary.abortReason).toBeUndefined();
    });

    it("should summarize errors by kind with samples", async () => {
      const summary = await coordinator(new MemorySink()).run();

      expect(summary.errors.ParseError?.count).toBe(1);
      expect(summary.errors.ParseError?.samples).toEqual([
        {
          code: "E2002",
          message: "Unterminated function clause 'f', expected '.'",
          filePath: "src/broken.erl",
          line: 2,
          column: 9,
        },
      ]);
      expect(summary.errors.NonContiguousClauseError?.samples[0]).toMatchObject({
        message: "Clauses of split:f/1 are not contiguous",
        filePath: "src/split.erl",
      });
      expect(countErrors(summary)).toBe(2);
    });

    it("should write the full record for each group", async () => {
      const sink = new MemorySink();
      await new ExtractionCoordinator({
        rootPath: projectDir,
        config: resolveConfig({ repositoryName: "demo" }),
        sink,
        documentation: new JsonDocumentationProvider({ "cmp:max/2": "Larger of two terms." }),
      }).run();

      expect(sink.lines[0]).toBe(
        JSON.stringify({
          idx: "demo:cmp:max/2",
          url: "src/cmp.erl#L3-L4",
          docstring: "Larger of two terms.",
          code: "max(A, B) when A > B -> A;\nmax(A, B) -> B.",
          code_tokens: [
            "max", "(", "A", ",", "B", ")", "when", "A", ">", "B", "->", "A", ";",
            "max", "(", "A", ",", "B", ")", "->", "B", ".",
          ],
          dfg: [
            [2, 7],
            [2, 11],
            [4, 9],
            [17, 20],
          ],
        })
      );
    });

    it("should produce the same output regardless of concurrency", async () => {
      const sequential = new MemorySink();
      const parallel = new MemorySink();

      await coordinator(sequential, { concurrency: 1 }).run();
      await coordinator(parallel, { concurrency: 16 }).run();

      expect(parallel.contents).toBe(sequential.contents);
    });

    it("should report progress and errors", async () => {
      const events: ExtractionProgressEvent[] = [];
      const errors: ExtractionError[] = [];

      await new ExtractionCoordinator({
        rootPath: projectDir,
        config: resolveConfig({}),
        sink: new MemorySink(),
        onProgress: (event) => events.push(event),
        onError: (error) => errors.push(error),
      }).run();

      expect(events[0]?.phase).toBe("locating");
      expect(events.filter((event) => event.phase === "processing")).toHaveLength(3);
      expect(events[events.length - 1]).toMatchObject({ phase: "complete", percentage: 100, processed: 3, total: 3 });
      expect(errors.map((error) => error.filePath).sort()).toEqual(["src/broken.erl", "src/split.erl"]);
    });

    it("should locate the files the parser reads", async () => {
      const sink = new MemorySink();
      const summary = await coordinator(sink, {}, { parser: new ErlangSourceParser([".erl", ".hrl"]) }).run();

      expect(idsOf(sink)).toEqual(["util:helper/1", "cmp:max/2", "split:g/0"]);
      expect(summary.files.scanned).toBe(4);
    });

    it("should fail when the root does not exist", async () => {
      const missing = new ExtractionCoordinator({
        rootPath: path.join(tempDir, "missing"),
        config: resolveConfig({}),
        sink: new MemorySink(),
      });

      await expect(missing.run()).rejects.toBeInstanceOf(FileSystemError);
    });
  });

  describe("failure handling", () => {
    it("should stop scheduling files after the first error with failFast", async () => {
      const sink = new MemorySink();
      const summary = await coordinator(sink, { failFast: true, concurrency: 1 }).run();

      expect(sink.lines).toEqual([]);
      expect(summary.aborted).toBe(true);
      expect(summary.abortReason).toBe("fail-fast: ParseError in src/broken.erl");
      expect(summary.files).toEqual({ scanned: 3, processed: 0, skipped: 0, failed: 1 });
    });

    it("should abort the run when the sink fails", async () => {
      const failing: IRecordSink = {
        write: async () => {
          throw new Error("disk full");
        },
        close: async () => undefined,
      };
      const summary = await coordinator(failing, { concurrency: 1 }).run();

      expect(summary.aborted).toBe(true);
      expect(summary.abortReason).toBe("Failed to write record cmp:max/2: disk full");
      expect(summary.recordsEmitted).toBe(0);
      expect(summary.errors.SinkWriteError?.count).toBe(1);
      expect(summary.files.processed).toBe(1);
    });

    it("should time out a file and continue with the rest", async () => {
      const sink = new MemorySink();
      const summary = await coordinator(sink, { fileTimeoutMs: 50 }, { parser: new StallingParser("cmp.erl") }).run();

      expect(idsOf(sink)).toEqual(["split:g/0"]);
      expect(summary.files.failed).toBe(2);
      expect(summary.errors.FileTimeoutError?.samples[0]).toMatchObject({
        code: "E7000",
        message: "Processing src/cmp.erl exceeded 50ms",
        filePath: "src/cmp.erl",
      });
    });

    it("should skip oversized files", async () => {
      const summary = await coordinator(new MemorySink(), { maxFileSizeBytes: 55 }).run();

      expect(summary.files.skipped).toBe(1);
      expect(summary.skippedFiles).toEqual([{ relativePath: "src/cmp.erl", size: 58, reason: "too-large" }]);
    });
  });

  describe("large batches", () => {
    let batchDir: string;

    beforeAll(async () => {
      batchDir = path.join(tempDir, "batch");
      const files: Record<string, string> = {};
      for (let i = 0; i < 100; i++) {
        const name = `m${String(i).padStart(3, "0")}`;
        const terminator = i === 42 ? "" : ".";
        files[`src/${name}.erl`] = `-module(${name}).\nid(X) -> X${terminator}\n`;
      }
      await writeFiles(batchDir, files);
    });

    it("should emit the records of every file except the malformed one", async () => {
      const sink = new MemorySink();
      const summary = await new ExtractionCoordinator({
        rootPath: batchDir,
        config: resolveConfig({ concurrency: 8 }),
        sink,
      }).run();

      const ids = idsOf(sink);
      expect(ids).toHaveLength(99);
      expect(ids[0]).toBe("m000:id/1");
      expect(ids[42]).toBe("m043:id/1");
      expect(ids).not.toContain("m042:id/1");
      expect(summary.files).toEqual({ scanned: 100, processed: 99, skipped: 0, failed: 1 });
      expect(summary.errors.ParseError?.count).toBe(1);
      expect(summary.errors.ParseError?.samples[0]?.filePath).toBe("src/m042.erl");
    });
  });
});
