/**
 * File Processor
 *
 * Runs one file through parse → group → analyze → assemble. Group-level
 * failures are collected and the remaining groups still produce records;
 * file-level failures (parse, read, cancellation) propagate to the caller.
 *
 * @module
 */

import { VariableFlowAnalyzer } from "../analysis/data-flow/flow-analyzer.js";
import { RecordAssembler } from "../assembler/record-assembler.js";
import { EmptyDocumentationProvider } from "../assembler/documentation.js";
import {
  EmptyClauseGroupError,
  RecordValidationError,
  type CorpusError,
  type ScopeError,
} from "../errors.js";
import { groupClauses } from "../grouping/clause-grouper.js";
import type { IDocumentationProvider } from "../interfaces/IDocumentationProvider.js";
import type { IParser } from "../interfaces/IParser.js";
import type { LocatedFile } from "../locator/scanner.js";
import { NEVER_CANCELLED, yieldToEventLoop, type CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { ExtractionConfig, TrainingRecord } from "../../utils/validation.js";

const logger = createLogger("file-processor");

// =============================================================================
// Types
// =============================================================================

export interface FileOutcome {
  relativePath: string;
  module: string;
  /** Records in group order */
  records: TrainingRecord[];
  /** Groups skipped by a group-level error */
  groupErrors: CorpusError[];
  /** Unresolved reads; their records are still emitted */
  scopeErrors: ScopeError[];
}

export interface FileProcessorOptions {
  config: Pick<
    ExtractionConfig,
    "includeApproximateEdges" | "repositoryName" | "repositoryUrl" | "repositoryRef"
  >;
  rootPath: string;
  parser: IParser;
  documentation?: IDocumentationProvider;
}

// =============================================================================
// File Processor
// =============================================================================

export class FileProcessor {
  private readonly parser: IParser;
  private readonly documentation: IDocumentationProvider;
  private readonly analyzer: VariableFlowAnalyzer;
  private readonly assembler: RecordAssembler;
  private readonly rootPath: string;

  constructor(options: FileProcessorOptions) {
    const { config } = options;
    this.rootPath = options.rootPath;
    this.parser = options.parser;
    this.documentation = options.documentation ?? new EmptyDocumentationProvider();
    this.analyzer = new VariableFlowAnalyzer({ includeApproximateEdges: config.includeApproximateEdges });
    this.assembler = new RecordAssembler({
      repositoryName: config.repositoryName,
      repositoryUrl: config.repositoryUrl,
      repositoryRef: config.repositoryRef,
      includeApproximateEdges: config.includeApproximateEdges,
    });
  }

  /**
   * Processes one file.
   *
   * @throws ParseError, FileSystemError, or the cancellation error once
   *   `cancellationToken` is cancelled
   */
  async process(file: LocatedFile, cancellationToken: CancellationToken = NEVER_CANCELLED): Promise<FileOutcome> {
    const { file: source, tree } = await this.parser.parseFile(file.absolutePath, this.rootPath, cancellationToken);
    const { groups, errors } = groupClauses(source.module, tree.functions);

    const outcome: FileOutcome = {
      relativePath: source.relativePath,
      module: source.module,
      records: [],
      groupErrors: [...errors],
      scopeErrors: [],
    };

    for (const error of errors) {
      logger.error({ file: source.relativePath, code: error.code, err: error.message }, "Skipping clause group");
    }

    for (const group of groups) {
      await yieldToEventLoop();
      cancellationToken.throwIfCancelled();

      const graph = this.analyzer.analyze(group);
      for (const scopeError of graph.scopeErrors) {
        logger.warn(
          { file: source.relativePath, function: `${group.name}/${group.arity}`, variable: scopeError.variable },
          scopeError.message
        );
      }
      outcome.scopeErrors.push(...graph.scopeErrors);

      try {
        outcome.records.push(
          this.assembler.assemble({
            file: source,
            tokens: tree.tokens,
            group,
            graph,
            docstring: this.documentation.getDocumentation(group.module, group.name, group.arity) ?? "",
          })
        );
      } catch (error) {
        if (error instanceof EmptyClauseGroupError || error instanceof RecordValidationError) {
          logger.error(
            { file: source.relativePath, function: `${group.name}/${group.arity}`, internal: true, err: error.message },
            "Skipping clause group"
          );
          outcome.groupErrors.push(error);
          continue;
        }
        throw error;
      }
    }

    logger.debug(
      { file: source.relativePath, records: outcome.records.length, groupErrors: outcome.groupErrors.length },
      "File processed"
    );
    return outcome;
  }
}
