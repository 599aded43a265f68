/**
 * Record Assembler
 *
 * Combines a clause group, its tokens, its flow edges and a documentation
 * string into one validated training record.
 *
 * @module
 */

import type { FlowEdge, FlowGraph } from "../analysis/data-flow/interfaces.js";
import { EmptyClauseGroupError, RecordValidationError } from "../errors.js";
import type { ClauseGroup } from "../grouping/clause-grouper.js";
import type { Token } from "../parser/tokens.js";
import type { SourceFile } from "../../types/index.js";
import {
  TrainingRecordSchema,
  formatZodError,
  safeValidate,
  type TrainingRecord,
} from "../../utils/validation.js";

// =============================================================================
// Types
// =============================================================================

export interface RecordAssemblerOptions {
  /** Prefixed to `idx` as `repository:` */
  repositoryName?: string;
  /** Base for `url`; without it the url is the relative path */
  repositoryUrl?: string;
  /** Revision in `url` (default: HEAD) */
  repositoryRef?: string;
  /** Add `dfg_approximate` to every record */
  includeApproximateEdges?: boolean;
}

export interface AssembleInput {
  file: SourceFile;
  /** Token stream of the whole file */
  tokens: readonly Token[];
  group: ClauseGroup;
  graph: FlowGraph;
  docstring: string;
}

// =============================================================================
// Assembler
// =============================================================================

export class RecordAssembler {
  private readonly options: Required<Omit<RecordAssemblerOptions, "repositoryName" | "repositoryUrl">> &
    Pick<RecordAssemblerOptions, "repositoryName" | "repositoryUrl">;

  constructor(options: RecordAssemblerOptions = {}) {
    this.options = {
      repositoryName: options.repositoryName,
      repositoryUrl: options.repositoryUrl,
      repositoryRef: options.repositoryRef ?? "HEAD",
      includeApproximateEdges: options.includeApproximateEdges ?? false,
    };
  }

  /**
   * @throws EmptyClauseGroupError if the group has no clauses
   * @throws RecordValidationError if the record fails schema validation
   */
  assemble(input: AssembleInput): TrainingRecord {
    const { file, tokens, group, graph, docstring } = input;
    const first = group.clauses[0];
    const last = group.clauses[group.clauses.length - 1];
    if (!first || !last) {
      throw new EmptyClauseGroupError(`Clause group ${group.module}:${group.name}/${group.arity} has no clauses`, {
        module: group.module,
        functionName: group.name,
        arity: group.arity,
      });
    }

    const { tokens: codeTokens, positions } = groupTokens(group, tokens);
    let code = "";
    let previous: Token | null = null;
    for (const clause of group.clauses) {
      if (previous) {
        const adjacent = clause.firstToken.index === previous.index + 1;
        code += adjacent ? file.content.slice(previous.end, clause.firstToken.start) : "\n";
      }
      code += file.content.slice(clause.firstToken.start, clause.terminator.end);
      previous = clause.terminator;
    }
    const idx = this.recordId(group);

    const edgePairs = (edges: FlowEdge[]): Array<[number, number]> =>
      uniquePairs(
        edges.map((edge): [number, number] => [
          tokenPosition(graph, edge.source, positions),
          tokenPosition(graph, edge.target, positions),
        ])
      );

    const candidate: TrainingRecord = {
      idx,
      url: this.recordUrl(file, first.firstToken.line, last.terminator.line),
      docstring,
      code,
      code_tokens: codeTokens.map((token) => token.text),
      dfg: edgePairs(graph.edges.filter((edge) => !edge.approximate)),
    };
    if (this.options.includeApproximateEdges) {
      candidate.dfg_approximate = edgePairs(graph.edges.filter((edge) => edge.approximate));
    }

    const result = safeValidate(TrainingRecordSchema, candidate);
    if (!result.success) {
      const issues = formatZodError(result.error);
      throw new RecordValidationError(`Record ${idx} failed validation: ${issues.join("; ")}`, {
        issues,
        idx,
      });
    }
    return result.data;
  }

  recordId(group: ClauseGroup): string {
    const base = `${group.module}:${group.name}/${group.arity}`;
    return this.options.repositoryName ? `${this.options.repositoryName}:${base}` : base;
  }

  recordUrl(file: SourceFile, startLine: number, endLine: number): string {
    const anchor = `#L${startLine}-L${endLine}`;
    if (!this.options.repositoryUrl) {
      return `${file.relativePath}${anchor}`;
    }
    const base = this.options.repositoryUrl.replace(/\/+$/, "");
    return `${base}/blob/${this.options.repositoryRef}/${file.relativePath}${anchor}`;
  }
}

export interface GroupTokens {
  tokens: Token[];
  /** File token index to position in `tokens` */
  positions: Map<number, number>;
}

/**
 * Tokens of each clause from its name to its terminator. Directives between
 * the clauses of a group are left out.
 */
export function groupTokens(group: ClauseGroup, tokens: readonly Token[]): GroupTokens {
  const result: GroupTokens = { tokens: [], positions: new Map() };
  for (const clause of group.clauses) {
    for (let index = clause.firstToken.index; index <= clause.terminator.index; index++) {
      const token = tokens[index];
      if (!token) continue;
      result.positions.set(index, result.tokens.length);
      result.tokens.push(token);
    }
  }
  return result;
}

/** Position of a node's token in `code_tokens`, or -1 when it has none */
function tokenPosition(graph: FlowGraph, nodeId: number, positions: ReadonlyMap<number, number>): number {
  const node = graph.nodes[nodeId];
  return node ? (positions.get(node.tokenIndex) ?? -1) : -1;
}

function uniquePairs(pairs: Array<[number, number]>): Array<[number, number]> {
  const seen = new Set<string>();
  return pairs.filter(([source, target]) => {
    const key = `${source}:${target}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
