/**
 * inspect command - Show how one file is grouped and analyzed
 */

import * as path from "node:path";
import chalk from "chalk";
import { analyzeGroup } from "../../core/analysis/data-flow/flow-analyzer.js";
import type { FlowGraph, FlowNode } from "../../core/analysis/data-flow/interfaces.js";
import { groupTokens } from "../../core/assembler/record-assembler.js";
import { groupClauses, type ClauseGroup } from "../../core/grouping/clause-grouper.js";
import { ErlangSourceParser } from "../../core/parser/index.js";
import type { Token } from "../../core/parser/tokens.js";
import { createLogger } from "../../utils/index.js";

const logger = createLogger("inspect");

export interface InspectOptions {
  approximate?: boolean;
}

/**
 * Text lines describing one analyzed group. Token positions are those of
 * the emitted record's `code_tokens`.
 */
export function describeGroup(group: ClauseGroup, graph: FlowGraph, tokens: readonly Token[]): string[] {
  if (group.clauses.length === 0) return [];

  const { tokens: codeTokens, positions } = groupTokens(group, tokens);
  const position = (tokenIndex: number): string => String(positions.get(tokenIndex) ?? "?");
  const nodes = new Map<number, FlowNode>(graph.nodes.map((node) => [node.id, node]));

  const label = (id: number): string => {
    const node = nodes.get(id);
    if (!node) return `?${id}`;
    const text = node.kind === "variable" ? node.name : `<${node.pattern}>`;
    return `${text}@${position(node.tokenIndex)}`;
  };

  const lines = [
    `${group.module}:${group.name}/${group.arity} (${group.clauses.length} clause${group.clauses.length === 1 ? "" : "s"})`,
    `  tokens: ${codeTokens.map((token, i) => `${i}:${token.text}`).join(" ")}`,
  ];

  if (graph.edges.length === 0) {
    lines.push("  edges: none");
  } else {
    lines.push("  edges:");
    for (const edge of graph.edges) {
      const suffix = edge.approximate ? " (approximate)" : "";
      lines.push(`    ${label(edge.source)} -> ${label(edge.target)} [${edge.kind}]${suffix}`);
    }
  }

  for (const error of graph.scopeErrors) {
    lines.push(`  unbound: ${error.variable}@${position(error.tokenIndex)}`);
  }
  return lines;
}

/**
 * Print the clause groups of one file with their tokens and edges
 */
export async function inspectCommand(file: string, options: InspectOptions): Promise<void> {
  const filePath = path.resolve(file);
  logger.debug({ filePath }, "Inspecting file");

  const parser = new ErlangSourceParser([path.extname(filePath) || ".erl"]);
  const { file: source, tree } = await parser.parseFile(filePath, path.dirname(filePath));
  const { groups, errors } = groupClauses(source.module, tree.functions);

  console.log(chalk.cyan.bold(`${source.relativePath} (module ${source.module})`));
  console.log(chalk.dim("─".repeat(40)));

  for (const group of groups) {
    const graph = analyzeGroup(group, { includeApproximateEdges: options.approximate });
    const [heading, ...rest] = describeGroup(group, graph, tree.tokens);
    console.log();
    console.log(chalk.white.bold(heading));
    for (const line of rest) {
      console.log(line.startsWith("  unbound") ? chalk.yellow(line) : line);
    }
  }

  for (const error of errors) {
    console.log();
    console.log(chalk.red(`✗ ${error.message}`));
  }
}
