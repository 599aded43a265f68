/**
 * Variable Flow Interfaces
 *
 * Nodes and edges of the per-group flow graph. Nodes are variable
 * occurrences and the synthetic match-input of each compound pattern; edges
 * say where a value can come from. Node ids are ranks: the order in which the
 * analyzer created them.
 *
 * @module
 */

import type { ScopeError } from "../../errors.js";
import type { CompoundPattern } from "../../parser/ast.js";

// =============================================================================
// Flow Node Types
// =============================================================================

/**
 * How a variable appears at one occurrence.
 */
export type OccurrenceRole =
  | "bound-in-pattern"    // First appearance in a pattern
  | "matched-in-pattern"  // Already bound, compared by the pattern
  | "read-in-guard"
  | "read-in-body"
  | "sent-in-message"     // Read inside the message of `!`
  | "received-in-pattern"; // Bound by a receive clause pattern

interface FlowNodeBase {
  /** Rank, unique within the group */
  id: number;
  /** Index of the anchor token in the file's token stream */
  tokenIndex: number;
  /** Clause of the group the node belongs to */
  clauseIndex: number;
}

export interface VariableNode extends FlowNodeBase {
  kind: "variable";
  name: string;
  role: OccurrenceRole;
}

/**
 * Synthetic node of a compound pattern, anchored at its opening token.
 */
export interface MatchInputNode extends FlowNodeBase {
  kind: "match-input";
  pattern: CompoundPattern["kind"];
}

export type FlowNode = VariableNode | MatchInputNode;

// =============================================================================
// Flow Edge Types
// =============================================================================

export type FlowEdgeKind =
  | "destructure"     // Match-input to a directly contained leaf or compound
  | "guard"           // Binding to a guard read
  | "body"            // Binding to a body read
  | "match"           // Right-hand side read to the pattern entry
  | "message"         // Sent message to a receive pattern
  | "recursive-call"; // Tail self-call argument to a parameter entry

export interface FlowEdge {
  source: number;
  target: number;
  kind: FlowEdgeKind;
  /** Only recursive-call edges are approximate */
  approximate: boolean;
}

// =============================================================================
// Analysis Result
// =============================================================================

export interface FlowGraph {
  nodes: FlowNode[];
  /** Sorted by (source rank, target rank), without duplicates */
  edges: FlowEdge[];
  /** Reads with no reaching binding, one per occurrence */
  scopeErrors: ScopeError[];
}

export interface FlowAnalysisOptions {
  /** Link tail self-call arguments to matching parameters */
  includeApproximateEdges?: boolean;
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createVariableNode(
  id: number,
  name: string,
  role: OccurrenceRole,
  tokenIndex: number,
  clauseIndex: number
): VariableNode {
  return { kind: "variable", id, name, role, tokenIndex, clauseIndex };
}

export function createMatchInputNode(
  id: number,
  pattern: CompoundPattern["kind"],
  tokenIndex: number,
  clauseIndex: number
): MatchInputNode {
  return { kind: "match-input", id, pattern, tokenIndex, clauseIndex };
}

export function createFlowEdge(source: number, target: number, kind: FlowEdgeKind): FlowEdge {
  return { source, target, kind, approximate: kind === "recursive-call" };
}
