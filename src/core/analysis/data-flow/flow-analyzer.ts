/**
 * Variable Flow Analyzer
 *
 * Builds the flow graph of one clause group. Each clause is analyzed in its
 * own root scope: parameters are bound first, then guards are read, then the
 * body is walked in order. Node ranks follow creation order, which is also
 * the traversal order.
 *
 * @example
 * ```typescript
 * const analyzer = new VariableFlowAnalyzer({ includeApproximateEdges: true });
 * const graph = analyzer.analyze(group);
 * for (const edge of graph.edges) {
 *   console.log(edge.kind, edge.source, "->", edge.target);
 * }
 * ```
 *
 * @module
 */

import { ScopeError } from "../../errors.js";
import type { ClauseGroup } from "../../grouping/clause-grouper.js";
import type {
  CallExpr,
  CaseClause,
  CatchClause,
  ComprehensionExpr,
  Expr,
  FunExpr,
  Guard,
  Pattern,
  VarExpr,
} from "../../parser/ast.js";
import type { Token } from "../../parser/tokens.js";
import {
  createFlowEdge,
  createMatchInputNode,
  createVariableNode,
  type FlowAnalysisOptions,
  type FlowEdge,
  type FlowEdgeKind,
  type FlowGraph,
  type FlowNode,
  type OccurrenceRole,
  type VariableNode,
} from "./interfaces.js";
import { destinationKey, isSelfCall, mayMatch, SELF_KEY } from "./message-matching.js";
import { Scope } from "./scope.js";

type BindingRole = Extract<OccurrenceRole, "bound-in-pattern" | "received-in-pattern">;
type ReadRole = Extract<OccurrenceRole, "read-in-guard" | "read-in-body" | "sent-in-message">;

interface PendingSend {
  key: string;
  message: Expr;
}

interface RecursiveCall {
  args: Expr[];
  argReads: number[][];
}

// =============================================================================
// Analyzer
// =============================================================================

export class VariableFlowAnalyzer {
  constructor(private readonly options: FlowAnalysisOptions = {}) {}

  analyze(group: ClauseGroup): FlowGraph {
    return new GroupFlowBuilder(group, this.options).build();
  }
}

/**
 * Builds the flow graph of a clause group.
 */
export function analyzeGroup(group: ClauseGroup, options: FlowAnalysisOptions = {}): FlowGraph {
  return new VariableFlowAnalyzer(options).analyze(group);
}

// =============================================================================
// Graph construction
// =============================================================================

class GroupFlowBuilder {
  private readonly nodes: FlowNode[] = [];
  private readonly edges: FlowEdge[] = [];
  private readonly scopeErrors: ScopeError[] = [];

  /** Node of each variable read, for linking messages */
  private readonly readNodes = new Map<VarExpr, VariableNode>();
  /** Entry node of each variable or compound pattern */
  private readonly patternNodes = new Map<Pattern, FlowNode>();

  private readonly pendingSends: PendingSend[] = [];
  /** Bindings whose value is `self()` */
  private readonly selfBindings = new Set<VariableNode>();
  private readonly recursiveCalls: RecursiveCall[] = [];
  private readonly paramEntries: number[][][] = [];
  private readonly tailCalls = new Set<CallExpr>();
  private clauseIndex = 0;

  constructor(
    private readonly group: ClauseGroup,
    private readonly options: FlowAnalysisOptions
  ) {}

  build(): FlowGraph {
    this.group.clauses.forEach((clause, index) => {
      this.clauseIndex = index;
      this.markTailCalls(clause.body);

      const scope = new Scope();
      this.paramEntries[index] = clause.params.map((param) =>
        this.bindPattern(param, scope, "bound-in-pattern", false)
      );
      if (clause.guard) this.walkGuard(clause.guard, scope);
      this.walkBody(clause.body, scope, "read-in-body");
    });

    this.resolveRecursiveCalls();

    return {
      nodes: this.nodes,
      edges: normalizeEdges(this.edges),
      scopeErrors: this.scopeErrors,
    };
  }

  // ===========================================================================
  // Patterns
  // ===========================================================================

  /**
   * Binds the variables of a pattern and returns its entry nodes.
   *
   * @param shadow - Whether the pattern opens a fresh scope (fun heads and
   *   generators), so outer names are rebound rather than matched
   */
  private bindPattern(pattern: Pattern, scope: Scope, role: BindingRole, shadow: boolean): number[] {
    switch (pattern.kind) {
      case "wildcard":
      case "literal":
        return [];

      case "var": {
        const existing = shadow ? scope.lookupOwn(pattern.name) : scope.lookup(pattern.name);
        if (existing) {
          const node = this.addVariable(pattern.name, "matched-in-pattern", pattern.token);
          for (const binding of existing) this.addEdge(binding.id, node.id, "match");
          this.patternNodes.set(pattern, node);
          return [node.id];
        }
        const node = this.addVariable(pattern.name, role, pattern.token);
        scope.bind(pattern.name, [node]);
        this.patternNodes.set(pattern, node);
        return [node.id];
      }

      case "alias":
        return [
          ...this.bindPattern(pattern.left, scope, role, shadow),
          ...this.bindPattern(pattern.right, scope, role, shadow),
        ];

      case "string-prefix":
        return this.bindPattern(pattern.tail, scope, role, shadow);

      default: {
        const input = createMatchInputNode(this.nodes.length, pattern.kind, pattern.token.index, this.clauseIndex);
        this.nodes.push(input);
        this.patternNodes.set(pattern, input);

        const children: number[] = [];
        const bindChild = (child: Pattern): void => {
          children.push(...this.bindPattern(child, scope, role, shadow));
        };

        switch (pattern.kind) {
          case "tuple":
            pattern.elements.forEach(bindChild);
            break;
          case "list":
            pattern.elements.forEach(bindChild);
            if (pattern.tail) bindChild(pattern.tail);
            break;
          case "map":
            for (const entry of pattern.entries) {
              this.walkExpr(entry.key, scope, "read-in-body");
              bindChild(entry.value);
            }
            break;
          case "record":
            pattern.fields.forEach((field) => bindChild(field.value));
            break;
          case "binary":
            for (const segment of pattern.segments) {
              bindChild(segment.value);
              if (segment.size) this.walkExpr(segment.size, scope, "read-in-body");
            }
            break;
        }

        for (const child of children) this.addEdge(input.id, child, "destructure");
        return [input.id];
      }
    }
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private walkGuard(guard: Guard, scope: Scope): void {
    for (const conjunction of guard) {
      for (const test of conjunction) this.walkExpr(test, scope, "read-in-guard");
    }
  }

  private walkBody(body: readonly Expr[], scope: Scope, role: ReadRole, reads?: number[]): void {
    for (const expr of body) this.walkExpr(expr, scope, role, reads);
  }

  /**
   * Walks an expression, creating read nodes.
   *
   * @param reads - Collects the ids of every read made inside the expression
   */
  private walkExpr(expr: Expr, scope: Scope, role: ReadRole, reads?: number[]): void {
    const walk = (child: Expr | null | undefined): void => {
      if (child) this.walkExpr(child, scope, role, reads);
    };

    switch (expr.kind) {
      case "var":
        this.readVariable(expr, scope, role, reads);
        break;
      case "atom":
      case "literal":
        break;
      case "macro":
        expr.args?.forEach(walk);
        break;
      case "tuple":
        expr.elements.forEach(walk);
        break;
      case "list":
        expr.elements.forEach(walk);
        walk(expr.tail);
        break;
      case "binary":
        for (const segment of expr.segments) {
          walk(segment.value);
          walk(segment.size);
        }
        break;
      case "list-comprehension":
      case "binary-comprehension":
        this.walkComprehension(expr, scope, role, reads);
        break;
      case "map":
        walk(expr.base);
        for (const entry of expr.entries) {
          walk(entry.key);
          walk(entry.value);
        }
        break;
      case "record":
        walk(expr.base);
        expr.fields.forEach((field) => walk(field.value));
        break;
      case "record-field":
        walk(expr.base);
        break;
      case "remote":
        walk(expr.module);
        walk(expr.fn);
        break;
      case "call":
        this.walkCall(expr, scope, role, reads);
        break;
      case "fun-ref":
        walk(expr.module);
        walk(expr.name);
        walk(expr.arity);
        break;
      case "fun":
        this.walkFun(expr, scope, reads);
        break;
      case "case": {
        walk(expr.subject);
        const branches = expr.clauses.map((clause) =>
          this.walkCaseClause(clause, scope, "bound-in-pattern", role, reads)
        );
        scope.mergeBranches(branches);
        break;
      }
      case "if": {
        const branches = expr.clauses.map((clause) => {
          const branch = scope.child();
          this.walkGuard(clause.guard, branch);
          this.walkBody(clause.body, branch, role, reads);
          return branch;
        });
        scope.mergeBranches(branches);
        break;
      }
      case "receive":
        this.walkReceive(expr.clauses, expr.after, scope, role, reads);
        break;
      case "try":
        this.walkTry(expr.body, expr.ofClauses, expr.catchClauses, expr.after, scope, role, reads);
        break;
      case "block":
        this.walkBody(expr.body, scope, role, reads);
        break;
      case "catch":
        walk(expr.expr);
        break;
      case "match": {
        const valueReads: number[] = [];
        this.walkExpr(expr.value, scope, role, valueReads);
        reads?.push(...valueReads);
        const entries = this.bindPattern(expr.pattern, scope, "bound-in-pattern", false);
        for (const read of valueReads) {
          for (const entry of entries) this.addEdge(read, entry, "match");
        }
        const bound = this.patternNodes.get(expr.pattern);
        if (isSelfCall(expr.value) && bound?.kind === "variable" && bound.role === "bound-in-pattern") {
          this.selfBindings.add(bound);
        }
        break;
      }
      case "send": {
        walk(expr.destination);
        this.walkExpr(expr.message, scope, "sent-in-message", reads);
        const key = this.sendKey(expr.destination, scope);
        if (key !== null) this.pendingSends.push({ key, message: expr.message });
        break;
      }
      case "binary-op":
        walk(expr.left);
        walk(expr.right);
        break;
      case "unary-op":
        walk(expr.operand);
        break;
    }
  }

  private readVariable(expr: VarExpr, scope: Scope, role: ReadRole, reads?: number[]): void {
    // `_` in an expression only occurs as a macro argument and reads nothing
    if (expr.name === "_") return;

    const node = this.addVariable(expr.name, role, expr.token);
    this.readNodes.set(expr, node);
    reads?.push(node.id);

    const bindings = scope.lookup(expr.name);
    if (!bindings) {
      this.scopeErrors.push(
        new ScopeError(`Variable '${expr.name}' is unbound`, {
          variable: expr.name,
          tokenIndex: expr.token.index,
          clauseIndex: this.clauseIndex,
          line: expr.token.line,
          column: expr.token.column,
        })
      );
      return;
    }

    const kind: FlowEdgeKind = role === "read-in-guard" ? "guard" : "body";
    for (const binding of bindings) this.addEdge(binding.id, node.id, kind);
  }

  private walkCall(expr: CallExpr, scope: Scope, role: ReadRole, reads?: number[]): void {
    this.walkExpr(expr.callee, scope, role, reads);
    const argReads = expr.args.map((arg) => {
      const collected: number[] = [];
      this.walkExpr(arg, scope, role, collected);
      reads?.push(...collected);
      return collected;
    });

    if (this.options.includeApproximateEdges && this.tailCalls.has(expr) && this.isRecursiveCall(expr)) {
      this.recursiveCalls.push({ args: expr.args, argReads });
    }
  }

  private walkComprehension(expr: ComprehensionExpr, scope: Scope, role: ReadRole, reads?: number[]): void {
    let inner = scope.child();
    for (const qualifier of expr.qualifiers) {
      if (qualifier.kind === "generator") {
        this.walkExpr(qualifier.source, inner, role, reads);
        inner = inner.child();
        this.bindPattern(qualifier.pattern, inner, "bound-in-pattern", true);
      } else {
        this.walkExpr(qualifier.expr, inner, role, reads);
      }
    }
    this.walkExpr(expr.template, inner, role, reads);
  }

  private walkFun(expr: FunExpr, scope: Scope, reads?: number[]): void {
    const funScope = scope.child();
    if (expr.name) {
      const node = this.addVariable(expr.name.name, "bound-in-pattern", expr.name.token);
      funScope.bind(expr.name.name, [node]);
      this.patternNodes.set(expr.name, node);
    }

    for (const clause of expr.clauses) {
      const clauseScope = funScope.child();
      for (const param of clause.params) {
        this.bindPattern(param, clauseScope, "bound-in-pattern", true);
      }
      if (clause.guard) this.walkGuard(clause.guard, clauseScope);
      this.walkBody(clause.body, clauseScope, "read-in-body", reads);
    }
  }

  private walkCaseClause(
    clause: CaseClause,
    scope: Scope,
    bindingRole: BindingRole,
    role: ReadRole,
    reads?: number[]
  ): Scope {
    const branch = scope.child();
    this.bindPattern(clause.pattern, branch, bindingRole, false);
    if (clause.guard) this.walkGuard(clause.guard, branch);
    this.walkBody(clause.body, branch, role, reads);
    return branch;
  }

  private walkReceive(
    clauses: readonly CaseClause[],
    after: { timeout: Expr; body: Expr[] } | null,
    scope: Scope,
    role: ReadRole,
    reads?: number[]
  ): void {
    const pending = [...this.pendingSends];
    const keys = this.receiverKeys();

    const branches = clauses.map((clause) => {
      const branch = scope.child();
      this.bindPattern(clause.pattern, branch, "received-in-pattern", false);
      for (const send of pending) {
        if (keys.has(send.key) && mayMatch(send.message, clause.pattern)) {
          this.linkMessage(send.message, clause.pattern);
        }
      }
      if (clause.guard) this.walkGuard(clause.guard, branch);
      this.walkBody(clause.body, branch, role, reads);
      return branch;
    });

    if (after) {
      this.walkExpr(after.timeout, scope, role, reads);
      const branch = scope.child();
      this.walkBody(after.body, branch, role, reads);
      branches.push(branch);
    }

    scope.mergeBranches(branches);
  }

  private walkTry(
    body: readonly Expr[],
    ofClauses: readonly CaseClause[],
    catchClauses: readonly CatchClause[],
    after: readonly Expr[] | null,
    scope: Scope,
    role: ReadRole,
    reads?: number[]
  ): void {
    const bodyScope = scope.child();
    this.walkBody(body, bodyScope, role, reads);

    for (const clause of ofClauses) {
      this.walkCaseClause(clause, bodyScope, "bound-in-pattern", role, reads);
    }

    for (const clause of catchClauses) {
      const branch = scope.child();
      if (clause.exceptionClass) this.bindPattern(clause.exceptionClass, branch, "bound-in-pattern", false);
      this.bindPattern(clause.pattern, branch, "bound-in-pattern", false);
      if (clause.stacktrace) this.bindPattern(clause.stacktrace, branch, "bound-in-pattern", false);
      if (clause.guard) this.walkGuard(clause.guard, branch);
      this.walkBody(clause.body, branch, role, reads);
    }

    if (after) {
      this.walkBody(after, scope.child(), role, reads);
    }
  }

  // ===========================================================================
  // Message passing
  // ===========================================================================

  /** Keys under which a receive in this group consumes messages */
  private receiverKeys(): Set<string> {
    return new Set([SELF_KEY, `atom:${this.group.module}`]);
  }

  /** A variable destination is the running process when every binding reaching it is `self()` */
  private sendKey(destination: Expr, scope: Scope): string | null {
    if (destination.kind === "var") {
      const bindings = scope.lookup(destination.name);
      if (bindings && bindings.length > 0 && bindings.every((binding) => this.selfBindings.has(binding))) {
        return SELF_KEY;
      }
    }
    return destinationKey(destination, this.group.module);
  }

  /**
   * Links the parts of a sent message to the receive pattern, position by
   * position where both sides have the same shape.
   */
  private linkMessage(message: Expr, pattern: Pattern): void {
    switch (pattern.kind) {
      case "wildcard":
      case "literal":
        return;
      case "alias":
        this.linkMessage(message, pattern.left);
        this.linkMessage(message, pattern.right);
        return;
      case "string-prefix":
        this.linkMessage(message, pattern.tail);
        return;
      case "tuple":
        if (message.kind === "tuple" && message.elements.length === pattern.elements.length) {
          message.elements.forEach((element, i) => {
            const sub = pattern.elements[i];
            if (sub) this.linkMessage(element, sub);
          });
          return;
        }
        break;
      case "list":
        if (
          message.kind === "list" &&
          message.elements.length === pattern.elements.length &&
          (message.tail === null) === (pattern.tail === null)
        ) {
          message.elements.forEach((element, i) => {
            const sub = pattern.elements[i];
            if (sub) this.linkMessage(element, sub);
          });
          if (message.tail && pattern.tail) this.linkMessage(message.tail, pattern.tail);
          return;
        }
        break;
      case "record":
        if (message.kind === "record" && message.base === null && message.record === pattern.record) {
          for (const field of pattern.fields) {
            const sent = message.fields.find((candidate) => candidate.name === field.name);
            if (sent) this.linkMessage(sent.value, field.value);
          }
          return;
        }
        break;
      default:
        break;
    }

    const target = this.patternNodes.get(pattern);
    if (!target) return;
    for (const read of this.readsWithin(message)) {
      this.addEdge(read, target.id, "message");
    }
  }

  /** Ids of the read nodes created for variables inside `expr` */
  private readsWithin(expr: Expr): number[] {
    const ids: number[] = [];
    const visit = (node: Expr): void => {
      if (node.kind === "var") {
        const read = this.readNodes.get(node);
        if (read) ids.push(read.id);
        return;
      }
      subExpressions(node).forEach(visit);
    };
    visit(expr);
    return ids;
  }

  // ===========================================================================
  // Recursive calls
  // ===========================================================================

  private markTailCalls(body: readonly Expr[]): void {
    const last = body[body.length - 1];
    if (!last) return;

    switch (last.kind) {
      case "call":
        this.tailCalls.add(last);
        break;
      case "case":
        last.clauses.forEach((clause) => this.markTailCalls(clause.body));
        break;
      case "if":
        last.clauses.forEach((clause) => this.markTailCalls(clause.body));
        break;
      case "receive":
        last.clauses.forEach((clause) => this.markTailCalls(clause.body));
        if (last.after) this.markTailCalls(last.after.body);
        break;
      case "try":
        last.ofClauses.forEach((clause) => this.markTailCalls(clause.body));
        last.catchClauses.forEach((clause) => this.markTailCalls(clause.body));
        break;
      case "block":
        this.markTailCalls(last.body);
        break;
      default:
        break;
    }
  }

  /** Local, `?MODULE:` or `module:` call to this group's own name and arity */
  private isRecursiveCall(call: CallExpr): boolean {
    if (call.args.length !== this.group.arity) return false;
    const { callee } = call;
    if (callee.kind === "atom") return callee.name === this.group.name;
    if (callee.kind !== "remote" || callee.fn.kind !== "atom" || callee.fn.name !== this.group.name) {
      return false;
    }
    const { module } = callee;
    return (
      (module.kind === "atom" && module.name === this.group.module) ||
      (module.kind === "macro" && module.name === "MODULE" && module.args === null)
    );
  }

  private resolveRecursiveCalls(): void {
    for (const call of this.recursiveCalls) {
      this.group.clauses.forEach((clause, clauseIndex) => {
        const compatible = clause.params.every((param, i) => {
          const arg = call.args[i];
          return arg !== undefined && mayMatch(arg, param);
        });
        if (!compatible) return;

        const entries = this.paramEntries[clauseIndex] ?? [];
        call.argReads.forEach((argReads, i) => {
          for (const read of argReads) {
            for (const entry of entries[i] ?? []) this.addEdge(read, entry, "recursive-call");
          }
        });
      });
    }
  }

  // ===========================================================================
  // Graph helpers
  // ===========================================================================

  private addVariable(name: string, role: OccurrenceRole, token: Token): VariableNode {
    const node = createVariableNode(this.nodes.length, name, role, token.index, this.clauseIndex);
    this.nodes.push(node);
    return node;
  }

  private addEdge(source: number, target: number, kind: FlowEdgeKind): void {
    this.edges.push(createFlowEdge(source, target, kind));
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Sorts edges by (source, target) and drops repeated pairs. When an exact
 * and an approximate edge share a pair, the exact one is kept.
 */
export function normalizeEdges(edges: readonly FlowEdge[]): FlowEdge[] {
  const byPair = new Map<string, FlowEdge>();
  for (const edge of edges) {
    const key = `${edge.source}:${edge.target}`;
    const existing = byPair.get(key);
    if (!existing || (existing.approximate && !edge.approximate)) {
      byPair.set(key, edge);
    }
  }
  return [...byPair.values()].sort((a, b) => a.source - b.source || a.target - b.target);
}

/** Direct sub-expressions of `expr`, patterns excluded */
export function subExpressions(expr: Expr): Expr[] {
  const guardExprs = (guard: Guard | null): Expr[] => (guard ? guard.flat() : []);

  switch (expr.kind) {
    case "var":
    case "atom":
    case "literal":
      return [];
    case "macro":
      return expr.args ?? [];
    case "tuple":
      return expr.elements;
    case "list":
      return expr.tail ? [...expr.elements, expr.tail] : expr.elements;
    case "binary":
      return expr.segments.flatMap((segment) => (segment.size ? [segment.value, segment.size] : [segment.value]));
    case "list-comprehension":
    case "binary-comprehension":
      return [
        expr.template,
        ...expr.qualifiers.map((qualifier) => (qualifier.kind === "generator" ? qualifier.source : qualifier.expr)),
      ];
    case "map":
      return [
        ...(expr.base ? [expr.base] : []),
        ...expr.entries.flatMap((entry) => [entry.key, entry.value]),
      ];
    case "record":
      return [...(expr.base ? [expr.base] : []), ...expr.fields.map((field) => field.value)];
    case "record-field":
      return expr.base ? [expr.base] : [];
    case "remote":
      return [expr.module, expr.fn];
    case "call":
      return [expr.callee, ...expr.args];
    case "fun-ref":
      return [...(expr.module ? [expr.module] : []), expr.name, expr.arity];
    case "fun":
      return expr.clauses.flatMap((clause) => [...guardExprs(clause.guard), ...clause.body]);
    case "case":
      return [expr.subject, ...expr.clauses.flatMap((clause) => [...guardExprs(clause.guard), ...clause.body])];
    case "if":
      return expr.clauses.flatMap((clause) => [...clause.guard.flat(), ...clause.body]);
    case "receive":
      return [
        ...expr.clauses.flatMap((clause) => [...guardExprs(clause.guard), ...clause.body]),
        ...(expr.after ? [expr.after.timeout, ...expr.after.body] : []),
      ];
    case "try":
      return [
        ...expr.body,
        ...expr.ofClauses.flatMap((clause) => [...guardExprs(clause.guard), ...clause.body]),
        ...expr.catchClauses.flatMap((clause) => [...guardExprs(clause.guard), ...clause.body]),
        ...(expr.after ?? []),
      ];
    case "block":
      return expr.body;
    case "catch":
      return [expr.expr];
    case "match":
      return [expr.value];
    case "send":
      return [expr.destination, expr.message];
    case "binary-op":
      return [expr.left, expr.right];
    case "unary-op":
      return [expr.operand];
  }
}
