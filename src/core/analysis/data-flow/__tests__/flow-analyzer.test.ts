/**
 * Variable Flow Analyzer Tests
 *
 * Sources below declare a single function with no attributes, so node token
 * indices equal positions within the function.
 */

import { describe, it, expect } from "vitest";
import { ErrorCode } from "../../../errors.js";
import { groupClauses, type ClauseGroup } from "../../../grouping/clause-grouper.js";
import { parseSource } from "../../../parser/index.js";
import { VariableFlowAnalyzer, analyzeGroup, normalizeEdges } from "../flow-analyzer.js";
import { createFlowEdge, type FlowGraph, type FlowNode } from "../interfaces.js";

function groupOf(source: string): ClauseGroup {
  const { groups } = groupClauses("sample", parseSource(source).functions);
  const [group] = groups;
  if (!group) throw new Error("expected one clause group");
  return group;
}

function tokenOf(graph: FlowGraph, id: number): number {
  const node: FlowNode | undefined = graph.nodes[id];
  if (!node) throw new Error(`unknown node ${id}`);
  return node.tokenIndex;
}

function pairs(graph: FlowGraph, approximate = false): Array<[number, number]> {
  return graph.edges
    .filter((edge) => edge.approximate === approximate)
    .map((edge): [number, number] => [tokenOf(graph, edge.source), tokenOf(graph, edge.target)]);
}

describe("VariableFlowAnalyzer", () => {
  // ===========================================================================
  // Clauses and guards
  // ===========================================================================
  describe("clauses", () => {
    it("should link parameters to guard and body reads within each clause", () => {
      const graph = analyzeGroup(groupOf("max(A, B) when A > B -> A; max(A, B) -> B."));

      expect(pairs(graph)).toEqual([
        [2, 7],
        [2, 11],
        [4, 9],
        [17, 20],
      ]);
      expect(graph.edges.map((edge) => edge.kind)).toEqual(["guard", "body", "guard", "body"]);
      expect(graph.scopeErrors).toEqual([]);
    });

    it("should keep clauses independent", () => {
      const graph = analyzeGroup(groupOf("max(A, B) when A > B -> A; max(A, B) -> B."));

      for (const edge of graph.edges) {
        expect(graph.nodes[edge.source]?.clauseIndex).toBe(graph.nodes[edge.target]?.clauseIndex);
      }
    });

    it("should create no occurrences for wildcards and literals", () => {
      const graph = analyzeGroup(groupOf("divide(A, B) when B =/= 0 -> A / B; divide(_, 0) -> error."));

      expect(pairs(graph)).toEqual([
        [2, 11],
        [4, 7],
        [4, 13],
      ]);
      expect(graph.nodes.filter((node) => node.clauseIndex === 1)).toEqual([]);
    });

    it("should number nodes in creation order", () => {
      const graph = analyzeGroup(groupOf("max(A, B) when A > B -> A; max(A, B) -> B."));

      expect(graph.nodes.map((node) => node.id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
      expect(graph.nodes.slice(0, 5).map((node) => (node.kind === "variable" ? node.role : node.kind))).toEqual([
        "bound-in-pattern",
        "bound-in-pattern",
        "read-in-guard",
        "read-in-guard",
        "read-in-body",
      ]);
    });
  });

  // ===========================================================================
  // Patterns
  // ===========================================================================
  describe("patterns", () => {
    it("should destructure a tuple parameter through its match-input", () => {
      const graph = analyzeGroup(groupOf("handle({update, NewState}) -> NewState."));

      expect(pairs(graph)).toEqual([
        [2, 5],
        [5, 9],
      ]);
      expect(graph.edges.map((edge) => edge.kind)).toEqual(["destructure", "body"]);
      expect(graph.nodes[0]).toMatchObject({ kind: "match-input", pattern: "tuple", tokenIndex: 2 });
      expect(graph.nodes.filter((node) => node.kind === "variable" && node.role === "bound-in-pattern")).toHaveLength(1);
    });

    it("should link a match's right-hand side to its pattern", () => {
      const graph = analyzeGroup(groupOf("m(A) -> B = A, B."));

      expect(pairs(graph)).toEqual([
        [2, 7],
        [7, 5],
        [5, 9],
      ]);
      expect(graph.edges.map((edge) => edge.kind)).toEqual(["body", "match", "body"]);
    });

    it("should treat an already bound variable in a pattern as a comparison", () => {
      const graph = analyzeGroup(groupOf("k(X) -> {X, Y} = g(), Y."));

      expect(pairs(graph)).toEqual([
        [2, 6],
        [5, 6],
        [5, 8],
        [8, 15],
      ]);
      expect(graph.nodes[2]).toMatchObject({ kind: "variable", name: "X", role: "matched-in-pattern" });
    });

    it("should rebind names in fun heads instead of matching them", () => {
      const graph = analyzeGroup(groupOf("s(X) -> F = fun(X) -> X end, F(X)."));

      expect(pairs(graph)).toEqual([
        [2, 17],
        [9, 12],
        [12, 5],
        [5, 15],
      ]);
    });

    it("should let fun bodies read outer names without exporting their own", () => {
      const graph = analyzeGroup(groupOf("s(X) -> F = fun(Y) -> X + Y end, F(Y)."));

      expect(pairs(graph)).toEqual([
        [2, 12],
        [9, 14],
        [12, 5],
        [14, 5],
        [5, 17],
      ]);
      expect(graph.scopeErrors.map((error) => [error.variable, error.tokenIndex])).toEqual([["Y", 19]]);
    });

    it("should follow nested destructuring", () => {
      const graph = analyzeGroup(groupOf("n({a, {b, C}}) -> C."));

      expect(pairs(graph)).toEqual([
        [2, 5],
        [5, 8],
        [8, 13],
      ]);
      expect(graph.edges.map((edge) => edge.kind)).toEqual(["destructure", "destructure", "body"]);
    });

    it("should scope comprehension generators to the comprehension", () => {
      const graph = analyzeGroup(groupOf("c(L) -> [X || X <- L, X > 0], X."));

      expect(pairs(graph)).toEqual([
        [2, 10],
        [8, 12],
        [8, 6],
      ]);
      expect(graph.scopeErrors.map((error) => [error.variable, error.tokenIndex])).toEqual([["X", 17]]);
    });

    it("should keep try and catch bindings inside the try", () => {
      const graph = analyzeGroup(groupOf("t(X) -> try g(X) of Y -> Y catch error:R -> {X, R} end, Y."));

      expect(pairs(graph)).toEqual([
        [2, 8],
        [2, 20],
        [11, 13],
        [17, 22],
      ]);
      expect(graph.scopeErrors.map((error) => [error.variable, error.tokenIndex])).toEqual([["Y", 26]]);
    });

    it("should report a guard read with no binding", () => {
      const graph = analyzeGroup(groupOf("f(A) when B > 0 -> A."));

      expect(pairs(graph)).toEqual([[2, 9]]);
      expect(graph.scopeErrors).toHaveLength(1);
      expect(graph.scopeErrors[0]).toMatchObject({ variable: "B", tokenIndex: 5 });
    });

    it("should not read the anonymous variable in macro arguments", () => {
      const graph = analyzeGroup(groupOf("t(V) -> ?assertMatch({ok, _}, V)."));

      expect(pairs(graph)).toEqual([[2, 14]]);
      expect(graph.scopeErrors).toEqual([]);
    });
  });

  // ===========================================================================
  // Branches
  // ===========================================================================
  describe("branches", () => {
    it("should keep receive branch bindings apart", () => {
      const graph = analyzeGroup(groupOf("f() -> receive {a, X} -> ok; {b, Y} -> X end."));

      expect(pairs(graph)).toEqual([
        [5, 8],
        [13, 16],
      ]);
      expect(graph.scopeErrors).toHaveLength(1);

      const [error] = graph.scopeErrors;
      expect(error?.code).toBe(ErrorCode.ANALYSIS_UNBOUND_VARIABLE);
      expect(error?.message).toBe("Variable 'X' is unbound");
      expect(error?.variable).toBe("X");
      expect(error?.tokenIndex).toBe(19);
      expect(error?.severity).toBe("warning");
    });

    it("should export a name bound in every case branch", () => {
      const graph = analyzeGroup(groupOf("g(V) -> case V of 1 -> R = a; _ -> R = b end, R."));

      expect(pairs(graph)).toEqual([
        [2, 6],
        [10, 21],
        [16, 21],
      ]);
      expect(graph.scopeErrors).toEqual([]);
    });

    it("should not export a name bound in only some branches", () => {
      const graph = analyzeGroup(groupOf("h(V) -> case V of 1 -> R = a; _ -> ok end, R."));

      expect(graph.scopeErrors.map((error) => error.variable)).toEqual(["R"]);
    });
  });

  // ===========================================================================
  // Messages
  // ===========================================================================
  describe("messages", () => {
    it("should link a message sent to self to the matching receive pattern", () => {
      const graph = analyzeGroup(groupOf("ping(V) -> self() ! {msg, V}, receive {msg, R} -> R end."));

      expect(pairs(graph)).toEqual([
        [2, 12],
        [12, 19],
        [16, 19],
        [19, 22],
      ]);
      expect(graph.edges[1]?.kind).toBe("message");
      expect(graph.nodes[3]).toMatchObject({ name: "R", role: "received-in-pattern" });
    });

    it("should link messages sent through a name bound to self", () => {
      const graph = analyzeGroup(groupOf("p(V) -> Me = self(), Me ! {msg, V}, receive {msg, R} -> R end."));
      const message = graph.edges.filter((edge) => edge.kind === "message");

      expect(message.map((edge) => [tokenOf(graph, edge.source), tokenOf(graph, edge.target)])).toEqual([[16, 23]]);
    });

    it("should not treat a name bound to self in another clause as self", () => {
      const graph = analyzeGroup(
        groupOf("f(a, _) -> Me = self(), Me; f(Me, V) -> Me ! {msg, V}, receive {msg, R} -> R end.")
      );

      expect(graph.edges.some((edge) => edge.kind === "message")).toBe(false);
      expect(graph.scopeErrors).toEqual([]);
    });

    it("should not link messages sent to other processes", () => {
      const graph = analyzeGroup(groupOf("pong(P, V) -> P ! {msg, V}, receive {msg, R} -> R end."));

      expect(graph.edges.some((edge) => edge.kind === "message")).toBe(false);
    });

    it("should not link messages whose shape cannot match", () => {
      const graph = analyzeGroup(groupOf("ping(V) -> self() ! {other, V}, receive {msg, R} -> R end."));

      expect(graph.edges.some((edge) => edge.kind === "message")).toBe(false);
    });
  });

  // ===========================================================================
  // Recursive calls
  // ===========================================================================
  describe("recursive calls", () => {
    const source = "count(N) when N > 0 -> count(N - 1); count(_) -> done.";

    it("should link tail self-call arguments to parameters as approximate edges", () => {
      const graph = new VariableFlowAnalyzer({ includeApproximateEdges: true }).analyze(groupOf(source));

      expect(pairs(graph)).toEqual([
        [2, 5],
        [2, 11],
      ]);
      expect(pairs(graph, true)).toEqual([[11, 2]]);
      expect(graph.edges.find((edge) => edge.approximate)?.kind).toBe("recursive-call");
    });

    it("should leave out approximate edges by default", () => {
      const graph = analyzeGroup(groupOf(source));

      expect(pairs(graph, true)).toEqual([]);
    });
  });
});

describe("normalizeEdges", () => {
  it("should sort by source then target and drop duplicates", () => {
    const edges = normalizeEdges([
      createFlowEdge(2, 1, "body"),
      createFlowEdge(0, 3, "body"),
      createFlowEdge(0, 1, "guard"),
      createFlowEdge(0, 3, "match"),
    ]);

    expect(edges.map((edge) => [edge.source, edge.target, edge.kind])).toEqual([
      [0, 1, "guard"],
      [0, 3, "body"],
      [2, 1, "body"],
    ]);
  });

  it("should prefer an exact edge over an approximate one for the same pair", () => {
    const edges = normalizeEdges([createFlowEdge(1, 0, "recursive-call"), createFlowEdge(1, 0, "body")]);

    expect(edges).toEqual([{ source: 1, target: 0, kind: "body", approximate: false }]);
  });
});
