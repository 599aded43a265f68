/**
 * Record Assembler Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { analyzeGroup } from "../../analysis/data-flow/flow-analyzer.js";
import { createFlowEdge, createVariableNode, type FlowGraph } from "../../analysis/data-flow/interfaces.js";
import { ConfigurationError, EmptyClauseGroupError, RecordValidationError } from "../../errors.js";
import { groupClauses, type ClauseGroup } from "../../grouping/clause-grouper.js";
import { parseSource } from "../../parser/index.js";
import type { SyntaxTree } from "../../parser/ast.js";
import type { SourceFile } from "../../../types/index.js";
import { EmptyDocumentationProvider, JsonDocumentationProvider, documentationKey } from "../documentation.js";
import { RecordAssembler, type AssembleInput } from "../record-assembler.js";

const SOURCE = "-module(cmp).\n\nmax(A, B) when A > B -> A;\nmax(A, B) -> B.\n";

function fixture(): { file: SourceFile; tree: SyntaxTree; group: ClauseGroup } {
  const tree = parseSource(SOURCE);
  const file: SourceFile = { path: "/repo/src/cmp.erl", relativePath: "src/cmp.erl", content: SOURCE, module: "cmp" };
  const [group] = groupClauses("cmp", tree.functions).groups;
  if (!group) throw new Error("expected a clause group");
  return { file, tree, group };
}

function input(overrides: Partial<AssembleInput> = {}): AssembleInput {
  const { file, tree, group } = fixture();
  return {
    file,
    tokens: tree.tokens,
    group,
    graph: analyzeGroup(group),
    docstring: "",
    ...overrides,
  };
}

describe("RecordAssembler", () => {
  it("should assemble a record spanning the whole clause group", () => {
    const record = new RecordAssembler().assemble(input({ docstring: "Larger of two terms." }));

    expect(record).toEqual({
      idx: "cmp:max/2",
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
    });
  });

  it("should leave directives between clauses out of the record", () => {
    const source = "-module(cfg).\n-ifdef(T).\nk(X) -> X.\n-else.\nk(Y) -> Y.\n-endif.\n";
    const tree = parseSource(source);
    const [group] = groupClauses("cfg", tree.functions).groups;
    if (!group) throw new Error("expected a clause group");
    const file: SourceFile = { path: "/repo/src/cfg.erl", relativePath: "src/cfg.erl", content: source, module: "cfg" };

    const record = new RecordAssembler().assemble({
      file,
      tokens: tree.tokens,
      group,
      graph: analyzeGroup(group),
      docstring: "",
    });

    expect(group.clauses).toHaveLength(2);
    expect(record.url).toBe("src/cfg.erl#L3-L5");
    expect(record.code).toBe("k(X) -> X.\nk(Y) -> Y.");
    expect(record.code_tokens).toEqual(["k", "(", "X", ")", "->", "X", ".", "k", "(", "Y", ")", "->", "Y", "."]);
    expect(record.dfg).toEqual([
      [2, 5],
      [9, 12],
    ]);
  });

  it("should prefix ids and build links from repository settings", () => {
    const assembler = new RecordAssembler({
      repositoryName: "demo",
      repositoryUrl: "https://git.example.com/demo/",
      repositoryRef: "v1.2.0",
    });
    const record = assembler.assemble(input());

    expect(record.idx).toBe("demo:cmp:max/2");
    expect(record.url).toBe("https://git.example.com/demo/blob/v1.2.0/src/cmp.erl#L3-L4");
  });

  it("should add dfg_approximate only when enabled", () => {
    expect(new RecordAssembler().assemble(input())).not.toHaveProperty("dfg_approximate");
    expect(new RecordAssembler({ includeApproximateEdges: true }).assemble(input()).dfg_approximate).toEqual([]);
  });

  it("should drop repeated token pairs", () => {
    const { group } = fixture();
    const graph: FlowGraph = {
      nodes: [
        createVariableNode(0, "A", "bound-in-pattern", 8, 0),
        createVariableNode(1, "A", "read-in-guard", 13, 0),
        createVariableNode(2, "A", "read-in-guard", 13, 0),
      ],
      edges: [createFlowEdge(0, 1, "guard"), createFlowEdge(0, 2, "guard")],
      scopeErrors: [],
    };

    expect(new RecordAssembler().assemble(input({ group, graph })).dfg).toEqual([[2, 7]]);
  });

  it("should reject edges whose tokens are outside the clause group", () => {
    const graph: FlowGraph = {
      nodes: [
        createVariableNode(0, "X", "bound-in-pattern", 500, 0),
        createVariableNode(1, "X", "read-in-body", 6, 0),
      ],
      edges: [createFlowEdge(0, 1, "body")],
      scopeErrors: [],
    };

    expect(() => new RecordAssembler().assemble(input({ graph }))).toThrow(RecordValidationError);
    expect(() => new RecordAssembler().assemble(input({ graph }))).toThrow(
      "Record cmp:max/2 failed validation: dfg.0.0: Number must be greater than or equal to 0"
    );
  });

  it("should reject an empty clause group", () => {
    const { group } = fixture();
    const empty: ClauseGroup = { ...group, clauses: [] };

    expect(() => new RecordAssembler().assemble(input({ group: empty }))).toThrow(EmptyClauseGroupError);
  });
});

describe("documentation providers", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "documentation-test-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should return nothing from the empty provider", () => {
    expect(new EmptyDocumentationProvider().getDocumentation()).toBeUndefined();
  });

  it("should look up docs by module, name and arity", async () => {
    const filePath = path.join(tempDir, "docs.json");
    await fs.writeFile(filePath, JSON.stringify({ "cmp:max/2": "Larger of two terms." }));

    const provider = JsonDocumentationProvider.fromFile(filePath);

    expect(provider.getDocumentation("cmp", "max", 2)).toBe("Larger of two terms.");
    expect(provider.getDocumentation("cmp", "max", 3)).toBeUndefined();
    expect(documentationKey("cmp", "max", 2)).toBe("cmp:max/2");
  });

  it("should reject malformed keys", async () => {
    const filePath = path.join(tempDir, "bad-docs.json");
    await fs.writeFile(filePath, JSON.stringify({ nokey: "text" }));

    let caught: unknown;
    try {
      JsonDocumentationProvider.fromFile(filePath);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toEqual(["nokey: key must be module:name/arity"]);
  });

  it("should reject unreadable files", () => {
    expect(() => JsonDocumentationProvider.fromFile(path.join(tempDir, "missing.json"))).toThrow(ConfigurationError);
  });
});
