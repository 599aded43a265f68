/**
 * Erlang syntax tree.
 *
 * Expressions and patterns are separate unions: the parser reads both with
 * the expression grammar and converts pattern positions (clause heads, match
 * left-hand sides, generator heads) into `Pattern` nodes. Every node keeps its
 * anchor token so later stages can map occurrences back to token indices.
 *
 * @module
 */

import type { Token } from "./tokens.js";

// =============================================================================
// Patterns
// =============================================================================

export interface VarPattern {
  kind: "var";
  name: string;
  token: Token;
}

export interface WildcardPattern {
  kind: "wildcard";
  token: Token;
}

/** Atom, number, char, string, macro or record index in pattern position */
export interface LiteralPattern {
  kind: "literal";
  /** Normalized value used to compare literals (e.g. `atom:ok`, `integer:0`) */
  value: string;
  token: Token;
}

export interface TuplePattern {
  kind: "tuple";
  token: Token;
  elements: Pattern[];
}

export interface ListPattern {
  kind: "list";
  token: Token;
  elements: Pattern[];
  tail: Pattern | null;
}

export interface MapPatternEntry {
  key: Expr;
  value: Pattern;
}

export interface MapPattern {
  kind: "map";
  token: Token;
  entries: MapPatternEntry[];
}

export interface RecordPatternField {
  name: string;
  value: Pattern;
}

export interface RecordPattern {
  kind: "record";
  token: Token;
  record: string;
  fields: RecordPatternField[];
}

export interface BinaryPatternSegment {
  value: Pattern;
  size: Expr | null;
}

export interface BinaryPattern {
  kind: "binary";
  token: Token;
  segments: BinaryPatternSegment[];
}

/** `P1 = P2` inside a pattern: both sides match the same value */
export interface AliasPattern {
  kind: "alias";
  token: Token;
  left: Pattern;
  right: Pattern;
}

/** `"prefix" ++ Tail` */
export interface StringPrefixPattern {
  kind: "string-prefix";
  token: Token;
  prefix: string;
  tail: Pattern;
}

export type CompoundPattern =
  | TuplePattern
  | ListPattern
  | MapPattern
  | RecordPattern
  | BinaryPattern;

export type Pattern =
  | VarPattern
  | WildcardPattern
  | LiteralPattern
  | CompoundPattern
  | AliasPattern
  | StringPrefixPattern;

// =============================================================================
// Guards
// =============================================================================

/** Disjunction (`;`) of conjunctions (`,`) of guard tests */
export type Guard = Expr[][];

// =============================================================================
// Expressions
// =============================================================================

export interface VarExpr {
  kind: "var";
  name: string;
  token: Token;
}

export interface AtomExpr {
  kind: "atom";
  name: string;
  token: Token;
}

export type LiteralKind = "integer" | "float" | "char" | "string";

export interface LiteralExpr {
  kind: "literal";
  literalKind: LiteralKind;
  /** Adjacent string literals are one expression spanning several tokens */
  tokens: Token[];
  token: Token;
}

export interface TupleExpr {
  kind: "tuple";
  token: Token;
  elements: Expr[];
}

export interface ListExpr {
  kind: "list";
  token: Token;
  elements: Expr[];
  tail: Expr | null;
}

export interface BinarySegment {
  value: Expr;
  size: Expr | null;
  types: string[];
}

export interface BinaryExpr {
  kind: "binary";
  token: Token;
  segments: BinarySegment[];
}

export interface GeneratorQualifier {
  kind: "generator";
  /** `<=` generators walk a binary */
  binary: boolean;
  pattern: Pattern;
  source: Expr;
}

export interface FilterQualifier {
  kind: "filter";
  expr: Expr;
}

export type Qualifier = GeneratorQualifier | FilterQualifier;

export interface ComprehensionExpr {
  kind: "list-comprehension" | "binary-comprehension";
  token: Token;
  template: Expr;
  qualifiers: Qualifier[];
}

export interface MapEntry {
  key: Expr;
  op: "=>" | ":=";
  value: Expr;
}

export interface MapExpr {
  kind: "map";
  token: Token;
  /** Map being updated (`M#{...}`), or null for construction */
  base: Expr | null;
  entries: MapEntry[];
}

export interface RecordField {
  name: string;
  value: Expr;
}

export interface RecordExpr {
  kind: "record";
  token: Token;
  base: Expr | null;
  record: string;
  fields: RecordField[];
}

/** `R#rec.field`, or `#rec.field` (field index) when base is null */
export interface RecordFieldExpr {
  kind: "record-field";
  token: Token;
  base: Expr | null;
  record: string;
  field: string;
}

export interface RemoteExpr {
  kind: "remote";
  token: Token;
  module: Expr;
  fn: Expr;
}

export interface CallExpr {
  kind: "call";
  token: Token;
  callee: Expr;
  args: Expr[];
}

/** `fun name/arity` or `fun Module:Name/Arity` */
export interface FunRefExpr {
  kind: "fun-ref";
  token: Token;
  module: Expr | null;
  name: Expr;
  arity: Expr;
}

export interface FunClause {
  params: Pattern[];
  guard: Guard | null;
  body: Expr[];
}

export interface FunExpr {
  kind: "fun";
  token: Token;
  /** Named funs bind their own name inside the body */
  name: VarPattern | null;
  clauses: FunClause[];
}

export interface CaseClause {
  pattern: Pattern;
  guard: Guard | null;
  body: Expr[];
}

export interface CaseExpr {
  kind: "case";
  token: Token;
  subject: Expr;
  clauses: CaseClause[];
}

export interface IfClause {
  guard: Guard;
  body: Expr[];
}

export interface IfExpr {
  kind: "if";
  token: Token;
  clauses: IfClause[];
}

export interface ReceiveAfter {
  timeout: Expr;
  body: Expr[];
}

export interface ReceiveExpr {
  kind: "receive";
  token: Token;
  clauses: CaseClause[];
  after: ReceiveAfter | null;
}

export interface CatchClause {
  exceptionClass: Pattern | null;
  pattern: Pattern;
  stacktrace: VarPattern | null;
  guard: Guard | null;
  body: Expr[];
}

export interface TryExpr {
  kind: "try";
  token: Token;
  body: Expr[];
  ofClauses: CaseClause[];
  catchClauses: CatchClause[];
  after: Expr[] | null;
}

export interface BlockExpr {
  kind: "block";
  token: Token;
  body: Expr[];
}

export interface CatchExpr {
  kind: "catch";
  token: Token;
  expr: Expr;
}

export interface MatchExpr {
  kind: "match";
  token: Token;
  pattern: Pattern;
  value: Expr;
}

/** `Destination ! Message` */
export interface SendExpr {
  kind: "send";
  token: Token;
  destination: Expr;
  message: Expr;
}

export interface BinaryOpExpr {
  kind: "binary-op";
  token: Token;
  op: string;
  left: Expr;
  right: Expr;
}

export interface UnaryOpExpr {
  kind: "unary-op";
  token: Token;
  op: string;
  operand: Expr;
}

export interface MacroExpr {
  kind: "macro";
  token: Token;
  name: string;
  args: Expr[] | null;
}

export type Expr =
  | VarExpr
  | AtomExpr
  | LiteralExpr
  | TupleExpr
  | ListExpr
  | BinaryExpr
  | ComprehensionExpr
  | MapExpr
  | RecordExpr
  | RecordFieldExpr
  | RemoteExpr
  | CallExpr
  | FunRefExpr
  | FunExpr
  | CaseExpr
  | IfExpr
  | ReceiveExpr
  | TryExpr
  | BlockExpr
  | CatchExpr
  | MatchExpr
  | SendExpr
  | BinaryOpExpr
  | UnaryOpExpr
  | MacroExpr;

// =============================================================================
// Top-level forms
// =============================================================================

export interface FunctionClause {
  name: string;
  nameToken: Token;
  params: Pattern[];
  guard: Guard | null;
  body: Expr[];
  /** First token of the clause (its name) */
  firstToken: Token;
  /** Last token of the clause body */
  lastToken: Token;
  /** The `;` or `.` that ends the clause */
  terminator: Token;
}

export interface FunctionForm {
  kind: "function";
  clauses: FunctionClause[];
}

export interface ExportedFunction {
  name: string;
  arity: number;
}

export interface SyntaxTree {
  /** Module name from `-module(...)`, or null when the attribute is missing */
  module: string | null;
  exports: ExportedFunction[];
  functions: FunctionForm[];
  tokens: Token[];
  source: string;
}
