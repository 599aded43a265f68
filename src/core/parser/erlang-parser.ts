/**
 * Erlang Parser
 *
 * Recursive-descent parser over the lexer's token stream. Recovers the
 * `-module` and `-export` attributes and every function form; all other
 * attributes and preprocessor directives are skipped up to their terminator.
 *
 * Operator precedence, loosest first:
 *
 * | Level | Operators | Associativity |
 * |-------|-----------|---------------|
 * | catch | `catch` | prefix |
 * | match | `=` `!` | right |
 * | 1 | `orelse` | right |
 * | 2 | `andalso` | right |
 * | 3 | `==` `/=` `=<` `<` `>=` `>` `=:=` `=/=` | none |
 * | 4 | `++` `--` | right |
 * | 5 | `+` `-` `bor` `bxor` `bsl` `bsr` `or` `xor` | left |
 * | 6 | `/` `*` `div` `rem` `band` `and` | left |
 * | prefix | `+` `-` `bnot` `not` | prefix |
 * | postfix | `#` `(...)` | left |
 * | remote | `:` | none |
 *
 * @module
 */

import { ErrorCode, ParseError } from "../errors.js";
import type {
  BinaryExpr,
  BinarySegment,
  CaseClause,
  CatchClause,
  ComprehensionExpr,
  ExportedFunction,
  Expr,
  FunClause,
  FunctionClause,
  FunctionForm,
  Guard,
  IfClause,
  LiteralExpr,
  MapEntry,
  Pattern,
  Qualifier,
  ReceiveAfter,
  RecordField,
  VarPattern,
} from "./ast.js";
import { toPattern } from "./patterns.js";
import { atomValue, describeToken, isKeyword, isPunct, type Token } from "./tokens.js";

type Associativity = "left" | "right" | "none";

interface OperatorLevel {
  ops: ReadonlySet<string>;
  assoc: Associativity;
}

const BINARY_LEVELS: readonly OperatorLevel[] = [
  { ops: new Set(["orelse"]), assoc: "right" },
  { ops: new Set(["andalso"]), assoc: "right" },
  { ops: new Set(["==", "/=", "=<", "<", ">=", ">", "=:=", "=/="]), assoc: "none" },
  { ops: new Set(["++", "--"]), assoc: "right" },
  { ops: new Set(["+", "-", "bor", "bxor", "bsl", "bsr", "or", "xor"]), assoc: "left" },
  { ops: new Set(["/", "*", "div", "rem", "band", "and"]), assoc: "left" },
];

const PREFIX_OPS: ReadonlySet<string> = new Set(["+", "-", "bnot", "not"]);

/** Token kinds that cannot follow a plain atom, signalling a `maybe` block */
const MAYBE_FOLLOWERS: ReadonlySet<string> = new Set(["var", "atom", "integer", "float", "char", "string"]);

/**
 * Top-level result of parsing one token stream.
 */
export interface ParsedForms {
  module: string | null;
  exports: ExportedFunction[];
  functions: FunctionForm[];
}

type Attribute =
  | { kind: "module"; name: string }
  | { kind: "export"; functions: ExportedFunction[] }
  | { kind: "other" };

export class ErlangParser {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  /**
   * Parses every form in the token stream.
   *
   * @throws ParseError on the first malformed form
   */
  parse(): ParsedForms {
    let module: string | null = null;
    const exports: ExportedFunction[] = [];
    const functions: FunctionForm[] = [];

    while (this.peek() !== undefined) {
      if (isPunct(this.peek(), "-")) {
        const attribute = this.parseAttribute();
        if (attribute.kind === "module") {
          module = attribute.name;
        } else if (attribute.kind === "export") {
          exports.push(...attribute.functions);
        }
      } else {
        functions.push(this.parseFunctionForm());
      }
    }

    return { module, exports, functions };
  }

  // ===========================================================================
  // Attributes
  // ===========================================================================

  private parseAttribute(): Attribute {
    this.expectPunct("-");
    const nameToken = this.peek();
    if (!nameToken || (nameToken.kind !== "atom" && nameToken.kind !== "keyword")) {
      throw this.unexpected(nameToken, "attribute name");
    }
    this.advance();

    if (nameToken.text === "module") {
      this.expectPunct("(");
      const moduleToken = this.expectKind("atom", "module name");
      this.skipToDot();
      return { kind: "module", name: atomValue(moduleToken) };
    }

    if (nameToken.text === "export") {
      this.expectPunct("(");
      this.expectPunct("[");
      const functions: ExportedFunction[] = [];
      if (!this.acceptPunct("]")) {
        do {
          const fnToken = this.expectKind("atom", "function name");
          this.expectPunct("/");
          const arityToken = this.expectKind("integer", "arity");
          functions.push({ name: atomValue(fnToken), arity: Number.parseInt(arityToken.text, 10) });
        } while (this.acceptPunct(","));
        this.expectPunct("]");
      }
      this.expectPunct(")");
      this.expectDot("attribute");
      return { kind: "export", functions };
    }

    this.skipToDot();
    return { kind: "other" };
  }

  private skipToDot(): void {
    for (;;) {
      const token = this.peek();
      if (!token) {
        throw this.endOfInput("Unterminated attribute, expected '.'");
      }
      this.advance();
      if (token.kind === "dot") return;
    }
  }

  // ===========================================================================
  // Function forms
  // ===========================================================================

  private parseFunctionForm(): FunctionForm {
    const clauses: FunctionClause[] = [];

    for (;;) {
      const head = this.parseFunctionClause();
      const [first] = clauses;
      if (first && (head.name !== first.name || head.params.length !== first.params.length)) {
        throw this.error(
          head.nameToken,
          `Head mismatch: clause ${head.name}/${head.params.length} in function ${first.name}/${first.params.length}`,
          ErrorCode.PARSE_HEAD_MISMATCH
        );
      }
      const terminator = this.peek();
      if (!terminator) {
        throw this.endOfInput(`Unterminated function clause '${head.name}', expected '.'`);
      }
      if (terminator.kind === "dot" || isPunct(terminator, ";")) {
        this.advance();
        clauses.push({ ...head, terminator });
        if (terminator.kind === "dot") return { kind: "function", clauses };
        continue;
      }
      throw this.unexpected(terminator, "';' or '.'");
    }
  }

  private parseFunctionClause(): Omit<FunctionClause, "terminator"> {
    const nameToken = this.expectKind("atom", "function name");
    const params = this.parseParams();
    const guard = this.parseOptionalGuard();
    this.expectPunct("->");
    const body = this.parseExprs();

    return {
      name: atomValue(nameToken),
      nameToken,
      params,
      guard,
      body,
      firstToken: nameToken,
      lastToken: this.previous(),
    };
  }

  private parseParams(): Pattern[] {
    this.expectPunct("(");
    if (this.acceptPunct(")")) return [];
    const params = this.parseExprs().map(toPattern);
    this.expectPunct(")");
    return params;
  }

  private parseOptionalGuard(): Guard | null {
    if (!isKeyword(this.peek(), "when")) return null;
    this.advance();
    return this.parseGuard();
  }

  private parseGuard(): Guard {
    const alternatives: Guard = [this.parseExprs()];
    while (this.acceptPunct(";")) {
      alternatives.push(this.parseExprs());
    }
    return alternatives;
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private parseExprs(): Expr[] {
    const exprs = [this.parseExpr()];
    while (this.acceptPunct(",")) {
      exprs.push(this.parseExpr());
    }
    return exprs;
  }

  private parseExpr(): Expr {
    const token = this.peek();
    if (token && isKeyword(token, "catch")) {
      this.advance();
      return { kind: "catch", token, expr: this.parseExpr() };
    }
    return this.parseMatchOrSend();
  }

  private parseMatchOrSend(): Expr {
    const left = this.parseBinary(0);
    const token = this.peek();

    if (token && isPunct(token, "=")) {
      this.advance();
      return { kind: "match", token, pattern: toPattern(left), value: this.parseExpr() };
    }
    if (token && isPunct(token, "!")) {
      this.advance();
      return { kind: "send", token, destination: left, message: this.parseExpr() };
    }
    return left;
  }

  private parseBinary(level: number): Expr {
    const tier = BINARY_LEVELS[level];
    if (!tier) return this.parseUnary();

    let left = this.parseBinary(level + 1);
    for (;;) {
      const token = this.peek();
      if (!token || !isOperatorToken(token) || !tier.ops.has(token.text)) return left;
      this.advance();

      const right = tier.assoc === "right" ? this.parseBinary(level) : this.parseBinary(level + 1);
      left = { kind: "binary-op", token, op: token.text, left, right };
      if (tier.assoc !== "left") return left;
    }
  }

  private parseUnary(): Expr {
    const token = this.peek();
    if (token && isOperatorToken(token) && PREFIX_OPS.has(token.text)) {
      this.advance();
      return { kind: "unary-op", token, op: token.text, operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expr {
    let expr = this.parseRemote();
    for (;;) {
      const token = this.peek();
      if (token && isPunct(token, "(")) {
        expr = { kind: "call", token, callee: expr, args: this.parseArgs() };
      } else if (token && isPunct(token, "#")) {
        this.advance();
        expr = this.parseHashSuffix(expr, token);
      } else {
        return expr;
      }
    }
  }

  private parseRemote(): Expr {
    const left = this.parsePrimary();
    const token = this.peek();
    if (token && isPunct(token, ":")) {
      this.advance();
      return { kind: "remote", token, module: left, fn: this.parsePrimary() };
    }
    return left;
  }

  private parseArgs(): Expr[] {
    this.expectPunct("(");
    if (this.acceptPunct(")")) return [];
    const args = this.parseExprs();
    this.expectPunct(")");
    return args;
  }

  /** Map and record syntax after `#`, with `base` as the updated value */
  private parseHashSuffix(base: Expr | null, hash: Token): Expr {
    if (isPunct(this.peek(), "{")) {
      return { kind: "map", token: hash, base, entries: this.parseMapEntries() };
    }

    const recordToken = this.expectKind("atom", "record name");
    const record = atomValue(recordToken);

    if (this.acceptPunct(".")) {
      const fieldToken = this.expectKind("atom", "record field");
      return { kind: "record-field", token: hash, base, record, field: atomValue(fieldToken) };
    }

    this.expectPunct("{");
    const fields: RecordField[] = [];
    if (!this.acceptPunct("}")) {
      do {
        const fieldToken = this.peek();
        if (!fieldToken || (fieldToken.kind !== "atom" && fieldToken.kind !== "var")) {
          throw this.unexpected(fieldToken, "record field");
        }
        this.advance();
        this.expectPunct("=");
        fields.push({
          name: fieldToken.kind === "atom" ? atomValue(fieldToken) : fieldToken.text,
          value: this.parseExpr(),
        });
      } while (this.acceptPunct(","));
      this.expectPunct("}");
    }
    return { kind: "record", token: hash, base, record, fields };
  }

  private parseMapEntries(): MapEntry[] {
    this.expectPunct("{");
    const entries: MapEntry[] = [];
    if (this.acceptPunct("}")) return entries;

    do {
      const key = this.parseExpr();
      const opToken = this.peek();
      let op: MapEntry["op"];
      if (isPunct(opToken, "=>")) {
        op = "=>";
      } else if (isPunct(opToken, ":=")) {
        op = ":=";
      } else {
        throw this.unexpected(opToken, "'=>' or ':='");
      }
      this.advance();
      entries.push({ key, op, value: this.parseExpr() });
    } while (this.acceptPunct(","));

    this.expectPunct("}");
    return entries;
  }

  private parsePrimary(): Expr {
    const token = this.peek();
    if (!token) {
      throw this.endOfInput("Unexpected end of input, expected an expression");
    }

    switch (token.kind) {
      case "var":
        this.advance();
        return { kind: "var", name: token.text, token };

      case "atom":
        if (token.text === "maybe" && this.isMaybeBlock()) {
          throw this.error(token, "'maybe' expressions are not supported", ErrorCode.PARSE_UNSUPPORTED);
        }
        this.advance();
        return { kind: "atom", name: atomValue(token), token };

      case "integer":
      case "float":
      case "char":
        this.advance();
        return { kind: "literal", literalKind: token.kind, tokens: [token], token };

      case "string":
        return this.parseString();

      case "keyword":
        return this.parseKeywordExpr(token);

      case "punct":
        return this.parsePunctExpr(token);

      case "dot":
        throw this.unexpected(token, "an expression");
    }
  }

  private parseString(): LiteralExpr {
    const tokens: Token[] = [];
    let token = this.peek();
    while (token && token.kind === "string") {
      tokens.push(token);
      this.advance();
      token = this.peek();
    }
    const [first] = tokens;
    if (!first) throw this.unexpected(token, "a string");
    return { kind: "literal", literalKind: "string", tokens, token: first };
  }

  private parseKeywordExpr(token: Token): Expr {
    switch (token.text) {
      case "fun":
        return this.parseFun(token);
      case "case":
        return this.parseCase(token);
      case "if":
        return this.parseIf(token);
      case "receive":
        return this.parseReceive(token);
      case "try":
        return this.parseTry(token);
      case "begin": {
        this.advance();
        const body = this.parseExprs();
        this.expectKeyword("end");
        return { kind: "block", token, body };
      }
      default:
        throw this.unexpected(token, "an expression");
    }
  }

  private parsePunctExpr(token: Token): Expr {
    switch (token.text) {
      case "(": {
        this.advance();
        const inner = this.parseExpr();
        this.expectPunct(")");
        return inner;
      }
      case "{": {
        this.advance();
        if (this.acceptPunct("}")) return { kind: "tuple", token, elements: [] };
        const elements = this.parseExprs();
        this.expectPunct("}");
        return { kind: "tuple", token, elements };
      }
      case "[":
        return this.parseList(token);
      case "<<":
        return this.parseBinaryExpr(token);
      case "#":
        this.advance();
        return this.parseHashSuffix(null, token);
      case "?":
        return this.parseMacro(token);
      default:
        throw this.unexpected(token, "an expression");
    }
  }

  private parseList(open: Token): Expr {
    this.advance();
    if (this.acceptPunct("]")) {
      return { kind: "list", token: open, elements: [], tail: null };
    }

    const first = this.parseExpr();
    if (this.acceptPunct("||")) {
      const qualifiers = this.parseQualifiers();
      this.expectPunct("]");
      return { kind: "list-comprehension", token: open, template: first, qualifiers };
    }

    const elements = [first];
    while (this.acceptPunct(",")) {
      elements.push(this.parseExpr());
    }
    const tail = this.acceptPunct("|") ? this.parseExpr() : null;
    this.expectPunct("]");
    return { kind: "list", token: open, elements, tail };
  }

  private parseQualifiers(): Qualifier[] {
    const qualifiers: Qualifier[] = [];
    do {
      const expr = this.parseExpr();
      if (this.acceptPunct("<-")) {
        qualifiers.push({ kind: "generator", binary: false, pattern: toPattern(expr), source: this.parseExpr() });
      } else if (this.acceptPunct("<=")) {
        qualifiers.push({ kind: "generator", binary: true, pattern: toPattern(expr), source: this.parseExpr() });
      } else {
        qualifiers.push({ kind: "filter", expr });
      }
    } while (this.acceptPunct(","));
    return qualifiers;
  }

  private parseBinaryExpr(open: Token): BinaryExpr | ComprehensionExpr {
    this.advance();
    if (this.acceptPunct(">>")) {
      return { kind: "binary", token: open, segments: [] };
    }

    const first = this.parseSegment();
    if (this.acceptPunct("||")) {
      const qualifiers = this.parseQualifiers();
      this.expectPunct(">>");
      return { kind: "binary-comprehension", token: open, template: first.value, qualifiers };
    }

    const segments = [first];
    while (this.acceptPunct(",")) {
      segments.push(this.parseSegment());
    }
    this.expectPunct(">>");
    return { kind: "binary", token: open, segments };
  }

  private parseSegment(): BinarySegment {
    const token = this.peek();
    let value: Expr;
    if (token && isOperatorToken(token) && PREFIX_OPS.has(token.text)) {
      this.advance();
      value = { kind: "unary-op", token, op: token.text, operand: this.parsePrimary() };
    } else {
      value = this.parsePrimary();
    }

    const size = this.acceptPunct(":") ? this.parsePrimary() : null;
    const types: string[] = [];
    if (this.acceptPunct("/")) {
      do {
        const typeToken = this.peek();
        if (!typeToken || (typeToken.kind !== "atom" && typeToken.kind !== "keyword")) {
          throw this.unexpected(typeToken, "binary type specifier");
        }
        this.advance();
        let type = typeToken.text;
        if (this.acceptPunct(":")) {
          type += `:${this.expectKind("integer", "unit size").text}`;
        }
        types.push(type);
      } while (this.acceptPunct("-"));
    }
    return { value, size, types };
  }

  private parseMacro(question: Token): Expr {
    this.advance();
    const nameToken = this.peek();
    if (isPunct(nameToken, "=")) {
      throw this.error(question, "'maybe' expressions are not supported", ErrorCode.PARSE_UNSUPPORTED);
    }
    if (!nameToken || (nameToken.kind !== "atom" && nameToken.kind !== "var")) {
      throw this.unexpected(nameToken, "macro name");
    }
    this.advance();
    const args = isPunct(this.peek(), "(") ? this.parseArgs() : null;
    return { kind: "macro", token: question, name: nameToken.text, args };
  }

  // ===========================================================================
  // Compound expressions
  // ===========================================================================

  private parseFun(funToken: Token): Expr {
    this.advance();
    const next = this.peek();

    if (isPunct(next, "(")) {
      return { kind: "fun", token: funToken, name: null, clauses: this.parseFunClauses(null) };
    }

    if (next && next.kind === "var" && isPunct(this.peekAt(1), "(")) {
      const name: VarPattern = { kind: "var", name: next.text, token: next };
      return { kind: "fun", token: funToken, name, clauses: this.parseFunClauses(next.text) };
    }

    // fun name/arity, fun Module:Name/Arity
    const first = this.parsePrimary();
    let module: Expr | null = null;
    let name = first;
    if (this.acceptPunct(":")) {
      module = first;
      name = this.parsePrimary();
    }
    this.expectPunct("/");
    const arity = this.parsePrimary();
    return { kind: "fun-ref", token: funToken, module, name, arity };
  }

  private parseFunClauses(name: string | null): FunClause[] {
    const clauses: FunClause[] = [];
    do {
      if (name !== null) {
        const nameToken = this.expectKind("var", "fun name");
        if (nameToken.text !== name) {
          throw this.error(nameToken, `Fun clause name '${nameToken.text}' does not match '${name}'`);
        }
      }
      const params = this.parseParams();
      const guard = this.parseOptionalGuard();
      this.expectPunct("->");
      clauses.push({ params, guard, body: this.parseExprs() });
    } while (this.acceptPunct(";"));
    this.expectKeyword("end");
    return clauses;
  }

  private parseCase(caseToken: Token): Expr {
    this.advance();
    const subject = this.parseExpr();
    this.expectKeyword("of");
    const clauses = this.parseCaseClauses();
    this.expectKeyword("end");
    return { kind: "case", token: caseToken, subject, clauses };
  }

  private parseCaseClauses(): CaseClause[] {
    const clauses: CaseClause[] = [];
    do {
      const pattern = toPattern(this.parseExpr());
      const guard = this.parseOptionalGuard();
      this.expectPunct("->");
      clauses.push({ pattern, guard, body: this.parseExprs() });
    } while (this.acceptPunct(";"));
    return clauses;
  }

  private parseIf(ifToken: Token): Expr {
    this.advance();
    const clauses: IfClause[] = [];
    do {
      const guard = this.parseGuard();
      this.expectPunct("->");
      clauses.push({ guard, body: this.parseExprs() });
    } while (this.acceptPunct(";"));
    this.expectKeyword("end");
    return { kind: "if", token: ifToken, clauses };
  }

  private parseReceive(receiveToken: Token): Expr {
    this.advance();
    const next = this.peek();
    const clauses =
      isKeyword(next, "after") || isKeyword(next, "end") ? [] : this.parseCaseClauses();

    let after: ReceiveAfter | null = null;
    if (isKeyword(this.peek(), "after")) {
      this.advance();
      const timeout = this.parseExpr();
      this.expectPunct("->");
      after = { timeout, body: this.parseExprs() };
    }
    this.expectKeyword("end");
    return { kind: "receive", token: receiveToken, clauses, after };
  }

  private parseTry(tryToken: Token): Expr {
    this.advance();
    const body = this.parseExprs();

    let ofClauses: CaseClause[] = [];
    if (isKeyword(this.peek(), "of")) {
      this.advance();
      ofClauses = this.parseCaseClauses();
    }

    const catchClauses: CatchClause[] = [];
    if (isKeyword(this.peek(), "catch")) {
      this.advance();
      do {
        catchClauses.push(this.parseCatchClause());
      } while (this.acceptPunct(";"));
    }

    let after: Expr[] | null = null;
    if (isKeyword(this.peek(), "after")) {
      this.advance();
      after = this.parseExprs();
    }

    if (catchClauses.length === 0 && after === null) {
      throw this.unexpected(this.peek(), "'catch' or 'after'");
    }
    this.expectKeyword("end");
    return { kind: "try", token: tryToken, body, ofClauses, catchClauses, after };
  }

  private parseCatchClause(): CatchClause {
    const head = this.parseExpr();
    let exceptionClass: Pattern | null = null;
    let pattern: Pattern;

    if (head.kind === "remote") {
      exceptionClass = toPattern(head.module);
      pattern = toPattern(head.fn);
    } else {
      pattern = toPattern(head);
    }

    let stacktrace: VarPattern | null = null;
    if (this.acceptPunct(":")) {
      const stackToken = this.expectKind("var", "stacktrace variable");
      stacktrace = { kind: "var", name: stackToken.text, token: stackToken };
    }

    const guard = this.parseOptionalGuard();
    this.expectPunct("->");
    return { exceptionClass, pattern, stacktrace, guard, body: this.parseExprs() };
  }

  // ===========================================================================
  // Token cursor
  // ===========================================================================

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private peekAt(offset: number): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private previous(): Token {
    const token = this.tokens[this.pos - 1];
    if (!token) throw this.endOfInput("Unexpected start of input");
    return token;
  }

  private advance(): void {
    this.pos++;
  }

  private acceptPunct(text: string): boolean {
    if (isPunct(this.peek(), text)) {
      this.pos++;
      return true;
    }
    return false;
  }

  private expectPunct(text: string): Token {
    const token = this.peek();
    if (!token || !isPunct(token, text)) throw this.unexpected(token, `'${text}'`);
    this.pos++;
    return token;
  }

  private expectKeyword(text: string): Token {
    const token = this.peek();
    if (!token || !isKeyword(token, text)) throw this.unexpected(token, `'${text}'`);
    this.pos++;
    return token;
  }

  private expectKind(kind: Token["kind"], what: string): Token {
    const token = this.peek();
    if (!token || token.kind !== kind) throw this.unexpected(token, what);
    this.pos++;
    return token;
  }

  private expectDot(what: string): void {
    const token = this.peek();
    if (!token) throw this.endOfInput(`Unterminated ${what}, expected '.'`);
    if (token.kind !== "dot") throw this.unexpected(token, "'.'");
    this.pos++;
  }

  private isMaybeBlock(): boolean {
    const next = this.peekAt(1);
    if (!next) return false;
    return MAYBE_FOLLOWERS.has(next.kind) || isPunct(next, "{") || isPunct(next, "[") || isPunct(next, "<<");
  }

  // ===========================================================================
  // Errors
  // ===========================================================================

  private unexpected(token: Token | undefined, expected: string): ParseError {
    if (!token) {
      return this.endOfInput(`Unexpected end of input, expected ${expected}`);
    }
    return this.error(
      token,
      `Unexpected token ${describeToken(token)}, expected ${expected}`,
      ErrorCode.PARSE_UNEXPECTED_TOKEN
    );
  }

  private endOfInput(message: string): ParseError {
    const last = this.tokens[this.tokens.length - 1];
    return new ParseError(message, ErrorCode.PARSE_UNTERMINATED, {
      line: last?.line,
      column: last ? last.column + last.text.length : undefined,
    });
  }

  private error(token: Token, message: string, code: ErrorCode = ErrorCode.PARSE_UNEXPECTED_TOKEN): ParseError {
    return new ParseError(message, code, { line: token.line, column: token.column });
  }
}

function isOperatorToken(token: Token): boolean {
  return token.kind === "punct" || token.kind === "keyword";
}
