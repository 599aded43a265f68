/**
 * Erlang Lexer
 *
 * Splits Erlang source into tokens. Comments and whitespace are dropped;
 * every other lexical unit becomes exactly one token, so token indices are
 * stable for a given source text.
 *
 * @module
 */

import { ErrorCode, ParseError } from "../errors.js";
import { KEYWORDS, PUNCTUATION, type Token, type TokenKind } from "./tokens.js";

const IDENT_CHAR = /[\p{L}\p{N}_@]/u;
const UPPER_START = /[\p{Lu}_]/u;
const LOWER_START = /\p{Ll}/u;
const DIGIT = /[0-9]/;
const BASED_DIGIT = /[0-9a-zA-Z_]/;
const WHITESPACE = /\s/;

/**
 * Tokenizes Erlang source text.
 *
 * @example
 * ```typescript
 * const tokens = tokenize("max(A, B) -> A.");
 * tokens.map((t) => t.text); // ["max", "(", "A", ",", "B", ")", "->", "A", "."]
 * ```
 */
export class Lexer {
  private pos = 0;
  private line = 1;
  private column = 0;
  private readonly tokens: Token[] = [];

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    // escript shebang
    if (this.source.startsWith("#!")) {
      this.skipLine();
    }

    while (this.pos < this.source.length) {
      const ch = this.peek();

      if (WHITESPACE.test(ch)) {
        this.advance(1);
        continue;
      }
      if (ch === "%") {
        this.skipLine();
        continue;
      }

      if (UPPER_START.test(ch)) {
        this.readWhile("var", IDENT_CHAR);
      } else if (LOWER_START.test(ch)) {
        this.readAtom();
      } else if (ch === "'") {
        this.readQuoted("'", "atom", "quoted atom");
      } else if (ch === '"') {
        if (this.source.startsWith('"""', this.pos)) {
          throw this.error("Triple-quoted strings are not supported", ErrorCode.PARSE_UNSUPPORTED);
        }
        this.readQuoted('"', "string", "string");
      } else if (ch === "$") {
        this.readChar();
      } else if (DIGIT.test(ch)) {
        this.readNumber();
      } else if (ch === "." && this.isFormTerminator()) {
        this.push("dot", 1);
      } else {
        this.readPunct();
      }
    }

    return this.tokens;
  }

  // ===========================================================================
  // Readers
  // ===========================================================================

  private readAtom(): void {
    let end = this.pos;
    while (end < this.source.length && IDENT_CHAR.test(this.source.charAt(end))) end++;
    const text = this.source.slice(this.pos, end);
    this.push(KEYWORDS.has(text) ? "keyword" : "atom", end - this.pos);
  }

  private readQuoted(quote: string, kind: TokenKind, what: string): void {
    let end = this.pos + 1;
    while (end < this.source.length) {
      const ch = this.source.charAt(end);
      if (ch === "\\") {
        end += 2;
        continue;
      }
      if (ch === quote) {
        this.push(kind, end + 1 - this.pos);
        return;
      }
      end++;
    }
    throw this.error(`Unterminated ${what}`, ErrorCode.PARSE_UNTERMINATED);
  }

  private readChar(): void {
    let end = this.pos + 1;
    if (end >= this.source.length) {
      throw this.error("Unterminated character literal", ErrorCode.PARSE_UNTERMINATED);
    }
    if (this.source.charAt(end) !== "\\") {
      // Surrogate pairs count as one character
      const codePoint = this.source.codePointAt(end) ?? 0;
      end += codePoint > 0xffff ? 2 : 1;
      this.push("char", end - this.pos);
      return;
    }

    end++;
    const escaped = this.source.charAt(end);
    if (escaped === "x" && this.source.charAt(end + 1) === "{") {
      const close = this.source.indexOf("}", end);
      if (close < 0) throw this.error("Unterminated character escape", ErrorCode.PARSE_UNTERMINATED);
      end = close + 1;
    } else if (escaped === "x") {
      end += 3;
    } else if (escaped === "^") {
      end += 2;
    } else if (/[0-7]/.test(escaped)) {
      end++;
      while (end - this.pos < 6 && /[0-7]/.test(this.source.charAt(end))) end++;
    } else {
      end++;
    }
    if (end > this.source.length) {
      throw this.error("Unterminated character escape", ErrorCode.PARSE_UNTERMINATED);
    }
    this.push("char", end - this.pos);
  }

  private readNumber(): void {
    let end = this.pos;
    while (end < this.source.length && (DIGIT.test(this.source.charAt(end)) || this.source.charAt(end) === "_")) end++;

    if (this.source.charAt(end) === "#" && BASED_DIGIT.test(this.source.charAt(end + 1))) {
      end++;
      while (end < this.source.length && BASED_DIGIT.test(this.source.charAt(end))) end++;
      this.push("integer", end - this.pos);
      return;
    }

    if (this.source.charAt(end) === "." && DIGIT.test(this.source.charAt(end + 1))) {
      end++;
      while (end < this.source.length && (DIGIT.test(this.source.charAt(end)) || this.source.charAt(end) === "_")) end++;
      if (/[eE]/.test(this.source.charAt(end))) {
        let expEnd = end + 1;
        if (/[+-]/.test(this.source.charAt(expEnd))) expEnd++;
        if (DIGIT.test(this.source.charAt(expEnd))) {
          while (expEnd < this.source.length && DIGIT.test(this.source.charAt(expEnd))) expEnd++;
          end = expEnd;
        }
      }
      this.push("float", end - this.pos);
      return;
    }

    this.push("integer", end - this.pos);
  }

  private readPunct(): void {
    for (const punct of PUNCTUATION) {
      if (this.source.startsWith(punct, this.pos)) {
        this.push("punct", punct.length);
        return;
      }
    }
    throw this.error(
      `Illegal character '${this.peek()}'`,
      ErrorCode.PARSE_ILLEGAL_CHARACTER
    );
  }

  private readWhile(kind: TokenKind, pattern: RegExp): void {
    let end = this.pos;
    while (end < this.source.length && pattern.test(this.source.charAt(end))) end++;
    this.push(kind, end - this.pos);
  }

  // ===========================================================================
  // Cursor helpers
  // ===========================================================================

  private isFormTerminator(): boolean {
    const next = this.source.charAt(this.pos + 1);
    return next === "" || next === "%" || WHITESPACE.test(next);
  }

  private skipLine(): void {
    const newline = this.source.indexOf("\n", this.pos);
    this.advance((newline < 0 ? this.source.length : newline) - this.pos);
  }

  private push(kind: TokenKind, length: number): void {
    const start = this.pos;
    const token: Token = {
      kind,
      text: this.source.slice(start, start + length),
      index: this.tokens.length,
      start,
      end: start + length,
      line: this.line,
      column: this.column,
    };
    this.tokens.push(token);
    this.advance(length);
  }

  private advance(count: number): void {
    const end = Math.min(this.pos + count, this.source.length);
    for (let i = this.pos; i < end; i++) {
      if (this.source.charAt(i) === "\n") {
        this.line++;
        this.column = 0;
      } else {
        this.column++;
      }
    }
    this.pos = end;
  }

  private peek(): string {
    return this.source.charAt(this.pos);
  }

  private error(message: string, code: ErrorCode): ParseError {
    return new ParseError(message, code, { line: this.line, column: this.column });
  }
}

/**
 * Tokenizes Erlang source text.
 *
 * @throws ParseError on illegal characters or unterminated literals
 */
export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
