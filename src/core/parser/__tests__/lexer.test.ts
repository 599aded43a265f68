/**
 * Lexer Tests
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, ParseError } from "../../errors.js";
import { tokenize } from "../lexer.js";
import { atomValue, unquote } from "../tokens.js";

function texts(source: string): string[] {
  return tokenize(source).map((token) => token.text);
}

function lexError(source: string): ParseError {
  try {
    tokenize(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error("expected a ParseError");
}

describe("Lexer", () => {
  it("should split a clause into tokens", () => {
    expect(texts("max(A, B) -> A.")).toEqual(["max", "(", "A", ",", "B", ")", "->", "A", "."]);
  });

  it("should classify literals", () => {
    const tokens = tokenize(String.raw`f() -> {'a b', "s\"q", $\n, 16#ff, 2.5}.`);

    expect(tokens.map((token) => token.text)).toEqual([
      "f", "(", ")", "->", "{", "'a b'", ",", String.raw`"s\"q"`, ",", String.raw`$\n`, ",", "16#ff", ",", "2.5", "}", ".",
    ]);
    expect(tokens.map((token) => token.kind)).toEqual([
      "atom", "punct", "punct", "punct", "punct", "atom", "punct", "string", "punct", "char", "punct",
      "integer", "punct", "float", "punct", "dot",
    ]);
  });

  it("should mark reserved words as keywords", () => {
    const tokens = tokenize("f(X) when X > 0 -> case X of _ -> ok end.");
    const keywords = tokens.filter((token) => token.kind === "keyword").map((token) => token.text);

    expect(keywords).toEqual(["when", "case", "of", "end"]);
  });

  it("should drop comments and track lines and columns", () => {
    const tokens = tokenize("% header\nfoo() ->\n  ok. % trailing\n");

    expect(tokens.map((token) => token.text)).toEqual(["foo", "(", ")", "->", "ok", "."]);
    expect(tokens[0]).toMatchObject({ line: 2, column: 0, start: 9, end: 12, index: 0 });
    expect(tokens[4]).toMatchObject({ line: 3, column: 2 });
    expect(tokens[5]).toMatchObject({ kind: "dot", line: 3, column: 4 });
  });

  it("should lex record field access dots as punctuation", () => {
    const tokens = tokenize("R#rec.name");

    expect(tokens.map((token) => token.text)).toEqual(["R", "#", "rec", ".", "name"]);
    expect(tokens[3]?.kind).toBe("punct");
  });

  it("should skip an escript shebang line", () => {
    expect(texts("#!/usr/bin/env escript\nmain(_) -> ok.")).toEqual(["main", "(", "_", ")", "->", "ok", "."]);
  });

  it("should report an unterminated string with its position", () => {
    const error = lexError('f() -> "abc');

    expect(error.code).toBe(ErrorCode.PARSE_UNTERMINATED);
    expect(error.message).toBe("Unterminated string");
    expect(error.line).toBe(1);
    expect(error.column).toBe(7);
  });

  it("should report illegal characters", () => {
    const error = lexError("f() -> `ok.");

    expect(error.code).toBe(ErrorCode.PARSE_ILLEGAL_CHARACTER);
    expect(error.message).toBe("Illegal character '`'");
    expect(error.column).toBe(7);
  });

  it("should reject triple-quoted strings", () => {
    expect(lexError('f() -> """\ntext\n""".').code).toBe(ErrorCode.PARSE_UNSUPPORTED);
  });
});

describe("unquote", () => {
  it("should resolve escapes", () => {
    expect(unquote(String.raw`"a\tb\"c"`)).toBe('a\tb"c');
  });

  it("should strip quotes from quoted atoms only", () => {
    const [quoted, plain] = tokenize("'hello world' ok");
    if (!quoted || !plain) throw new Error("expected two tokens");

    expect(atomValue(quoted)).toBe("hello world");
    expect(atomValue(plain)).toBe("ok");
  });
});
