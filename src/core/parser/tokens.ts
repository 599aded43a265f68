/**
 * Erlang token model.
 *
 * @module
 */

/**
 * Lexical categories. `dot` is the form terminator (`.` followed by
 * whitespace, `%` or end of input); a bare `.` inside an expression is
 * record field access and lexes as `punct`.
 */
export type TokenKind =
  | "var"
  | "atom"
  | "integer"
  | "float"
  | "char"
  | "string"
  | "keyword"
  | "punct"
  | "dot";

export interface Token {
  kind: TokenKind;
  /** Exact source text of the token */
  text: string;
  /** Position in the file's token stream (comments excluded) */
  index: number;
  /** Start offset in the source string (inclusive) */
  start: number;
  /** End offset in the source string (exclusive) */
  end: number;
  /** 1-based line */
  line: number;
  /** 0-based column */
  column: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  "after",
  "and",
  "andalso",
  "band",
  "begin",
  "bnot",
  "bor",
  "bsl",
  "bsr",
  "bxor",
  "case",
  "catch",
  "div",
  "end",
  "fun",
  "if",
  "not",
  "of",
  "or",
  "orelse",
  "receive",
  "rem",
  "try",
  "when",
  "xor",
]);

/** Punctuation, longest first so the lexer can match greedily */
export const PUNCTUATION: readonly string[] = [
  "=:=",
  "=/=",
  "...",
  "<<",
  ">>",
  "<-",
  "<=",
  "=>",
  ":=",
  "::",
  "->",
  "==",
  "/=",
  "=<",
  ">=",
  "++",
  "--",
  "||",
  "??",
  "(",
  ")",
  "{",
  "}",
  "[",
  "]",
  ",",
  ";",
  ":",
  "|",
  "!",
  "=",
  "<",
  ">",
  "+",
  "-",
  "*",
  "/",
  "#",
  "?",
  ".",
];

export function isPunct(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === "punct" && token.text === text;
}

export function isKeyword(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === "keyword" && token.text === text;
}

export function describeToken(token: Token | undefined): string {
  if (!token) return "end of input";
  if (token.kind === "dot") return "'.'";
  return `'${token.text}'`;
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
  b: "\b",
  f: "\f",
  e: "\x1b",
  s: " ",
  d: "\x7f",
};

/** Contents of a quoted atom or string with escapes resolved */
export function unquote(text: string): string {
  const body = text.slice(1, -1);
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const next = body.charAt(++i);
    out += SIMPLE_ESCAPES[next] ?? next;
  }
  return out;
}

/** Value of an atom token, with quotes removed from quoted atoms */
export function atomValue(token: Token): string {
  return token.text.startsWith("'") ? unquote(token.text) : token.text;
}

/** Character code of a `$c` literal */
export function charCode(text: string): number {
  if (text.charAt(1) !== "\\") return text.codePointAt(1) ?? 0;

  const escape = text.slice(2);
  if (escape.startsWith("x{")) return parseInt(escape.slice(2, -1), 16);
  if (escape.startsWith("x")) return parseInt(escape.slice(1), 16);
  if (escape.startsWith("^")) return (escape.codePointAt(1) ?? 0) % 32;
  if (/^[0-7]/.test(escape)) return parseInt(escape, 8);
  const simple = SIMPLE_ESCAPES[escape];
  return (simple ?? escape).codePointAt(0) ?? 0;
}

/** Decimal digits of an integer literal, including `Base#Digits` forms */
export function integerDigits(text: string): string {
  const digits = text.replace(/_/g, "");
  const hash = digits.indexOf("#");
  if (hash < 0) return BigInt(digits).toString();

  const base = BigInt(parseInt(digits.slice(0, hash), 10));
  let value = BigInt(0);
  for (const ch of digits.slice(hash + 1)) {
    value = value * base + BigInt(parseInt(ch, 36));
  }
  return value.toString();
}
