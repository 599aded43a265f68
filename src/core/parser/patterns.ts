/**
 * Expression-to-pattern conversion and pattern helpers.
 *
 * @module
 */

import { ErrorCode, ParseError } from "../errors.js";
import type { Expr, LiteralExpr, Pattern } from "./ast.js";
import { charCode, integerDigits, unquote } from "./tokens.js";

/**
 * Converts an expression parsed in pattern position into a pattern.
 *
 * @throws ParseError (PARSE_INVALID_PATTERN) for constructs that cannot match
 */
export function toPattern(expr: Expr): Pattern {
  switch (expr.kind) {
    case "var":
      return expr.name === "_"
        ? { kind: "wildcard", token: expr.token }
        : { kind: "var", name: expr.name, token: expr.token };

    case "atom":
      return { kind: "literal", value: `atom:${expr.name}`, token: expr.token };

    case "literal":
      return { kind: "literal", value: literalValue(expr), token: expr.token };

    case "macro":
      return { kind: "literal", value: `macro:${expr.name}`, token: expr.token };

    case "record-field":
      if (expr.base === null) {
        return { kind: "literal", value: `index:${expr.record}.${expr.field}`, token: expr.token };
      }
      break;

    case "unary-op":
      if (
        (expr.op === "-" || expr.op === "+") &&
        expr.operand.kind === "literal" &&
        expr.operand.literalKind !== "string"
      ) {
        return { kind: "literal", value: literalValue(expr.operand, expr.op === "-"), token: expr.token };
      }
      break;

    case "tuple":
      return { kind: "tuple", token: expr.token, elements: expr.elements.map(toPattern) };

    case "list":
      return {
        kind: "list",
        token: expr.token,
        elements: expr.elements.map(toPattern),
        tail: expr.tail ? toPattern(expr.tail) : null,
      };

    case "binary":
      return {
        kind: "binary",
        token: expr.token,
        segments: expr.segments.map((segment) => ({
          value: toPattern(segment.value),
          size: segment.size,
        })),
      };

    case "map":
      if (expr.base === null && expr.entries.every((entry) => entry.op === ":=")) {
        return {
          kind: "map",
          token: expr.token,
          entries: expr.entries.map((entry) => ({ key: entry.key, value: toPattern(entry.value) })),
        };
      }
      break;

    case "record":
      if (expr.base === null) {
        return {
          kind: "record",
          token: expr.token,
          record: expr.record,
          fields: expr.fields.map((field) => ({ name: field.name, value: toPattern(field.value) })),
        };
      }
      break;

    case "match":
      return { kind: "alias", token: expr.token, left: expr.pattern, right: toPattern(expr.value) };

    case "binary-op":
      if (expr.op === "++" && expr.left.kind === "literal" && expr.left.literalKind === "string") {
        return {
          kind: "string-prefix",
          token: expr.token,
          prefix: stringValue(expr.left),
          tail: toPattern(expr.right),
        };
      }
      break;

    default:
      break;
  }

  throw new ParseError("Illegal pattern", ErrorCode.PARSE_INVALID_PATTERN, {
    line: expr.token.line,
    column: expr.token.column,
  });
}

/**
 * Normalized literal value, used to compare literal patterns. Characters
 * are integers, so `$a` and `97` share a value.
 */
export function literalValue(expr: LiteralExpr, negative = false): string {
  const { text } = expr.token;
  switch (expr.literalKind) {
    case "string":
      return `string:${stringValue(expr)}`;
    case "float":
      return `float:${(negative ? -1 : 1) * Number(text.replace(/_/g, ""))}`;
    case "char":
      return signedInteger(String(charCode(text)), negative);
    case "integer":
      return signedInteger(integerDigits(text), negative);
  }
}

function signedInteger(digits: string, negative: boolean): string {
  return negative && digits !== "0" ? `integer:-${digits}` : `integer:${digits}`;
}

/** Concatenated contents of a (possibly multi-token) string literal */
export function stringValue(expr: LiteralExpr): string {
  return expr.tokens.map((token) => unquote(token.text)).join("");
}
