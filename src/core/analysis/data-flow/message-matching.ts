/**
 * Shape compatibility between expressions and patterns, and the keys that
 * pair a send with the receives that may consume it.
 *
 * @module
 */

import type { Expr, ListExpr, ListPattern, Pattern } from "../../parser/ast.js";
import { literalValue, stringValue } from "../../parser/patterns.js";

/** Key of the running process */
export const SELF_KEY = "self";

/**
 * Normalized value of a constant expression, or null when the value is not
 * known until run time.
 */
function constantValue(expr: Expr): string | null {
  switch (expr.kind) {
    case "atom":
      return `atom:${expr.name}`;
    case "literal":
      return literalValue(expr);
    case "unary-op":
      if (expr.operand.kind === "literal" && expr.operand.literalKind !== "string" && (expr.op === "-" || expr.op === "+")) {
        return literalValue(expr.operand, expr.op === "-");
      }
      return null;
    default:
      return null;
  }
}

/** Whether the expression builds a value whose shape is known statically */
function isConstructor(expr: Expr): boolean {
  switch (expr.kind) {
    case "atom":
    case "literal":
    case "tuple":
    case "list":
    case "binary":
    case "fun":
    case "fun-ref":
    case "list-comprehension":
    case "binary-comprehension":
      return true;
    case "map":
    case "record":
      return expr.base === null;
    default:
      return false;
  }
}

/**
 * Whether `pattern` could match the value of `expr`. Unknown values
 * (variables, calls, operators) may match anything.
 */
export function mayMatch(expr: Expr, pattern: Pattern): boolean {
  switch (pattern.kind) {
    case "var":
    case "wildcard":
      return true;

    case "alias":
      return mayMatch(expr, pattern.left) && mayMatch(expr, pattern.right);

    case "literal": {
      if (!isConstructor(expr)) return true;
      if (pattern.value.startsWith("string:") && expr.kind === "list") {
        return listMayEqualString(expr, codePoints(pattern.value.slice("string:".length)));
      }
      const value = constantValue(expr);
      if (value === null) return false;
      if (pattern.value.startsWith("macro:") || value.startsWith("macro:")) return true;
      return value === pattern.value;
    }

    case "tuple":
      if (!isConstructor(expr)) return true;
      return (
        expr.kind === "tuple" &&
        expr.elements.length === pattern.elements.length &&
        expr.elements.every((element, i) => {
          const sub = pattern.elements[i];
          return sub === undefined || mayMatch(element, sub);
        })
      );

    case "list": {
      if (!isConstructor(expr)) return true;
      if (expr.kind === "literal" && expr.literalKind === "string") {
        return listPatternMayMatchString(pattern, codePoints(stringValue(expr)));
      }
      if (expr.kind === "list-comprehension") return true;
      if (expr.kind !== "list") return false;

      const exprLength = expr.elements.length;
      const patternLength = pattern.elements.length;
      if (pattern.tail === null && expr.tail === null && exprLength !== patternLength) return false;
      if (pattern.tail === null && exprLength > patternLength) return false;
      if (expr.tail === null && exprLength < patternLength) return false;

      const shared = Math.min(exprLength, patternLength);
      for (let i = 0; i < shared; i++) {
        const element = expr.elements[i];
        const sub = pattern.elements[i];
        if (element && sub && !mayMatch(element, sub)) return false;
      }
      return true;
    }

    case "string-prefix":
      if (!isConstructor(expr)) return true;
      if (expr.kind === "literal" && expr.literalKind === "string") {
        return stringValue(expr).startsWith(pattern.prefix);
      }
      return expr.kind === "list";

    case "map":
      return !isConstructor(expr) || expr.kind === "map";

    case "record":
      return !isConstructor(expr) || (expr.kind === "record" && expr.record === pattern.record);

    case "binary":
      return !isConstructor(expr) || expr.kind === "binary" || expr.kind === "binary-comprehension";
  }
}

function codePoints(text: string): number[] {
  return Array.from(text, (ch) => ch.codePointAt(0) ?? 0);
}

/** A string is the list of its character codes */
function listMayEqualString(expr: ListExpr, codes: readonly number[]): boolean {
  const count = expr.elements.length;
  if (expr.tail === null ? count !== codes.length : count > codes.length) return false;
  return expr.elements.every((element, i) => !isConstructor(element) || constantValue(element) === `integer:${codes[i]}`);
}

function listPatternMayMatchString(pattern: ListPattern, codes: readonly number[]): boolean {
  const count = pattern.elements.length;
  if (pattern.tail === null ? count !== codes.length : count > codes.length) return false;
  return pattern.elements.every((element, i) => mayMatchCode(element, codes[i] ?? 0));
}

function mayMatchCode(pattern: Pattern, code: number): boolean {
  switch (pattern.kind) {
    case "var":
    case "wildcard":
      return true;
    case "alias":
      return mayMatchCode(pattern.left, code) && mayMatchCode(pattern.right, code);
    case "literal":
      return pattern.value.startsWith("macro:") || pattern.value === `integer:${code}`;
    default:
      return false;
  }
}

/**
 * Key identifying the destination of a send, or null when the destination
 * cannot be named statically.
 *
 * @param module - Module atom that `?MODULE` stands for
 */
export function destinationKey(destination: Expr, module: string): string | null {
  switch (destination.kind) {
    case "var":
      return `var:${destination.name}`;
    case "atom":
      return `atom:${destination.name}`;
    case "macro":
      return destination.name === "MODULE" && destination.args === null ? `atom:${module}` : null;
    case "call":
      return isSelfCall(destination) ? SELF_KEY : null;
    default:
      return null;
  }
}

/** `self()` */
export function isSelfCall(expr: Expr): boolean {
  return (
    expr.kind === "call" &&
    expr.args.length === 0 &&
    expr.callee.kind === "atom" &&
    expr.callee.name === "self"
  );
}
