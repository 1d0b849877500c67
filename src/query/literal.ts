/**
 * Literal values written in query syntax
 *
 * Used to type CSV fields ("42" -> 42, "(1, 2)" -> a tuple, "True" ->
 * true) and to read the constant arguments of reducer specs.
 */

import { ExpressionSyntaxError } from "../errors.js";
import type { Value } from "../types.js";
import type { FunctionRegistry } from "./builtins/index.js";
import { evaluate } from "./evaluator.js";
import { isNumber } from "./numbers.js";
import type { Expr } from "./parser-types.js";
import { parse } from "./parser.js";

export type LiteralResult = { ok: true; value: Value } | { ok: false };

const NO_NAMES: ReadonlyMap<string, Value> = new Map();
const NO_FUNCTIONS: FunctionRegistry = new Map();

/**
 * True when the expression is built only from constants: numbers,
 * strings, booleans, null, signed numbers, and tuples, lists or objects
 * of those.
 */
export function isLiteralExpr(expr: Expr): boolean {
  switch (expr.type) {
    case "Literal":
      return true;
    case "Unary":
      return (
        expr.op !== "not" &&
        expr.operand.type === "Literal" &&
        isNumber(expr.operand.value)
      );
    case "Tuple":
    case "List":
      return expr.elements.every(isLiteralExpr);
    case "Object":
      return expr.entries.every(
        ({ key, value }) => isLiteralExpr(key) && isLiteralExpr(value),
      );
    default:
      return false;
  }
}

/**
 * Evaluate an expression that must be a literal.
 */
export function evaluateLiteral(expr: Expr): LiteralResult {
  if (!isLiteralExpr(expr)) return { ok: false };
  return { ok: true, value: evaluate(expr, NO_NAMES, NO_FUNCTIONS) };
}

/**
 * Read `text` as a literal. Anything that does not parse, or parses to
 * something other than a literal, is reported as `{ ok: false }`.
 */
export function parseLiteral(text: string): LiteralResult {
  let expr: Expr;
  try {
    expr = parse(text);
  } catch (error) {
    if (error instanceof ExpressionSyntaxError) return { ok: false };
    throw error;
  }
  return evaluateLiteral(expr);
}
