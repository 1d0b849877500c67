/**
 * Query expression evaluator
 *
 * Walks the AST against an evaluation context. Names resolve through a
 * chain of scopes (comprehension variables over the record context);
 * calls resolve through the function registry only.
 */

import { EvaluationError, ExpressionSyntaxError } from "../errors.js";
import {
  asSequence,
  isTuple,
  isValueObject,
  Tuple,
  type Value,
  ValueObject,
} from "../types.js";
import type { FunctionRegistry } from "./builtins/index.js";
import { sanitizeName } from "./names.js";
import {
  arithmetic,
  compareNumbers,
  isNumber,
  isZero,
  negate,
  type Numeric,
} from "./numbers.js";
import type {
  BinaryOperator,
  CompareOperator,
  Expr,
} from "./parser-types.js";
import { parse } from "./parser.js";
import {
  compareOrdered,
  isTruthy,
  typeName,
  valueEquals,
} from "./value-operations.js";

/** Names visible to a query */
export type EvaluationContext = ReadonlyMap<string, Value>;

class Scope {
  constructor(
    private readonly vars: EvaluationContext,
    private readonly parent?: Scope,
  ) {}

  lookup(name: string): Value | undefined {
    const value = this.vars.get(name);
    if (value !== undefined) return value;
    return this.parent?.lookup(name);
  }

  extend(vars: EvaluationContext): Scope {
    return new Scope(vars, this);
  }
}

interface EvalState {
  scope: Scope;
  functions: FunctionRegistry;
}

function toNumber(op: string, v: Value): Numeric {
  if (isNumber(v)) return v;
  if (typeof v === "boolean") return v ? 1 : 0;
  throw new EvaluationError(
    `unsupported operand type for '${op}': ${typeName(v)}`,
  );
}

function operandError(op: string, a: Value, b: Value): EvaluationError {
  return new EvaluationError(
    `unsupported operand types for '${op}': ${typeName(a)} and ${typeName(b)}`,
  );
}

function repeat(seq: Value, times: number): Value {
  const count = Math.max(0, Math.trunc(times));
  if (typeof seq === "string") return seq.repeat(count);
  const items = asSequence(seq) ?? [];
  const out: Value[] = [];
  for (let i = 0; i < count; i++) out.push(...items);
  return isTuple(seq) ? new Tuple(out) : out;
}

function isNumeric(v: Value): v is Numeric | boolean {
  return isNumber(v) || typeof v === "boolean";
}

function applyBinary(op: BinaryOperator, a: Value, b: Value): Value {
  if (op === "+") {
    if (typeof a === "string" && typeof b === "string") return a + b;
    if (Array.isArray(a) && Array.isArray(b)) return [...a, ...b];
    if (isTuple(a) && isTuple(b)) return new Tuple([...a, ...b]);
    if (isNumeric(a) && isNumeric(b)) {
      return arithmetic(op, toNumber(op, a), toNumber(op, b));
    }
    throw operandError(op, a, b);
  }

  if (op === "*") {
    if (isNumeric(a) && isNumeric(b)) {
      return arithmetic(op, toNumber(op, a), toNumber(op, b));
    }
    // "ab" * 2, [x] * 3, 3 * (a, b)
    const seqFirst = typeof a === "string" || asSequence(a) !== undefined;
    if (seqFirst && typeof b === "number" && Number.isInteger(b)) {
      return repeat(a, b);
    }
    const seqSecond = typeof b === "string" || asSequence(b) !== undefined;
    if (seqSecond && typeof a === "number" && Number.isInteger(a)) {
      return repeat(b, a);
    }
    throw operandError(op, a, b);
  }

  if (!isNumeric(a) || !isNumeric(b)) throw operandError(op, a, b);
  const x = toNumber(op, a);
  const y = toNumber(op, b);
  // 0 ** -n divides by zero as well
  const dividesByZero =
    op === "**"
      ? isZero(x) && compareNumbers(y, 0) < 0
      : op !== "-" && isZero(y);
  if (dividesByZero) throw new EvaluationError("division by zero");
  if (op === "/") return Number(x) / Number(y);
  return arithmetic(op, x, y);
}

function contains(container: Value, item: Value): boolean {
  if (typeof container === "string") {
    if (typeof item !== "string") {
      throw new EvaluationError(
        `'in <string>' requires string as left operand, not ${typeName(item)}`,
      );
    }
    return container.includes(item);
  }
  const items = asSequence(container);
  if (items) return items.some((v) => valueEquals(v, item));
  if (isValueObject(container)) {
    return typeof item === "string" && container.has(item);
  }
  throw new EvaluationError(
    `argument of type ${typeName(container)} is not iterable`,
  );
}

function compare(op: CompareOperator, a: Value, b: Value): boolean {
  switch (op) {
    case "==":
      return valueEquals(a, b);
    case "!=":
      return !valueEquals(a, b);
    case "<":
      return compareOrdered(a, b, op) < 0;
    case "<=":
      return compareOrdered(a, b, op) <= 0;
    case ">":
      return compareOrdered(a, b, op) > 0;
    case ">=":
      return compareOrdered(a, b, op) >= 0;
    case "in":
      return contains(b, a);
    case "not in":
      return !contains(b, a);
  }
}

/**
 * Field lookup by `.name`: the exact key, else a key whose sanitized
 * form is the name (so `rec.first_name` finds "first name").
 */
function getAttribute(obj: Value, name: string): Value {
  if (!isValueObject(obj)) {
    throw new EvaluationError(`${typeName(obj)} has no attribute '${name}'`);
  }
  const direct = obj.get(name);
  if (direct !== undefined) return direct;
  for (const [key, value] of obj) {
    if (sanitizeName(key) === name) return value;
  }
  throw new EvaluationError(`record has no field '${name}'`);
}

function normalizeIndex(index: Value, length: number): number {
  if (typeof index === "bigint") {
    throw new EvaluationError(`index ${index} out of range`);
  }
  if (typeof index !== "number" || !Number.isInteger(index)) {
    throw new EvaluationError(
      `sequence indices must be integers, not ${typeName(index)}`,
    );
  }
  const resolved = index < 0 ? length + index : index;
  if (resolved < 0 || resolved >= length) {
    throw new EvaluationError(`index ${index} out of range`);
  }
  return resolved;
}

function getIndex(container: Value, index: Value): Value {
  if (typeof container === "string") {
    return container[normalizeIndex(index, container.length)];
  }
  const items = asSequence(container);
  if (items) return items[normalizeIndex(index, items.length)];
  if (isValueObject(container)) {
    if (typeof index !== "string") {
      throw new EvaluationError(
        `object keys must be strings, not ${typeName(index)}`,
      );
    }
    const value = container.get(index);
    if (value === undefined) {
      throw new EvaluationError(`key not found: ${JSON.stringify(index)}`);
    }
    return value;
  }
  throw new EvaluationError(`${typeName(container)} is not subscriptable`);
}

function sliceBound(v: Value | undefined): number | undefined {
  if (v === undefined || v === null) return undefined;
  // Beyond any length: clamp
  if (typeof v === "bigint") return v < 0n ? -Infinity : Infinity;
  if (typeof v !== "number" || !Number.isInteger(v)) {
    throw new EvaluationError(
      `slice indices must be integers or null, not ${typeName(v)}`,
    );
  }
  return v;
}

function getSlice(
  container: Value,
  start: Value | undefined,
  end: Value | undefined,
): Value {
  const from = sliceBound(start);
  const to = sliceBound(end);
  if (typeof container === "string") return container.slice(from, to);
  if (Array.isArray(container)) return container.slice(from, to);
  if (isTuple(container)) return container.slice(from, to);
  throw new EvaluationError(`${typeName(container)} is not subscriptable`);
}

/**
 * Items a comprehension loops over: sequence items, string characters,
 * object keys.
 */
function iterate(v: Value): readonly Value[] {
  const items = asSequence(v);
  if (items) return items;
  if (typeof v === "string") return [...v];
  if (isValueObject(v)) return [...v.keys()];
  throw new EvaluationError(`${typeName(v)} is not iterable`);
}

function bindTargets(targets: string[], item: Value): Map<string, Value> {
  if (targets.length === 1) return new Map([[targets[0], item]]);
  const items = asSequence(item);
  if (!items || items.length !== targets.length) {
    throw new EvaluationError(
      `cannot unpack ${typeName(item)} into ${targets.length} names`,
    );
  }
  return new Map(targets.map((name, i): [string, Value] => [name, items[i]]));
}

function buildObject(entries: Array<[Value, Value]>): ValueObject {
  return new ValueObject(
    entries.map(([key, value]): [string, Value] => {
      if (typeof key !== "string") {
        throw new EvaluationError(
          `object keys must be strings, not ${typeName(key)}`,
        );
      }
      return [key, value];
    }),
  );
}

function evalNode(expr: Expr, state: EvalState): Value {
  switch (expr.type) {
    case "Literal":
      return expr.value;

    case "Name": {
      const value = state.scope.lookup(expr.name);
      if (value === undefined) {
        throw new EvaluationError(`name '${expr.name}' is not defined`);
      }
      return value;
    }

    case "Tuple":
      return new Tuple(expr.elements.map((e) => evalNode(e, state)));

    case "List":
      return expr.elements.map((e) => evalNode(e, state));

    case "Object":
      return buildObject(
        expr.entries.map(({ key, value }): [Value, Value] => [
          evalNode(key, state),
          evalNode(value, state),
        ]),
      );

    case "Comprehension": {
      const out: Value[] = [];
      for (const item of iterate(evalNode(expr.iterable, state))) {
        const inner: EvalState = {
          ...state,
          scope: state.scope.extend(bindTargets(expr.targets, item)),
        };
        if (expr.condition && !isTruthy(evalNode(expr.condition, inner))) {
          continue;
        }
        out.push(evalNode(expr.element, inner));
      }
      return out;
    }

    case "Unary": {
      const operand = evalNode(expr.operand, state);
      if (expr.op === "not") return !isTruthy(operand);
      const n = toNumber(expr.op, operand);
      return expr.op === "-" ? negate(n) : n;
    }

    case "Binary":
      return applyBinary(
        expr.op,
        evalNode(expr.left, state),
        evalNode(expr.right, state),
      );

    case "Compare": {
      // Chains short-circuit and evaluate each operand once
      let left = evalNode(expr.operands[0], state);
      for (let i = 0; i < expr.ops.length; i++) {
        const right = evalNode(expr.operands[i + 1], state);
        if (!compare(expr.ops[i], left, right)) return false;
        left = right;
      }
      return true;
    }

    case "Logical": {
      const left = evalNode(expr.left, state);
      if (expr.op === "and") {
        return isTruthy(left) ? evalNode(expr.right, state) : left;
      }
      return isTruthy(left) ? left : evalNode(expr.right, state);
    }

    case "Conditional":
      return isTruthy(evalNode(expr.test, state))
        ? evalNode(expr.consequent, state)
        : evalNode(expr.alternate, state);

    case "Attribute":
      return getAttribute(evalNode(expr.object, state), expr.name);

    case "Index":
      return getIndex(
        evalNode(expr.object, state),
        evalNode(expr.index, state),
      );

    case "Slice":
      return getSlice(
        evalNode(expr.object, state),
        expr.start ? evalNode(expr.start, state) : undefined,
        expr.end ? evalNode(expr.end, state) : undefined,
      );

    case "Call": {
      const fn = state.functions.get(expr.name);
      if (!fn) {
        throw new EvaluationError(`unknown function '${expr.name}'`);
      }
      return fn.call(expr.args.map((arg) => evalNode(arg, state)));
    }
  }
}

function children(expr: Expr): Expr[] {
  switch (expr.type) {
    case "Literal":
    case "Name":
      return [];
    case "Tuple":
    case "List":
      return expr.elements;
    case "Object":
      return expr.entries.flatMap(({ key, value }) => [key, value]);
    case "Comprehension":
      return [
        expr.element,
        expr.iterable,
        ...(expr.condition ? [expr.condition] : []),
      ];
    case "Unary":
      return [expr.operand];
    case "Binary":
    case "Logical":
      return [expr.left, expr.right];
    case "Compare":
      return expr.operands;
    case "Conditional":
      return [expr.test, expr.consequent, expr.alternate];
    case "Attribute":
      return [expr.object];
    case "Index":
      return [expr.object, expr.index];
    case "Slice":
      return [
        expr.object,
        ...(expr.start ? [expr.start] : []),
        ...(expr.end ? [expr.end] : []),
      ];
    case "Call":
      return expr.args;
  }
}

/**
 * Reject calls to functions missing from the registry or called with the
 * wrong number of arguments.
 */
export function checkCalls(expr: Expr, functions: FunctionRegistry): void {
  if (expr.type === "Call") {
    const fn = functions.get(expr.name);
    if (!fn) {
      throw new ExpressionSyntaxError(`unknown function '${expr.name}'`);
    }
    const n = expr.args.length;
    if (n < fn.minArgs || n > fn.maxArgs) {
      const expected =
        fn.minArgs === fn.maxArgs
          ? `${fn.minArgs}`
          : fn.maxArgs === Infinity
            ? `at least ${fn.minArgs}`
            : `${fn.minArgs} to ${fn.maxArgs}`;
      throw new ExpressionSyntaxError(
        `${expr.name}() takes ${expected} argument(s), ${n} given`,
      );
    }
  }
  for (const child of children(expr)) {
    checkCalls(child, functions);
  }
}

/**
 * Evaluate an AST against a context.
 */
export function evaluate(
  expr: Expr,
  context: EvaluationContext,
  functions: FunctionRegistry,
): Value {
  return evalNode(expr, { scope: new Scope(context), functions });
}

/**
 * A query parsed and checked once, evaluated per record.
 */
export class CompiledQuery {
  constructor(
    readonly source: string,
    readonly ast: Expr,
    private readonly functions: FunctionRegistry,
  ) {}

  evaluate(context: EvaluationContext): Value {
    return evaluate(this.ast, context, this.functions);
  }
}

/**
 * Parse a query and check its function calls. Throws
 * ExpressionSyntaxError before any record is seen.
 */
export function compileQuery(
  source: string,
  functions: FunctionRegistry,
): CompiledQuery {
  const ast = parse(source);
  checkCalls(ast, functions);
  return new CompiledQuery(source, ast, functions);
}
