/**
 * Group-by aggregation.
 *
 * Rows are grouped by the values at the key columns (no key columns: one
 * group for the whole stream). Each group collects its value-column
 * values; once the input ends, every group is emitted in first-seen
 * order as (key..., reducer_1(values), ..., reducer_n(values)).
 */

import { ExpressionSyntaxError } from "../errors.js";
import type { FunctionRegistry } from "../query/builtins/index.js";
import { evaluateLiteral } from "../query/literal.js";
import type { Expr } from "../query/parser-types.js";
import { parse } from "../query/parser.js";
import { valueKey } from "../query/value-operations.js";
import { Tuple, type Value } from "../types.js";
import { column, project } from "./columns.js";

export interface Reducer {
  /** The text the reducer was built from, e.g. "percentile(0.9)" */
  name: string;
  reduce(values: readonly Value[]): Value;
}

export interface AggregateSpec {
  reducers: readonly Reducer[];
  keyColumns: readonly number[];
  valueColumn: number;
}

function literalArgs(spec: string, args: Expr[]): Value[] {
  return args.map((arg) => {
    const literal = evaluateLiteral(arg);
    if (!literal.ok) {
      throw new ExpressionSyntaxError(
        `aggregate function arguments must be literals: ${spec}`,
      );
    }
    return literal.value;
  });
}

/**
 * Build a reducer from a spec: a function name ("sum") or a call with
 * literal arguments ("percentile(0.5)"). The group's value list is
 * passed as the first argument.
 */
export function parseReducer(
  spec: string,
  functions: FunctionRegistry,
): Reducer {
  const expr = parse(spec);
  let name: string;
  let extra: Value[];
  if (expr.type === "Name") {
    name = expr.name;
    extra = [];
  } else if (expr.type === "Call") {
    name = expr.name;
    extra = literalArgs(spec, expr.args);
  } else {
    throw new ExpressionSyntaxError(`invalid aggregate function: ${spec}`);
  }

  const fn = functions.get(name);
  if (!fn) {
    throw new ExpressionSyntaxError(`unknown aggregate function '${name}'`);
  }
  const arity = extra.length + 1;
  if (arity < fn.minArgs || arity > fn.maxArgs) {
    throw new ExpressionSyntaxError(
      `${name}() cannot reduce a list with ${extra.length} extra argument(s)`,
    );
  }

  return {
    name: spec.trim(),
    // Each reducer works on its own copy of the group's values
    reduce: (values) => fn.call([[...values], ...extra]),
  };
}

interface Group {
  key: Value[];
  values: Value[];
}

export async function* aggregate(
  rows: AsyncIterable<Value>,
  spec: AggregateSpec,
): AsyncGenerator<Tuple> {
  const groups = new Map<string, Group>();
  for await (const row of rows) {
    const key = project(row, spec.keyColumns);
    const value = column(row, spec.valueColumn);
    const id = valueKey(key);
    const group = groups.get(id);
    if (group) {
      group.values.push(value);
    } else {
      groups.set(id, { key, values: [value] });
    }
  }

  for (const { key, values } of groups.values()) {
    yield new Tuple([
      ...key,
      ...spec.reducers.map((reducer) => reducer.reduce(values)),
    ]);
  }
}
