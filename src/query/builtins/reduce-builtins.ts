/**
 * Reduction builtins
 *
 * These double as aggregate functions: `-a sum len "percentile(0.9)"`
 * calls each of them with a group's value list as the first argument.
 */

import { EvaluationError } from "../../errors.js";
import type { Value } from "../../types.js";
import { arithmetic, type Numeric } from "../numbers.js";
import { compareValues } from "../value-operations.js";
import {
  type BuiltinEntry,
  expectIterable,
  expectNumber,
  expectNumeric,
} from "./registry.js";

function sum(values: readonly Value[], start: Numeric = 0): Numeric {
  let total = start;
  for (const v of values) {
    total = arithmetic("+", total, expectNumeric("sum", v));
  }
  return total;
}

function length(name: string, v: Value): number {
  return expectIterable(name, v).length;
}

/**
 * max(xs) takes the largest item of a sequence; max(a, b, ...) the
 * largest argument.
 */
function extreme(name: string, args: Value[], sign: 1 | -1): Value {
  const values = args.length === 1 ? expectIterable(name, args[0]) : args;
  if (values.length === 0) {
    throw new EvaluationError(`${name}() arg is an empty sequence`);
  }
  let best = values[0];
  for (const v of values.slice(1)) {
    if (compareValues(v, best) * sign > 0) best = v;
  }
  return best;
}

function average(values: readonly Value[]): number {
  if (values.length === 0) return 0;
  return Number(sum(values)) / values.length;
}

/**
 * Order statistic: the k-th smallest item (0-based) under compareValues.
 *
 * Hoare-partition selection on a private copy; `values` is never
 * reordered.
 */
export function selectKth(values: readonly Value[], k: number): Value {
  if (k < 0 || k >= values.length) {
    throw new EvaluationError(
      `order statistic ${k} out of range for ${values.length} values`,
    );
  }
  const items = [...values];
  let lo = 0;
  let hi = items.length - 1;

  while (lo < hi) {
    const pivot = items[lo + Math.floor((hi - lo) / 2)];
    let i = lo;
    let j = hi;
    while (i <= j) {
      while (compareValues(items[i], pivot) < 0) i++;
      while (compareValues(items[j], pivot) > 0) j--;
      if (i <= j) {
        [items[i], items[j]] = [items[j], items[i]];
        i++;
        j--;
      }
    }
    if (k <= j) {
      hi = j;
    } else if (k >= i) {
      lo = i;
    } else {
      return items[k];
    }
  }
  return items[k];
}

/**
 * The item at index floor(p * N) of the sorted values. No interpolation.
 */
export function percentile(values: readonly Value[], p: number): Value {
  if (!(p >= 0 && p < 1)) {
    throw new EvaluationError(
      `percentile() fraction must be in [0, 1), got ${p}`,
    );
  }
  if (values.length === 0) {
    throw new EvaluationError("percentile() of an empty sequence");
  }
  return selectKth(values, Math.floor(p * values.length));
}

export const reduceBuiltins: readonly BuiltinEntry[] = [
  [
    "sum",
    {
      minArgs: 1,
      maxArgs: 2,
      call: (args) =>
        sum(
          expectIterable("sum", args[0]),
          args.length > 1 ? expectNumeric("sum", args[1]) : 0,
        ),
    },
  ],
  ["len", { minArgs: 1, maxArgs: 1, call: ([v]) => length("len", v) }],
  ["count", { minArgs: 1, maxArgs: 1, call: ([v]) => length("count", v) }],
  [
    "max",
    { minArgs: 1, maxArgs: Infinity, call: (args) => extreme("max", args, 1) },
  ],
  [
    "min",
    { minArgs: 1, maxArgs: Infinity, call: (args) => extreme("min", args, -1) },
  ],
  [
    "avg",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([xs]) => average(expectIterable("avg", xs)),
    },
  ],
  [
    "mean",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([xs]) => average(expectIterable("mean", xs)),
    },
  ],
  [
    "percentile",
    {
      minArgs: 2,
      maxArgs: 2,
      call: ([xs, p]) =>
        percentile(
          expectIterable("percentile", xs),
          expectNumber("percentile", p),
        ),
    },
  ],
];
