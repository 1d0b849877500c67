/**
 * Sequence and conversion builtins: tuple, list, sorted, reversed, range,
 * str, bool
 */

import { EvaluationError } from "../../errors.js";
import { Tuple, type Value } from "../../types.js";
import {
  compareValues,
  isTruthy,
  toDisplayString,
} from "../value-operations.js";
import {
  type BuiltinEntry,
  expectInteger,
  expectIterable,
} from "./registry.js";

/** Longest list range() may build */
const MAX_RANGE_LENGTH = 1_000_000;

function range(args: Value[]): Value[] {
  const ints = args.map((a) => expectInteger("range", a));
  const [start, stop, step] =
    ints.length === 1
      ? [0, ints[0], 1]
      : [ints[0], ints[1], ints.length > 2 ? ints[2] : 1];
  if (step === 0) {
    throw new EvaluationError("range() step must not be zero");
  }
  const length = Math.max(0, Math.ceil((stop - start) / step));
  if (length > MAX_RANGE_LENGTH) {
    throw new EvaluationError(
      `range() of ${length} items exceeds the limit of ${MAX_RANGE_LENGTH}`,
    );
  }
  return Array.from({ length }, (_, i) => start + i * step);
}

function sorted(items: readonly Value[], reverse: boolean): Value[] {
  // Array.prototype.sort is stable
  return [...items].sort((a, b) =>
    reverse ? compareValues(b, a) : compareValues(a, b),
  );
}

export const sequenceBuiltins: readonly BuiltinEntry[] = [
  [
    "tuple",
    {
      minArgs: 0,
      maxArgs: 1,
      call: (args) =>
        new Tuple(args.length === 0 ? [] : expectIterable("tuple", args[0])),
    },
  ],
  [
    "list",
    {
      minArgs: 0,
      maxArgs: 1,
      call: (args) =>
        args.length === 0 ? [] : [...expectIterable("list", args[0])],
    },
  ],
  [
    "sorted",
    {
      minArgs: 1,
      maxArgs: 2,
      call: (args) =>
        sorted(
          expectIterable("sorted", args[0]),
          args.length > 1 && isTruthy(args[1]),
        ),
    },
  ],
  [
    "reversed",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([xs]) => [...expectIterable("reversed", xs)].reverse(),
    },
  ],
  ["range", { minArgs: 1, maxArgs: 3, call: range }],
  ["str", { minArgs: 1, maxArgs: 1, call: ([v]) => toDisplayString(v) }],
  ["bool", { minArgs: 1, maxArgs: 1, call: ([v]) => isTruthy(v) }],
];
