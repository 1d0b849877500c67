/**
 * Numeric builtins: abs, round, int, float
 */

import { EvaluationError } from "../../errors.js";
import type { Value } from "../../types.js";
import {
  absolute,
  isNumber,
  type Numeric,
  parseInteger,
} from "../numbers.js";
import {
  argumentError,
  type BuiltinEntry,
  expectInteger,
  expectNumber,
  expectNumeric,
} from "./registry.js";

/**
 * Round half to even, so that round(0.5) == 0 and round(1.5) == 2.
 */
export function roundHalfEven(x: number, digits = 0): number {
  const factor = 10 ** digits;
  const scaled = x * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded: number;
  if (diff > 0.5) {
    rounded = floor + 1;
  } else if (diff < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / factor;
}

function toInt(v: Value): Numeric {
  if (typeof v === "string") {
    const text = v.trim();
    if (!/^[+-]?\d+$/.test(text)) {
      throw new EvaluationError(`invalid literal for int(): '${v}'`);
    }
    return parseInteger(text);
  }
  const n = expectNumeric("int", v);
  if (typeof n === "bigint") return n;
  if (!Number.isFinite(n)) {
    throw new EvaluationError(`cannot convert ${n} to integer`);
  }
  return Math.trunc(n);
}

function toFloat(v: Value): number {
  if (typeof v === "string") {
    const text = v.trim();
    const n = Number(text);
    if (text === "" || Number.isNaN(n)) {
      throw new EvaluationError(`could not convert string to float: '${v}'`);
    }
    return n;
  }
  if (isNumber(v) || typeof v === "boolean") {
    return expectNumber("float", v);
  }
  throw argumentError("float", "a number or string", v);
}

export const mathBuiltins: readonly BuiltinEntry[] = [
  [
    "abs",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([x]) => absolute(expectNumeric("abs", x)),
    },
  ],
  [
    "round",
    {
      minArgs: 1,
      maxArgs: 2,
      call: (args) => {
        const x = expectNumeric("round", args[0]);
        // Already an integer, and too large for float rounding
        if (typeof x === "bigint") return x;
        return roundHalfEven(
          x,
          args.length > 1 ? expectInteger("round", args[1]) : 0,
        );
      },
    },
  ],
  ["int", { minArgs: 1, maxArgs: 1, call: ([v]) => toInt(v) }],
  ["float", { minArgs: 1, maxArgs: 1, call: ([v]) => toFloat(v) }],
];
