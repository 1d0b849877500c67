/**
 * Number Utilities
 *
 * Integers within Number.MAX_SAFE_INTEGER are plain numbers. Integers
 * beyond it are bigints, so an id such as 9007199254740993 keeps every
 * digit. Floats are always numbers.
 */

import type { Value } from "../types.js";

export type Numeric = number | bigint;

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

export function isNumber(v: Value): v is Numeric {
  return typeof v === "number" || typeof v === "bigint";
}

/**
 * An integer as a number when that is exact, else as a bigint.
 */
export function fromBigInt(n: bigint): Numeric {
  return n >= MIN_SAFE && n <= MAX_SAFE ? Number(n) : n;
}

/**
 * Read a decimal integer, with optional sign, without losing digits.
 */
export function parseInteger(text: string): Numeric {
  return fromBigInt(BigInt(text));
}

/** Bigints and safe integers; integer arithmetic on these is exact */
function isExactInteger(n: Numeric): boolean {
  return typeof n === "bigint" || Number.isSafeInteger(n);
}

function toBigInt(n: Numeric): bigint {
  return typeof n === "bigint" ? n : BigInt(n);
}

export type ArithmeticOperator = "+" | "-" | "*" | "//" | "%" | "**";

function floatOp(op: ArithmeticOperator, x: number, y: number): number {
  switch (op) {
    case "+":
      return x + y;
    case "-":
      return x - y;
    case "*":
      return x * y;
    case "**":
      return x ** y;
    case "//":
      return Math.floor(x / y);
    case "%":
      // Result takes the sign of the divisor
      return x - y * Math.floor(x / y);
  }
}

function integerOp(op: ArithmeticOperator, x: bigint, y: bigint): bigint {
  switch (op) {
    case "+":
      return x + y;
    case "-":
      return x - y;
    case "*":
      return x * y;
    case "**":
      return x ** y;
    case "//": {
      const q = x / y;
      return x % y !== 0n && x < 0n !== y < 0n ? q - 1n : q;
    }
    case "%": {
      const r = x % y;
      return r !== 0n && r < 0n !== y < 0n ? r + y : r;
    }
  }
}

/**
 * Arithmetic that stays exact for integers: when both operands are
 * integers and the float result would leave the safe range, the result
 * is computed as a bigint. The caller rejects a zero divisor.
 */
export function arithmetic(
  op: ArithmeticOperator,
  a: Numeric,
  b: Numeric,
): Numeric {
  const exact =
    isExactInteger(a) &&
    isExactInteger(b) &&
    !(op === "**" && toBigInt(b) < 0n);
  if (typeof a === "number" && typeof b === "number") {
    const result = floatOp(op, a, b);
    if (!exact || Number.isSafeInteger(result)) return result;
  }
  if (!exact) return floatOp(op, Number(a), Number(b));
  if (op === "**") {
    // Powers beyond the float range stay floats
    const approx = Number(a) ** Number(b);
    if (!Number.isFinite(approx)) return approx;
  }
  return fromBigInt(integerOp(op, toBigInt(a), toBigInt(b)));
}

export function negate(n: Numeric): Numeric {
  return typeof n === "bigint" ? fromBigInt(-n) : -n;
}

export function absolute(n: Numeric): Numeric {
  return typeof n === "bigint" ? (n < 0n ? -n : n) : Math.abs(n);
}

export function isZero(n: Numeric): boolean {
  return typeof n === "bigint" ? n === 0n : n === 0;
}

function sign(n: bigint): number {
  return n < 0n ? -1 : n > 0n ? 1 : 0;
}

/**
 * Numeric order with NaN after everything else. A bigint and a number
 * compare by exact value.
 */
export function compareNumbers(a: Numeric, b: Numeric): number {
  if (typeof a === "number" && Number.isNaN(a)) {
    return typeof b === "number" && Number.isNaN(b) ? 0 : 1;
  }
  if (typeof b === "number" && Number.isNaN(b)) return -1;

  if (typeof a === "number") {
    if (typeof b === "number") return a < b ? -1 : a > b ? 1 : 0;
    return -compareNumbers(b, a);
  }
  if (typeof b === "bigint") return sign(a - b);

  // a is a bigint, b a number
  if (!Number.isFinite(b)) return b > 0 ? -1 : 1;
  if (Number.isInteger(b)) return sign(a - BigInt(b));
  // Non-integral floats are far inside the safe range
  const x = Number(a);
  return x < b ? -1 : x > b ? 1 : 0;
}

/**
 * Canonical text for hashing: equal numbers get equal keys, whether
 * they are bigints, integral floats or -0.
 */
export function numberKey(n: Numeric): string {
  if (typeof n === "bigint") return n.toString();
  if (Object.is(n, -0)) return "0";
  if (Number.isInteger(n) && !Number.isSafeInteger(n)) {
    return BigInt(n).toString();
  }
  return String(n);
}
