/**
 * Builtin function registry
 *
 * Queries can only call functions listed in the registry handed to the
 * compiler. Uses Map so that names like "constructor" never resolve to
 * anything inherited.
 */

import { EvaluationError } from "../../errors.js";
import {
  asSequence,
  isValueObject,
  type Value,
  type ValueObject,
} from "../../types.js";
import { isNumber, type Numeric } from "../numbers.js";
import { typeName } from "../value-operations.js";

export interface Builtin {
  minArgs: number;
  /** Infinity for variadic functions */
  maxArgs: number;
  call(args: Value[]): Value;
}

export type FunctionRegistry = ReadonlyMap<string, Builtin>;

export type BuiltinEntry = readonly [string, Builtin];

export function createRegistry(
  ...groups: ReadonlyArray<readonly BuiltinEntry[]>
): Map<string, Builtin> {
  return new Map<string, Builtin>(groups.flat());
}

export function argumentError(
  name: string,
  expected: string,
  got: Value,
): EvaluationError {
  return new EvaluationError(
    `${name}() expects ${expected}, got ${typeName(got)}`,
  );
}

/**
 * A number, keeping bigints exact. Booleans count as 0 and 1.
 */
export function expectNumeric(name: string, v: Value): Numeric {
  if (isNumber(v)) return v;
  if (typeof v === "boolean") return v ? 1 : 0;
  throw argumentError(name, "a number", v);
}

/**
 * A number as a float; bigints are rounded to the nearest one.
 */
export function expectNumber(name: string, v: Value): number {
  return Number(expectNumeric(name, v));
}

export function expectInteger(name: string, v: Value): number {
  const n = expectNumeric(name, v);
  if (typeof n === "bigint") {
    throw new EvaluationError(`${name}() integer ${n} is too large`);
  }
  if (!Number.isInteger(n)) {
    throw new EvaluationError(`${name}() expects an integer, got ${n}`);
  }
  return n;
}

export function expectString(name: string, v: Value): string {
  if (typeof v === "string") return v;
  throw argumentError(name, "a string", v);
}

export function expectObject(name: string, v: Value): ValueObject {
  if (isValueObject(v)) return v;
  throw argumentError(name, "an object", v);
}

/**
 * Items of anything iterable: sequences yield their items, strings their
 * characters, objects their keys.
 */
export function expectIterable(name: string, v: Value): readonly Value[] {
  const items = asSequence(v);
  if (items) return items;
  if (typeof v === "string") return [...v];
  if (isValueObject(v)) return [...v.keys()];
  throw argumentError(name, "a sequence", v);
}
