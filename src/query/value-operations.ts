/**
 * Value Utilities
 *
 * Type names, truthiness, equality, ordering and hashing for query values.
 */

import { EvaluationError } from "../errors.js";
import { asSequence, isTuple, isValueObject, type Value } from "../types.js";
import { compareNumbers, isNumber, isZero, numberKey } from "./numbers.js";

export function typeName(v: Value): string {
  if (v === null) return "null";
  if (typeof v === "boolean") return "boolean";
  if (isNumber(v)) return "number";
  if (typeof v === "string") return "string";
  if (Array.isArray(v)) return "list";
  if (isTuple(v)) return "tuple";
  return "object";
}

/**
 * Truthiness: null, false, 0, "", empty sequences and empty objects are
 * falsy.
 */
export function isTruthy(v: Value): boolean {
  if (v === null) return false;
  if (typeof v === "boolean") return v;
  if (isNumber(v)) return !isZero(v) && !Number.isNaN(v);
  if (typeof v === "string") return v.length > 0;
  const items = asSequence(v);
  if (items) return items.length > 0;
  return isValueObject(v) && v.size > 0;
}

/**
 * Structural equality. A tuple never equals a list; object key order is
 * irrelevant.
 */
export function valueEquals(a: Value, b: Value): boolean {
  return valueKey(a) === valueKey(b);
}

/**
 * Canonical string for a value, usable as a Map key for grouping,
 * joining and deduplication.
 */
export function valueKey(v: Value): string {
  if (v === null) return "n";
  if (typeof v === "boolean") return v ? "T" : "F";
  if (isNumber(v)) return `#${numberKey(v)}`;
  if (typeof v === "string") return JSON.stringify(v);
  if (Array.isArray(v)) return `[${v.map(valueKey).join(",")}]`;
  if (isTuple(v)) return `(${v.items.map(valueKey).join(",")})`;
  const entries = [...v].sort(([a], [b]) => compareStrings(a, b));
  return `{${entries.map(([k, item]) => `${JSON.stringify(k)}:${valueKey(item)}`).join(",")}}`;
}

function typeOrder(v: Value): number {
  if (v === null) return 0;
  if (typeof v === "boolean") return 1;
  if (isNumber(v)) return 2;
  if (typeof v === "string") return 3;
  if (isTuple(v)) return 4;
  if (Array.isArray(v)) return 5;
  return 6;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareSequences(a: readonly Value[], b: readonly Value[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const cmp = compareValues(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

/**
 * Total order used by sorting, min/max and percentile.
 * Sorts by type first (null < boolean < number < string < tuple < list <
 * object), then by value within type.
 */
export function compareValues(a: Value, b: Value): number {
  const ta = typeOrder(a);
  const tb = typeOrder(b);
  if (ta !== tb) return ta - tb;

  if (isNumber(a) && isNumber(b)) return compareNumbers(a, b);
  if (typeof a === "string" && typeof b === "string") {
    return compareStrings(a, b);
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  const sa = asSequence(a);
  const sb = asSequence(b);
  if (sa && sb) return compareSequences(sa, sb);

  // Objects: compare by sorted keys, then values
  if (isValueObject(a) && isValueObject(b)) {
    return compareStrings(valueKey(a), valueKey(b));
  }
  return 0;
}

/**
 * Ordering comparison for the `<`, `<=`, `>`, `>=` operators. Only
 * numbers, strings and sequences of the same kind are ordered.
 */
export function compareOrdered(a: Value, b: Value, op: string): number {
  const comparable =
    (isNumber(a) && isNumber(b)) ||
    (typeof a === "string" && typeof b === "string") ||
    (Array.isArray(a) && Array.isArray(b)) ||
    (isTuple(a) && isTuple(b));
  if (!comparable) {
    throw new EvaluationError(
      `'${op}' not supported between ${typeName(a)} and ${typeName(b)}`,
    );
  }
  return compareValues(a, b);
}

function writeJson(v: Value, indent: number, pad: string): string {
  if (v === null) return "null";
  if (typeof v === "bigint") return v.toString();
  if (typeof v !== "object") return JSON.stringify(v);

  const inner = pad + " ".repeat(indent);
  const open = indent > 0 ? `\n${inner}` : "";
  const separator = indent > 0 ? `,\n${inner}` : ",";
  const close = indent > 0 ? `\n${pad}` : "";

  if (isValueObject(v)) {
    if (v.size === 0) return "{}";
    const colon = indent > 0 ? ": " : ":";
    const members = [...v].map(
      ([key, item]) =>
        `${JSON.stringify(key)}${colon}${writeJson(item, indent, inner)}`,
    );
    return `{${open}${members.join(separator)}${close}}`;
  }
  const items = asSequence(v) ?? [];
  if (items.length === 0) return "[]";
  const elements = items.map((item) => writeJson(item, indent, inner));
  return `[${open}${elements.join(separator)}${close}]`;
}

/**
 * JSON text for a value, laid out like JSON.stringify with the same
 * indent. Object keys stay in insertion order, bigints print every
 * digit, tuples print as arrays.
 */
export function toJson(v: Value, indent = 0): string {
  return writeJson(v, indent, "");
}

/**
 * Plain text form of a value: strings unquoted, containers as compact
 * JSON.
 */
export function toDisplayString(v: Value): string {
  if (v === null) return "null";
  if (typeof v === "string") return v;
  if (typeof v !== "object") return String(v);
  return toJson(v);
}
