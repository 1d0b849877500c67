/**
 * CSV row parsing for the record reader
 */

import Papa from "papaparse";
import { parseLiteral } from "../query/literal.js";
import { Tuple, type Value } from "../types.js";

export type CsvRowResult =
  | { ok: true; fields: string[] }
  | { ok: false; message: string };

/**
 * Parse one line as a single comma-separated row. Quoted fields follow
 * RFC 4180; an unbalanced quote is a failure.
 */
export function parseCsvRow(line: string): CsvRowResult {
  const result = Papa.parse<string[]>(line, {
    delimiter: ",",
    header: false,
    skipEmptyLines: false,
  });
  if (result.errors.length > 0) {
    return { ok: false, message: result.errors[0].message };
  }
  if (result.data.length !== 1) {
    return {
      ok: false,
      message: `expected one row, got ${result.data.length}`,
    };
  }
  return { ok: true, fields: result.data[0] };
}

/**
 * The most specific literal a field spells ("42" -> 42, "True" -> true,
 * "(1, 2)" -> a tuple), else the field itself.
 */
export function convertField(field: string): Value {
  const literal = parseLiteral(field);
  return literal.ok ? literal.value : field;
}

export function toCsvRecord(fields: readonly string[]): Tuple {
  return new Tuple(fields.map(convertField));
}
