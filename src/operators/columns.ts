/**
 * Positional access to output rows for the stream operators.
 */

import { ColumnIndexError } from "../errors.js";
import { toDisplayString } from "../query/value-operations.js";
import { asSequence, type Value } from "../types.js";

/**
 * Items of a tuple or list row. Anything else has no columns.
 */
export function rowItems(row: Value, column: number): readonly Value[] {
  const items = asSequence(row);
  if (!items) {
    throw new ColumnIndexError(
      column,
      0,
      `column ${column} requested from non-tuple row ${toDisplayString(row)}`,
    );
  }
  return items;
}

/**
 * The value at `index`; negative indices count from the end.
 */
export function column(row: Value, index: number): Value {
  const items = rowItems(row, index);
  const value = items.at(index);
  if (value === undefined) {
    throw new ColumnIndexError(index, items.length);
  }
  return value;
}

export function project(row: Value, indices: readonly number[]): Value[] {
  return indices.map((index) => column(row, index));
}
