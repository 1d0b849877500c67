/**
 * Sorting and truncation.
 */

import { compareValues } from "../query/value-operations.js";
import type { Value } from "../types.js";
import { project } from "./columns.js";

export interface OrderBySpec {
  columns: readonly number[];
  /** Invert the whole comparison; rows with equal keys keep their order */
  reverse?: boolean;
}

/**
 * Stable sort on the values at `spec.columns`.
 */
export async function* orderBy(
  rows: AsyncIterable<Value>,
  spec: OrderBySpec,
): AsyncGenerator<Value> {
  const keyed: Array<{ key: Value[]; row: Value }> = [];
  for await (const row of rows) {
    keyed.push({ key: project(row, spec.columns), row });
  }

  const sign = spec.reverse ? -1 : 1;
  keyed.sort((a, b) => sign * compareValues(a.key, b.key));
  for (const { row } of keyed) {
    yield row;
  }
}

/**
 * At most `count` rows, then stop pulling from upstream. 0 or undefined
 * means no limit.
 */
export async function* limit<T>(
  rows: AsyncIterable<T>,
  count?: number,
): AsyncGenerator<T> {
  if (!count) {
    yield* rows;
    return;
  }
  let emitted = 0;
  for await (const row of rows) {
    yield row;
    emitted++;
    if (emitted >= count) return;
  }
}
