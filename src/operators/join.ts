/**
 * Inner equijoin on the first column.
 *
 * The build side is read completely into a hash table keyed by its first
 * value; the other side is streamed. For every match the output row is
 * the build row followed by the streamed row minus its key.
 */

import { valueKey } from "../query/value-operations.js";
import { Tuple, type Value } from "../types.js";
import { column, rowItems } from "./columns.js";

export async function* join(
  build: AsyncIterable<Value>,
  streamed: AsyncIterable<Value>,
): AsyncGenerator<Tuple> {
  const table = new Map<string, Array<readonly Value[]>>();
  for await (const row of build) {
    const key = valueKey(column(row, 0));
    const matches = table.get(key);
    if (matches) {
      matches.push(rowItems(row, 0));
    } else {
      table.set(key, [rowItems(row, 0)]);
    }
  }

  for await (const row of streamed) {
    const matches = table.get(valueKey(column(row, 0)));
    if (!matches) continue;
    const rest = rowItems(row, 0).slice(1);
    for (const match of matches) {
      yield new Tuple([...match, ...rest]);
    }
  }
}
