import { valueKey } from "../query/value-operations.js";
import type { Value } from "../types.js";

/**
 * Drop rows structurally equal to an earlier row. First occurrences keep
 * their order.
 */
export async function* distinct(
  rows: AsyncIterable<Value>,
): AsyncGenerator<Value> {
  const seen = new Set<string>();
  for await (const row of rows) {
    const key = valueKey(row);
    if (seen.has(key)) continue;
    seen.add(key);
    yield row;
  }
}
