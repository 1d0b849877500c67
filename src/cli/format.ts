import { toDisplayString, toJson } from "../query/value-operations.js";
import { asSequence, isValueObject, type Value } from "../types.js";

/**
 * One output line (without terminator) for a pipeline result. Objects
 * print as JSON, tuples and lists as their comma-joined items.
 */
export function formatRecord(value: Value, compact = false): string {
  if (isValueObject(value)) {
    return toJson(value, compact ? 0 : 2);
  }
  const items = asSequence(value);
  if (items) {
    return items.map(toDisplayString).join(",");
  }
  return toDisplayString(value);
}
