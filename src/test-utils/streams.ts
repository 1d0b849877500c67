import { toJson } from "../query/value-operations.js";
import { asSequence, isValueObject, type Value } from "../types.js";

export async function* fromValues(values: readonly Value[]): AsyncGenerator<Value> {
  yield* values;
}

/** Rows as plain arrays, for comparing tuples with toEqual */
export function rowsOf(values: readonly Value[]): Value[][] {
  return values.map((value) => {
    const items = asSequence(value);
    if (!items) throw new Error(`not a row: ${toJson(value)}`);
    return [...items];
  });
}

/** Object entries in key order, for comparing objects with toEqual */
export function entriesOf(value: Value): Array<[string, Value]> {
  if (!isValueObject(value)) throw new Error(`not an object: ${toJson(value)}`);
  return [...value];
}
