/**
 * Object builtins: keys, values, items, get
 */

import { asSequence, isValueObject, Tuple, type Value } from "../../types.js";
import { argumentError, type BuiltinEntry, expectObject } from "./registry.js";

/**
 * get(container, key, default) looks up an object key or a sequence
 * index, returning the default (null) instead of failing.
 */
function get(container: Value, key: Value, fallback: Value): Value {
  if (isValueObject(container)) {
    if (typeof key !== "string") return fallback;
    const value = container.get(key);
    return value === undefined ? fallback : value;
  }
  const items = asSequence(container);
  if (items) {
    if (typeof key !== "number" || !Number.isInteger(key)) return fallback;
    const item = items.at(key);
    return item === undefined ? fallback : item;
  }
  throw argumentError("get", "an object or sequence", container);
}

export const objectBuiltins: readonly BuiltinEntry[] = [
  [
    "keys",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([o]) => [...expectObject("keys", o).keys()],
    },
  ],
  [
    "values",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([o]) => [...expectObject("values", o).values()],
    },
  ],
  [
    "items",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([o]) =>
        [...expectObject("items", o)].map(([k, v]) => new Tuple([k, v])),
    },
  ],
  [
    "get",
    {
      minArgs: 2,
      maxArgs: 3,
      call: (args) => get(args[0], args[1], args.length > 2 ? args[2] : null),
    },
  ],
];
