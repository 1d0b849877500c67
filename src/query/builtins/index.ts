/**
 * Builtin functions index
 */

import { mathBuiltins } from "./math-builtins.js";
import { objectBuiltins } from "./object-builtins.js";
import { reduceBuiltins } from "./reduce-builtins.js";
import { type Builtin, createRegistry } from "./registry.js";
import { sequenceBuiltins } from "./sequence-builtins.js";
import { stringBuiltins } from "./string-builtins.js";

export { percentile, selectKth } from "./reduce-builtins.js";
export type { Builtin, BuiltinEntry, FunctionRegistry } from "./registry.js";

/**
 * A fresh registry holding every builtin. Callers may add their own
 * functions to it before compiling queries.
 */
export function createDefaultRegistry(): Map<string, Builtin> {
  return createRegistry(
    reduceBuiltins,
    mathBuiltins,
    sequenceBuiltins,
    objectBuiltins,
    stringBuiltins,
  );
}
