/**
 * Query expression language
 *
 * A small, sandboxed expression language evaluated against each record:
 * arithmetic, comparisons, boolean logic, conditionals, tuple/list/object
 * literals, comprehensions, field access and calls into an explicit
 * function registry.
 */

export * from "./builtins/index.js";
export * from "./evaluator.js";
export * from "./literal.js";
export * from "./names.js";
export type * from "./parser-types.js";
export { parse } from "./parser.js";
export * from "./value-operations.js";
