/**
 * AST node types for query expressions
 */

import type { Value } from "../types.js";

export type BinaryOperator = "+" | "-" | "*" | "/" | "//" | "%" | "**";

export type CompareOperator =
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "in"
  | "not in";

export type Expr =
  | LiteralNode
  | NameNode
  | TupleNode
  | ListNode
  | ObjectNode
  | ComprehensionNode
  | UnaryNode
  | BinaryNode
  | CompareNode
  | LogicalNode
  | ConditionalNode
  | AttributeNode
  | IndexNode
  | SliceNode
  | CallNode;

export interface LiteralNode {
  type: "Literal";
  value: Value;
}

export interface NameNode {
  type: "Name";
  name: string;
}

export interface TupleNode {
  type: "Tuple";
  elements: Expr[];
}

export interface ListNode {
  type: "List";
  elements: Expr[];
}

export interface ObjectNode {
  type: "Object";
  entries: Array<{ key: Expr; value: Expr }>;
}

/** `[element for targets in iterable if condition]` */
export interface ComprehensionNode {
  type: "Comprehension";
  element: Expr;
  /** One name binds the item; several unpack it */
  targets: string[];
  iterable: Expr;
  condition: Expr | null;
}

export interface UnaryNode {
  type: "Unary";
  op: "-" | "+" | "not";
  operand: Expr;
}

export interface BinaryNode {
  type: "Binary";
  op: BinaryOperator;
  left: Expr;
  right: Expr;
}

/** `a < b <= c` holds operands [a, b, c] and ops ["<", "<="] */
export interface CompareNode {
  type: "Compare";
  operands: Expr[];
  ops: CompareOperator[];
}

export interface LogicalNode {
  type: "Logical";
  op: "and" | "or";
  left: Expr;
  right: Expr;
}

/** `consequent if test else alternate`; a missing else yields [] */
export interface ConditionalNode {
  type: "Conditional";
  test: Expr;
  consequent: Expr;
  alternate: Expr;
}

export interface AttributeNode {
  type: "Attribute";
  object: Expr;
  name: string;
}

export interface IndexNode {
  type: "Index";
  object: Expr;
  index: Expr;
}

export interface SliceNode {
  type: "Slice";
  object: Expr;
  start: Expr | null;
  end: Expr | null;
}

export interface CallNode {
  type: "Call";
  name: string;
  args: Expr[];
}
