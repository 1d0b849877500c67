/**
 * Query expression parser
 *
 * Recursive descent over the token stream. Precedence, loosest first:
 *   tuple comma, conditional, or, and, not, comparison, + -, * / // %,
 *   unary - +, **, postfix (call, .name, [index], [start:end])
 *
 * A conditional without `else` gets an empty-list alternative, so a
 * guard that fails contributes no output records.
 */

import { ExpressionSyntaxError } from "../errors.js";
import { isNumber, negate, parseInteger } from "./numbers.js";
import type {
  BinaryOperator,
  CompareOperator,
  Expr,
} from "./parser-types.js";
import { type Token, type TokenType, tokenize } from "./tokenizer.js";

const COMPARE_OPS = new Set<TokenType>([
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  "in",
  "not in",
]);

const ADDITIVE_OPS = new Set<TokenType>(["+", "-"]);
const MULTIPLICATIVE_OPS = new Set<TokenType>(["*", "/", "//", "%"]);

function isCompareOperator(type: TokenType): type is CompareOperator {
  return COMPARE_OPS.has(type);
}

function isBinaryOperator(type: TokenType): type is BinaryOperator {
  return ADDITIVE_OPS.has(type) || MULTIPLICATIVE_OPS.has(type) || type === "**";
}

class Parser {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  parse(): Expr {
    const expr = this.parseTuple();
    if (this.peek().type !== "eof") {
      this.fail(`unexpected token '${this.peek().value}'`);
    }
    return expr;
  }

  /** `a, b` at the top level is a tuple */
  private parseTuple(): Expr {
    const first = this.parseConditional();
    if (this.peek().type !== ",") return first;

    const elements = [first];
    while (this.peek().type === ",") {
      this.advance();
      if (this.peek().type === "eof") break;
      elements.push(this.parseConditional());
    }
    return { type: "Tuple", elements };
  }

  private parseConditional(): Expr {
    const consequent = this.parseOr();
    if (this.peek().type !== "if") return consequent;

    this.advance();
    const test = this.parseOr();
    let alternate: Expr = { type: "List", elements: [] };
    if (this.peek().type === "else") {
      this.advance();
      alternate = this.parseConditional();
    }
    return { type: "Conditional", test, consequent, alternate };
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.peek().type === "or") {
      this.advance();
      left = { type: "Logical", op: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.peek().type === "and") {
      this.advance();
      left = { type: "Logical", op: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.peek().type === "not") {
      this.advance();
      return { type: "Unary", op: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const first = this.parseBinary(ADDITIVE_OPS);
    const operands = [first];
    const ops: CompareOperator[] = [];

    let type = this.peek().type;
    while (isCompareOperator(type)) {
      this.advance();
      ops.push(type);
      operands.push(this.parseBinary(ADDITIVE_OPS));
      type = this.peek().type;
    }

    if (ops.length === 0) return first;
    return { type: "Compare", operands, ops };
  }

  private parseBinary(level: Set<TokenType>): Expr {
    const next = () =>
      level === ADDITIVE_OPS
        ? this.parseBinary(MULTIPLICATIVE_OPS)
        : this.parseUnary();

    let left = next();
    let type = this.peek().type;
    while (level.has(type) && isBinaryOperator(type)) {
      this.advance();
      left = { type: "Binary", op: type, left, right: next() };
      type = this.peek().type;
    }
    return left;
  }

  private parseUnary(): Expr {
    const type = this.peek().type;
    if (type === "-" || type === "+") {
      this.advance();
      const operand = this.parseUnary();
      // Fold negative literals so that -1 is a literal
      if (
        type === "-" &&
        operand.type === "Literal" &&
        isNumber(operand.value)
      ) {
        return { type: "Literal", value: negate(operand.value) };
      }
      return { type: "Unary", op: type, operand };
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const base = this.parsePostfix();
    if (this.peek().type === "**") {
      this.advance();
      // Right associative, and binds tighter than a unary minus on its left
      return { type: "Binary", op: "**", left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();

    while (true) {
      const token = this.peek();

      if (token.type === ".") {
        this.advance();
        const name = this.expect("ident").value;
        if (this.peek().type === "(") {
          // x.f(args) is f(x, args)
          expr = { type: "Call", name, args: [expr, ...this.parseArguments()] };
        } else {
          expr = { type: "Attribute", object: expr, name };
        }
        continue;
      }

      if (token.type === "[") {
        this.advance();
        expr = this.parseSubscript(expr);
        continue;
      }

      return expr;
    }
  }

  private parseSubscript(object: Expr): Expr {
    let start: Expr | null = null;
    if (this.peek().type !== ":") {
      start = this.parseConditional();
      if (this.peek().type === "]") {
        this.advance();
        return { type: "Index", object, index: start };
      }
    }

    this.expect(":");
    let end: Expr | null = null;
    if (this.peek().type !== "]") {
      end = this.parseConditional();
    }
    this.expect("]");
    return { type: "Slice", object, start, end };
  }

  private parseArguments(): Expr[] {
    this.expect("(");
    const args: Expr[] = [];
    while (this.peek().type !== ")") {
      args.push(this.parseConditional());
      if (this.peek().type !== ",") break;
      this.advance();
    }
    this.expect(")");
    return args;
  }

  private parsePrimary(): Expr {
    const token = this.peek();

    switch (token.type) {
      case "int":
        this.advance();
        return { type: "Literal", value: parseInteger(token.value) };

      case "float":
        this.advance();
        return { type: "Literal", value: Number.parseFloat(token.value) };

      case "string": {
        this.advance();
        // Adjacent string literals concatenate
        let value = token.value;
        while (this.peek().type === "string") {
          value += this.advance().value;
        }
        return { type: "Literal", value };
      }

      case "true":
        this.advance();
        return { type: "Literal", value: true };

      case "false":
        this.advance();
        return { type: "Literal", value: false };

      case "none":
        this.advance();
        return { type: "Literal", value: null };

      case "ident":
        this.advance();
        if (this.peek().type === "(") {
          return { type: "Call", name: token.value, args: this.parseArguments() };
        }
        return { type: "Name", name: token.value };

      case "(":
        return this.parseParenthesized();

      case "[":
        return this.parseList();

      case "{":
        return this.parseObject();

      default:
        return this.fail(
          token.type === "eof"
            ? "unexpected end of expression"
            : `unexpected token '${token.value}'`,
        );
    }
  }

  private parseParenthesized(): Expr {
    this.expect("(");
    if (this.peek().type === ")") {
      this.advance();
      return { type: "Tuple", elements: [] };
    }

    const first = this.parseConditional();
    if (this.peek().type === ")") {
      this.advance();
      return first;
    }

    const elements = [first];
    while (this.peek().type === ",") {
      this.advance();
      if (this.peek().type === ")") break;
      elements.push(this.parseConditional());
    }
    this.expect(")");
    return { type: "Tuple", elements };
  }

  private parseList(): Expr {
    this.expect("[");
    if (this.peek().type === "]") {
      this.advance();
      return { type: "List", elements: [] };
    }

    const first = this.parseConditional();
    if (this.peek().type === "for") {
      return this.parseComprehension(first);
    }

    const elements = [first];
    while (this.peek().type === ",") {
      this.advance();
      if (this.peek().type === "]") break;
      elements.push(this.parseConditional());
    }
    this.expect("]");
    return { type: "List", elements };
  }

  private parseComprehension(element: Expr): Expr {
    this.expect("for");
    const targets = [this.expect("ident").value];
    while (this.peek().type === ",") {
      this.advance();
      targets.push(this.expect("ident").value);
    }
    this.expect("in");
    const iterable = this.parseOr();

    let condition: Expr | null = null;
    if (this.peek().type === "if") {
      this.advance();
      condition = this.parseOr();
    }
    this.expect("]");
    return { type: "Comprehension", element, targets, iterable, condition };
  }

  private parseObject(): Expr {
    this.expect("{");
    const entries: Array<{ key: Expr; value: Expr }> = [];

    while (this.peek().type !== "}") {
      let key: Expr;
      // Bare identifiers are string keys
      if (this.peek().type === "ident" && this.peekAt(1).type === ":") {
        key = { type: "Literal", value: this.advance().value };
      } else {
        key = this.parseConditional();
      }
      this.expect(":");
      entries.push({ key, value: this.parseConditional() });
      if (this.peek().type !== ",") break;
      this.advance();
    }

    this.expect("}");
    return { type: "Object", entries };
  }

  private peek(): Token {
    return this.peekAt(0);
  }

  private peekAt(offset: number): Token {
    const last = this.tokens[this.tokens.length - 1];
    return this.tokens[this.pos + offset] ?? last;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "eof") this.pos++;
    return token;
  }

  private expect(type: TokenType): Token {
    const token = this.peek();
    if (token.type !== type) {
      const found = token.type === "eof" ? "end of expression" : `'${token.value}'`;
      this.fail(`expected '${type}' but found ${found}`);
    }
    return this.advance();
  }

  private fail(message: string): never {
    const pos = this.peek().pos;
    throw new ExpressionSyntaxError(`${message} at position ${pos}`, pos);
  }
}

/**
 * Parse a query expression string into an AST.
 */
export function parse(input: string): Expr {
  if (input.trim() === "") {
    throw new ExpressionSyntaxError("empty expression", 0);
  }
  return new Parser(tokenize(input)).parse();
}
