/**
 * Query expression tokenizer
 */

import { ExpressionSyntaxError } from "../errors.js";

export type TokenType =
  | "int"
  | "float"
  | "string"
  | "ident"
  | "true"
  | "false"
  | "none"
  | "and"
  | "or"
  | "not"
  | "in"
  | "not in"
  | "if"
  | "else"
  | "for"
  | "("
  | ")"
  | "["
  | "]"
  | "{"
  | "}"
  | ","
  | ":"
  | "."
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "**"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "eof";

export interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

const KEYWORDS = new Map<string, TokenType>([
  ["True", "true"],
  ["true", "true"],
  ["False", "false"],
  ["false", "false"],
  ["None", "none"],
  ["null", "none"],
  ["and", "and"],
  ["or", "or"],
  ["not", "not"],
  ["in", "in"],
  ["if", "if"],
  ["else", "else"],
  ["for", "for"],
]);

// Longest first
const OPERATORS: TokenType[] = [
  "**",
  "//",
  "==",
  "!=",
  "<=",
  ">=",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ":",
  ".",
  "+",
  "-",
  "*",
  "/",
  "%",
  "<",
  ">",
];

/** Identifiers follow Unicode ID_Start/ID_Continue, plus a leading "_" */
const IDENTIFIER = /[\p{ID_Start}_]\p{ID_Continue}*/uy;

export class Tokenizer {
  private pos = 0;
  private tokens: Token[] = [];

  constructor(private input: string) {}

  tokenize(): Token[] {
    while (this.pos < this.input.length) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;
      this.tokens.push(this.nextToken());
    }
    this.tokens.push({ type: "eof", value: "", pos: this.pos });
    return this.tokens;
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
      this.pos++;
    }
  }

  private nextToken(): Token {
    const start = this.pos;
    const ch = this.input[this.pos];

    if (this.isDigit(ch)) {
      return this.readNumber();
    }
    // .5 is a float, not attribute access
    if (ch === "." && this.isDigit(this.input[this.pos + 1] ?? "")) {
      return this.readNumber();
    }

    if (ch === '"' || ch === "'") {
      return this.readString(ch);
    }

    for (const op of OPERATORS) {
      if (this.input.startsWith(op, this.pos)) {
        this.pos += op.length;
        return { type: op, value: op, pos: start };
      }
    }

    const identifier = this.identifierAt(start);
    if (identifier !== undefined) {
      return this.readIdentifier(identifier);
    }

    throw new ExpressionSyntaxError(
      `unexpected character '${ch}' at position ${start}`,
      start,
    );
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private identifierAt(pos: number): string | undefined {
    IDENTIFIER.lastIndex = pos;
    return IDENTIFIER.exec(this.input)?.[0];
  }

  private readNumber(): Token {
    const start = this.pos;
    let hasDecimal = false;
    let hasExponent = false;

    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (this.isDigit(ch) || ch === "_") {
        this.pos++;
      } else if (ch === "." && !hasDecimal && !hasExponent) {
        hasDecimal = true;
        this.pos++;
      } else if ((ch === "e" || ch === "E") && !hasExponent) {
        hasExponent = true;
        this.pos++;
        const sign = this.input[this.pos];
        if (sign === "+" || sign === "-") {
          this.pos++;
        }
        if (!this.isDigit(this.input[this.pos] ?? "")) {
          throw new ExpressionSyntaxError(
            `malformed number at position ${start}`,
            start,
          );
        }
      } else {
        break;
      }
    }

    if (this.identifierAt(this.pos) !== undefined) {
      throw new ExpressionSyntaxError(
        `malformed number at position ${start}`,
        start,
      );
    }

    const value = this.input.slice(start, this.pos).replace(/_/g, "");
    if (!hasDecimal && !hasExponent && /^0+[1-9]/.test(value)) {
      throw new ExpressionSyntaxError(
        `leading zeros in integer literal at position ${start}`,
        start,
      );
    }
    return {
      type: hasDecimal || hasExponent ? "float" : "int",
      value,
      pos: start,
    };
  }

  private readString(quote: string): Token {
    const start = this.pos;
    this.pos++; // skip opening quote
    let value = "";

    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (ch === quote) {
        this.pos++;
        return { type: "string", value, pos: start };
      }
      if (ch === "\\") {
        this.pos++;
        if (this.pos < this.input.length) {
          const escaped = this.input[this.pos];
          switch (escaped) {
            case "n":
              value += "\n";
              break;
            case "r":
              value += "\r";
              break;
            case "t":
              value += "\t";
              break;
            case "0":
              value += "\0";
              break;
            default:
              value += escaped;
          }
          this.pos++;
        }
      } else {
        value += ch;
        this.pos++;
      }
    }

    throw new ExpressionSyntaxError(
      `unterminated string starting at position ${start}`,
      start,
    );
  }

  private readIdentifier(value: string): Token {
    const start = this.pos;
    this.pos += value.length;

    if (value === "not") {
      // "not in" is a single comparison operator
      const rest = this.input.slice(this.pos);
      const match = /^\s+in(?!\p{ID_Continue})/u.exec(rest);
      if (match) {
        this.pos += match[0].length;
        return { type: "not in", value: "not in", pos: start };
      }
    }

    const keywordType = KEYWORDS.get(value);
    if (keywordType !== undefined) {
      return { type: keywordType, value, pos: start };
    }
    return { type: "ident", value, pos: start };
  }
}

export function tokenize(input: string): Token[] {
  return new Tokenizer(input).tokenize();
}
