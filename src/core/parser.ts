/**
 * Recursive-descent parser for equation expressions.
 *
 * Precedence, lowest first: comparison (non-associative), additive,
 * multiplicative, unary sign, power (right-associative), primary.
 * So `-2^2` is `-(2^2)` and `2^3^2` is `2^(3^2)`.
 */
import type { BinaryOperator } from "./ast";
import { ParseError } from "./errors";
import { describeToken, tokenize } from "./lexer";
import type { Token } from "./lexer";

export type SyntaxNode =
  | { kind: "number"; value: number; position: number }
  | { kind: "name"; name: string; position: number }
  | { kind: "negate"; operand: SyntaxNode; position: number }
  | { kind: "binary"; op: BinaryOperator; left: SyntaxNode; right: SyntaxNode; position: number }
  | { kind: "call"; name: string; args: SyntaxNode[]; position: number };

const COMPARISON = new Set([">", ">=", "<", "<=", "==", "!="]);

function isOperator(token: Token, ...ops: string[]): boolean {
  return token.type === "operator" && ops.includes(token.text);
}

function isPunct(token: Token, text: string): boolean {
  return token.type === "punct" && token.text === text;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== "eof") this.index += 1;
    return token;
  }

  parseComplete(): SyntaxNode {
    const node = this.comparison();
    const trailing = this.peek();
    if (trailing.type !== "eof") {
      throw new ParseError(trailing.position, "end of input", describeToken(trailing));
    }
    return node;
  }

  private comparison(): SyntaxNode {
    const left = this.additive();
    const token = this.peek();
    if (token.type === "operator" && COMPARISON.has(token.text)) {
      this.next();
      const right = this.additive();
      return { kind: "binary", op: token.text, left, right, position: token.position };
    }
    return left;
  }

  private additive(): SyntaxNode {
    let left = this.multiplicative();
    for (;;) {
      const token = this.peek();
      if (token.type !== "operator" || (token.text !== "+" && token.text !== "-")) return left;
      this.next();
      const right = this.multiplicative();
      left = { kind: "binary", op: token.text, left, right, position: token.position };
    }
  }

  private multiplicative(): SyntaxNode {
    let left = this.unary();
    for (;;) {
      const token = this.peek();
      if (token.type !== "operator" || (token.text !== "*" && token.text !== "/")) return left;
      this.next();
      const right = this.unary();
      left = { kind: "binary", op: token.text, left, right, position: token.position };
    }
  }

  private unary(): SyntaxNode {
    const token = this.peek();
    if (isOperator(token, "-")) {
      this.next();
      return { kind: "negate", operand: this.unary(), position: token.position };
    }
    if (isOperator(token, "+")) {
      this.next();
      return this.unary();
    }
    return this.power();
  }

  private power(): SyntaxNode {
    const base = this.primary();
    const token = this.peek();
    if (isOperator(token, "^")) {
      this.next();
      const exponent = this.unary();
      return { kind: "binary", op: "^", left: base, right: exponent, position: token.position };
    }
    return base;
  }

  private primary(): SyntaxNode {
    const token = this.next();
    switch (token.type) {
      case "number":
        return { kind: "number", value: token.value, position: token.position };
      case "identifier":
        if (isPunct(this.peek(), "(")) {
          this.next();
          return { kind: "call", name: token.text, args: this.callArguments(), position: token.position };
        }
        return { kind: "name", name: token.text, position: token.position };
      case "punct":
        if (token.text === "(") {
          const inner = this.comparison();
          this.expectPunct(")");
          return inner;
        }
        break;
      default:
        break;
    }
    throw new ParseError(token.position, "a number, identifier or '('", describeToken(token));
  }

  private callArguments(): SyntaxNode[] {
    const args: SyntaxNode[] = [];
    if (isPunct(this.peek(), ")")) {
      this.next();
      return args;
    }
    for (;;) {
      args.push(this.comparison());
      const token = this.next();
      if (isPunct(token, ")")) return args;
      if (!isPunct(token, ",")) {
        throw new ParseError(token.position, "',' or ')'", describeToken(token));
      }
    }
  }

  private expectPunct(text: string): void {
    const token = this.next();
    if (!isPunct(token, text)) {
      throw new ParseError(token.position, `'${text}'`, describeToken(token));
    }
  }
}

/** Parses a token list that ends with an `eof` token. */
export function parseTokens(tokens: Token[]): SyntaxNode {
  return new Parser(tokens).parseComplete();
}

export function parse(source: string): SyntaxNode {
  return parseTokens(tokenize(source));
}
