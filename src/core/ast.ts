import type { ComparisonOperator } from "./lexer";

export type BinaryOperator = "+" | "-" | "*" | "/" | "^" | ComparisonOperator;

export type UnaryOperator = "-";

export type Expression =
  | { readonly kind: "literal"; readonly value: number }
  | { readonly kind: "variable"; readonly name: string }
  | { readonly kind: "parameter"; readonly name: string }
  | { readonly kind: "unary"; readonly op: UnaryOperator; readonly operand: Expression }
  | {
      readonly kind: "binary";
      readonly op: BinaryOperator;
      readonly left: Expression;
      readonly right: Expression;
    }
  | { readonly kind: "call"; readonly name: string; readonly args: readonly Expression[] };

export const COMPARISON_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>([
  ">",
  ">=",
  "<",
  "<=",
  "==",
  "!=",
]);

export function literal(value: number): Expression {
  return { kind: "literal", value };
}

export function variable(name: string): Expression {
  return { kind: "variable", name };
}

export function parameter(name: string): Expression {
  return { kind: "parameter", name };
}

export function unary(op: UnaryOperator, operand: Expression): Expression {
  return { kind: "unary", op, operand };
}

export function binary(op: BinaryOperator, left: Expression, right: Expression): Expression {
  return { kind: "binary", op, left, right };
}

export function call(name: string, args: Expression[]): Expression {
  return { kind: "call", name, args };
}

/** Freezes every node of the tree in place and returns it. */
export function freezeExpression(expr: Expression): Expression {
  switch (expr.kind) {
    case "unary":
      freezeExpression(expr.operand);
      break;
    case "binary":
      freezeExpression(expr.left);
      freezeExpression(expr.right);
      break;
    case "call":
      for (const arg of expr.args) freezeExpression(arg);
      Object.freeze(expr.args);
      break;
    default:
      break;
  }
  return Object.freeze(expr);
}

export function expressionsEqual(a: Expression, b: Expression): boolean {
  switch (a.kind) {
    case "literal":
      return b.kind === "literal" && Object.is(a.value, b.value);
    case "variable":
      return b.kind === "variable" && a.name === b.name;
    case "parameter":
      return b.kind === "parameter" && a.name === b.name;
    case "unary":
      return b.kind === "unary" && a.op === b.op && expressionsEqual(a.operand, b.operand);
    case "binary":
      return (
        b.kind === "binary" &&
        a.op === b.op &&
        expressionsEqual(a.left, b.left) &&
        expressionsEqual(a.right, b.right)
      );
    case "call":
      return (
        b.kind === "call" &&
        a.name === b.name &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => expressionsEqual(arg, b.args[i]))
      );
  }
}

/** Fully parenthesised rendering, e.g. `(a + (b * 2))`. */
export function printExpression(expr: Expression): string {
  switch (expr.kind) {
    case "literal":
      return String(expr.value);
    case "variable":
    case "parameter":
      return expr.name;
    case "unary":
      return `(${expr.op}${printExpression(expr.operand)})`;
    case "binary":
      return `(${printExpression(expr.left)} ${expr.op} ${printExpression(expr.right)})`;
    case "call":
      return `${expr.name}(${expr.args.map(printExpression).join(", ")})`;
  }
}

/** Names referenced by the tree, split by kind, in first-use order. */
export function collectIdentifiers(expr: Expression): { variables: string[]; parameters: string[] } {
  const variables: string[] = [];
  const parameters: string[] = [];
  const visit = (node: Expression): void => {
    switch (node.kind) {
      case "variable":
        if (!variables.includes(node.name)) variables.push(node.name);
        break;
      case "parameter":
        if (!parameters.includes(node.name)) parameters.push(node.name);
        break;
      case "unary":
        visit(node.operand);
        break;
      case "binary":
        visit(node.left);
        visit(node.right);
        break;
      case "call":
        node.args.forEach(visit);
        break;
      default:
        break;
    }
  };
  visit(expr);
  return { variables, parameters };
}
