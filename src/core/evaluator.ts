import type { BinaryOperator, Expression } from "./ast";
import { EvaluationError } from "./errors";
import { lookupFunction } from "./functions";

export type EvaluationContext = Readonly<Record<string, number>>;

export type Evaluator = (ctx: EvaluationContext) => number;

/** Anything `compile()` produced; only `run` matters for evaluation. */
export type Evaluable = {
  readonly run: Evaluator;
};

function bool(v: boolean): number {
  return v ? 1 : 0;
}

function binaryFn(op: BinaryOperator): (a: number, b: number) => number {
  switch (op) {
    case "+":
      return (a, b) => a + b;
    case "-":
      return (a, b) => a - b;
    case "*":
      return (a, b) => a * b;
    case "/":
      return (a, b) => a / b;
    case "^":
      return (a, b) => Math.pow(a, b);
    case ">":
      return (a, b) => bool(a > b);
    case ">=":
      return (a, b) => bool(a >= b);
    case "<":
      return (a, b) => bool(a < b);
    case "<=":
      return (a, b) => bool(a <= b);
    case "==":
      return (a, b) => bool(a === b);
    case "!=":
      return (a, b) => bool(a !== b);
  }
}

function lookup(name: string): Evaluator {
  return (ctx) => {
    const v = ctx[name];
    if (typeof v !== "number") {
      throw new EvaluationError(`No value bound for '${name}'`, name);
    }
    return v;
  };
}

/**
 * Turns a resolved tree into a closure tree so the stepping loop never walks
 * the AST. Function names are resolved here, once.
 */
export function buildEvaluator(expr: Expression): Evaluator {
  switch (expr.kind) {
    case "literal": {
      const value = expr.value;
      return () => value;
    }
    case "variable":
    case "parameter":
      return lookup(expr.name);
    case "unary": {
      const operand = buildEvaluator(expr.operand);
      return (ctx) => -operand(ctx);
    }
    case "binary": {
      const left = buildEvaluator(expr.left);
      const right = buildEvaluator(expr.right);
      const fn = binaryFn(expr.op);
      return (ctx) => fn(left(ctx), right(ctx));
    }
    case "call": {
      const def = lookupFunction(expr.name);
      if (!def) {
        // compile() rejects unknown calls, so only hand-built trees land here.
        throw new EvaluationError(`Unknown function '${expr.name}'`, expr.name);
      }
      const args = expr.args.map(buildEvaluator);
      const apply = def.apply;
      if (args.length === 1) {
        const [a] = args;
        return (ctx) => apply(a(ctx));
      }
      if (args.length === 2) {
        const [a, b] = args;
        return (ctx) => apply(a(ctx), b(ctx));
      }
      return (ctx) => apply(...args.map((arg) => arg(ctx)));
    }
  }
}

/**
 * Pure: the same expression and context always give the same number.
 * Division by zero and out-of-domain calls yield Infinity or NaN.
 */
export function evaluate(expr: Evaluable, ctx: EvaluationContext): number {
  return expr.run(ctx);
}

/**
 * Truthiness of a condition value. Comparisons produce 1 or 0; any other
 * value holds when it is non-zero. NaN never holds, so a diverging potential
 * cannot fire a spike. ±Infinity holds.
 */
export function isTruthy(value: number): boolean {
  return value !== 0 && !Number.isNaN(value);
}

export function evaluateCondition(expr: Evaluable, ctx: EvaluationContext): boolean {
  return isTruthy(expr.run(ctx));
}
