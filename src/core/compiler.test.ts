import { describe, expect, it } from "vitest";
import { expressionsEqual, printExpression } from "./ast";
import { compile } from "./compiler";
import { ArityError, ParseError, UnknownIdentifierError } from "./errors";
import { evaluate } from "./evaluator";

function value(source: string, ctx: Record<string, number> = {}): number {
  return evaluate(compile(source, Object.keys(ctx)), ctx);
}

function printed(source: string, names: string[] = []): string {
  return printExpression(compile(source, names).ast);
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

// ---------------------------------------------------------------------------
// Precedence and associativity
// ---------------------------------------------------------------------------
describe("precedence", () => {
  it("binds multiplication tighter than addition", () => {
    expect(printed("a + b * 2", ["a", "b"])).toBe("(a + (b * 2))");
  });

  it("associates + - * / to the left", () => {
    expect(value("a - b - c", { a: 10, b: 3, c: 2 })).toBe(5);
    expect(value("8 / 4 / 2")).toBe(1);
  });

  it("associates power to the right", () => {
    expect(value("2^3^2")).toBe(512);
    expect(printed("2^3^2")).toBe("(2 ^ (3 ^ 2))");
  });

  it("applies unary minus after power", () => {
    expect(value("-2^2")).toBe(-4);
    expect(printed("-2^2")).toBe("(-(2 ^ 2))");
  });

  it("accepts a signed exponent", () => {
    expect(value("2^-1")).toBe(0.5);
  });

  it("drops unary plus", () => {
    expect(printed("+x", ["x"])).toBe("x");
  });

  it("puts comparison below arithmetic", () => {
    expect(printed("v + 1 > 2 * w", ["v", "w"])).toBe("((v + 1) > (2 * w))");
  });

  it("honours parentheses", () => {
    expect(value("(1 + 2) * 3")).toBe(9);
  });
});

// ---------------------------------------------------------------------------
// Parse errors
// ---------------------------------------------------------------------------
describe("parse errors", () => {
  it("rejects chained comparisons", () => {
    const err = captureError(() => compile("a < b < c", ["a", "b", "c"]));
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) {
      expect(err.position).toBe(6);
      expect(err.expected).toBe("end of input");
      expect(err.found).toBe("'<'");
      expect(err.message).toBe("Expected end of input but found '<' at position 6");
    }
  });

  it("reports an unclosed parenthesis at the end", () => {
    const err = captureError(() => compile("(a + b", ["a", "b"]));
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) {
      expect(err.position).toBe(6);
      expect(err.expected).toBe("')'");
      expect(err.found).toBe("end of input");
    }
  });

  it("reports a missing operand", () => {
    const err = captureError(() => compile("a +", ["a"]));
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) {
      expect(err.position).toBe(3);
      expect(err.expected).toBe("a number, identifier or '('");
    }
  });

  it("reports a missing argument separator", () => {
    const err = captureError(() => compile("max(a b)", ["a", "b"]));
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) {
      expect(err.position).toBe(6);
      expect(err.expected).toBe("',' or ')'");
      expect(err.found).toBe("'b'");
    }
  });

  it("rejects empty input", () => {
    const err = captureError(() => compile("", []));
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) expect(err.position).toBe(0);
  });

  it("rejects the equation punctuation inside an expression", () => {
    expect(() => compile("v = 1", ["v"])).toThrow(ParseError);
  });
});

// ---------------------------------------------------------------------------
// Name resolution
// ---------------------------------------------------------------------------
describe("name resolution", () => {
  it("rejects identifiers outside the scope", () => {
    const err = captureError(() => compile("foo + 1", ["v"]));
    expect(err).toBeInstanceOf(UnknownIdentifierError);
    if (err instanceof UnknownIdentifierError) {
      expect(err.identifier).toBe("foo");
      expect(err.position).toBe(0);
      expect(err.kind).toBe("unknown-identifier");
    }
  });

  it("rejects unknown functions", () => {
    const err = captureError(() => compile("v * f()", ["v"]));
    expect(err).toBeInstanceOf(UnknownIdentifierError);
    if (err instanceof UnknownIdentifierError) {
      expect(err.identifier).toBe("f");
      expect(err.position).toBe(4);
    }
  });

  it("checks call arity", () => {
    const err = captureError(() => compile("max(1)", []));
    expect(err).toBeInstanceOf(ArityError);
    if (err instanceof ArityError) {
      expect(err.functionName).toBe("max");
      expect(err.expected).toBe(2);
      expect(err.got).toBe(1);
      expect(err.position).toBe(0);
    }
  });

  it("separates variables from parameters", () => {
    const expr = compile("tau * v + tau", { variables: ["v"], parameters: ["tau"] });
    expect(expr.variables).toEqual(["v"]);
    expect(expr.parameters).toEqual(["tau"]);
    expect(expr.ast).toEqual({
      kind: "binary",
      op: "+",
      left: {
        kind: "binary",
        op: "*",
        left: { kind: "parameter", name: "tau" },
        right: { kind: "variable", name: "v" },
      },
      right: { kind: "parameter", name: "tau" },
    });
  });

  it("resolves a name declared twice as a variable", () => {
    const expr = compile("x", { variables: ["x"], parameters: ["x"] });
    expect(expr.ast).toEqual({ kind: "variable", name: "x" });
  });

  it("lists identifiers in first-use order", () => {
    expect(compile("b + a + b", ["a", "b"]).variables).toEqual(["b", "a"]);
  });
});

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------
describe("compiled output", () => {
  it("is deterministic", () => {
    const a = compile("exp(-t / tau) * v", { variables: ["t", "v"], parameters: ["tau"] });
    const b = compile("exp(-t / tau) * v", { variables: ["t", "v"], parameters: ["tau"] });
    expect(expressionsEqual(a.ast, b.ast)).toBe(true);
    expect(expressionsEqual(a.ast, compile("exp(-t / tau) * t", { variables: ["t", "v"], parameters: ["tau"] }).ast)).toBe(
      false,
    );
  });

  it("is frozen", () => {
    const expr = compile("min(a, 1)", ["a"]);
    expect(Object.isFrozen(expr)).toBe(true);
    expect(Object.isFrozen(expr.ast)).toBe(true);
  });

  it("keeps the source text", () => {
    expect(compile("v*2", ["v"]).source).toBe("v*2");
  });

  it("evaluates registered functions", () => {
    expect(value("exp(0) + abs(-2)")).toBe(3);
    expect(value("clamp(5, 0, 2)")).toBe(2);
    expect(value("pow(2, 10)")).toBe(1024);
    expect(value("1e-3 * 1000")).toBe(1);
  });
});
