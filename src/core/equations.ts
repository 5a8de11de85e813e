/**
 * Equation blocks: one equation per line.
 *
 *   dv/dt = (v_rest - v + R * I) / tau : mV
 *   I = I * exp(-dt / tau_syn)
 *
 * `dX/dt = rhs` is a differential equation (integrated with forward Euler by
 * the neuron model), `X = rhs` an assignment. Anything after `:` is the unit.
 * `#` starts a comment.
 */
import { ParseError } from "./errors";
import { describeToken, tokenize } from "./lexer";
import type { Token } from "./lexer";
import { parseTokens } from "./parser";
import type { SyntaxNode } from "./parser";

export type EquationKind = "assignment" | "differential";

export type Equation = {
  kind: EquationKind;
  target: string;
  rhs: SyntaxNode;
  /** Right-hand side text as written. */
  source: string;
  unit?: string;
  /** Offset of the line start in the block text. */
  position: number;
};

function isPunct(token: Token, text: string): boolean {
  return token.type === "punct" && token.text === text;
}

function readTarget(lhs: Token[], equals: Token): { kind: EquationKind; target: string } {
  const [first, second, third] = lhs;
  if (lhs.length === 1 && first.type === "identifier") {
    return { kind: "assignment", target: first.text };
  }
  if (
    lhs.length === 3 &&
    first.type === "identifier" &&
    first.text.length > 1 &&
    first.text.startsWith("d") &&
    second.type === "operator" &&
    second.text === "/" &&
    third.type === "identifier" &&
    third.text === "dt"
  ) {
    return { kind: "differential", target: first.text.slice(1) };
  }
  const at = lhs.length > 0 ? first : equals;
  throw new ParseError(at.position, "a variable name or dX/dt", describeToken(at));
}

function parseLine(text: string, start: number, end: number): Equation {
  // The unit is free text, so it is cut off before lexing.
  const colon = text.indexOf(":", start);
  const exprEnd = colon >= 0 && colon < end ? colon : end;
  const tokens = tokenize(text, start, exprEnd);
  const eq = tokens.findIndex((t) => isPunct(t, "="));
  if (eq < 0) {
    const last = tokens[tokens.length - 1];
    throw new ParseError(last.position, "'='", describeToken(last));
  }
  const { kind, target } = readTarget(tokens.slice(0, eq), tokens[eq]);
  const rhs = parseTokens(tokens.slice(eq + 1));

  let unit: string | undefined;
  if (exprEnd < end) {
    unit = text.slice(exprEnd + 1, end).trim();
    if (unit.length === 0) {
      throw new ParseError(end, "a unit after ':'", "end of input");
    }
  }

  return {
    kind,
    target,
    rhs,
    source: text.slice(tokens[eq].position + 1, exprEnd).trim(),
    unit,
    position: start,
  };
}

/**
 * Parses every non-blank line of `text`. Error positions are offsets into
 * the whole block.
 */
export function parseEquations(text: string): Equation[] {
  const equations: Equation[] = [];
  let lineStart = 0;
  while (lineStart <= text.length) {
    let lineEnd = text.indexOf("\n", lineStart);
    if (lineEnd < 0) lineEnd = text.length;
    const hash = text.indexOf("#", lineStart);
    const contentEnd = hash >= 0 && hash < lineEnd ? hash : lineEnd;
    if (text.slice(lineStart, contentEnd).trim().length > 0) {
      equations.push(parseLine(text, lineStart, contentEnd));
    }
    lineStart = lineEnd + 1;
  }
  return equations;
}
