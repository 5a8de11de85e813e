/**
 * Expression compiler: text → tokens → syntax tree → resolved, frozen AST
 * plus a closure tree for evaluation.
 *
 * Every identifier is checked against the caller's scope and every call
 * against the function registry here, so evaluation never meets an
 * unresolved name.
 */
import { binary, call, collectIdentifiers, freezeExpression, literal, parameter, unary, variable } from "./ast";
import type { Expression } from "./ast";
import { ArityError, UnknownIdentifierError } from "./errors";
import { buildEvaluator } from "./evaluator";
import type { Evaluator } from "./evaluator";
import { lookupFunction } from "./functions";
import { parse } from "./parser";
import type { SyntaxNode } from "./parser";

export type IdentifierScope = {
  variables: Iterable<string>;
  parameters?: Iterable<string>;
};

export type CompiledExpression = {
  readonly source: string;
  readonly ast: Expression;
  /** Variables referenced by the expression, in first-use order. */
  readonly variables: readonly string[];
  readonly parameters: readonly string[];
  readonly run: Evaluator;
};

type ResolvedScope = {
  variables: ReadonlySet<string>;
  parameters: ReadonlySet<string>;
};

function isIdentifierScope(scope: Iterable<string> | IdentifierScope): scope is IdentifierScope {
  return "variables" in scope;
}

function resolveScope(scope: Iterable<string> | IdentifierScope): ResolvedScope {
  if (isIdentifierScope(scope)) {
    return {
      variables: new Set(scope.variables),
      parameters: new Set(scope.parameters ?? []),
    };
  }
  return { variables: new Set(scope), parameters: new Set() };
}

function resolve(node: SyntaxNode, scope: ResolvedScope): Expression {
  switch (node.kind) {
    case "number":
      return literal(node.value);
    case "name":
      if (scope.variables.has(node.name)) return variable(node.name);
      if (scope.parameters.has(node.name)) return parameter(node.name);
      throw new UnknownIdentifierError(node.name, node.position);
    case "negate":
      return unary("-", resolve(node.operand, scope));
    case "binary":
      return binary(node.op, resolve(node.left, scope), resolve(node.right, scope));
    case "call": {
      const def = lookupFunction(node.name);
      if (!def) throw new UnknownIdentifierError(node.name, node.position);
      if (def.arity !== node.args.length) {
        throw new ArityError(node.name, def.arity, node.args.length, node.position);
      }
      return call(node.name, node.args.map((arg) => resolve(arg, scope)));
    }
  }
}

/** Builds a compiled expression from an already resolved tree. */
export function fromExpression(source: string, ast: Expression): CompiledExpression {
  const frozen = freezeExpression(ast);
  const { variables, parameters } = collectIdentifiers(frozen);
  return Object.freeze({
    source,
    ast: frozen,
    variables,
    parameters,
    run: buildEvaluator(frozen),
  });
}

export function compileSyntax(
  source: string,
  tree: SyntaxNode,
  scope: Iterable<string> | IdentifierScope,
): CompiledExpression {
  return fromExpression(source, resolve(tree, resolveScope(scope)));
}

/**
 * Compiles `source` against the names in `scope`. A plain iterable treats
 * every name as a variable.
 *
 * @throws LexError, ParseError, UnknownIdentifierError, ArityError
 */
export function compile(source: string, scope: Iterable<string> | IdentifierScope): CompiledExpression {
  return compileSyntax(source, parse(source), scope);
}
