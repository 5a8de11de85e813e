export type FunctionDefinition = {
  name: string;
  arity: number;
  apply: (...args: number[]) => number;
};

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

function unaryFn(name: string, fn: (x: number) => number): FunctionDefinition {
  return { name, arity: 1, apply: (x) => fn(x) };
}

const DEFINITIONS: FunctionDefinition[] = [
  unaryFn("exp", Math.exp),
  unaryFn("log", Math.log),
  unaryFn("sqrt", Math.sqrt),
  unaryFn("abs", Math.abs),
  unaryFn("sin", Math.sin),
  unaryFn("cos", Math.cos),
  unaryFn("tan", Math.tan),
  unaryFn("tanh", Math.tanh),
  unaryFn("floor", Math.floor),
  unaryFn("ceil", Math.ceil),
  unaryFn("sign", Math.sign),
  { name: "min", arity: 2, apply: (a, b) => Math.min(a, b) },
  { name: "max", arity: 2, apply: (a, b) => Math.max(a, b) },
  { name: "pow", arity: 2, apply: (a, b) => Math.pow(a, b) },
  { name: "clamp", arity: 3, apply: (v, lo, hi) => clamp(v, lo, hi) },
];

/**
 * Fixed registry of callable functions. Out-of-domain arguments follow the
 * Math semantics (NaN), they never throw.
 */
export const FUNCTION_REGISTRY: ReadonlyMap<string, FunctionDefinition> = new Map(
  DEFINITIONS.map((def): [string, FunctionDefinition] => [def.name, def]),
);

export function lookupFunction(name: string): FunctionDefinition | undefined {
  return FUNCTION_REGISTRY.get(name);
}
