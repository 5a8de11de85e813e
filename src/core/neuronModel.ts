/**
 * Neuron models: a named equation set compiled once and shared, read-only,
 * by every neuron that uses it. Per-neuron values live in the network.
 */
import { binary, variable } from "./ast";
import { compile, compileSyntax, fromExpression } from "./compiler";
import type { CompiledExpression, IdentifierScope } from "./compiler";
import { NeuronModelDefinitionSchema, parseConfig } from "./config";
import type { NeuronModelDefinition } from "./config";
import { parseEquations } from "./equations";
import { ModelDefinitionError } from "./errors";

/** Bindings every rule may read besides the model's own names. */
export const RESERVED_IDENTIFIERS = ["t", "dt", "I_ext"] as const;

export type CompiledRule = {
  readonly target: string;
  readonly expression: CompiledExpression;
};

export type NeuronModel = {
  readonly name: string;
  readonly stateNames: readonly string[];
  readonly initialState: Readonly<Record<string, number>>;
  readonly parameterNames: readonly string[];
  readonly parameterDefaults: Readonly<Record<string, number>>;
  /** Evaluated together against the pre-update values, then written. */
  readonly update: readonly CompiledRule[];
  readonly spikeCondition: CompiledExpression;
  readonly reset: readonly CompiledRule[];
  readonly refractoryPeriod: number;
  /** Primary variable: target of string rules. */
  readonly potential: string;
  /** Variable that accumulates delivered spike magnitudes. */
  readonly input: string;
  readonly units: Readonly<Record<string, string>>;
};

type RuleSet = string | Record<string, string>;

function checkNames(modelName: string, stateNames: string[], parameterNames: string[]): void {
  const reserved = new Set<string>(RESERVED_IDENTIFIERS);
  for (const name of [...stateNames, ...parameterNames]) {
    if (reserved.has(name)) {
      throw new ModelDefinitionError(`'${name}' is reserved and cannot be declared`, modelName);
    }
  }
  for (const name of parameterNames) {
    if (stateNames.includes(name)) {
      throw new ModelDefinitionError(`'${name}' is declared both as state variable and parameter`, modelName);
    }
  }
}

function requireState(modelName: string, stateNames: readonly string[], name: string, role: string): void {
  if (!stateNames.includes(name)) {
    throw new ModelDefinitionError(`${role} '${name}' is not a state variable`, modelName);
  }
}

function compileRules(
  modelName: string,
  rules: RuleSet,
  potential: string,
  stateNames: readonly string[],
  scope: IdentifierScope,
): CompiledRule[] {
  if (typeof rules === "string") {
    return [{ target: potential, expression: compile(rules, scope) }];
  }
  return Object.entries(rules).map(([target, source]) => {
    requireState(modelName, stateNames, target, "Rule target");
    return { target, expression: compile(source, scope) };
  });
}

function compileEquationBlock(
  modelName: string,
  text: string,
  stateNames: readonly string[],
  scope: IdentifierScope,
): { rules: CompiledRule[]; units: Record<string, string> } {
  const rules: CompiledRule[] = [];
  const units: Record<string, string> = {};
  for (const eq of parseEquations(text)) {
    requireState(modelName, stateNames, eq.target, "Equation target");
    if (rules.some((r) => r.target === eq.target)) {
      throw new ModelDefinitionError(`'${eq.target}' has more than one equation`, modelName);
    }
    const rhs = compileSyntax(eq.source, eq.rhs, scope);
    const expression =
      eq.kind === "differential"
        ? // Forward Euler: X + dt * rhs
          fromExpression(
            `${eq.target} + dt * (${eq.source})`,
            binary("+", variable(eq.target), binary("*", variable("dt"), rhs.ast)),
          )
        : rhs;
    rules.push({ target: eq.target, expression });
    if (eq.unit) units[eq.target] = eq.unit;
  }
  return { rules, units };
}

function modelLabel(value: unknown): string {
  if (typeof value === "object" && value !== null && "name" in value && typeof value.name === "string") {
    return `neuron model '${value.name}'`;
  }
  return "neuron model";
}

/**
 * Validates and compiles a model definition.
 *
 * @throws ConfigError when the definition has the wrong shape,
 *   ModelDefinitionError when names do not line up, CompileError when a rule
 *   does not compile.
 */
export function compileNeuronModel(definition: NeuronModelDefinition): NeuronModel {
  const def = parseConfig(NeuronModelDefinitionSchema, definition, modelLabel(definition));
  const stateNames = Object.keys(def.stateVariables);
  const parameterNames = Object.keys(def.parameters);
  checkNames(def.name, stateNames, parameterNames);

  const potential = def.potential ?? stateNames[0];
  const input = def.input ?? potential;
  requireState(def.name, stateNames, potential, "Potential");
  requireState(def.name, stateNames, input, "Input");

  const scope: IdentifierScope = {
    variables: [...stateNames, ...RESERVED_IDENTIFIERS],
    parameters: parameterNames,
  };

  let update: CompiledRule[];
  let units: Record<string, string> = {};
  if (def.equations !== undefined) {
    ({ rules: update, units } = compileEquationBlock(def.name, def.equations, stateNames, scope));
  } else if (def.update !== undefined) {
    update = compileRules(def.name, def.update, potential, stateNames, scope);
  } else {
    // Unreachable after schema validation.
    throw new ModelDefinitionError("missing update rules", def.name);
  }

  return Object.freeze({
    name: def.name,
    stateNames: Object.freeze(stateNames),
    initialState: Object.freeze({ ...def.stateVariables }),
    parameterNames: Object.freeze(parameterNames),
    parameterDefaults: Object.freeze({ ...def.parameters }),
    update: Object.freeze(update),
    spikeCondition: compile(def.spikeCondition, scope),
    reset: Object.freeze(compileRules(def.name, def.reset, potential, stateNames, scope)),
    refractoryPeriod: def.refractoryPeriod,
    potential,
    input,
    units: Object.freeze(units),
  });
}

/** Merges per-neuron overrides over model defaults, rejecting undeclared names. */
export function resolveOverrides(
  model: NeuronModel,
  declared: readonly string[],
  defaults: Readonly<Record<string, number>>,
  overrides: Readonly<Record<string, number>> | undefined,
  what: string,
): Record<string, number> {
  const out: Record<string, number> = { ...defaults };
  for (const [name, value] of Object.entries(overrides ?? {})) {
    if (!declared.includes(name)) {
      throw new ModelDefinitionError(`unknown ${what} '${name}'`, model.name);
    }
    out[name] = value;
  }
  return out;
}
