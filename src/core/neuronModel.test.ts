import { describe, expect, it } from "vitest";
import type { NeuronModelDefinition } from "./config";
import { ConfigError, ModelDefinitionError, UnknownIdentifierError } from "./errors";
import { compileNeuronModel, resolveOverrides } from "./neuronModel";
import { LEAKY_INTEGRATE_AND_FIRE } from "./presets";

function definition(overrides: Partial<NeuronModelDefinition> = {}): NeuronModelDefinition {
  return {
    name: "m",
    stateVariables: { v: 0 },
    parameters: { threshold: 1 },
    update: "v + 1",
    spikeCondition: "v >= threshold",
    reset: "0",
    ...overrides,
  };
}

const RESERVED = { t: 0, dt: 0.5, I_ext: 0 };

describe("compileNeuronModel", () => {
  it("compiles a minimal model with defaults", () => {
    const model = compileNeuronModel(definition());
    expect(model.name).toBe("m");
    expect(model.stateNames).toEqual(["v"]);
    expect(model.parameterNames).toEqual(["threshold"]);
    expect(model.potential).toBe("v");
    expect(model.input).toBe("v");
    expect(model.refractoryPeriod).toBe(0);
    expect(model.update.map((r) => r.target)).toEqual(["v"]);
    expect(model.spikeCondition.parameters).toEqual(["threshold"]);
    expect(Object.isFrozen(model)).toBe(true);
  });

  it("targets string rules at the potential variable", () => {
    const model = compileNeuronModel(
      definition({ stateVariables: { u: 0, v: 0 }, potential: "v", spikeCondition: "v > 1" }),
    );
    expect(model.update[0].target).toBe("v");
    expect(model.reset[0].target).toBe("v");
    expect(model.input).toBe("v");
  });

  it("keeps per-variable rules in declaration order", () => {
    const model = compileNeuronModel(
      definition({ stateVariables: { v: 0, u: 0 }, reset: { u: "u + 2", v: "-1" } }),
    );
    expect(model.reset.map((r) => r.target)).toEqual(["u", "v"]);
  });

  it("integrates differential equations with forward Euler", () => {
    const model = compileNeuronModel(
      definition({
        stateVariables: { v: 1 },
        parameters: { tau: 2 },
        update: undefined,
        equations: "dv/dt = -v / tau",
        spikeCondition: "0",
      }),
    );
    const rule = model.update[0];
    expect(rule.target).toBe("v");
    expect(rule.expression.source).toBe("v + dt * (-v / tau)");
    expect(rule.expression.run({ ...RESERVED, v: 1, tau: 2 })).toBe(0.75);
  });

  it("reads units and assignments from an equation block", () => {
    const model = compileNeuronModel(LEAKY_INTEGRATE_AND_FIRE);
    expect(model.update.map((r) => r.target)).toEqual(["v", "I"]);
    expect(model.units).toEqual({ v: "mV", I: "nA" });
    expect(model.input).toBe("I");
    expect(model.refractoryPeriod).toBe(2);
  });

  it("rejects reserved names", () => {
    expect(() => compileNeuronModel(definition({ stateVariables: { t: 0 }, update: "t", spikeCondition: "0" }))).toThrow(
      ModelDefinitionError,
    );
    expect(() => compileNeuronModel(definition({ parameters: { dt: 1 } }))).toThrow("'dt' is reserved");
  });

  it("rejects a name that is both state and parameter", () => {
    expect(() => compileNeuronModel(definition({ parameters: { v: 1, threshold: 1 } }))).toThrow(
      "Model 'm': 'v' is declared both as state variable and parameter",
    );
  });

  it("rejects rules that target undeclared variables", () => {
    expect(() => compileNeuronModel(definition({ update: { w: "1" } }))).toThrow(
      "Model 'm': Rule target 'w' is not a state variable",
    );
    expect(() => compileNeuronModel(definition({ input: "I" }))).toThrow("Input 'I' is not a state variable");
  });

  it("rejects two equations for the same variable", () => {
    expect(() =>
      compileNeuronModel(definition({ update: undefined, equations: "v = 1\ndv/dt = 2" })),
    ).toThrow("'v' has more than one equation");
  });

  it("requires exactly one of update and equations", () => {
    expect(() => compileNeuronModel(definition({ equations: "v = 1" }))).toThrow(ConfigError);
    expect(() => compileNeuronModel(definition({ update: undefined }))).toThrow(ConfigError);
  });

  it("requires at least one state variable", () => {
    expect(() => compileNeuronModel(definition({ stateVariables: {} }))).toThrow(ConfigError);
    const missing: NeuronModelDefinition = JSON.parse("null");
    expect(() => compileNeuronModel(missing)).toThrow("Invalid neuron model: ");
  });

  it("surfaces compile errors", () => {
    expect(() => compileNeuronModel(definition({ spikeCondition: "v > thresh" }))).toThrow(UnknownIdentifierError);
  });

  it("lets rules read the reserved bindings", () => {
    const model = compileNeuronModel(definition({ update: "v + dt * I_ext + 0 * t" }));
    expect(model.update[0].expression.run({ ...RESERVED, v: 1, threshold: 1, I_ext: 4 })).toBe(3);
  });
});

describe("resolveOverrides", () => {
  it("merges declared names over defaults", () => {
    const model = compileNeuronModel(definition());
    expect(resolveOverrides(model, model.parameterNames, model.parameterDefaults, { threshold: 5 }, "parameter")).toEqual(
      { threshold: 5 },
    );
    expect(resolveOverrides(model, model.parameterNames, model.parameterDefaults, undefined, "parameter")).toEqual({
      threshold: 1,
    });
  });

  it("rejects undeclared names", () => {
    const model = compileNeuronModel(definition());
    expect(() => resolveOverrides(model, model.stateNames, model.initialState, { w: 1 }, "state variable")).toThrow(
      "Model 'm': unknown state variable 'w'",
    );
  });
});
