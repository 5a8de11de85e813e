import { describe, expect, it } from "vitest";
import { resolveSimulationOptions, resolveStoreOptions } from "./config";
import { CompileError, ConfigError, LexError, SimulationError, TopologyError, UnknownNeuronError } from "./errors";

describe("resolveSimulationOptions", () => {
  it("fills defaults", () => {
    expect(resolveSimulationOptions()).toEqual({
      dt: 0.1,
      speed: 1,
      paused: false,
      refractoryInput: "retain",
      timeEpsilon: 1e-9,
    });
  });

  it("keeps given values", () => {
    expect(resolveSimulationOptions({ dt: 0.25, refractoryInput: "drop", maxPendingEvents: 64 })).toMatchObject({
      dt: 0.25,
      refractoryInput: "drop",
      maxPendingEvents: 64,
    });
  });

  it("throws a ConfigError naming the field", () => {
    try {
      resolveSimulationOptions({ dt: -1 });
      expect.unreachable("resolveSimulationOptions should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.message).toBe("Invalid simulation options: dt: Number must be greater than 0");
        expect(err.code).toBe("CONFIG_ERROR");
        expect(Array.isArray(err.details)).toBe(true);
      }
    }
  });
});

describe("resolveStoreOptions", () => {
  it("fills defaults", () => {
    expect(resolveStoreOptions()).toEqual({ spikeHistoryLimit: 1000, traceWindow: 100 });
  });
});

describe("error hierarchy", () => {
  it("shares SimulationError as the base", () => {
    const lex = new LexError(3, "$");
    expect(lex).toBeInstanceOf(CompileError);
    expect(lex).toBeInstanceOf(SimulationError);
    expect(lex.name).toBe("LexError");

    const unknown = new UnknownNeuronError(9);
    expect(unknown).toBeInstanceOf(TopologyError);
    expect(unknown.code).toBe("UNKNOWN_NEURON");
    expect(unknown.message).toBe("Unknown neuron id 9");
  });
});
