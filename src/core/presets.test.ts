import { describe, expect, it } from "vitest";
import { buildNetwork } from "./network";
import { compileNeuronModel } from "./neuronModel";
import { BUILTIN_MODELS, IZHIKEVICH, LEAKY_INTEGRATE_AND_FIRE } from "./presets";

describe("built-in models", () => {
  it("all compile", () => {
    for (const def of BUILTIN_MODELS) {
      expect(() => compileNeuronModel(def)).not.toThrow();
    }
  });

  it("leaky integrate-and-fire crosses threshold under constant drive", () => {
    // v_n = -45 - 20 * 0.99^n first exceeds -50 at n = 138.
    const network = buildNetwork({
      models: [LEAKY_INTEGRATE_AND_FIRE],
      neurons: [{ model: "leaky-integrate-and-fire" }],
    });
    network.injectInput(0, 2);
    const fired = network.advance(140);
    expect(fired).toHaveLength(1);
    expect(fired[0].time).toBeCloseTo(13.8, 6);
    const snapshot = network.inspect(0);
    expect(snapshot.lastSpikeTime).toBe(fired[0].time);
    expect(snapshot.refractory).toBe(true);
  });

  it("leaky integrate-and-fire stays at rest without input", () => {
    const network = buildNetwork({
      models: [LEAKY_INTEGRATE_AND_FIRE],
      neurons: [{ model: "leaky-integrate-and-fire" }],
    });
    expect(network.advance(500)).toEqual([]);
    expect(network.inspect(0).values).toEqual({ v: -65, I: 0 });
  });

  it("izhikevich resets v to c and bumps u by d", () => {
    const build = () => {
      const network = buildNetwork({ models: [IZHIKEVICH], neurons: [{ model: "izhikevich" }] });
      network.injectInput(0, 10);
      return network;
    };
    const single = build();
    let ticks = 0;
    let fired = single.step();
    while (fired.length === 0 && ticks < 10000) {
      ticks += 1;
      fired = single.step();
    }
    expect(fired).toHaveLength(1);

    const snapshot = single.inspect(0);
    expect(snapshot.values.v).toBe(-65);
    const before = build();
    before.advance(ticks);
    const uBefore = before.inspect(0).values.u;
    const vBefore = before.inspect(0).values.v;
    // Update runs first, then the reset adds d to the updated u.
    const uUpdated = uBefore + 0.1 * 0.02 * (0.2 * vBefore - uBefore);
    expect(snapshot.values.u).toBeCloseTo(uUpdated + 8, 9);
  });
});
