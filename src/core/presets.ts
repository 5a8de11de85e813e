import type { NeuronModelDefinition } from "./config";

// ---------------------------------------------------------------------------
// Built-in neuron models
// ---------------------------------------------------------------------------

export const LEAKY_INTEGRATE_AND_FIRE: NeuronModelDefinition = {
  name: "leaky-integrate-and-fire",
  stateVariables: { v: -65, I: 0 },
  parameters: {
    v_rest: -65,
    v_reset: -70,
    v_thresh: -50,
    R: 10,
    tau: 10,
    tau_syn: 5,
  },
  equations: `
    dv/dt = (v_rest - v + R * (I + I_ext)) / tau : mV
    I = I * exp(-dt / tau_syn) : nA
  `,
  spikeCondition: "v > v_thresh",
  reset: "v_reset",
  refractoryPeriod: 2,
  input: "I",
};

export const IZHIKEVICH: NeuronModelDefinition = {
  name: "izhikevich",
  stateVariables: { v: -65, u: -13 },
  parameters: { a: 0.02, b: 0.2, c: -65, d: 8 },
  equations: `
    dv/dt = 0.04 * v^2 + 5 * v + 140 - u + I_ext : mV
    du/dt = a * (b * v - u)
  `,
  spikeCondition: "v >= 30",
  reset: { v: "c", u: "u + d" },
};

/** Integrates its external drive and fires at `threshold`. */
export const CONSTANT_DRIVER: NeuronModelDefinition = {
  name: "constant-driver",
  stateVariables: { v: 0 },
  parameters: { threshold: 1 },
  update: "v + dt * I_ext",
  spikeCondition: "v >= threshold",
  reset: "0",
};

export const BUILTIN_MODELS: NeuronModelDefinition[] = [LEAKY_INTEGRATE_AND_FIRE, IZHIKEVICH, CONSTANT_DRIVER];
