/**
 * Host-facing API. Everything a UI or script needs to compile equations,
 * build a network, drive time and read state goes through here.
 */
import { compile } from "./core/compiler";
import type { CompiledExpression, IdentifierScope } from "./core/compiler";
import { CompileError } from "./core/errors";
import type { Network, NeuronSnapshot, SpikeFiredEvent } from "./core/network";
import type { NeuronId } from "./core/topology";

export type CompileResult = { ok: true; expression: CompiledExpression } | { ok: false; error: CompileError };

/**
 * Compiles one expression. Compile failures come back as a value so an
 * editor can show them inline; anything else still throws.
 */
export function compileEquation(text: string, scope: Iterable<string> | IdentifierScope): CompileResult {
  try {
    return { ok: true, expression: compile(text, scope) };
  } catch (err) {
    if (err instanceof CompileError) return { ok: false, error: err };
    throw err;
  }
}

export function advance(network: Network, tickCount: number): SpikeFiredEvent[] {
  return network.advance(tickCount);
}

export function step(network: Network): SpikeFiredEvent[] {
  return network.step();
}

export function setSpeed(network: Network, multiplier: number): void {
  network.setSpeed(multiplier);
}

export function pause(network: Network): void {
  network.pause();
}

export function resume(network: Network): void {
  network.resume();
}

export function inspectState(network: Network, neuronId: NeuronId): NeuronSnapshot {
  return network.inspect(neuronId);
}

export function injectInput(network: Network, neuronId: NeuronId, value: number): void {
  network.injectInput(neuronId, value);
}

export { buildNetwork, Network } from "./core/network";
export type { NeuronSnapshot, SpikeFiredEvent, TickObserver } from "./core/network";
export { createSimulationStore } from "./core/store";
export type { PerfStats, SimStore, SimulationStore, WatchedVariable } from "./core/store";
export type { Hist, TraceBuffer } from "./core/history";
export { compile } from "./core/compiler";
export type { CompiledExpression, IdentifierScope } from "./core/compiler";
export { evaluate, evaluateCondition, isTruthy } from "./core/evaluator";
export type { EvaluationContext } from "./core/evaluator";
export { expressionsEqual, printExpression } from "./core/ast";
export type { Expression } from "./core/ast";
export { parseEquations } from "./core/equations";
export type { Equation } from "./core/equations";
export { FUNCTION_REGISTRY } from "./core/functions";
export { compileNeuronModel, RESERVED_IDENTIFIERS } from "./core/neuronModel";
export type { NeuronModel } from "./core/neuronModel";
export { TopologyBuilder } from "./core/topology";
export type { NeuronId, Synapse, SynapseId, Topology } from "./core/topology";
export type {
  NetworkSpec,
  NeuronModelDefinition,
  NeuronSpec,
  RefractoryInputPolicy,
  SimulationOptions,
  StoreOptions,
  SynapseKind,
  SynapseSpec,
} from "./core/config";
export type { TimeControl } from "./core/clock";
export { BUILTIN_MODELS, CONSTANT_DRIVER, IZHIKEVICH, LEAKY_INTEGRATE_AND_FIRE } from "./core/presets";
export {
  ArityError,
  CompileError,
  ConfigError,
  EvaluationError,
  InvalidDelayError,
  LexError,
  ModelDefinitionError,
  ParseError,
  SimulationError,
  TopologyError,
  TopologyFrozenError,
  UnknownIdentifierError,
  UnknownNeuronError,
} from "./core/errors";
export type { CompileErrorKind } from "./core/errors";
