/**
 * Network runtime: the time-stepped loop over a frozen topology.
 *
 * Each tick runs four phases in a fixed order:
 *   1. advance the clock by dt * speed
 *   2. deliver every queued spike due at the new time
 *   3. evaluate update rules of non-refractory neurons
 *   4. check spike conditions of non-refractory neurons, reset, fan out
 *
 * A neuron's rules only read that neuron's own bindings, and synaptic effects
 * only travel through the queue, so the order neurons are visited in within
 * a phase never shows in the output.
 */
import { assertSpeed, SimulationClock } from "./clock";
import type { TimeControl } from "./clock";
import { parseConfig, NetworkSpecSchema, resolveSimulationOptions } from "./config";
import type { NetworkSpec, RefractoryInputPolicy, SimulationOptions } from "./config";
import { ConfigError, ModelDefinitionError, UnknownNeuronError } from "./errors";
import { evaluateCondition } from "./evaluator";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { compileNeuronModel } from "./neuronModel";
import type { CompiledRule, NeuronModel } from "./neuronModel";
import { SpikeQueue } from "./spikeQueue";
import { synapseMagnitude, TopologyBuilder } from "./topology";
import type { NeuronId, NeuronSlot, Synapse, Topology } from "./topology";

export type SpikeFiredEvent = {
  neuronId: NeuronId;
  time: number;
};

export type NeuronSnapshot = {
  neuronId: NeuronId;
  model: string;
  /** Clock time the snapshot was taken at (always after a complete tick). */
  time: number;
  values: Record<string, number>;
  parameters: Record<string, number>;
  externalInput: number;
  refractory: boolean;
  refractoryUntil: number;
  lastSpikeTime: number | null;
};

type NeuronRuntime = {
  slot: NeuronSlot;
  model: NeuronModel;
  /** State variables, parameters, t, dt and I_ext. Rebound in place every tick. */
  ctx: Record<string, number>;
  /** Scratch for simultaneous rule writes, sized for the larger rule set. */
  scratch: Float64Array;
  refractoryUntil: number;
  lastSpikeTime: number | null;
};

function createRuntime(slot: NeuronSlot): NeuronRuntime {
  const ctx: Record<string, number> = { ...slot.parameters, ...slot.initialState, t: 0, dt: 0, I_ext: 0 };
  return {
    slot,
    model: slot.model,
    ctx,
    scratch: new Float64Array(Math.max(slot.model.update.length, slot.model.reset.length, 1)),
    refractoryUntil: Number.NEGATIVE_INFINITY,
    lastSpikeTime: null,
  };
}

function applyRules(rules: readonly CompiledRule[], n: NeuronRuntime): void {
  for (let i = 0; i < rules.length; i += 1) {
    n.scratch[i] = rules[i].expression.run(n.ctx);
  }
  for (let i = 0; i < rules.length; i += 1) {
    n.ctx[rules[i].target] = n.scratch[i];
  }
}

/** Called after every completed tick with the clock time it ended at. */
export type TickObserver = (time: number) => void;

export class Network {
  readonly topology: Topology;
  private readonly clock: SimulationClock;
  private readonly queue: SpikeQueue;
  private readonly neurons: NeuronRuntime[];
  private readonly refractoryInput: RefractoryInputPolicy;
  private readonly epsilon: number;
  private readonly active: Uint8Array;
  private readonly log: Logger;

  constructor(topology: Topology, options: SimulationOptions = {}) {
    const opts = resolveSimulationOptions(options);
    this.topology = topology;
    this.clock = new SimulationClock(opts.dt, opts.speed, opts.paused);
    this.queue = new SpikeQueue(opts.maxPendingEvents);
    this.refractoryInput = opts.refractoryInput;
    this.epsilon = opts.timeEpsilon;
    this.neurons = topology.neurons.map(createRuntime);
    this.active = new Uint8Array(this.neurons.length);
    this.log = createLogger("network");
    this.log.debug(
      {
        neurons: topology.neurons.length,
        synapses: topology.synapses.length,
        models: new Set(topology.neurons.map((n) => n.model.name)).size,
        dt: opts.dt,
      },
      "network built",
    );
  }

  get neuronCount(): number {
    return this.neurons.length;
  }

  get synapses(): readonly Synapse[] {
    return this.topology.synapses;
  }

  get time(): number {
    return this.clock.time;
  }

  get ticks(): number {
    return this.clock.ticks;
  }

  get speed(): number {
    return this.clock.speed;
  }

  get paused(): boolean {
    return this.clock.paused;
  }

  get pendingEvents(): number {
    return this.queue.size;
  }

  get droppedEvents(): number {
    return this.queue.dropped;
  }

  // ---------------------------------------------------------------------------
  // Time control
  // ---------------------------------------------------------------------------

  pause(): void {
    this.clock.setPaused(true);
    this.log.debug({ time: this.clock.time }, "paused");
  }

  resume(): void {
    this.clock.setPaused(false);
    this.log.debug({ time: this.clock.time }, "resumed");
  }

  setSpeed(multiplier: number): void {
    this.clock.setSpeed(multiplier);
    this.log.debug({ speed: multiplier }, "speed changed");
  }

  // ---------------------------------------------------------------------------
  // Stepping
  // ---------------------------------------------------------------------------

  /**
   * Runs `ticks` ticks and returns the spikes fired, in firing order. The
   * time control is read once, at the start; `control` overrides the
   * network's own for this call only. While paused nothing runs.
   * `onTick` sees the state after each tick, e.g. for per-tick recording.
   */
  advance(ticks: number, control: Partial<TimeControl> = {}, onTick?: TickObserver): SpikeFiredEvent[] {
    if (!Number.isInteger(ticks) || ticks < 0) {
      throw new ConfigError(`Tick count must be an integer >= 0, got ${ticks}`);
    }
    const { paused, speed } = { ...this.clock.control(), ...control };
    assertSpeed(speed);
    if (paused) return [];
    const step = this.clock.dt * speed;
    const fired: SpikeFiredEvent[] = [];
    for (let i = 0; i < ticks; i += 1) {
      this.tick(step, fired);
      onTick?.(this.clock.time);
    }
    return fired;
  }

  /** Exactly one tick at the current speed, paused or not. */
  step(onTick?: TickObserver): SpikeFiredEvent[] {
    const fired: SpikeFiredEvent[] = [];
    this.tick(this.clock.effectiveStep, fired);
    onTick?.(this.clock.time);
    return fired;
  }

  /**
   * Tolerance for comparing times near `now`. Relative, so that it keeps
   * covering the rounding of `t += step` as simulated time grows.
   */
  private tolerance(now: number): number {
    return this.epsilon * Math.max(1, Math.abs(now));
  }

  private isRefractory(n: NeuronRuntime, now: number): boolean {
    return now <= n.refractoryUntil + this.tolerance(now);
  }

  private tick(step: number, fired: SpikeFiredEvent[]): void {
    // 1. clock
    const now = this.clock.advance(step);

    // 2. deliveries
    for (const event of this.queue.popDue(now + this.tolerance(now))) {
      const target = this.neurons[event.target];
      if (this.refractoryInput === "drop" && this.isRefractory(target, now)) continue;
      target.ctx[target.model.input] += event.magnitude;
    }

    // 3. updates
    for (let i = 0; i < this.neurons.length; i += 1) {
      const n = this.neurons[i];
      n.ctx.t = now;
      n.ctx.dt = step;
      const active = !this.isRefractory(n, now);
      this.active[i] = active ? 1 : 0;
      if (active) applyRules(n.model.update, n);
    }

    // 4. spike checks
    const dropsBefore = this.queue.dropped;
    for (let i = 0; i < this.neurons.length; i += 1) {
      if (this.active[i] === 0) continue;
      const n = this.neurons[i];
      if (!evaluateCondition(n.model.spikeCondition, n.ctx)) continue;
      applyRules(n.model.reset, n);
      n.refractoryUntil = now + n.model.refractoryPeriod;
      n.lastSpikeTime = now;
      fired.push({ neuronId: i, time: now });
      for (const synapse of this.topology.outgoing[i]) {
        this.queue.push(synapse.target, now + synapse.delay, synapseMagnitude(synapse));
      }
    }

    const dropped = this.queue.dropped - dropsBefore;
    if (dropped > 0) {
      this.log.warn({ time: now, dropped, pending: this.queue.size }, "spike queue full, events rejected");
    }
    if (this.log.isLevelEnabled("trace")) {
      this.log.trace({ time: now, fired: fired.length, pending: this.queue.size }, "tick");
    }
  }

  // ---------------------------------------------------------------------------
  // Observation
  // ---------------------------------------------------------------------------

  inspect(neuronId: NeuronId): NeuronSnapshot {
    const n = this.neurons[neuronId];
    if (!Number.isInteger(neuronId) || n === undefined) throw new UnknownNeuronError(neuronId);
    const values: Record<string, number> = {};
    for (const name of n.model.stateNames) values[name] = n.ctx[name];
    return {
      neuronId,
      model: n.model.name,
      time: this.clock.time,
      values,
      parameters: { ...n.slot.parameters },
      externalInput: n.ctx.I_ext,
      refractory: this.clock.time < n.refractoryUntil - this.tolerance(this.clock.time),
      refractoryUntil: n.refractoryUntil,
      lastSpikeTime: n.lastSpikeTime,
    };
  }

  /** Sets the value rules read as `I_ext` from the next tick on. */
  injectInput(neuronId: NeuronId, value: number): void {
    const n = this.neurons[neuronId];
    if (!Number.isInteger(neuronId) || n === undefined) throw new UnknownNeuronError(neuronId);
    n.ctx.I_ext = value;
  }

  /** Back to time 0 with initial values and an empty queue; topology unchanged. */
  reset(): void {
    this.clock.reset();
    this.queue.clear();
    for (let i = 0; i < this.neurons.length; i += 1) {
      this.neurons[i] = createRuntime(this.topology.neurons[i]);
    }
    this.log.debug("network reset");
  }
}

/**
 * Compiles each distinct model once, adds the neurons in order (ids are
 * their indices in `spec.neurons`) and connects the synapses.
 */
export function buildNetwork(spec: NetworkSpec, options: SimulationOptions = {}): Network {
  const parsed = parseConfig(NetworkSpecSchema, spec, "network spec");
  const models = new Map<string, NeuronModel>();
  for (const definition of spec.models) {
    const model = compileNeuronModel(definition);
    if (models.has(model.name)) {
      throw new ModelDefinitionError(`duplicate model name '${model.name}'`);
    }
    models.set(model.name, model);
  }

  const builder = new TopologyBuilder();
  for (const neuron of parsed.neurons) {
    const model = models.get(neuron.model);
    if (!model) throw new ModelDefinitionError(`unknown model '${neuron.model}'`);
    builder.addNeuron(model, { initial: neuron.initial, parameters: neuron.parameters });
  }
  for (const s of parsed.synapses) {
    builder.connect(s.source, s.target, s.weight, s.delay, s.kind);
  }
  return new Network(builder.freeze(), options);
}
