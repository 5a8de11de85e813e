import type { SynapseKind } from "./config";
import { InvalidDelayError, TopologyFrozenError, UnknownNeuronError } from "./errors";
import { resolveOverrides } from "./neuronModel";
import type { NeuronModel } from "./neuronModel";

export type NeuronId = number;
export type SynapseId = number;

export type Synapse = {
  readonly id: SynapseId;
  readonly source: NeuronId;
  readonly target: NeuronId;
  readonly weight: number;
  readonly delay: number;
  readonly kind: SynapseKind;
};

export type NeuronSlot = {
  readonly id: NeuronId;
  readonly model: NeuronModel;
  readonly initialState: Readonly<Record<string, number>>;
  readonly parameters: Readonly<Record<string, number>>;
};

export type Topology = {
  readonly neurons: readonly NeuronSlot[];
  readonly synapses: readonly Synapse[];
  /** Outgoing synapses per source id, in creation order. */
  readonly outgoing: readonly (readonly Synapse[])[];
};

export type NeuronOverrides = {
  initial?: Record<string, number>;
  parameters?: Record<string, number>;
};

/** Value added to the target's input variable when the synapse delivers. */
export function synapseMagnitude(synapse: Synapse): number {
  return synapse.kind === "inhibitory" ? -Math.abs(synapse.weight) : synapse.weight;
}

/**
 * Collects neurons and connections. Ids are dense indices handed out in
 * insertion order. `freeze()` ends construction; the run's topology never
 * changes afterwards.
 */
export class TopologyBuilder {
  private readonly neurons: NeuronSlot[] = [];
  private readonly synapses: Synapse[] = [];
  private frozen = false;

  get neuronCount(): number {
    return this.neurons.length;
  }

  addNeuron(model: NeuronModel, overrides: NeuronOverrides = {}): NeuronId {
    this.assertOpen();
    const id = this.neurons.length;
    this.neurons.push({
      id,
      model,
      initialState: Object.freeze(
        resolveOverrides(model, model.stateNames, model.initialState, overrides.initial, "state variable"),
      ),
      parameters: Object.freeze(
        resolveOverrides(model, model.parameterNames, model.parameterDefaults, overrides.parameters, "parameter"),
      ),
    });
    return id;
  }

  connect(
    source: NeuronId,
    target: NeuronId,
    weight: number,
    delay: number,
    kind: SynapseKind = "excitatory",
  ): SynapseId {
    this.assertOpen();
    this.assertNeuron(source);
    this.assertNeuron(target);
    if (!Number.isFinite(delay) || delay < 0) throw new InvalidDelayError(delay);
    const id = this.synapses.length;
    this.synapses.push(Object.freeze({ id, source, target, weight, delay, kind }));
    return id;
  }

  freeze(): Topology {
    this.assertOpen();
    this.frozen = true;
    const outgoing: Synapse[][] = this.neurons.map(() => []);
    for (const synapse of this.synapses) {
      outgoing[synapse.source].push(synapse);
    }
    return Object.freeze({
      neurons: Object.freeze([...this.neurons]),
      synapses: Object.freeze([...this.synapses]),
      outgoing: Object.freeze(outgoing.map((list) => Object.freeze(list))),
    });
  }

  private assertOpen(): void {
    if (this.frozen) throw new TopologyFrozenError();
  }

  private assertNeuron(id: NeuronId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.neurons.length) {
      throw new UnknownNeuronError(id);
    }
  }
}
