import type { NeuronId } from "./topology";

export type TraceBuffer = {
  t: number[];
  values: number[];
};

export type Hist = {
  /** Spike times per neuron, oldest first. */
  spikes: number[][];
  /** Keyed by `traceKey(neuronId, variable)`. */
  traces: Record<string, TraceBuffer>;
  totalSpikes: number;
};

export function buildHistory(n: number): Hist {
  return {
    spikes: Array.from({ length: n }, () => []),
    traces: {},
    totalSpikes: 0,
  };
}

export function traceKey(neuronId: NeuronId, variable: string): string {
  return `${neuronId}:${variable}`;
}

/** Appends spike times, keeping at most `limit` per neuron (oldest dropped). */
export function recordSpikes(
  hist: Hist,
  events: readonly { neuronId: NeuronId; time: number }[],
  limit: number,
): Hist {
  if (events.length === 0) return hist;
  const spikes = hist.spikes.map((arr) => arr);
  const touched = new Set<NeuronId>();
  for (const e of events) {
    if (!touched.has(e.neuronId)) {
      spikes[e.neuronId] = [...spikes[e.neuronId]];
      touched.add(e.neuronId);
    }
    spikes[e.neuronId].push(e.time);
  }
  for (const id of touched) {
    if (spikes[id].length > limit) {
      spikes[id] = spikes[id].slice(spikes[id].length - limit);
    }
  }
  return { ...hist, spikes, totalSpikes: hist.totalSpikes + events.length };
}

/**
 * Adds a sample unless it repeats the last stored value, then drops samples
 * older than `time - window`.
 */
export function recordTrace(buffer: TraceBuffer, time: number, value: number, window: number): TraceBuffer {
  const last = buffer.values.length > 0 ? buffer.values[buffer.values.length - 1] : undefined;
  const t = [...buffer.t];
  const values = [...buffer.values];
  if (last === undefined || !Object.is(last, value)) {
    t.push(time);
    values.push(value);
  }
  const tMin = time - window;
  let start = 0;
  while (start < t.length && t[start] < tMin) start += 1;
  return { t: t.slice(start), values: values.slice(start) };
}
