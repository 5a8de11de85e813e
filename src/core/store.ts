/**
 * Observable simulation store – the read/observe surface a host UI binds to.
 *
 * The store owns the time-control state (paused, speed) and hands it to the
 * network explicitly on every advance. Plots subscribe to `hist`, readouts to
 * `time` and `lastSpikes`.
 */

import { subscribeWithSelector } from "zustand/middleware";
import { createStore } from "zustand/vanilla";
import { resolveStoreOptions } from "./config";
import type { StoreOptions } from "./config";
import { buildHistory, recordSpikes, recordTrace, traceKey } from "./history";
import type { Hist, TraceBuffer } from "./history";
import type { Network, NeuronSnapshot, SpikeFiredEvent, TickObserver } from "./network";
import type { NeuronId } from "./topology";

// ---------------------------------------------------------------------------
// Perf stats
// ---------------------------------------------------------------------------

export type PerfStats = {
  /** Wall time of the last advance/step call. */
  stepMs: number;
  ticksRun: number;
  pendingEvents: number;
  droppedEvents: number;
};

export type WatchedVariable = {
  neuronId: NeuronId;
  variable: string;
};

// ---------------------------------------------------------------------------
// Store shape
// ---------------------------------------------------------------------------

export interface SimStore {
  // ---- Clock ----
  time: number;
  paused: boolean;
  speed: number;

  // ---- Runtime ----
  lastSpikes: SpikeFiredEvent[];
  hist: Hist;
  watched: WatchedVariable[];
  /** Clock time the recorders were last cleared at. */
  recordingSince: number;

  // ---- Perf ----
  perf: PerfStats;

  // ---- Derived helpers ----
  trace: (neuronId: NeuronId, variable: string) => TraceBuffer;
  /** Spikes per neuron per unit of simulated time since `recordingSince`. */
  meanRate: () => number;

  // ---- Actions ----
  advance: (ticks: number) => SpikeFiredEvent[];
  step: () => SpikeFiredEvent[];
  pause: () => void;
  resume: () => void;
  togglePause: () => void;
  setSpeed: (multiplier: number) => void;
  watch: (neuronId: NeuronId, variable: string) => void;
  unwatch: (neuronId: NeuronId, variable: string) => void;
  resetTraces: () => void;
  resetRun: () => void;
  inspect: (neuronId: NeuronId) => NeuronSnapshot;
}

const EMPTY_TRACE: TraceBuffer = { t: [], values: [] };

export function createSimulationStore(network: Network, options: StoreOptions = {}) {
  const opts = resolveStoreOptions(options);

  return createStore<SimStore>()(
    subscribeWithSelector((set, get) => {
      function perfAfter(stepMs: number, ticksRun: number): PerfStats {
        return {
          stepMs,
          ticksRun,
          pendingEvents: network.pendingEvents,
          droppedEvents: network.droppedEvents,
        };
      }

      /** Per-tick sampler for the watched variables, writing into `traces`. */
      function traceSampler(watched: readonly WatchedVariable[], traces: Record<string, TraceBuffer>): TickObserver {
        return (time: number): void => {
          for (const w of watched) {
            const key = traceKey(w.neuronId, w.variable);
            const value = network.inspect(w.neuronId).values[w.variable];
            traces[key] = recordTrace(traces[key] ?? EMPTY_TRACE, time, value, opts.traceWindow);
          }
        };
      }

      /** Runs `run` with a per-tick sampler and commits spikes, traces and perf. */
      function runTicks(run: (onTick: TickObserver) => SpikeFiredEvent[]): SpikeFiredEvent[] {
        const s = get();
        const traces = { ...s.hist.traces };
        let ticksRun = 0;
        const sample = traceSampler(s.watched, traces);
        const stepStart = performance.now();
        const fired = run((time) => {
          ticksRun += 1;
          sample(time);
        });
        const stepMs = performance.now() - stepStart;
        set((prev) => ({
          time: network.time,
          lastSpikes: fired,
          hist: { ...recordSpikes(prev.hist, fired, opts.spikeHistoryLimit), traces },
          perf: perfAfter(stepMs, ticksRun),
        }));
        return fired;
      }

      return {
        // ---- Clock ----
        time: network.time,
        paused: network.paused,
        speed: network.speed,

        // ---- Runtime ----
        lastSpikes: [],
        hist: buildHistory(network.neuronCount),
        watched: [],
        recordingSince: network.time,

        // ---- Perf ----
        perf: perfAfter(0, 0),

        // ---- Derived helpers ----
        trace: (neuronId, variable) => get().hist.traces[traceKey(neuronId, variable)] ?? EMPTY_TRACE,
        meanRate: () => {
          const s = get();
          const span = s.time - s.recordingSince;
          if (span <= 0 || network.neuronCount === 0) return 0;
          return s.hist.totalSpikes / network.neuronCount / span;
        },

        // ---- Actions ----
        advance: (ticks) => {
          const { paused, speed } = get();
          return runTicks((onTick) => network.advance(ticks, { paused, speed }, onTick));
        },

        step: () => runTicks((onTick) => network.step(onTick)),

        pause: () => {
          network.pause();
          set({ paused: true });
        },

        resume: () => {
          network.resume();
          set({ paused: false });
        },

        togglePause: () => {
          if (get().paused) get().resume();
          else get().pause();
        },

        setSpeed: (multiplier) => {
          network.setSpeed(multiplier);
          set({ speed: multiplier });
        },

        watch: (neuronId, variable) => {
          // Throws on an unknown id; an unknown variable is ignored.
          const snapshot = network.inspect(neuronId);
          if (!Object.hasOwn(snapshot.values, variable)) return;
          if (get().watched.some((w) => w.neuronId === neuronId && w.variable === variable)) return;
          set((s) => ({ watched: [...s.watched, { neuronId, variable }] }));
        },

        unwatch: (neuronId, variable) =>
          set((s) => {
            const traces = { ...s.hist.traces };
            delete traces[traceKey(neuronId, variable)];
            return {
              watched: s.watched.filter((w) => !(w.neuronId === neuronId && w.variable === variable)),
              hist: { ...s.hist, traces },
            };
          }),

        resetTraces: () =>
          set({
            lastSpikes: [],
            hist: buildHistory(network.neuronCount),
            recordingSince: network.time,
          }),

        resetRun: () => {
          network.reset();
          set({
            time: network.time,
            lastSpikes: [],
            hist: buildHistory(network.neuronCount),
            recordingSince: network.time,
            perf: perfAfter(0, 0),
          });
        },

        inspect: (neuronId) => network.inspect(neuronId),
      };
    }),
  );
}

/** Vanilla store with the selector-aware `subscribe`. */
export type SimulationStore = ReturnType<typeof createSimulationStore>;
