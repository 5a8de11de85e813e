/**
 * zod schemas for everything a host hands to the core: model definitions,
 * network specs and run options. Inputs are plain text plus numbers, so the
 * core stays independent of whatever file format the host persists.
 */
import { z } from "zod";
import { ConfigError } from "./errors";

const IdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a letter or '_' followed by letters, digits or '_'");

const FiniteSchema = z.number().finite();

const ValuesSchema = z.record(IdentifierSchema, FiniteSchema);

/** A string is the new value of the potential variable; a record names each target. */
export const RuleSchema = z.union([z.string().min(1), z.record(IdentifierSchema, z.string().min(1))]);

export const NeuronModelDefinitionSchema = z
  .object({
    name: z.string().min(1),
    stateVariables: ValuesSchema.refine((r) => Object.keys(r).length > 0, "declare at least one state variable"),
    parameters: ValuesSchema.default({}),
    update: RuleSchema.optional(),
    equations: z.string().min(1).optional(),
    spikeCondition: z.string().min(1),
    reset: RuleSchema,
    refractoryPeriod: z.number().finite().nonnegative().default(0),
    potential: IdentifierSchema.optional(),
    input: IdentifierSchema.optional(),
  })
  .refine((d) => (d.update === undefined) !== (d.equations === undefined), {
    message: "give exactly one of 'update' or 'equations'",
    path: ["update"],
  });

export type NeuronModelDefinition = z.input<typeof NeuronModelDefinitionSchema>;
export type ParsedNeuronModelDefinition = z.output<typeof NeuronModelDefinitionSchema>;

export const SynapseKindSchema = z.enum(["excitatory", "inhibitory"]);
export type SynapseKind = z.infer<typeof SynapseKindSchema>;

// Ids and delays are only shape-checked here; the topology builder reports
// unknown ids and negative delays with its own errors.
export const SynapseSpecSchema = z.object({
  source: z.number().int(),
  target: z.number().int(),
  weight: FiniteSchema,
  delay: z.number(),
  kind: SynapseKindSchema.default("excitatory"),
});

export type SynapseSpec = z.input<typeof SynapseSpecSchema>;

export const NeuronSpecSchema = z.object({
  model: z.string().min(1),
  initial: ValuesSchema.optional(),
  parameters: ValuesSchema.optional(),
});

export type NeuronSpec = z.input<typeof NeuronSpecSchema>;

export const NetworkSpecSchema = z.object({
  models: z.array(z.unknown()).min(1),
  neurons: z.array(NeuronSpecSchema),
  synapses: z.array(SynapseSpecSchema).default([]),
});

export type NetworkSpec = {
  models: NeuronModelDefinition[];
  neurons: NeuronSpec[];
  synapses?: SynapseSpec[];
};

export const RefractoryInputPolicySchema = z.enum(["retain", "drop"]);
export type RefractoryInputPolicy = z.infer<typeof RefractoryInputPolicySchema>;

export const SimulationOptionsSchema = z.object({
  dt: z.number().finite().positive().default(0.1),
  speed: z.number().finite().positive().default(1),
  paused: z.boolean().default(false),
  /** What happens to spikes delivered to a refractory neuron. */
  refractoryInput: RefractoryInputPolicySchema.default("retain"),
  /** Pending spike events beyond this are rejected and counted. Unbounded when absent. */
  maxPendingEvents: z.number().int().positive().optional(),
  /** Relative tolerance for time comparisons: scaled by max(1, |t|). */
  timeEpsilon: z.number().finite().nonnegative().default(1e-9),
});

export type SimulationOptions = z.input<typeof SimulationOptionsSchema>;
export type ResolvedSimulationOptions = z.output<typeof SimulationOptionsSchema>;

export const StoreOptionsSchema = z.object({
  spikeHistoryLimit: z.number().int().positive().default(1000),
  traceWindow: z.number().finite().positive().default(100),
});

export type StoreOptions = z.input<typeof StoreOptionsSchema>;
export type ResolvedStoreOptions = z.output<typeof StoreOptionsSchema>;

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/** Parses `value` or throws a ConfigError carrying the zod issues. */
export function parseConfig<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid ${what}: ${formatIssues(result.error.issues)}`, result.error.issues);
  }
  return result.data;
}

export function resolveSimulationOptions(options: SimulationOptions = {}): ResolvedSimulationOptions {
  return parseConfig(SimulationOptionsSchema, options, "simulation options");
}

export function resolveStoreOptions(options: StoreOptions = {}): ResolvedStoreOptions {
  return parseConfig(StoreOptionsSchema, options, "store options");
}
