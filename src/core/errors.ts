/**
 * Error taxonomy for the simulation core.
 *
 * Compile and topology errors are raised synchronously while a network is
 * being assembled. Once `buildNetwork()` succeeds nothing inside a tick throws.
 */

export class SimulationError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = "SimulationError";
  }
}

// ---------------------------------------------------------------------------
// Compile errors
// ---------------------------------------------------------------------------

export type CompileErrorKind = "lex" | "parse" | "unknown-identifier" | "arity";

export class CompileError extends SimulationError {
  constructor(
    message: string,
    public kind: CompileErrorKind,
    public position: number,
    details?: unknown,
  ) {
    super(message, "COMPILE_ERROR", details);
    this.name = "CompileError";
  }
}

export class LexError extends CompileError {
  constructor(
    position: number,
    public character: string,
  ) {
    super(`Unexpected character '${character}' at position ${position}`, "lex", position);
    this.name = "LexError";
  }
}

export class ParseError extends CompileError {
  constructor(
    position: number,
    public expected: string,
    public found: string,
  ) {
    super(`Expected ${expected} but found ${found} at position ${position}`, "parse", position);
    this.name = "ParseError";
  }
}

/** `identifier` rather than `name`: `name` already holds the error class name. */
export class UnknownIdentifierError extends CompileError {
  constructor(
    public identifier: string,
    position: number,
  ) {
    super(`Unknown identifier '${identifier}' at position ${position}`, "unknown-identifier", position);
    this.name = "UnknownIdentifierError";
  }
}

export class ArityError extends CompileError {
  constructor(
    public functionName: string,
    public expected: number,
    public got: number,
    position: number,
  ) {
    super(
      `Function '${functionName}' takes ${expected} argument(s) but got ${got} at position ${position}`,
      "arity",
      position,
    );
    this.name = "ArityError";
  }
}

// ---------------------------------------------------------------------------
// Topology errors
// ---------------------------------------------------------------------------

export class TopologyError extends SimulationError {
  constructor(message: string, code = "TOPOLOGY_ERROR", details?: unknown) {
    super(message, code, details);
    this.name = "TopologyError";
  }
}

export class UnknownNeuronError extends TopologyError {
  constructor(public neuronId: number) {
    super(`Unknown neuron id ${neuronId}`, "UNKNOWN_NEURON");
    this.name = "UnknownNeuronError";
  }
}

export class InvalidDelayError extends TopologyError {
  constructor(public delay: number) {
    super(`Synapse delay must be a finite number >= 0, got ${delay}`, "INVALID_DELAY");
    this.name = "InvalidDelayError";
  }
}

export class TopologyFrozenError extends TopologyError {
  constructor() {
    super("Topology is frozen once the network has been built", "TOPOLOGY_FROZEN");
    this.name = "TopologyFrozenError";
  }
}

// ---------------------------------------------------------------------------
// Model, configuration and evaluation errors
// ---------------------------------------------------------------------------

export class ModelDefinitionError extends SimulationError {
  constructor(
    message: string,
    public modelName?: string,
  ) {
    super(modelName ? `Model '${modelName}': ${message}` : message, "MODEL_DEFINITION_ERROR");
    this.name = "ModelDefinitionError";
  }
}

export class ConfigError extends SimulationError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

/**
 * Only raised when a host-supplied context misses a binding. Numeric domain
 * problems (log of a negative, 0/0) produce NaN instead.
 */
export class EvaluationError extends SimulationError {
  constructor(
    message: string,
    public identifier: string,
  ) {
    super(message, "EVALUATION_ERROR");
    this.name = "EvaluationError";
  }
}
