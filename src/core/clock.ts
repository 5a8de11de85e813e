import { ConfigError } from "./errors";

export type TimeControl = {
  paused: boolean;
  /** Multiplies dt; must be > 0. */
  speed: number;
};

export function assertSpeed(multiplier: number): void {
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new ConfigError(`Speed multiplier must be a finite number > 0, got ${multiplier}`);
  }
}

/** Simulated time. Only the stepper advances it. */
export class SimulationClock {
  private elapsed = 0;
  private tickCount = 0;
  private multiplier: number;
  private halted: boolean;

  constructor(
    readonly dt: number,
    speed = 1,
    paused = false,
  ) {
    assertSpeed(speed);
    this.multiplier = speed;
    this.halted = paused;
  }

  get time(): number {
    return this.elapsed;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get speed(): number {
    return this.multiplier;
  }

  get paused(): boolean {
    return this.halted;
  }

  get effectiveStep(): number {
    return this.dt * this.multiplier;
  }

  control(): TimeControl {
    return { paused: this.halted, speed: this.multiplier };
  }

  setPaused(paused: boolean): void {
    this.halted = paused;
  }

  setSpeed(multiplier: number): void {
    assertSpeed(multiplier);
    this.multiplier = multiplier;
  }

  advance(step: number): number {
    this.elapsed += step;
    this.tickCount += 1;
    return this.elapsed;
  }

  reset(): void {
    this.elapsed = 0;
    this.tickCount = 0;
  }
}
