/**
 * @regbus/sim: core type definitions
 *
 * These types define the contract between:
 *   - the simulation kernel (this package): owns time, signals and tasks
 *   - bus agents (drivers, monitors, device models): talk to the kernel only
 *     through `SignalBus` and `TaskRunner`
 */

// ---------------------------------------------------------------------------
// Signal declarations
// ---------------------------------------------------------------------------

/** Metadata for a single named signal. */
export interface SignalInfo {
  readonly direction: "input" | "output" | "inout";
  readonly type: "clock" | "logic";
  /** Bit width, 1..32. */
  readonly width: number;
  /**
   * Value at time zero. Defaults to all-X, matching an undriven net.
   */
  readonly initial?: number | typeof X;
}

/** Edge polarity accepted by `waitEdge()`. */
export type Edge = "rising" | "falling" | "any";

// ---------------------------------------------------------------------------
// Host capability interface
// ---------------------------------------------------------------------------

/** Value accepted by `writeSignal()`. */
export type SignalInput = number | bigint | typeof X | FourStateValue;

/**
 * What a bus agent may do to the simulated world: drive and sample signals,
 * and suspend until an edge or for a span of simulated time.
 */
export interface SignalBus {
  writeSignal(name: string, value: SignalInput): void;
  readSignal(name: string): FourStateValue;
  waitEdge(name: string, edge: Edge): Promise<void>;
  waitDuration(amount: number): Promise<void>;
  /** Current simulated time. */
  now(): number;
}

/** A coroutine started with `TaskRunner.startSoon()`. */
export interface Task<T = void> {
  readonly name: string;
  /** Settles with the coroutine. Failures are already reported to the runner. */
  readonly done: Promise<T>;
  readonly settled: boolean;
}

/** Starts independently scheduled coroutines. */
export interface TaskRunner {
  startSoon<T>(fn: () => Promise<T>, name?: string): Task<T>;
}

/** Everything an orchestration loop needs from its host. */
export type SimulationHost = SignalBus & TaskRunner;

// ---------------------------------------------------------------------------
// User-facing options
// ---------------------------------------------------------------------------

export interface SimulationOptions {
  /** Record every value change so `waveform()` can replay it. Default: false. */
  trace?: boolean;
}

/** Budget for `runUntil()` / `runTask()`. */
export interface RunBudget {
  /** Maximum scheduler steps before `SimulationTimeoutError`. */
  maxSteps?: number;
  /** Maximum simulated time before `SimulationTimeoutError`. */
  maxTime?: number;
  /** Maximum wall-clock milliseconds before `SimulationTimeoutError`. */
  maxWallMs?: number;
}

/** One recorded value change. */
export interface WaveformSample {
  readonly time: number;
  readonly value: FourStateValue;
}

// ---------------------------------------------------------------------------
// 4-state helpers
// ---------------------------------------------------------------------------

/** Sentinel representing all-X. */
export const X = Symbol.for("regbus:X");

/** A 4-state value with explicit bit-level mask. */
export interface FourStateValue {
  readonly __fourState: true;
  readonly value: number;
  readonly mask: number;
}

/** Construct a 4-state value. Mask bits set to 1 indicate X. */
export function FourState(value: number, mask: number): FourStateValue {
  return { __fourState: true, value: value >>> 0, mask: mask >>> 0 };
}

export function isFourStateValue(v: unknown): v is FourStateValue {
  return (
    typeof v === "object" &&
    v !== null &&
    "__fourState" in v &&
    v.__fourState === true
  );
}

/** True when no bit of `v` is X. */
export function isResolved(v: FourStateValue): boolean {
  return v.mask === 0;
}

/** Render as a binary string, MSB first, with `x` for unresolved bits. */
export function toBinString(v: FourStateValue, width: number): string {
  let out = "";
  for (let i = width - 1; i >= 0; i--) {
    if ((v.mask >>> i) & 1) out += "x";
    else out += ((v.value >>> i) & 1).toString();
  }
  return out;
}

// ---------------------------------------------------------------------------
// Simulation timeout error
// ---------------------------------------------------------------------------

/**
 * Thrown when a simulation helper exceeds its step, time or wall-clock
 * budget, or when the event queue drains while a task is still waiting.
 */
export class SimulationTimeoutError extends Error {
  readonly time: number;
  readonly steps: number;

  constructor(message: string, time: number, steps: number) {
    super(message);
    this.name = "SimulationTimeoutError";
    this.time = time;
    this.steps = steps;
  }
}
