/**
 * @regbus/sim
 *
 * Cooperative signal-level simulation kernel: named 4-state signals,
 * clocks, scheduled changes, edge and duration waits, and tasks.
 * Bus agents depend only on the `SignalBus` / `TaskRunner` capabilities.
 */

// Core types
export type {
  SignalInfo,
  SignalInput,
  SignalBus,
  Task,
  TaskRunner,
  SimulationHost,
  SimulationOptions,
  RunBudget,
  WaveformSample,
  Edge,
  FourStateValue,
} from "./types.js";

// 4-state helpers
export {
  X,
  FourState,
  isFourStateValue,
  isResolved,
  toBinString,
  SimulationTimeoutError,
} from "./types.js";

// Simulation (time-based)
export { Simulation } from "./simulation.js";

// Signal storage and DUT accessor (advanced / internal use)
export { SignalStore, createDut, toFourState, widthMask } from "./dut.js";
export type { SignalChange } from "./dut.js";
