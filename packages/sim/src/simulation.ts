/**
 * Time-based Simulation.
 *
 * A cooperative scheduler over named signals. Pending events (clock toggles,
 * scheduled value changes, expiring timers) are ordered by time, then by
 * insertion. After each event every task it woke runs until its next
 * `waitEdge()` / `waitDuration()` before the next event is taken.
 */

import type {
  Edge,
  FourStateValue,
  RunBudget,
  SignalBus,
  SignalInfo,
  SignalInput,
  SimulationOptions,
  Task,
  TaskRunner,
  WaveformSample,
} from "./types.js";
import { SimulationTimeoutError } from "./types.js";
import { SignalStore, createDut, type SignalChange } from "./dut.js";

interface ScheduledEvent {
  readonly time: number;
  readonly seq: number;
  readonly run: () => void;
}

interface EdgeWaiter {
  readonly edge: Edge;
  readonly resolve: () => void;
}

const DEFAULT_MAX_STEPS = 10_000_000;

/** Let every pending microtask (woken coroutines) run to its next wait. */
function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function lsb(v: FourStateValue): 0 | 1 | "x" {
  if (v.mask & 1) return "x";
  return (v.value & 1) === 1 ? 1 : 0;
}

/** Does a change of the least significant bit match the requested edge? */
function matchesEdge(change: SignalChange, edge: Edge): boolean {
  const prev = lsb(change.previous);
  const next = lsb(change.next);
  const rising = next === 1 && prev !== 1;
  const falling = next === 0 && prev !== 0;
  switch (edge) {
    case "rising":
      return rising;
    case "falling":
      return falling;
    case "any":
      return rising || falling;
  }
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

export class Simulation<P = Record<string, unknown>>
  implements SignalBus, TaskRunner
{
  private readonly _store: SignalStore;
  private readonly _dut: P;
  private readonly _queue: ScheduledEvent[] = [];
  private readonly _waiters = new Map<string, EdgeWaiter[]>();
  private readonly _waveform: Map<string, WaveformSample[]> | undefined;
  private readonly _failures: unknown[] = [];
  private _time = 0;
  private _seq = 0;
  private _taskCount = 0;
  private _disposed = false;

  private constructor(
    signals: Record<string, SignalInfo>,
    options: SimulationOptions,
  ) {
    this._store = new SignalStore(signals);
    this._dut = createDut<P>(this, signals);
    if (options.trace) {
      this._waveform = new Map();
      for (const name of this._store.names()) {
        this._waveform.set(name, [{ time: 0, value: this._store.read(name) }]);
      }
    }
  }

  /**
   * Create a Simulation over the given signals.
   *
   * ```ts
   * const sim = Simulation.create<SpiPorts>({
   *   I_SCLK_0: { direction: "input", type: "logic", width: 1, initial: 0 },
   *   ...
   * });
   * sim.startSoon(() => driver.send(trx));
   * await sim.runUntil(10_000);
   * ```
   */
  static create<P = Record<string, unknown>>(
    signals: Record<string, SignalInfo>,
    options?: SimulationOptions,
  ): Simulation<P> {
    return new Simulation<P>(signals, options ?? {});
  }

  /** The DUT accessor object: read and write signals as plain properties. */
  get dut(): P {
    return this._dut;
  }

  /**
   * Register a periodic clock.
   *
   * The clock is driven low now, rises at `initialDelay` and then toggles
   * every half period.
   *
   * @param name    Clock signal name.
   * @param opts    `period` in time units; optional `initialDelay`.
   */
  addClock(
    name: string,
    opts: { period: number; initialDelay?: number },
  ): void {
    this.ensureAlive();
    if (!(opts.period > 0) || opts.period % 2 !== 0) {
      throw new RangeError(`Clock period must be a positive even number, got ${opts.period}`);
    }
    this._store.info(name);
    const half = opts.period / 2;
    this.writeSignal(name, 0);
    const toggle = (level: 0 | 1): void => {
      this.writeSignal(name, level);
      this.enqueue(this._time + half, () => toggle(level === 1 ? 0 : 1));
    };
    this.enqueue(this._time + (opts.initialDelay ?? 0), () => toggle(1));
  }

  /**
   * Schedule a one-shot value change for a signal.
   *
   * @param name  Signal name.
   * @param opts  `time` is the absolute time to apply, `value` the value to set.
   */
  schedule(name: string, opts: { time: number; value: SignalInput }): void {
    this.ensureAlive();
    this._store.info(name);
    if (opts.time < this._time) {
      throw new RangeError(`Cannot schedule '${name}' in the past (${opts.time} < ${this._time})`);
    }
    this.enqueue(opts.time, () => this.writeSignal(name, opts.value));
  }

  // -----------------------------------------------------------------------
  // SignalBus
  // -----------------------------------------------------------------------

  writeSignal(name: string, value: SignalInput): void {
    this.ensureAlive();
    const change = this._store.write(name, value);
    if (!change) return;
    this._waveform?.get(name)?.push({ time: this._time, value: change.next });
    this.notifyEdges(name, change);
  }

  readSignal(name: string): FourStateValue {
    this.ensureAlive();
    return this._store.read(name);
  }

  /** Resolve on the next matching change of the signal's least significant bit. */
  waitEdge(name: string, edge: Edge): Promise<void> {
    this.ensureAlive();
    this._store.info(name);
    return new Promise((resolve) => {
      const list = this._waiters.get(name);
      if (list) list.push({ edge, resolve });
      else this._waiters.set(name, [{ edge, resolve }]);
    });
  }

  waitDuration(amount: number): Promise<void> {
    this.ensureAlive();
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`Wait duration must be a non-negative number, got ${amount}`);
    }
    return new Promise((resolve) => {
      this.enqueue(this._time + amount, resolve);
    });
  }

  now(): number {
    return this._time;
  }

  // -----------------------------------------------------------------------
  // Tasks
  // -----------------------------------------------------------------------

  /**
   * Start a coroutine. It runs synchronously up to its first wait.
   * A failure is reported by the next `runUntil()` or `runTask()`.
   */
  startSoon<T>(fn: () => Promise<T>, name?: string): Task<T> {
    this.ensureAlive();
    const taskName = name ?? `task${this._taskCount}`;
    this._taskCount++;
    let settled = false;
    const done = fn();
    void done.then(
      () => {
        settled = true;
      },
      (err: unknown) => {
        settled = true;
        this._failures.push(err);
      },
    );
    return {
      name: taskName,
      done,
      get settled() {
        return settled;
      },
    };
  }

  // -----------------------------------------------------------------------
  // Running
  // -----------------------------------------------------------------------

  /**
   * Run the simulation until the given time.
   * Processes all scheduled events up to and including `endTime`.
   *
   * @throws SimulationTimeoutError if a budget is exhausted first.
   */
  async runUntil(endTime: number, budget?: RunBudget): Promise<void> {
    this.ensureAlive();
    await this.drain();
    const guard = this.budgetGuard("runUntil", budget);
    for (;;) {
      const next = this._queue[0];
      if (next === undefined || next.time > endTime) break;
      guard(next.time);
      await this.processNext();
    }
    this._time = Math.max(this._time, endTime);
  }

  /**
   * Step until `task` settles and return its result.
   *
   * @throws SimulationTimeoutError if a budget is exhausted first, or if no
   *         event is left that could wake the task.
   */
  async runTask<T>(task: Task<T>, budget?: RunBudget): Promise<T> {
    this.ensureAlive();
    await this.drain();
    const guard = this.budgetGuard(`runTask(${task.name})`, budget);
    while (!task.settled) {
      const next = this._queue[0];
      if (next === undefined) {
        throw new SimulationTimeoutError(
          `runTask(${task.name}): no pending events at time ${this._time}, task can never resume`,
          this._time,
          0,
        );
      }
      guard(next.time);
      await this.processNext();
    }
    return task.done;
  }

  /** Current simulation time. */
  time(): number {
    return this._time;
  }

  /**
   * Recorded value changes of a signal. Requires `{ trace: true }`.
   */
  waveform(name: string): readonly WaveformSample[] {
    this._store.info(name);
    if (!this._waveform) {
      throw new Error("Waveform tracing is disabled; create the Simulation with { trace: true }");
    }
    return this._waveform.get(name) ?? [];
  }

  /** Drop all pending events and waiters. */
  dispose(): void {
    if (!this._disposed) {
      this._disposed = true;
      this._queue.length = 0;
      this._waiters.clear();
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private enqueue(time: number, run: () => void): void {
    const event: ScheduledEvent = { time, seq: this._seq++, run };
    // Binary search for the first event strictly later than `time`.
    let lo = 0;
    let hi = this._queue.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const probe = this._queue[mid];
      if (probe !== undefined && probe.time <= time) lo = mid + 1;
      else hi = mid;
    }
    this._queue.splice(lo, 0, event);
  }

  private async processNext(): Promise<number> {
    const event = this._queue.shift();
    if (event === undefined) {
      throw new Error("processNext() called with an empty event queue");
    }
    this._time = event.time;
    event.run();
    await this.drain();
    return this._time;
  }

  /** Wait for woken tasks to block again, then surface any task failure. */
  private async drain(): Promise<void> {
    await settle();
    this.throwIfFailed();
  }

  private notifyEdges(name: string, change: SignalChange): void {
    const list = this._waiters.get(name);
    if (!list || list.length === 0) return;
    const remaining: EdgeWaiter[] = [];
    const woken: EdgeWaiter[] = [];
    for (const waiter of list) {
      if (matchesEdge(change, waiter.edge)) woken.push(waiter);
      else remaining.push(waiter);
    }
    this._waiters.set(name, remaining);
    for (const waiter of woken) waiter.resolve();
  }

  private budgetGuard(label: string, budget: RunBudget | undefined): (nextTime: number) => void {
    const maxSteps = budget?.maxSteps ?? DEFAULT_MAX_STEPS;
    const maxTime = budget?.maxTime;
    const deadline = budget?.maxWallMs == null ? undefined : Date.now() + budget.maxWallMs;
    let steps = 0;
    return (nextTime) => {
      if (maxTime !== undefined && nextTime > maxTime) {
        throw new SimulationTimeoutError(
          `${label}: exceeded simulated time bound ${maxTime} (next event at ${nextTime})`,
          this._time,
          steps,
        );
      }
      if (steps >= maxSteps) {
        throw new SimulationTimeoutError(
          `${label}: exceeded ${maxSteps} steps at time ${this._time}`,
          this._time,
          steps,
        );
      }
      if (deadline !== undefined && Date.now() > deadline) {
        throw new SimulationTimeoutError(
          `${label}: exceeded wall-clock bound of ${budget?.maxWallMs} ms at time ${this._time}`,
          this._time,
          steps,
        );
      }
      steps++;
    };
  }

  private throwIfFailed(): void {
    if (this._failures.length > 0) {
      throw this._failures[0];
    }
  }

  private ensureAlive(): void {
    if (this._disposed) {
      throw new Error("Simulation has been disposed");
    }
  }
}
