/**
 * Orchestration loop.
 *
 * generate → predict → expect → transmit → (monitor) score + sample → goal?
 *
 * The monitor, and the pulse injector when there is one, run as their own
 * tasks; the loop only talks to them through the scoreboard callback.
 */

import type { Simulation, TaskRunner } from "@regbus/sim";
import { SimulationTimeoutError } from "@regbus/sim";
import { WatchdogTimeoutError, type Mismatch } from "./errors.js";
import type { CoverageEngine, CoverageReport, StatusReportConfig } from "./coverage-engine.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { PulseInjector } from "./pulse.js";
import type { AccessShortfall, RegisterModel } from "./register-model.js";
import { ANY, type ResetDetector, type Scoreboard } from "./scoreboard.js";
import type { SpiDriver } from "./spi-driver.js";
import type { SpiMonitor, SpiObservation } from "./spi-monitor.js";
import { Sequencer, type StimulusGenerator } from "./stimulus.js";
import { formatTransaction, type Transaction } from "./transaction.js";

export interface TestBenchOptions {
  model: RegisterModel;
  generator: StimulusGenerator;
  driver: SpiDriver;
  monitor: SpiMonitor;
  scoreboard: Scoreboard;
  coverage: CoverageEngine;
  /** Crosses that must reach 100 % to end the run early. */
  goal?: readonly string[];
  /** Cover point whose bins are register names, for soft weighting. Default `"register"`. */
  registerPoint?: string;
  /** Transaction limit. Default 1000. */
  maxRuns?: number;
  resetDetector?: ResetDetector;
  pulse?: PulseInjector;
  /** Scoreboard channel name. Default `"spi0"`. */
  channel?: string;
  /** Status fields logged after every sample. */
  status?: StatusReportConfig;
  /** Access count below which a register is reported as under-exercised. Default 2. */
  minRuns?: number;
  /** Include per-bin detail in the final report. Default true. */
  reportBins?: boolean;
  logger?: Logger;
}

export interface Verdict {
  readonly passed: boolean;
  readonly runs: number;
  /** Whether the coverage goal, rather than `maxRuns`, ended the run. */
  readonly goalReached: boolean;
  readonly mismatches: readonly Mismatch[];
  readonly coverage: CoverageReport;
  readonly shortfall: AccessShortfall;
}

export class TestBench {
  private readonly _host: TaskRunner;
  private readonly _o: TestBenchOptions;
  private readonly _goal: readonly string[];
  private readonly _channel: string;
  private readonly _log: Logger;
  private readonly _sequencer: Sequencer;
  private _inFlight: Transaction | undefined;
  private _started = false;

  constructor(host: TaskRunner, options: TestBenchOptions) {
    this._host = host;
    this._o = options;
    this._goal = options.goal ?? [];
    this._channel = options.channel ?? "spi0";
    this._log = options.logger ?? silentLogger;
    for (const name of this._goal) {
      options.coverage.registry.cross(name);
    }
    const maxRuns = options.maxRuns ?? 1000;
    this._sequencer = new Sequencer({
      generator: options.generator,
      model: options.model,
      goal: (runs) => runs >= maxRuns || this.goalReached(),
      covered: () => this.coveredRegisters(),
      logger: this._log,
    });
  }

  get runs(): number {
    return this._sequencer.runs;
  }

  goalReached(): boolean {
    return this._o.coverage.isComplete(this._goal);
  }

  /**
   * Registers with nothing left to cover in any goal cross that has a
   * register dimension.
   */
  coveredRegisters(): Set<string> {
    const point = this._o.registerPoint ?? "register";
    const crosses = this._goal
      .map((name) => this._o.coverage.registry.cross(name))
      .filter((cross) => cross.items.includes(point));
    const covered = new Set<string>();
    if (crosses.length === 0) return covered;
    for (const name of this._o.model.names()) {
      if (crosses.every((cross) => cross.binSettled(point, name))) covered.add(name);
    }
    return covered;
  }

  /** Run until the goal or `maxRuns`. Must itself run as a simulation task. */
  async run(): Promise<Verdict> {
    if (this._started) {
      throw new Error("TestBench.run() may only be called once");
    }
    this._started = true;
    const { driver, monitor, pulse, coverage, scoreboard, model, status } = this._o;

    if (status) coverage.configureStatus(status);
    driver.init();
    monitor.onObservation((obs) => this.onObservation(obs));
    this._host.startSoon(() => monitor.run(), "monitor");
    if (pulse) this._host.startSoon(() => pulse.run(), "pulse");

    for (let trx = this._sequencer.next(); trx; trx = this._sequencer.next()) {
      await this.execute(trx);
    }
    pulse?.stop();

    this._log.info(`Finish tests. ${this.runs} transactions were run.`);
    const report = coverage.logReport({ bins: this._o.reportBins ?? true });
    const shortfall = model.accessShortfall(this._o.minRuns ?? 2);
    this._log.info(`Writes below minimum: ${JSON.stringify(shortfall.writes)}`);
    this._log.info(`Reads below minimum: ${JSON.stringify(shortfall.reads)}`);

    const result = scoreboard.result();
    const verdict: Verdict = {
      passed: result.passed,
      runs: this.runs,
      goalReached: this.goalReached(),
      mismatches: result.mismatches,
      coverage: report,
      shortfall,
    };
    if (verdict.passed) this._log.info("PASSED");
    else this._log.error(`FAILED with ${result.mismatches.length} mismatches`);
    return verdict;
  }

  private async execute(trx: Transaction): Promise<void> {
    const { model, scoreboard, resetDetector, driver } = this._o;
    if (trx.direction === "write") {
      model.recordWrite(trx.registerName, trx.data);
      resetDetector?.observe(trx);
      scoreboard.expect(this._channel, { direction: "write", address: trx.address, data: trx.data });
    } else {
      trx.expectedReadValue = model.recordRead(trx.registerName);
      scoreboard.expect(this._channel, {
        direction: "read",
        address: trx.address,
        data: trx.expectedReadValue ?? ANY,
      });
    }
    this._log.debug(formatTransaction(trx));
    this._inFlight = trx;
    await driver.send(trx);
    this._inFlight = undefined;
  }

  private onObservation(obs: SpiObservation): void {
    this._o.scoreboard.check(this._channel, obs);
    const trx = this._inFlight;
    if (trx) {
      this._o.coverage.sample(trx);
    } else {
      this._log.warn(`Observation with no transaction in flight at t=${obs.time}`);
    }
  }
}

export interface WatchdogBudget {
  /** Simulated-time bound. */
  maxTime?: number;
  /** Wall-clock bound in milliseconds. */
  maxWallMs?: number;
}

/**
 * Start `bench.run()` as a task of `sim` and step the simulation until it
 * settles.
 *
 * @throws WatchdogTimeoutError when a bound is exceeded first.
 */
export async function runTestBench<P>(
  sim: Simulation<P>,
  bench: TestBench,
  budget: WatchdogBudget = {},
): Promise<Verdict> {
  const task = sim.startSoon(() => bench.run(), "testbench");
  try {
    return await sim.runTask(task, budget);
  } catch (err) {
    if (err instanceof SimulationTimeoutError) {
      throw new WatchdogTimeoutError(err.message, err.time, bench.runs);
    }
    throw err;
  }
}
