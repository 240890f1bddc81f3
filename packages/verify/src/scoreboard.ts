/**
 * Expected-vs-observed comparison per channel, and reset detection.
 */

import { ScoreboardMismatchError, type Mismatch } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { RegisterModel } from "./register-model.js";
import type { Direction, Transaction } from "./transaction.js";

/** Don't-care marker for the data field of an expectation. */
export const ANY = Symbol.for("regbus:any");

export interface Expectation {
  readonly direction: Direction;
  readonly address: number;
  readonly data: number | typeof ANY;
}

export interface Observation {
  readonly direction: Direction;
  readonly address: number;
  readonly data: number;
  readonly chipAddress?: number;
}

/** Returns the reason of a mismatch, or `undefined` when the pair agrees. */
export type Comparator = (expected: Expectation, observed: Observation) => string | undefined;

export type ScoreboardMode = "fail-fast" | "accumulate";

export interface ScoreboardOptions {
  /** Default: `"accumulate"`. */
  mode?: ScoreboardMode;
  compare?: Comparator;
  logger?: Logger;
}

export interface ScoreboardResult {
  readonly passed: boolean;
  /** Observations compared against an expectation. */
  readonly checked: number;
  readonly mismatches: readonly Mismatch[];
}

const hex = (v: number): string => `0x${v.toString(16)}`;

export const defaultCompare: Comparator = (expected, observed) => {
  if (expected.direction !== observed.direction) {
    return `direction ${observed.direction}, expected ${expected.direction}`;
  }
  if (expected.address !== observed.address) {
    return `address ${hex(observed.address)}, expected ${hex(expected.address)}`;
  }
  if (expected.data !== ANY && expected.data !== observed.data) {
    return `data ${hex(observed.data)}, expected ${hex(expected.data)}`;
  }
  return undefined;
};

function describeExpectation(e: Expectation): NonNullable<Mismatch["expected"]> {
  return { direction: e.direction, address: e.address, data: e.data === ANY ? "any" : e.data };
}

export class Scoreboard {
  readonly mode: ScoreboardMode;
  private readonly _compare: Comparator;
  private readonly _log: Logger;
  private readonly _queues = new Map<string, Expectation[]>();
  private readonly _observed = new Map<string, number>();
  private readonly _mismatches: Mismatch[] = [];
  private _checked = 0;

  constructor(options: ScoreboardOptions = {}) {
    this.mode = options.mode ?? "accumulate";
    this._compare = options.compare ?? defaultCompare;
    this._log = options.logger ?? silentLogger;
  }

  /** Queue an expectation for the next observation on `channel`. */
  expect(channel: string, expectation: Expectation): void {
    const queue = this._queues.get(channel);
    if (queue) queue.push(expectation);
    else this._queues.set(channel, [expectation]);
  }

  pending(channel: string): number {
    return this._queues.get(channel)?.length ?? 0;
  }

  get mismatches(): readonly Mismatch[] {
    return this._mismatches;
  }

  /**
   * Compare `observed` with the oldest expectation on `channel`.
   *
   * @returns The mismatch, if any.
   * @throws ScoreboardMismatchError in fail-fast mode.
   */
  check(channel: string, observed: Observation): Mismatch | undefined {
    const index = (this._observed.get(channel) ?? 0) + 1;
    this._observed.set(channel, index);
    const expected = this._queues.get(channel)?.shift();
    const observedRecord = { direction: observed.direction, address: observed.address, data: observed.data };

    let mismatch: Mismatch | undefined;
    if (expected === undefined) {
      mismatch = { channel, index, observed: observedRecord, reason: "unexpected observation" };
    } else {
      this._checked++;
      const reason = this._compare(expected, observed);
      if (reason !== undefined) {
        mismatch = {
          channel,
          index,
          expected: describeExpectation(expected),
          observed: observedRecord,
          reason,
        };
      }
    }

    if (mismatch === undefined) {
      this._log.debug(`${channel} #${index}: ok`);
      return undefined;
    }
    this._mismatches.push(mismatch);
    this._log.error(`${channel} #${index}: ${mismatch.reason}`);
    if (this.mode === "fail-fast") {
      throw new ScoreboardMismatchError([mismatch]);
    }
    return mismatch;
  }

  /** Verdict so far. Expectations still queued count as failures. */
  result(): ScoreboardResult {
    const leftovers: Mismatch[] = [];
    for (const [channel, queue] of this._queues) {
      const seen = this._observed.get(channel) ?? 0;
      queue.forEach((expected, i) => {
        leftovers.push({
          channel,
          index: seen + i + 1,
          expected: describeExpectation(expected),
          reason: "expected transaction was never observed",
        });
      });
    }
    const mismatches = [...this._mismatches, ...leftovers];
    return { passed: mismatches.length === 0, checked: this._checked, mismatches };
  }

  /** @throws ScoreboardMismatchError unless `result()` passed. */
  assertPassed(): void {
    const { passed, mismatches } = this.result();
    if (!passed) throw new ScoreboardMismatchError(mismatches);
  }
}

// ---------------------------------------------------------------------------
// Reset detection
// ---------------------------------------------------------------------------

export interface ResetDetectorOptions {
  /** Address of the control register. */
  controlAddress: number;
  /** Data value that resets the device when written there. */
  resetCode: number;
  logger?: Logger;
}

/** Recognizes the reset write and invalidates the model's written values. */
export class ResetDetector {
  readonly controlAddress: number;
  readonly resetCode: number;
  private readonly _model: RegisterModel;
  private readonly _log: Logger;
  private _resets = 0;

  constructor(model: RegisterModel, options: ResetDetectorOptions) {
    this._model = model;
    this.controlAddress = options.controlAddress;
    this.resetCode = options.resetCode;
    this._log = options.logger ?? silentLogger;
  }

  get resets(): number {
    return this._resets;
  }

  isReset(trx: Pick<Transaction, "direction" | "address" | "data">): boolean {
    return trx.direction === "write" && trx.address === this.controlAddress && trx.data === this.resetCode;
  }

  /** Invalidate the model when `trx` is the reset write. Returns whether it was. */
  observe(trx: Pick<Transaction, "direction" | "address" | "data">): boolean {
    if (!this.isReset(trx)) return false;
    this._resets++;
    this._model.invalidate();
    this._log.info(`Reset detected at ${hex(this.controlAddress)}; register values invalidated`);
    return true;
  }
}
