/**
 * Constrained-random stimulus.
 *
 * `StimulusGenerator.next()` solves register, then direction, then data
 * range class, and derives the wire fields from the result. `Sequencer`
 * pulls transactions from it until the caller's goal holds.
 */

import { solveVariable } from "./constraints.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { Random } from "./random.js";
import type { RegisterEntry, RegisterModel } from "./register-model.js";
import {
  DATA_RANGE_CLASSES,
  DIRECTIONS,
  checkTransaction,
  type DataRangeClass,
  type Direction,
  type Transaction,
} from "./transaction.js";

export interface StimulusOptions {
  random: Random;
  /** Weight of a register that is already fully covered. Default 1. */
  coveredWeight?: number;
  /** Weight of any other register. Default 10. */
  uncoveredWeight?: number;
}

/**
 * Data value for a write in the given range class.
 *
 * `mid` avoids the boundary values once the register has room for it.
 */
export function deriveData(rangeClass: DataRangeClass, maxValue: number, random: Random): number {
  switch (rangeClass) {
    case "min0":
      return 0;
    case "min1":
      return Math.min(1, maxValue);
    case "max0":
      return maxValue;
    case "max1":
      return Math.max(maxValue - 1, 0);
    case "mid":
      return maxValue < 4 ? random.randint(0, maxValue) : random.randint(2, maxValue - 2);
  }
}

export class StimulusGenerator {
  private readonly _random: Random;
  private readonly _coveredWeight: number;
  private readonly _uncoveredWeight: number;

  constructor(options: StimulusOptions) {
    this._random = options.random;
    this._coveredWeight = options.coveredWeight ?? 1;
    this._uncoveredWeight = options.uncoveredWeight ?? 10;
    if (this._coveredWeight < 0 || this._uncoveredWeight < 0) {
      throw new RangeError("Register weights must not be negative");
    }
  }

  /**
   * Produce one transaction over `model`.
   *
   * Registers in `alreadyCovered` are down-weighted, never excluded.
   * `expectedReadValue` is left for the caller to fill in.
   */
  next(model: RegisterModel, alreadyCovered: ReadonlySet<string> = new Set()): Transaction {
    const register: RegisterEntry = solveVariable(
      {
        name: "register",
        domain: model.entries(),
        weight: (entry) =>
          alreadyCovered.has(entry.name) ? this._coveredWeight : this._uncoveredWeight,
      },
      this._random,
    );

    const direction: Direction = solveVariable(
      {
        name: "direction",
        domain: DIRECTIONS,
        hard: [(dir) => register.access === "rw" || dir === "read"],
      },
      this._random,
    );

    const rangeClass: DataRangeClass = solveVariable(
      { name: "rangeClass", domain: DATA_RANGE_CLASSES },
      this._random,
    );

    const trx: Transaction = {
      registerName: register.name,
      address: register.address,
      data: direction === "write" ? deriveData(rangeClass, register.maxValue, this._random) : 0,
      direction,
      rangeClass,
    };
    checkTransaction(trx);
    return trx;
  }
}

// ---------------------------------------------------------------------------
// Sequencer
// ---------------------------------------------------------------------------

export interface SequencerOptions {
  generator: StimulusGenerator;
  model: RegisterModel;
  /** Checked before every transaction; `true` ends the sequence. */
  goal: (runs: number) => boolean;
  /** Registers to down-weight, re-evaluated on every pull. */
  covered?: () => ReadonlySet<string>;
  logger?: Logger;
}

/** Pull-based transaction sequence, bounded by the caller's goal. */
export class Sequencer {
  private readonly _options: SequencerOptions;
  private readonly _log: Logger;
  private _runs = 0;

  constructor(options: SequencerOptions) {
    this._options = options;
    this._log = options.logger ?? silentLogger;
  }

  /** Transactions handed out since construction or the last `restart()`. */
  get runs(): number {
    return this._runs;
  }

  next(): Transaction | undefined {
    const { generator, model, goal, covered } = this._options;
    if (goal(this._runs)) return undefined;
    this._log.info(`Test case # ${this._runs}`);
    const trx = generator.next(model, covered?.() ?? new Set());
    this._runs++;
    return trx;
  }

  restart(): void {
    this._runs = 0;
  }
}
