/**
 * Error types raised by the verification environment.
 *
 * Everything here is fatal for the current run except `ScoreboardMismatchError`
 * in accumulate mode, where mismatches are collected and reported at the end.
 */

import type { Direction } from "./transaction.js";

/** A transaction violates its field ranges, or constraints cannot be met. */
export class TransactionError extends Error {
  readonly transaction: unknown;

  constructor(message: string, transaction?: unknown) {
    super(message);
    this.name = "TransactionError";
    this.transaction = transaction;
  }
}

export type ProtocolViolation = "undefined-bit" | "chip-address-mismatch" | "status-error";

/** The bus did something the frame protocol forbids. */
export class ProtocolError extends Error {
  readonly kind: ProtocolViolation;
  /** Simulated time of detection. */
  readonly time: number;

  constructor(kind: ProtocolViolation, message: string, time: number) {
    super(`${message} (t=${time})`);
    this.name = "ProtocolError";
    this.kind = kind;
    this.time = time;
  }
}

/** One failed comparison recorded by the scoreboard. */
export interface Mismatch {
  readonly channel: string;
  /** 1-based index of the observation on its channel. */
  readonly index: number;
  readonly expected?: {
    readonly direction: Direction;
    readonly address: number;
    readonly data: number | "any";
  };
  readonly observed?: {
    readonly direction: Direction;
    readonly address: number;
    readonly data: number;
  };
  readonly reason: string;
}

/** Observed traffic disagreed with the model's prediction. */
export class ScoreboardMismatchError extends Error {
  readonly mismatches: readonly Mismatch[];

  constructor(mismatches: readonly Mismatch[]) {
    const first = mismatches[0];
    super(
      mismatches.length === 1 && first
        ? `Scoreboard mismatch on '${first.channel}' #${first.index}: ${first.reason}`
        : `Scoreboard recorded ${mismatches.length} mismatches`,
    );
    this.name = "ScoreboardMismatchError";
    this.mismatches = mismatches;
  }
}

/** The run did not complete within its simulated or wall-clock bound. */
export class WatchdogTimeoutError extends Error {
  readonly time: number;
  readonly runs: number;

  constructor(message: string, time: number, runs: number) {
    super(`did not complete within bound: ${message}`);
    this.name = "WatchdogTimeoutError";
    this.time = time;
    this.runs = runs;
  }
}

/** A register map failed validation or expansion. */
export class RegisterMapError extends Error {
  readonly details: readonly string[];

  constructor(message: string, details: readonly string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "RegisterMapError";
    this.details = details;
  }
}

/** An environment or options value is invalid. */
export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

/** A cover point or cross definition is inconsistent. */
export class CoverageError extends Error {
  readonly item: string;

  constructor(item: string, message: string) {
    super(`${item}: ${message}`);
    this.name = "CoverageError";
    this.item = item;
  }
}
