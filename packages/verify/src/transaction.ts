/**
 * Register-bus transaction record.
 *
 * A fixed set of fields; `transactionField()` gives named access for
 * reports and coverage definitions.
 */

import { TransactionError } from "./errors.js";

export type Direction = "read" | "write";

export const DIRECTIONS: readonly Direction[] = ["read", "write"];

/** Which part of a register's value range a write targets. */
export type DataRangeClass = "min0" | "min1" | "mid" | "max0" | "max1";

export const DATA_RANGE_CLASSES: readonly DataRangeClass[] = ["min0", "min1", "mid", "max0", "max1"];

export interface Transaction {
  readonly registerName: string;
  /** 8-bit register address. */
  readonly address: number;
  /** 16-bit data; 0 on reads. */
  readonly data: number;
  readonly direction: Direction;
  readonly rangeClass: DataRangeClass;
  /** Model prediction for reads, filled in just before transmission. */
  expectedReadValue?: number;
}

export type TransactionField = keyof Transaction;

export function transactionField<K extends TransactionField>(
  trx: Transaction,
  field: K,
): Transaction[K] {
  return trx[field];
}

/**
 * Throw `TransactionError` when a transaction cannot be put on the wire:
 * address outside 8 bits, data outside 16 bits, or an unknown direction.
 */
export function checkTransaction(trx: Transaction): void {
  const fail = (what: string): never => {
    throw new TransactionError(`Malformed transaction (${what}): ${formatTransaction(trx)}`, trx);
  };
  if (trx.direction !== "read" && trx.direction !== "write") fail("direction");
  if (!Number.isInteger(trx.address) || trx.address < 0 || trx.address > 0xff) fail("address");
  if (!Number.isInteger(trx.data) || trx.data < 0 || trx.data > 0xffff) fail("data");
  if (!DATA_RANGE_CLASSES.includes(trx.rangeClass)) fail("range class");
}

const hex = (v: number, digits: number): string => `0x${v.toString(16).padStart(digits, "0")}`;

export function formatTransaction(trx: Transaction): string {
  const expected =
    trx.expectedReadValue === undefined ? "" : ` expected=${hex(trx.expectedReadValue, 4)}`;
  return (
    `${trx.direction.toUpperCase()} ${trx.registerName}@${hex(trx.address, 2)} ` +
    `data=${hex(trx.data, 4)} range=${trx.rangeClass}${expected}`
  );
}
