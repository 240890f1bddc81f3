/**
 * Verification-side shadow of the device's register file.
 */

import { TransactionError } from "./errors.js";
import {
  expandRegisterMap,
  type AccessMode,
  type RegisterDefinition,
  type RegisterMap,
} from "./register-map.js";
import type { Direction } from "./transaction.js";

export interface RegisterEntry {
  readonly name: string;
  readonly address: number;
  readonly bitWidth: number;
  readonly access: AccessMode;
  /** 2^bitWidth − 1 */
  readonly maxValue: number;
  readonly resetValue?: number;
  lastWrittenValue?: number;
  readonly accessHistory: Direction[];
}

export interface RegisterModelOptions {
  /** Reset values that are only known at run time (e.g. a chip id register). */
  resetOverrides?: Record<string, number>;
}

export interface AccessShortfall {
  /** Registers written fewer than `minRuns` times. */
  readonly writes: Record<string, number>;
  /** Registers read fewer than `minRuns` times. */
  readonly reads: Record<string, number>;
}

export class RegisterModel {
  private readonly _byName = new Map<string, RegisterEntry>();
  private readonly _byAddress = new Map<number, RegisterEntry>();

  constructor(definitions: readonly RegisterDefinition[], options: RegisterModelOptions = {}) {
    const overrides = options.resetOverrides ?? {};
    for (const def of definitions) {
      if (this._byName.has(def.name) || this._byAddress.has(def.address)) {
        throw new Error(`Duplicate register ${def.name} at address 0x${def.address.toString(16)}`);
      }
      const maxValue = 2 ** def.bitWidth - 1;
      const resetValue = overrides[def.name] ?? def.resetValue;
      if (resetValue !== undefined && (resetValue < 0 || resetValue > maxValue)) {
        throw new RangeError(`Reset value ${resetValue} of ${def.name} exceeds ${def.bitWidth} bits`);
      }
      const entry: RegisterEntry = {
        name: def.name,
        address: def.address,
        bitWidth: def.bitWidth,
        access: def.access,
        maxValue,
        resetValue,
        accessHistory: [],
      };
      this._byName.set(entry.name, entry);
      this._byAddress.set(entry.address, entry);
    }
    for (const name of Object.keys(overrides)) {
      if (!this._byName.has(name)) {
        throw new Error(`Reset override for unknown register '${name}'`);
      }
    }
  }

  static fromMap(map: RegisterMap, options?: RegisterModelOptions): RegisterModel {
    return new RegisterModel(expandRegisterMap(map), options);
  }

  /** Register names in declaration order. */
  names(): string[] {
    return [...this._byName.keys()];
  }

  entries(): RegisterEntry[] {
    return [...this._byName.values()];
  }

  get(name: string): RegisterEntry {
    const entry = this._byName.get(name);
    if (!entry) {
      throw new Error(`Unknown register '${name}'`);
    }
    return entry;
  }

  byAddress(address: number): RegisterEntry | undefined {
    return this._byAddress.get(address);
  }

  /** Record a write. Data must fit the register width. */
  recordWrite(name: string, data: number): void {
    const entry = this.get(name);
    if (!Number.isInteger(data) || data < 0 || data > entry.maxValue) {
      throw new TransactionError(
        `Write of ${data} to ${name} does not fit ${entry.bitWidth} bits (max ${entry.maxValue})`,
      );
    }
    entry.lastWrittenValue = data;
    entry.accessHistory.push("write");
  }

  /**
   * Record a read and return the predicted value: the last written value,
   * else the reset value, else `undefined` (state unknown).
   */
  recordRead(name: string): number | undefined {
    const entry = this.get(name);
    entry.accessHistory.push("read");
    return this.expectedRead(name);
  }

  expectedRead(name: string): number | undefined {
    const entry = this.get(name);
    return entry.lastWrittenValue ?? entry.resetValue;
  }

  /** Forget every written value; reads fall back to reset values. */
  invalidate(): void {
    for (const entry of this._byName.values()) {
      entry.lastWrittenValue = undefined;
    }
  }

  /** Registers that saw fewer than `minRuns` writes (writable ones only) or reads. */
  accessShortfall(minRuns: number): AccessShortfall {
    const writes: Record<string, number> = {};
    const reads: Record<string, number> = {};
    for (const entry of this._byName.values()) {
      const w = entry.accessHistory.filter((d) => d === "write").length;
      const r = entry.accessHistory.length - w;
      if (entry.access === "rw" && w < minRuns) writes[entry.name] = w;
      if (r < minRuns) reads[entry.name] = r;
    }
    return { writes, reads };
  }
}
