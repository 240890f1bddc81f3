/**
 * Signal storage and the DUT (Device Under Test) accessor factory.
 *
 * `SignalStore` keeps one 4-state value per named signal, masked to the
 * declared width. `createDut()` builds a plain object with
 * Object.defineProperty getter/setters that route through a `SignalBus`,
 * so writes made through the accessor wake edge waiters exactly like
 * `writeSignal()` does.
 */

import type { FourStateValue, SignalBus, SignalInfo, SignalInput } from "./types.js";
import { FourState, X, isFourStateValue } from "./types.js";

// ---------------------------------------------------------------------------
// Value helpers
// ---------------------------------------------------------------------------

/** All-ones mask for the given bit width (1..32). */
export function widthMask(width: number): number {
  return width >= 32 ? 0xffff_ffff : ((1 << width) - 1) >>> 0;
}

/** Normalize any accepted input into a width-masked 4-state value. */
export function toFourState(value: SignalInput, width: number): FourStateValue {
  const mask = widthMask(width);
  if (value === X) {
    return FourState(0, mask);
  }
  if (isFourStateValue(value)) {
    return FourState(value.value & mask & ~value.mask, value.mask & mask);
  }
  if (typeof value === "bigint") {
    return FourState(Number(BigInt.asUintN(width, value)), 0);
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`Signal value must be a non-negative integer, got ${value}`);
  }
  return FourState(value & mask, 0);
}

// ---------------------------------------------------------------------------
// Signal store
// ---------------------------------------------------------------------------

/** Result of a store write that changed the stored value. */
export interface SignalChange {
  readonly previous: FourStateValue;
  readonly next: FourStateValue;
}

export class SignalStore {
  private readonly _values = new Map<string, FourStateValue>();
  private readonly _signals: Record<string, SignalInfo>;

  constructor(signals: Record<string, SignalInfo>) {
    this._signals = signals;
    for (const [name, info] of Object.entries(signals)) {
      if (!Number.isInteger(info.width) || info.width < 1 || info.width > 32) {
        throw new RangeError(`Signal '${name}' has unsupported width ${info.width}`);
      }
      this._values.set(name, toFourState(info.initial ?? X, info.width));
    }
  }

  info(name: string): SignalInfo {
    const info = this._signals[name];
    if (!info) {
      throw new Error(
        `Unknown signal '${name}'. Available: ${Object.keys(this._signals).join(", ")}`,
      );
    }
    return info;
  }

  read(name: string): FourStateValue {
    const value = this._values.get(name);
    if (value === undefined) {
      // info() throws with the list of known names
      this.info(name);
      throw new Error(`Signal '${name}' has no value`);
    }
    return value;
  }

  /** Store a new value. Returns the change, or `undefined` when nothing changed. */
  write(name: string, value: SignalInput): SignalChange | undefined {
    const info = this.info(name);
    const next = toFourState(value, info.width);
    const previous = this.read(name);
    if (previous.value === next.value && previous.mask === next.mask) {
      return undefined;
    }
    this._values.set(name, next);
    return { previous, next };
  }

  names(): string[] {
    return Object.keys(this._signals);
  }
}

// ---------------------------------------------------------------------------
// DUT factory
// ---------------------------------------------------------------------------

/**
 * Create a DUT accessor object with defineProperty-based getters/setters.
 *
 * Getters return the numeric value when every bit is defined and `X`
 * otherwise. Clock signals are skipped: they are driven by `addClock()`.
 *
 * @param bus      Bus the accessors read from and write through
 * @param signals  Signal metadata, keyed by signal name
 */
export function createDut<P>(
  bus: Pick<SignalBus, "readSignal" | "writeSignal">,
  signals: Record<string, SignalInfo>,
): P {
  const obj = Object.create(null) as P;

  for (const [name, info] of Object.entries(signals)) {
    if (info.type === "clock") continue;
    defineSignalProperty(obj as object, name, info, bus);
  }

  return obj;
}

/** Define a single signal property on the target object. */
function defineSignalProperty(
  target: object,
  name: string,
  info: SignalInfo,
  bus: Pick<SignalBus, "readSignal" | "writeSignal">,
): void {
  const isOutput = info.direction === "output";

  Object.defineProperty(target, name, {
    get(): number | typeof X {
      const v = bus.readSignal(name);
      return v.mask === 0 ? v.value : X;
    },

    set(value: SignalInput) {
      if (isOutput) {
        throw new Error(`Cannot write to output signal '${name}'`);
      }
      bus.writeSignal(name, value);
    },

    enumerable: true,
    configurable: false,
  });
}
