import { describe, test, expect, vi } from "vitest";
import { SignalStore, createDut, toFourState, widthMask } from "./dut.js";
import type { FourStateValue, SignalBus, SignalInfo } from "./types.js";
import { FourState, X, toBinString } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function storeBus(store: SignalStore): Pick<SignalBus, "readSignal" | "writeSignal"> {
  return {
    readSignal: vi.fn((name: string): FourStateValue => store.read(name)),
    writeSignal: vi.fn((name: string, value: Parameters<SignalBus["writeSignal"]>[1]) => {
      store.write(name, value);
    }),
  };
}

const SIGNALS: Record<string, SignalInfo> = {
  clk:  { direction: "input", type: "clock", width: 1 },
  a:    { direction: "input", type: "logic", width: 8, initial: 0 },
  wide: { direction: "input", type: "logic", width: 32, initial: 0 },
  y:    { direction: "output", type: "logic", width: 4 },
};

// ---------------------------------------------------------------------------
// Value normalization
// ---------------------------------------------------------------------------

describe("toFourState", () => {
  test("masks numbers to the signal width", () => {
    expect(toFourState(0x1ff, 8)).toEqual(FourState(0xff, 0));
  });

  test("X becomes an all-ones mask", () => {
    expect(toFourState(X, 4)).toEqual(FourState(0, 0xf));
  });

  test("bigint values are truncated to the width", () => {
    expect(toFourState(0x1_0000_0005n, 32)).toEqual(FourState(5, 0));
  });

  test("partial X keeps defined bits and clears value bits under the mask", () => {
    expect(toFourState(FourState(0b1111, 0b0101), 4)).toEqual(FourState(0b1010, 0b0101));
  });

  test("negative or fractional numbers are rejected", () => {
    expect(() => toFourState(-1, 8)).toThrow(RangeError);
    expect(() => toFourState(1.5, 8)).toThrow(RangeError);
  });

  test("widthMask covers 32 bits", () => {
    expect(widthMask(32)).toBe(0xffff_ffff);
    expect(widthMask(1)).toBe(1);
  });

  test("toBinString renders MSB first with x for unresolved bits", () => {
    expect(toBinString(FourState(0b1010, 0b0001), 4)).toBe("101x");
  });
});

// ---------------------------------------------------------------------------
// Signal store
// ---------------------------------------------------------------------------

describe("SignalStore", () => {
  test("initial values default to X", () => {
    const store = new SignalStore(SIGNALS);
    expect(store.read("y")).toEqual(FourState(0, 0xf));
    expect(store.read("a")).toEqual(FourState(0, 0));
  });

  test("write reports the change and ignores repeated values", () => {
    const store = new SignalStore(SIGNALS);
    expect(store.write("a", 7)).toEqual({ previous: FourState(0, 0), next: FourState(7, 0) });
    expect(store.write("a", 7)).toBeUndefined();
  });

  test("32-bit signals keep the full unsigned range", () => {
    const store = new SignalStore(SIGNALS);
    store.write("wide", 0xffff_ffff);
    expect(store.read("wide").value).toBe(0xffff_ffff);
  });

  test("unsupported widths are rejected", () => {
    expect(
      () => new SignalStore({ big: { direction: "input", type: "logic", width: 33 } }),
    ).toThrow("unsupported width 33");
  });

  test("unknown names list the available signals", () => {
    const store = new SignalStore(SIGNALS);
    expect(() => store.read("nope")).toThrow("Available: clk, a, wide, y");
  });
});

// ---------------------------------------------------------------------------
// DUT accessor
// ---------------------------------------------------------------------------

describe("createDut", () => {
  test("reads and writes route through the bus", () => {
    const store = new SignalStore(SIGNALS);
    const bus = storeBus(store);
    const dut = createDut<{ a: number | typeof X }>(bus, SIGNALS);

    dut.a = 42;
    expect(bus.writeSignal).toHaveBeenCalledWith("a", 42);
    expect(dut.a).toBe(42);
  });

  test("clock signals are not exposed", () => {
    const store = new SignalStore(SIGNALS);
    const dut = createDut<Record<string, unknown>>(storeBus(store), SIGNALS);
    expect(Object.keys(dut)).toEqual(["a", "wide", "y"]);
  });

  test("partially undefined values read as X", () => {
    const store = new SignalStore(SIGNALS);
    const dut = createDut<{ a: number | typeof X }>(storeBus(store), SIGNALS);
    store.write("a", FourState(1, 2));
    expect(dut.a).toBe(X);
  });
});
