import { describe, test, expect } from "vitest";
import fc from "fast-check";
import { RegisterMapError, TransactionError } from "./errors.js";
import { chipIdValue, expandRegisterMap, parseRegisterMap, type RegisterMap } from "./register-map.js";
import { RegisterModel } from "./register-model.js";
import { ResetDetector } from "./scoreboard.js";

const MAP: RegisterMap = {
  CTRL: { address: 0x00, bitWidth: 8, access: "rw", resetValue: 0 },
  CHIP_ID: { address: 0x01, bitWidth: 8, access: "ro" },
  GAIN: { address: 0x02, bitWidth: 4, access: "rw" },
  BIAS: { address: 0x10, bitWidth: 10, access: "rw", count: 3, resetValue: 0x200 },
  RES: { address: 0x20, bitWidth: 12, access: "ro", count: 6, groupWidths: [12, 9, 9] },
};

describe("register map", () => {
  test("expands arrays and grouped arrays in map order", () => {
    const defs = expandRegisterMap(MAP);
    expect(defs.map((d) => d.name)).toEqual([
      "CTRL", "CHIP_ID", "GAIN",
      "BIAS_0", "BIAS_1", "BIAS_2",
      "RES_0_0", "RES_0_1", "RES_0_2", "RES_1_0", "RES_1_1", "RES_1_2",
    ]);
    expect(defs.filter((d) => d.name.startsWith("BIAS")).map((d) => [d.address, d.resetValue])).toEqual([
      [0x10, 0x200], [0x11, 0x200], [0x12, 0x200],
    ]);
    expect(defs.filter((d) => d.name.startsWith("RES")).map((d) => [d.address, d.bitWidth])).toEqual([
      [0x20, 12], [0x21, 9], [0x22, 9], [0x23, 12], [0x24, 9], [0x25, 9],
    ]);
  });

  test("reports address clashes", () => {
    expect(() =>
      expandRegisterMap({
        A: { address: 1, bitWidth: 8, access: "rw" },
        B: { address: 0, bitWidth: 8, access: "rw", count: 2 },
      }),
    ).toThrow("Invalid register map: B_1 reuses address 0x1 of A");
  });

  test("rejects a group count that does not divide the array", () => {
    expect(() =>
      expandRegisterMap({ R: { address: 0, bitWidth: 9, access: "ro", count: 4, groupWidths: [12, 9, 9] } }),
    ).toThrow("R count 4 is not a multiple of its group size 3");
  });

  test("schema validation lists every problem", () => {
    let caught: unknown;
    try {
      parseRegisterMap({ A: { address: 300, bitWidth: 4, access: "rw" }, B: { bitWidth: 4, access: "wo" } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RegisterMapError);
    const details = caught instanceof RegisterMapError ? caught.details : [];
    expect(details).toContain("/A/address must be <= 255");
    expect(details).toContain("/B must have required property 'address'");
    expect(details).toContain("/B/access must be equal to one of the allowed values");
  });

  test("accepts a valid map unchanged", () => {
    expect(parseRegisterMap(JSON.parse(JSON.stringify(MAP)))).toEqual(MAP);
  });

  test("chip id register value", () => {
    expect(chipIdValue(3, 0)).toBe(0x30);
    expect(chipIdValue(3, 5)).toBe(0x35);
  });
});

describe("RegisterModel", () => {
  const model = (): RegisterModel => RegisterModel.fromMap(MAP, { resetOverrides: { CHIP_ID: chipIdValue(3, 0) } });

  test("derives max values and applies reset overrides", () => {
    const m = model();
    expect(m.get("GAIN").maxValue).toBe(15);
    expect(m.get("RES_0_0").maxValue).toBe(4095);
    expect(m.expectedRead("CHIP_ID")).toBe(0x30);
    expect(m.expectedRead("GAIN")).toBeUndefined();
    expect(m.byAddress(0x11)?.name).toBe("BIAS_1");
  });

  test("rejects writes that do not fit the register", () => {
    expect(() => model().recordWrite("GAIN", 16)).toThrow(TransactionError);
  });

  test("unknown reset override is an error", () => {
    expect(() => RegisterModel.fromMap(MAP, { resetOverrides: { NOPE: 1 } })).toThrow(
      "Reset override for unknown register 'NOPE'",
    );
  });

  test("a read returns the last value written to that register", () => {
    const names = ["CTRL", "GAIN", "BIAS_0", "BIAS_1", "BIAS_2"];
    const write = fc.record({
      name: fc.constantFrom(...names),
      data: fc.integer({ min: 0, max: 15 }),
    });
    fc.assert(
      fc.property(fc.array(write, { minLength: 1, maxLength: 30 }), fc.constantFrom(...names), (writes, target) => {
        const m = model();
        for (const w of writes) m.recordWrite(w.name, w.data);
        const last = writes.filter((w) => w.name === target).at(-1);
        expect(m.recordRead(target)).toBe(last?.data ?? m.get(target).resetValue);
      }),
    );
  });

  test("a reset write clears every written value", () => {
    const m = model();
    const detector = new ResetDetector(m, { controlAddress: 0x00, resetCode: 0xa5 });
    m.recordWrite("GAIN", 7);
    m.recordWrite("BIAS_2", 0x3ff);

    const reset = { direction: "write" as const, address: 0x00, data: 0xa5 };
    m.recordWrite("CTRL", reset.data);
    expect(detector.observe(reset)).toBe(true);

    expect(m.recordRead("GAIN")).toBeUndefined();
    expect(m.recordRead("BIAS_2")).toBe(0x200);
    expect(m.recordRead("CTRL")).toBe(0);
    expect(m.recordRead("CHIP_ID")).toBe(0x30);
    expect(detector.resets).toBe(1);
  });

  test("other control writes are not a reset", () => {
    const m = model();
    const detector = new ResetDetector(m, { controlAddress: 0x00, resetCode: 0xa5 });
    m.recordWrite("GAIN", 7);
    expect(detector.observe({ direction: "write", address: 0x00, data: 0x5a })).toBe(false);
    expect(detector.observe({ direction: "read", address: 0x00, data: 0xa5 })).toBe(false);
    expect(m.expectedRead("GAIN")).toBe(7);
  });

  test("access shortfall lists under-exercised registers", () => {
    const m = new RegisterModel([
      { name: "A", address: 0, bitWidth: 8, access: "rw" },
      { name: "B", address: 1, bitWidth: 8, access: "ro" },
    ]);
    m.recordWrite("A", 1);
    m.recordWrite("A", 2);
    m.recordRead("A");
    m.recordRead("B");
    m.recordRead("B");
    expect(m.accessShortfall(2)).toEqual({ writes: {}, reads: { A: 1 } });
    expect(m.get("A").accessHistory).toEqual(["write", "write", "read"]);
  });
});
