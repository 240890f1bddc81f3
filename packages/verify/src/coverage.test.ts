import { describe, test, expect } from "vitest";
import fc from "fast-check";
import { CoverCross, CoverPoint, CoverageRegistry, fieldEquals, type Bin } from "./coverage.js";
import { CoverageEngine, formatCoverageReport, formatStatusValue } from "./coverage-engine.js";
import { CoverageError } from "./errors.js";
import { createLogger, type LogRecord } from "./logger.js";
import type { DataRangeClass, Direction, Transaction } from "./transaction.js";

function trx(registerName: string, direction: Direction, rangeClass: DataRangeClass = "min0"): Transaction {
  return { registerName, address: 0, data: 0, direction, rangeClass };
}

function accessModel(registry: CoverageRegistry, regs: readonly string[], atLeast = 1): void {
  new CoverPoint("register", { bins: regs, relevance: fieldEquals("registerName"), atLeast, registry });
  new CoverPoint("direction", { bins: ["read", "write"], relevance: fieldEquals("direction"), atLeast, registry });
}

describe("CoverPoint", () => {
  test("a bin is covered once, when it reaches atLeast", () => {
    const registry = new CoverageRegistry();
    const point = new CoverPoint("register", {
      bins: ["A", "B"],
      relevance: fieldEquals("registerName"),
      atLeast: 2,
      registry,
    });

    point.sample(trx("A", "read"));
    expect(point.coveredBins).toEqual([]);
    point.sample(trx("A", "write"));
    expect(point.coveredBins).toEqual(["A"]);
    point.sample(trx("A", "read"));
    expect(point.coveredBins).toEqual(["A"]);
    expect(point.hits("A")).toBe(3);
    expect(point.newHits).toEqual(["A"]);
    expect(point.coverPercentage).toBe(50);

    point.sample(trx("C", "read"));
    expect(point.newHits).toEqual([]);
  });

  test("rejects bad definitions", () => {
    const registry = new CoverageRegistry();
    expect(() => new CoverPoint("p", { bins: [], relevance: () => true, registry })).toThrow(
      "p: a cover point needs at least one bin",
    );
    expect(() => new CoverPoint("p", { bins: ["a"], relevance: () => true, atLeast: 0, registry })).toThrow(
      CoverageError,
    );
  });

  test("names are unique per registry, not per process", () => {
    const first = new CoverageRegistry();
    new CoverPoint("register", { bins: ["A"], relevance: () => true, registry: first });
    expect(() => new CoverPoint("register", { bins: ["A"], relevance: () => true, registry: first })).toThrow(
      "register: a cover item with this name is already registered",
    );
    const second = new CoverageRegistry();
    expect(() => new CoverPoint("register", { bins: ["A"], relevance: () => true, registry: second })).not.toThrow();
  });
});

describe("CoverCross", () => {
  test("initial descendant counts skip ignored tuples", () => {
    const registry = new CoverageRegistry();
    accessModel(registry, ["A", "B", "R"]);
    const cross = new CoverCross("access", {
      items: ["register", "direction"],
      ignoreBins: [["R", "write"]],
      registry,
    });

    expect(cross.size).toBe(5);
    expect(cross.descendantCount("register", "A")).toBe(2);
    expect(cross.descendantCount("register", "R")).toBe(1);
    expect(cross.descendantCount("direction", "read")).toBe(3);
    expect(cross.descendantCount("direction", "write")).toBe(2);
  });

  test("covers a dimension bin when its last tuple reaches the threshold", () => {
    const registry = new CoverageRegistry();
    accessModel(registry, ["A", "B", "R"]);
    const cross = new CoverCross("access", {
      items: ["register", "direction"],
      ignoreBins: [["R", "write"]],
      registry,
    });

    cross.sample(trx("R", "read"));
    expect(cross.coveredBins("register")).toEqual(["R"]);
    expect(cross.coveredBins("direction")).toEqual([]);
    expect(cross.descendantCount("direction", "read")).toBe(2);
    expect(cross.coverPercentage).toBe(20);

    cross.sample(trx("R", "write"));
    expect(cross.newHits).toEqual([]);
    expect(cross.coverage).toBe(1);

    cross.sample(trx("A", "read"));
    cross.sample(trx("B", "read"));
    expect(cross.coveredBins("direction")).toEqual(["read"]);
    expect(cross.binSettled("register", "A")).toBe(false);

    cross.sample(trx("A", "write"));
    cross.sample(trx("B", "write"));
    expect(cross.coveredBins("register")).toEqual(["R", "A", "B"]);
    expect(cross.coveredBins("direction")).toEqual(["read", "write"]);
    expect(cross.coverPercentage).toBe(100);
  });

  test("null in an ignore pattern matches any bin", () => {
    const registry = new CoverageRegistry();
    accessModel(registry, ["A", "R"]);
    const cross = new CoverCross("access", { items: ["register", "direction"], ignoreBins: [["R", null]], registry });
    expect(cross.size).toBe(2);
    expect(cross.isIgnored(["R", "read"])).toBe(true);
    expect(cross.binSettled("register", "R")).toBe(true);
  });

  test("a cross with every tuple ignored is complete", () => {
    const registry = new CoverageRegistry();
    accessModel(registry, ["A"]);
    const cross = new CoverCross("access", { items: ["register", "direction"], ignoreBins: [[null, null]], registry });
    expect(cross.size).toBe(0);
    expect(cross.coverPercentage).toBe(100);
  });

  test("rejects unknown points and malformed ignore patterns", () => {
    const registry = new CoverageRegistry();
    accessModel(registry, ["A"]);
    expect(() => new CoverCross("x", { items: ["register", "nope"], registry })).toThrow("nope: no such cover point");
    expect(() => new CoverCross("y", { items: ["register", "direction"], ignoreBins: [["A"]], registry })).toThrow(
      'y: ignore pattern ["A"] has 1 entries, expected 2',
    );
    expect(() => new CoverCross("z", { items: ["register"], registry })).toThrow("at least two cover points");
  });

  test("descendant counts track uncovered tuples and covered bins only grow", () => {
    const regs = ["A", "B", "C", "R"];
    const sampleArb = fc.record({
      reg: fc.constantFrom(...regs),
      dir: fc.constantFrom<Direction>("read", "write"),
    });
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 3 }), fc.array(sampleArb, { maxLength: 60 }), (atLeast, samples) => {
        const registry = new CoverageRegistry();
        accessModel(registry, regs, atLeast);
        const cross = new CoverCross("access", {
          items: ["register", "direction"],
          ignoreBins: [["R", "write"]],
          atLeast,
          registry,
        });
        const point = registry.point("register");
        let prevRegs: readonly Bin[] = [];
        let prevPoint: readonly Bin[] = [];

        for (const s of samples) {
          const t = trx(s.reg, s.dir);
          point.sample(t);
          cross.sample(t);

          const open = cross.tuples().filter((x) => x.hits < atLeast);
          for (const reg of regs) {
            expect(cross.descendantCount("register", reg)).toBe(open.filter((x) => x.tuple[0] === reg).length);
          }
          for (const dir of ["read", "write"]) {
            expect(cross.descendantCount("direction", dir)).toBe(open.filter((x) => x.tuple[1] === dir).length);
          }

          const nowRegs = cross.coveredBins("register");
          expect(nowRegs.slice(0, prevRegs.length)).toEqual(prevRegs);
          prevRegs = [...nowRegs];
          expect(point.coveredBins.slice(0, prevPoint.length)).toEqual(prevPoint);
          prevPoint = [...point.coveredBins];
        }
      }),
    );
  });
});

describe("CoverageEngine", () => {
  function engineWithAccess(): { engine: CoverageEngine; records: LogRecord[] } {
    const records: LogRecord[] = [];
    const engine = new CoverageEngine({
      logger: createLogger("coverage", { level: "debug", sink: (r) => records.push(r) }),
    });
    accessModel(engine.registry, ["A", "B"]);
    new CoverCross("access", { items: ["register", "direction"], registry: engine.registry });
    return { engine, records };
  }

  test("drops unknown status items and fields with a warning", () => {
    const { engine, records } = engineWithAccess();
    engine.configureStatus({
      register: ["coverPercentage", "bogus", "coveredBins"],
      missing: "size",
      access: "coveredBins:register",
    });

    expect(records.filter((r) => r.level === "warn").map((r) => r.message)).toEqual([
      "Wrong coverage item field: register.bogus",
      "Wrong coverage item: missing.*",
    ]);
    expect(engine.statusConfig()).toEqual({
      register: ["coverPercentage", "coveredBins"],
      access: ["coveredBins:register"],
    });
  });

  test("logs the configured fields after every sample", () => {
    const { engine, records } = engineWithAccess();
    engine.configureStatus({ register: ["coverPercentage", "coveredBins"], access: "coveredBins:register" });

    engine.sample(trx("A", "read"));
    expect(records.map((r) => r.message)).toEqual([
      "register.coverPercentage = 50",
      'register.coveredBins = ["A"]',
      "access.coveredBins:register = []",
    ]);

    records.length = 0;
    engine.sample(trx("A", "write"));
    expect(records.map((r) => r.message)).toEqual([
      "register.coverPercentage = 50",
      'register.coveredBins = ["A"]',
      'access.coveredBins:register = ["A"]',
    ]);
    expect(engine.samples).toBe(2);
  });

  test("reports and formats every item in registration order", () => {
    const { engine } = engineWithAccess();
    engine.sample(trx("A", "read"));
    engine.sample(trx("A", "write"));

    const report = engine.report({ bins: false });
    expect(report.items.map((i) => i.name)).toEqual(["register", "direction", "access"]);
    expect(report.items[0]).toEqual({
      name: "register",
      kind: "point",
      atLeast: 1,
      size: 2,
      coverage: 1,
      coverPercentage: 50,
    });

    const lines = formatCoverageReport(engine.report());
    expect(lines[0]).toBe("register: 1/2 (50.00%)");
    expect(lines).toContain("direction: 2/2 (100.00%)");
    expect(lines).toContain("access: 2/4 (50.00%)");
    expect(lines).toContain(`  ${"A,write".padEnd(16)} 1 covered`);
    expect(lines).toContain(`  ${"B,write".padEnd(16)} 0`);
  });

  test("goal completion needs every named cross at 100 %", () => {
    const { engine } = engineWithAccess();
    expect(engine.isComplete([])).toBe(false);
    for (const reg of ["A", "B"]) {
      engine.sample(trx(reg, "read"));
      engine.sample(trx(reg, "write"));
    }
    expect(engine.isComplete(["access"])).toBe(true);
    expect(() => engine.isComplete(["register"])).toThrow("register: is not a cover cross");
  });

  test("weight is a status field", () => {
    const records: LogRecord[] = [];
    const engine = new CoverageEngine({
      logger: createLogger("coverage", { sink: (r) => records.push(r) }),
    });
    new CoverPoint("register", { bins: ["A"], relevance: fieldEquals("registerName"), weight: 3, registry: engine.registry });
    engine.configureStatus({ register: ["weight", "atLeast"] });
    engine.sample(trx("A", "read"));

    expect(records.map((r) => r.message)).toEqual(["register.weight = 3", "register.atLeast = 1"]);
    expect(() =>
      new CoverPoint("p", { bins: ["a"], relevance: () => true, weight: 0, registry: engine.registry }),
    ).toThrow("p: weight must be a positive number, got 0");
  });

  test("formats fractional percentages with two decimals", () => {
    expect(formatStatusValue(100 / 3)).toBe("33.33");
    expect(formatStatusValue(7)).toBe("7");
    expect(formatStatusValue({ a: [1, 2] })).toBe('{"a":[1,2]}');
  });
});
