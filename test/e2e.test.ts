import { fileURLToPath } from "node:url";
import { describe, test, expect, afterEach } from "vitest";
import { Simulation } from "@regbus/sim";
import {
  CoverageEngine,
  PulseInjector,
  RegisterMapError,
  RegisterModel,
  ResetDetector,
  Scoreboard,
  SpiDriver,
  SpiMonitor,
  SpiRegisterDevice,
  StimulusGenerator,
  TestBench,
  chipIdValue,
  createLogger,
  createRandom,
  defineSpiCoverage,
  expandRegisterMap,
  loadBenchConfig,
  loadRegisterMap,
  runTestBench,
  spiPortSignals,
  spiSignalNames,
  watchdogBudget,
  type LogRecord,
  type SpiObservation,
} from "@regbus/verify";

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const CHIP_ADDRESS = 2;
const RESET = { controlAddress: 0x00, resetCode: 0xa5 };

describe("register bus end to end", () => {
  let sim: Simulation | undefined;

  afterEach(() => {
    sim?.dispose();
    sim = undefined;
  });

  test("covers a register map loaded from disk and passes", async () => {
    const config = loadBenchConfig({
      REGBUS_SEED: "12345",
      REGBUS_LOG_LEVEL: "warn",
      REGBUS_TIMEOUT_MS: "20000",
      REGBUS_MAX_SIM_TIME: "50000000",
    });
    const records: LogRecord[] = [];
    const logger = createLogger("e2e", { level: config.logLevel, sink: (r) => records.push(r) });

    const map = await loadRegisterMap(fixture("regs.json"));
    const registers = expandRegisterMap(map);
    const resetOverrides = { CHIP_ID: chipIdValue(3, CHIP_ADDRESS) };
    const model = RegisterModel.fromMap(map, { resetOverrides });

    const names = spiSignalNames(0);
    sim = Simulation.create({
      ...spiPortSignals(names),
      I_MCE: { direction: "input", type: "logic", width: 1, initial: 0 },
    });
    const spi = { chipAddress: CHIP_ADDRESS };
    const device = new SpiRegisterDevice(sim, spi, { registers, resetOverrides, reset: RESET });
    sim.startSoon(() => device.run(), "device");

    const random = createRandom(config.seed);
    const coverage = new CoverageEngine({ logger: logger.child("coverage") });
    const { goal } = defineSpiCoverage(coverage, model);
    const monitor = new SpiMonitor(sim, spi);
    const observed: SpiObservation[] = [];
    monitor.onObservation((o) => observed.push(o));
    const bench = new TestBench(sim, {
      model,
      generator: new StimulusGenerator({ random }),
      driver: new SpiDriver(sim, spi, { random, logger: logger.child("driver") }),
      monitor,
      scoreboard: new Scoreboard(),
      coverage,
      goal,
      maxRuns: config.maxRuns,
      resetDetector: new ResetDetector(model, RESET),
      pulse: new PulseInjector(sim, { signal: "I_MCE", random }),
      status: { access: ["coverPercentage"] },
      logger,
    });

    const verdict = await runTestBench(sim, bench, watchdogBudget(config));

    expect(verdict.passed).toBe(true);
    expect(verdict.goalReached).toBe(true);
    expect(verdict.runs).toBeLessThan(config.maxRuns);
    expect(records.filter((r) => r.level === "warn" || r.level === "error")).toEqual([]);
    expect(observed.every((o) => o.chipAddress === CHIP_ADDRESS)).toBe(true);
    expect(observed.some((o) => o.direction === "read" && o.address === 0x01 && o.data === 0x32)).toBe(true);
    expect(observed.some((o) => o.direction === "write" && o.address === 0x01)).toBe(false);
  });

  test("a register map that is not JSON is rejected", async () => {
    await expect(loadRegisterMap(fixture("broken.json"))).rejects.toThrow(RegisterMapError);
  });
});
