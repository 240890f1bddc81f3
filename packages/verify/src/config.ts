/**
 * Test bench settings taken from the environment.
 *
 *   REGBUS_SEED          PRNG seed (unsigned 32-bit)     default 1
 *   REGBUS_LOG_LEVEL     debug | info | warn | error | silent  default info
 *   REGBUS_MAX_RUNS      transaction limit               default 1000
 *   REGBUS_TIMEOUT_MS    wall-clock watchdog, optional
 *   REGBUS_MAX_SIM_TIME  simulated-time watchdog, optional
 */

import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import type { WatchdogBudget } from "./testbench.js";

export interface BenchConfig {
  readonly seed: number;
  readonly logLevel: LogLevel;
  readonly maxRuns: number;
  readonly timeoutMs?: number;
  readonly maxSimTime?: number;
}

export const DEFAULT_BENCH_CONFIG: BenchConfig = {
  seed: 1,
  logLevel: "info",
  maxRuns: 1000,
};

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, key: string, min: number, max: number): number | undefined {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(key, `expected a non-negative integer, got '${raw}'`);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigError(key, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

export function loadBenchConfig(env: Env = process.env): BenchConfig {
  const level = env.REGBUS_LOG_LEVEL?.trim().toLowerCase();
  if (level !== undefined && level !== "" && !isLogLevel(level)) {
    throw new ConfigError("REGBUS_LOG_LEVEL", `unknown level '${level}'`);
  }
  const timeoutMs = readInteger(env, "REGBUS_TIMEOUT_MS", 1, Number.MAX_SAFE_INTEGER);
  const maxSimTime = readInteger(env, "REGBUS_MAX_SIM_TIME", 1, Number.MAX_SAFE_INTEGER);
  return {
    seed: readInteger(env, "REGBUS_SEED", 0, 0xffff_ffff) ?? DEFAULT_BENCH_CONFIG.seed,
    logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_BENCH_CONFIG.logLevel,
    maxRuns: readInteger(env, "REGBUS_MAX_RUNS", 1, Number.MAX_SAFE_INTEGER) ?? DEFAULT_BENCH_CONFIG.maxRuns,
    ...(timeoutMs === undefined ? {} : { timeoutMs }),
    ...(maxSimTime === undefined ? {} : { maxSimTime }),
  };
}

/** Watchdog bounds for `runTestBench`, from the optional settings. */
export function watchdogBudget(config: BenchConfig): WatchdogBudget {
  return {
    ...(config.timeoutMs === undefined ? {} : { maxWallMs: config.timeoutMs }),
    ...(config.maxSimTime === undefined ? {} : { maxTime: config.maxSimTime }),
  };
}
