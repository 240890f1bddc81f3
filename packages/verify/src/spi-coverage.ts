/**
 * Standard coverage model of the register bus.
 *
 * Points: `register`, `direction`, `range` (writes only).
 * Crosses:
 *   - `access`      register × direction, writes to read-only registers ignored
 *   - `write_range` register × range, read-only registers ignored
 *
 * Only write combinations are ever ignored: a read of any register,
 * read-only or not, is expected to be covered.
 */

import { CoverCross, CoverPoint, fieldEquals, type IgnorePattern } from "./coverage.js";
import type { CoverageEngine } from "./coverage-engine.js";
import type { RegisterModel } from "./register-model.js";
import { DATA_RANGE_CLASSES, DIRECTIONS } from "./transaction.js";

export interface SpiCoverageOptions {
  /** Hits per bin / tuple. Default 1. */
  atLeast?: number;
}

export interface SpiCoverage {
  readonly register: CoverPoint;
  readonly direction: CoverPoint;
  readonly range: CoverPoint;
  readonly access: CoverCross;
  readonly writeRange: CoverCross;
  /** Crosses whose completion ends the run. */
  readonly goal: readonly string[];
}

export function defineSpiCoverage(
  engine: CoverageEngine,
  model: RegisterModel,
  options: SpiCoverageOptions = {},
): SpiCoverage {
  const { registry } = engine;
  const atLeast = options.atLeast ?? 1;
  const readOnly = model.entries().filter((e) => e.access === "ro").map((e) => e.name);

  const register = new CoverPoint("register", {
    bins: model.names(),
    relevance: fieldEquals("registerName"),
    atLeast,
    registry,
  });
  const direction = new CoverPoint("direction", {
    bins: DIRECTIONS,
    relevance: fieldEquals("direction"),
    atLeast,
    registry,
  });
  const range = new CoverPoint("range", {
    bins: DATA_RANGE_CLASSES,
    relevance: (trx, bin) => trx.direction === "write" && trx.rangeClass === bin,
    atLeast,
    registry,
  });

  const access = new CoverCross("access", {
    items: ["register", "direction"],
    ignoreBins: readOnly.map((name): IgnorePattern => [name, "write"]),
    atLeast,
    registry,
  });
  const writeRange = new CoverCross("write_range", {
    items: ["register", "range"],
    ignoreBins: readOnly.map((name): IgnorePattern => [name, null]),
    atLeast,
    registry,
  });

  return { register, direction, range, access, writeRange, goal: ["access", "write_range"] };
}
