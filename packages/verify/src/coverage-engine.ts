/**
 * CoverageEngine: owns the registry, samples every item in registration
 * order and produces status lines and final reports.
 */

import { CoverCross, CoverageRegistry, isStatusField, type CoverItem, type StatusValue } from "./coverage.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { Transaction } from "./transaction.js";

/**
 * Fields to log after every sample, per item. A field may be `name:key` to
 * pick one entry of an object-valued field, e.g. `coveredBins:register`.
 */
export type StatusReportConfig = Readonly<Record<string, string | readonly string[]>>;

export interface CoverageEngineOptions {
  logger?: Logger;
}

export interface BinReport {
  readonly bin: string;
  readonly hits: number;
  readonly covered: boolean;
}

export interface CoverItemReport {
  readonly name: string;
  readonly kind: "point" | "cross";
  readonly atLeast: number;
  readonly size: number;
  readonly coverage: number;
  readonly coverPercentage: number;
  /** Present when the report was built with `bins: true`. */
  readonly bins?: readonly BinReport[];
}

export interface CoverageReport {
  readonly items: readonly CoverItemReport[];
}

export class CoverageEngine {
  readonly registry = new CoverageRegistry();
  private readonly _log: Logger;
  private _status = new Map<string, string[]>();
  private _samples = 0;

  constructor(options: CoverageEngineOptions = {}) {
    this._log = options.logger ?? silentLogger;
  }

  /** Transactions sampled so far. */
  get samples(): number {
    return this._samples;
  }

  /**
   * Set the status report fields. Call after the items are defined:
   * unknown items and fields are dropped with a warning.
   */
  configureStatus(config: StatusReportConfig): void {
    const status = new Map<string, string[]>();
    for (const [itemName, value] of Object.entries(config)) {
      if (!this.registry.has(itemName)) {
        this._log.warn(`Wrong coverage item: ${itemName}.*`);
        continue;
      }
      const fields: string[] = [];
      for (const field of typeof value === "string" ? [value] : value) {
        const base = field.split(":")[0] ?? field;
        if (!isStatusField(base)) {
          this._log.warn(`Wrong coverage item field: ${itemName}.${base}`);
          continue;
        }
        fields.push(field);
      }
      status.set(itemName, fields);
    }
    this._status = status;
  }

  /** Effective status configuration after validation. */
  statusConfig(): Record<string, string[]> {
    return Object.fromEntries([...this._status].map(([name, fields]) => [name, [...fields]]));
  }

  /** Sample every registered item in order, then log the status fields. */
  sample(trx: Transaction): void {
    this._samples++;
    for (const item of this.registry.items()) {
      item.sample(trx);
    }
    for (const line of this.statusLines()) {
      this._log.info(line);
    }
  }

  /** Current values of the configured status fields, one line each. */
  statusLines(): string[] {
    const lines: string[] = [];
    for (const [itemName, fields] of this._status) {
      const item = this.registry.get(itemName);
      if (!item) continue;
      for (const field of fields) {
        lines.push(`${itemName}.${field} = ${formatStatusValue(statusValue(item, field))}`);
      }
    }
    return lines;
  }

  /** True when every named cross is at 100 %. An empty list is never complete. */
  isComplete(crosses: readonly string[]): boolean {
    return crosses.length > 0 && crosses.every((name) => this.registry.cross(name).coverPercentage === 100);
  }

  report(options: { bins?: boolean } = {}): CoverageReport {
    const withBins = options.bins ?? true;
    return {
      items: this.registry.items().map((item) => ({
        name: item.name,
        kind: item.kind,
        atLeast: item.atLeast,
        size: item.size,
        coverage: item.coverage,
        coverPercentage: item.coverPercentage,
        ...(withBins ? { bins: binReports(item) } : {}),
      })),
    };
  }

  /** Log the final report through the engine's logger. */
  logReport(options: { bins?: boolean } = {}): CoverageReport {
    const report = this.report(options);
    this._log.info("Coverage final results");
    for (const line of formatCoverageReport(report)) {
      this._log.info(line);
    }
    return report;
  }
}

function statusValue(item: CoverItem, field: string): StatusValue {
  const [base = field, key] = field.split(":");
  if (!isStatusField(base)) return "";
  const value = item.statusField(base);
  if (key !== undefined && typeof value === "object" && !Array.isArray(value)) {
    return lookup(value, key) ?? value;
  }
  return value;
}

function lookup(value: StatusValue, key: string): StatusValue | undefined {
  if (typeof value !== "object" || Array.isArray(value)) return undefined;
  return Object.entries(value).find(([k]) => k === key)?.[1];
}

export function formatStatusValue(value: StatusValue): string {
  if (typeof value === "number") {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}

function binReports(item: CoverItem): BinReport[] {
  if (item instanceof CoverCross) {
    return item.tuples().map(({ tuple, hits }) => ({
      bin: tuple.join(","),
      hits,
      covered: hits >= item.atLeast,
    }));
  }
  const detailed = item.statusField("detailedCoverage");
  if (typeof detailed !== "object" || Array.isArray(detailed)) return [];
  return Object.entries(detailed).map(([bin, hits]) => {
    const count = typeof hits === "number" ? hits : 0;
    return { bin, hits: count, covered: count >= item.atLeast };
  });
}

/**
 * Render a report as text lines:
 *
 * ```
 * access: 3/4 (75.00%)
 *   REG_A,read       2 covered
 *   REG_A,write      0
 * ```
 */
export function formatCoverageReport(report: CoverageReport): string[] {
  const lines: string[] = [];
  for (const item of report.items) {
    lines.push(`${item.name}: ${item.coverage}/${item.size} (${item.coverPercentage.toFixed(2)}%)`);
    for (const bin of item.bins ?? []) {
      const mark = bin.covered ? " covered" : "";
      lines.push(`  ${bin.bin.padEnd(16)} ${bin.hits}${mark}`);
    }
  }
  return lines;
}
