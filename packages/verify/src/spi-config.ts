/**
 * SPI bus configuration shared by the driver, the monitor and the device
 * model. Times are in simulation time units (1 unit = 1 ns).
 */

import type { SignalInfo } from "@regbus/sim";
import { X } from "@regbus/sim";

export interface SpiSignalNames {
  readonly sclk: string;
  readonly csN: string;
  readonly mosi: string;
  readonly miso: string;
}

export interface SpiConfig {
  /** Port index; selects the default signal names. Default 0. */
  index?: number;
  /** Explicit signal names, overriding the index-based defaults. */
  signals?: Partial<SpiSignalNames>;
  /** Half of the SCLK period. Default 40 (12.5 MHz). */
  halfPeriod?: number;
  /** Time between the last SCLK fall and CS_N release. Default 20. */
  csReleaseDelay?: number;
  /** Idle time after every request frame. Default 200. */
  interFramePause?: number;
  /** Bounds of the random idle time after a read response. Default [10, 200]. */
  responsePause?: readonly [number, number];
  /** 3-bit chip address put in every request. Default 0. */
  chipAddress?: number;
  /** Broadcast flag of every request. Default false. */
  broadcast?: boolean;
}

export interface ResolvedSpiConfig {
  readonly signals: SpiSignalNames;
  readonly halfPeriod: number;
  readonly csReleaseDelay: number;
  readonly interFramePause: number;
  readonly responsePause: readonly [number, number];
  readonly chipAddress: number;
  readonly broadcast: boolean;
}

/** Default signal names of SPI port `index`: `I_SCLK_0`, `I_CS_N_0`, ... */
export function spiSignalNames(index = 0): SpiSignalNames {
  return {
    sclk: `I_SCLK_${index}`,
    csN: `I_CS_N_${index}`,
    mosi: `I_MOSI_${index}`,
    miso: `O_MISO_${index}`,
  };
}

/** SCLK half period in ns for a bus frequency in MHz. */
export function halfPeriodForFrequency(mhz: number): number {
  if (!(mhz > 0)) {
    throw new RangeError(`SPI frequency must be positive, got ${mhz}`);
  }
  return Math.round(1000 / (2 * mhz));
}

export function resolveSpiConfig(config: SpiConfig = {}): ResolvedSpiConfig {
  const resolved: ResolvedSpiConfig = {
    signals: { ...spiSignalNames(config.index ?? 0), ...config.signals },
    halfPeriod: config.halfPeriod ?? halfPeriodForFrequency(12.5),
    csReleaseDelay: config.csReleaseDelay ?? 20,
    interFramePause: config.interFramePause ?? 200,
    responsePause: config.responsePause ?? [10, 200],
    chipAddress: config.chipAddress ?? 0,
    broadcast: config.broadcast ?? false,
  };
  if (!Number.isInteger(resolved.halfPeriod) || resolved.halfPeriod <= 0) {
    throw new RangeError(`halfPeriod must be a positive integer, got ${resolved.halfPeriod}`);
  }
  const [lo, hi] = resolved.responsePause;
  if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo < 0 || hi < lo) {
    throw new RangeError(`responsePause must be an integer range, got [${lo}, ${hi}]`);
  }
  if (!Number.isInteger(resolved.chipAddress) || resolved.chipAddress < 0 || resolved.chipAddress > 7) {
    throw new RangeError(`chipAddress must fit 3 bits, got ${resolved.chipAddress}`);
  }
  return resolved;
}

/** Signal declarations of one SPI port, for `Simulation.create()`. */
export function spiPortSignals(names: SpiSignalNames = spiSignalNames()): Record<string, SignalInfo> {
  return {
    [names.sclk]: { direction: "input", type: "logic", width: 1, initial: 0 },
    [names.csN]: { direction: "input", type: "logic", width: 1, initial: 1 },
    [names.mosi]: { direction: "input", type: "logic", width: 1, initial: X },
    [names.miso]: { direction: "output", type: "logic", width: 1, initial: X },
  };
}
