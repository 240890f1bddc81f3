/**
 * SPI bus monitor.
 *
 * Watches the same pins as the slave and reconstructs transactions. Runs
 * forever as its own task:
 *
 *   idle → receiving (bits 31..0) → awaiting-response
 *        → receiving-response (bits 31..0) → idle
 *
 * Writes are reported at the end of the request frame, reads once the
 * response frame is complete.
 */

import type { SignalBus } from "@regbus/sim";
import { isResolved, toBinString } from "@regbus/sim";
import { ProtocolError } from "./errors.js";
import {
  FRAME_BITS,
  REQUEST_LAYOUT,
  RESPONSE_LAYOUT,
  bitsToWord,
  fieldAt,
  unpackRequest,
  unpackResponse,
  type Bit,
  type FrameField,
} from "./frame.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { Observation } from "./scoreboard.js";
import { resolveSpiConfig, type ResolvedSpiConfig, type SpiConfig } from "./spi-config.js";

export type MonitorState = "idle" | "receiving" | "awaiting-response" | "receiving-response";

export interface SpiObservation extends Observation {
  readonly chipAddress: number;
  /** Simulated time the transaction completed. */
  readonly time: number;
}

export type ObservationListener = (observation: SpiObservation) => void;

export interface SpiMonitorOptions {
  /** Most recent observations kept in `observed`. Default 0. */
  history?: number;
  logger?: Logger;
}

export class SpiMonitor {
  readonly config: ResolvedSpiConfig;
  private readonly _bus: SignalBus;
  private readonly _log: Logger;
  private readonly _listeners: ObservationListener[] = [];
  private readonly _observed: SpiObservation[] = [];
  private readonly _history: number;
  private _count = 0;
  private _state: MonitorState = "idle";
  private _running = false;

  constructor(bus: SignalBus, config: SpiConfig = {}, options: SpiMonitorOptions = {}) {
    this._bus = bus;
    this.config = resolveSpiConfig(config);
    this._log = options.logger ?? silentLogger;
    this._history = options.history ?? 0;
    if (!Number.isInteger(this._history) || this._history < 0) {
      throw new RangeError(`SpiMonitor history must be a non-negative integer, got ${this._history}`);
    }
  }

  get state(): MonitorState {
    return this._state;
  }

  /** The last `history` observations, oldest first. */
  get observed(): readonly SpiObservation[] {
    return this._observed;
  }

  /** Observations made so far. */
  get count(): number {
    return this._count;
  }

  onObservation(listener: ObservationListener): () => void {
    this._listeners.push(listener);
    return () => {
      const i = this._listeners.indexOf(listener);
      if (i >= 0) this._listeners.splice(i, 1);
    };
  }

  /**
   * Monitor loop. Never returns; rejects with `ProtocolError` on a
   * protocol violation, or with whatever a listener throws.
   */
  async run(): Promise<never> {
    if (this._running) {
      throw new Error("SpiMonitor.run() is already running");
    }
    this._running = true;
    const { csN } = this.config.signals;
    for (;;) {
      this._state = "idle";
      await this._bus.waitEdge(csN, "falling");

      this._state = "receiving";
      const request = unpackRequest(await this.sampleFrame("mosi", REQUEST_LAYOUT));
      if (request.direction === "write") {
        this.emit({
          direction: "write",
          address: request.address,
          data: request.data,
          chipAddress: request.chipAddress,
          time: this._bus.now(),
        });
        continue;
      }

      this._log.debug("Read request detected");
      this._state = "awaiting-response";
      await this._bus.waitEdge(csN, "falling");

      this._state = "receiving-response";
      const response = unpackResponse(await this.sampleFrame("miso", RESPONSE_LAYOUT));
      await this._bus.waitEdge(csN, "rising");

      if (response.chipAddress !== request.chipAddress) {
        throw new ProtocolError(
          "chip-address-mismatch",
          `Response chip address ${response.chipAddress} does not echo request chip address ${request.chipAddress}`,
          this._bus.now(),
        );
      }
      if (response.status !== "ok") {
        throw new ProtocolError(
          "status-error",
          `Read of 0x${request.address.toString(16)} answered with error status`,
          this._bus.now(),
        );
      }
      this._log.info(
        `Read trx: chip=${response.chipAddress} data=0x${response.data.toString(16).padStart(4, "0")} status=${response.status}`,
      );
      this.emit({
        direction: "read",
        address: request.address,
        data: response.data,
        chipAddress: response.chipAddress,
        time: this._bus.now(),
      });
    }
  }

  /** Sample 32 bits of `line` on falling SCLK edges, MSB first. */
  private async sampleFrame(line: "mosi" | "miso", layout: readonly FrameField[]): Promise<number> {
    const { sclk } = this.config.signals;
    const signal = this.config.signals[line];
    const bits: Bit[] = [];
    for (let i = FRAME_BITS - 1; i >= 0; i--) {
      await this._bus.waitEdge(sclk, "falling");
      const value = this._bus.readSignal(signal);
      if (!isResolved(value)) {
        throw new ProtocolError(
          "undefined-bit",
          `Undefined ${line.toUpperCase()} bit ${i} (${fieldAt(layout, i)}): ${toBinString(value, 1)}`,
          this._bus.now(),
        );
      }
      bits.push((value.value & 1) === 1 ? 1 : 0);
    }
    return bitsToWord(bits);
  }

  private emit(observation: SpiObservation): void {
    this._count++;
    if (this._history > 0) {
      this._observed.push(observation);
      if (this._observed.length > this._history) this._observed.shift();
    }
    for (const listener of [...this._listeners]) {
      listener(observation);
    }
  }
}
