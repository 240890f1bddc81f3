/**
 * SPI master: shifts request frames out on MOSI.
 *
 * The driver owns SCLK and CS_N. Bits change on the rising SCLK edge and
 * are sampled by the slave on the falling edge.
 */

import type { SignalBus } from "@regbus/sim";
import { X } from "@regbus/sim";
import { packRequest, wordToBits, type Bit, FRAME_BITS } from "./frame.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { Random } from "./random.js";
import { resolveSpiConfig, type ResolvedSpiConfig, type SpiConfig } from "./spi-config.js";
import { checkTransaction, formatTransaction, type Transaction } from "./transaction.js";

export interface SpiDriverOptions {
  random: Random;
  logger?: Logger;
}

export class SpiDriver {
  readonly config: ResolvedSpiConfig;
  private readonly _bus: SignalBus;
  private readonly _random: Random;
  private readonly _log: Logger;
  private _frames = 0;

  constructor(bus: SignalBus, config: SpiConfig, options: SpiDriverOptions) {
    this._bus = bus;
    this.config = resolveSpiConfig(config);
    this._random = options.random;
    this._log = options.logger ?? silentLogger;
  }

  /** Frames clocked so far, request and response frames alike. */
  get frames(): number {
    return this._frames;
  }

  /** Idle the bus: SCLK low, CS_N high, MOSI undriven. */
  init(): void {
    const { signals } = this.config;
    this._bus.writeSignal(signals.sclk, 0);
    this._bus.writeSignal(signals.csN, 1);
    this._bus.writeSignal(signals.mosi, X);
  }

  /**
   * Send one transaction. A read is followed by a clock-only frame that
   * carries the response on MISO.
   *
   * @throws TransactionError for a transaction that cannot be encoded.
   */
  async send(trx: Transaction): Promise<void> {
    checkTransaction(trx);
    this._log.info(`Sending ${formatTransaction(trx)}`);

    const word = packRequest({
      chipAddress: this.config.chipAddress,
      direction: trx.direction,
      broadcast: this.config.broadcast,
      address: trx.address,
      data: trx.data,
    });
    await Promise.all([this.clockFrame(), this.shiftOut(wordToBits(word))]);
    this._bus.writeSignal(this.config.signals.mosi, X);
    this._log.debug(`Finished request frame 0x${word.toString(16).padStart(8, "0")}`);
    await this._bus.waitDuration(this.config.interFramePause);

    if (trx.direction === "read") {
      this._log.debug("Starting read response frame");
      await this.clockFrame();
      const [lo, hi] = this.config.responsePause;
      await this._bus.waitDuration(this._random.randint(lo, hi));
    }
  }

  /** Assert CS_N, run 32 SCLK periods, then release CS_N. */
  private async clockFrame(): Promise<void> {
    const { signals, halfPeriod, csReleaseDelay } = this.config;
    this._frames++;
    this._bus.writeSignal(signals.csN, 0);
    for (let i = 0; i < FRAME_BITS; i++) {
      this._bus.writeSignal(signals.sclk, 0);
      await this._bus.waitDuration(halfPeriod);
      this._bus.writeSignal(signals.sclk, 1);
      await this._bus.waitDuration(halfPeriod);
    }
    this._bus.writeSignal(signals.sclk, 0);
    await this._bus.waitDuration(csReleaseDelay);
    this._bus.writeSignal(signals.csN, 1);
  }

  private async shiftOut(bits: readonly Bit[]): Promise<void> {
    const { sclk, mosi } = this.config.signals;
    for (const bit of bits) {
      await this._bus.waitEdge(sclk, "rising");
      this._bus.writeSignal(mosi, bit);
    }
  }
}
