/**
 * Periodic pulse with randomized high and low phases, driven on a signal
 * unrelated to the SPI bus while traffic is running.
 */

import type { SignalBus } from "@regbus/sim";
import type { Random } from "./random.js";

export interface PulseOptions {
  signal: string;
  /** Delay before the first rising edge. Default 20. */
  startDelay?: number;
  /** Inclusive bounds of the high phase. Default [1900, 2100]. */
  high?: readonly [number, number];
  /** Inclusive bounds of the low phase. Default [50, 250]. */
  low?: readonly [number, number];
  random: Random;
}

export class PulseInjector {
  readonly signal: string;
  private readonly _bus: SignalBus;
  private readonly _random: Random;
  private readonly _startDelay: number;
  private readonly _high: readonly [number, number];
  private readonly _low: readonly [number, number];
  private _pulses = 0;
  private _stopped = false;

  constructor(bus: SignalBus, options: PulseOptions) {
    this._bus = bus;
    this.signal = options.signal;
    this._random = options.random;
    this._startDelay = options.startDelay ?? 20;
    this._high = options.high ?? [1900, 2100];
    this._low = options.low ?? [50, 250];
  }

  /** Completed high phases. */
  get pulses(): number {
    return this._pulses;
  }

  /** End the loop after the current low phase. */
  stop(): void {
    this._stopped = true;
  }

  async run(): Promise<void> {
    this._bus.writeSignal(this.signal, 0);
    await this._bus.waitDuration(this._startDelay);
    while (!this._stopped) {
      this._bus.writeSignal(this.signal, 1);
      await this._bus.waitDuration(this._random.randint(...this._high));
      this._bus.writeSignal(this.signal, 0);
      this._pulses++;
      await this._bus.waitDuration(this._random.randint(...this._low));
    }
  }
}
