/**
 * Behavioural SPI register-file slave.
 *
 * Stands in for the device under test: decodes request frames from MOSI,
 * stores writes, and answers reads on MISO in the following frame. Faults
 * can be switched on to exercise the monitor's protocol checks.
 */

import type { SignalBus } from "@regbus/sim";
import { X, isResolved } from "@regbus/sim";
import { FRAME_BITS, bitsToWord, packResponse, unpackRequest, wordToBits, type Bit, type ResponseFrame } from "./frame.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { RegisterDefinition } from "./register-map.js";
import { resolveSpiConfig, type ResolvedSpiConfig, type SpiConfig } from "./spi-config.js";

export interface DeviceFaults {
  /** XOR mask applied to the echoed chip address. */
  chipAddressXor?: number;
  /** Answer every read with the error status. */
  errorStatus?: boolean;
  /** Leave this response bit (31..0) undriven. */
  undefinedBit?: number;
  /** XOR mask applied to read data. */
  dataXor?: number;
}

export interface SpiRegisterDeviceOptions {
  registers: readonly RegisterDefinition[];
  /** Reset values known only at run time, by register name. */
  resetOverrides?: Readonly<Record<string, number>>;
  /** A write of `resetCode` to `controlAddress` resets the register file. */
  reset?: { readonly controlAddress: number; readonly resetCode: number };
  logger?: Logger;
}

interface DeviceRegister {
  readonly def: RegisterDefinition;
  readonly resetValue: number;
  value: number;
}

export class SpiRegisterDevice {
  readonly config: ResolvedSpiConfig;
  private readonly _bus: SignalBus;
  private readonly _log: Logger;
  private readonly _registers = new Map<number, DeviceRegister>();
  private readonly _reset: SpiRegisterDeviceOptions["reset"];
  private _faults: DeviceFaults = {};
  private _requests = 0;

  constructor(bus: SignalBus, config: SpiConfig, options: SpiRegisterDeviceOptions) {
    this._bus = bus;
    this.config = resolveSpiConfig(config);
    this._log = options.logger ?? silentLogger;
    this._reset = options.reset;
    const overrides = options.resetOverrides ?? {};
    for (const def of options.registers) {
      const resetValue = overrides[def.name] ?? def.resetValue ?? 0;
      this._registers.set(def.address, { def, resetValue, value: resetValue });
    }
  }

  /** Request frames decoded so far. */
  get requests(): number {
    return this._requests;
  }

  setFaults(faults: DeviceFaults): void {
    this._faults = { ...faults };
  }

  clearFaults(): void {
    this._faults = {};
  }

  /** Current content of the register at `address`. */
  peek(address: number): number | undefined {
    return this._registers.get(address)?.value;
  }

  /** Return every register to its reset value. */
  resetRegisters(): void {
    for (const reg of this._registers.values()) {
      reg.value = reg.resetValue;
    }
  }

  /** Slave loop. Never returns. */
  async run(): Promise<never> {
    const { csN, miso } = this.config.signals;
    this._bus.writeSignal(miso, X);
    for (;;) {
      await this._bus.waitEdge(csN, "falling");
      const word = await this.receiveFrame();
      if (word === undefined) continue;

      this._requests++;
      const request = unpackRequest(word);
      if (request.chipAddress !== this.config.chipAddress && !request.broadcast) {
        this._log.debug(`Ignoring request for chip ${request.chipAddress}`);
        continue;
      }

      if (request.direction === "write") {
        this.write(request.address, request.data);
        continue;
      }

      const response = this.read(request.address, request.chipAddress, request.broadcast);
      await this._bus.waitEdge(csN, "falling");
      await this.transmitFrame(wordToBits(packResponse(response)));
      await this._bus.waitEdge(csN, "rising");
      this._bus.writeSignal(miso, X);
    }
  }

  private write(address: number, data: number): void {
    const reg = this._registers.get(address);
    if (!reg) {
      this._log.warn(`Write to unmapped address 0x${address.toString(16)} ignored`);
      return;
    }
    if (reg.def.access === "ro") {
      this._log.debug(`Write to read-only ${reg.def.name} ignored`);
      return;
    }
    reg.value = data & (2 ** reg.def.bitWidth - 1);
    if (this._reset && address === this._reset.controlAddress && data === this._reset.resetCode) {
      this._log.info("Reset code received");
      this.resetRegisters();
    }
  }

  private read(address: number, chipAddress: number, broadcast: boolean): ResponseFrame {
    const reg = this._registers.get(address);
    const faults = this._faults;
    const data = (reg?.value ?? 0) ^ (faults.dataXor ?? 0);
    return {
      chipAddress: (chipAddress ^ (faults.chipAddressXor ?? 0)) & 0x7,
      direction: "read",
      broadcast,
      data: data & 0xffff,
      status: reg === undefined || faults.errorStatus ? "error" : "ok",
    };
  }

  /** Sample a request on falling SCLK edges; `undefined` if a bit was X. */
  private async receiveFrame(): Promise<number | undefined> {
    const { sclk, mosi } = this.config.signals;
    const bits: Bit[] = [];
    let defined = true;
    for (let i = 0; i < FRAME_BITS; i++) {
      await this._bus.waitEdge(sclk, "falling");
      const value = this._bus.readSignal(mosi);
      if (!isResolved(value)) defined = false;
      bits.push((value.value & 1) === 1 ? 1 : 0);
    }
    if (!defined) {
      this._log.warn("Request frame with undefined bits dropped");
      return undefined;
    }
    return bitsToWord(bits);
  }

  /** Drive MISO on rising SCLK edges, MSB first. */
  private async transmitFrame(bits: readonly Bit[]): Promise<void> {
    const { sclk, miso } = this.config.signals;
    const undefinedIndex = this._faults.undefinedBit;
    for (let n = 0; n < bits.length; n++) {
      await this._bus.waitEdge(sclk, "rising");
      const index = FRAME_BITS - 1 - n;
      this._bus.writeSignal(miso, index === undefinedIndex ? X : (bits[n] ?? 0));
    }
  }
}
