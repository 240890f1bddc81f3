/**
 * Bit-exact frame layouts of the register bus.
 *
 * Frames are 32 bits, shifted MSB first.
 *
 * Request:  chip(3) | wrn(1) | brd(1) | addr(8) | data(16) | rsv(2) | stop(1)
 * Response: zero(6) | one(1) | chip(3) | wrn(1) | brd(1) | data(16) | status(1) | zero(3)
 */

import type { Direction } from "./transaction.js";

export const FRAME_BITS = 32;

export type Bit = 0 | 1;

export interface FrameField {
  readonly name: string;
  /** Bit index of the most significant bit, 31..0. */
  readonly msb: number;
  readonly lsb: number;
}

export const REQUEST_LAYOUT = [
  { name: "chipAddress", msb: 31, lsb: 29 },
  { name: "write", msb: 28, lsb: 28 },
  { name: "broadcast", msb: 27, lsb: 27 },
  { name: "address", msb: 26, lsb: 19 },
  { name: "data", msb: 18, lsb: 3 },
  { name: "reserved", msb: 2, lsb: 1 },
  { name: "stop", msb: 0, lsb: 0 },
] as const satisfies readonly FrameField[];

export const RESPONSE_LAYOUT = [
  { name: "zeros", msb: 31, lsb: 26 },
  { name: "marker", msb: 25, lsb: 25 },
  { name: "chipAddress", msb: 24, lsb: 22 },
  { name: "write", msb: 21, lsb: 21 },
  { name: "broadcast", msb: 20, lsb: 20 },
  { name: "data", msb: 19, lsb: 4 },
  { name: "status", msb: 3, lsb: 3 },
  { name: "tail", msb: 2, lsb: 0 },
] as const satisfies readonly FrameField[];

type FieldValues<L extends readonly FrameField[]> = Record<L[number]["name"], number>;

export type RequestFieldName = (typeof REQUEST_LAYOUT)[number]["name"];
export type ResponseFieldName = (typeof RESPONSE_LAYOUT)[number]["name"];

// ---------------------------------------------------------------------------
// Generic field packing
// ---------------------------------------------------------------------------

function fieldMask(field: FrameField): number {
  const width = field.msb - field.lsb + 1;
  return width >= 32 ? 0xffff_ffff : (1 << width) - 1;
}

export function packFields<L extends readonly FrameField[]>(
  layout: L,
  values: FieldValues<L>,
): number {
  let word = 0;
  for (const field of layout) {
    const name: L[number]["name"] = field.name;
    const value = values[name];
    const mask = fieldMask(field);
    if (!Number.isInteger(value) || value < 0 || value > mask) {
      throw new RangeError(`Frame field '${field.name}' out of range: ${value}`);
    }
    word |= value << field.lsb;
  }
  return word >>> 0;
}

/** Value of one named field of a packed word. */
export function extractField<L extends readonly FrameField[]>(
  layout: L,
  word: number,
  name: L[number]["name"],
): number {
  const field = layout.find((f) => f.name === name);
  if (!field) {
    throw new Error(`Unknown frame field '${name}'`);
  }
  return (word >>> field.lsb) & fieldMask(field);
}

/** Name of the field that owns bit `index` (31..0). */
export function fieldAt(layout: readonly FrameField[], index: number): string {
  return layout.find((f) => index <= f.msb && index >= f.lsb)?.name ?? "?";
}

// ---------------------------------------------------------------------------
// Bit sequences
// ---------------------------------------------------------------------------

/** Split a word into its 32 bits, MSB first. */
export function wordToBits(word: number): Bit[] {
  const bits: Bit[] = [];
  for (let i = FRAME_BITS - 1; i >= 0; i--) {
    bits.push(((word >>> i) & 1) === 1 ? 1 : 0);
  }
  return bits;
}

/** Reassemble 32 bits, MSB first. */
export function bitsToWord(bits: readonly Bit[]): number {
  if (bits.length !== FRAME_BITS) {
    throw new RangeError(`A frame has ${FRAME_BITS} bits, got ${bits.length}`);
  }
  let word = 0;
  for (const bit of bits) {
    word = ((word << 1) | bit) >>> 0;
  }
  return word;
}

// ---------------------------------------------------------------------------
// Request / response frames
// ---------------------------------------------------------------------------

export interface RequestFrame {
  readonly chipAddress: number;
  readonly direction: Direction;
  readonly broadcast: boolean;
  readonly address: number;
  readonly data: number;
}

export type ResponseStatus = "ok" | "error";

export interface ResponseFrame {
  readonly chipAddress: number;
  readonly direction: Direction;
  readonly broadcast: boolean;
  readonly data: number;
  readonly status: ResponseStatus;
}

export function packRequest(frame: RequestFrame): number {
  return packFields(REQUEST_LAYOUT, {
    chipAddress: frame.chipAddress,
    write: frame.direction === "write" ? 1 : 0,
    broadcast: frame.broadcast ? 1 : 0,
    address: frame.address,
    data: frame.data,
    reserved: 0,
    stop: 1,
  });
}

export function unpackRequest(word: number): RequestFrame & { readonly stop: number } {
  const f = (name: RequestFieldName): number => extractField(REQUEST_LAYOUT, word, name);
  return {
    chipAddress: f("chipAddress"),
    direction: f("write") === 1 ? "write" : "read",
    broadcast: f("broadcast") === 1,
    address: f("address"),
    data: f("data"),
    stop: f("stop"),
  };
}

export function packResponse(frame: ResponseFrame): number {
  return packFields(RESPONSE_LAYOUT, {
    zeros: 0,
    marker: 1,
    chipAddress: frame.chipAddress,
    write: frame.direction === "write" ? 1 : 0,
    broadcast: frame.broadcast ? 1 : 0,
    data: frame.data,
    status: frame.status === "ok" ? 0 : 1,
    tail: 0,
  });
}

export function unpackResponse(word: number): ResponseFrame & { readonly marker: number } {
  const f = (name: ResponseFieldName): number => extractField(RESPONSE_LAYOUT, word, name);
  return {
    chipAddress: f("chipAddress"),
    direction: f("write") === 1 ? "write" : "read",
    broadcast: f("broadcast") === 1,
    data: f("data"),
    status: f("status") === 0 ? "ok" : "error",
    marker: f("marker"),
  };
}
