import { describe, test, expect } from "vitest";
import fc from "fast-check";
import {
  REQUEST_LAYOUT,
  RESPONSE_LAYOUT,
  bitsToWord,
  extractField,
  fieldAt,
  packRequest,
  packResponse,
  unpackRequest,
  unpackResponse,
  wordToBits,
  type RequestFrame,
} from "./frame.js";

describe("request frames", () => {
  test("packs fields MSB first with the stop bit set", () => {
    const word = packRequest({
      chipAddress: 5,
      direction: "write",
      broadcast: false,
      address: 0x12,
      data: 0xabcd,
    });
    expect(word).toBe(0xb0955e69);
    expect(extractField(REQUEST_LAYOUT, word, "reserved")).toBe(0);
    expect(extractField(REQUEST_LAYOUT, word, "stop")).toBe(1);
  });

  test("a read request clears the write flag", () => {
    const word = packRequest({ chipAddress: 0, direction: "read", broadcast: true, address: 1, data: 0 });
    expect(word.toString(2).padStart(32, "0")).toBe("00001000000010000000000000000001");
  });

  test("rejects out-of-range fields", () => {
    expect(() =>
      packRequest({ chipAddress: 8, direction: "write", broadcast: false, address: 0, data: 0 }),
    ).toThrow("Frame field 'chipAddress' out of range: 8");
    expect(() =>
      packRequest({ chipAddress: 0, direction: "write", broadcast: false, address: 0, data: 0x10000 }),
    ).toThrow("Frame field 'data' out of range: 65536");
  });

  test("a 4-bit register written at its maximum carries 15 in the data field", () => {
    const word = packRequest({ chipAddress: 0, direction: "write", broadcast: false, address: 3, data: 15 });
    expect(extractField(REQUEST_LAYOUT, word, "data")).toBe(15);
    expect(wordToBits(word).slice(13, 29).join("")).toBe("0000000000001111");
  });

  test("decoding the transmitted bits returns the original request", () => {
    const request = fc.record<RequestFrame>({
      chipAddress: fc.integer({ min: 0, max: 7 }),
      direction: fc.constantFrom("read", "write"),
      broadcast: fc.boolean(),
      address: fc.integer({ min: 0, max: 0xff }),
      data: fc.integer({ min: 0, max: 0xffff }),
    });
    fc.assert(
      fc.property(request, (frame) => {
        const decoded = unpackRequest(bitsToWord(wordToBits(packRequest(frame))));
        expect(decoded).toEqual({ ...frame, stop: 1 });
      }),
    );
  });
});

describe("response frames", () => {
  test("packs the marker, echo, data and status", () => {
    const ok = packResponse({ chipAddress: 3, direction: "read", broadcast: false, data: 0x1234, status: "ok" });
    expect(ok).toBe(0x02c12340);
    const error = packResponse({ chipAddress: 3, direction: "read", broadcast: false, data: 0x1234, status: "error" });
    expect(error).toBe(0x02c12348);
  });

  test("unpacks what it packed", () => {
    const word = packResponse({ chipAddress: 6, direction: "read", broadcast: true, data: 0xbeef, status: "error" });
    expect(unpackResponse(word)).toEqual({
      chipAddress: 6,
      direction: "read",
      broadcast: true,
      data: 0xbeef,
      status: "error",
      marker: 1,
    });
  });

  test("fieldAt names the owner of a bit", () => {
    expect(fieldAt(RESPONSE_LAYOUT, 25)).toBe("marker");
    expect(fieldAt(RESPONSE_LAYOUT, 3)).toBe("status");
    expect(fieldAt(REQUEST_LAYOUT, 19)).toBe("address");
    expect(fieldAt(REQUEST_LAYOUT, 18)).toBe("data");
  });
});

describe("bit sequences", () => {
  test("wordToBits is MSB first", () => {
    const bits = wordToBits(0x80000001);
    expect(bits).toHaveLength(32);
    expect(bits[0]).toBe(1);
    expect(bits[31]).toBe(1);
    expect(bits.slice(1, 31).every((b) => b === 0)).toBe(true);
  });

  test("bitsToWord requires exactly 32 bits", () => {
    expect(() => bitsToWord([1, 0, 1])).toThrow("A frame has 32 bits, got 3");
  });
});
