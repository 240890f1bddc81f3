/**
 * vitest custom matchers for 4-state signal values.
 *
 * Usage:
 *   import { setupMatchers } from "@regbus/sim/matchers";
 *   setupMatchers();
 *
 *   expect(sim.readSignal("I_MOSI_0")).toBeX();
 *   expect(sim.readSignal("O_MISO_0")).toBeNotX();
 */

import { expect } from "vitest";
import { isFourStateValue, type FourStateValue } from "./types.js";

// ---------------------------------------------------------------------------
// Matcher declarations (augment vitest's Assertion interface)
// ---------------------------------------------------------------------------

interface FourStateMatchers<R = unknown> {
  /** Assert that the value has any X bits (mask !== 0). */
  toBeX(): R;
  /** Assert that the value is all-X for the given width. */
  toBeAllX(width: number): R;
  /** Assert that the value has no X bits (mask === 0). */
  toBeNotX(): R;
}

declare module "vitest" {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any, @typescript-eslint/no-empty-object-type
  interface Assertion<T = any> extends FourStateMatchers<T> {}
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface AsymmetricMatchersContaining extends FourStateMatchers {}
}

// ---------------------------------------------------------------------------
// Matcher implementations
// ---------------------------------------------------------------------------

function asFourState(received: unknown): FourStateValue {
  if (!isFourStateValue(received)) {
    throw new TypeError(
      "toBeX/toBeAllX/toBeNotX matchers require a FourStateValue. " +
        "Use sim.readSignal(name) to get one.",
    );
  }
  return received;
}

const customMatchers = {
  toBeX(received: unknown) {
    const { mask } = asFourState(received);
    const pass = mask !== 0;
    return {
      pass,
      message: () =>
        pass
          ? `expected signal NOT to have X bits, but mask = 0x${mask.toString(16)}`
          : `expected signal to have X bits, but mask = 0`,
    };
  },

  toBeAllX(received: unknown, width: number) {
    const { mask } = asFourState(received);
    const allOnes = width >= 32 ? 0xffff_ffff : ((1 << width) - 1) >>> 0;
    const pass = mask === allOnes;
    return {
      pass,
      message: () =>
        pass
          ? `expected signal NOT to be all-X`
          : `expected signal to be all-X, but mask = 0x${mask.toString(16)}`,
    };
  },

  toBeNotX(received: unknown) {
    const { mask } = asFourState(received);
    const pass = mask === 0;
    return {
      pass,
      message: () =>
        pass
          ? `expected signal to have X bits, but mask = 0`
          : `expected signal NOT to have X bits, but mask = 0x${mask.toString(16)}`,
    };
  },
};

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Register custom matchers with vitest.
 * Call once in a setup file or at the top of your test:
 *
 * ```ts
 * import { setupMatchers } from "@regbus/sim/matchers";
 * setupMatchers();
 * ```
 */
export function setupMatchers(): void {
  expect.extend(customMatchers);
}
