export interface Random {
  readonly seed: number;
  nextU32: () => number;
  /** Uniform integer in `[lo, hi]`, both inclusive. */
  randint: (lo: number, hi: number) => number;
  /** Index drawn with probability proportional to `weights[i]`. */
  weightedIndex: (weights: readonly number[]) => number;
}

export const createRandom = (seed: number): Random => {
  // Xorshift32 deterministic PRNG
  let state = seed >>> 0 || 0xdeadbeef;
  const nextU32 = (): number => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return state >>> 0;
  };

  const randint = (lo: number, hi: number): number => {
    if (!Number.isInteger(lo) || !Number.isInteger(hi) || hi < lo) {
      throw new RangeError(`randint: invalid range [${lo}, ${hi}]`);
    }
    const span = hi - lo + 1;
    return lo + Math.floor((nextU32() / 0x1_0000_0000) * span);
  };

  const weightedIndex = (weights: readonly number[]): number => {
    let total = 0;
    for (const w of weights) {
      if (!(w >= 0) || !Number.isFinite(w)) {
        throw new RangeError(`weightedIndex: invalid weight ${w}`);
      }
      total += w;
    }
    if (total <= 0) {
      throw new RangeError("weightedIndex: weights sum to zero");
    }
    let pick = (nextU32() / 0x1_0000_0000) * total;
    for (let i = 0; i < weights.length; i++) {
      const w = weights[i] ?? 0;
      if (pick < w) return i;
      pick -= w;
    }
    // Floating-point leftovers land on the last non-zero weight.
    for (let i = weights.length - 1; i >= 0; i--) {
      if ((weights[i] ?? 0) > 0) return i;
    }
    return weights.length - 1;
  };

  return { seed: seed >>> 0, nextU32, randint, weightedIndex };
};
