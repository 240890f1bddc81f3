/**
 * Ordered solver for small discrete random variables.
 *
 * Each variable is solved on its own, in the order the caller asks for
 * them: enumerate the domain, drop values that fail a hard constraint, then
 * draw among the survivors in proportion to their soft weight. Later
 * variables see earlier results through closures.
 */

import { TransactionError } from "./errors.js";
import type { Random } from "./random.js";

export interface RandomVariable<T> {
  readonly name: string;
  readonly domain: readonly T[];
  /** Every predicate must hold for a value to survive. */
  readonly hard?: readonly ((value: T) => boolean)[];
  /** Relative weight of a surviving value. Default 1. */
  readonly weight?: (value: T) => number;
}

/** Values of `variable.domain` that satisfy every hard constraint. */
export function survivors<T>(variable: RandomVariable<T>): T[] {
  const hard = variable.hard ?? [];
  return variable.domain.filter((value) => hard.every((holds) => holds(value)));
}

/**
 * Draw one value for `variable`.
 *
 * @throws TransactionError when no value satisfies the hard constraints, or
 *         every survivor has weight zero.
 */
export function solveVariable<T>(variable: RandomVariable<T>, random: Random): T {
  const candidates = survivors(variable);
  if (candidates.length === 0) {
    throw new TransactionError(`Constraints on '${variable.name}' cannot be satisfied`);
  }
  const weightOf = variable.weight ?? (() => 1);
  const weights = candidates.map(weightOf);
  if (!weights.some((w) => w > 0)) {
    throw new TransactionError(`Every candidate for '${variable.name}' has weight zero`);
  }
  const picked = candidates[random.weightedIndex(weights)];
  if (picked === undefined) {
    throw new TransactionError(`Weighted draw for '${variable.name}' fell outside its domain`);
  }
  return picked;
}
