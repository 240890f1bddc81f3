/**
 * Functional coverage primitives.
 *
 * A `CoverPoint` counts hits per bin. A `CoverCross` counts hits per joint
 * tuple over two or more points and tracks, for every bin of every
 * dimension, how many of its tuples are still below the threshold. A bin
 * whose count drops to zero is covered for that dimension.
 *
 * Items register themselves in the `CoverageRegistry` passed to their
 * constructor; there is no process-wide registry.
 */

import { CoverageError } from "./errors.js";
import type { Transaction, TransactionField } from "./transaction.js";
import { transactionField } from "./transaction.js";

export type Bin = string | number;

/** Joint bin of a cross, one entry per dimension. */
export type BinTuple = readonly Bin[];

/** A tuple pattern to exclude; `null` matches any bin of that dimension. */
export type IgnorePattern = readonly (Bin | null)[];

/** Value of a status report field. */
export type StatusValue = number | string | readonly StatusValue[] | { readonly [key: string]: StatusValue };

export const STATUS_FIELDS = [
  "atLeast",
  "weight",
  "size",
  "coverage",
  "coverPercentage",
  "coveredBins",
  "newHits",
  "detailedCoverage",
  "binCount",
] as const;

export type StatusField = (typeof STATUS_FIELDS)[number];

export function isStatusField(name: string): name is StatusField {
  return (STATUS_FIELDS as readonly string[]).includes(name);
}

/** Common surface of points and crosses. */
export interface CoverItem {
  readonly kind: "point" | "cross";
  readonly name: string;
  readonly atLeast: number;
  /** Relative importance in reports. */
  readonly weight: number;
  /** Number of bins (points) or non-ignored tuples (crosses). */
  readonly size: number;
  /** Number of bins or tuples that reached `atLeast`. */
  readonly coverage: number;
  readonly coverPercentage: number;
  sample(trx: Transaction): void;
  statusField(field: StatusField): StatusValue;
}

const binKey = (tuple: readonly (Bin | null)[]): string => JSON.stringify(tuple);

const percentage = (covered: number, size: number): number =>
  size === 0 ? 100 : (covered / size) * 100;

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Named cover items in registration order. */
export class CoverageRegistry {
  private readonly _items = new Map<string, CoverItem>();

  register(item: CoverItem): void {
    if (this._items.has(item.name)) {
      throw new CoverageError(item.name, "a cover item with this name is already registered");
    }
    this._items.set(item.name, item);
  }

  has(name: string): boolean {
    return this._items.has(name);
  }

  get(name: string): CoverItem | undefined {
    return this._items.get(name);
  }

  point(name: string): CoverPoint {
    const item = this._items.get(name);
    if (!(item instanceof CoverPoint)) {
      throw new CoverageError(name, item ? "is not a cover point" : "no such cover point");
    }
    return item;
  }

  cross(name: string): CoverCross {
    const item = this._items.get(name);
    if (!(item instanceof CoverCross)) {
      throw new CoverageError(name, item ? "is not a cover cross" : "no such cover cross");
    }
    return item;
  }

  items(): CoverItem[] {
    return [...this._items.values()];
  }

  names(): string[] {
    return [...this._items.keys()];
  }
}

// ---------------------------------------------------------------------------
// CoverPoint
// ---------------------------------------------------------------------------

export interface CoverPointOptions {
  bins: readonly Bin[];
  /** Whether `bin` is hit by `trx`. */
  relevance: (trx: Transaction, bin: Bin) => boolean;
  /** Hits needed for a bin to count as covered. Default 1. */
  atLeast?: number;
  /** Default 1. */
  weight?: number;
  registry: CoverageRegistry;
}

/** Relevance predicate that matches a transaction field against the bin. */
export function fieldEquals(field: TransactionField): (trx: Transaction, bin: Bin) => boolean {
  return (trx, bin) => transactionField(trx, field) === bin;
}

function checkAtLeast(name: string, atLeast: number): void {
  if (!Number.isInteger(atLeast) || atLeast < 1) {
    throw new CoverageError(name, `atLeast must be a positive integer, got ${atLeast}`);
  }
}

function checkWeight(name: string, weight: number): void {
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new CoverageError(name, `weight must be a positive number, got ${weight}`);
  }
}

export class CoverPoint implements CoverItem {
  readonly kind = "point";
  readonly name: string;
  readonly bins: readonly Bin[];
  readonly atLeast: number;
  readonly weight: number;
  private readonly _relevance: (trx: Transaction, bin: Bin) => boolean;
  private readonly _hits = new Map<Bin, number>();
  private readonly _covered: Bin[] = [];
  private _newHits: Bin[] = [];

  constructor(name: string, options: CoverPointOptions) {
    this.name = name;
    this.atLeast = options.atLeast ?? 1;
    checkAtLeast(name, this.atLeast);
    this.weight = options.weight ?? 1;
    checkWeight(name, this.weight);
    if (options.bins.length === 0) {
      throw new CoverageError(name, "a cover point needs at least one bin");
    }
    if (new Set(options.bins).size !== options.bins.length) {
      throw new CoverageError(name, "bins must be unique");
    }
    this.bins = [...options.bins];
    this._relevance = options.relevance;
    for (const bin of this.bins) this._hits.set(bin, 0);
    options.registry.register(this);
  }

  /** Bins that reached `atLeast`, in the order they got there. */
  get coveredBins(): readonly Bin[] {
    return this._covered;
  }

  /** Bins hit by the most recent sample. */
  get newHits(): readonly Bin[] {
    return this._newHits;
  }

  get size(): number {
    return this.bins.length;
  }

  get coverage(): number {
    return this._covered.length;
  }

  get coverPercentage(): number {
    return percentage(this.coverage, this.size);
  }

  hits(bin: Bin): number {
    return this._hits.get(bin) ?? 0;
  }

  /** Bins relevant to `trx`, in bin order. */
  relevantBins(trx: Transaction): Bin[] {
    return this.bins.filter((bin) => this._relevance(trx, bin));
  }

  sample(trx: Transaction): void {
    this._newHits = this.relevantBins(trx);
    for (const bin of this._newHits) {
      const count = this.hits(bin) + 1;
      this._hits.set(bin, count);
      if (count === this.atLeast) this._covered.push(bin);
    }
  }

  statusField(field: StatusField): StatusValue {
    switch (field) {
      case "atLeast":
        return this.atLeast;
      case "weight":
        return this.weight;
      case "size":
        return this.size;
      case "coverage":
        return this.coverage;
      case "coverPercentage":
        return this.coverPercentage;
      case "coveredBins":
        return [...this._covered];
      case "newHits":
        return [...this._newHits];
      case "detailedCoverage":
        return Object.fromEntries(this.bins.map((bin) => [String(bin), this.hits(bin)]));
      case "binCount":
        return {};
    }
  }
}

// ---------------------------------------------------------------------------
// CoverCross
// ---------------------------------------------------------------------------

export interface CoverCrossOptions {
  /** Names of the crossed points, one dimension each. */
  items: readonly string[];
  ignoreBins?: readonly IgnorePattern[];
  atLeast?: number;
  weight?: number;
  registry: CoverageRegistry;
}

interface TupleState {
  readonly tuple: BinTuple;
  hits: number;
}

function matchesPattern(tuple: BinTuple, pattern: IgnorePattern): boolean {
  return pattern.every((bin, i) => bin === null || bin === tuple[i]);
}

function cartesian(sets: readonly (readonly Bin[])[]): BinTuple[] {
  let out: Bin[][] = [[]];
  for (const set of sets) {
    out = out.flatMap((prefix) => set.map((bin) => [...prefix, bin]));
  }
  return out;
}

export class CoverCross implements CoverItem {
  readonly kind = "cross";
  readonly name: string;
  readonly items: readonly string[];
  readonly atLeast: number;
  readonly weight: number;
  private readonly _points: readonly CoverPoint[];
  private readonly _ignore: readonly IgnorePattern[];
  private readonly _tuples = new Map<string, TupleState>();
  /** dimension → bin → tuples below threshold */
  private readonly _descendants = new Map<string, Map<Bin, number>>();
  private readonly _coveredBins = new Map<string, Bin[]>();
  private _coveredTuples = 0;
  private _newHits: BinTuple[] = [];

  constructor(name: string, options: CoverCrossOptions) {
    this.name = name;
    this.atLeast = options.atLeast ?? 1;
    checkAtLeast(name, this.atLeast);
    this.weight = options.weight ?? 1;
    checkWeight(name, this.weight);
    if (options.items.length < 2) {
      throw new CoverageError(name, "a cross needs at least two cover points");
    }
    if (new Set(options.items).size !== options.items.length) {
      throw new CoverageError(name, "a cover point may appear only once in a cross");
    }
    this.items = [...options.items];
    this._points = this.items.map((item) => options.registry.point(item));
    this._ignore = options.ignoreBins ?? [];
    for (const pattern of this._ignore) {
      if (pattern.length !== this.items.length) {
        throw new CoverageError(
          name,
          `ignore pattern ${binKey(pattern)} has ${pattern.length} entries, expected ${this.items.length}`,
        );
      }
    }

    for (const item of this.items) {
      this._descendants.set(item, new Map());
      this._coveredBins.set(item, []);
    }
    for (const tuple of cartesian(this._points.map((p) => p.bins))) {
      if (this.isIgnored(tuple)) continue;
      this._tuples.set(binKey(tuple), { tuple, hits: 0 });
      tuple.forEach((bin, d) => {
        const counts = this.dimension(d);
        counts.set(bin, (counts.get(bin) ?? 0) + 1);
      });
    }
    options.registry.register(this);
  }

  get size(): number {
    return this._tuples.size;
  }

  get coverage(): number {
    return this._coveredTuples;
  }

  get coverPercentage(): number {
    return percentage(this._coveredTuples, this.size);
  }

  /** Tuples that received a hit in the most recent sample. */
  get newHits(): readonly BinTuple[] {
    return this._newHits;
  }

  isIgnored(tuple: BinTuple): boolean {
    return this._ignore.some((pattern) => matchesPattern(tuple, pattern));
  }

  hits(tuple: BinTuple): number {
    return this._tuples.get(binKey(tuple))?.hits ?? 0;
  }

  /** Tuples containing `bin` in `item` that are still below `atLeast`. */
  descendantCount(item: string, bin: Bin): number {
    return this._descendants.get(item)?.get(bin) ?? 0;
  }

  /** Bins of `item` whose every tuple reached `atLeast`, in the order they got there. */
  coveredBins(item: string): readonly Bin[] {
    return this._coveredBins.get(item) ?? [];
  }

  /**
   * True when `bin` has nothing left to cover in `item`: either every one
   * of its tuples reached `atLeast`, or all of them are ignored.
   */
  binSettled(item: string, bin: Bin): boolean {
    return this.descendantCount(item, bin) === 0;
  }

  sample(trx: Transaction): void {
    const relevant = this._points.map((point) => point.relevantBins(trx));
    this._newHits = [];
    for (const tuple of cartesian(relevant)) {
      const state = this._tuples.get(binKey(tuple));
      if (!state) continue;
      state.hits++;
      this._newHits.push(tuple);
      if (state.hits !== this.atLeast) continue;
      this._coveredTuples++;
      tuple.forEach((bin, d) => {
        const counts = this.dimension(d);
        const left = (counts.get(bin) ?? 0) - 1;
        counts.set(bin, left);
        if (left === 0) {
          const item = this.items[d];
          if (item !== undefined) this._coveredBins.get(item)?.push(bin);
        }
      });
    }
  }

  statusField(field: StatusField): StatusValue {
    switch (field) {
      case "atLeast":
        return this.atLeast;
      case "weight":
        return this.weight;
      case "size":
        return this.size;
      case "coverage":
        return this.coverage;
      case "coverPercentage":
        return this.coverPercentage;
      case "coveredBins":
        return Object.fromEntries(this.items.map((item) => [item, [...this.coveredBins(item)]]));
      case "newHits":
        return this._newHits.map((tuple) => [...tuple]);
      case "detailedCoverage":
        return Object.fromEntries(
          [...this._tuples.values()].map(({ tuple, hits }) => [tuple.join(","), hits]),
        );
      case "binCount":
        return Object.fromEntries(
          this.items.map((item) => [
            item,
            Object.fromEntries(
              [...(this._descendants.get(item) ?? new Map<Bin, number>())].map(([bin, n]) => [
                String(bin),
                n,
              ]),
            ),
          ]),
        );
    }
  }

  /** Every non-ignored tuple with its hit count, in enumeration order. */
  tuples(): { tuple: BinTuple; hits: number }[] {
    return [...this._tuples.values()].map(({ tuple, hits }) => ({ tuple, hits }));
  }

  private dimension(d: number): Map<Bin, number> {
    const item = this.items[d];
    const counts = item === undefined ? undefined : this._descendants.get(item);
    if (!counts) {
      throw new CoverageError(this.name, `no dimension ${d}`);
    }
    return counts;
  }
}
