import { getDefaultLayout } from "./default_layout";
import { InvalidCoordinateError, KeyNotFoundError, UnsupportedOperandError, describeOperand } from "./errors";
import { Hex, type HexKey } from "./hex";
import type { Layout } from "./layout";
import * as shapes from "./shapes";

/** A value, or a function producing one per cell. */
export type ValueSource<V> = V | ((hex: Hex) => V);

export interface HexBounds {
  readonly q: readonly [number, number];
  readonly r: readonly [number, number];
  readonly s: readonly [number, number];
}

export interface PixelBounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

interface Cell<V> {
  readonly hex: Hex;
  value: V;
}

// Any function is taken as a factory, so a map whose values are themselves
// functions has to be filled through a factory that returns them.
const isFactory = <V>(source: ValueSource<V>): source is (hex: Hex) => V => typeof source === "function";

const resolve = <V>(source: ValueSource<V>, hex: Hex): V => (isFactory(source) ? source(hex) : source);

const checkKey = (hex: unknown): Hex => {
  if (!(hex instanceof Hex)) {
    throw new UnsupportedOperandError(`HexMap keys must be Hex instances, got ${describeOperand(hex)}`);
  }
  if (!hex.isInteger) {
    throw new InvalidCoordinateError(`HexMap keys must have integer coordinates, got ${hex}`);
  }
  return hex;
};

/**
 * Sparse grid: integer hexes mapped to values of one type.
 *
 * Iteration follows insertion order, so a map built from a shape generator
 * always walks its cells the same way. Re-inserting a hex replaces its value
 * and keeps its position.
 */
export class HexMap<V> implements Iterable<[Hex, V]> {
  private readonly cells = new Map<HexKey, Cell<V>>();

  constructor(entries: Iterable<readonly [Hex, V]> = []) {
    for (const [hex, value] of entries) this.insert(hex, value);
  }

  static fromHexes<V>(hexes: Iterable<Hex>, fill: ValueSource<V>): HexMap<V> {
    return new HexMap<V>().insertAll(hexes, fill);
  }

  static hexagon<V>(radius: number, fill: ValueSource<V>, options?: shapes.ShapeOptions): HexMap<V> {
    return HexMap.fromHexes(shapes.hexagon(radius, options), fill);
  }

  static rectangle<V>(width: number, height: number, fill: ValueSource<V>, options?: shapes.RectangleOptions): HexMap<V> {
    return HexMap.fromHexes(shapes.rectangle(width, height, options), fill);
  }

  static square<V>(size: number, fill: ValueSource<V>, options?: shapes.RectangleOptions): HexMap<V> {
    return HexMap.fromHexes(shapes.square(size, options), fill);
  }

  static parallelogram<V>(
    first: shapes.Extent,
    second: shapes.Extent,
    fill: ValueSource<V>,
    options?: shapes.ParallelogramOptions,
  ): HexMap<V> {
    return HexMap.fromHexes(shapes.parallelogram(first, second, options), fill);
  }

  static rhombus<V>(size: shapes.Extent, fill: ValueSource<V>, options?: shapes.ParallelogramOptions): HexMap<V> {
    return HexMap.fromHexes(shapes.rhombus(size, options), fill);
  }

  static triangle<V>(size: number, fill: ValueSource<V>, options?: shapes.TriangleOptions): HexMap<V> {
    return HexMap.fromHexes(shapes.triangle(size, options), fill);
  }

  static polygon<V>(corners: readonly Hex[], fill: ValueSource<V>, options?: { origin?: Hex }): HexMap<V> {
    return HexMap.fromHexes(shapes.polygon(corners, options), fill);
  }

  get size(): number {
    return this.cells.size;
  }

  /** @throws InvalidCoordinateError for a fractional hex */
  insert(hex: Hex, value: V): this {
    const key = checkKey(hex);
    const existing = this.cells.get(key.key);
    if (existing) {
      existing.value = value;
    } else {
      this.cells.set(key.key, { hex: key, value });
    }
    return this;
  }

  insertAll(hexes: Iterable<Hex>, fill: ValueSource<V>): this {
    for (const hex of hexes) this.insert(hex, resolve(fill, hex));
    return this;
  }

  /** @throws KeyNotFoundError when `hex` is absent; see {@link HexMap.find} */
  get(hex: Hex): V {
    const cell = this.cells.get(checkKey(hex).key);
    if (!cell) throw new KeyNotFoundError(`${hex} is not in this HexMap`);
    return cell.value;
  }

  /** Like {@link HexMap.get} but returns undefined when `hex` is absent. */
  find(hex: Hex): V | undefined {
    return this.cells.get(checkKey(hex).key)?.value;
  }

  contains(hex: Hex): boolean {
    return this.cells.has(checkKey(hex).key);
  }

  /** @returns whether `hex` was present */
  remove(hex: Hex): boolean {
    return this.cells.delete(checkKey(hex).key);
  }

  clear(): void {
    this.cells.clear();
  }

  /** Replaces the value of every cell already in the map. */
  fill(source: ValueSource<V>): this {
    for (const cell of this.cells.values()) cell.value = resolve(source, cell.hex);
    return this;
  }

  *entries(): IterableIterator<[Hex, V]> {
    for (const { hex, value } of this.cells.values()) yield [hex, value];
  }

  *hexes(): IterableIterator<Hex> {
    for (const cell of this.cells.values()) yield cell.hex;
  }

  *values(): IterableIterator<V> {
    for (const cell of this.cells.values()) yield cell.value;
  }

  [Symbol.iterator](): IterableIterator<[Hex, V]> {
    return this.entries();
  }

  hexesWhere(predicate: (value: V, hex: Hex) => boolean): Hex[] {
    const out: Hex[] = [];
    for (const { hex, value } of this.cells.values()) {
      if (predicate(value, hex)) out.push(hex);
    }
    return out;
  }

  /** Cells holding any of `values`. */
  hexesWithValue(...values: V[]): Hex[] {
    return this.hexesWhere((v) => values.some((wanted) => Object.is(v, wanted)));
  }

  /** Min and max of each coordinate, or undefined for an empty map. */
  bounds(): HexBounds | undefined {
    if (this.cells.size === 0) return undefined;
    let q: [number, number] = [Infinity, -Infinity];
    let r: [number, number] = [Infinity, -Infinity];
    let s: [number, number] = [Infinity, -Infinity];
    for (const { hex } of this.cells.values()) {
      q = [Math.min(q[0], hex.q), Math.max(q[1], hex.q)];
      r = [Math.min(r[0], hex.r), Math.max(r[1], hex.r)];
      s = [Math.min(s[0], hex.s), Math.max(s[1], hex.s)];
    }
    return { q, r, s };
  }

  /** Pixel box around every cell polygon, or undefined for an empty map. */
  pixelBounds(layout?: Layout): PixelBounds | undefined {
    if (this.cells.size === 0) return undefined;
    const target = layout ?? getDefaultLayout();
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const { hex } of this.cells.values()) {
      for (const corner of target.polygonCorners(hex)) {
        minX = Math.min(minX, corner.x);
        minY = Math.min(minY, corner.y);
        maxX = Math.max(maxX, corner.x);
        maxY = Math.max(maxY, corner.y);
      }
    }
    return { minX, minY, maxX, maxY };
  }

  // -----------------------------
  // New maps
  // -----------------------------

  map<U>(fn: (value: V, hex: Hex) => U): HexMap<U> {
    const out = new HexMap<U>();
    for (const { hex, value } of this.cells.values()) out.insert(hex, fn(value, hex));
    return out;
  }

  copy(): HexMap<V> {
    return new HexMap(this.entries());
  }

  /** Every cell moved by `offset`. */
  shifted(offset: Hex): HexMap<V> {
    const out = new HexMap<V>();
    for (const { hex, value } of this.cells.values()) out.insert(hex.add(offset), value);
    return out;
  }

  /**
   * Cells of both maps. Where both have a cell, `merge` decides the value;
   * without it this map's value is kept.
   */
  union(other: HexMap<V>, merge?: (mine: V, theirs: V, hex: Hex) => V): HexMap<V> {
    const out = this.copy();
    for (const [hex, theirs] of other) {
      const mine = this.cells.get(hex.key);
      if (!mine) out.insert(hex, theirs);
      else if (merge) out.insert(hex, merge(mine.value, theirs, hex));
    }
    return out;
  }

  /** Cells present in both maps, valued as in {@link HexMap.union}. */
  intersection(other: HexMap<V>, merge?: (mine: V, theirs: V, hex: Hex) => V): HexMap<V> {
    const out = new HexMap<V>();
    for (const { hex, value } of this.cells.values()) {
      const theirs = other.cells.get(hex.key);
      if (theirs) out.insert(hex, merge ? merge(value, theirs.value, hex) : value);
    }
    return out;
  }

  /** Cells of this map that `other` lacks. */
  difference(other: HexMap<unknown>): HexMap<V> {
    const out = new HexMap<V>();
    for (const { hex, value } of this.cells.values()) {
      if (!other.contains(hex)) out.insert(hex, value);
    }
    return out;
  }

  /** Cells in exactly one of the two maps. */
  symmetricDifference(other: HexMap<V>): HexMap<V> {
    return this.difference(other).union(other.difference(this));
  }

  toString(): string {
    return `HexMap(size=${this.size})`;
  }
}
