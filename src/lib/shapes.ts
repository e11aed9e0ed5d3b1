import { InvalidArgumentError } from "./errors";
import { type Axis, Hex, ORIGIN } from "./hex";
import { ring, spiral } from "./traversal";

/**
 * Coordinate generators for common board shapes. Each returns every cell once,
 * in a fixed order, so maps built from them iterate reproducibly.
 */

/** `n` means `-n..n`; a pair is an inclusive `[min, max]`. */
export type Extent = number | readonly [number, number];

export type AxisPair = "qr" | "rq" | "qs" | "sq" | "rs" | "sr";

export interface ShapeOptions {
  /** Every cell is offset by this hex. Defaults to the origin. */
  origin?: Hex;
  /** Keep only the outline. */
  hollow?: boolean;
}

export interface RectangleOptions extends ShapeOptions {
  /** Which way rows are staggered; rectangles look rectangular only in the matching layout. */
  orientation?: "pointy" | "flat";
}

export interface ParallelogramOptions extends ShapeOptions {
  /** The two axes the extents run along; the third is derived. */
  axes?: AxisPair;
}

export interface TriangleOptions extends ShapeOptions {
  pointing?: "down" | "up";
}

const AXES: Record<AxisPair, readonly [Axis, Axis, Axis]> = {
  qr: ["q", "r", "s"],
  rq: ["r", "q", "s"],
  qs: ["q", "s", "r"],
  sq: ["s", "q", "r"],
  rs: ["r", "s", "q"],
  sr: ["s", "r", "q"],
};

const checkCount = (value: number, what: string): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${what} must be a non-negative integer, got ${value}`);
  }
  return value;
};

const toBounds = (extent: Extent, what: string): readonly [number, number] => {
  if (typeof extent === "number") {
    const n = checkCount(extent, what);
    return [-n, n];
  }
  const [min, max] = extent;
  if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
    throw new InvalidArgumentError(`${what} must be an integer [min, max] pair, got [${min}, ${max}]`);
  }
  return [min, max];
};

const hexOnAxes = (axes: AxisPair, first: number, second: number): Hex => {
  const [a, b, c] = AXES[axes];
  const coords: Record<Axis, number> = { q: 0, r: 0, s: 0 };
  coords[a] = first;
  coords[b] = second;
  coords[c] = -first - second;
  return new Hex(coords.q, coords.r, coords.s);
};

const place = (cells: Iterable<Hex>, origin: Hex = ORIGIN): Hex[] => {
  const seen = new Set<string>();
  const out: Hex[] = [];
  for (const cell of cells) {
    const h = origin.add(cell);
    if (seen.has(h.key)) continue;
    seen.add(h.key);
    out.push(h);
  }
  return out;
};

/** A regular hexagon, spiralling out from its center (`options.origin`). */
export const hexagon = (radius: number, options: ShapeOptions = {}): Hex[] =>
  place(options.hollow ? ring(ORIGIN, radius) : spiral(ORIGIN, radius), options.origin);

/**
 * Cells whose first axis lies in `first` and second axis in `second`;
 * the axes default to q and r.
 */
export const parallelogram = (first: Extent, second: Extent = first, options: ParallelogramOptions = {}): Hex[] => {
  const axes = options.axes ?? "qr";
  if (!Object.hasOwn(AXES, axes)) {
    throw new InvalidArgumentError(`Unknown axis pair "${axes}"`);
  }
  const [min1, max1] = toBounds(first, "First extent");
  const [min2, max2] = toBounds(second, "Second extent");

  const cells: Hex[] = [];
  for (let c1 = min1; c1 <= max1; c1++) {
    if (!options.hollow || c1 === min1 || c1 === max1) {
      for (let c2 = min2; c2 <= max2; c2++) cells.push(hexOnAxes(axes, c1, c2));
    } else {
      cells.push(hexOnAxes(axes, c1, min2), hexOnAxes(axes, c1, max2));
    }
  }
  return place(cells, options.origin);
};

/** Parallelogram with equal sides. */
export const rhombus = (size: Extent, options: ParallelogramOptions = {}): Hex[] => parallelogram(size, size, options);

/**
 * `width` × `height` cells with staggered rows (pointy) or columns (flat),
 * starting at `options.origin` in the top-left.
 */
export const rectangle = (width: number, height: number, options: RectangleOptions = {}): Hex[] => {
  const w = checkCount(width, "Width");
  const h = checkCount(height, "Height");
  const flat = options.orientation === "flat";
  const [outer, inner] = flat ? [w, h] : [h, w];

  const cells: Hex[] = [];
  for (let i = 0; i < outer; i++) {
    const shift = Math.floor(i / 2);
    const first = -shift;
    const last = inner - 1 - shift;
    const at = (j: number): Hex => (flat ? new Hex(i, j) : new Hex(j, i));
    if (!options.hollow || i === 0 || i === outer - 1) {
      for (let j = first; j <= last; j++) cells.push(at(j));
    } else if (inner > 0) {
      cells.push(at(first), at(last));
    }
  }
  return place(cells, options.origin);
};

export const square = (size: number, options: RectangleOptions = {}): Hex[] => rectangle(size, size, options);

/**
 * Triangle with `size + 1` cells per side, `(size + 1)(size + 2) / 2` in all.
 * The corner cell with q = 0 and r = 0 ("down") or r = size ("up") sits at `options.origin`.
 */
export const triangle = (size: number, options: TriangleOptions = {}): Hex[] => {
  const n = checkCount(size, "Triangle size");
  const up = options.pointing === "up";

  const cells: Hex[] = [];
  for (let q = 0; q <= n; q++) {
    const [rMin, rMax] = up ? [n - q, n] : [0, n - q];
    for (let r = rMin; r <= rMax; r++) {
      const edge = up ? q === n || r === n || q + r === n : q === 0 || r === 0 || q + r === n;
      if (!options.hollow || edge) cells.push(new Hex(q, r));
    }
  }
  return place(cells, options.origin);
};

/** Outline through the integer `corners`, closing back to the first one. */
export const polygon = (corners: readonly Hex[], options: Omit<ShapeOptions, "hollow"> = {}): Hex[] => {
  if (corners.length === 0) {
    throw new InvalidArgumentError("A polygon needs at least one corner");
  }
  const cells: Hex[] = [];
  corners.forEach((corner, i) => {
    cells.push(...corner.lineTo(corners[(i + 1) % corners.length]));
  });
  return place(cells, options.origin);
};
