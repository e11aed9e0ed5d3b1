import { z } from "zod";
import { checkDirectionIndex } from "./directions";
import { InvalidLayoutError } from "./errors";
import { Hex } from "./hex";

export interface Point {
  readonly x: number;
  readonly y: number;
}

export type PointLike = Point | readonly [number, number];

/** Row-major 2×2 matrix: [m00, m01, m10, m11]. */
export type Matrix2 = readonly [number, number, number, number];

export interface Orientation {
  readonly kind: "pointy" | "flat" | "custom";
  /** axial (q, r) -> unit pixel */
  readonly forward: Matrix2;
  /** unit pixel -> axial (q, r) */
  readonly inverse: Matrix2;
  /** Angle of corner 0, in sixths of a turn. */
  readonly startAngle: number;
}

const SQRT3 = Math.sqrt(3);

/** Pointy-top: a corner points up, rows are horizontal. */
export const POINTY: Orientation = {
  kind: "pointy",
  forward: [SQRT3, SQRT3 / 2, 0, 3 / 2],
  inverse: [SQRT3 / 3, -1 / 3, 0, 2 / 3],
  startAngle: 0.5,
};

/** Flat-top: an edge faces up, columns are vertical. */
export const FLAT: Orientation = {
  kind: "flat",
  forward: [3 / 2, 0, SQRT3 / 2, SQRT3],
  inverse: [2 / 3, 0, -1 / 3, SQRT3 / 3],
  startAngle: 0,
};

/**
 * Orientation from an arbitrary forward matrix. The inverse is derived, so
 * the matrix must be invertible.
 */
export const customOrientation = (forward: Matrix2, startAngle = 0.5): Orientation => {
  const [a, b, c, d] = forward;
  const det = a * d - b * c;
  if (!Number.isFinite(det) || det === 0 || !Number.isFinite(startAngle)) {
    throw new InvalidLayoutError(`Orientation matrix [${forward.join(", ")}] is not invertible`);
  }
  return {
    kind: "custom",
    forward: [a, b, c, d],
    inverse: [d / det, -b / det, -c / det, a / det],
    startAngle,
  };
};

const toPoint = (value: number | PointLike, what: string): Point => {
  const point =
    typeof value === "number" ? { x: value, y: value }
    : "x" in value ? { x: value.x, y: value.y }
    : { x: value[0], y: value[1] };
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
    throw new InvalidLayoutError(`Layout ${what} must be finite, got (${point.x}, ${point.y})`);
  }
  return Object.freeze(point);
};

export const roundPoint = (p: Point): Point => ({ x: Math.round(p.x), y: Math.round(p.y) });

/**
 * Maps hexes to pixels and back.
 *
 * `size` is the distance from a cell's center to its corners; a `{x, y}` size
 * stretches cells. `origin` is the pixel where the origin hex is centered.
 */
export class Layout {
  readonly orientation: Orientation;
  readonly size: Point;
  readonly origin: Point;

  constructor(orientation: Orientation, size: number | PointLike = 1, origin: PointLike = { x: 0, y: 0 }) {
    this.orientation = orientation;
    this.size = toPoint(size, "size");
    this.origin = toPoint(origin, "origin");
    if (this.size.x === 0 || this.size.y === 0) {
      throw new InvalidLayoutError(`Layout size must be non-zero, got (${this.size.x}, ${this.size.y})`);
    }
    Object.freeze(this);
  }

  /** Exact pixel center of `hex`. */
  toPixel(hex: Hex): Point {
    const [f0, f1, f2, f3] = this.orientation.forward;
    const x = (f0 * hex.q + f1 * hex.r) * this.size.x;
    const y = (f2 * hex.q + f3 * hex.r) * this.size.y;
    return { x: x + this.origin.x, y: y + this.origin.y };
  }

  /** Fractional hex under `point`; use {@link Layout.hexAt} for the cell. */
  toHex(point: PointLike): Hex {
    const p = toPoint(point, "point");
    const [b0, b1, b2, b3] = this.orientation.inverse;
    const px = (p.x - this.origin.x) / this.size.x;
    const py = (p.y - this.origin.y) / this.size.y;
    return new Hex(b0 * px + b1 * py, b2 * px + b3 * py);
  }

  /** The cell containing `point`. */
  hexAt(point: PointLike): Hex {
    return this.toHex(point).round();
  }

  /** Offset from a cell's center to its corner `index` (0..5). */
  cornerOffset(index: number): Point {
    const angle = (2 * Math.PI * (this.orientation.startAngle - checkDirectionIndex(index))) / 6;
    return { x: this.size.x * Math.cos(angle), y: this.size.y * Math.sin(angle) };
  }

  /**
   * The six corners of `hex` in corner order.
   * @param factor scales the polygon around the cell's center (0.9 leaves a gap between cells)
   */
  polygonCorners(hex: Hex, factor = 1): Point[] {
    const center = this.toPixel(hex);
    const corners: Point[] = [];
    for (let i = 0; i < 6; i++) {
      const offset = this.cornerOffset(i);
      corners.push({ x: center.x + offset.x * factor, y: center.y + offset.y * factor });
    }
    return corners;
  }

  get width(): number {
    return this.presetMetric("width", SQRT3 * this.size.x, 2 * this.size.x);
  }

  get height(): number {
    return this.presetMetric("height", 2 * this.size.y, SQRT3 * this.size.y);
  }

  /** Distance between the centers of horizontally adjacent cells. */
  get horizontalSpacing(): number {
    return this.presetMetric("horizontalSpacing", SQRT3 * this.size.x, (3 / 2) * this.size.x);
  }

  get verticalSpacing(): number {
    return this.presetMetric("verticalSpacing", (3 / 2) * this.size.y, SQRT3 * this.size.y);
  }

  private presetMetric(name: string, pointy: number, flat: number): number {
    switch (this.orientation.kind) {
      case "pointy": return pointy;
      case "flat": return flat;
      default:
        throw new InvalidLayoutError(`${name} is only defined for pointy and flat layouts`);
    }
  }

  toString(): string {
    const { size, origin } = this;
    return `Layout(${this.orientation.kind}, size=(${size.x}, ${size.y}), origin=(${origin.x}, ${origin.y}))`;
  }
}

export const pointyLayout = (size: number | PointLike = 1, origin: PointLike = { x: 0, y: 0 }): Layout =>
  new Layout(POINTY, size, origin);

export const flatLayout = (size: number | PointLike = 1, origin: PointLike = { x: 0, y: 0 }): Layout =>
  new Layout(FLAT, size, origin);

// -----------------------------
// Config
// -----------------------------

const finite = z.number().finite();

export const pointSchema = z.union([
  z.object({ x: finite, y: finite }),
  z.tuple([finite, finite]),
]);

export const layoutConfigSchema = z
  .object({
    orientation: z.enum(["pointy", "flat"]).default("pointy"),
    size: z.union([finite.refine((n) => n !== 0, "size must be non-zero"), pointSchema]).default(1),
    origin: pointSchema.default({ x: 0, y: 0 }),
  })
  .strict();

export type LayoutConfig = z.input<typeof layoutConfigSchema>;

/**
 * Builds a layout from plain configuration, e.g. a parsed settings file.
 * @throws InvalidLayoutError listing every problem zod found
 */
export const createLayout = (config: LayoutConfig = {}): Layout => {
  const parsed = layoutConfigSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new InvalidLayoutError(`Invalid layout config: ${problems.join("; ")}`);
  }
  const { orientation, size, origin } = parsed.data;
  return new Layout(orientation === "flat" ? FLAT : POINTY, size, origin);
};
