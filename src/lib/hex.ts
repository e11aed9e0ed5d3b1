import {
  DivisionByZeroError,
  InvalidArgumentError,
  InvalidCoordinateError,
  UnsupportedOperandError,
  describeOperand,
} from "./errors";
import {
  DIAGONAL_VECTORS,
  DIRECTION_VECTORS,
  type CubeTuple,
  clockVector,
  diagonalVector,
  directionVector,
} from "./directions";

export type { CubeTuple } from "./directions";
export type Axial = readonly [number, number];
export type Axis = "q" | "r" | "s";
export type HexKey = string;

/** Tolerance for the zero-sum invariant and for comparing fractional hexes. */
export const EPS = 1e-9;

// Constant nudge applied to both ends of a line; it sums to zero and always
// points the same way, so a line through a cell edge resolves the same side.
const LINE_NUDGE: CubeTuple = [1e-6, 1e-6, -2e-6];

const collapseZero = (n: number): number => (n === 0 ? 0 : n);

// Integer triples must sum to exactly zero. Fractional ones may be off by
// EPS, or by a few ulps of the largest coordinate when that is larger.
const sumTolerance = (q: number, r: number, s: number): number => {
  if (Number.isInteger(q) && Number.isInteger(r) && Number.isInteger(s)) return 0;
  return Math.max(EPS, 4 * Number.EPSILON * Math.max(Math.abs(q), Math.abs(r), Math.abs(s)));
};

/** Rounds halves to the nearest even integer (2.5 -> 2, -1.5 -> -2). */
export const roundHalfEven = (n: number): number => {
  const floor = Math.floor(n);
  const diff = n - floor;
  if (diff < 0.5) return collapseZero(floor);
  if (diff > 0.5) return collapseZero(floor + 1);
  return collapseZero(floor % 2 === 0 ? floor : floor + 1);
};

const requireHex = (value: unknown, operation: string): Hex => {
  if (value instanceof Hex) return value;
  throw new UnsupportedOperandError(`Cannot ${operation} a Hex and ${describeOperand(value)}`);
};

const requireScalar = (value: unknown, operation: string): number => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  throw new UnsupportedOperandError(`Cannot ${operation} a Hex by ${describeOperand(value)}; expected a finite number`);
};

const requireSteps = (steps: number): number => {
  if (!Number.isInteger(steps)) {
    throw new InvalidArgumentError(`Rotation steps must be an integer, got ${steps}`);
  }
  return ((steps % 6) + 6) % 6;
};

/**
 * A hexagon in cube coordinates. Immutable; every operation returns a new Hex.
 *
 * `q + r + s` is always zero: exactly for integer hexes, within {@link EPS}
 * (or a few ulps at large magnitudes) for fractional ones.
 * Integer hexes identify grid cells; fractional ones come out of division,
 * interpolation and pixel conversion and are snapped back with {@link Hex.round}.
 *
 * @example
 * new Hex(1, 0).add(new Hex(1, 2));   // Hex(q=2, r=2, s=-4)
 * new Hex(4, -3).divide(2).round();   // Hex(q=2, r=-2, s=0)
 * new Hex(-1, -2, 3).rotateLeft();    // Hex(q=-3, r=1, s=2)
 */
export class Hex {
  readonly q: number;
  readonly r: number;
  readonly s: number;

  /**
   * @param s optional; derived as `-q - r` when omitted. When given it must
   *   agree with `q` and `r`, which makes cube input a checked form of axial input.
   * @throws InvalidCoordinateError on non-finite coordinates or a non-zero sum
   */
  constructor(q: number, r: number, s?: number) {
    if (!Number.isFinite(q) || !Number.isFinite(r) || (s !== undefined && !Number.isFinite(s))) {
      throw new InvalidCoordinateError(
        `Hex coordinates must be finite numbers, got q=${String(q)}, r=${String(r)}, s=${String(s)}`,
      );
    }
    const third = s ?? -q - r;
    if (Math.abs(q + r + third) > sumTolerance(q, r, third)) {
      throw new InvalidCoordinateError(`q + r + s must be 0, got ${q} + ${r} + ${third} = ${q + r + third}`);
    }
    this.q = collapseZero(q);
    this.r = collapseZero(r);
    this.s = collapseZero(third);
    Object.freeze(this);
  }

  static fromCube(cube: CubeTuple): Hex {
    return new Hex(cube[0], cube[1], cube[2]);
  }

  static fromAxial(axial: Axial): Hex {
    return new Hex(axial[0], axial[1]);
  }

  /** Parses the output of {@link Hex.key} ("q,r") or a "q,r,s" triple. */
  static fromKey(key: HexKey): Hex {
    const parts = key.split(",");
    if (parts.length !== 2 && parts.length !== 3) {
      throw new InvalidCoordinateError(`Invalid hex key: "${key}"`);
    }
    const [q, r, s] = parts.map((part) => (part.trim() === "" ? NaN : Number(part)));
    return new Hex(q, r, parts.length === 3 ? s : undefined);
  }

  get cube(): CubeTuple {
    return [this.q, this.r, this.s];
  }

  get axial(): Axial {
    return [this.q, this.r];
  }

  /** Stable string identity, usable as a Map/Set key. */
  get key(): HexKey {
    return `${this.q},${this.r}`;
  }

  get isInteger(): boolean {
    return Number.isInteger(this.q) && Number.isInteger(this.r) && Number.isInteger(this.s);
  }

  /** Hex-grid distance from the origin: the number of steps needed to walk there. */
  get length(): number {
    return (Math.abs(this.q) + Math.abs(this.r) + Math.abs(this.s)) / 2;
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Hex)) return false;
    if (this.isInteger && other.isInteger) {
      return this.q === other.q && this.r === other.r && this.s === other.s;
    }
    return Math.abs(this.q - other.q) <= EPS && Math.abs(this.r - other.r) <= EPS && Math.abs(this.s - other.s) <= EPS;
  }

  // -----------------------------
  // Arithmetic
  // -----------------------------

  add(other: Hex): Hex {
    const o = requireHex(other, "add");
    return new Hex(this.q + o.q, this.r + o.r, this.s + o.s);
  }

  subtract(other: Hex): Hex {
    const o = requireHex(other, "subtract");
    return new Hex(this.q - o.q, this.r - o.r, this.s - o.s);
  }

  scale(k: number): Hex {
    const factor = requireScalar(k, "scale");
    return new Hex(this.q * factor, this.r * factor, this.s * factor);
  }

  /** @throws DivisionByZeroError */
  divide(d: number): Hex {
    const divisor = requireScalar(d, "divide");
    if (divisor === 0) throw new DivisionByZeroError(`Cannot divide ${this} by zero`);
    return new Hex(this.q / divisor, this.r / divisor, this.s / divisor);
  }

  /** Division snapped to the nearest cell. */
  floorDivide(d: number): Hex {
    return this.divide(d).round();
  }

  /** Reflection through the origin. */
  negate(): Hex {
    return new Hex(-this.q, -this.r, -this.s);
  }

  distanceTo(other: Hex): number {
    return this.subtract(other).length;
  }

  /**
   * Nearest lattice cell. Each axis is rounded on its own, then the axis that
   * moved the most is recomputed from the other two so the sum stays zero.
   */
  round(): Hex {
    let q = roundHalfEven(this.q);
    let r = roundHalfEven(this.r);
    let s = roundHalfEven(this.s);

    const dq = Math.abs(q - this.q);
    const dr = Math.abs(r - this.r);
    const ds = Math.abs(s - this.s);

    if (dq > dr && dq > ds) {
      q = -r - s;
    } else if (dr > ds) {
      r = -q - s;
    } else {
      s = -q - r;
    }
    return new Hex(q, r, s);
  }

  // -----------------------------
  // Rotation / reflection
  // -----------------------------

  /** Rotates 60° per step around the origin; negative steps turn the other way. */
  rotateLeft(steps = 1): Hex {
    const { q, r, s } = this;
    switch (requireSteps(steps)) {
      case 0: return this;
      case 1: return new Hex(-s, -q, -r);
      case 2: return new Hex(r, s, q);
      case 3: return new Hex(-q, -r, -s);
      case 4: return new Hex(s, q, r);
      default: return new Hex(-r, -s, -q);
    }
  }

  rotateRight(steps = 1): Hex {
    return this.rotateLeft(-steps);
  }

  rotateLeftAround(center: Hex, steps = 1): Hex {
    const c = requireHex(center, "rotate around");
    return c.add(this.subtract(c).rotateLeft(steps));
  }

  rotateRightAround(center: Hex, steps = 1): Hex {
    return this.rotateLeftAround(center, -steps);
  }

  /** Mirrors across the line through the origin where `axis` is constant. */
  reflect(axis: Axis): Hex {
    const { q, r, s } = this;
    switch (axis) {
      case "q": return new Hex(q, s, r);
      case "r": return new Hex(s, r, q);
      case "s": return new Hex(r, q, s);
      default:
        throw new InvalidArgumentError(`Reflection axis must be "q", "r" or "s", got ${describeOperand(axis)}`);
    }
  }

  reflectAround(center: Hex, axis: Axis): Hex {
    const c = requireHex(center, "reflect around");
    return c.add(this.subtract(c).reflect(axis));
  }

  // -----------------------------
  // Neighbors
  // -----------------------------

  neighbor(index: number): Hex {
    return this.add(Hex.fromCube(directionVector(index)));
  }

  neighbors(): Hex[] {
    return DIRECTION_VECTORS.map((d) => this.add(Hex.fromCube(d)));
  }

  diagonalNeighbor(index: number): Hex {
    return this.add(Hex.fromCube(diagonalVector(index)));
  }

  diagonalNeighbors(): Hex[] {
    return DIAGONAL_VECTORS.map((d) => this.add(Hex.fromCube(d)));
  }

  /** Neighbor at a clock hour (1..12): odd hours are adjacent, even hours diagonal. */
  oClock(hour: number): Hex {
    return this.add(Hex.fromCube(clockVector(hour)));
  }

  // -----------------------------
  // Lerp / lines
  // -----------------------------

  /** Fractional point at `t` along the way to `other`. */
  lerpTo(other: Hex, t: number): Hex {
    const o = requireHex(other, "interpolate");
    if (typeof t !== "number" || !(t >= 0 && t <= 1)) {
      throw new InvalidArgumentError(`Interpolation parameter must be within [0, 1], got ${describeOperand(t)}`);
    }
    return new Hex(
      this.q + (o.q - this.q) * t,
      this.r + (o.r - this.r) * t,
      this.s + (o.s - this.s) * t,
    );
  }

  /** This hex shifted by a tiny constant offset, off every cell edge. */
  nudged(): Hex {
    return new Hex(this.q + LINE_NUDGE[0], this.r + LINE_NUDGE[1], this.s + LINE_NUDGE[2]);
  }

  /**
   * Cells on the straight line from this hex to `other`, both ends included.
   * The result is lazy and can be iterated any number of times.
   * @throws InvalidCoordinateError when either end is fractional; round it first
   */
  lineTo(other: Hex): Iterable<Hex> {
    const end = requireHex(other, "draw a line between");
    for (const h of [this, end]) {
      if (!h.isInteger) {
        throw new InvalidCoordinateError(`Lines need integer endpoints, got ${h}`);
      }
    }
    return {
      [Symbol.iterator]: () => drawLine(this, end),
    };
  }

  toString(): string {
    return `Hex(q=${this.q}, r=${this.r}, s=${this.s})`;
  }
}

function* drawLine(a: Hex, b: Hex): Generator<Hex, void, undefined> {
  const n = a.distanceTo(b);
  const from = a.nudged();
  const to = b.nudged();
  for (let i = 0; i <= n; i++) {
    yield from.lerpTo(to, n === 0 ? 0 : i / n).round();
  }
}

/** The origin cell. */
export const ORIGIN = new Hex(0, 0, 0);

export const direction = (index: number): Hex => Hex.fromCube(directionVector(index));

export const diagonal = (index: number): Hex => Hex.fromCube(diagonalVector(index));

export const hexClock = (hour: number): Hex => Hex.fromCube(clockVector(hour));

export const directions = (): Hex[] => DIRECTION_VECTORS.map(Hex.fromCube);

export const diagonals = (): Hex[] => DIAGONAL_VECTORS.map(Hex.fromCube);

/** Sort comparator by distance from the origin; hexes have no other order. */
export const compareByLength = (a: Hex, b: Hex): number => a.length - b.length;

export const isHex = (value: unknown): value is Hex => value instanceof Hex;
