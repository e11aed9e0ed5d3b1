/**
 * hexlib.ts: hex grid algebra in CUBE coordinates.
 *
 * Coordinate system:
 *   - A Hex is (q, r, s) with invariant q + r + s = 0; `new Hex(q, r)` derives s.
 *   - Integer hexes are cells; fractional hexes come out of division, lerp and
 *     pixel conversion and are snapped back with `round()`.
 *   - Rendering orientation (pointy-top / flat-top) does NOT affect these mechanics.
 *
 * What you get:
 *   - Hex arithmetic, rounding, distance, rotation/reflection, neighbors (hex.ts)
 *   - Rings, filled ranges, spirals and lines (traversal.ts)
 *   - Pixel conversion + corner polygons for pointy/flat layouts (layout.ts)
 *   - An optional process-wide default layout (default_layout.ts)
 *   - Clock/compass naming of neighbor directions (clock.ts)
 *   - Board shapes (shapes.ts) and the sparse HexMap container (hex_map.ts)
 *
 * Notes:
 *   - For hashing in Maps/Sets, use `hex.key`.
 *   - Everything except HexMap is immutable.
 */

export {
  HexError,
  InvalidCoordinateError,
  UnsupportedOperandError,
  DivisionByZeroError,
  InvalidDirectionError,
  InvalidRadiusError,
  InvalidArgumentError,
  KeyNotFoundError,
  InvalidLayoutError,
  LayoutNotSetError,
} from "./errors";
export type { HexErrorCode } from "./errors";

export { DIRECTION_VECTORS, DIAGONAL_VECTORS, CLOCK_VECTORS } from "./directions";

export {
  Hex,
  EPS,
  ORIGIN,
  roundHalfEven,
  direction,
  diagonal,
  hexClock,
  directions,
  diagonals,
  compareByLength,
  isHex,
} from "./hex";
export type { Axial, Axis, CubeTuple, HexKey } from "./hex";

export { ring, range, spiral, line, isOnRing } from "./traversal";

export {
  Layout,
  POINTY,
  FLAT,
  customOrientation,
  pointyLayout,
  flatLayout,
  roundPoint,
  pointSchema,
  layoutConfigSchema,
  createLayout,
} from "./layout";
export type { Point, PointLike, Matrix2, Orientation, LayoutConfig } from "./layout";

export {
  setDefaultLayout,
  getDefaultLayout,
  hasDefaultLayout,
  clearDefaultLayout,
  withDefaultLayout,
  hexToPixel,
  pixelToHex,
  hexAtPixel,
  polygonCorners,
} from "./default_layout";

export { clockPosition, compass, compassNeighbor } from "./clock";
export type { CompassPoint } from "./clock";

export * as shapes from "./shapes";
export type {
  Extent,
  AxisPair,
  ShapeOptions,
  RectangleOptions,
  ParallelogramOptions,
  TriangleOptions,
} from "./shapes";

export { HexMap } from "./hex_map";
export type { ValueSource, HexBounds, PixelBounds } from "./hex_map";
