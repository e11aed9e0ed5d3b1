import { InvalidRadiusError } from "./errors";
import { Hex, direction } from "./hex";

const RING_START_DIRECTION = 4;

const checkRadius = (radius: number): number => {
  if (!Number.isInteger(radius) || radius < 0) {
    throw new InvalidRadiusError(`Radius must be a non-negative integer, got ${radius}`);
  }
  return radius;
};

/**
 * Cells at exactly `radius` steps from `center`, walking once around the ring.
 * Starts at `center + direction(4) * radius` and follows directions 0..5.
 * Count = 6R (1 when R is 0).
 */
export const ring = (center: Hex, radius: number): Hex[] => {
  const R = checkRadius(radius);
  if (R === 0) return [center];

  let cell = center.add(direction(RING_START_DIRECTION).scale(R));
  const out: Hex[] = [];
  for (let side = 0; side < 6; side++) {
    for (let step = 0; step < R; step++) {
      out.push(cell);
      cell = cell.neighbor(side);
    }
  }
  return out;
};

/**
 * All cells within `radius` of `center` (a filled hexagon), column by column.
 * Count = 1 + 3R(R+1)
 */
export const range = (center: Hex, radius: number): Hex[] => {
  const R = checkRadius(radius);
  const out: Hex[] = [];
  for (let dq = -R; dq <= R; dq++) {
    for (let dr = Math.max(-R, -dq - R); dr <= Math.min(R, -dq + R); dr++) {
      out.push(center.add(new Hex(dq, dr)));
    }
  }
  return out;
};

/** Same cells as {@link range}, ordered ring by ring outwards from the center. */
export const spiral = (center: Hex, radius: number): Hex[] => {
  const R = checkRadius(radius);
  const out: Hex[] = [center];
  for (let k = 1; k <= R; k++) out.push(...ring(center, k));
  return out;
};

/** Free-function form of {@link Hex.lineTo}. */
export const line = (from: Hex, to: Hex): Iterable<Hex> => from.lineTo(to);

/** Whether `hex` lies on the outer ring of a hexagon of `radius` around `center`. */
export const isOnRing = (hex: Hex, center: Hex, radius: number): boolean =>
  hex.distanceTo(center) === checkRadius(radius);
