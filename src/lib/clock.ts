import { CLOCK_VECTORS, checkHour } from "./directions";
import { InvalidDirectionError } from "./errors";
import { Hex } from "./hex";
import type { Orientation } from "./layout";

// How the fixed clock table reads on screen. The vectors never change with the
// orientation; only the hour they appear at does.

export type CompassPoint = "N" | "NE" | "E" | "SE" | "S" | "SW" | "W" | "NW";

const COMPASS_AT_HOUR: readonly CompassPoint[] = [
  "N", // 12
  "NE",
  "NE",
  "E",
  "SE",
  "SE",
  "S",
  "SW",
  "SW",
  "W",
  "NW",
  "NW",
];

const ODD_HOURS = [1, 3, 5, 7, 9, 11] as const;

/**
 * Hour (1..12) at which the vector of `hour` is drawn under `orientation`.
 * Flat layouts turn everything by half a side, i.e. one hour clockwise.
 * Custom orientations read like pointy ones.
 */
export const clockPosition = (hour: number, orientation: Orientation): number => {
  const index = checkHour(hour);
  return orientation.kind === "flat" ? index + 1 : index === 0 ? 12 : index;
};

/** Neighbor directions by compass point: NE E SE SW W NW (pointy) or N NE SE S SW NW (flat). */
export const compass = (orientation: Orientation): ReadonlyMap<CompassPoint, Hex> => {
  const points = new Map<CompassPoint, Hex>();
  for (const hour of ODD_HOURS) {
    const position = clockPosition(hour, orientation);
    points.set(COMPASS_AT_HOUR[position % 12], Hex.fromCube(CLOCK_VECTORS[hour]));
  }
  return points;
};

export const compassNeighbor = (hex: Hex, point: CompassPoint, orientation: Orientation): Hex => {
  const step = compass(orientation).get(point);
  if (!step) {
    const valid = [...compass(orientation).keys()].join(", ");
    throw new InvalidDirectionError(`A ${orientation.kind} layout has no "${point}" neighbor; use one of ${valid}`);
  }
  return hex.add(step);
};
