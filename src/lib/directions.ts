import { InvalidDirectionError } from "./errors";

export type CubeTuple = readonly [number, number, number];

// Index -> vector tables. These never depend on the layout; only the way a
// vector is labelled on screen does (see clock.ts).

export const DIRECTION_VECTORS: readonly CubeTuple[] = [
  [1, 0, -1],
  [1, -1, 0],
  [0, -1, 1],
  [-1, 0, 1],
  [-1, 1, 0],
  [0, 1, -1],
];

export const DIAGONAL_VECTORS: readonly CubeTuple[] = [
  [2, -1, -1],
  [1, -2, 1],
  [-1, -1, 2],
  [-2, 1, 1],
  [-1, 2, -1],
  [1, 1, -2],
];

/**
 * Twelve-hour clock, indexed by `hour % 12` (so 12 lives at index 0).
 * Odd hours are direct neighbors, even hours diagonals.
 */
export const CLOCK_VECTORS: readonly CubeTuple[] = [
  [1, -2, 1], // 12
  [1, -1, 0], // 1
  [2, -1, -1], // 2
  [1, 0, -1], // 3
  [1, 1, -2], // 4
  [0, 1, -1], // 5
  [-1, 2, -1], // 6
  [-1, 1, 0], // 7
  [-2, 1, 1], // 8
  [-1, 0, 1], // 9
  [-1, -1, 2], // 10
  [0, -1, 1], // 11
];

export const DIRECTION_COUNT = 6;

export const checkDirectionIndex = (index: number): number => {
  if (!Number.isInteger(index) || index < 0 || index >= DIRECTION_COUNT) {
    throw new InvalidDirectionError(`Direction index must be an integer in 0..5, got ${index}`);
  }
  return index;
};

export const checkHour = (hour: number): number => {
  if (!Number.isInteger(hour) || hour < 1 || hour > 12) {
    throw new InvalidDirectionError(`Clock hour must be an integer in 1..12, got ${hour}`);
  }
  return hour % 12;
};

export const directionVector = (index: number): CubeTuple => DIRECTION_VECTORS[checkDirectionIndex(index)];

export const diagonalVector = (index: number): CubeTuple => DIAGONAL_VECTORS[checkDirectionIndex(index)];

export const clockVector = (hour: number): CubeTuple => CLOCK_VECTORS[checkHour(hour)];
