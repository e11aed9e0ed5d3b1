import { InvalidLayoutError, LayoutNotSetError, describeOperand } from "./errors";
import type { Hex } from "./hex";
import { Layout, type Point, type PointLike } from "./layout";

// Process-wide fallback used when a caller omits a layout. Unset until a
// caller sets it; nothing in the library sets it on its own.
let current: Layout | undefined;

export const setDefaultLayout = (layout: Layout): void => {
  if (!(layout instanceof Layout)) {
    throw new InvalidLayoutError(`Default layout must be a Layout, got ${describeOperand(layout)}`);
  }
  current = layout;
};

/** @throws LayoutNotSetError */
export const getDefaultLayout = (): Layout => {
  if (!current) throw new LayoutNotSetError();
  return current;
};

export const hasDefaultLayout = (): boolean => current !== undefined;

export const clearDefaultLayout = (): void => {
  current = undefined;
};

/**
 * Runs `fn` with `layout` as the default and restores the previous default
 * afterwards, also when `fn` throws.
 */
export const withDefaultLayout = <T>(layout: Layout, fn: () => T): T => {
  const previous = current;
  setDefaultLayout(layout);
  try {
    return fn();
  } finally {
    current = previous;
  }
};

export const hexToPixel = (hex: Hex, layout: Layout = getDefaultLayout()): Point => layout.toPixel(hex);

/** Fractional hex under `point`; round it to get the cell. */
export const pixelToHex = (point: PointLike, layout: Layout = getDefaultLayout()): Hex => layout.toHex(point);

export const hexAtPixel = (point: PointLike, layout: Layout = getDefaultLayout()): Hex => layout.hexAt(point);

export const polygonCorners = (hex: Hex, layout: Layout = getDefaultLayout(), factor = 1): Point[] =>
  layout.polygonCorners(hex, factor);
