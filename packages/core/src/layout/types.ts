/**
 * Layout primitive type definitions.
 *
 * All coordinates and extents are in terminal cell units.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in terminal cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** Offset from a container origin. */
export type Point = Readonly<{ x: number; y: number }>;

/**
 * Packing direction of a linear container.
 * `horizontal` packs along x (row), `vertical` packs along y (column).
 */
export type Orientation = "horizontal" | "vertical";

/**
 * Min/max box handed down by a parent.
 *
 * Notes:
 * - `maxW`/`maxH` may be `Infinity` (unbounded probe).
 * - mins are always finite.
 */
export type Constraints = Readonly<{
  minW: number;
  maxW: number;
  minH: number;
  maxH: number;
}>;
