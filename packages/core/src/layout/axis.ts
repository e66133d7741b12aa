/**
 * Orientation strategy.
 *
 * Linear containers are written once against a main/cross accessor pair and
 * parameterized with one of the two accessors below.
 */

import { constraints } from "./constraints.js";
import type { Measurable } from "./measurable.js";
import type { Constraints, Orientation, Point, Size } from "./types.js";

export type AxisAccessor = Readonly<{
  orientation: Orientation;
  main: (size: Size) => number;
  cross: (size: Size) => number;
  mainMin: (c: Constraints) => number;
  mainMax: (c: Constraints) => number;
  crossMin: (c: Constraints) => number;
  crossMax: (c: Constraints) => number;
  toSize: (main: number, cross: number) => Size;
  toOffset: (main: number, cross: number) => Point;
  toConstraints: (mainMin: number, mainMax: number, crossMin: number, crossMax: number) => Constraints;
  /** Intrinsic main-axis extent of `m` given the full `crossBound`. */
  maxIntrinsicMain: (m: Measurable, crossBound: number) => number;
}>;

export const HORIZONTAL_AXIS: AxisAccessor = Object.freeze({
  orientation: "horizontal",
  main: (size: Size) => size.w,
  cross: (size: Size) => size.h,
  mainMin: (c: Constraints) => c.minW,
  mainMax: (c: Constraints) => c.maxW,
  crossMin: (c: Constraints) => c.minH,
  crossMax: (c: Constraints) => c.maxH,
  toSize: (main: number, cross: number) => ({ w: main, h: cross }),
  toOffset: (main: number, cross: number) => ({ x: main, y: cross }),
  toConstraints: (mainMin: number, mainMax: number, crossMin: number, crossMax: number) =>
    constraints(mainMin, mainMax, crossMin, crossMax),
  maxIntrinsicMain: (m: Measurable, crossBound: number) => m.maxIntrinsicWidth(crossBound),
});

export const VERTICAL_AXIS: AxisAccessor = Object.freeze({
  orientation: "vertical",
  main: (size: Size) => size.h,
  cross: (size: Size) => size.w,
  mainMin: (c: Constraints) => c.minH,
  mainMax: (c: Constraints) => c.maxH,
  crossMin: (c: Constraints) => c.minW,
  crossMax: (c: Constraints) => c.maxW,
  toSize: (main: number, cross: number) => ({ w: cross, h: main }),
  toOffset: (main: number, cross: number) => ({ x: cross, y: main }),
  toConstraints: (mainMin: number, mainMax: number, crossMin: number, crossMax: number) =>
    constraints(crossMin, crossMax, mainMin, mainMax),
  maxIntrinsicMain: (m: Measurable, crossBound: number) => m.maxIntrinsicHeight(crossBound),
});

export function axisFor(orientation: Orientation): AxisAccessor {
  return orientation === "horizontal" ? HORIZONTAL_AXIS : VERTICAL_AXIS;
}
