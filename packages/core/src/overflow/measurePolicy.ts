/**
 * packages/core/src/overflow/measurePolicy.ts: Adaptive overflow packing.
 *
 * Packs an ordered list of measurables along one axis, reserving room for an
 * overflow indicator, and reports how many items stayed inline.
 *
 * Pass outline:
 *   1. reserve: max intrinsic main extent of the indicator candidates
 *   2. greedy: accept items while they fit in `mainMax - reserved`; the last
 *      item may also take the reserved slot; a finite cap stops one early
 *   3. indicator: measured only when something overflowed, against whatever
 *      is left plus the reservation
 *   4. place: items back to back from the origin, indicator right after
 *
 * Invariants:
 *   - remaining space is never negative
 *   - totalItemCount is written before packing; visibleItemCount after, and
 *     clamped to the new total up front so a throwing measurable leaves
 *     visible <= total
 *   - identical inputs produce identical counts, size and placements
 *   - errors thrown by a measurable are not caught
 */

import { type AxisAccessor, axisFor } from "../layout/axis.js";
import { looseConstraints } from "../layout/constraints.js";
import { clampInto, clampNonNegative } from "../layout/engine/bounds.js";
import type { Measurable, Placeable } from "../layout/measurable.js";
import type { Constraints, Orientation, Rect, Size } from "../layout/types.js";
import type { MutableOverflowState } from "./state.js";

export type OverflowPlacement =
  | Readonly<{ kind: "item"; index: number; rect: Rect }>
  | Readonly<{ kind: "overflow"; rect: Rect }>;

export type OverflowMeasureResult = Readonly<{
  /** Final container size, clamped into the incoming constraints. */
  size: Size;
  /** Origin-relative placements: accepted items in order, then the indicator if any. */
  placements: readonly OverflowPlacement[];
  visibleItemCount: number;
  totalItemCount: number;
  /** Main-axis cells set aside for the indicator before packing. */
  reservedExtent: number;
}>;

export type OverflowMeasurePolicyOptions = Readonly<{
  orientation: Orientation;
  /** Ceiling on inline items. Default: unbounded. */
  maxItemCount?: number;
  state: MutableOverflowState;
}>;

export type OverflowMeasurePolicy = Readonly<{
  orientation: Orientation;
  maxItemCount: number;
  measure: (
    contentCandidates: readonly Measurable[],
    overflowCandidates: readonly Measurable[],
    incoming: Constraints,
  ) => OverflowMeasureResult;
}>;

/** Largest intrinsic main extent among `candidates`, or 0 when there are none. */
export function maxIntrinsicMainExtent(
  axis: AxisAccessor,
  candidates: readonly Measurable[],
  crossBound: number,
): number {
  let max = 0;
  for (const candidate of candidates) {
    max = Math.max(max, axis.maxIntrinsicMain(candidate, crossBound));
  }
  return max;
}

function placeAt(axis: AxisAccessor, mainOffset: number, placeable: Placeable): Rect {
  const { x, y } = axis.toOffset(mainOffset, 0);
  return { x, y, w: placeable.w, h: placeable.h };
}

export function createOverflowMeasurePolicy(
  opts: OverflowMeasurePolicyOptions,
): OverflowMeasurePolicy {
  const axis = axisFor(opts.orientation);
  const maxItemCount = opts.maxItemCount ?? Number.POSITIVE_INFINITY;
  const state = opts.state;

  const measure = (
    contentCandidates: readonly Measurable[],
    overflowCandidates: readonly Measurable[],
    incoming: Constraints,
  ): OverflowMeasureResult => {
    const loose = looseConstraints(incoming);
    const crossMax = axis.crossMax(incoming);

    const reservedExtent = maxIntrinsicMainExtent(axis, overflowCandidates, crossMax);
    let remaining = clampNonNegative(axis.mainMax(incoming) - reservedExtent);

    const total = contentCandidates.length;
    state.totalItemCount = total;
    state.visibleItemCount = Math.min(state.visibleItemCount, total);

    const accepted: Placeable[] = [];
    let mainSum = 0;
    let crossExtent = 0;
    const lastIndex = total - 1;

    for (let i = 0; i < total; i++) {
      const candidate = contentCandidates[i];
      if (candidate === undefined) break;
      const isLast = i === lastIndex;
      if (!isLast && i === maxItemCount - 1) break;

      const placeable = candidate.measure(loose);
      const extent = axis.main(placeable);
      const hasRoom = extent <= remaining || (isLast && extent <= remaining + reservedExtent);
      if (!hasRoom) break;

      accepted.push(placeable);
      mainSum += extent;
      crossExtent = Math.max(crossExtent, axis.cross(placeable));
      remaining = clampNonNegative(remaining - extent);
    }

    const visible = accepted.length;
    state.visibleItemCount = visible;

    let indicator: Placeable | null = null;
    if (visible < total) {
      const indicatorConstraints = axis.toConstraints(
        0,
        remaining + reservedExtent,
        0,
        axis.crossMax(loose),
      );
      for (const candidate of overflowCandidates) {
        const placeable = candidate.measure(indicatorConstraints);
        if (indicator === null || axis.main(placeable) > axis.main(indicator)) {
          indicator = placeable;
        }
        crossExtent = Math.max(crossExtent, axis.cross(placeable));
      }
    }

    const indicatorExtent = indicator === null ? 0 : axis.main(indicator);
    const size = axis.toSize(
      clampInto(mainSum + indicatorExtent, axis.mainMin(incoming), axis.mainMax(incoming)),
      clampInto(crossExtent, axis.crossMin(incoming), crossMax),
    );

    const placements: OverflowPlacement[] = [];
    let offset = 0;
    for (let i = 0; i < accepted.length; i++) {
      const placeable = accepted[i];
      if (placeable === undefined) continue;
      placements.push({ kind: "item", index: i, rect: placeAt(axis, offset, placeable) });
      offset += axis.main(placeable);
    }
    if (indicator !== null) {
      placements.push({ kind: "overflow", rect: placeAt(axis, offset, indicator) });
    }

    return Object.freeze({
      size,
      placements: Object.freeze(placements),
      visibleItemCount: visible,
      totalItemCount: total,
      reservedExtent,
    });
  };

  return Object.freeze({ orientation: opts.orientation, maxItemCount, measure });
}
