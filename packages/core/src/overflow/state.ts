/**
 * Last computed overflow outcome.
 *
 * One record per container instance. The measure policy is the only writer;
 * hosts and persistence read it through the readonly view.
 */

import { RailError } from "../errors.js";
import { isNonNegativeInt } from "../layout/engine/bounds.js";
import { type Saver, listSaver } from "../state/savedState.js";

export type OverflowState = Readonly<{
  /** Items declared at the last measurement. */
  totalItemCount: number;
  /** Items placed inline; `[visibleItemCount, totalItemCount)` is the overflow suffix. */
  visibleItemCount: number;
}>;

/** Writer view handed to the measure policy. */
export type MutableOverflowState = {
  totalItemCount: number;
  visibleItemCount: number;
};

export type OverflowRange = Readonly<{ start: number; end: number }>;

export function isValidOverflowCounts(totalItemCount: unknown, visibleItemCount: unknown): boolean {
  return (
    isNonNegativeInt(totalItemCount) &&
    isNonNegativeInt(visibleItemCount) &&
    visibleItemCount <= totalItemCount
  );
}

export function createOverflowState(init?: OverflowState): MutableOverflowState {
  const totalItemCount = init?.totalItemCount ?? 0;
  const visibleItemCount = init?.visibleItemCount ?? 0;
  if (!isValidOverflowCounts(totalItemCount, visibleItemCount)) {
    throw new RailError(
      "RAIL_INVALID_STATE",
      `overflow state: expected 0 <= visible <= total (got visible=${String(visibleItemCount)}, total=${String(totalItemCount)})`,
    );
  }
  return { totalItemCount, visibleItemCount };
}

export function hasOverflow(state: OverflowState): boolean {
  return state.visibleItemCount < state.totalItemCount;
}

/** Index range of the items rendered only inside the overflow menu. */
export function overflowRange(state: OverflowState): OverflowRange {
  return Object.freeze({ start: state.visibleItemCount, end: state.totalItemCount });
}

/**
 * Persisted form: `[totalItemCount, visibleItemCount]`.
 * Restoring anything else yields null.
 */
export const overflowStateSaver: Saver<MutableOverflowState, readonly number[]> = listSaver<
  MutableOverflowState,
  number
>(
  (state) => [state.totalItemCount, state.visibleItemCount],
  (list) => {
    if (list.length !== 2) return null;
    const [totalItemCount, visibleItemCount] = list;
    if (!isValidOverflowCounts(totalItemCount, visibleItemCount)) return null;
    return { totalItemCount: Number(totalItemCount), visibleItemCount: Number(visibleItemCount) };
  },
);
