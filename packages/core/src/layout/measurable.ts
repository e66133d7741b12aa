import { RailError } from "../errors.js";
import type { VNode } from "../widgets/types.js";
import { clampSize } from "./constraints.js";
import { measureNode } from "./measureNode.js";
import type { Constraints, Size } from "./types.js";

/** A measured child: its final size, ready to be placed by its parent. */
export type Placeable = Size;

/**
 * Opaque measurable proxy handed to container policies.
 *
 * Intrinsic queries must not have side effects; `measure` must return a size
 * inside `c`. Anything thrown here propagates out of the layout pass.
 */
export interface Measurable {
  maxIntrinsicWidth(height: number): number;
  maxIntrinsicHeight(width: number): number;
  measure(c: Constraints): Placeable;
}

/**
 * Wrap a widget VNode as a Measurable.
 *
 * Invalid props throw: a node that cannot be measured makes the whole pass fail.
 */
export function measurableNode(vnode: VNode): Measurable {
  const intrinsic = (maxW: number, maxH: number): Size => {
    const res = measureNode(vnode, maxW, maxH);
    if (!res.ok) {
      throw new RailError(res.fatal.code, res.fatal.detail);
    }
    return res.value;
  };

  return Object.freeze({
    maxIntrinsicWidth(height: number): number {
      return intrinsic(Number.POSITIVE_INFINITY, height).w;
    },
    maxIntrinsicHeight(width: number): number {
      return intrinsic(width, Number.POSITIVE_INFINITY).h;
    },
    measure(c: Constraints): Placeable {
      return clampSize(intrinsic(c.maxW, c.maxH), c);
    },
  });
}
