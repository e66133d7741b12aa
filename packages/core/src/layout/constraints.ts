/**
 * Constraint box helpers.
 *
 * Converts between parent-provided min/max boxes and concrete sizes. Every
 * helper returns a fresh frozen box; inputs are never mutated.
 */

import { clampInto, isNonNegativeInt } from "./engine/bounds.js";
import { type LayoutResult, invalidProps, ok } from "./engine/result.js";
import type { Constraints, Size } from "./types.js";

/** Unbounded probe box: no minimum, no maximum. */
export const UNBOUNDED_CONSTRAINTS: Constraints = Object.freeze({
  minW: 0,
  maxW: Number.POSITIVE_INFINITY,
  minH: 0,
  maxH: Number.POSITIVE_INFINITY,
});

export function constraints(
  minW: number,
  maxW: number,
  minH: number,
  maxH: number,
): Constraints {
  return Object.freeze({ minW, maxW, minH, maxH });
}

/** Box that only admits exactly `w` x `h`. */
export function fixedConstraints(w: number, h: number): Constraints {
  return constraints(w, w, h, h);
}

/** Box with the given maxima and no minimum. */
export function maxConstraints(maxW: number, maxH: number): Constraints {
  return constraints(0, maxW, 0, maxH);
}

/**
 * Drop both minimums to zero.
 *
 * Used for intrinsic probing so a child never reports growth that only came
 * from a forced minimum.
 */
export function looseConstraints(c: Constraints): Constraints {
  if (c.minW === 0 && c.minH === 0) return c;
  return constraints(0, c.maxW, 0, c.maxH);
}

export function clampSize(size: Size, c: Constraints): Size {
  return Object.freeze({
    w: clampInto(size.w, c.minW, c.maxW),
    h: clampInto(size.h, c.minH, c.maxH),
  });
}

function isMaxExtent(n: unknown): n is number {
  return isNonNegativeInt(n) || n === Number.POSITIVE_INFINITY;
}

/**
 * Validate a constraint box coming from a host.
 *
 * Rules:
 *   - mins are int >= 0
 *   - maxes are int >= 0 or +Infinity
 *   - min <= max on each axis
 */
export function validateConstraints(c: Constraints): LayoutResult<Constraints> {
  if (!isNonNegativeInt(c.minW) || !isNonNegativeInt(c.minH)) {
    return invalidProps(
      `constraints: minW/minH must be int >= 0 (got ${String(c.minW)}x${String(c.minH)})`,
    );
  }
  if (!isMaxExtent(c.maxW) || !isMaxExtent(c.maxH)) {
    return invalidProps(
      `constraints: maxW/maxH must be int >= 0 or Infinity (got ${String(c.maxW)}x${String(c.maxH)})`,
    );
  }
  if (c.minW > c.maxW || c.minH > c.maxH) {
    return invalidProps("constraints: min must not exceed max");
  }
  return ok(c);
}
