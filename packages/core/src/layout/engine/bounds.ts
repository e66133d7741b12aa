export function isNonNegativeInt(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

/** Clamp to `[0, +inf)`; NaN collapses to 0. */
export function clampNonNegative(n: number): number {
  return n > 0 ? n : 0;
}

export function clampInto(n: number, min: number, max: number): number {
  if (n < min) return min;
  if (n > max) return max;
  return n;
}
