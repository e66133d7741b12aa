/** Fatal error type for invalid layout input. */
export type InvalidPropsFatal = Readonly<{ code: "RAIL_INVALID_PROPS"; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Used throughout the layout system to propagate validation failures upward.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidPropsFatal }>;

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function invalidProps<T = never>(detail: string): LayoutResult<T> {
  return { ok: false, fatal: { code: "RAIL_INVALID_PROPS", detail } };
}
