/**
 * Intrinsic widget measurement.
 *
 * Every widget is measured against a max box and reports the size it wants,
 * already capped to that box. Leaves are single-row; stacks sum along their
 * own axis and take the max across it.
 *
 * Invariants:
 *   - returned sizes are int >= 0 and never exceed maxW/maxH
 *   - maxW/maxH may be Infinity (intrinsic probe)
 *   - invalid numeric props produce a fatal result, never a throw
 */

import type { VNode } from "../widgets/types.js";
import { clampNonNegative, isNonNegativeInt } from "./engine/bounds.js";
import { type LayoutResult, invalidProps, ok } from "./engine/result.js";
import { measureTextCells } from "./textMeasure.js";
import type { Size } from "./types.js";

/** Width of the "[x] " check column in menu items. */
export const MENU_CHECK_COLUMN_WIDTH = 4;

function leaf(w: number, maxW: number, maxH: number): LayoutResult<Size> {
  return ok({ w: Math.min(maxW, w), h: Math.min(maxH, 1) });
}

function optionalNonNegativeInt(
  value: unknown,
  fallback: number,
  name: string,
): LayoutResult<number> {
  if (value === undefined) return ok(fallback);
  if (!isNonNegativeInt(value)) {
    return invalidProps(`${name} must be an int >= 0 (got ${String(value)})`);
  }
  return ok(value);
}

function measureStack(
  children: readonly VNode[],
  gapRaw: unknown,
  kind: "row" | "column",
  maxW: number,
  maxH: number,
): LayoutResult<Size> {
  const gapRes = optionalNonNegativeInt(gapRaw, 0, `${kind}.gap`);
  if (!gapRes.ok) return gapRes;
  const gap = gapRes.value;

  let main = 0;
  let cross = 0;
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (child === undefined) continue;
    if (i > 0) main += gap;
    const res =
      kind === "row"
        ? measureNode(child, clampNonNegative(maxW - main), maxH)
        : measureNode(child, maxW, clampNonNegative(maxH - main));
    if (!res.ok) return res;
    main += kind === "row" ? res.value.w : res.value.h;
    cross = Math.max(cross, kind === "row" ? res.value.h : res.value.w);
  }

  return kind === "row"
    ? ok({ w: Math.min(maxW, main), h: Math.min(maxH, cross) })
    : ok({ w: Math.min(maxW, cross), h: Math.min(maxH, main) });
}

export function measureNode(vnode: VNode, maxW: number, maxH: number): LayoutResult<Size> {
  switch (vnode.kind) {
    case "text": {
      const capRes = optionalNonNegativeInt(
        vnode.props.maxWidth,
        Number.POSITIVE_INFINITY,
        "text.maxWidth",
      );
      if (!capRes.ok) return capRes;
      return leaf(Math.min(measureTextCells(vnode.text), capRes.value), maxW, maxH);
    }
    case "icon": {
      const { glyph, label } = vnode.props;
      const labelW = label ? measureTextCells(label) + 1 : 0;
      return leaf(measureTextCells(glyph) + labelW, maxW, maxH);
    }
    case "button": {
      const pxRes = optionalNonNegativeInt(vnode.props.px, 1, "button.px");
      if (!pxRes.ok) return pxRes;
      return leaf(measureTextCells(vnode.props.label) + pxRes.value * 2, maxW, maxH);
    }
    case "toggle":
      return leaf(measureTextCells(vnode.props.label) + 2, maxW, maxH);
    case "menuItem": {
      const { label, icon, checked } = vnode.props;
      const checkW = checked === undefined ? 0 : MENU_CHECK_COLUMN_WIDTH;
      const iconW = icon ? measureTextCells(icon) + 1 : 0;
      return leaf(checkW + iconW + measureTextCells(label), maxW, maxH);
    }
    case "row":
    case "column":
      return measureStack(vnode.children, vnode.props.gap, vnode.kind, maxW, maxH);
  }
}
