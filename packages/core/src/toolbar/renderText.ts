/**
 * Plain-text rasterizer for toolbars.
 *
 * Draws a ToolbarLayout into a grid of cells and returns one string per row.
 * Wide clusters take two cells; zero-width clusters attach to the previous
 * cell. Leaf text that does not fit its rect is cut with an ellipsis.
 */

import { type LayoutResult, ok } from "../layout/engine/result.js";
import { measureNode } from "../layout/measureNode.js";
import { segmentGraphemes, truncateWithEllipsis } from "../layout/textMeasure.js";
import type { Rect } from "../layout/types.js";
import type { VNode } from "../widgets/types.js";
import type { ToolbarLayout } from "./toolbar.js";

type CellGrid = Readonly<{ w: number; h: number; rows: string[][] }>;

function createGrid(w: number, h: number): CellGrid {
  const rows: string[][] = [];
  for (let y = 0; y < h; y++) rows.push(new Array<string>(w).fill(" "));
  return { w, h, rows };
}

function gridLines(grid: CellGrid): readonly string[] {
  return Object.freeze(grid.rows.map((cells) => cells.join("")));
}

function drawText(grid: CellGrid, x: number, y: number, text: string, maxW: number): void {
  const cells = grid.rows[y];
  if (cells === undefined) return;
  const clipRight = Math.min(grid.w, x + maxW);
  let cx = x;
  for (const { segment, width } of segmentGraphemes(truncateWithEllipsis(text, maxW))) {
    if (width === 0) {
      if (cx > x) cells[cx - 1] = `${cells[cx - 1] ?? ""}${segment}`;
      continue;
    }
    if (cx + width > clipRight) break;
    if (cx >= 0) cells[cx] = segment;
    if (width === 2 && cx + 1 < grid.w) cells[cx + 1] = "";
    cx += width;
  }
}

/** Single-line text of a leaf widget, or null for stacks. */
export function leafText(vnode: VNode): string | null {
  switch (vnode.kind) {
    case "text":
      return vnode.text;
    case "icon":
      return vnode.props.label ? `${vnode.props.glyph} ${vnode.props.label}` : vnode.props.glyph;
    case "button": {
      const px = vnode.props.px ?? 1;
      if (px <= 0) return vnode.props.label;
      const pad = " ".repeat(px - 1);
      return `[${pad}${vnode.props.label}${pad}]`;
    }
    case "toggle":
      return vnode.props.checked ? `[${vnode.props.label}]` : ` ${vnode.props.label} `;
    case "menuItem": {
      const { checked, icon, label } = vnode.props;
      const check = checked === undefined ? "" : checked ? "[x] " : "[ ] ";
      return `${check}${icon ? `${icon} ` : ""}${label}`;
    }
    case "row":
    case "column":
      return null;
  }
}

function drawNode(grid: CellGrid, vnode: VNode, rect: Rect): LayoutResult<null> {
  if (vnode.kind !== "row" && vnode.kind !== "column") {
    const text = leafText(vnode);
    if (text !== null && rect.h > 0) drawText(grid, rect.x, rect.y, text, rect.w);
    return ok(null);
  }

  const gap = vnode.props.gap ?? 0;
  let offset = 0;
  for (let i = 0; i < vnode.children.length; i++) {
    const child = vnode.children[i];
    if (child === undefined) continue;
    if (i > 0) offset += gap;
    const isRow = vnode.kind === "row";
    const maxW = isRow ? Math.max(0, rect.w - offset) : rect.w;
    const maxH = isRow ? rect.h : Math.max(0, rect.h - offset);
    const sizeRes = measureNode(child, maxW, maxH);
    if (!sizeRes.ok) return sizeRes;
    const { w, h } = sizeRes.value;
    const childRect = isRow
      ? { x: rect.x + offset, y: rect.y, w, h }
      : { x: rect.x, y: rect.y + offset, w, h };
    const res = drawNode(grid, child, childRect);
    if (!res.ok) return res;
    offset += isRow ? w : h;
  }
  return ok(null);
}

/**
 * Rasterize the inline forms and the overflow indicator.
 * Returns `rect.h` lines of exactly `rect.w` cells.
 */
export function renderToolbarText(layout: ToolbarLayout): LayoutResult<readonly string[]> {
  const { rect } = layout;
  const grid = createGrid(rect.w, rect.h);
  const local = (r: Rect): Rect => ({ x: r.x - rect.x, y: r.y - rect.y, w: r.w, h: r.h });

  for (const entry of layout.inline) {
    const res = drawNode(grid, entry.vnode, local(entry.rect));
    if (!res.ok) return res;
  }
  if (layout.overflow !== null) {
    const res = drawNode(grid, layout.overflow.vnode, local(layout.overflow.rect));
    if (!res.ok) return res;
  }
  return ok(gridLines(grid));
}

/**
 * Rasterize the overflow menu entries, one block per entry, each line
 * exactly `width` cells.
 */
export function renderMenuText(
  layout: ToolbarLayout,
  width: number,
): LayoutResult<readonly string[]> {
  const lines: string[] = [];
  for (const entry of layout.menuEntries) {
    const sizeRes = measureNode(entry, width, Number.POSITIVE_INFINITY);
    if (!sizeRes.ok) return sizeRes;
    const grid = createGrid(width, sizeRes.value.h);
    const res = drawNode(grid, entry, { x: 0, y: 0, w: width, h: sizeRes.value.h });
    if (!res.ok) return res;
    lines.push(...gridLines(grid));
  }
  return ok(Object.freeze(lines));
}
