/**
 * packages/core/src/toolbar/toolbar.ts: Overflow toolbar host.
 *
 * Glues items to the overflow measure policy: renders inline forms, wraps them
 * as measurables, runs one packing pass and turns the origin-relative plan
 * into absolute rects. Items past the visible count are rendered in their
 * menu form for the overflow menu.
 *
 * One policy instance per toolbar: orientation and maxItemCount are fixed at
 * construction.
 */

import { createDevWarnings } from "../debug/log.js";
import { RailError } from "../errors.js";
import { validateConstraints } from "../layout/constraints.js";
import { type LayoutResult, ok } from "../layout/engine/result.js";
import { measurableNode } from "../layout/measurable.js";
import type { Constraints, Orientation, Rect } from "../layout/types.js";
import { createOverflowMeasurePolicy } from "../overflow/measurePolicy.js";
import {
  type MutableOverflowState,
  type OverflowState,
  createOverflowState,
  hasOverflow,
  overflowStateSaver,
} from "../overflow/state.js";
import { rememberSaveable } from "../state/savedState.js";
import type { VNode } from "../widgets/types.js";
import { type ToolbarConfig, validateToolbarConfig } from "./config.js";
import type { ItemSequence } from "./itemSequence.js";
import { type ToolbarItem, renderItemInMenu, renderItemInline } from "./items.js";
import { type OverflowMenuState, createOverflowMenuState } from "./menuState.js";

export type ToolbarInlineEntry = Readonly<{
  index: number;
  item: ToolbarItem;
  vnode: VNode;
  rect: Rect;
}>;

export type ToolbarOverflowEntry = Readonly<{ vnode: VNode; rect: Rect }>;

export type ToolbarLayout = Readonly<{
  rect: Rect;
  orientation: Orientation;
  inline: readonly ToolbarInlineEntry[];
  /** Present only when at least one item overflowed. */
  overflow: ToolbarOverflowEntry | null;
  /** The overflow suffix, in declared order. */
  overflowItems: readonly ToolbarItem[];
  /** Menu forms of `overflowItems`. */
  menuEntries: readonly VNode[];
  visibleItemCount: number;
  totalItemCount: number;
}>;

export type Toolbar = Readonly<{
  id: string;
  orientation: Orientation;
  maxItemCount: number;
  /** Live view of the last layout outcome. */
  state: OverflowState;
  menu: OverflowMenuState;
  layout: (
    items: ItemSequence,
    x: number,
    y: number,
    constraints: Constraints,
  ) => LayoutResult<ToolbarLayout>;
  /** Stop contributing to the saved-state registry. */
  dispose: () => void;
}>;

function offsetRect(rect: Rect, x: number, y: number): Rect {
  return { x: rect.x + x, y: rect.y + y, w: rect.w, h: rect.h };
}

export function createToolbar(config: ToolbarConfig): Toolbar {
  const validated = validateToolbarConfig(config);
  if (!validated.ok) {
    throw new RailError("RAIL_INVALID_PROPS", validated.fatal.detail);
  }
  const cfg = validated.value;
  const { id, log } = cfg;
  const devWarnings = createDevWarnings({ devMode: cfg.devMode, log });

  if (cfg.maxItemCount <= 0) {
    devWarnings.warnOnce(
      "toolbar",
      `${id}:maxItemCount`,
      `toolbar#${id}: maxItemCount=${String(cfg.maxItemCount)} never caps; use Infinity for an unbounded toolbar`,
    );
  }

  let state: MutableOverflowState;
  const registry = cfg.savedState;
  if (registry === null) {
    state = createOverflowState();
  } else {
    const remembered = rememberSaveable(registry, cfg.savedStateKey, overflowStateSaver, () =>
      createOverflowState(),
    );
    state = remembered.value;
    if (remembered.discarded) {
      log({
        level: "warn",
        scope: "saved-state",
        message: `toolbar#${id}: discarded malformed saved overflow state`,
        data: { key: cfg.savedStateKey },
      });
    }
  }

  const menu = createOverflowMenuState((expanded) => {
    log({
      level: "debug",
      scope: "toolbar",
      message: `toolbar#${id}: overflow menu ${expanded ? "shown" : "dismissed"}`,
    });
  });

  const policy = createOverflowMeasurePolicy({
    orientation: cfg.orientation,
    maxItemCount: cfg.maxItemCount,
    state,
  });

  const layout = (
    items: ItemSequence,
    x: number,
    y: number,
    constraints: Constraints,
  ): LayoutResult<ToolbarLayout> => {
    const constraintsRes = validateConstraints(constraints);
    if (!constraintsRes.ok) return constraintsRes;

    const inlineNodes = items.items.map(renderItemInline);
    const indicatorNode = cfg.overflowIndicator(menu);

    const prevVisible = state.visibleItemCount;
    const prevTotal = state.totalItemCount;
    const result = policy.measure(
      inlineNodes.map(measurableNode),
      [measurableNode(indicatorNode)],
      constraintsRes.value,
    );

    if (prevVisible !== result.visibleItemCount || prevTotal !== result.totalItemCount) {
      log({
        level: "debug",
        scope: "toolbar",
        message: `toolbar#${id}: visible ${String(result.visibleItemCount)}/${String(result.totalItemCount)}`,
        data: { reservedExtent: result.reservedExtent },
      });
    }

    if (!hasOverflow(state) && menu.isExpanded()) menu.dismiss();

    const inline: ToolbarInlineEntry[] = [];
    let overflow: ToolbarOverflowEntry | null = null;
    for (const placement of result.placements) {
      const rect = offsetRect(placement.rect, x, y);
      if (placement.kind === "overflow") {
        overflow = { vnode: indicatorNode, rect };
        continue;
      }
      const item = items.at(placement.index);
      const vnode = inlineNodes[placement.index];
      if (item === undefined || vnode === undefined) continue;
      inline.push({ index: placement.index, item, vnode, rect });
    }

    const overflowItems = items.slice(result.visibleItemCount, result.totalItemCount);
    return ok({
      rect: { x, y, w: result.size.w, h: result.size.h },
      orientation: cfg.orientation,
      inline: Object.freeze(inline),
      overflow,
      overflowItems,
      menuEntries: Object.freeze(overflowItems.map((item) => renderItemInMenu(item, menu))),
      visibleItemCount: result.visibleItemCount,
      totalItemCount: result.totalItemCount,
    });
  };

  return Object.freeze({
    id,
    orientation: cfg.orientation,
    maxItemCount: cfg.maxItemCount,
    state,
    menu,
    layout,
    dispose(): void {
      registry?.unregisterProvider(cfg.savedStateKey);
    },
  });
}
