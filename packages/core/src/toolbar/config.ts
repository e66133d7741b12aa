/**
 * Toolbar configuration validation.
 *
 * Validation rules:
 *   - id: non-empty string
 *   - orientation: "horizontal" | "vertical" (default "horizontal")
 *   - maxItemCount: integer or Infinity (default Infinity); values <= 0 are
 *     accepted and never trigger the cap
 *   - overflowIndicator: function (default: "⋮" button)
 *   - savedStateKey: non-empty string (default `toolbar:<id>`)
 */

import { type LayoutLogFn, noopLog } from "../debug/log.js";
import { type LayoutResult, invalidProps, ok } from "../layout/engine/result.js";
import type { Orientation } from "../layout/types.js";
import type { SavedStateRegistry } from "../state/savedState.js";
import type { VNode } from "../widgets/types.js";
import { ui } from "../widgets/ui.js";
import type { OverflowMenuState } from "./menuState.js";

export const DEFAULT_OVERFLOW_GLYPH = "⋮";

export type OverflowIndicatorFn = (menu: OverflowMenuState) => VNode;

export type ToolbarConfig = Readonly<{
  id: string;
  orientation?: Orientation;
  maxItemCount?: number;
  overflowIndicator?: OverflowIndicatorFn;
  /** Registry to restore from and save into. Omit to keep state in memory only. */
  savedState?: SavedStateRegistry;
  savedStateKey?: string;
  devMode?: boolean;
  log?: LayoutLogFn;
}>;

export type ValidatedToolbarConfig = Readonly<{
  id: string;
  orientation: Orientation;
  maxItemCount: number;
  overflowIndicator: OverflowIndicatorFn;
  savedState: SavedStateRegistry | null;
  savedStateKey: string;
  devMode: boolean;
  log: LayoutLogFn;
}>;

export function overflowIndicatorId(toolbarId: string): string {
  return `${toolbarId}__overflow`;
}

function defaultOverflowIndicator(toolbarId: string): OverflowIndicatorFn {
  return (menu) =>
    ui.button(overflowIndicatorId(toolbarId), DEFAULT_OVERFLOW_GLYPH, { onPress: menu.toggle });
}

function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.length > 0;
}

function isMaxItemCount(v: unknown): v is number {
  return typeof v === "number" && (Number.isInteger(v) || v === Number.POSITIVE_INFINITY);
}

export function validateToolbarConfig(config: ToolbarConfig): LayoutResult<ValidatedToolbarConfig> {
  const { id } = config;
  if (!isNonEmptyString(id)) {
    return invalidProps("toolbar.id must be a non-empty string");
  }

  const orientation = config.orientation ?? "horizontal";
  if (orientation !== "horizontal" && orientation !== "vertical") {
    return invalidProps(
      `toolbar#${id}: orientation must be "horizontal" or "vertical" (got ${String(orientation)})`,
    );
  }

  const maxItemCount = config.maxItemCount ?? Number.POSITIVE_INFINITY;
  if (!isMaxItemCount(maxItemCount)) {
    return invalidProps(
      `toolbar#${id}: maxItemCount must be an integer or Infinity (got ${String(maxItemCount)})`,
    );
  }

  const overflowIndicator = config.overflowIndicator ?? defaultOverflowIndicator(id);
  if (typeof overflowIndicator !== "function") {
    return invalidProps(`toolbar#${id}: overflowIndicator must be a function`);
  }

  const savedStateKey = config.savedStateKey ?? `toolbar:${id}`;
  if (!isNonEmptyString(savedStateKey)) {
    return invalidProps(`toolbar#${id}: savedStateKey must be a non-empty string`);
  }

  return ok({
    id,
    orientation,
    maxItemCount,
    overflowIndicator,
    savedState: config.savedState ?? null,
    savedStateKey,
    devMode: config.devMode === true,
    log: config.log ?? noopLog,
  });
}
