/**
 * @railkit/core
 *
 * Runtime-agnostic core for railkit: geometry, text measurement, widget
 * VNodes, the overflow packing policy and the toolbar host.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { RailError, type RailErrorCode, isRailError } from "./errors.js";

// =============================================================================
// Logging
// =============================================================================

export {
  type DevWarnings,
  type LayoutLogEvent,
  type LayoutLogFn,
  type LogLevel,
  createDevWarnings,
  filterLogLevel,
  formatLogEvent,
  isLogLevel,
  noopLog,
} from "./debug/log.js";

// =============================================================================
// Layout primitives
// =============================================================================

export type { Constraints, Orientation, Point, Rect, Size } from "./layout/types.js";
export {
  UNBOUNDED_CONSTRAINTS,
  clampSize,
  constraints,
  fixedConstraints,
  looseConstraints,
  maxConstraints,
  validateConstraints,
} from "./layout/constraints.js";
export { type InvalidPropsFatal, type LayoutResult, invalidProps, ok } from "./layout/engine/result.js";
export { type AxisAccessor, HORIZONTAL_AXIS, VERTICAL_AXIS, axisFor } from "./layout/axis.js";
export { type Measurable, type Placeable, measurableNode } from "./layout/measurable.js";
export { MENU_CHECK_COLUMN_WIDTH, measureNode } from "./layout/measureNode.js";
export {
  type GraphemeCell,
  clearTextMeasureCache,
  getTextMeasureCacheSize,
  measureTextCells,
  segmentGraphemes,
  truncateWithEllipsis,
} from "./layout/textMeasure.js";

// =============================================================================
// Widgets
// =============================================================================

export type {
  ButtonProps,
  ColumnProps,
  IconProps,
  MenuItemProps,
  RowProps,
  StackProps,
  TextProps,
  ToggleProps,
  VNode,
  VNodeKind,
} from "./widgets/types.js";
export { ui } from "./widgets/ui.js";

// =============================================================================
// Overflow packing
// =============================================================================

export {
  type MutableOverflowState,
  type OverflowRange,
  type OverflowState,
  createOverflowState,
  hasOverflow,
  isValidOverflowCounts,
  overflowRange,
  overflowStateSaver,
} from "./overflow/state.js";
export {
  type OverflowMeasurePolicy,
  type OverflowMeasurePolicyOptions,
  type OverflowMeasureResult,
  type OverflowPlacement,
  createOverflowMeasurePolicy,
  maxIntrinsicMainExtent,
} from "./overflow/measurePolicy.js";

// =============================================================================
// Saved state
// =============================================================================

export {
  type RememberSaveableResult,
  type SavedStateProvider,
  type SavedStateRegistry,
  type Saver,
  createSavedStateRegistry,
  listSaver,
  rememberSaveable,
} from "./state/savedState.js";

// =============================================================================
// Toolbar
// =============================================================================

export {
  type ClickableItem,
  type ClickableItemInput,
  type CustomItem,
  type CustomItemInput,
  type ToggleableItem,
  type ToggleableItemInput,
  type ToolbarItem,
  clickableItem,
  customItem,
  renderItemInMenu,
  renderItemInline,
  toggleableItem,
} from "./toolbar/items.js";
export {
  EMPTY_ITEM_SEQUENCE,
  type ItemSequence,
  type ItemSequenceMemo,
  createItemSequence,
  createItemSequenceMemo,
} from "./toolbar/itemSequence.js";
export { type OverflowMenuState, createOverflowMenuState } from "./toolbar/menuState.js";
export {
  DEFAULT_OVERFLOW_GLYPH,
  type OverflowIndicatorFn,
  type ToolbarConfig,
  type ValidatedToolbarConfig,
  overflowIndicatorId,
  validateToolbarConfig,
} from "./toolbar/config.js";
export {
  type Toolbar,
  type ToolbarInlineEntry,
  type ToolbarLayout,
  type ToolbarOverflowEntry,
  createToolbar,
} from "./toolbar/toolbar.js";
export { leafText, renderMenuText, renderToolbarText } from "./toolbar/renderText.js";
