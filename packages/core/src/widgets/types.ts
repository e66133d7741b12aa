/**
 * packages/core/src/widgets/types.ts: Widget VNode definitions.
 *
 * Toolbars only need a handful of widgets: inline forms are icons, buttons and
 * toggles; menu forms are menu items. `row`/`column` let custom items compose.
 */

/** Props for text widget. */
export type TextProps = Readonly<{
  key?: string;
  /** Cap on the measured width in cells. */
  maxWidth?: number;
}>;

/** Props for icon widget: a single glyph with an optional trailing label. */
export type IconProps = Readonly<{
  key?: string;
  glyph: string;
  label?: string;
}>;

export type ButtonProps = Readonly<{
  id: string;
  key?: string;
  label: string;
  disabled?: boolean;
  /** Horizontal padding in cells (default: 1). The outermost padding cell draws a bracket. */
  px?: number;
  onPress?: () => void;
}>;

/** Props for toggle widget. Renders bracketed when checked. */
export type ToggleProps = Readonly<{
  id: string;
  key?: string;
  label: string;
  checked: boolean;
  disabled?: boolean;
  onToggle?: (checked: boolean) => void;
}>;

/** Props for a single overflow-menu row. */
export type MenuItemProps = Readonly<{
  id: string;
  key?: string;
  label: string;
  icon?: string;
  /** `undefined` means the entry has no check column. */
  checked?: boolean;
  disabled?: boolean;
  onSelect?: () => void;
}>;

export type StackProps = Readonly<{
  key?: string;
  /** Cells between adjacent children (default: 0). */
  gap?: number;
}>;

export type RowProps = StackProps;
export type ColumnProps = StackProps;

export type VNode =
  | Readonly<{ kind: "text"; text: string; props: TextProps }>
  | Readonly<{ kind: "icon"; props: IconProps }>
  | Readonly<{ kind: "button"; props: ButtonProps }>
  | Readonly<{ kind: "toggle"; props: ToggleProps }>
  | Readonly<{ kind: "menuItem"; props: MenuItemProps }>
  | Readonly<{ kind: "row"; props: RowProps; children: readonly VNode[] }>
  | Readonly<{ kind: "column"; props: ColumnProps; children: readonly VNode[] }>;

export type VNodeKind = VNode["kind"];
