/**
 * Widget factory functions.
 *
 * Builds VNode trees without spelling out the discriminated union by hand.
 */

import type {
  ButtonProps,
  ColumnProps,
  IconProps,
  MenuItemProps,
  RowProps,
  TextProps,
  ToggleProps,
  VNode,
} from "./types.js";

function text(content: string, props: TextProps = {}): VNode {
  return { kind: "text", text: content, props };
}

/**
 * Create an icon.
 *
 * @example
 * ```ts
 * ui.icon("✎")
 * ui.icon("✎", { label: "Edit" })
 * ```
 */
function icon(glyph: string, props: Omit<IconProps, "glyph"> = {}): VNode {
  return { kind: "icon", props: { glyph, ...props } };
}

function button(id: string, label: string): VNode;
function button(id: string, label: string, props: Omit<ButtonProps, "id" | "label">): VNode;
function button(props: ButtonProps): VNode;
function button(
  idOrProps: string | ButtonProps,
  label?: string,
  props?: Omit<ButtonProps, "id" | "label">,
): VNode {
  if (typeof idOrProps === "string") {
    return { kind: "button", props: { id: idOrProps, label: label ?? "", ...(props ?? {}) } };
  }
  return { kind: "button", props: idOrProps };
}

function toggle(props: ToggleProps): VNode {
  return { kind: "toggle", props };
}

function menuItem(props: MenuItemProps): VNode {
  return { kind: "menuItem", props };
}

function row(children: readonly VNode[], props: RowProps = {}): VNode {
  return { kind: "row", props, children: Object.freeze([...children]) };
}

function column(children: readonly VNode[], props: ColumnProps = {}): VNode {
  return { kind: "column", props, children: Object.freeze([...children]) };
}

export const ui = Object.freeze({
  text,
  icon,
  button,
  toggle,
  menuItem,
  row,
  column,
});
