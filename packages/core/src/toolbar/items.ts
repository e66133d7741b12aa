/**
 * Toolbar item variants.
 *
 * Each item has two visual forms: an inline form drawn in the rail and a menu
 * form drawn inside the overflow menu. Both are plain VNodes; layout never
 * looks inside them beyond measuring.
 */

import type { VNode } from "../widgets/types.js";
import { ui } from "../widgets/ui.js";
import type { OverflowMenuState } from "./menuState.js";

export type ClickableItem = Readonly<{
  kind: "clickable";
  id: string;
  icon: string;
  label: string;
  enabled: boolean;
  onClick: () => void;
}>;

export type ToggleableItem = Readonly<{
  kind: "toggleable";
  id: string;
  icon: string;
  label: string;
  enabled: boolean;
  checked: boolean;
  onCheckedChange: (checked: boolean) => void;
}>;

export type CustomItem = Readonly<{
  kind: "custom";
  id: string;
  content: () => VNode;
  menuContent: (menu: OverflowMenuState) => VNode;
}>;

export type ToolbarItem = ClickableItem | ToggleableItem | CustomItem;

export type ClickableItemInput = Omit<ClickableItem, "kind" | "enabled"> &
  Readonly<{ enabled?: boolean }>;
export type ToggleableItemInput = Omit<ToggleableItem, "kind" | "enabled"> &
  Readonly<{ enabled?: boolean }>;
export type CustomItemInput = Omit<CustomItem, "kind">;

export function clickableItem(input: ClickableItemInput): ClickableItem {
  return Object.freeze({ kind: "clickable", ...input, enabled: input.enabled ?? true });
}

export function toggleableItem(input: ToggleableItemInput): ToggleableItem {
  return Object.freeze({ kind: "toggleable", ...input, enabled: input.enabled ?? true });
}

export function customItem(input: CustomItemInput): CustomItem {
  return Object.freeze({ kind: "custom", ...input });
}

/** Form drawn in the rail. */
export function renderItemInline(item: ToolbarItem): VNode {
  switch (item.kind) {
    case "clickable":
      return ui.button(item.id, item.icon, {
        disabled: !item.enabled,
        onPress: item.enabled ? item.onClick : undefined,
      });
    case "toggleable":
      return ui.toggle({
        id: item.id,
        label: item.icon,
        checked: item.checked,
        disabled: !item.enabled,
        onToggle: item.enabled ? item.onCheckedChange : undefined,
      });
    case "custom":
      return item.content();
  }
}

/**
 * Form drawn inside the overflow menu.
 * Selecting a clickable or toggleable entry runs its action, then closes the menu.
 * Disabled entries carry no `onSelect`.
 */
export function renderItemInMenu(item: ToolbarItem, menu: OverflowMenuState): VNode {
  switch (item.kind) {
    case "clickable":
      return ui.menuItem({
        id: item.id,
        label: item.label,
        icon: item.icon,
        disabled: !item.enabled,
        onSelect: item.enabled
          ? () => {
              item.onClick();
              menu.dismiss();
            }
          : undefined,
      });
    case "toggleable":
      return ui.menuItem({
        id: item.id,
        label: item.label,
        icon: item.icon,
        checked: item.checked,
        disabled: !item.enabled,
        onSelect: item.enabled
          ? () => {
              item.onCheckedChange(!item.checked);
              menu.dismiss();
            }
          : undefined,
      });
    case "custom":
      return item.menuContent(menu);
  }
}
