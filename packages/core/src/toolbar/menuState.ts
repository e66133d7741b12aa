/**
 * Open/closed state of a toolbar's overflow menu.
 *
 * Menu forms receive this as their dismiss handle; the overflow indicator
 * builder receives it to open the menu.
 */
export type OverflowMenuState = Readonly<{
  isExpanded: () => boolean;
  show: () => void;
  dismiss: () => void;
  toggle: () => void;
}>;

export function createOverflowMenuState(
  onChange?: (expanded: boolean) => void,
): OverflowMenuState {
  let expanded = false;

  const set = (next: boolean): void => {
    if (next === expanded) return;
    expanded = next;
    onChange?.(expanded);
  };

  return Object.freeze({
    isExpanded: () => expanded,
    show: () => set(true),
    dismiss: () => set(false),
    toggle: () => set(!expanded),
  });
}
