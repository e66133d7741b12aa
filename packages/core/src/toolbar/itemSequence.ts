/**
 * Ordered item collections.
 *
 * Sequences are rebuilt wholesale, never patched. `createItemSequenceMemo`
 * skips the rebuild when none of its inputs changed (Object.is per input),
 * so hosts can call it every frame and keep a stable sequence reference.
 */

import type { ToolbarItem } from "./items.js";

export type ItemSequence = Readonly<{
  count: number;
  items: readonly ToolbarItem[];
  at: (index: number) => ToolbarItem | undefined;
  /** Items in `[start, end)`, clamped to the sequence. */
  slice: (start: number, end?: number) => readonly ToolbarItem[];
}>;

export const EMPTY_ITEM_SEQUENCE: ItemSequence = createItemSequence([]);

export function createItemSequence(items: readonly ToolbarItem[]): ItemSequence {
  const frozen = Object.freeze([...items]);
  return Object.freeze({
    count: frozen.length,
    items: frozen,
    at: (index: number) => frozen[index],
    slice: (start: number, end?: number) => Object.freeze(frozen.slice(start, end)),
  });
}

export type ItemSequenceMemo<D extends readonly unknown[]> = (deps: D) => ItemSequence;

/**
 * Memoize a sequence builder on its inputs.
 *
 * @example
 * ```ts
 * const itemsFor = createItemSequenceMemo((doc: Doc, canEdit: boolean) => [
 *   clickableItem({ id: "save", icon: "💾", label: "Save", onClick: () => save(doc) }),
 *   clickableItem({ id: "edit", icon: "✎", label: "Edit", enabled: canEdit, onClick: edit }),
 * ]);
 * const items = itemsFor([doc, canEdit]);
 * ```
 */
export function createItemSequenceMemo<D extends readonly unknown[]>(
  build: (...deps: D) => readonly ToolbarItem[],
): ItemSequenceMemo<D> {
  let lastDeps: D | null = null;
  let lastSequence: ItemSequence = EMPTY_ITEM_SEQUENCE;

  return (deps: D): ItemSequence => {
    if (lastDeps !== null && lastDeps.length === deps.length) {
      let allEqual = true;
      for (let i = 0; i < deps.length; i++) {
        if (!Object.is(deps[i], lastDeps[i])) {
          allEqual = false;
          break;
        }
      }
      if (allEqual) return lastSequence;
    }

    lastDeps = deps;
    lastSequence = createItemSequence(build(...deps));
    return lastSequence;
  };
}
