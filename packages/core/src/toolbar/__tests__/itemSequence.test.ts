import { assert, describe, test } from "@railkit/testkit";
import { createOverflowMenuState } from "../menuState.js";
import { EMPTY_ITEM_SEQUENCE, createItemSequence, createItemSequenceMemo } from "../itemSequence.js";
import {
  type ToolbarItem,
  clickableItem,
  renderItemInMenu,
  renderItemInline,
  toggleableItem,
} from "../items.js";

function item(id: string): ToolbarItem {
  return clickableItem({ id, icon: id, label: id, onClick: () => {} });
}

describe("item sequence", () => {
  test("keeps declared order", () => {
    const seq = createItemSequence([item("a"), item("b"), item("c")]);
    assert.equal(seq.count, 3);
    assert.deepEqual(
      seq.items.map((i) => i.id),
      ["a", "b", "c"],
    );
    assert.equal(seq.at(1)?.id, "b");
    assert.equal(seq.at(3), undefined);
  });

  test("slice is clamped and detached from the source", () => {
    const source = [item("a"), item("b"), item("c")];
    const seq = createItemSequence(source);
    source.push(item("d"));
    assert.equal(seq.count, 3);
    assert.deepEqual(
      seq.slice(1, 10).map((i) => i.id),
      ["b", "c"],
    );
    assert.deepEqual(seq.slice(3), []);
    assert.equal(Object.isFrozen(seq.items), true);
  });

  test("the empty sequence is valid", () => {
    assert.equal(EMPTY_ITEM_SEQUENCE.count, 0);
    assert.deepEqual(EMPTY_ITEM_SEQUENCE.slice(0), []);
  });
});

describe("item sequence memo", () => {
  test("rebuilds only when an input changes", () => {
    let builds = 0;
    const memo = createItemSequenceMemo((prefix: string, n: number) => {
      builds++;
      return Array.from({ length: n }, (_, i) => item(`${prefix}${String(i)}`));
    });

    const first = memo(["x", 2]);
    const again = memo(["x", 2]);
    assert.equal(again, first);
    assert.equal(builds, 1);

    const changed = memo(["x", 3]);
    assert.notEqual(changed, first);
    assert.equal(changed.count, 3);
    assert.equal(builds, 2);
  });

  test("compares inputs with Object.is", () => {
    let builds = 0;
    const memo = createItemSequenceMemo((v: number) => {
      builds++;
      return [item(String(v))];
    });
    memo([Number.NaN]);
    memo([Number.NaN]);
    assert.equal(builds, 1);
    memo([0]);
    memo([-0]);
    assert.equal(builds, 3);
  });
});

describe("item factories", () => {
  test("enabled defaults to true", () => {
    assert.equal(item("a").kind, "clickable");
    const toggle = toggleableItem({ id: "t", icon: "T", label: "T", checked: false, onCheckedChange: () => {} });
    assert.equal(toggle.kind === "toggleable" && toggle.enabled, true);
  });

  test("disabled items render disabled inline forms", () => {
    const vnode = renderItemInline(
      clickableItem({ id: "a", icon: "A", label: "A", enabled: false, onClick: () => {} }),
    );
    assert.equal(vnode.kind === "button" && vnode.props.disabled, true);
    assert.equal(vnode.kind === "button" && vnode.props.onPress, undefined);
  });

  test("disabled menu forms carry no select action", () => {
    let runs = 0;
    const menu = createOverflowMenuState();
    menu.show();
    const click = renderItemInMenu(
      clickableItem({ id: "a", icon: "A", label: "A", enabled: false, onClick: () => runs++ }),
      menu,
    );
    const toggle = renderItemInMenu(
      toggleableItem({
        id: "t",
        icon: "T",
        label: "T",
        checked: false,
        enabled: false,
        onCheckedChange: () => runs++,
      }),
      menu,
    );
    for (const vnode of [click, toggle]) {
      assert.equal(vnode.kind, "menuItem");
      assert.equal(vnode.kind === "menuItem" && vnode.props.disabled, true);
      assert.equal(vnode.kind === "menuItem" && vnode.props.onSelect, undefined);
    }
    assert.equal(runs, 0);
    assert.equal(menu.isExpanded(), true);
  });
});

describe("overflow menu state", () => {
  test("notifies only on transitions", () => {
    const seen: boolean[] = [];
    const menu = createOverflowMenuState((expanded) => seen.push(expanded));
    menu.dismiss();
    menu.show();
    menu.show();
    menu.toggle();
    menu.toggle();
    assert.deepEqual(seen, [true, false, true]);
    assert.equal(menu.isExpanded(), true);
  });
});
