import { assert, describe, test } from "@railkit/testkit";
import { maxConstraints } from "../../layout/constraints.js";
import type { VNode } from "../../widgets/types.js";
import { ui } from "../../widgets/ui.js";
import { createItemSequence } from "../itemSequence.js";
import { customItem } from "../items.js";
import { leafText, renderToolbarText } from "../renderText.js";
import { createToolbar } from "../toolbar.js";

function renderCustom(content: () => VNode, maxW: number): readonly string[] {
  const toolbar = createToolbar({ id: "r" });
  const items = createItemSequence([
    customItem({ id: "c", content, menuContent: () => ui.menuItem({ id: "c", label: "c" }) }),
  ]);
  const layoutRes = toolbar.layout(items, 0, 0, maxConstraints(maxW, 1));
  if (!layoutRes.ok) throw new Error(layoutRes.fatal.detail);
  const res = renderToolbarText(layoutRes.value);
  if (!res.ok) throw new Error(res.fatal.detail);
  return res.value;
}

describe("leafText", () => {
  test("buttons draw their padding as brackets", () => {
    assert.equal(leafText(ui.button("a", "Go")), "[Go]");
    assert.equal(leafText(ui.button("a", "Go", { px: 2 })), "[ Go ]");
    assert.equal(leafText(ui.button("a", "Go", { px: 0 })), "Go");
  });

  test("toggles are bracketed only when checked", () => {
    assert.equal(leafText(ui.toggle({ id: "t", label: "B", checked: true })), "[B]");
    assert.equal(leafText(ui.toggle({ id: "t", label: "B", checked: false })), " B ");
  });

  test("menu items add the check column only when checkable", () => {
    assert.equal(leafText(ui.menuItem({ id: "m", label: "Copy" })), "Copy");
    assert.equal(leafText(ui.menuItem({ id: "m", label: "Copy", icon: "C" })), "C Copy");
    assert.equal(leafText(ui.menuItem({ id: "m", label: "Wrap", checked: false })), "[ ] Wrap");
  });

  test("icons and text", () => {
    assert.equal(leafText(ui.icon("*")), "*");
    assert.equal(leafText(ui.icon("*", { label: "Star" })), "* Star");
    assert.equal(leafText(ui.text("plain")), "plain");
  });

  test("stacks have no text of their own", () => {
    assert.equal(leafText(ui.row([ui.text("a")])), null);
    assert.equal(leafText(ui.column([])), null);
  });
});

describe("renderToolbarText", () => {
  test("a lone item squeezed into the rail is cut with an ellipsis", () => {
    // Reserve 3, remaining 2; the trailing item may take 2 + 3 cells.
    assert.deepEqual(renderCustom(() => ui.text("Settings"), 5), ["Sett…"]);
  });

  test("rows draw their children with the gap between them", () => {
    assert.deepEqual(
      renderCustom(() => ui.row([ui.icon("+"), ui.text("New")], { gap: 1 }), 20),
      ["+ New"],
    );
  });

  test("wide glyphs take two cells", () => {
    assert.deepEqual(renderCustom(() => ui.text("日本"), 20), ["日本"]);
  });
});
