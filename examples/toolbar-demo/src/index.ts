import {
  type VNode,
  clickableItem,
  createItemSequenceMemo,
  customItem,
  toggleableItem,
  ui,
} from "@railkit/core";
import { type TerminalFrame, createTerminalToolbar } from "@railkit/node";

type DemoState = { bold: boolean; wrap: boolean; zoom: number; lastAction: string };

const state: DemoState = { bold: false, wrap: true, zoom: 100, lastAction: "none" };

function parseWidth(argv: readonly string[]): number | undefined {
  const i = argv.indexOf("--width");
  if (i < 0) return undefined;
  const value = Number.parseInt(argv[i + 1] ?? "", 10);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

const width = parseWidth(process.argv.slice(2));
const host = createTerminalToolbar({
  toolbar: { id: "editor" },
  ...(width === undefined
    ? {}
    : { output: { columns: width, write: (chunk: string) => process.stdout.write(chunk) } }),
});

const itemsFor = createItemSequenceMemo((bold: boolean, wrap: boolean, zoom: number) => [
  clickableItem({ id: "undo", icon: "↶", label: "Undo", onClick: () => act("undo") }),
  clickableItem({ id: "redo", icon: "↷", label: "Redo", onClick: () => act("redo") }),
  toggleableItem({
    id: "bold",
    icon: "B",
    label: "Bold",
    checked: bold,
    onCheckedChange: (checked) => {
      state.bold = checked;
    },
  }),
  toggleableItem({
    id: "wrap",
    icon: "W",
    label: "Word wrap",
    checked: wrap,
    onCheckedChange: (checked) => {
      state.wrap = checked;
    },
  }),
  clickableItem({ id: "find", icon: "?", label: "Find", onClick: () => act("find") }),
  clickableItem({ id: "share", icon: "@", label: "Share", enabled: false, onClick: () => act("share") }),
  customItem({
    id: "zoom",
    content: (): VNode => ui.text(`${String(zoom)}%`),
    menuContent: (menu) =>
      ui.menuItem({
        id: "zoom",
        label: `Reset zoom (${String(zoom)}%)`,
        onSelect: () => {
          state.zoom = 100;
          menu.dismiss();
        },
      }),
  }),
]);

function act(name: string): void {
  state.lastAction = name;
}

function frame(title: string): TerminalFrame {
  process.stdout.write(`-- ${title} (${String(host.columns())} columns)\n`);
  return host.render(itemsFor([state.bold, state.wrap, state.zoom]));
}

frame("rail");
host.toolbar.menu.show();
const open = frame("menu open");

const entry = open.layout.menuEntries.find((e) => e.kind === "menuItem" && e.props.disabled !== true);
if (entry !== undefined && entry.kind === "menuItem") {
  entry.props.onSelect?.();
  frame(`after selecting "${entry.props.label}"`);
}

process.stdout.write(`last action: ${state.lastAction}\n`);
host.close();
