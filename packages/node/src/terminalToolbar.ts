/**
 * Terminal toolbar host.
 *
 * Lays a toolbar out against the width of a TTY stream, draws the rail (and
 * the overflow menu while it is open) as plain text, and persists overflow
 * counts through a state file between runs.
 */

import {
  type ItemSequence,
  type LayoutLogFn,
  RailError,
  type Toolbar,
  type ToolbarConfig,
  type ToolbarLayout,
  createToolbar,
  maxConstraints,
  renderMenuText,
  renderToolbarText,
} from "@railkit/core";
import { type EnvMap, readNodeHostConfig, resolveColumns } from "./config.js";
import { createConsoleLog } from "./consoleLog.js";
import { type FileSavedStateStore, createFileSavedStateStore } from "./savedStateFile.js";

const DEFAULT_ROWS = 24;
const DEFAULT_MENU_WIDTH = 24;

export type TerminalOutput = Readonly<{
  columns?: number;
  rows?: number;
  write: (chunk: string) => unknown;
}>;

export type TerminalToolbarOptions = Readonly<{
  toolbar: Omit<ToolbarConfig, "savedState" | "devMode" | "log">;
  output?: TerminalOutput;
  env?: EnvMap;
  cwd?: string;
  /** Overrides the env-derived state file. */
  stateFile?: string;
  /** Default: stderr sink from `createConsoleLog`. */
  log?: LayoutLogFn;
  menuWidth?: number;
}>;

export type TerminalFrame = Readonly<{
  layout: ToolbarLayout;
  rail: readonly string[];
  /** Empty while the menu is closed. */
  menu: readonly string[];
}>;

export type TerminalToolbar = Readonly<{
  toolbar: Toolbar;
  store: FileSavedStateStore;
  columns: () => number;
  /** Lay out and draw one frame to the output. */
  render: (items: ItemSequence) => TerminalFrame;
  /** Save overflow counts and release the saved-state key. A failed save leaves the host open. */
  close: () => void;
}>;

export function createTerminalToolbar(opts: TerminalToolbarOptions): TerminalToolbar {
  const output = opts.output ?? process.stdout;
  const hostConfig = readNodeHostConfig(opts.env, opts.cwd);
  const log = opts.log ?? createConsoleLog(process.stderr, { devMode: hostConfig.devMode });
  const store = createFileSavedStateStore({ file: opts.stateFile ?? hostConfig.stateFile, log });
  const registry = store.createRegistry();
  const toolbar = createToolbar({
    ...opts.toolbar,
    savedState: registry,
    devMode: hostConfig.devMode,
    log,
  });
  const menuWidth = opts.menuWidth ?? DEFAULT_MENU_WIDTH;
  let closed = false;

  const columns = (): number => resolveColumns(output);

  const render = (items: ItemSequence): TerminalFrame => {
    const width = columns();
    const rows = toolbar.orientation === "vertical" ? resolveRows(output) : 1;
    const layoutRes = toolbar.layout(items, 0, 0, maxConstraints(width, rows));
    if (!layoutRes.ok) throw new RailError(layoutRes.fatal.code, layoutRes.fatal.detail);
    const layout = layoutRes.value;

    const railRes = renderToolbarText(layout);
    if (!railRes.ok) throw new RailError(railRes.fatal.code, railRes.fatal.detail);

    let menu: readonly string[] = [];
    if (toolbar.menu.isExpanded()) {
      const menuRes = renderMenuText(layout, Math.min(menuWidth, width));
      if (!menuRes.ok) throw new RailError(menuRes.fatal.code, menuRes.fatal.detail);
      menu = menuRes.value;
    }

    const lines = [...railRes.value, ...menu];
    if (lines.length > 0) output.write(`${lines.join("\n")}\n`);
    return Object.freeze({ layout, rail: railRes.value, menu });
  };

  return Object.freeze({
    toolbar,
    store,
    columns,
    render,
    close(): void {
      if (closed) return;
      store.flush(registry);
      closed = true;
      toolbar.dispose();
    },
  });
}

function resolveRows(stream: TerminalOutput): number {
  const { rows } = stream;
  return typeof rows === "number" && Number.isInteger(rows) && rows > 0 ? rows : DEFAULT_ROWS;
}
