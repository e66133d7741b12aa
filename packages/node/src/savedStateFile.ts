/**
 * File-backed saved state for Node hosts.
 *
 * The whole registry is one JSON object on disk. Loading is lenient: a
 * missing file is a first run and a malformed one is logged and ignored.
 * Saving writes a sibling temp file and renames it over the target.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import {
  type LayoutLogFn,
  RailError,
  type SavedStateRegistry,
  createSavedStateRegistry,
  noopLog,
} from "@railkit/core";

export type SavedStateRecord = Readonly<Record<string, unknown>>;

export type FileSavedStateStoreOptions = Readonly<{
  file: string;
  log?: LayoutLogFn;
}>;

export type FileSavedStateStore = Readonly<{
  /** Resolved path of the state file. */
  file: string;
  load: () => SavedStateRecord;
  save: (record: SavedStateRecord) => void;
  /** Registry pre-filled with whatever `load` returns. */
  createRegistry: () => SavedStateRegistry;
  /** Persist everything the registry currently holds. */
  flush: (registry: SavedStateRegistry) => void;
}>;

const EMPTY_RECORD: SavedStateRecord = Object.freeze({});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function createFileSavedStateStore(opts: FileSavedStateStoreOptions): FileSavedStateStore {
  if (opts.file.length === 0) {
    throw new RailError("RAIL_INVALID_PROPS", "createFileSavedStateStore: file must be a non-empty path");
  }
  const file = resolve(opts.file);
  const log = opts.log ?? noopLog;

  const load = (): SavedStateRecord => {
    let text: string;
    try {
      text = readFileSync(file, "utf8");
    } catch (err) {
      if (isMissingFileError(err)) return EMPTY_RECORD;
      throw new RailError("RAIL_IO_ERROR", `saved state: cannot read ${file}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      log({
        level: "warn",
        scope: "saved-state",
        message: `ignoring malformed state file ${file}`,
        data: { error: err instanceof Error ? err.message : String(err) },
      });
      return EMPTY_RECORD;
    }
    if (!isRecord(parsed)) {
      log({
        level: "warn",
        scope: "saved-state",
        message: `ignoring state file ${file}: top level is not an object`,
      });
      return EMPTY_RECORD;
    }
    return Object.freeze(parsed);
  };

  const save = (record: SavedStateRecord): void => {
    const tmp = `${file}.${String(process.pid)}.tmp`;
    let wroteTmp = false;
    try {
      mkdirSync(dirname(file), { recursive: true });
      writeFileSync(tmp, `${JSON.stringify(record, null, 2)}\n`, "utf8");
      wroteTmp = true;
      renameSync(tmp, file);
    } catch (err) {
      if (wroteTmp) rmSync(tmp, { force: true });
      throw new RailError("RAIL_IO_ERROR", `saved state: cannot write ${file}`, { cause: err });
    }
    log({
      level: "debug",
      scope: "saved-state",
      message: `saved ${String(Object.keys(record).length)} entries to ${file}`,
    });
  };

  return Object.freeze({
    file,
    load,
    save,
    createRegistry: () => createSavedStateRegistry(load()),
    flush: (registry: SavedStateRegistry) => save(registry.performSave()),
  });
}
