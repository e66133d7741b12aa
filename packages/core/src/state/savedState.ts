/**
 * packages/core/src/state/savedState.ts: Save/restore contract for small UI state.
 *
 * A host restores a plain record at startup, components pull their entry by
 * key, and on shutdown the host asks every registered provider for a fresh
 * value. Saved values must be JSON-compatible.
 */

import { RailError } from "../errors.js";

/** Converts a value to its persisted form and back. `restore` returns null for unusable input. */
export type Saver<T, S> = Readonly<{
  save: (value: T) => S;
  restore: (saved: unknown) => T | null;
}>;

export type SavedStateProvider = () => unknown;

export type SavedStateRegistry = Readonly<{
  /** Take the restored value for `key`; a second call for the same key returns undefined. */
  consumeRestored: (key: string) => unknown;
  registerProvider: (key: string, provider: SavedStateProvider) => void;
  unregisterProvider: (key: string) => void;
  /** Collect values from every provider, plus restored entries nobody consumed. */
  performSave: () => Readonly<Record<string, unknown>>;
}>;

/**
 * Saver whose persisted form is a flat list.
 *
 * @example
 * ```ts
 * const pointSaver = listSaver<Point, number>(
 *   (p) => [p.x, p.y],
 *   (list) => (list.length === 2 ? { x: list[0] ?? 0, y: list[1] ?? 0 } : null),
 * );
 * ```
 */
export function listSaver<T, E>(
  save: (value: T) => readonly E[],
  restore: (list: readonly unknown[]) => T | null,
): Saver<T, readonly E[]> {
  return Object.freeze({
    save,
    restore: (saved: unknown) => (Array.isArray(saved) ? restore(saved) : null),
  });
}

export function createSavedStateRegistry(
  restored: Readonly<Record<string, unknown>> = {},
): SavedStateRegistry {
  const pending = new Map<string, unknown>(Object.entries(restored));
  const providers = new Map<string, SavedStateProvider>();

  return Object.freeze({
    consumeRestored(key: string): unknown {
      const value = pending.get(key);
      pending.delete(key);
      return value;
    },
    registerProvider(key: string, provider: SavedStateProvider): void {
      if (providers.has(key)) {
        throw new RailError(
          "RAIL_DUPLICATE_KEY",
          `saved state: a provider is already registered for "${key}"`,
        );
      }
      providers.set(key, provider);
    },
    unregisterProvider(key: string): void {
      providers.delete(key);
    },
    performSave(): Readonly<Record<string, unknown>> {
      const out: Record<string, unknown> = {};
      for (const [key, value] of pending) out[key] = value;
      for (const [key, provider] of providers) out[key] = provider();
      return Object.freeze(out);
    },
  });
}

export type RememberSaveableResult<T> = Readonly<{
  value: T;
  /** True when `value` came from the registry rather than `init`. */
  restored: boolean;
  /** Restored data existed for the key but the saver rejected it. */
  discarded: boolean;
}>;

/**
 * Restore `key` through `saver`, falling back to `init()`, and register the
 * value so the next `performSave` captures its latest contents.
 */
export function rememberSaveable<T, S>(
  registry: SavedStateRegistry,
  key: string,
  saver: Saver<T, S>,
  init: () => T,
): RememberSaveableResult<T> {
  const raw = registry.consumeRestored(key);
  const fromSaved = raw === undefined ? null : saver.restore(raw);
  const value = fromSaved ?? init();
  registry.registerProvider(key, () => saver.save(value));
  return Object.freeze({
    value,
    restored: fromSaved !== null,
    discarded: raw !== undefined && fromSaved === null,
  });
}
