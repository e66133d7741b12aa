/**
 * Log sink contract and dev warnings.
 *
 * The core never writes to a console. Hosts pass a `log` function; the core
 * builds events and hands them over. Dev warnings fire once per key.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LayoutLogEvent = Readonly<{
  level: LogLevel;
  /** Subsystem tag, e.g. "toolbar" or "saved-state". */
  scope: string;
  message: string;
  data?: Readonly<Record<string, unknown>>;
}>;

export type LayoutLogFn = (event: LayoutLogEvent) => void;

export const noopLog: LayoutLogFn = () => {};

const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

/** Drop events below `minLevel` before they reach `log`. */
export function filterLogLevel(log: LayoutLogFn, minLevel: LogLevel): LayoutLogFn {
  const min = LOG_LEVEL_RANK[minLevel];
  return (event) => {
    if (LOG_LEVEL_RANK[event.level] < min) return;
    log(event);
  };
}

export function formatLogEvent(event: LayoutLogEvent): string {
  const head = `[railkit][${event.scope}] ${event.message}`;
  if (event.data === undefined) return head;
  return `${head} ${JSON.stringify(event.data)}`;
}

export type DevWarnings = Readonly<{
  /** Emit `detail` once per `key`; no-op outside dev mode. */
  warnOnce: (scope: string, key: string, detail: string) => void;
  reset: () => void;
}>;

export function createDevWarnings(opts: Readonly<{ devMode: boolean; log: LayoutLogFn }>): DevWarnings {
  const warned = new Set<string>();
  return Object.freeze({
    warnOnce(scope: string, key: string, detail: string): void {
      if (!opts.devMode) return;
      const scopedKey = `${scope}:${key}`;
      if (warned.has(scopedKey)) return;
      warned.add(scopedKey);
      opts.log({ level: "warn", scope, message: detail });
    },
    reset(): void {
      warned.clear();
    },
  });
}
