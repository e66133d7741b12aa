import { type LayoutLogFn, type LogLevel, filterLogLevel, formatLogEvent } from "@railkit/core";

export type LogStream = Readonly<{ write: (chunk: string) => unknown }>;

export type ConsoleLogOptions = Readonly<{
  /** Events below this level are dropped. Default: "info", or "debug" in dev mode. */
  minLevel?: LogLevel;
  devMode?: boolean;
}>;

/**
 * Log sink that writes one formatted line per event.
 *
 * @example
 * ```ts
 * const toolbar = createToolbar({ id: "main", log: createConsoleLog() });
 * ```
 */
export function createConsoleLog(
  stream: LogStream = process.stderr,
  opts: ConsoleLogOptions = {},
): LayoutLogFn {
  const minLevel = opts.minLevel ?? (opts.devMode === true ? "debug" : "info");
  return filterLogLevel((event) => {
    stream.write(`${event.level.toUpperCase()} ${formatLogEvent(event)}\n`);
  }, minLevel);
}
