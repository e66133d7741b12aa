import type { LayoutLogEvent, LayoutLogFn } from "../debug/log.js";

export type LogRecorder = Readonly<{
  log: LayoutLogFn;
  events: readonly LayoutLogEvent[];
  messages: (level?: LayoutLogEvent["level"]) => readonly string[];
  clear: () => void;
}>;

/** In-memory log sink for asserting on emitted events. */
export function createLogRecorder(): LogRecorder {
  const events: LayoutLogEvent[] = [];
  return Object.freeze({
    log: (event: LayoutLogEvent) => {
      events.push(event);
    },
    events,
    messages: (level?: LayoutLogEvent["level"]) =>
      events.filter((e) => level === undefined || e.level === level).map((e) => e.message),
    clear: () => {
      events.length = 0;
    },
  });
}
