import { diag } from "@opentelemetry/api";
import type { Dispatcher } from "./dispatcher.js";
import { getGlobalDispatcher } from "./global.js";
import type { LogAttributes, LogLevel, Logger } from "./types.js";

/**
 * Create a structured {@link Logger} that emits events through a dispatcher.
 *
 * Without an explicit `dispatcher` each call resolves the process-wide one,
 * so loggers created before installation start routing once it happens.
 * Events inherit the active span (see {@link withSpan}).
 *
 * Every method is wrapped in try-catch and **never throws**.
 *
 * @param target - Logger name, written as `target` on every record.
 */
export function createLogger(target?: string, dispatcher?: Dispatcher): Logger {
  function log(level: LogLevel, message: string, attrs?: LogAttributes): void {
    try {
      (dispatcher ?? getGlobalDispatcher()).event(level, String(message), attrs, { target });
    } catch (err) {
      diag.error("telemetry logger failed to emit", err);
    }
  }

  return {
    trace: (msg, attrs) => log("trace", msg, attrs),
    debug: (msg, attrs) => log("debug", msg, attrs),
    info: (msg, attrs) => log("info", msg, attrs),
    warn: (msg, attrs) => log("warn", msg, attrs),
    error: (msg, attrs) => log("error", msg, attrs),
  };
}
