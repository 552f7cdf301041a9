import type { DispatchSpan, Dispatcher } from "./dispatcher.js";
import type { Logger } from "./types.js";

/** A logger that silently discards all messages. */
export const noopLogger: Logger = {
  trace() {},
  debug() {},
  info() {},
  warn() {},
  error() {},
};

const noopSpan: DispatchSpan = {
  id: 0,
  name: "noop",
  level: "info",
  ended: true,
  record() {},
  end() {},
};

/** Dispatcher used until one is installed. Drops every record. */
export const noopDispatcher: Dispatcher = {
  stages: [],
  dispatch() {},
  event() {},
  startSpan: () => noopSpan,
};
