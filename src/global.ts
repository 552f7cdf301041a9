import { AlreadyInstalledError } from "./errors.js";
import { noopDispatcher } from "./noop.js";
import type { Dispatcher } from "./dispatcher.js";

let installed: Dispatcher | undefined;

/**
 * Install `dispatcher` as the process-wide instrumentation sink.
 *
 * The sink can be installed once per process. It is never replaced.
 *
 * @throws {AlreadyInstalledError} on any later call; the first dispatcher stays active.
 */
export function installGlobalDispatcher(dispatcher: Dispatcher): Dispatcher {
  if (installed) {
    throw new AlreadyInstalledError();
  }
  installed = dispatcher;
  return dispatcher;
}

/** The installed dispatcher, or a no-op dispatcher before installation. */
export function getGlobalDispatcher(): Dispatcher {
  return installed ?? noopDispatcher;
}

export function isGlobalDispatcherInstalled(): boolean {
  return installed !== undefined;
}
