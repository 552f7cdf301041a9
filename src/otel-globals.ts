import { context, metrics, propagation, trace } from "@opentelemetry/api";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from "@opentelemetry/core";
import { MissingProviderError } from "./errors.js";
import type { LifecycleGuard } from "./lifecycle.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./types.js";

/**
 * What to do when a provider is requested but its stage was never configured.
 *
 * `"warn"` logs and continues; `"error"` throws {@link MissingProviderError}.
 */
export type MissingProviderPolicy = "warn" | "error";

export interface InitGlobalsOptions {
  onMissing?: MissingProviderPolicy;
  logger?: Logger;
}

/**
 * Enable an AsyncLocalStorage context manager as the global OTel context
 * manager unless one is already registered.
 *
 * Without it `context.with` does not carry values, so the active dispatcher
 * span is lost even in synchronous nesting.
 *
 * @returns `true` when this call registered the manager.
 */
export function ensureContextManager(): boolean {
  const manager = new AsyncLocalStorageContextManager().enable();
  const registered = context.setGlobalContextManager(manager);
  if (!registered) manager.disable();
  return registered;
}

/**
 * Register the guard's tracer provider as the global OTel tracer provider,
 * along with W3C trace-context/baggage propagation. A context manager is
 * enabled when none is registered yet.
 *
 * @returns `true` when the provider was registered.
 * @throws {MissingProviderError} when no tracing stage exists and `onMissing` is `"error"`.
 */
export function initTracing(guard: LifecycleGuard, options: InitGlobalsOptions = {}): boolean {
  const logger = options.logger ?? createLogger("telemetry");
  const handle = guard.tracing;
  if (!handle) {
    if (options.onMissing === "error") throw new MissingProviderError("tracing");
    logger.warn("Tracing endpoint not configured; spans will not be exported");
    return false;
  }

  ensureContextManager();
  propagation.setGlobalPropagator(
    new CompositePropagator({
      propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
    }),
  );

  const registered = trace.setGlobalTracerProvider(handle.provider);
  if (!registered) {
    logger.warn("A global tracer provider was already registered");
  }
  return registered;
}

/**
 * Register the guard's meter provider as the global OTel meter provider.
 *
 * @returns `true` when the provider was registered.
 * @throws {MissingProviderError} when no metrics stage exists and `onMissing` is `"error"`.
 */
export function initMetering(guard: LifecycleGuard, options: InitGlobalsOptions = {}): boolean {
  const logger = options.logger ?? createLogger("telemetry");
  const handle = guard.metrics;
  if (!handle) {
    if (options.onMissing === "error") throw new MissingProviderError("metrics");
    logger.warn("Metrics endpoint not configured; metrics will not be exported");
    return false;
  }

  const registered = metrics.setGlobalMeterProvider(handle.provider);
  if (!registered) {
    logger.warn("A global meter provider was already registered");
  }
  return registered;
}
