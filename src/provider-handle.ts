import type { MeterProvider as ApiMeterProvider, TracerProvider as ApiTracerProvider } from "@opentelemetry/api";
import type { Resource } from "@opentelemetry/resources";
import type { ProviderKind } from "./errors.js";
import type { ResourceDescriptor } from "./resource.js";

/** The part of an SDK provider the lifecycle code relies on. */
export interface ShutdownableProvider {
  forceFlush(): Promise<void>;
  shutdown(): Promise<void>;
}

export type MetricsProvider = ShutdownableProvider & ApiMeterProvider;
export type TracingProvider = ShutdownableProvider & ApiTracerProvider;

/**
 * Owns one live provider and its background export task.
 *
 * `shutdown()` flushes and closes the provider once; later calls return the
 * first call's promise.
 */
export class ProviderHandle<P extends ShutdownableProvider = ShutdownableProvider> {
  private shutdownPromise: Promise<void> | undefined;

  constructor(
    readonly kind: ProviderKind,
    readonly provider: P,
    readonly resource: ResourceDescriptor,
    readonly otelResource?: Resource,
  ) {}

  get isShutdown(): boolean {
    return this.shutdownPromise !== undefined;
  }

  /** Export pending data without closing the provider. */
  forceFlush(): Promise<void> {
    if (this.shutdownPromise) return Promise.resolve();
    return this.provider.forceFlush();
  }

  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      try {
        this.shutdownPromise = this.provider.shutdown();
      } catch (err) {
        this.shutdownPromise = Promise.reject(err);
      }
    }
    return this.shutdownPromise;
  }
}
