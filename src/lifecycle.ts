import { errorMessage, ShutdownError } from "./errors.js";
import { noopLogger } from "./noop.js";
import type { MetricsProvider, ProviderHandle, TracingProvider } from "./provider-handle.js";
import type { Logger } from "./types.js";

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;

/** Handles moved into a guard. Either may be absent. */
export interface GuardedProviders {
  metrics?: ProviderHandle<MetricsProvider>;
  tracing?: ProviderHandle<TracingProvider>;
}

export interface LifecycleGuardOptions {
  /** Receives one warning per failed shutdown. */
  logger?: Logger;
  /** Upper bound for each provider's shutdown (default `5000`). */
  shutdownTimeoutMs?: number;
  /** Shut down on the process `beforeExit` event (default `true`). */
  exitHooks?: boolean;
}

function withTimeout(task: Promise<void>, ms: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Exclusive owner of the metrics and tracing providers.
 *
 * Shutdown happens once, on the first of: an explicit {@link shutdown} call,
 * `await using` scope exit, or the process `beforeExit` event. Failures are
 * logged and returned, never thrown.
 *
 * @example
 * ```ts
 * await using telemetry = new TelemetryBuilder("orders-api").build().guard;
 * ```
 */
export class LifecycleGuard {
  readonly metrics?: ProviderHandle<MetricsProvider>;
  readonly tracing?: ProviderHandle<TracingProvider>;

  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private shutdownPromise: Promise<readonly ShutdownError[]> | undefined;
  private readonly onBeforeExit = () => {
    void this.shutdown();
  };

  constructor(providers: GuardedProviders = {}, options: LifecycleGuardOptions = {}) {
    this.metrics = providers.metrics;
    this.tracing = providers.tracing;
    this.logger = options.logger ?? noopLogger;
    this.timeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;

    if ((options.exitHooks ?? true) && this.handles.length > 0) {
      process.once("beforeExit", this.onBeforeExit);
    }
  }

  /** Every owned handle, metrics first. */
  get handles(): readonly ProviderHandle[] {
    const owned: ProviderHandle[] = [];
    if (this.metrics) owned.push(this.metrics);
    if (this.tracing) owned.push(this.tracing);
    return owned;
  }

  get isShutdown(): boolean {
    return this.shutdownPromise !== undefined;
  }

  /** Export pending data from every provider without closing them. */
  async forceFlush(): Promise<void> {
    const results = await Promise.allSettled(this.handles.map((h) => h.forceFlush()));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        this.logger.warn(`Failed to flush ${this.handles[i].kind} provider`, {
          error: errorMessage(result.reason),
        });
      }
    });
  }

  /**
   * Flush and close every owned provider. Idempotent: later calls return the
   * first call's result and touch no provider.
   *
   * @returns One {@link ShutdownError} per provider that failed or timed out.
   */
  shutdown(): Promise<readonly ShutdownError[]> {
    this.shutdownPromise ??= this.runShutdown();
    return this.shutdownPromise;
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.shutdown();
  }

  private async runShutdown(): Promise<readonly ShutdownError[]> {
    process.removeListener("beforeExit", this.onBeforeExit);
    const handles = this.handles;
    if (handles.length === 0) return [];

    this.logger.info("Shutting down telemetry providers", {
      providers: handles.map((h) => h.kind).join(","),
    });

    const results = await Promise.allSettled(
      handles.map((h) => withTimeout(h.shutdown(), this.timeoutMs)),
    );

    const failures: ShutdownError[] = [];
    results.forEach((result, i) => {
      if (result.status === "fulfilled") return;
      const { kind } = handles[i];
      const failure = new ShutdownError(kind, errorMessage(result.reason), {
        cause: result.reason,
      });
      failures.push(failure);
      this.logger.warn(`Failed to shutdown ${kind} provider`, { error: failure.message });
    });
    return failures;
  }
}
