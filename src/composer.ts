import { createDispatcher, type Dispatcher } from "./dispatcher.js";
import { resolveExportUrl } from "./endpoints.js";
import { AlreadyInstalledError, ConfigurationError, errorMessage, ExporterBuildError } from "./errors.js";
import { DEFAULT_EXPORT_PROTOCOL } from "./exporters.js";
import { installGlobalDispatcher, isGlobalDispatcherInstalled } from "./global.js";
import { DEFAULT_SHUTDOWN_TIMEOUT_MS, LifecycleGuard, type GuardedProviders } from "./lifecycle.js";
import { createLogger } from "./logger.js";
import { ensureContextManager } from "./otel-globals.js";
import { createResourceDescriptor } from "./resource.js";
import { buildLogStage, resolveLogLevel } from "./stages/logging.js";
import { buildMetricsStage, DEFAULT_METRICS_EXPORT_INTERVAL_MS } from "./stages/metrics.js";
import { buildTracingStage } from "./stages/tracing.js";
import type { Logger, OtlpSignal, PipelineConfig, PipelineStage } from "./types.js";

/** Logger name used for the pipeline's own messages. */
export const INTERNAL_TARGET = "telemetry";

/** What {@link compose} hands back to the host. */
export interface ComposeResult {
  /** The installed process-wide dispatcher. */
  dispatcher: Dispatcher;
  /** Owner of the created providers. Keep it alive for the life of the process. */
  guard: LifecycleGuard;
  /** Logger bound to {@link ComposeResult.dispatcher}. */
  logger: Logger;
}

function assertPositive(name: string, value: number | undefined): void {
  if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
    throw new ConfigurationError(`${name} must be a positive number, got ${value}`);
  }
}

function assertEndpoint(name: string, value: string | undefined): void {
  if (value !== undefined && value.trim() === "") {
    throw new ConfigurationError(`${name} must not be empty when set`);
  }
}

function validateConfig(config: PipelineConfig): void {
  assertEndpoint("metricsEndpoint", config.metricsEndpoint);
  assertEndpoint("tracingEndpoint", config.tracingEndpoint);
  assertPositive("metricsExportIntervalMs", config.metricsExportIntervalMs);
  assertPositive("shutdownTimeoutMs", config.shutdownTimeoutMs);
  const policy = config.onStageError;
  if (policy !== undefined && policy !== "abort" && policy !== "skip") {
    throw new ConfigurationError(`onStageError must be "abort" or "skip", got "${String(policy)}"`);
  }
}

/**
 * Assemble the pipeline described by `config` and install it process-wide.
 *
 * 1. Logging is always built.
 * 2. Metrics and tracing are built only when their endpoint is set.
 * 3. Stages are dispatched in the order logging, metrics, tracing.
 * 4. The dispatcher is installed only after every configured stage built.
 * 5. An AsyncLocalStorage context manager is enabled unless the host already
 *    registered one, so spans opened through the dispatcher nest.
 *
 * With `onStageError: "abort"` (default) a failing stage fails composition and
 * providers already built are shut down. With `"skip"` the stage is dropped
 * and a warning is logged.
 *
 * @throws {ConfigurationError} for invalid config, before any stage is built.
 * @throws {AlreadyInstalledError} when a dispatcher is already installed.
 * @throws {ExporterBuildError} when a stage fails under the `"abort"` policy.
 */
export function compose(config: PipelineConfig): ComposeResult {
  const resource = createResourceDescriptor(config.serviceName, config.serviceVersion);
  validateConfig(config);
  if (isGlobalDispatcherInstalled()) {
    throw new AlreadyInstalledError();
  }

  const policy = config.onStageError ?? "abort";
  const protocol = config.exportProtocol ?? DEFAULT_EXPORT_PROTOCOL;
  const env = config.env;

  const { level, rejected } = resolveLogLevel(config.logLevel, env);
  const logStage = buildLogStage(level, {
    serviceName: resource.serviceName,
    destination: config.logDestination,
    env,
  });

  // Messages emitted while building go straight to the logging stage.
  const buildLogger = createLogger(INTERNAL_TARGET, createDispatcher([logStage]));
  if (rejected !== undefined) {
    buildLogger.warn(`Unrecognised LOG_LEVEL "${rejected}", using "${level}"`);
  }

  const stages: PipelineStage[] = [logStage];
  const providers: GuardedProviders = {};
  const guardOptions = {
    shutdownTimeoutMs: config.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    exitHooks: config.exitHooks ?? true,
  };

  const fail = (err: unknown): never => {
    // Providers built before the failure already run their export timers.
    void new LifecycleGuard(providers, { ...guardOptions, logger: buildLogger, exitHooks: false }).shutdown();
    throw err;
  };

  const attempt = (signal: OtlpSignal, build: () => void): void => {
    try {
      build();
    } catch (err) {
      if (policy === "abort" || !(err instanceof ExporterBuildError)) fail(err);
      buildLogger.warn(`${signal} export disabled: ${errorMessage(err)}`, { signal });
    }
  };

  // Pre-validate so an invalid tracing endpoint fails before metrics starts exporting.
  if (policy === "abort") {
    if (config.metricsEndpoint) resolveExportUrl(config.metricsEndpoint, "metrics", protocol);
    if (config.tracingEndpoint) resolveExportUrl(config.tracingEndpoint, "traces", protocol);
  }

  const { metricsEndpoint, tracingEndpoint } = config;
  if (metricsEndpoint) {
    attempt("metrics", () => {
      const built = buildMetricsStage(metricsEndpoint, resource, {
        protocol,
        headers: config.exporterHeaders,
        exportIntervalMillis: config.metricsExportIntervalMs ?? DEFAULT_METRICS_EXPORT_INTERVAL_MS,
        resourceAttributes: config.resourceAttributes,
        env,
      });
      stages.push(built.stage);
      providers.metrics = built.handle;
    });
  }

  if (tracingEndpoint) {
    attempt("traces", () => {
      const built = buildTracingStage(tracingEndpoint, resource, resource.serviceName, {
        protocol,
        headers: config.exporterHeaders,
        resourceAttributes: config.resourceAttributes,
        env,
      });
      stages.push(built.stage);
      providers.tracing = built.handle;
    });
  }

  const dispatcher = createDispatcher(stages);
  try {
    installGlobalDispatcher(dispatcher);
  } catch (err) {
    fail(err);
  }
  ensureContextManager();

  const logger = createLogger(INTERNAL_TARGET, dispatcher);
  const guard = new LifecycleGuard(providers, { ...guardOptions, logger });
  logger.debug("Telemetry pipeline installed", { stages: dispatcher.stages.join(",") });

  return { dispatcher, guard, logger };
}
