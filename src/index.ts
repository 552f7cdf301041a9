/**
 * @packageDocumentation
 *
 * `telemetry-bootstrap`: compose structured logging, OTLP metrics and OTLP
 * tracing into one process-wide instrumentation pipeline.
 *
 * @example
 * ```ts
 * import { TelemetryBuilder, withSpan } from "telemetry-bootstrap";
 *
 * const { guard, logger } = new TelemetryBuilder("orders-api").build();
 * logger.info("ready");
 * process.once("SIGTERM", () => guard.shutdown());
 * ```
 */

export { TelemetryBuilder } from "./builder.js";
export { compose, INTERNAL_TARGET } from "./composer.js";
export type { ComposeResult } from "./composer.js";
export { LifecycleGuard, DEFAULT_SHUTDOWN_TIMEOUT_MS } from "./lifecycle.js";
export type { GuardedProviders, LifecycleGuardOptions } from "./lifecycle.js";
export { ProviderHandle } from "./provider-handle.js";
export type { MetricsProvider, ShutdownableProvider, TracingProvider } from "./provider-handle.js";
export { createDispatcher, getActiveSpan, withActiveSpan } from "./dispatcher.js";
export type { Dispatcher, DispatchSpan, EventOptions, StartSpanOptions } from "./dispatcher.js";
export {
  getGlobalDispatcher,
  installGlobalDispatcher,
  isGlobalDispatcherInstalled,
} from "./global.js";
export { buildLogStage, resolveLogLevel } from "./stages/logging.js";
export type { LoggingStage, LogStageOptions, ResolvedLogLevel } from "./stages/logging.js";
export { buildMetricsStage, createMetricsStage } from "./stages/metrics.js";
export type { BuiltMetricsStage, MetricsStage, MetricsStageOptions } from "./stages/metrics.js";
export { buildTracingStage, createTracingStage, DEFAULT_MAX_OPEN_SPANS } from "./stages/tracing.js";
export type {
  BuiltTracingStage,
  TracingStage,
  TracingStageLimits,
  TracingStageOptions,
} from "./stages/tracing.js";
export { ensureContextManager, initMetering, initTracing } from "./otel-globals.js";
export type { InitGlobalsOptions, MissingProviderPolicy } from "./otel-globals.js";
export { createLogger } from "./logger.js";
export { withSpan } from "./with-span.js";
export type { WithSpanOptions } from "./with-span.js";
export { traced } from "./traced.js";
export type { TracedInput, TracedCallContext } from "./traced.js";
export { resolveExportUrl, normalizeEndpoint } from "./endpoints.js";
export { loadEnvironmentConfig, readEnv } from "./env.js";
export type { EnvironmentConfig } from "./env.js";
export { parseExportProtocol } from "./exporters.js";
export { buildResource, createResourceDescriptor, parseEnvResourceAttributes } from "./resource.js";
export type { ResourceDescriptor } from "./resource.js";
export { parseLogLevel } from "./levels.js";
export { noopDispatcher, noopLogger } from "./noop.js";
export {
  AlreadyInstalledError,
  ConfigurationError,
  ExporterBuildError,
  MissingProviderError,
  ShutdownError,
  TelemetryError,
} from "./errors.js";
export type { ProviderKind } from "./errors.js";
export type {
  EnvMap,
  EventRecord,
  ExportProtocol,
  LogAttributes,
  LogLevel,
  Logger,
  OtlpSignal,
  PipelineConfig,
  PipelineStage,
  SpanEndRecord,
  SpanStartRecord,
  SpanUpdateRecord,
  StageErrorPolicy,
  StageName,
  TelemetryRecord,
} from "./types.js";
