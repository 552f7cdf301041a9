import type { DestinationStream } from "pino";

/** Log severity levels, lowest first. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/**
 * OTLP transport used by the metrics and tracing exporters.
 *
 * `"http/protobuf"` is the binary HTTP encoding and the default.
 */
export type ExportProtocol = "http/protobuf" | "http/json" | "grpc";

/** OTLP signal identifiers for endpoint resolution. */
export type OtlpSignal = "traces" | "metrics";

/** What the composer does when a metrics or tracing stage fails to build. */
export type StageErrorPolicy = "abort" | "skip";

/** Environment variable map, usually `process.env`. */
export type EnvMap = Record<string, string | undefined>;

/**
 * Configuration consumed by {@link compose}.
 *
 * Only `serviceName` is required. A missing endpoint omits that stage.
 */
export interface PipelineConfig {
  /** The logical name of the service reported on every metric and span. */
  serviceName: string;

  /** Reported as `service.version` when set. */
  serviceVersion?: string;

  /** Minimum severity for the logging stage. Falls back to `LOG_LEVEL`, then `"info"`. */
  logLevel?: LogLevel;

  /** OTLP metrics endpoint. Omitted → no metrics stage. */
  metricsEndpoint?: string;

  /** OTLP traces endpoint. Omitted → no tracing stage. */
  tracingEndpoint?: string;

  /** Exporter transport (default `"http/protobuf"`). */
  exportProtocol?: ExportProtocol;

  /** Additional headers sent with every HTTP export request (e.g. auth tokens). */
  exporterHeaders?: Record<string, string>;

  /** Extra key/value pairs merged into the OpenTelemetry `Resource`. */
  resourceAttributes?: Record<string, string>;

  /** Metrics collection interval in milliseconds (default `60000`). */
  metricsExportIntervalMs?: number;

  /** Upper bound for each provider's shutdown in milliseconds (default `5000`). */
  shutdownTimeoutMs?: number;

  /** Default `"abort"`: a failing stage fails the whole composition. */
  onStageError?: StageErrorPolicy;

  /** Shut providers down on the process `beforeExit` event (default `true`). */
  exitHooks?: boolean;

  /** Where the logging stage writes JSON lines. Defaults to stderr. */
  logDestination?: DestinationStream;

  /** Environment map. Falls back to `process.env` when omitted. */
  env?: EnvMap;
}

/** Key/value pairs attached to events and spans. */
export type LogAttributes = Record<string, string | number | boolean | undefined>;

/** Reference to the dispatcher span an event was emitted in. */
export interface SpanRef {
  id: number;
  name: string;
}

/** A log event, optionally inside a span. */
export interface EventRecord {
  kind: "event";
  level: LogLevel;
  message: string;
  /** Emitting component (logger name). */
  target?: string;
  attributes: LogAttributes;
  timestamp: number;
  span?: SpanRef;
}

export interface SpanStartRecord {
  kind: "span-start";
  id: number;
  name: string;
  level: LogLevel;
  target?: string;
  attributes: LogAttributes;
  parentId?: number;
  timestamp: number;
}

export interface SpanUpdateRecord {
  kind: "span-update";
  id: number;
  level: LogLevel;
  attributes: LogAttributes;
}

/** Failure recorded when a span ends with an error. */
export interface SpanFailure {
  name: string;
  message: string;
  stack?: string;
}

export interface SpanEndRecord {
  kind: "span-end";
  id: number;
  level: LogLevel;
  timestamp: number;
  error?: SpanFailure;
}

/** Everything the dispatcher routes to its stages. */
export type TelemetryRecord =
  | EventRecord
  | SpanStartRecord
  | SpanUpdateRecord
  | SpanEndRecord;

export type StageName = "logging" | "metrics" | "tracing";

/**
 * One composable unit of the dispatcher.
 *
 * A stage applies its own filter; the dispatcher never filters on its behalf.
 */
export interface PipelineStage {
  readonly name: StageName;
  process(record: TelemetryRecord): void;
}

/** Structured logger handed to host code. */
export interface Logger {
  trace(message: string, attrs?: LogAttributes): void;
  debug(message: string, attrs?: LogAttributes): void;
  info(message: string, attrs?: LogAttributes): void;
  warn(message: string, attrs?: LogAttributes): void;
  error(message: string, attrs?: LogAttributes): void;
}
