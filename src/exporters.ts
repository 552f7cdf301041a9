import { OTLPMetricExporter as OTLPGrpcMetricExporter } from "@opentelemetry/exporter-metrics-otlp-grpc";
import { OTLPMetricExporter as OTLPHttpMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPMetricExporter as OTLPProtoMetricExporter } from "@opentelemetry/exporter-metrics-otlp-proto";
import { OTLPTraceExporter as OTLPGrpcTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { OTLPTraceExporter as OTLPHttpTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPTraceExporter as OTLPProtoTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import type { PushMetricExporter } from "@opentelemetry/sdk-metrics";
import type { SpanExporter } from "@opentelemetry/sdk-trace-base";
import { ConfigurationError, ExporterBuildError, errorMessage } from "./errors.js";
import type { ExportProtocol, OtlpSignal } from "./types.js";

export const DEFAULT_EXPORT_PROTOCOL: ExportProtocol = "http/protobuf";

const PROTOCOLS: readonly ExportProtocol[] = ["http/protobuf", "http/json", "grpc"];

export function isExportProtocol(value: string): value is ExportProtocol {
  return PROTOCOLS.some((protocol) => protocol === value);
}

/**
 * Parse an `OTEL_EXPORTER_OTLP_PROTOCOL` value.
 *
 * @throws {ConfigurationError} for anything other than `http/protobuf`, `http/json` or `grpc`.
 */
export function parseExportProtocol(value: string): ExportProtocol {
  const normalized = value.trim().toLowerCase();
  if (!isExportProtocol(normalized)) {
    throw new ConfigurationError(
      `unsupported export protocol "${value}" (expected one of ${PROTOCOLS.join(", ")})`,
    );
  }
  return normalized;
}

/** Transport options shared by both exporter kinds. */
export interface ExporterOptions {
  protocol: ExportProtocol;
  /** Sent with HTTP exports. gRPC exporters read `OTEL_EXPORTER_OTLP_HEADERS` instead. */
  headers?: Record<string, string>;
}

function construct<T>(signal: OtlpSignal, url: string, protocol: string, build: () => T): T {
  try {
    return build();
  } catch (err) {
    throw new ExporterBuildError(
      signal,
      url,
      `${protocol} transport could not be constructed: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

/**
 * Construct the OTLP metric exporter for `protocol`.
 *
 * `url` must already be resolved (see {@link resolveExportUrl}).
 *
 * @throws {ExporterBuildError} for an unsupported protocol or a failing constructor.
 */
export function createMetricExporter(url: string, options: ExporterOptions): PushMetricExporter {
  const { protocol, headers } = options;
  switch (protocol) {
    case "http/protobuf":
      return construct("metrics", url, protocol, () => new OTLPProtoMetricExporter({ url, headers }));
    case "http/json":
      return construct("metrics", url, protocol, () => new OTLPHttpMetricExporter({ url, headers }));
    case "grpc":
      return construct("metrics", url, protocol, () => new OTLPGrpcMetricExporter({ url }));
    default:
      throw new ExporterBuildError("metrics", url, `unsupported protocol "${String(protocol)}"`);
  }
}

/**
 * Construct the OTLP span exporter for `protocol`.
 *
 * @throws {ExporterBuildError} for an unsupported protocol or a failing constructor.
 */
export function createSpanExporter(url: string, options: ExporterOptions): SpanExporter {
  const { protocol, headers } = options;
  switch (protocol) {
    case "http/protobuf":
      return construct("traces", url, protocol, () => new OTLPProtoTraceExporter({ url, headers }));
    case "http/json":
      return construct("traces", url, protocol, () => new OTLPHttpTraceExporter({ url, headers }));
    case "grpc":
      return construct("traces", url, protocol, () => new OTLPGrpcTraceExporter({ url }));
    default:
      throw new ExporterBuildError("traces", url, `unsupported protocol "${String(protocol)}"`);
  }
}
