import {
  context,
  SpanStatusCode,
  trace,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import { BasicTracerProvider, BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { resolveExportUrl } from "../endpoints.js";
import { createSpanExporter, DEFAULT_EXPORT_PROTOCOL } from "../exporters.js";
import { ProviderHandle } from "../provider-handle.js";
import { buildResource, type ResourceDescriptor } from "../resource.js";
import type { EnvMap, ExportProtocol, PipelineStage, TelemetryRecord } from "../types.js";

/** A tracing stage bound to an existing {@link Tracer}. */
export interface TracingStage extends PipelineStage {
  readonly name: "tracing";
  /** Number of spans started but not yet ended. */
  readonly openSpans: number;
}

/** Open spans kept by default before the oldest is evicted. */
export const DEFAULT_MAX_OPEN_SPANS = 10_000;

export interface TracingStageLimits {
  /** Open spans kept before the oldest is ended and dropped. */
  maxOpenSpans?: number;
}

/**
 * Mirror dispatcher spans as OpenTelemetry spans.
 *
 * Events inside a span become span events; an `error` event or a failed
 * span end sets the span status to ERROR.
 *
 * Spans are expected to end. Past `maxOpenSpans` the oldest open span is
 * ended with an ERROR status and forgotten; its later records are ignored.
 */
export function createTracingStage(tracer: Tracer, limits: TracingStageLimits = {}): TracingStage {
  const maxOpenSpans = limits.maxOpenSpans ?? DEFAULT_MAX_OPEN_SPANS;
  const spans = new Map<number, Span>();

  function evictOldest(): void {
    for (const [id, span] of spans) {
      spans.delete(id);
      span.setStatus({ code: SpanStatusCode.ERROR, message: "span evicted before it ended" });
      span.end();
      return;
    }
  }

  function handle(record: TelemetryRecord): void {
    switch (record.kind) {
      case "span-start": {
        const parent = record.parentId !== undefined ? spans.get(record.parentId) : undefined;
        const ctx = parent ? trace.setSpan(context.active(), parent) : context.active();
        const span = tracer.startSpan(
          record.name,
          {
            attributes: { ...record.attributes, level: record.level },
            startTime: record.timestamp,
          },
          ctx,
        );
        spans.set(record.id, span);
        if (spans.size > maxOpenSpans) evictOldest();
        return;
      }
      case "span-update": {
        spans.get(record.id)?.setAttributes(record.attributes);
        return;
      }
      case "event": {
        if (!record.span) return;
        const span = spans.get(record.span.id);
        if (!span) return;
        span.addEvent(
          record.message,
          { ...record.attributes, level: record.level },
          record.timestamp,
        );
        if (record.level === "error") {
          span.setStatus({ code: SpanStatusCode.ERROR, message: record.message });
        }
        return;
      }
      case "span-end": {
        const span = spans.get(record.id);
        if (!span) return;
        spans.delete(record.id);
        if (record.error) {
          span.recordException(record.error);
          span.setStatus({ code: SpanStatusCode.ERROR, message: record.error.message });
        }
        span.end(record.timestamp);
        return;
      }
    }
  }

  return {
    name: "tracing",
    get openSpans() {
      return spans.size;
    },
    process: handle,
  };
}

export interface TracingStageOptions extends TracingStageLimits {
  protocol?: ExportProtocol;
  headers?: Record<string, string>;
  resourceAttributes?: Record<string, string>;
  env?: EnvMap;
}

export interface BuiltTracingStage {
  stage: TracingStage;
  handle: ProviderHandle<BasicTracerProvider>;
}

/**
 * Build the OTLP tracing stage: batch span exporter, tracer provider tagged
 * with `resource`, and a tracer scoped to `serviceName`.
 *
 * @throws {ExporterBuildError} when the endpoint is malformed or the exporter
 *   cannot be constructed. No provider is created in that case.
 */
export function buildTracingStage(
  endpoint: string,
  resource: ResourceDescriptor,
  serviceName: string,
  options: TracingStageOptions = {},
): BuiltTracingStage {
  const protocol = options.protocol ?? DEFAULT_EXPORT_PROTOCOL;
  const url = resolveExportUrl(endpoint, "traces", protocol);
  const exporter = createSpanExporter(url, { protocol, headers: options.headers });

  const otelResource = buildResource(resource, options.resourceAttributes, options.env);
  const provider = new BasicTracerProvider({
    resource: otelResource,
    spanProcessors: [new BatchSpanProcessor(exporter)],
  });

  const tracer = provider.getTracer(serviceName, resource.serviceVersion);
  return {
    stage: createTracingStage(tracer, { maxOpenSpans: options.maxOpenSpans }),
    handle: new ProviderHandle("tracing", provider, resource, otelResource),
  };
}
