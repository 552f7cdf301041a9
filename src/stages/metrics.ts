import type { Attributes, Meter } from "@opentelemetry/api";
import { MeterProvider, PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { resolveExportUrl } from "../endpoints.js";
import { createMetricExporter, DEFAULT_EXPORT_PROTOCOL } from "../exporters.js";
import { ProviderHandle } from "../provider-handle.js";
import { buildResource, type ResourceDescriptor } from "../resource.js";
import type { EnvMap, EventRecord, ExportProtocol, PipelineStage } from "../types.js";

export const DEFAULT_METRICS_EXPORT_INTERVAL_MS = 60_000;
const DEFAULT_EXPORT_TIMEOUT_MS = 30_000;

type InstrumentKind = "counter" | "upDownCounter" | "histogram";

/** Event attribute prefixes that turn a field into a metric update. */
const METRIC_PREFIXES: ReadonlyArray<readonly [string, InstrumentKind]> = [
  ["monotonic_counter.", "counter"],
  ["counter.", "upDownCounter"],
  ["histogram.", "histogram"],
];

type Update = (value: number, attributes: Attributes) => void;

interface MetricField {
  kind: InstrumentKind;
  name: string;
  value: number;
}

function splitFields(record: EventRecord): { metrics: MetricField[]; attributes: Attributes } {
  const metrics: MetricField[] = [];
  const attributes: Attributes = {};

  for (const [key, value] of Object.entries(record.attributes)) {
    if (value === undefined) continue;
    const prefix = METRIC_PREFIXES.find(([p]) => key.startsWith(p));
    if (!prefix) {
      attributes[key] = value;
      continue;
    }
    const name = key.slice(prefix[0].length);
    if (typeof value === "number" && Number.isFinite(value) && name !== "") {
      metrics.push({ kind: prefix[1], name, value });
    }
  }

  return { metrics, attributes };
}

/** A metrics stage bound to an existing {@link Meter}. */
export interface MetricsStage extends PipelineStage {
  readonly name: "metrics";
}

/**
 * Turn events into instrument updates.
 *
 * - `monotonic_counter.<name>` → Counter
 * - `counter.<name>` → UpDownCounter
 * - `histogram.<name>` → Histogram
 *
 * Remaining attributes become the data point's attributes. Instruments are
 * created once per kind and name.
 */
export function createMetricsStage(meter: Meter): MetricsStage {
  const instruments = new Map<string, Update>();

  function create(kind: InstrumentKind, name: string): Update {
    switch (kind) {
      case "counter": {
        const counter = meter.createCounter(name);
        return (value, attrs) => counter.add(value, attrs);
      }
      case "upDownCounter": {
        const counter = meter.createUpDownCounter(name);
        return (value, attrs) => counter.add(value, attrs);
      }
      case "histogram": {
        const histogram = meter.createHistogram(name);
        return (value, attrs) => histogram.record(value, attrs);
      }
    }
  }

  function instrument(kind: InstrumentKind, name: string): Update {
    const key = `${kind}:${name}`;
    const existing = instruments.get(key);
    if (existing) return existing;
    const update = create(kind, name);
    instruments.set(key, update);
    return update;
  }

  return {
    name: "metrics",
    process(record) {
      if (record.kind !== "event") return;
      const { metrics, attributes } = splitFields(record);
      for (const metric of metrics) {
        instrument(metric.kind, metric.name)(metric.value, attributes);
      }
    },
  };
}

export interface MetricsStageOptions {
  protocol?: ExportProtocol;
  headers?: Record<string, string>;
  /** Collection interval (default `60000`). */
  exportIntervalMillis?: number;
  resourceAttributes?: Record<string, string>;
  env?: EnvMap;
}

export interface BuiltMetricsStage {
  stage: MetricsStage;
  handle: ProviderHandle<MeterProvider>;
}

/**
 * Build the OTLP metrics stage.
 *
 * The returned provider starts its periodic export immediately; its handle
 * must reach a {@link LifecycleGuard}.
 *
 * @throws {ExporterBuildError} when the endpoint is malformed or the exporter
 *   cannot be constructed. No provider is created in that case.
 */
export function buildMetricsStage(
  endpoint: string,
  resource: ResourceDescriptor,
  options: MetricsStageOptions = {},
): BuiltMetricsStage {
  const protocol = options.protocol ?? DEFAULT_EXPORT_PROTOCOL;
  const url = resolveExportUrl(endpoint, "metrics", protocol);
  const exporter = createMetricExporter(url, { protocol, headers: options.headers });

  const interval = options.exportIntervalMillis ?? DEFAULT_METRICS_EXPORT_INTERVAL_MS;
  const otelResource = buildResource(resource, options.resourceAttributes, options.env);
  const provider = new MeterProvider({
    resource: otelResource,
    readers: [
      new PeriodicExportingMetricReader({
        exporter,
        exportIntervalMillis: interval,
        exportTimeoutMillis: Math.min(DEFAULT_EXPORT_TIMEOUT_MS, interval),
      }),
    ],
  });

  const meter = provider.getMeter(resource.serviceName, resource.serviceVersion);
  return {
    stage: createMetricsStage(meter),
    handle: new ProviderHandle("metrics", provider, resource, otelResource),
  };
}
