import { describe, it, expect, vi, afterEach } from "vitest";
import { createNoopMeter, type Meter } from "@opentelemetry/api";
import { MeterProvider } from "@opentelemetry/sdk-metrics";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { ExporterBuildError } from "../src/errors.js";
import { buildMetricsStage, createMetricsStage } from "../src/stages/metrics.js";
import type { EventRecord, LogAttributes } from "../src/types.js";

function spyMeter() {
  const meter: Meter = createNoopMeter();
  const counterAdd = vi.fn();
  const upDownAdd = vi.fn();
  const histogramRecord = vi.fn();
  const createCounter = vi.spyOn(meter, "createCounter").mockReturnValue({ add: counterAdd });
  const createUpDownCounter = vi
    .spyOn(meter, "createUpDownCounter")
    .mockReturnValue({ add: upDownAdd });
  const createHistogram = vi
    .spyOn(meter, "createHistogram")
    .mockReturnValue({ record: histogramRecord });
  return {
    meter,
    counterAdd,
    upDownAdd,
    histogramRecord,
    createCounter,
    createUpDownCounter,
    createHistogram,
  };
}

function event(attributes: LogAttributes): EventRecord {
  return { kind: "event", level: "info", message: "tick", attributes, timestamp: 0 };
}

describe("createMetricsStage", () => {
  it("is named metrics", () => {
    expect(createMetricsStage(spyMeter().meter).name).toBe("metrics");
  });

  it("maps monotonic_counter.* to a counter", () => {
    const m = spyMeter();
    const stage = createMetricsStage(m.meter);

    stage.process(event({ "monotonic_counter.requests": 1, route: "/orders" }));

    expect(m.createCounter).toHaveBeenCalledWith("requests");
    expect(m.counterAdd).toHaveBeenCalledWith(1, { route: "/orders" });
  });

  it("maps counter.* to an up-down counter", () => {
    const m = spyMeter();
    const stage = createMetricsStage(m.meter);

    stage.process(event({ "counter.inflight": -1 }));

    expect(m.createUpDownCounter).toHaveBeenCalledWith("inflight");
    expect(m.upDownAdd).toHaveBeenCalledWith(-1, {});
  });

  it("maps histogram.* to a histogram", () => {
    const m = spyMeter();
    const stage = createMetricsStage(m.meter);

    stage.process(event({ "histogram.latency_ms": 12.5, status: 200 }));

    expect(m.createHistogram).toHaveBeenCalledWith("latency_ms");
    expect(m.histogramRecord).toHaveBeenCalledWith(12.5, { status: 200 });
  });

  it("creates each instrument once", () => {
    const m = spyMeter();
    const stage = createMetricsStage(m.meter);

    stage.process(event({ "monotonic_counter.requests": 1 }));
    stage.process(event({ "monotonic_counter.requests": 2 }));

    expect(m.createCounter).toHaveBeenCalledTimes(1);
    expect(m.counterAdd).toHaveBeenCalledTimes(2);
    expect(m.counterAdd).toHaveBeenLastCalledWith(2, {});
  });

  it("ignores non-numeric, non-finite and unnamed metric fields", () => {
    const m = spyMeter();
    const stage = createMetricsStage(m.meter);

    stage.process(
      event({
        "monotonic_counter.requests": "one",
        "histogram.latency_ms": Number.NaN,
        "counter.": 3,
        region: "eu",
      }),
    );

    expect(m.createCounter).not.toHaveBeenCalled();
    expect(m.createHistogram).not.toHaveBeenCalled();
    expect(m.createUpDownCounter).not.toHaveBeenCalled();
  });

  it("ignores events without metric fields and span records", () => {
    const m = spyMeter();
    const stage = createMetricsStage(m.meter);

    stage.process(event({ user: "42" }));
    stage.process({ kind: "span-start", id: 1, name: "s", level: "info", attributes: {}, timestamp: 0 });
    stage.process({ kind: "span-end", id: 1, level: "info", timestamp: 0 });

    expect(m.createCounter).not.toHaveBeenCalled();
    expect(m.createUpDownCounter).not.toHaveBeenCalled();
    expect(m.createHistogram).not.toHaveBeenCalled();
  });
});

describe("buildMetricsStage", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns a stage and a metrics handle tagged with the service", async () => {
    const shutdown = vi.spyOn(MeterProvider.prototype, "shutdown").mockResolvedValue();
    const { stage, handle } = buildMetricsStage(
      "http://collector:4318",
      { serviceName: "orders-api", serviceVersion: "1.4.0" },
      { env: {} },
    );

    expect(stage.name).toBe("metrics");
    expect(handle.kind).toBe("metrics");
    expect(handle.resource.serviceName).toBe("orders-api");
    expect(handle.otelResource?.attributes[ATTR_SERVICE_NAME]).toBe("orders-api");
    expect(handle.provider).toBeInstanceOf(MeterProvider);

    await handle.shutdown();
    expect(shutdown).toHaveBeenCalledTimes(1);
  });

  it.each(["http/protobuf", "http/json", "grpc"] as const)("builds with %s", async (protocol) => {
    vi.spyOn(MeterProvider.prototype, "shutdown").mockResolvedValue();
    const { handle } = buildMetricsStage(
      "http://collector:4318",
      { serviceName: "orders-api" },
      { protocol, env: {} },
    );
    expect(handle.provider).toBeInstanceOf(MeterProvider);
    await handle.shutdown();
  });

  it.each(["", "collector:4318", "ftp://collector:4318"])(
    "throws ExporterBuildError for %j",
    (endpoint) => {
      expect(() => buildMetricsStage(endpoint, { serviceName: "orders-api" }, { env: {} })).toThrow(
        ExporterBuildError,
      );
    },
  );
});
