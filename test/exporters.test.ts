import { describe, it, expect } from "vitest";
import { OTLPMetricExporter as OTLPGrpcMetricExporter } from "@opentelemetry/exporter-metrics-otlp-grpc";
import { OTLPMetricExporter as OTLPHttpMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPMetricExporter as OTLPProtoMetricExporter } from "@opentelemetry/exporter-metrics-otlp-proto";
import { OTLPTraceExporter as OTLPGrpcTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { OTLPTraceExporter as OTLPHttpTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPTraceExporter as OTLPProtoTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { ConfigurationError } from "../src/errors.js";
import {
  createMetricExporter,
  createSpanExporter,
  DEFAULT_EXPORT_PROTOCOL,
  isExportProtocol,
  parseExportProtocol,
} from "../src/exporters.js";

describe("parseExportProtocol", () => {
  it("accepts every supported protocol", () => {
    expect(parseExportProtocol("http/protobuf")).toBe("http/protobuf");
    expect(parseExportProtocol("http/json")).toBe("http/json");
    expect(parseExportProtocol("grpc")).toBe("grpc");
  });

  it("normalizes case and whitespace", () => {
    expect(parseExportProtocol(" GRPC ")).toBe("grpc");
    expect(parseExportProtocol("HTTP/Protobuf")).toBe("http/protobuf");
  });

  it("rejects anything else", () => {
    expect(() => parseExportProtocol("http")).toThrow(ConfigurationError);
    expect(() => parseExportProtocol("http")).toThrow(
      'Invalid configuration: unsupported export protocol "http" (expected one of http/protobuf, http/json, grpc)',
    );
  });
});

describe("isExportProtocol", () => {
  it("matches exact names only", () => {
    expect(isExportProtocol("http/json")).toBe(true);
    expect(isExportProtocol("HTTP/JSON")).toBe(false);
  });
});

it("defaults to http/protobuf", () => {
  expect(DEFAULT_EXPORT_PROTOCOL).toBe("http/protobuf");
});

describe("createMetricExporter", () => {
  const url = "http://collector:4318/v1/metrics";

  it("builds the protobuf exporter", () => {
    expect(createMetricExporter(url, { protocol: "http/protobuf" })).toBeInstanceOf(
      OTLPProtoMetricExporter,
    );
  });

  it("builds the JSON exporter with headers", () => {
    const exporter = createMetricExporter(url, {
      protocol: "http/json",
      headers: { authorization: "Bearer test-token" },
    });
    expect(exporter).toBeInstanceOf(OTLPHttpMetricExporter);
  });

  it("builds the gRPC exporter", () => {
    expect(createMetricExporter("http://collector:4317", { protocol: "grpc" })).toBeInstanceOf(
      OTLPGrpcMetricExporter,
    );
  });
});

describe("createSpanExporter", () => {
  const url = "http://collector:4318/v1/traces";

  it("builds the protobuf exporter", () => {
    expect(createSpanExporter(url, { protocol: "http/protobuf" })).toBeInstanceOf(
      OTLPProtoTraceExporter,
    );
  });

  it("builds the JSON exporter", () => {
    expect(createSpanExporter(url, { protocol: "http/json" })).toBeInstanceOf(
      OTLPHttpTraceExporter,
    );
  });

  it("builds the gRPC exporter", () => {
    expect(createSpanExporter("http://collector:4317", { protocol: "grpc" })).toBeInstanceOf(
      OTLPGrpcTraceExporter,
    );
  });
});
