import { normalizeEndpoint } from "./endpoints.js";
import type { EnvMap, OtlpSignal } from "./types.js";

/**
 * Read an environment variable from `env` when given, else `process.env`.
 * Blank values read as absent.
 */
export function readEnv(key: string, env?: EnvMap): string | undefined {
  const source = env ?? (typeof process !== "undefined" ? process.env : undefined);
  const value = source?.[key];
  if (value == null || value.trim() === "") return undefined;
  return value.trim();
}

/** Raw settings read from the environment, before validation. */
export interface EnvironmentConfig {
  metricsEndpoint?: string;
  tracingEndpoint?: string;
  /** Raw `LOG_LEVEL`; parsed by the logging stage. */
  logLevel?: string;
  /** Raw `OTEL_EXPORTER_OTLP_PROTOCOL`. */
  protocol?: string;
}

const SIGNAL_ENV: Record<OtlpSignal, { primary: string; otel: string }> = {
  metrics: { primary: "METRICS_ENDPOINT", otel: "OTEL_EXPORTER_OTLP_METRICS_ENDPOINT" },
  traces: { primary: "TRACING_ENDPOINT", otel: "OTEL_EXPORTER_OTLP_TRACES_ENDPOINT" },
};

/**
 * Resolve the endpoint for a signal from the environment.
 *
 * Priority (highest first):
 * 1. `METRICS_ENDPOINT` / `TRACING_ENDPOINT` (full URL)
 * 2. `OTEL_EXPORTER_OTLP_{SIGNAL}_ENDPOINT` (full URL)
 * 3. `OTEL_EXPORTER_OTLP_ENDPOINT`, shared by both signals
 * 4. `undefined` → stage omitted
 *
 * The `/v1/{signal}` path is left to `resolveExportUrl()`, which knows
 * the protocol.
 */
export function resolveEnvEndpoint(signal: OtlpSignal, env?: EnvMap): string | undefined {
  const { primary, otel } = SIGNAL_ENV[signal];
  return (
    readEnv(primary, env) ??
    readEnv(otel, env) ??
    normalizeEndpoint(readEnv("OTEL_EXPORTER_OTLP_ENDPOINT", env))
  );
}

/** Collect every pipeline setting the environment provides. */
export function loadEnvironmentConfig(env?: EnvMap): EnvironmentConfig {
  return {
    metricsEndpoint: resolveEnvEndpoint("metrics", env),
    tracingEndpoint: resolveEnvEndpoint("traces", env),
    logLevel: readEnv("LOG_LEVEL", env),
    protocol: readEnv("OTEL_EXPORTER_OTLP_PROTOCOL", env),
  };
}
