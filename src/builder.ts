import type { DestinationStream } from "pino";
import { compose, type ComposeResult } from "./composer.js";
import { loadEnvironmentConfig } from "./env.js";
import { ConfigurationError, MissingProviderError } from "./errors.js";
import { parseExportProtocol } from "./exporters.js";
import { initMetering, initTracing, type MissingProviderPolicy } from "./otel-globals.js";
import type {
  EnvMap,
  ExportProtocol,
  LogLevel,
  PipelineConfig,
  StageErrorPolicy,
} from "./types.js";

/**
 * Fluent entry point for hosts.
 *
 * The constructor seeds endpoints and protocol from the environment
 * (`METRICS_ENDPOINT`, `TRACING_ENDPOINT`, `OTEL_EXPORTER_OTLP_*`); every
 * `with*` call overrides what the environment provided.
 *
 * @example
 * ```ts
 * const { guard, logger } = new TelemetryBuilder("orders-api")
 *   .withServiceVersion("1.4.0")
 *   .withLogLevel("debug")
 *   .withMetricsEndpoint("http://collector:4318")
 *   .build();
 *
 * logger.info("started", { port: 8080 });
 * ```
 */
export class TelemetryBuilder {
  private readonly config: PipelineConfig;
  private globalProviders: MissingProviderPolicy | undefined;
  private built = false;

  /**
   * @throws {ConfigurationError} when `OTEL_EXPORTER_OTLP_PROTOCOL` names an unsupported protocol.
   */
  constructor(serviceName: string, env?: EnvMap) {
    const fromEnv = loadEnvironmentConfig(env);
    this.config = {
      serviceName,
      metricsEndpoint: fromEnv.metricsEndpoint,
      tracingEndpoint: fromEnv.tracingEndpoint,
      exportProtocol: fromEnv.protocol ? parseExportProtocol(fromEnv.protocol) : undefined,
      env,
    };
  }

  withServiceVersion(version: string): this {
    this.config.serviceVersion = version;
    return this;
  }

  withLogLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  withMetricsEndpoint(endpoint: string): this {
    this.config.metricsEndpoint = endpoint;
    return this;
  }

  withTracingEndpoint(endpoint: string): this {
    this.config.tracingEndpoint = endpoint;
    return this;
  }

  withExportProtocol(protocol: ExportProtocol): this {
    this.config.exportProtocol = protocol;
    return this;
  }

  withExporterHeaders(headers: Record<string, string>): this {
    this.config.exporterHeaders = { ...this.config.exporterHeaders, ...headers };
    return this;
  }

  withResourceAttributes(attributes: Record<string, string>): this {
    this.config.resourceAttributes = { ...this.config.resourceAttributes, ...attributes };
    return this;
  }

  withMetricsExportInterval(ms: number): this {
    this.config.metricsExportIntervalMs = ms;
    return this;
  }

  withShutdownTimeout(ms: number): this {
    this.config.shutdownTimeoutMs = ms;
    return this;
  }

  withStageErrorPolicy(policy: StageErrorPolicy): this {
    this.config.onStageError = policy;
    return this;
  }

  withExitHooks(enabled: boolean): this {
    this.config.exitHooks = enabled;
    return this;
  }

  withLogDestination(destination: DestinationStream): this {
    this.config.logDestination = destination;
    return this;
  }

  /**
   * Also register the created providers as the global OTel tracer and meter
   * providers after composing. `onMissing` applies to a provider whose
   * endpoint was not configured.
   */
  withGlobalProviders(onMissing: MissingProviderPolicy = "warn"): this {
    this.globalProviders = onMissing;
    return this;
  }

  /** A snapshot of the configuration {@link build} will use. */
  snapshot(): Readonly<PipelineConfig> {
    return { ...this.config };
  }

  /**
   * Compose and install the pipeline. Callable once per builder.
   *
   * @throws {ConfigurationError} on a second call or invalid configuration.
   * @throws {AlreadyInstalledError} when a dispatcher is already installed.
   * @throws {ExporterBuildError} when a stage fails under the `"abort"` policy.
   * @throws {MissingProviderError} from {@link withGlobalProviders}`("error")`
   *   when an endpoint is not configured. Nothing is installed in that case.
   *   A stage dropped under the `"skip"` policy is only detected after
   *   composing; the dispatcher then stays installed and the providers are
   *   shut down.
   */
  build(): ComposeResult {
    if (this.built) {
      throw new ConfigurationError("build() was already called on this builder");
    }
    this.built = true;

    if (this.globalProviders === "error") {
      if (!this.config.tracingEndpoint) throw new MissingProviderError("tracing");
      if (!this.config.metricsEndpoint) throw new MissingProviderError("metrics");
    }

    const result = compose(Object.freeze({ ...this.config }));
    if (this.globalProviders) {
      const options = { onMissing: this.globalProviders, logger: result.logger };
      try {
        initTracing(result.guard, options);
        initMetering(result.guard, options);
      } catch (err) {
        // The caller never receives the guard, so close its providers here.
        void result.guard.shutdown();
        throw err;
      }
    }
    return result;
  }
}
