import type { OtlpSignal } from "./types.js";

/** Which provider a handle wraps. */
export type ProviderKind = "metrics" | "tracing";

/** Base class for every error raised while building or tearing down the pipeline. */
export abstract class TelemetryError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller-supplied values failed validation. Raised before any stage is built. */
export class ConfigurationError extends TelemetryError {
  readonly code = "CONFIGURATION";

  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
  }
}

/**
 * An exporter could not be constructed: malformed endpoint, unsupported
 * protocol, or a failing transport constructor.
 */
export class ExporterBuildError extends TelemetryError {
  readonly code = "EXPORTER_BUILD";

  constructor(
    readonly signal: OtlpSignal,
    readonly endpoint: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to create ${signal} exporter for "${endpoint}": ${reason}`, options);
  }
}

/** The process-wide dispatcher was already installed. */
export class AlreadyInstalledError extends TelemetryError {
  readonly code = "ALREADY_INSTALLED";

  constructor() {
    super("A global telemetry dispatcher is already installed for this process");
  }
}

/** A provider failed to flush or close. Collected and logged, never thrown by the guard. */
export class ShutdownError extends TelemetryError {
  readonly code = "SHUTDOWN";

  constructor(
    readonly kind: ProviderKind,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Provider shutdown failed (${kind}): ${reason}`, options);
  }
}

/** A provider was requested for global registration but its stage was never configured. */
export class MissingProviderError extends TelemetryError {
  readonly code = "MISSING_PROVIDER";

  constructor(readonly kind: ProviderKind) {
    super(
      kind === "tracing" ? "Missing tracer provider" : "Missing meter provider",
    );
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
