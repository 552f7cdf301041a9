import { context, trace, type SpanContext } from "@opentelemetry/api";
import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { readEnv } from "../env.js";
import { DEFAULT_LOG_LEVEL, isLevelAtLeast, parseLogLevel } from "../levels.js";
import type { EnvMap, EventRecord, LogLevel, PipelineStage, TelemetryRecord } from "../types.js";

const INVALID_TRACE_ID = "00000000000000000000000000000000";

export interface ResolvedLogLevel {
  level: LogLevel;
  /** The unparsable `LOG_LEVEL` value that was ignored, if any. */
  rejected?: string;
}

/**
 * Resolve the minimum severity: explicit override, else `LOG_LEVEL`, else `"info"`.
 * An unparsable `LOG_LEVEL` never fails; it falls back to `"info"`.
 */
export function resolveLogLevel(override?: LogLevel, env?: EnvMap): ResolvedLogLevel {
  if (override) return { level: override };
  const raw = readEnv("LOG_LEVEL", env);
  if (raw === undefined) return { level: DEFAULT_LOG_LEVEL };
  const parsed = parseLogLevel(raw);
  return parsed ? { level: parsed } : { level: DEFAULT_LOG_LEVEL, rejected: raw };
}

export interface LogStageOptions {
  /** Written as `service` on every line. */
  serviceName?: string;
  /** Where JSON lines go. Defaults to stderr. */
  destination?: DestinationStream;
  env?: EnvMap;
}

/** The logging stage, with its resolved level exposed for inspection. */
export interface LoggingStage extends PipelineStage {
  readonly name: "logging";
  readonly level: LogLevel;
  enabled(level: LogLevel): boolean;
}

/** The currently active OTel span context, if it is valid. */
function activeSpanContext(): SpanContext | undefined {
  const span = trace.getSpan(context.active());
  if (!span) return undefined;
  const ctx = span.spanContext();
  return ctx.traceId && ctx.traceId !== INVALID_TRACE_ID ? ctx : undefined;
}

function eventFields(record: EventRecord): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (record.target) fields.target = record.target;
  if (record.span) {
    fields.span = record.span.name;
    fields.spanRef = record.span.id;
  }
  const otel = activeSpanContext();
  if (otel) {
    fields.traceId = otel.traceId;
    fields.spanId = otel.spanId;
  }
  for (const [k, v] of Object.entries(record.attributes)) {
    if (v !== undefined) fields[k] = v;
  }
  return fields;
}

function createPinoLogger(
  level: LogLevel,
  serviceName: string | undefined,
  destination: DestinationStream,
): PinoLogger {
  return pino(
    {
      level,
      base: serviceName ? { service: serviceName } : null,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination,
  );
}

/**
 * Build the level-filtered structured-log stage.
 *
 * Writes one JSON line per accepted event (`level`, `time`, `service`, `msg`,
 * then span and event fields). Span lifecycle records are not logged.
 * Does not touch global state.
 */
export function buildLogStage(level?: LogLevel, options: LogStageOptions = {}): LoggingStage {
  const resolved = resolveLogLevel(level, options.env).level;
  const destination = options.destination ?? pino.destination({ dest: 2, sync: true });
  const logger = createPinoLogger(resolved, options.serviceName, destination);

  const enabled = (candidate: LogLevel) => isLevelAtLeast(candidate, resolved);

  return {
    name: "logging",
    level: resolved,
    enabled,
    process(record: TelemetryRecord) {
      if (record.kind !== "event" || !enabled(record.level)) return;
      logger[record.level](eventFields(record), record.message);
    },
  };
}
