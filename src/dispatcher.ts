import { context, createContextKey, diag, type Context } from "@opentelemetry/api";
import type {
  LogAttributes,
  LogLevel,
  PipelineStage,
  SpanFailure,
  StageName,
  TelemetryRecord,
} from "./types.js";

/** A span opened through a {@link Dispatcher}. */
export interface DispatchSpan {
  readonly id: number;
  readonly name: string;
  readonly level: LogLevel;
  readonly target?: string;
  /** `true` once {@link DispatchSpan.end} has run. */
  readonly ended: boolean;
  /** Add or overwrite attributes on the open span. */
  record(attributes: LogAttributes): void;
  /** Close the span. Passing an error marks it failed. Later calls are ignored. */
  end(error?: unknown): void;
}

export interface StartSpanOptions {
  level?: LogLevel;
  target?: string;
  attributes?: LogAttributes;
  /**
   * Explicit parent. `undefined` inherits the active span, `null` starts a root span.
   */
  parent?: DispatchSpan | null;
}

export interface EventOptions {
  target?: string;
  /** Enclosing span. Defaults to the active span. */
  span?: DispatchSpan;
}

/**
 * The merged sink that routes every record to all stages, in insertion order.
 */
export interface Dispatcher {
  /** Stage names in dispatch order. */
  readonly stages: readonly StageName[];
  dispatch(record: TelemetryRecord): void;
  event(
    level: LogLevel,
    message: string,
    attributes?: LogAttributes,
    options?: EventOptions,
  ): void;
  startSpan(name: string, options?: StartSpanOptions): DispatchSpan;
}

const ACTIVE_SPAN_KEY = createContextKey("telemetry-bootstrap.active-span");

/**
 * Return the dispatcher span active in the current OTel context.
 *
 * Needs a registered context manager; `compose()` enables one.
 */
export function getActiveSpan(ctx: Context = context.active()): DispatchSpan | undefined {
  const value = ctx.getValue(ACTIVE_SPAN_KEY);
  return isDispatchSpan(value) ? value : undefined;
}

/** Run `fn` with `span` as the active dispatcher span. */
export function withActiveSpan<T>(span: DispatchSpan, fn: () => T): T {
  return context.with(context.active().setValue(ACTIVE_SPAN_KEY, span), fn);
}

function isDispatchSpan(value: unknown): value is DispatchSpan {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    "end" in value &&
    typeof value.end === "function"
  );
}

export function toSpanFailure(error: unknown): SpanFailure {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "Error", message: String(error) };
}

/**
 * Concatenate stages into one {@link Dispatcher}.
 *
 * A throwing stage is reported through `diag` and does not stop later stages.
 */
export function createDispatcher(stages: readonly PipelineStage[]): Dispatcher {
  const ordered = [...stages];
  let nextSpanId = 1;

  function dispatch(record: TelemetryRecord): void {
    for (const stage of ordered) {
      try {
        stage.process(record);
      } catch (err) {
        diag.error(`telemetry stage "${stage.name}" failed to process ${record.kind}`, err);
      }
    }
  }

  function startSpan(name: string, options: StartSpanOptions = {}): DispatchSpan {
    const id = nextSpanId++;
    const level = options.level ?? "info";
    const parent = options.parent === undefined ? getActiveSpan() : options.parent ?? undefined;
    let ended = false;

    dispatch({
      kind: "span-start",
      id,
      name,
      level,
      target: options.target,
      attributes: { ...options.attributes },
      parentId: parent?.id,
      timestamp: Date.now(),
    });

    return {
      id,
      name,
      level,
      target: options.target,
      get ended() {
        return ended;
      },
      record(attributes) {
        if (ended) return;
        dispatch({ kind: "span-update", id, level, attributes: { ...attributes } });
      },
      end(error?: unknown) {
        if (ended) return;
        ended = true;
        dispatch({
          kind: "span-end",
          id,
          level,
          timestamp: Date.now(),
          ...(error !== undefined ? { error: toSpanFailure(error) } : {}),
        });
      },
    };
  }

  return {
    stages: ordered.map((stage) => stage.name),
    dispatch,
    event(level, message, attributes, options = {}) {
      const span = options.span ?? getActiveSpan();
      dispatch({
        kind: "event",
        level,
        message,
        target: options.target,
        attributes: { ...attributes },
        timestamp: Date.now(),
        ...(span ? { span: { id: span.id, name: span.name } } : {}),
      });
    },
    startSpan,
  };
}
