import { withActiveSpan, type Dispatcher, type DispatchSpan } from "./dispatcher.js";
import { getGlobalDispatcher } from "./global.js";
import type { LogAttributes, LogLevel } from "./types.js";

/**
 * Options for {@link withSpan}.
 */
export interface WithSpanOptions {
  /** Override auto-detected span name. */
  name?: string;
  /** Span level (default `"info"`). */
  level?: LogLevel;
  /** Logger name recorded as the span's target. */
  target?: string;
  /** Initial span attributes. */
  attributes?: LogAttributes;
  /**
   * Parent span. When omitted the active span is inherited; `null` starts a root span.
   */
  parent?: DispatchSpan | null;
  /** Dispatcher to use instead of the process-wide one. */
  dispatcher?: Dispatcher;
}

/**
 * Derive a human-readable span name for the given function.
 *
 * Resolution order:
 * 1. `fn.name` (works for named functions / methods)
 * 2. Parse `new Error().stack` for caller file:line
 * 3. Fallback `"anonymous"`
 */
function deriveSpanName(fn: (...args: never[]) => unknown): string {
  if (fn.name) return fn.name;

  const stack = new Error().stack;
  if (stack) {
    const lines = stack.split("\n");
    // Skip Error line, deriveSpanName frame, withSpan frame → caller is at index 3
    const callerLine = lines[3]?.trim();
    if (callerLine) {
      // Match "at <file>:<line>:<col>" or "at <name> (<file>:<line>:<col>)"
      const fileMatch = callerLine.match(/\((.+):(\d+):\d+\)/) ??
        callerLine.match(/at (.+):(\d+):\d+/);
      if (fileMatch) {
        const filePath = fileMatch[1];
        const line = fileMatch[2];
        const fileName = filePath.split("/").pop() ?? filePath;
        return `${fileName}:${line}`;
      }
    }
  }

  return "anonymous";
}

/**
 * Execute `fn` inside a new dispatcher span, returning whatever `fn` returns.
 *
 * The span is the active span while `fn` runs, so nested spans and logger
 * calls attach to it. Errors end the span as failed and are re-thrown.
 *
 * @param fn - The function to run. Receives the open {@link DispatchSpan}.
 * @returns The return value of `fn` (or a `Promise` thereof).
 *
 * @example
 * ```ts
 * const order = await withSpan(async function loadOrder(span) {
 *   span.record({ "order.id": id });
 *   return db.orders.find(id);
 * });
 * ```
 */
export function withSpan<T>(
  fn: (span: DispatchSpan) => T | Promise<T>,
  opts?: WithSpanOptions,
): T | Promise<T> {
  const spanName = opts?.name ?? deriveSpanName(fn);
  const dispatcher = opts?.dispatcher ?? getGlobalDispatcher();
  const span = dispatcher.startSpan(spanName, {
    level: opts?.level,
    target: opts?.target,
    attributes: opts?.attributes,
    parent: opts?.parent,
  });

  return withActiveSpan<T | Promise<T>>(span, () => {
    let result: T | Promise<T>;
    try {
      result = fn(span);
    } catch (error) {
      span.end(error);
      throw error;
    }

    if (result instanceof Promise) {
      return result.then(
        (value) => {
          span.end();
          return value;
        },
        (error: unknown) => {
          span.end(error);
          throw error;
        },
      );
    }

    span.end();
    return result;
  });
}
