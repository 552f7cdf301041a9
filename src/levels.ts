import type { LogLevel } from "./types.js";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

const SEVERITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a level name, case-insensitively. `"warning"` is accepted as `"warn"`.
 * Returns `undefined` for anything else.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value == null) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "warning") return "warn";
  return isLogLevel(normalized) ? normalized : undefined;
}

/** `true` when `level` is at least as severe as `threshold`. */
export function isLevelAtLeast(level: LogLevel, threshold: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}
