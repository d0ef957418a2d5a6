export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (ALLOWED_LOG_LEVELS as readonly string[]).includes(value);
}

export function normalizeLogLevel(level?: string, fallback: LogLevel = "info"): LogLevel {
  const candidate = (level ?? fallback).trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

// Severity rank: lower is more severe. `a` passes a threshold `t` when rank(a) <= rank(t).
export function levelToMinLevel(level: LogLevel): number {
  const map: Record<LogLevel, number> = {
    fatal: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}

/** tslog's own numbering (trace=1 .. fatal=6); it drops anything below `minLevel`. */
export function levelToTslogMinLevel(level: LogLevel): number {
  const map: Record<LogLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}
