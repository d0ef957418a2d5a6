export const RESET_PERIODS = ["session", "weekly"] as const;
export type ResetPeriod = (typeof RESET_PERIODS)[number];

export const RESET_FORMATS = ["time", "duration"] as const;
export type ResetFormat = (typeof RESET_FORMATS)[number];

/** A resolved choice plus the configured text when it was not recognized. */
export type ParsedChoice<T extends string> = {
  value: T;
  invalid?: string;
};

export const DEFAULT_API_BASE_URL = "https://api.anthropic.com";
export const DEFAULT_CACHE_DURATION_SECONDS = 300;
export const DEFAULT_TIMEOUT_SECONDS = 2;

export type UsageSegmentOptions = {
  apiBaseUrl: string;
  cacheDurationSeconds: number;
  timeoutSeconds: number;
  resetPeriod: ParsedChoice<ResetPeriod>;
  resetFormat: ParsedChoice<ResetFormat>;
};

function parseChoice<T extends string>(
  choices: readonly T[],
  fallback: T,
  raw: string | undefined,
): ParsedChoice<T> {
  if (raw === undefined) return { value: fallback };
  const lowered = raw.replace(/[A-Z]/g, (ch) => ch.toLowerCase());
  const match = choices.find((choice) => choice === lowered);
  return match ? { value: match } : { value: fallback, invalid: raw };
}

export function parseResetPeriod(raw: string | undefined): ParsedChoice<ResetPeriod> {
  return parseChoice(RESET_PERIODS, "session", raw);
}

export function parseResetFormat(raw: string | undefined): ParsedChoice<ResetFormat> {
  return parseChoice(RESET_FORMATS, "time", raw);
}

function readString(options: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = options?.[key];
  return typeof value === "string" ? value : undefined;
}

function readUnsignedInt(
  options: Record<string, unknown> | undefined,
  key: string,
): number | undefined {
  const value = options?.[key];
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0 ? value : undefined;
}

/** Missing or wrong-typed options fall back to their defaults. */
export function resolveUsageSegmentOptions(
  options: Record<string, unknown> | undefined,
): UsageSegmentOptions {
  return {
    apiBaseUrl: readString(options, "api_base_url") ?? DEFAULT_API_BASE_URL,
    cacheDurationSeconds: readUnsignedInt(options, "cache_duration") ?? DEFAULT_CACHE_DURATION_SECONDS,
    timeoutSeconds: readUnsignedInt(options, "timeout") ?? DEFAULT_TIMEOUT_SECONDS,
    resetPeriod: parseResetPeriod(readString(options, "reset_period")),
    resetFormat: parseResetFormat(readString(options, "reset_format")),
  };
}
