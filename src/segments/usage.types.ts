export type UsageSnapshot = {
  /** Percent of the five-hour window consumed, as reported (may exceed 100). */
  fiveHourUtilization: number;
  /** Percent of the seven-day window consumed, as reported (may exceed 100). */
  sevenDayUtilization: number;
  fiveHourResetsAt?: string;
  sevenDayResetsAt?: string;
};

export type UsageCacheRecord = UsageSnapshot & {
  /** RFC3339 instant the record was written. */
  cachedAt: string;
};

export type UsageSource = "cache" | "network" | "stale-cache";
