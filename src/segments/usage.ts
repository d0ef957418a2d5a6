import { claudeCredentialProvider } from "../auth/claude-credentials.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import type {
  CredentialProvider,
  Segment,
  SegmentData,
  SegmentOptionsProvider,
  StatuslineInput,
} from "./types.js";
import { UsageCacheStore } from "./usage.cache.js";
import { type FetchUsageParams, fetchUsage } from "./usage.fetch.js";
import { formatResetDuration, formatResetTime, iconFor } from "./usage.format.js";
import {
  type ResetFormat,
  type ResetPeriod,
  resolveUsageSegmentOptions,
  type UsageSegmentOptions,
} from "./usage.options.js";
import { firstAvailable } from "./usage.shared.js";
import type { UsageCacheRecord, UsageSnapshot, UsageSource } from "./usage.types.js";

export const RESET_SEPARATOR = "·";

export type UsageSegmentDeps = {
  credentials?: CredentialProvider;
  options?: SegmentOptionsProvider;
  cache?: UsageCacheStore;
  fetchUsage?: (params: FetchUsageParams) => Promise<UsageSnapshot | null>;
  now?: () => number;
  log?: SubsystemLogger;
};

type ResolvedUsage = {
  snapshot: UsageSnapshot;
  source: UsageSource;
};

/** Reset instant for the chosen window, falling back to the other window. */
export function selectResetTimestamp(
  snapshot: UsageSnapshot,
  period: ResetPeriod,
): string | undefined {
  return period === "weekly"
    ? (snapshot.sevenDayResetsAt ?? snapshot.fiveHourResetsAt)
    : (snapshot.fiveHourResetsAt ?? snapshot.sevenDayResetsAt);
}

export function formatReset(
  resetsAt: string | undefined,
  format: ResetFormat,
  now: number,
): string {
  return format === "duration" ? formatResetDuration(resetsAt, { now }) : formatResetTime(resetsAt);
}

export function renderUsageSegment(
  snapshot: UsageSnapshot,
  options: Pick<UsageSegmentOptions, "resetPeriod" | "resetFormat">,
  now: number,
): SegmentData {
  const resetsAt = selectResetTimestamp(snapshot, options.resetPeriod.value);
  const fiveHourPercent = Math.max(0, Math.round(snapshot.fiveHourUtilization));

  const metadata: Record<string, string> = {
    dynamic_icon: iconFor(snapshot.sevenDayUtilization / 100),
    five_hour_utilization: String(snapshot.fiveHourUtilization),
    seven_day_utilization: String(snapshot.sevenDayUtilization),
    reset_period: options.resetPeriod.value,
    reset_format: options.resetFormat.value,
  };
  if (options.resetPeriod.invalid !== undefined) {
    metadata.invalid_reset_period = options.resetPeriod.invalid;
  }
  if (options.resetFormat.invalid !== undefined) {
    metadata.invalid_reset_format = options.resetFormat.invalid;
  }

  return {
    primary: `${fiveHourPercent}%`,
    secondary: `${RESET_SEPARATOR} ${formatReset(resetsAt, options.resetFormat.value, now)}`,
    metadata,
  };
}

function snapshotOf(record: UsageCacheRecord): UsageSnapshot {
  return {
    fiveHourUtilization: record.fiveHourUtilization,
    sevenDayUtilization: record.sevenDayUtilization,
    fiveHourResetsAt: record.fiveHourResetsAt,
    sevenDayResetsAt: record.sevenDayResetsAt,
  };
}

/**
 * Five-hour / seven-day rate-limit usage with a reset indicator.
 *
 * Data source order: fresh cache, then the usage endpoint (persisted on success),
 * then whatever stale cache exists. With none of them the segment is absent.
 */
export class UsageSegment implements Segment {
  readonly id = "usage" as const;

  private readonly credentials: CredentialProvider;
  private readonly options: SegmentOptionsProvider;
  private readonly cache: UsageCacheStore;
  private readonly fetchUsageImpl: (params: FetchUsageParams) => Promise<UsageSnapshot | null>;
  private readonly now: () => number;
  private readonly log: SubsystemLogger;

  constructor(deps: UsageSegmentDeps = {}) {
    this.now = deps.now ?? Date.now;
    this.credentials = deps.credentials ?? claudeCredentialProvider;
    this.options = deps.options ?? { getSegmentOptions: () => undefined };
    this.cache = deps.cache ?? new UsageCacheStore({ now: this.now });
    this.fetchUsageImpl = deps.fetchUsage ?? fetchUsage;
    this.log = deps.log ?? createSubsystemLogger("segments/usage");
  }

  async collect(_input: StatuslineInput): Promise<SegmentData | null> {
    try {
      return await this.collectOrThrow();
    } catch (err) {
      this.log.error(`usage segment failed: ${formatErrorMessage(err)}`);
      return null;
    }
  }

  private async collectOrThrow(): Promise<SegmentData | null> {
    const token = await this.credentials.getToken();
    if (!token) {
      this.log.debug("no OAuth token available; skipping usage segment");
      return null;
    }

    const options = resolveUsageSegmentOptions(this.options.getSegmentOptions(this.id));
    if (options.resetPeriod.invalid !== undefined) {
      this.log.warn(`invalid reset_period "${options.resetPeriod.invalid}", using session`);
    }
    if (options.resetFormat.invalid !== undefined) {
      this.log.warn(`invalid reset_format "${options.resetFormat.invalid}", using time`);
    }

    const resolved = await this.resolveUsage(token, options);
    if (!resolved) {
      this.log.debug("no usage data from network or cache");
      return null;
    }
    this.log.debug(`usage resolved from ${resolved.source}`);
    return renderUsageSegment(resolved.snapshot, options, this.now());
  }

  private async resolveUsage(
    token: string,
    options: UsageSegmentOptions,
  ): Promise<ResolvedUsage | undefined> {
    const cached = this.cache.load();
    return await firstAvailable<ResolvedUsage>([
      () =>
        cached && this.cache.isValid(cached, options.cacheDurationSeconds)
          ? { snapshot: snapshotOf(cached), source: "cache" }
          : undefined,
      async () => {
        const fetched = await this.fetchUsageImpl({
          baseUrl: options.apiBaseUrl,
          token,
          timeoutMs: options.timeoutSeconds * 1000,
        });
        if (!fetched) return undefined;
        this.cache.save(this.cache.createRecord(fetched));
        return { snapshot: fetched, source: "network" };
      },
      () => (cached ? { snapshot: snapshotOf(cached), source: "stale-cache" } : undefined),
    ]);
  }
}

export function createUsageSegment(deps: UsageSegmentDeps = {}): UsageSegment {
  return new UsageSegment(deps);
}
