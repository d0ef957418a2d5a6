import path from "node:path";

import { z } from "zod";

import { type HomeDirResolver, resolveStateDir } from "../config/paths.js";
import { formatErrorMessage } from "../infra/errors.js";
import { loadJsonFile, removeFile, saveJsonFile } from "../infra/json-file.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { parseRfc3339 } from "./usage.shared.js";
import type { UsageCacheRecord } from "./usage.types.js";

const CACHE_FILENAME = ".api_usage_cache.json";

const optionalTimestamp = z.string().nullish();

/** On-disk shape. `resets_at` predates the split five-hour/seven-day reset fields. */
export const StoredUsageCacheSchema = z.object({
  five_hour_utilization: z.number(),
  seven_day_utilization: z.number(),
  five_hour_resets_at: optionalTimestamp,
  seven_day_resets_at: optionalTimestamp,
  resets_at: optionalTimestamp,
  cached_at: z.string(),
});

export type StoredUsageCache = z.infer<typeof StoredUsageCacheSchema>;

export function resolveUsageCachePath(
  env: NodeJS.ProcessEnv = process.env,
  homedir?: HomeDirResolver,
): string | undefined {
  const stateDir = resolveStateDir(env, homedir);
  return stateDir ? path.join(stateDir, CACHE_FILENAME) : undefined;
}

/**
 * Maps a stored record (either schema generation) to the current record.
 * A typed reset field that is absent is backfilled from the legacy `resets_at`.
 */
export function migrateCacheRecord(stored: StoredUsageCache): UsageCacheRecord {
  const legacy = stored.resets_at ?? undefined;
  return {
    fiveHourUtilization: stored.five_hour_utilization,
    sevenDayUtilization: stored.seven_day_utilization,
    fiveHourResetsAt: stored.five_hour_resets_at ?? legacy,
    sevenDayResetsAt: stored.seven_day_resets_at ?? legacy,
    cachedAt: stored.cached_at,
  };
}

export function toStoredCacheRecord(record: UsageCacheRecord): StoredUsageCache {
  // Absent reset fields are omitted (JSON.stringify drops undefined) and the legacy field is never written.
  return {
    five_hour_utilization: record.fiveHourUtilization,
    seven_day_utilization: record.sevenDayUtilization,
    five_hour_resets_at: record.fiveHourResetsAt,
    seven_day_resets_at: record.sevenDayResetsAt,
    cached_at: record.cachedAt,
  };
}

export type UsageCacheStoreOptions = {
  resolvePath?: () => string | undefined;
  now?: () => number;
  log?: SubsystemLogger;
};

/**
 * Best-effort single-file cache of the last usage snapshot.
 * Every failure reads as "no cache" or is logged and dropped; nothing here throws.
 */
export class UsageCacheStore {
  private readonly resolvePathImpl: () => string | undefined;
  private readonly now: () => number;
  private readonly log: SubsystemLogger;

  constructor(opts: UsageCacheStoreOptions = {}) {
    this.resolvePathImpl = opts.resolvePath ?? (() => resolveUsageCachePath());
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? createSubsystemLogger("segments/usage/cache");
  }

  resolvePath(): string | undefined {
    return this.resolvePathImpl();
  }

  load(): UsageCacheRecord | null {
    const cachePath = this.resolvePath();
    if (!cachePath) return null;
    const raw = loadJsonFile(cachePath);
    if (raw === undefined) return null;
    const parsed = StoredUsageCacheSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.debug("ignoring malformed usage cache", {
        path: cachePath,
        issues: parsed.error.issues.map((iss) => `${iss.path.join(".")}: ${iss.message}`),
      });
      return null;
    }
    return migrateCacheRecord(parsed.data);
  }

  save(record: UsageCacheRecord): boolean {
    const cachePath = this.resolvePath();
    if (!cachePath) return false;
    try {
      saveJsonFile(cachePath, toStoredCacheRecord(record));
      return true;
    } catch (err) {
      this.log.warn(`failed to write usage cache: ${formatErrorMessage(err)}`, { path: cachePath });
      return false;
    }
  }

  /** Fresh iff fewer than `maxAgeSeconds` whole seconds have passed since `cachedAt`. */
  isValid(record: UsageCacheRecord, maxAgeSeconds: number): boolean {
    const cachedAt = parseRfc3339(record.cachedAt);
    if (cachedAt === undefined) return false;
    const elapsedSeconds = Math.trunc((this.now() - cachedAt) / 1000);
    return elapsedSeconds < maxAgeSeconds;
  }

  /** Stamps a snapshot with the store's clock. */
  createRecord(snapshot: Omit<UsageCacheRecord, "cachedAt">): UsageCacheRecord {
    return { ...snapshot, cachedAt: new Date(this.now()).toISOString() };
  }

  clear(): boolean {
    const cachePath = this.resolvePath();
    if (!cachePath) return false;
    try {
      return removeFile(cachePath);
    } catch (err) {
      this.log.warn(`failed to remove usage cache: ${formatErrorMessage(err)}`, { path: cachePath });
      return false;
    }
  }
}
