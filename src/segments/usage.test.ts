import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { CredentialProvider, SegmentOptionsProvider } from "./types.js";
import { renderUsageSegment, selectResetTimestamp, UsageSegment } from "./usage.js";
import { UsageCacheStore } from "./usage.cache.js";
import type { FetchUsageParams } from "./usage.fetch.js";
import { USAGE_ICONS } from "./usage.format.js";
import { resolveUsageSegmentOptions } from "./usage.options.js";
import type { UsageSnapshot } from "./usage.types.js";

const NOW = Date.parse("2026-06-14T10:00:00Z");

const SNAPSHOT: UsageSnapshot = {
  fiveHourUtilization: 42.4,
  sevenDayUtilization: 55,
  fiveHourResetsAt: "2026-06-14T11:30:00Z",
  sevenDayResetsAt: "2026-06-18T00:00:00Z",
};

const withToken: CredentialProvider = { getToken: async () => "test-token" };

function optionsOf(options: Record<string, unknown>): SegmentOptionsProvider {
  return { getSegmentOptions: () => options };
}

describe("selectResetTimestamp", () => {
  it("uses the chosen window and falls back to the other", () => {
    expect(selectResetTimestamp(SNAPSHOT, "session")).toBe("2026-06-14T11:30:00Z");
    expect(selectResetTimestamp(SNAPSHOT, "weekly")).toBe("2026-06-18T00:00:00Z");
    expect(selectResetTimestamp({ ...SNAPSHOT, sevenDayResetsAt: undefined }, "weekly")).toBe(
      "2026-06-14T11:30:00Z",
    );
    expect(selectResetTimestamp({ ...SNAPSHOT, fiveHourResetsAt: undefined }, "session")).toBe(
      "2026-06-18T00:00:00Z",
    );
  });
});

describe("renderUsageSegment", () => {
  it("renders percent, reset countdown and metadata", () => {
    const options = resolveUsageSegmentOptions({ reset_format: "duration" });
    expect(renderUsageSegment(SNAPSHOT, options, NOW)).toEqual({
      primary: "42%",
      secondary: "· 1h 30m",
      metadata: {
        dynamic_icon: USAGE_ICONS[4],
        five_hour_utilization: "42.4",
        seven_day_utilization: "55",
        reset_period: "session",
        reset_format: "duration",
      },
    });
  });

  it("uses the weekly reset when asked", () => {
    const options = resolveUsageSegmentOptions({ reset_period: "weekly", reset_format: "duration" });
    expect(renderUsageSegment(SNAPSHOT, options, NOW).secondary).toBe("· 3d 14h");
  });

  it("clamps negative utilization and marks unknown resets", () => {
    const options = resolveUsageSegmentOptions(undefined);
    const data = renderUsageSegment(
      {
        fiveHourUtilization: -3,
        sevenDayUtilization: 0,
      },
      options,
      NOW,
    );
    expect(data.primary).toBe("0%");
    expect(data.secondary).toBe("· ?");
    expect(data.metadata.dynamic_icon).toBe(USAGE_ICONS[0]);
  });

  it("records unrecognized options", () => {
    const options = resolveUsageSegmentOptions({ reset_period: "monthly", reset_format: "Relative" });
    const { metadata } = renderUsageSegment(SNAPSHOT, options, NOW);
    expect(metadata.reset_period).toBe("session");
    expect(metadata.invalid_reset_period).toBe("monthly");
    expect(metadata.reset_format).toBe("time");
    expect(metadata.invalid_reset_format).toBe("Relative");
  });
});

describe("UsageSegment", () => {
  let dir: string;
  let cachePath: string;
  let cache: UsageCacheStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "statusline-usage-segment-"));
    cachePath = path.join(dir, ".api_usage_cache.json");
    cache = new UsageCacheStore({ resolvePath: () => cachePath, now: () => NOW });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function createSegment(
    fetchUsage: (params: FetchUsageParams) => Promise<UsageSnapshot | null>,
    overrides: { credentials?: CredentialProvider; options?: Record<string, unknown> } = {},
  ) {
    return new UsageSegment({
      credentials: overrides.credentials ?? withToken,
      options: optionsOf(overrides.options ?? { reset_format: "duration" }),
      cache,
      fetchUsage,
      now: () => NOW,
    });
  }

  function seedCache(snapshot: UsageSnapshot, ageMs: number) {
    cache.save({ ...snapshot, cachedAt: new Date(NOW - ageMs).toISOString() });
  }

  it("fetches usage and persists it", async () => {
    const fetchUsage = vi.fn(async () => SNAPSHOT);
    const segment = createSegment(fetchUsage, { options: { reset_format: "duration", timeout: 5 } });

    const data = await segment.collect({});
    expect(data?.primary).toBe("42%");
    expect(data?.secondary).toBe("· 1h 30m");
    expect(fetchUsage).toHaveBeenCalledWith({
      baseUrl: "https://api.anthropic.com",
      token: "test-token",
      timeoutMs: 5000,
    });
    expect(JSON.parse(fs.readFileSync(cachePath, "utf8"))).toEqual({
      five_hour_utilization: 42.4,
      seven_day_utilization: 55,
      five_hour_resets_at: "2026-06-14T11:30:00Z",
      seven_day_resets_at: "2026-06-18T00:00:00Z",
      cached_at: "2026-06-14T10:00:00.000Z",
    });
  });

  it("serves a fresh cache without touching the network", async () => {
    seedCache({ ...SNAPSHOT, fiveHourUtilization: 17 }, 60_000);
    const fetchUsage = vi.fn(async () => SNAPSHOT);

    const data = await createSegment(fetchUsage).collect({});
    expect(data?.primary).toBe("17%");
    expect(fetchUsage).not.toHaveBeenCalled();
  });

  it("refreshes a stale cache", async () => {
    seedCache({ ...SNAPSHOT, fiveHourUtilization: 17 }, 600_000);
    const fetchUsage = vi.fn(async () => SNAPSHOT);

    const data = await createSegment(fetchUsage).collect({});
    expect(data?.primary).toBe("42%");
    expect(cache.load()?.cachedAt).toBe("2026-06-14T10:00:00.000Z");
  });

  it("falls back to a stale cache when the network fails", async () => {
    seedCache({ ...SNAPSHOT, fiveHourUtilization: 17 }, 600_000);
    const before = fs.readFileSync(cachePath, "utf8");
    const fetchUsage = vi.fn(async () => null);

    const data = await createSegment(fetchUsage).collect({});
    expect(fetchUsage).toHaveBeenCalledTimes(1);
    expect(data?.primary).toBe("17%");
    expect(fs.readFileSync(cachePath, "utf8")).toBe(before);
  });

  it("is absent without cache or network and writes nothing", async () => {
    const data = await createSegment(async () => null).collect({});
    expect(data).toBeNull();
    expect(fs.existsSync(cachePath)).toBe(false);
  });

  it("is absent without a token", async () => {
    const fetchUsage = vi.fn(async () => SNAPSHOT);
    const data = await createSegment(fetchUsage, {
      credentials: { getToken: async () => undefined },
    }).collect({});
    expect(data).toBeNull();
    expect(fetchUsage).not.toHaveBeenCalled();
  });

  it("renders a refetched snapshot identically from the cache it wrote", async () => {
    const fetched: UsageSnapshot = {
      fiveHourUtilization: 42,
      sevenDayUtilization: 10,
      fiveHourResetsAt: "2026-06-14T11:30:00Z",
      sevenDayResetsAt: "2026-06-18T00:00:00Z",
    };
    const first = await createSegment(async () => fetched, { options: {} }).collect({});
    expect(first?.primary).toBe("42%");
    expect(fs.existsSync(cachePath)).toBe(true);

    const offline = vi.fn(async () => null);
    const second = await createSegment(offline, { options: {} }).collect({});
    expect(offline).not.toHaveBeenCalled();
    expect(second?.primary).toBe(first?.primary);
    expect(second?.secondary).toBe(first?.secondary);
  });

  it("never rejects", async () => {
    const segment = createSegment(async () => {
      throw new Error("boom");
    });
    await expect(segment.collect({})).resolves.toBeNull();
  });

  it("never rejects on errors whose causes form a cycle", async () => {
    const outer = new Error("outer");
    const inner = new Error("inner", { cause: outer });
    outer.cause = inner;
    const segment = createSegment(async () => {
      throw outer;
    });
    await expect(segment.collect({})).resolves.toBeNull();
  });
});
