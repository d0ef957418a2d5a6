import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { migrateCacheRecord, resolveUsageCachePath, UsageCacheStore } from "./usage.cache.js";

const NOW = Date.parse("2026-06-14T10:00:00Z");

describe("resolveUsageCachePath", () => {
  it("lives under ~/.claude/statusline-usage", () => {
    expect(resolveUsageCachePath({ HOME: "/home/tester" })).toBe(
      path.join("/home/tester", ".claude", "statusline-usage", ".api_usage_cache.json"),
    );
  });
});

describe("migrateCacheRecord", () => {
  it("backfills both reset fields from the legacy field", () => {
    expect(
      migrateCacheRecord({
        five_hour_utilization: 10,
        seven_day_utilization: 20,
        resets_at: "2026-06-14T12:00:00Z",
        cached_at: "2026-06-14T09:59:00Z",
      }),
    ).toEqual({
      fiveHourUtilization: 10,
      sevenDayUtilization: 20,
      fiveHourResetsAt: "2026-06-14T12:00:00Z",
      sevenDayResetsAt: "2026-06-14T12:00:00Z",
      cachedAt: "2026-06-14T09:59:00Z",
    });
  });

  it("prefers the typed fields and only fills what is missing", () => {
    const record = migrateCacheRecord({
      five_hour_utilization: 10,
      seven_day_utilization: 20,
      five_hour_resets_at: "2026-06-14T11:00:00Z",
      seven_day_resets_at: null,
      resets_at: "2026-06-14T12:00:00Z",
      cached_at: "2026-06-14T09:59:00Z",
    });
    expect(record.fiveHourResetsAt).toBe("2026-06-14T11:00:00Z");
    expect(record.sevenDayResetsAt).toBe("2026-06-14T12:00:00Z");
  });
});

describe("UsageCacheStore", () => {
  let dir: string;
  let cachePath: string;
  let store: UsageCacheStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "statusline-usage-cache-"));
    cachePath = path.join(dir, "state", ".api_usage_cache.json");
    store = new UsageCacheStore({ resolvePath: () => cachePath, now: () => NOW });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads a missing file as no cache", () => {
    expect(store.load()).toBeNull();
  });

  it("writes snake_case fields and omits absent reset times", () => {
    const record = store.createRecord({
      fiveHourUtilization: 42.5,
      sevenDayUtilization: 12,
      fiveHourResetsAt: "2026-06-14T11:30:00Z",
    });
    expect(store.save(record)).toBe(true);

    expect(JSON.parse(fs.readFileSync(cachePath, "utf8"))).toEqual({
      five_hour_utilization: 42.5,
      seven_day_utilization: 12,
      five_hour_resets_at: "2026-06-14T11:30:00Z",
      cached_at: "2026-06-14T10:00:00.000Z",
    });
    expect(store.load()).toEqual(record);
  });

  it("loads legacy files with a single reset field", () => {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(
      cachePath,
      JSON.stringify({
        five_hour_utilization: 5,
        seven_day_utilization: 6,
        resets_at: "2026-06-14T12:00:00+00:00",
        cached_at: "2026-06-14T09:58:00+00:00",
      }),
    );
    expect(store.load()).toEqual({
      fiveHourUtilization: 5,
      sevenDayUtilization: 6,
      fiveHourResetsAt: "2026-06-14T12:00:00+00:00",
      sevenDayResetsAt: "2026-06-14T12:00:00+00:00",
      cachedAt: "2026-06-14T09:58:00+00:00",
    });
  });

  it("treats malformed files as no cache", () => {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(cachePath, "{ not json");
    expect(store.load()).toBeNull();
    fs.writeFileSync(cachePath, JSON.stringify({ five_hour_utilization: "high" }));
    expect(store.load()).toBeNull();
  });

  it("is fresh for fewer than max-age whole seconds", () => {
    const at = (offsetMs: number) => ({
      fiveHourUtilization: 1,
      sevenDayUtilization: 1,
      cachedAt: new Date(NOW - offsetMs).toISOString(),
    });
    expect(store.isValid(at(299_999), 300)).toBe(true);
    expect(store.isValid(at(300_000), 300)).toBe(false);
    expect(store.isValid(at(0), 0)).toBe(false);
    expect(store.isValid({ ...at(0), cachedAt: "yesterday" }, 300)).toBe(false);
  });

  it("reports write failures instead of throwing", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");
    const blocked = new UsageCacheStore({
      resolvePath: () => path.join(blocker, "nested", "cache.json"),
      now: () => NOW,
    });
    expect(blocked.save(store.createRecord({ fiveHourUtilization: 1, sevenDayUtilization: 2 }))).toBe(
      false,
    );
  });

  it("is disabled without a path", () => {
    const disabled = new UsageCacheStore({ resolvePath: () => undefined, now: () => NOW });
    expect(disabled.load()).toBeNull();
    expect(disabled.save(store.createRecord({ fiveHourUtilization: 1, sevenDayUtilization: 2 }))).toBe(
      false,
    );
    expect(disabled.clear()).toBe(false);
  });

  it("clears the file", () => {
    store.save(store.createRecord({ fiveHourUtilization: 1, sevenDayUtilization: 2 }));
    expect(store.clear()).toBe(true);
    expect(fs.existsSync(cachePath)).toBe(false);
    expect(store.clear()).toBe(false);
  });
});
