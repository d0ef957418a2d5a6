import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";

import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";

import type { SegmentData, StatuslineInput } from "../segments/types.js";
import type { UsageSegmentDeps } from "../segments/usage.js";
import { UsageCacheStore } from "../segments/usage.cache.js";
import { buildProgram } from "./program.js";

const NOW = Date.parse("2026-06-14T10:00:00Z");

const DATA: SegmentData = {
  primary: "42%",
  secondary: "· 1h 30m",
  metadata: { dynamic_icon: "[icon]", five_hour_utilization: "42" },
};

describe("buildProgram", () => {
  let home: string;
  let env: NodeJS.ProcessEnv;
  let runtime: { log: Mock; error: Mock; exit: Mock<(code: number) => never> };
  let collect: Mock<(input: StatuslineInput) => Promise<SegmentData | null>>;
  let segmentDeps: UsageSegmentDeps | undefined;

  const cachePath = () =>
    path.join(home, ".claude", "statusline-usage", ".api_usage_cache.json");

  const run = async (...args: string[]) => {
    const program = buildProgram({
      runtime,
      env,
      now: () => NOW,
      stdin: Readable.from(['{"session_id":"s-1","model":{"id":"test-model"}}']),
      createSegment: (deps) => {
        segmentDeps = deps;
        return { id: "usage", collect };
      },
    });
    await program.parseAsync(args, { from: "user" });
  };

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "statusline-usage-cli-"));
    env = { HOME: home };
    runtime = {
      log: vi.fn(),
      error: vi.fn(),
      exit: vi.fn((code: number): never => {
        throw new Error(`exit ${code}`);
      }),
    };
    collect = vi.fn<(input: StatuslineInput) => Promise<SegmentData | null>>(async () => DATA);
    segmentDeps = undefined;
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it("prints the rendered segment", async () => {
    await run();
    expect(collect).toHaveBeenCalledWith({ session_id: "s-1", model: { id: "test-model" } });
    expect(runtime.log).toHaveBeenCalledWith("[icon] 42% · 1h 30m");
  });

  it("prints the segment data as JSON", async () => {
    await run("--json");
    expect(runtime.log).toHaveBeenCalledWith(JSON.stringify(DATA));
  });

  it("prints nothing when the segment is absent", async () => {
    collect.mockResolvedValue(null);
    await run();
    expect(runtime.log).not.toHaveBeenCalled();
  });

  it("passes configured options to the segment", async () => {
    const configPath = path.join(home, "statusline.json5");
    fs.writeFileSync(
      configPath,
      '{ segments: [{ id: "usage", options: { reset_period: "weekly" } }] }',
    );
    await run("--config", configPath);
    expect(segmentDeps?.options?.getSegmentOptions("usage")).toEqual({ reset_period: "weekly" });
  });

  it("skips a disabled segment", async () => {
    fs.mkdirSync(path.join(home, ".claude", "statusline-usage"), { recursive: true });
    fs.writeFileSync(
      path.join(home, ".claude", "statusline-usage", "config.json"),
      JSON.stringify({ segments: [{ id: "usage", enabled: false }] }),
    );
    await run();
    expect(segmentDeps).toBeUndefined();
    expect(runtime.log).not.toHaveBeenCalled();
  });

  it("prints the cache path", async () => {
    await run("cache", "path");
    expect(runtime.log).toHaveBeenCalledWith(cachePath());
  });

  it("shows the cache as JSON", async () => {
    await run("--json", "cache", "show");
    expect(runtime.log).toHaveBeenLastCalledWith("null");

    new UsageCacheStore({ resolvePath: cachePath, now: () => NOW - 60_000 }).save({
      fiveHourUtilization: 42,
      sevenDayUtilization: 10,
      cachedAt: new Date(NOW - 60_000).toISOString(),
    });
    await run("--json", "cache", "show");
    expect(JSON.parse(String(runtime.log.mock.lastCall?.[0]))).toEqual({
      fiveHourUtilization: 42,
      sevenDayUtilization: 10,
      cachedAt: "2026-06-14T09:59:00.000Z",
      fresh: true,
    });
  });

  it("clears the cache", async () => {
    fs.mkdirSync(path.dirname(cachePath()), { recursive: true });
    fs.writeFileSync(cachePath(), "{}");
    await run("cache", "clear");
    expect(runtime.log).toHaveBeenLastCalledWith("Usage cache cleared.");
    expect(fs.existsSync(cachePath())).toBe(false);

    await run("cache", "clear");
    expect(runtime.log).toHaveBeenLastCalledWith("No usage cache to clear.");
  });
});
