import { Chalk } from "chalk";
import { Command } from "commander";

import {
  createConfigOptionsProvider,
  findSegmentConfig,
  isSegmentEnabled,
  loadConfig,
} from "../config/config.js";
import { resolveUserPath } from "../config/paths.js";
import { setLoggingConfigPath } from "../logging/config.js";
import { setVerbose } from "../logging/subsystem.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import type { Segment } from "../segments/types.js";
import { createUsageSegment, type UsageSegmentDeps } from "../segments/usage.js";
import { resolveUsageCachePath, UsageCacheStore } from "../segments/usage.cache.js";
import { resolveUsageSegmentOptions } from "../segments/usage.options.js";
import { formatSegmentLine } from "./render.js";
import { type InputStream, readStatuslineInput } from "./stdin.js";

export type ProgramDeps = {
  runtime?: RuntimeEnv;
  stdin?: InputStream;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
  createSegment?: (deps: UsageSegmentDeps) => Segment;
};

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  json?: boolean;
};

function applyGlobalOptions(opts: GlobalOptions, env: NodeJS.ProcessEnv) {
  if (opts.verbose) setVerbose(true);
  if (opts.config) setLoggingConfigPath(resolveUserPath(opts.config, env));
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const runtime = deps.runtime ?? defaultRuntime;
  const env = deps.env ?? process.env;
  const now = deps.now ?? Date.now;
  const createSegment = deps.createSegment ?? createUsageSegment;
  const color = new Chalk({ level: process.stdout.isTTY ? 1 : 0 });

  const createCacheStore = () => new UsageCacheStore({ resolvePath: () => resolveUsageCachePath(env), now });

  const program = new Command();
  program
    .name("statusline-usage")
    .description("Claude rate-limit usage segment for the Claude Code status line")
    .option("--config <path>", "config file (JSON5)")
    .option("--verbose", "debug logs on stderr", false)
    .option("--json", "print the segment data as JSON", false)
    .action(async (opts: GlobalOptions) => {
      applyGlobalOptions(opts, env);
      const config = loadConfig({ configPath: opts.config, env });
      if (!isSegmentEnabled(config, "usage")) {
        if (opts.json) runtime.log("null");
        return;
      }
      const input = await readStatuslineInput(deps.stdin ?? process.stdin);
      const segment = createSegment({
        options: createConfigOptionsProvider(config),
        cache: createCacheStore(),
        now,
      });
      const data = await segment.collect(input);
      if (opts.json) {
        runtime.log(JSON.stringify(data));
        return;
      }
      if (data) runtime.log(formatSegmentLine(data));
    });

  const cache = program.command("cache").description("Inspect or clear the usage cache");

  cache
    .command("path")
    .description("Print the cache file location")
    .action((_opts: unknown, command: Command) => {
      applyGlobalOptions(command.optsWithGlobals<GlobalOptions>(), env);
      const cachePath = createCacheStore().resolvePath();
      if (!cachePath) {
        runtime.error("No home directory; the usage cache is disabled.");
        runtime.exit(1);
      }
      runtime.log(cachePath);
    });

  cache
    .command("show")
    .description("Print the cached usage snapshot and whether it is fresh")
    .action((_opts: unknown, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();
      applyGlobalOptions(opts, env);
      const config = loadConfig({ configPath: opts.config, env });
      const { cacheDurationSeconds } = resolveUsageSegmentOptions(
        findSegmentConfig(config, "usage")?.options,
      );
      const store = createCacheStore();
      const record = store.load();
      if (!record) {
        if (opts.json) {
          runtime.log("null");
        } else {
          runtime.log(color.yellow("No usage cache."));
        }
        return;
      }
      const fresh = store.isValid(record, cacheDurationSeconds);
      if (opts.json) {
        runtime.log(JSON.stringify({ ...record, fresh }));
        return;
      }
      runtime.log(`${color.bold("Cached at:")} ${record.cachedAt} (${fresh ? color.green("fresh") : color.yellow("stale")})`);
      runtime.log(`  5h: ${record.fiveHourUtilization}% (resets ${record.fiveHourResetsAt ?? "?"})`);
      runtime.log(`  7d: ${record.sevenDayUtilization}% (resets ${record.sevenDayResetsAt ?? "?"})`);
    });

  cache
    .command("clear")
    .description("Delete the cache file")
    .action((_opts: unknown, command: Command) => {
      applyGlobalOptions(command.optsWithGlobals<GlobalOptions>(), env);
      const removed = createCacheStore().clear();
      runtime.log(removed ? "Usage cache cleared." : "No usage cache to clear.");
    });

  return program;
}
