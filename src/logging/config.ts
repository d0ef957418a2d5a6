import fs from "node:fs";

import json5 from "json5";
import { z } from "zod";

import { resolveConfigPath } from "../config/paths.js";
import type { LoggingConfig } from "../config/types.js";
import { LoggingConfigSchema } from "../config/zod-schema.js";
import { loggingState } from "./state.js";

// Reads only the `logging` block so the logger never depends on the full config loader.
export function readLoggingConfig(): LoggingConfig | undefined {
  const configPath = loggingState.configPath ?? resolveConfigPath();
  if (!configPath) return undefined;
  try {
    if (!fs.existsSync(configPath)) return undefined;
    const raw = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = json5.parse(raw);
    const result = z.object({ logging: LoggingConfigSchema.optional() }).safeParse(parsed);
    return result.success ? result.data.logging : undefined;
  } catch {
    return undefined;
  }
}

export function setLoggingConfigPath(configPath: string | null): void {
  loggingState.configPath = configPath;
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
  loggingState.cachedConsoleSettings = null;
}
