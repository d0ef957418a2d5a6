import fs from "node:fs";
import os from "node:os";

import json5 from "json5";

import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import type { SegmentId, SegmentOptionsProvider } from "../segments/types.js";
import { type HomeDirResolver, resolveConfigPath, resolveUserPath } from "./paths.js";
import type { SegmentConfig, StatuslineConfig } from "./types.js";
import { StatuslineConfigSchema } from "./zod-schema.js";

export type ConfigValidationIssue = {
  path: string;
  message: string;
};

export type ConfigValidationResult =
  | { ok: true; config: StatuslineConfig }
  | { ok: false; issues: ConfigValidationIssue[] };

export type ConfigFileSnapshot = {
  path: string | undefined;
  exists: boolean;
  valid: boolean;
  config: StatuslineConfig;
  issues: ConfigValidationIssue[];
};

export type ConfigIoDeps = {
  fs?: Pick<typeof fs, "existsSync" | "readFileSync">;
  json5?: { parse: (text: string) => unknown };
  env?: NodeJS.ProcessEnv;
  homedir?: HomeDirResolver;
  configPath?: string;
  logger?: Pick<SubsystemLogger, "warn" | "debug">;
};

export function validateConfigObject(raw: unknown): ConfigValidationResult {
  const validated = StatuslineConfigSchema.safeParse(raw);
  if (!validated.success) {
    return {
      ok: false,
      issues: validated.error.issues.map((iss) => ({
        path: iss.path.join("."),
        message: iss.message,
      })),
    };
  }
  return { ok: true, config: validated.data };
}

function formatIssues(issues: ConfigValidationIssue[]): string {
  return issues.map((iss) => `- ${iss.path || "<root>"}: ${iss.message}`).join("\n");
}

export function createConfigIO(overrides: ConfigIoDeps = {}) {
  const deps = {
    fs: overrides.fs ?? fs,
    json5: overrides.json5 ?? json5,
    env: overrides.env ?? process.env,
    homedir: overrides.homedir ?? os.homedir,
    logger: overrides.logger ?? createSubsystemLogger("config"),
  };
  const configPath = overrides.configPath
    ? resolveUserPath(overrides.configPath, deps.env, deps.homedir)
    : resolveConfigPath(deps.env, deps.homedir);

  function readConfigFileSnapshot(): ConfigFileSnapshot {
    const empty: ConfigFileSnapshot = {
      path: configPath,
      exists: false,
      valid: true,
      config: {},
      issues: [],
    };
    if (!configPath) return empty;
    let raw: string;
    try {
      if (!deps.fs.existsSync(configPath)) return empty;
      raw = deps.fs.readFileSync(configPath, "utf-8");
    } catch (err) {
      const issue = { path: "", message: `unreadable: ${formatErrorMessage(err)}` };
      return { ...empty, exists: true, valid: false, issues: [issue] };
    }
    let parsed: unknown;
    try {
      parsed = deps.json5.parse(raw);
    } catch (err) {
      const issue = { path: "", message: `JSON5 parse failed: ${formatErrorMessage(err)}` };
      return { ...empty, exists: true, valid: false, issues: [issue] };
    }
    const validated = validateConfigObject(parsed);
    if (!validated.ok) {
      return { ...empty, exists: true, valid: false, issues: validated.issues };
    }
    return { ...empty, exists: true, config: validated.config };
  }

  function loadConfig(): StatuslineConfig {
    const snapshot = readConfigFileSnapshot();
    if (!snapshot.valid) {
      deps.logger.warn(
        `Invalid config at ${snapshot.path ?? "<unknown>"}, using defaults:\n${formatIssues(snapshot.issues)}`,
      );
    }
    return snapshot.config;
  }

  return { configPath, loadConfig, readConfigFileSnapshot };
}

export function loadConfig(overrides: ConfigIoDeps = {}): StatuslineConfig {
  return createConfigIO(overrides).loadConfig();
}

export function findSegmentConfig(
  config: StatuslineConfig,
  id: SegmentId,
): SegmentConfig | undefined {
  return config.segments?.find((segment) => segment.id === id);
}

export function isSegmentEnabled(config: StatuslineConfig, id: SegmentId): boolean {
  return findSegmentConfig(config, id)?.enabled !== false;
}

export function createConfigOptionsProvider(config: StatuslineConfig): SegmentOptionsProvider {
  return {
    getSegmentOptions: (id) => findSegmentConfig(config, id)?.options,
  };
}
