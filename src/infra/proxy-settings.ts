import path from "node:path";

import { z } from "zod";

import { resolveClaudeDir } from "../config/paths.js";
import { loadJsonFile } from "./json-file.js";

const SETTINGS_FILENAME = "settings.json";

export function resolveClaudeSettingsPath(
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const claudeDir = resolveClaudeDir(env);
  return claudeDir ? path.join(claudeDir, SETTINGS_FILENAME) : undefined;
}

const ClaudeSettingsSchema = z.object({
  env: z.record(z.string(), z.unknown()),
});

function readProxyValue(env: Record<string, unknown>, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
}

/**
 * Proxy URL from Claude Code's `settings.json` (`env.HTTPS_PROXY`, then `env.HTTP_PROXY`).
 * Anything missing or malformed means no proxy.
 */
export function resolveProxyFromSettings(
  settingsPath: string | undefined = resolveClaudeSettingsPath(),
): string | undefined {
  if (!settingsPath) return undefined;
  const parsed = ClaudeSettingsSchema.safeParse(loadJsonFile(settingsPath));
  if (!parsed.success) return undefined;
  const { env } = parsed.data;
  return readProxyValue(env, "HTTPS_PROXY") ?? readProxyValue(env, "HTTP_PROXY");
}
