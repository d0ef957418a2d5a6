import os from "node:os";
import path from "node:path";

const CLAUDE_DIRNAME = ".claude";
const STATE_DIRNAME = "statusline-usage";
const CONFIG_FILENAME = "config.json";

export type HomeDirResolver = () => string;

/**
 * Home directory used for every user-scoped path.
 * Order: HOME, USERPROFILE, then os.homedir(). Returns undefined when none is usable.
 */
export function resolveHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: HomeDirResolver = os.homedir,
): string | undefined {
  const fromEnv = env.HOME?.trim() || env.USERPROFILE?.trim();
  if (fromEnv) return fromEnv;
  try {
    const resolved = homedir().trim();
    return resolved || undefined;
  } catch {
    return undefined;
  }
}

export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: HomeDirResolver = os.homedir,
): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    const home = resolveHomeDir(env, homedir);
    if (!home) return path.resolve(trimmed);
    const expanded = trimmed.replace(/^~(?=$|[\\/])/, home);
    return path.resolve(expanded);
  }
  return path.resolve(trimmed);
}

/** `~/.claude`, shared with Claude Code itself (settings, credentials). */
export function resolveClaudeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: HomeDirResolver = os.homedir,
): string | undefined {
  const home = resolveHomeDir(env, homedir);
  return home ? path.join(home, CLAUDE_DIRNAME) : undefined;
}

/**
 * State directory for our own files (config, usage cache).
 * Default: ~/.claude/statusline-usage
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: HomeDirResolver = os.homedir,
): string | undefined {
  const claudeDir = resolveClaudeDir(env, homedir);
  return claudeDir ? path.join(claudeDir, STATE_DIRNAME) : undefined;
}

/**
 * Config file path (JSON5).
 * Can be overridden via STATUSLINE_USAGE_CONFIG_PATH.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: HomeDirResolver = os.homedir,
): string | undefined {
  const override = env.STATUSLINE_USAGE_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override, env, homedir);
  const stateDir = resolveStateDir(env, homedir);
  return stateDir ? path.join(stateDir, CONFIG_FILENAME) : undefined;
}
