import { runExec, type RunExec } from "../process/exec.js";

export const CLAUDE_CODE_USER_AGENT = "claude-code";

const VERSION_LOOKUP_TIMEOUT_MS = 1000;
const SEMVER_RE = /\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.-]+)?/;

export function parseClaudeCodeVersion(output: string): string | undefined {
  return output.match(SEMVER_RE)?.[0];
}

/**
 * `claude-code/<version>` from the locally installed CLI, or bare `claude-code`
 * when the binary is missing, fails, or does not answer within the timeout.
 */
export async function resolveClaudeCodeUserAgent(
  opts: { timeoutMs?: number; exec?: RunExec } = {},
): Promise<string> {
  const exec = opts.exec ?? runExec;
  const timeoutMs = Math.min(VERSION_LOOKUP_TIMEOUT_MS, opts.timeoutMs ?? VERSION_LOOKUP_TIMEOUT_MS);
  if (timeoutMs <= 0) return CLAUDE_CODE_USER_AGENT;
  try {
    const { stdout } = await exec("claude", ["--version"], { timeoutMs });
    const version = parseClaudeCodeVersion(stdout);
    return version ? `${CLAUDE_CODE_USER_AGENT}/${version}` : CLAUDE_CODE_USER_AGENT;
  } catch {
    return CLAUDE_CODE_USER_AGENT;
  }
}
