import { type ExecSyncOptionsWithStringEncoding, execSync } from "node:child_process";
import path from "node:path";

import { z } from "zod";

import { resolveClaudeDir } from "../config/paths.js";
import { loadJsonFile } from "../infra/json-file.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { CredentialProvider } from "../segments/types.js";

const log = createSubsystemLogger("auth/claude");

const CLAUDE_CLI_CREDENTIALS_FILENAME = ".credentials.json";
const CLAUDE_CLI_KEYCHAIN_SERVICE = "Claude Code-credentials";
const CLAUDE_OAUTH_TOKEN_ENV = "CLAUDE_CODE_OAUTH_TOKEN";

type ExecSyncFn = (command: string, options: ExecSyncOptionsWithStringEncoding) => string;

export type ClaudeTokenOptions = {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  allowKeychainPrompt?: boolean;
  execSync?: ExecSyncFn;
};

const ClaudeCredentialsSchema = z.object({
  claudeAiOauth: z.object({ accessToken: z.string() }),
});

/** `claudeAiOauth.accessToken` from the JSON blob Claude Code stores (keychain or file). */
export function extractClaudeAccessToken(data: unknown): string | undefined {
  const parsed = ClaudeCredentialsSchema.safeParse(data);
  if (!parsed.success) return undefined;
  return parsed.data.claudeAiOauth.accessToken.trim() || undefined;
}

function readKeychainToken(execSyncImpl: ExecSyncFn): string | undefined {
  try {
    const result = execSyncImpl(
      `security find-generic-password -s "${CLAUDE_CLI_KEYCHAIN_SERVICE}" -w`,
      { encoding: "utf8", timeout: 5000, stdio: ["pipe", "pipe", "pipe"] },
    );
    return extractClaudeAccessToken(JSON.parse(result.trim()));
  } catch {
    return undefined;
  }
}

export function resolveClaudeCredentialsPath(
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const claudeDir = resolveClaudeDir(env);
  return claudeDir ? path.join(claudeDir, CLAUDE_CLI_CREDENTIALS_FILENAME) : undefined;
}

/**
 * OAuth access token for the usage endpoint.
 * Order: CLAUDE_CODE_OAUTH_TOKEN, the macOS keychain entry, ~/.claude/.credentials.json.
 */
export function readClaudeOAuthToken(options: ClaudeTokenOptions = {}): string | undefined {
  const env = options.env ?? process.env;
  const fromEnv = env[CLAUDE_OAUTH_TOKEN_ENV]?.trim();
  if (fromEnv) return fromEnv;

  const platform = options.platform ?? process.platform;
  if (platform === "darwin" && options.allowKeychainPrompt !== false) {
    const fromKeychain = readKeychainToken(options.execSync ?? execSync);
    if (fromKeychain) {
      log.debug("read anthropic token from claude cli keychain");
      return fromKeychain;
    }
  }

  const credPath = resolveClaudeCredentialsPath(env);
  if (!credPath) return undefined;
  const fromFile = extractClaudeAccessToken(loadJsonFile(credPath));
  if (fromFile) log.debug("read anthropic token from claude cli credentials file");
  return fromFile;
}

export function createClaudeCredentialProvider(
  options: ClaudeTokenOptions = {},
): CredentialProvider {
  return {
    getToken: async () => readClaudeOAuthToken(options),
  };
}

export const claudeCredentialProvider: CredentialProvider = createClaudeCredentialProvider();
