import { z } from "zod";

import { resolveClaudeCodeUserAgent } from "../infra/claude-code-version.js";
import { formatErrorMessage, isAbortError } from "../infra/errors.js";
import { defaultFetch, type FetchLike, makeProxyFetch, withAbortTimeout } from "../infra/fetch.js";
import { resolveProxyFromSettings } from "../infra/proxy-settings.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import type { UsageSnapshot } from "./usage.types.js";

export const USAGE_ENDPOINT_PATH = "/api/oauth/usage";
export const OAUTH_BETA = "oauth-2025-04-20";

const UsageWindowSchema = z.object({
  utilization: z.number(),
  resets_at: z.string().nullish(),
});

export const UsageResponseSchema = z.object({
  five_hour: UsageWindowSchema,
  seven_day: UsageWindowSchema,
});

export type UsageResponse = z.infer<typeof UsageResponseSchema>;

export type FetchUsageParams = {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  fetch?: FetchLike;
  /** `null` disables the proxy; `undefined` reads it from Claude Code's settings. */
  proxyUrl?: string | null;
  resolveUserAgent?: (timeoutMs: number) => Promise<string>;
  log?: SubsystemLogger;
};

export function buildUsageUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${USAGE_ENDPOINT_PATH}`;
}

export function toUsageSnapshot(data: UsageResponse): UsageSnapshot {
  return {
    fiveHourUtilization: data.five_hour.utilization,
    sevenDayUtilization: data.seven_day.utilization,
    fiveHourResetsAt: data.five_hour.resets_at ?? undefined,
    sevenDayResetsAt: data.seven_day.resets_at ?? undefined,
  };
}

function resolveFetch(params: FetchUsageParams, log: SubsystemLogger): FetchLike {
  const base = params.fetch ?? defaultFetch;
  const proxyUrl = params.proxyUrl === undefined ? resolveProxyFromSettings() : params.proxyUrl;
  if (!proxyUrl) return base;
  try {
    return makeProxyFetch(proxyUrl, base);
  } catch (err) {
    log.debug(`ignoring unusable proxy: ${formatErrorMessage(err)}`, { proxyUrl });
    return base;
  }
}

/**
 * One GET against the OAuth usage endpoint.
 * Resolves `null` on any failure (network, timeout, non-200, unexpected body).
 */
export async function fetchUsage(params: FetchUsageParams): Promise<UsageSnapshot | null> {
  const log = params.log ?? createSubsystemLogger("segments/usage/fetch");
  const url = buildUsageUrl(params.baseUrl);
  try {
    const fetchFn = resolveFetch(params, log);
    const resolveUserAgent =
      params.resolveUserAgent ?? ((timeoutMs: number) => resolveClaudeCodeUserAgent({ timeoutMs }));
    const userAgent = await resolveUserAgent(params.timeoutMs);

    const body = await withAbortTimeout(params.timeoutMs, async (signal) => {
      const res = await fetchFn(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${params.token}`,
          "anthropic-beta": OAUTH_BETA,
          "User-Agent": userAgent,
        },
        signal,
      });
      if (res.status !== 200) {
        log.debug(`usage request failed: HTTP ${res.status}`, { url });
        return undefined;
      }
      return await res.json();
    });
    if (body === undefined) return null;

    const parsed = UsageResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.debug("usage response did not match the expected shape", {
        url,
        issues: parsed.error.issues.map((iss) => `${iss.path.join(".")}: ${iss.message}`),
      });
      return null;
    }
    return toUsageSnapshot(parsed.data);
  } catch (err) {
    const reason = isAbortError(err)
      ? `timed out after ${params.timeoutMs}ms`
      : formatErrorMessage(err);
    log.debug(`usage request failed: ${reason}`, { url });
    return null;
  }
}
