import { type Dispatcher, ProxyAgent, fetch as undiciFetch } from "undici";

export type FetchInit = {
  method?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
};

export type FetchResponse = {
  status: number;
  json: () => Promise<unknown>;
};

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

// Largest delay setTimeout honours; anything above fires immediately.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Proxies given as bare `host:port` are plain HTTP proxies. */
export function normalizeProxyUrl(proxyUrl: string): string {
  const trimmed = proxyUrl.trim();
  return trimmed.includes("://") ? trimmed : `http://${trimmed}`;
}

export function makeProxyFetch(proxyUrl: string, baseFetch: FetchLike = defaultFetch): FetchLike {
  const agent = new ProxyAgent(normalizeProxyUrl(proxyUrl));
  return (url, init) => baseFetch(url, { ...init, dispatcher: agent });
}

/**
 * Runs `work` with a signal that aborts after `timeoutMs`.
 * The timer covers the whole callback (request and body read), not just the headers.
 */
export async function withAbortTimeout<T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const delay = Math.min(MAX_TIMER_DELAY_MS, Math.max(0, timeoutMs));
  const timer = setTimeout(() => controller.abort(), delay);
  try {
    return await work(controller.signal);
  } finally {
    clearTimeout(timer);
  }
}
