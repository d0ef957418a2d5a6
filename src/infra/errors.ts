export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  const code = err.code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

export function formatErrorMessage(err: unknown, seen: Set<unknown> = new Set()): string {
  if (err instanceof Error) {
    seen.add(err);
    const message = err.message || err.name || "Error";
    // undici wraps socket failures as `TypeError: fetch failed` with the useful part in `cause`.
    const cause = err.cause;
    if (cause !== undefined && !seen.has(cause)) {
      return `${message}: ${formatErrorMessage(cause, seen)}`;
    }
    return message;
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

export function formatUncaughtError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message ?? err.name;
  }
  return formatErrorMessage(err);
}

export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("name" in err)) return false;
  const name = err.name;
  return name === "AbortError" || name === "TimeoutError";
}
