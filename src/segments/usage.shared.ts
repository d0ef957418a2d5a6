const RFC3339_RE = /^(\d{4}-\d{2}-\d{2})[Tt ](\d{2}:\d{2}:\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Epoch milliseconds for an RFC3339 timestamp, or undefined when the text is not one.
 * Sub-millisecond digits (the usage API sends microseconds) are truncated.
 */
export function parseRfc3339(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const match = RFC3339_RE.exec(value);
  if (!match) return undefined;
  const [, date, time, fraction, zone] = match;
  const millis = fraction ? fraction.slice(0, 4).padEnd(4, "0") : "";
  const offset = zone === "z" || zone === "Z" ? "Z" : zone;
  const ms = Date.parse(`${date}T${time}${millis}${offset}`);
  return Number.isFinite(ms) ? ms : undefined;
}

export type FallbackStep<T> = () => Promise<T | undefined> | T | undefined;

/** Runs steps in order and resolves with the first defined result. */
export async function firstAvailable<T>(steps: ReadonlyArray<FallbackStep<T>>): Promise<T | undefined> {
  for (const step of steps) {
    const result = await step();
    if (result !== undefined) return result;
  }
  return undefined;
}
