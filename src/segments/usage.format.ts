import { parseRfc3339 } from "./usage.shared.js";

/** Nerd Font `circle_slice_1` .. `circle_slice_8`. */
export const USAGE_ICONS = [
  "\u{f0a9e}",
  "\u{f0a9f}",
  "\u{f0aa0}",
  "\u{f0aa1}",
  "\u{f0aa2}",
  "\u{f0aa3}",
  "\u{f0aa4}",
  "\u{f0aa5}",
] as const;

// Inclusive upper bound (in whole percent) of every bucket but the last.
const ICON_BUCKET_LIMITS = [12, 25, 37, 50, 62, 75, 87] as const;

const UNKNOWN_RESET = "?";

/** Whole percent, truncated and saturated into 0..255. */
function toBucketPercent(fraction: number): number {
  if (Number.isNaN(fraction)) return 0;
  return Math.min(255, Math.max(0, Math.trunc(fraction * 100)));
}

export function iconBucketFor(fraction: number): number {
  const percent = toBucketPercent(fraction);
  const idx = ICON_BUCKET_LIMITS.findIndex((limit) => percent <= limit);
  return idx === -1 ? ICON_BUCKET_LIMITS.length : idx;
}

/** Icon for a utilization fraction (0..1); anything above 1 lands in the top bucket. */
export function iconFor(fraction: number): string {
  return USAGE_ICONS[iconBucketFor(fraction)] ?? USAGE_ICONS[USAGE_ICONS.length - 1];
}

/**
 * Local `month-day-hour` label for a reset instant, e.g. `6-14-10`.
 * Past minute 45 the label shows the following hour.
 */
export function formatResetTime(value: string | null | undefined): string {
  const ms = parseRfc3339(value);
  if (ms === undefined) return UNKNOWN_RESET;
  let local = new Date(ms);
  if (local.getMinutes() > 45) {
    local = new Date(ms + 60 * 60 * 1000);
  }
  return `${local.getMonth() + 1}-${local.getDate()}-${local.getHours()}`;
}

/**
 * Countdown to a reset instant: `Nd Nh`, `Nh Nm` or `Nm`.
 * Less than a minute left (including instants already past) renders `now`.
 */
export function formatResetDuration(
  value: string | null | undefined,
  opts: { now?: number } = {},
): string {
  const ms = parseRfc3339(value);
  if (ms === undefined) return UNKNOWN_RESET;
  const remainingMs = ms - (opts.now ?? Date.now());
  if (Math.trunc(remainingMs / 1000) < 60) return "now";

  const totalMinutes = Math.trunc(remainingMs / 60_000);
  const days = Math.trunc(totalMinutes / (24 * 60));
  const hours = Math.trunc((totalMinutes % (24 * 60)) / 60);
  const minutes = totalMinutes % 60;

  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}
