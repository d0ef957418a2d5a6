export {
  claudeCredentialProvider,
  createClaudeCredentialProvider,
  readClaudeOAuthToken,
} from "./auth/claude-credentials.js";
export { buildProgram } from "./cli/program.js";
export { formatSegmentLine } from "./cli/render.js";
export { parseStatuslineInput, readStatuslineInput } from "./cli/stdin.js";
export {
  createConfigIO,
  createConfigOptionsProvider,
  isSegmentEnabled,
  loadConfig,
} from "./config/config.js";
export type { StatuslineConfig } from "./config/config.js";
export type {
  CredentialProvider,
  Segment,
  SegmentData,
  SegmentId,
  SegmentOptionsProvider,
  StatuslineInput,
} from "./segments/types.js";
export {
  createUsageSegment,
  formatReset,
  renderUsageSegment,
  selectResetTimestamp,
  UsageSegment,
} from "./segments/usage.js";
export type { UsageSegmentDeps } from "./segments/usage.js";
export { resolveUsageCachePath, UsageCacheStore } from "./segments/usage.cache.js";
export { fetchUsage } from "./segments/usage.fetch.js";
export type { FetchUsageParams } from "./segments/usage.fetch.js";
export { formatResetDuration, formatResetTime, iconFor } from "./segments/usage.format.js";
export { resolveUsageSegmentOptions } from "./segments/usage.options.js";
export type { UsageSegmentOptions } from "./segments/usage.options.js";
export type { UsageCacheRecord, UsageSnapshot } from "./segments/usage.types.js";
