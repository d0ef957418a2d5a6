export {
  createConfigIO,
  createConfigOptionsProvider,
  findSegmentConfig,
  isSegmentEnabled,
  loadConfig,
  validateConfigObject,
} from "./io.js";
export type { ConfigFileSnapshot, ConfigIoDeps, ConfigValidationIssue } from "./io.js";
export { resolveConfigPath, resolveHomeDir, resolveStateDir, resolveClaudeDir } from "./paths.js";
export type * from "./types.js";
