import { z } from "zod";

import { ALLOWED_LOG_LEVELS } from "../logging/levels.js";

export const LogLevelSchema = z.enum(ALLOWED_LOG_LEVELS);

export const LoggingConfigSchema = z
  .object({
    level: LogLevelSchema.optional(),
    file: z.string().min(1).optional(),
    consoleLevel: LogLevelSchema.optional(),
    consoleStyle: z
      .union([z.literal("pretty"), z.literal("compact"), z.literal("json")])
      .optional(),
  })
  .strict();

// Option values stay loosely typed here; each segment validates its own options
// and falls back to defaults for anything missing or of the wrong type.
export const SegmentConfigSchema = z.object({
  id: z.string().min(1),
  enabled: z.boolean().optional(),
  options: z.record(z.string(), z.unknown()).optional(),
});

export const StatuslineConfigSchema = z.object({
  segments: z.array(SegmentConfigSchema).optional(),
  logging: LoggingConfigSchema.optional(),
});
