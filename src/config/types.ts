import type { z } from "zod";

import type {
  LoggingConfigSchema,
  SegmentConfigSchema,
  StatuslineConfigSchema,
} from "./zod-schema.js";

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type SegmentConfig = z.infer<typeof SegmentConfigSchema>;
export type StatuslineConfig = z.infer<typeof StatuslineConfigSchema>;
