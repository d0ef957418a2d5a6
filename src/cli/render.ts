import type { SegmentData } from "../segments/types.js";

/** `<icon> <primary> <secondary>`, skipping empty parts. */
export function formatSegmentLine(data: SegmentData): string {
  return [data.metadata.dynamic_icon, data.primary, data.secondary]
    .filter((part): part is string => typeof part === "string" && part.length > 0)
    .join(" ");
}
