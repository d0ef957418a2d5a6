import { z } from "zod";

import type { StatuslineInput } from "../segments/types.js";

const StatuslineInputSchema = z
  .object({
    session_id: z.string().optional(),
    transcript_path: z.string().optional(),
    cwd: z.string().optional(),
    model: z
      .object({ id: z.string().optional(), display_name: z.string().optional() })
      .passthrough()
      .optional(),
    workspace: z
      .object({ current_dir: z.string().optional(), project_dir: z.string().optional() })
      .passthrough()
      .optional(),
    version: z.string().optional(),
  })
  .passthrough();

export type InputStream = AsyncIterable<string | Buffer> & { isTTY?: boolean };

export function parseStatuslineInput(raw: string): StatuslineInput {
  const trimmed = raw.trim();
  if (!trimmed) return {};
  try {
    const parsed = StatuslineInputSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

/** Session JSON piped by Claude Code; an interactive terminal or bad JSON yields `{}`. */
export async function readStatuslineInput(stream: InputStream): Promise<StatuslineInput> {
  if (stream.isTTY) return {};
  let raw = "";
  for await (const chunk of stream) {
    raw += typeof chunk === "string" ? chunk : chunk.toString("utf8");
  }
  return parseStatuslineInput(raw);
}
