import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const execFileAsync = promisify(execFile);
const log = createSubsystemLogger("process/exec");

export type RunExec = (
  command: string,
  args: string[],
  opts?: number | { timeoutMs?: number; maxBuffer?: number },
) => Promise<{ stdout: string; stderr: string }>;

// Simple promise-wrapped execFile; the child is killed once the timeout elapses.
export const runExec: RunExec = async (command, args, opts = 10_000) => {
  const options =
    typeof opts === "number"
      ? { timeout: opts, encoding: "utf8" as const, windowsHide: true }
      : {
          timeout: opts.timeoutMs,
          maxBuffer: opts.maxBuffer,
          encoding: "utf8" as const,
          windowsHide: true,
        };
  try {
    const { stdout, stderr } = await execFileAsync(command, args, options);
    if (stderr.trim()) log.debug(stderr.trim(), { command });
    return { stdout, stderr };
  } catch (err) {
    log.debug(`Command failed: ${command} ${args.join(" ")}`, {
      error: formatErrorMessage(err),
    });
    throw err;
  }
};
