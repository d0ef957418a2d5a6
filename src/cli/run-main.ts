import process from "node:process";

import { formatUncaughtError } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("cli");

export function installProcessHandlers(): void {
  process.on("unhandledRejection", (reason) => {
    log.fatal(`Unhandled promise rejection: ${formatUncaughtError(reason)}`);
    console.error("[statusline-usage] Unhandled promise rejection:", formatUncaughtError(reason));
    process.exit(1);
  });
  process.on("uncaughtException", (error) => {
    log.fatal(`Uncaught exception: ${formatUncaughtError(error)}`);
    console.error("[statusline-usage] Uncaught exception:", formatUncaughtError(error));
    process.exit(1);
  });
}

export async function runCli(argv: string[] = process.argv) {
  installProcessHandlers();

  const { buildProgram } = await import("./program.js");
  const program = buildProgram();
  await program.parseAsync(argv);
}
