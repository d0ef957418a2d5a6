#!/usr/bin/env node
import process from "node:process";

import { runCli } from "./cli/run-main.js";
import { formatUncaughtError } from "./infra/errors.js";

process.title = "statusline-usage";

runCli(process.argv).catch((error: unknown) => {
  console.error("[statusline-usage] CLI failed:", formatUncaughtError(error));
  process.exit(1);
});
