import type { Logger as TsLogger } from "tslog";

import type { LogLevel } from "./levels.js";

export type ConsoleStyle = "pretty" | "compact" | "json";

export type LoggerSettings = {
  level?: LogLevel;
  file?: string;
  consoleLevel?: LogLevel;
  consoleStyle?: ConsoleStyle;
};

export type ResolvedLoggerSettings = {
  level: LogLevel;
  file: string;
};

export type ResolvedConsoleSettings = {
  level: LogLevel;
  style: ConsoleStyle;
};

export type LogObj = { date?: Date } & Record<string, unknown>;

export const loggingState = {
  cachedLogger: null as TsLogger<LogObj> | null,
  cachedSettings: null as ResolvedLoggerSettings | null,
  cachedConsoleSettings: null as ResolvedConsoleSettings | null,
  overrideSettings: null as LoggerSettings | null,
  configPath: null as string | null,
  verbose: false,
  rawConsole: null as {
    error: typeof console.error;
  } | null,
};
