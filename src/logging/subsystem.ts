import { Chalk } from "chalk";
import type { Logger as TsLogger } from "tslog";

import { readLoggingConfig } from "./config.js";
import { type LogLevel, levelToMinLevel, normalizeLogLevel } from "./levels.js";
import { getChildLogger, isFileLogLevelEnabled } from "./logger.js";
import {
  type ConsoleStyle,
  type LoggerSettings,
  type LogObj,
  loggingState,
  type ResolvedConsoleSettings,
} from "./state.js";

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  fatal: (message: string, meta?: Record<string, unknown>) => void;
  child: (name: string) => SubsystemLogger;
};

type ChalkInstance = InstanceType<typeof Chalk>;

export function setVerbose(verbose: boolean): void {
  loggingState.verbose = verbose;
  loggingState.cachedConsoleSettings = null;
}

function normalizeConsoleStyle(style?: string): ConsoleStyle {
  if (style === "compact" || style === "json" || style === "pretty") {
    return style;
  }
  return process.stderr.isTTY ? "pretty" : "compact";
}

// Console output defaults to silent: stdout carries the status line and Claude Code
// may surface stderr, so diagnostics go to the file log unless asked for.
export function getConsoleSettings(): ResolvedConsoleSettings {
  const cached = loggingState.cachedConsoleSettings;
  if (cached) return cached;
  const cfg: LoggerSettings | undefined = loggingState.overrideSettings ?? readLoggingConfig();
  const level: LogLevel = loggingState.verbose
    ? "debug"
    : normalizeLogLevel(cfg?.consoleLevel, "silent");
  const settings = { level, style: normalizeConsoleStyle(cfg?.consoleStyle) };
  loggingState.cachedConsoleSettings = settings;
  return settings;
}

function shouldLogToConsole(level: LogLevel, settings: { level: LogLevel }): boolean {
  if (settings.level === "silent") return false;
  return levelToMinLevel(level) <= levelToMinLevel(settings.level);
}

function getColorForConsole(): ChalkInstance {
  const hasForceColor =
    typeof process.env.FORCE_COLOR === "string" &&
    process.env.FORCE_COLOR.trim().length > 0 &&
    process.env.FORCE_COLOR.trim() !== "0";
  if (process.env.NO_COLOR && !hasForceColor) return new Chalk({ level: 0 });
  return process.stderr.isTTY ? new Chalk({ level: 1 }) : new Chalk({ level: 0 });
}

const SUBSYSTEM_COLORS = ["cyan", "green", "yellow", "blue", "magenta"] as const;

function pickSubsystemColor(color: ChalkInstance, subsystem: string): ChalkInstance {
  let hash = 0;
  for (let i = 0; i < subsystem.length; i += 1) {
    hash = (hash * 31 + subsystem.charCodeAt(i)) | 0;
  }
  const idx = Math.abs(hash) % SUBSYSTEM_COLORS.length;
  return color[SUBSYSTEM_COLORS[idx] ?? "cyan"];
}

export function formatConsoleLine(opts: {
  level: LogLevel;
  subsystem: string;
  message: string;
  style: ConsoleStyle;
  meta?: Record<string, unknown>;
  time?: Date;
}): string {
  const time = opts.time ?? new Date();
  if (opts.style === "json") {
    return JSON.stringify({
      time: time.toISOString(),
      level: opts.level,
      subsystem: opts.subsystem,
      message: opts.message,
      ...opts.meta,
    });
  }
  const color = getColorForConsole();
  const prefix = pickSubsystemColor(color, opts.subsystem)(`[${opts.subsystem}]`);
  const levelColor =
    opts.level === "error" || opts.level === "fatal"
      ? color.red
      : opts.level === "warn"
        ? color.yellow
        : opts.level === "debug" || opts.level === "trace"
          ? color.gray
          : color.cyan;
  const metaSuffix =
    opts.meta && Object.keys(opts.meta).length > 0 ? ` ${color.gray(JSON.stringify(opts.meta))}` : "";
  const head =
    opts.style === "pretty" ? `${color.gray(time.toISOString().slice(11, 19))} ${prefix}` : prefix;
  return `${head} ${levelColor(opts.message)}${metaSuffix}`;
}

function writeConsoleLine(line: string) {
  // stdout belongs to the rendered status line.
  const sink = loggingState.rawConsole ?? console;
  sink.error(line);
}

function logToFile(
  fileLogger: TsLogger<LogObj>,
  level: Exclude<LogLevel, "silent">,
  message: string,
  meta?: Record<string, unknown>,
) {
  const args: unknown[] = meta && Object.keys(meta).length > 0 ? [meta, message] : [message];
  switch (level) {
    case "trace":
      fileLogger.trace(...args);
      return;
    case "debug":
      fileLogger.debug(...args);
      return;
    case "info":
      fileLogger.info(...args);
      return;
    case "warn":
      fileLogger.warn(...args);
      return;
    case "error":
      fileLogger.error(...args);
      return;
    case "fatal":
      fileLogger.fatal(...args);
      return;
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let fileLogger: TsLogger<LogObj> | null = null;
  let fileLoggerSource: TsLogger<LogObj> | null = null;
  const getFileLogger = () => {
    // Rebuild the child when the base logger was reset (config or override changed).
    if (!fileLogger || fileLoggerSource !== loggingState.cachedLogger) {
      fileLogger = getChildLogger({ subsystem });
      fileLoggerSource = loggingState.cachedLogger;
    }
    return fileLogger;
  };
  const emit = (
    level: Exclude<LogLevel, "silent">,
    message: string,
    meta?: Record<string, unknown>,
  ) => {
    if (isFileLogLevelEnabled(level)) {
      logToFile(getFileLogger(), level, message, meta);
    }
    const consoleSettings = getConsoleSettings();
    if (!shouldLogToConsole(level, consoleSettings)) return;
    writeConsoleLine(
      formatConsoleLine({
        level,
        subsystem,
        message,
        style: consoleSettings.style,
        meta,
      }),
    );
  };

  return {
    subsystem,
    trace: (message, meta) => emit("trace", message, meta),
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    fatal: (message, meta) => emit("fatal", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
