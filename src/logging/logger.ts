import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { Logger as TsLogger } from "tslog";

import { readLoggingConfig } from "./config.js";
import {
  type LogLevel,
  levelToMinLevel,
  levelToTslogMinLevel,
  normalizeLogLevel,
} from "./levels.js";
import {
  type LoggerSettings,
  type LogObj,
  loggingState,
  type ResolvedLoggerSettings,
} from "./state.js";

export const DEFAULT_LOG_DIR = path.join(os.tmpdir(), "statusline-usage");

const LOG_PREFIX = "statusline-usage";
const LOG_SUFFIX = ".log";
const MAX_LOG_AGE_MS = 24 * 60 * 60 * 1000; // 24h
// The status line re-renders every few seconds; keep the file quiet unless asked.
const DEFAULT_FILE_LEVEL: LogLevel = "warn";

function resolveSettings(): ResolvedLoggerSettings {
  const cfg: LoggerSettings | undefined = loggingState.overrideSettings ?? readLoggingConfig();
  const level = normalizeLogLevel(cfg?.level, DEFAULT_FILE_LEVEL);
  const file = cfg?.file ?? defaultRollingPathForToday();
  return { level, file };
}

function settingsChanged(a: ResolvedLoggerSettings | null, b: ResolvedLoggerSettings) {
  if (!a) return true;
  return a.level !== b.level || a.file !== b.file;
}

export function isFileLogLevelEnabled(level: LogLevel): boolean {
  const settings = loggingState.cachedSettings ?? resolveSettings();
  if (!loggingState.cachedSettings) loggingState.cachedSettings = settings;
  if (settings.level === "silent") return false;
  return levelToMinLevel(level) <= levelToMinLevel(settings.level);
}

function buildLogger(settings: ResolvedLoggerSettings): TsLogger<LogObj> {
  const logger = new TsLogger<LogObj>({
    name: "statusline-usage",
    minLevel: levelToTslogMinLevel(settings.level),
    type: "hidden", // no ansi formatting
  });
  if (settings.level === "silent") return logger;

  try {
    fs.mkdirSync(path.dirname(settings.file), { recursive: true });
  } catch {
    // the transport below fails quietly on its own
  }
  // Clean up stale rolling logs when using a dated log filename.
  if (isRollingPath(settings.file)) {
    pruneOldRollingLogs(path.dirname(settings.file));
  }

  logger.attachTransport((logObj: LogObj) => {
    try {
      const time = logObj.date?.toISOString?.() ?? new Date().toISOString();
      const line = JSON.stringify({ ...logObj, time });
      fs.appendFileSync(settings.file, `${line}\n`, { encoding: "utf8" });
    } catch {
      // never block on logging failures
    }
  });
  return logger;
}

export function getLogger(): TsLogger<LogObj> {
  const settings = loggingState.cachedSettings ?? resolveSettings();
  const cachedLogger = loggingState.cachedLogger;
  if (!cachedLogger || settingsChanged(loggingState.cachedSettings, settings)) {
    const logger = buildLogger(settings);
    loggingState.cachedLogger = logger;
    loggingState.cachedSettings = settings;
    return logger;
  }
  return cachedLogger;
}

export function getChildLogger(
  bindings?: Record<string, unknown>,
  opts?: { level?: LogLevel },
): TsLogger<LogObj> {
  const base = getLogger();
  const minLevel = opts?.level ? levelToTslogMinLevel(opts.level) : undefined;
  const name = bindings ? JSON.stringify(bindings) : undefined;
  return base.getSubLogger({
    name,
    minLevel,
    prefix: bindings ? [name ?? ""] : [],
  });
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
  loggingState.overrideSettings = settings;
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
  loggingState.cachedConsoleSettings = null;
}

function formatLocalDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

function defaultRollingPathForToday(): string {
  const today = formatLocalDate(new Date());
  return path.join(DEFAULT_LOG_DIR, `${LOG_PREFIX}-${today}${LOG_SUFFIX}`);
}

export function isRollingPath(file: string): boolean {
  const base = path.basename(file);
  return (
    base.startsWith(`${LOG_PREFIX}-`) &&
    base.endsWith(LOG_SUFFIX) &&
    base.length === `${LOG_PREFIX}-YYYY-MM-DD${LOG_SUFFIX}`.length
  );
}

function pruneOldRollingLogs(dir: string): void {
  try {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    const cutoff = Date.now() - MAX_LOG_AGE_MS;
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      if (!entry.name.startsWith(`${LOG_PREFIX}-`) || !entry.name.endsWith(LOG_SUFFIX)) continue;
      const fullPath = path.join(dir, entry.name);
      try {
        const stat = fs.statSync(fullPath);
        if (stat.mtimeMs < cutoff) {
          fs.rmSync(fullPath, { force: true });
        }
      } catch {
        // ignore errors during pruning
      }
    }
  } catch {
    // ignore missing dir or read errors
  }
}
