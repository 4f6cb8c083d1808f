import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Logger as TsLogger } from "tslog";
import { resolveEnvLogLevelOverride } from "./env-log-level.js";
import { type EmittingLogLevel, isLevelEnabled, levelToMinLevel, normalizeLogLevel } from "./levels.js";
import {
  type LogObj,
  type LoggerSettings,
  type ResolvedLoggerSettings,
  loggingState,
} from "./state.js";

export type { LoggerSettings, ResolvedLoggerSettings } from "./state.js";

export const DEFAULT_LOG_DIR = path.join(os.tmpdir(), "gridcheck");
export const DEFAULT_LOG_FILE = path.join(DEFAULT_LOG_DIR, "gridcheck.log");
export const DEFAULT_MAX_LOG_FILE_BYTES = 10 * 1024 * 1024; // 10 MiB

// tslog warns on a minLevel past fatal; silent is enforced by isFileLogLevelEnabled.
const TSLOG_MAX_MIN_LEVEL = 6;

function resolveSettings(): ResolvedLoggerSettings {
  const cfg: LoggerSettings =
    loggingState.overrideSettings ?? loggingState.configuredSettings ?? {};
  const defaultLevel =
    process.env.VITEST === "true" && process.env.GRIDCHECK_TEST_FILE_LOG !== "1"
      ? "silent"
      : "info";
  const level = resolveEnvLogLevelOverride() ?? normalizeLogLevel(cfg.level, defaultLevel);
  return {
    level,
    file: cfg.file ?? DEFAULT_LOG_FILE,
    maxFileBytes: resolveMaxLogFileBytes(cfg.maxFileBytes),
  };
}

function resolveMaxLogFileBytes(raw: unknown): number {
  if (typeof raw === "number" && Number.isFinite(raw) && raw > 0) {
    return Math.floor(raw);
  }
  return DEFAULT_MAX_LOG_FILE_BYTES;
}

function settingsChanged(a: ResolvedLoggerSettings | null, b: ResolvedLoggerSettings): boolean {
  if (!a) {
    return true;
  }
  return a.level !== b.level || a.file !== b.file || a.maxFileBytes !== b.maxFileBytes;
}

function currentFileBytes(file: string): number {
  try {
    return fs.statSync(file).size;
  } catch {
    return 0;
  }
}

function appendLine(file: string, line: string): boolean {
  try {
    fs.appendFileSync(file, line, { encoding: "utf8" });
    return true;
  } catch {
    return false;
  }
}

function buildLogger(settings: ResolvedLoggerSettings): TsLogger<LogObj> {
  const logger = new TsLogger<LogObj>({
    name: "gridcheck",
    minLevel: Math.min(levelToMinLevel(settings.level), TSLOG_MAX_MIN_LEVEL),
    type: "hidden",
  });
  if (settings.level === "silent") {
    return logger;
  }
  try {
    fs.mkdirSync(path.dirname(settings.file), { recursive: true });
  } catch {
    // appendLine reports the failure per record
  }
  let fileBytes = currentFileBytes(settings.file);
  let warnedAboutCap = false;

  logger.attachTransport((logObj) => {
    const payload = `${JSON.stringify({ ...logObj, time: new Date().toISOString() })}\n`;
    const payloadBytes = Buffer.byteLength(payload, "utf8");
    if (fileBytes + payloadBytes > settings.maxFileBytes) {
      if (!warnedAboutCap) {
        warnedAboutCap = true;
        const notice = `log file size cap reached; suppressing writes file=${settings.file} maxFileBytes=${settings.maxFileBytes}`;
        appendLine(
          settings.file,
          `${JSON.stringify({ time: new Date().toISOString(), level: "warn", subsystem: "logging", message: notice })}\n`,
        );
        process.stderr.write(`[gridcheck] ${notice}\n`);
      }
      return;
    }
    if (appendLine(settings.file, payload)) {
      fileBytes += payloadBytes;
    }
  });
  return logger;
}

export function getLogger(): TsLogger<LogObj> {
  const settings = resolveSettings();
  if (!loggingState.cachedLogger || settingsChanged(loggingState.cachedSettings, settings)) {
    loggingState.cachedLogger = buildLogger(settings);
    loggingState.cachedSettings = settings;
  }
  return loggingState.cachedLogger;
}

export function isFileLogLevelEnabled(level: EmittingLogLevel): boolean {
  const settings = loggingState.cachedSettings ?? resolveSettings();
  return isLevelEnabled(level, settings.level);
}

export function getResolvedLoggerSettings(): ResolvedLoggerSettings {
  return resolveSettings();
}

/** Applies the `logging` section of the loaded config (and CLI flags) to the process logger. */
export function configureLogging(settings: LoggerSettings | undefined): void {
  loggingState.configuredSettings = settings ?? null;
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null): void {
  loggingState.overrideSettings = settings;
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
}

export function resetLogger(): void {
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
  loggingState.configuredSettings = null;
  loggingState.overrideSettings = null;
}
