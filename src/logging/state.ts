import type { Logger } from "tslog";
import type { LogLevel } from "./levels.js";

export type LoggerSettings = {
  level?: LogLevel;
  file?: string;
  maxFileBytes?: number;
};

export type ResolvedLoggerSettings = {
  level: LogLevel;
  file: string;
  maxFileBytes: number;
};

export type LogObj = Record<string, unknown>;

export const loggingState = {
  cachedLogger: null as Logger<LogObj> | null,
  cachedSettings: null as ResolvedLoggerSettings | null,
  configuredSettings: null as LoggerSettings | null,
  overrideSettings: null as LoggerSettings | null,
  invalidEnvLogLevelValue: null as string | null,
};
