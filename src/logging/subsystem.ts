import type { EmittingLogLevel } from "./levels.js";
import { getLogger, isFileLogLevelEnabled } from "./logger.js";

export type SubsystemLogger = {
  subsystem: string;
  isEnabled: (level: EmittingLogLevel) => boolean;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  fatal: (message: string, meta?: Record<string, unknown>) => void;
  child: (name: string) => SubsystemLogger;
};

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: EmittingLogLevel, message: string, meta?: Record<string, unknown>) => {
    // The process logger is resolved per record so config applied later still wins.
    const logger = getLogger();
    if (!isFileLogLevelEnabled(level)) {
      return;
    }
    try {
      const sub = logger.getSubLogger({ name: subsystem });
      const record = { subsystem, message, ...meta };
      sub[level](record);
    } catch {
      // logging never fails the caller
    }
  };
  return {
    subsystem,
    isEnabled: (level) => {
      getLogger();
      return isFileLogLevelEnabled(level);
    },
    trace: (message, meta) => emit("trace", message, meta),
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    fatal: (message, meta) => emit("fatal", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
