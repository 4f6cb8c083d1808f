export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

export type EmittingLogLevel = Exclude<LogLevel, "silent">;

export function tryParseLogLevel(level?: string): LogLevel | undefined {
  if (typeof level !== "string") {
    return undefined;
  }
  const candidate = level.trim().toLowerCase();
  return ALLOWED_LOG_LEVELS.find((allowed) => allowed === candidate);
}

export function normalizeLogLevel(level?: string, fallback: LogLevel = "info"): LogLevel {
  return tryParseLogLevel(level) ?? fallback;
}

// tslog level ids: trace=1, debug=2, info=3, warn=4, error=5, fatal=6.
// Records below minLevel are dropped, so "silent" maps past fatal.
const TSLOG_LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
  silent: Number.POSITIVE_INFINITY,
};

export function levelToMinLevel(level: LogLevel): number {
  return TSLOG_LEVEL_IDS[level];
}

export function isLevelEnabled(level: EmittingLogLevel, threshold: LogLevel): boolean {
  return levelToMinLevel(level) >= levelToMinLevel(threshold);
}
