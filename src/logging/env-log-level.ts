import { ALLOWED_LOG_LEVELS, type LogLevel, tryParseLogLevel } from "./levels.js";
import { loggingState } from "./state.js";

export const LOG_LEVEL_ENV = "GRIDCHECK_LOG_LEVEL";

export function resolveEnvLogLevelOverride(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const trimmed = env[LOG_LEVEL_ENV]?.trim() ?? "";
  if (!trimmed) {
    loggingState.invalidEnvLogLevelValue = null;
    return undefined;
  }
  const parsed = tryParseLogLevel(trimmed);
  if (parsed) {
    loggingState.invalidEnvLogLevelValue = null;
    return parsed;
  }
  // Warn once per distinct bad value.
  if (loggingState.invalidEnvLogLevelValue !== trimmed) {
    loggingState.invalidEnvLogLevelValue = trimmed;
    process.stderr.write(
      `[gridcheck] Ignoring invalid ${LOG_LEVEL_ENV}="${trimmed}" (allowed: ${ALLOWED_LOG_LEVELS.join("|")}).\n`,
    );
  }
  return undefined;
}
