import { InvalidArgumentError } from "commander";
import { ALLOWED_LOG_LEVELS, type LogLevel, tryParseLogLevel } from "../logging/levels.js";

export const CLI_LOG_LEVEL_VALUES = ALLOWED_LOG_LEVELS.join("|");

/** commander argParser for `--log-level`. */
export function parseCliLogLevelOption(value: string): LogLevel {
  const level = tryParseLogLevel(value);
  if (level === undefined) {
    throw new InvalidArgumentError(`Invalid --log-level (use ${CLI_LOG_LEVEL_VALUES})`);
  }
  return level;
}
