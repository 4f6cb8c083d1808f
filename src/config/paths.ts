import os from "node:os";
import path from "node:path";

export const CONFIG_PATH_ENV = "GRIDCHECK_CONFIG_PATH";
export const CONFIG_DIR_NAME = ".gridcheck";
export const CONFIG_FILE_NAME = "gridcheck.json5";

function expandHome(input: string, homedir: () => string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(homedir(), input.slice(2));
  }
  return input;
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(homedir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}
