import type { GridcheckConfig } from "../../config/types.js";
import { defaultRuntime, type RuntimeEnv } from "../../runtime.js";
import { VERSION } from "../../version.js";

export type ProgramContext = {
  programVersion: string;
  runtime: RuntimeEnv;
  env: NodeJS.ProcessEnv;
  /** Filled in by the preAction hook once the config file has been read. */
  config: GridcheckConfig;
};

export type ProgramContextOptions = {
  runtime?: RuntimeEnv;
  env?: NodeJS.ProcessEnv;
};

export function createProgramContext(opts: ProgramContextOptions = {}): ProgramContext {
  return {
    programVersion: VERSION,
    runtime: opts.runtime ?? defaultRuntime,
    env: opts.env ?? process.env,
    config: {},
  };
}
