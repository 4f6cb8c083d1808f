import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { runCommandWithRuntime } from "./cli-utils.js";
import { buildProgram } from "./program/build-program.js";

export type RunCliOptions = {
  runtime?: RuntimeEnv;
  env?: NodeJS.ProcessEnv;
};

/** Parses `argv` (node-style, with the executable and script first) and runs the chosen command. */
export async function runCli(argv: string[] = process.argv, opts: RunCliOptions = {}) {
  const runtime = opts.runtime ?? defaultRuntime;
  const program = buildProgram({ runtime, env: opts.env });
  await runCommandWithRuntime(runtime, async () => {
    await program.parseAsync(argv);
  });
}
