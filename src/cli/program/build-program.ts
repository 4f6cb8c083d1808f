import { Command } from "commander";
import { registerProgramCommands } from "./command-registry.js";
import { type ProgramContextOptions, createProgramContext } from "./context.js";
import { configureProgramHelp } from "./help.js";
import { registerPreActionHooks } from "./preaction.js";

export function buildProgram(opts: ProgramContextOptions = {}): Command {
  const program = new Command();
  const ctx = createProgramContext(opts);

  configureProgramHelp(program, ctx);
  registerPreActionHooks(program, ctx);
  registerProgramCommands(program, ctx);

  return program;
}
