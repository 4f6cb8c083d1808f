import type { Command } from "commander";
import type { ProgramContext } from "./context.js";
import { registerIpv4Command } from "./register.ipv4.js";
import { registerSudokuCommand } from "./register.sudoku.js";

export type CommandRegistration = {
  id: string;
  register: (program: Command, ctx: ProgramContext) => void;
};

export const commandRegistry: CommandRegistration[] = [
  { id: "ipv4", register: registerIpv4Command },
  { id: "sudoku", register: registerSudokuCommand },
];

export function registerProgramCommands(program: Command, ctx: ProgramContext) {
  for (const entry of commandRegistry) {
    entry.register(program, ctx);
  }
}
