import type { Command } from "commander";
import { STDIN_PATH, sudokuCommand } from "../../commands/sudoku.js";
import { theme } from "../../terminal/theme.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { formatHelpExamples } from "../help-format.js";
import type { ProgramContext } from "./context.js";
import type { GlobalOptions } from "./preaction.js";

type SudokuOptions = GlobalOptions & { quiet?: boolean };

export function registerSudokuCommand(program: Command, ctx: ProgramContext) {
  program
    .command("sudoku")
    .description("Check whether each board file holds a consistent N x N Sudoku grid")
    .argument("<file...>", `Board files to check (${STDIN_PATH} reads stdin)`)
    .option("-q, --quiet", "Print nothing; only set the exit code", false)
    .addHelpText(
      "after",
      () =>
        `\n${theme.heading("Board format:")}\n` +
        `  One row per line. Cells are 1-9 then A-Z, '-' marks an empty cell.\n` +
        `  Cells may be written together ("12-4") or separated by spaces ("1 2 - 4").\n` +
        `  Blank lines and lines starting with # are ignored.\n` +
        `\n${theme.heading("Examples:")}\n${formatHelpExamples([
          ["gridcheck sudoku puzzle.txt", "Check one board."],
          ["gridcheck sudoku a.txt b.txt --json", "Check several boards, print JSON."],
        ])}\n`,
    )
    .action(async (files: string[], _opts: unknown, command: Command) => {
      const opts = command.optsWithGlobals<SudokuOptions>();
      await runCommandWithRuntime(ctx.runtime, async () => {
        await sudokuCommand(
          { files, json: Boolean(opts.json), quiet: Boolean(opts.quiet) },
          ctx.config,
          ctx.runtime,
        );
      });
    });
}
