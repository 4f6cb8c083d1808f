import type { Command } from "commander";
import { theme } from "../../terminal/theme.js";
import { formatHelpExamples } from "../help-format.js";
import { CLI_LOG_LEVEL_VALUES, parseCliLogLevelOption } from "../log-level-option.js";
import type { ProgramContext } from "./context.js";

export const CLI_NAME = "gridcheck";

const EXAMPLES = [
  ["gridcheck ipv4 192.168.0.1 10.0.0.256", "Check two IPv4 candidates."],
  ["gridcheck sudoku board.txt --json", "Inspect a board file and print the result as JSON."],
  ["cat board.txt | gridcheck sudoku -", "Read a board from stdin."],
] as const;

export function configureProgramHelp(program: Command, ctx: ProgramContext) {
  program
    .name(CLI_NAME)
    .description("Validate IPv4 addresses and Sudoku boards")
    .version(ctx.programVersion, "-V, --version", "Output the version number")
    .option(
      "--log-level <level>",
      `Log level for this run (${CLI_LOG_LEVEL_VALUES})`,
      parseCliLogLevelOption,
    )
    .option("--json", "Print results as JSON")
    .option("--config <path>", "Read config from this file instead of ~/.gridcheck/gridcheck.json5")
    .option("--no-color", "Disable ANSI colors");

  program.helpOption("-h, --help", "Display help for command");
  program.helpCommand("help [command]", "Display help for command");
  program.showHelpAfterError();

  program.configureHelp({
    sortSubcommands: true,
    sortOptions: true,
  });

  const formatHelpOutput = (str: string) =>
    str
      .replace(/^Usage:/gm, theme.heading("Usage:"))
      .replace(/^Options:/gm, theme.heading("Options:"))
      .replace(/^Arguments:/gm, theme.heading("Arguments:"))
      .replace(/^Commands:/gm, theme.heading("Commands:"));

  program.configureOutput({
    writeOut: (str) => {
      ctx.runtime.log(formatHelpOutput(str).replace(/\n$/, ""));
    },
    writeErr: (str) => {
      ctx.runtime.error(formatHelpOutput(str).replace(/\n$/, ""));
    },
    outputError: (str, write) => write(theme.error(str)),
  });

  program.addHelpText("afterAll", ({ command }) => {
    if (command !== program) {
      return "";
    }
    return `\n${theme.heading("Examples:")}\n${formatHelpExamples(EXAMPLES)}\n`;
  });
}
