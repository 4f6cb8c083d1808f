import type { Command } from "commander";
import { ipv4Command } from "../../commands/ipv4.js";
import { theme } from "../../terminal/theme.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { formatHelpExamples } from "../help-format.js";
import type { ProgramContext } from "./context.js";
import type { GlobalOptions } from "./preaction.js";

type Ipv4Options = GlobalOptions & { quiet?: boolean };

export function registerIpv4Command(program: Command, ctx: ProgramContext) {
  program
    .command("ipv4")
    .description("Check whether each candidate is a dotted-decimal IPv4 address")
    .argument("<candidate...>", "Addresses to check")
    .option("-q, --quiet", "Print nothing; only set the exit code", false)
    .addHelpText(
      "after",
      () =>
        `\n${theme.heading("Examples:")}\n${formatHelpExamples([
          ["gridcheck ipv4 172.16.4.20", "Prints valid and exits 0."],
          ["gridcheck ipv4 10.01.0.1", "Explains the leading zero and exits 1."],
          ["gridcheck ipv4 --json 1.2.3.4 1.2.3", "Machine-readable output."],
        ])}\n`,
    )
    .action(async (candidates: string[], _opts: unknown, command: Command) => {
      const opts = command.optsWithGlobals<Ipv4Options>();
      await runCommandWithRuntime(ctx.runtime, () => {
        ipv4Command(
          { candidates, json: Boolean(opts.json), quiet: Boolean(opts.quiet) },
          ctx.config,
          ctx.runtime,
        );
      });
    });
}
