import type { Command } from "commander";
import { ConfigValidationError, createConfigIO } from "../../config/io.js";
import type { LogLevel } from "../../logging/levels.js";
import { configureLogging } from "../../logging/logger.js";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { setColorEnabled } from "../../terminal/theme.js";
import type { ProgramContext } from "./context.js";

const log = createSubsystemLogger("cli");

export type GlobalOptions = {
  logLevel?: LogLevel;
  color?: boolean;
  json?: boolean;
  config?: string;
};

function commandPath(command: Command): string {
  const names: string[] = [];
  let current: Command | null = command;
  while (current?.parent) {
    names.unshift(current.name());
    current = current.parent;
  }
  return names.join(" ");
}

export function registerPreActionHooks(program: Command, ctx: ProgramContext) {
  program.hook("preAction", (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const snapshot = createConfigIO({ env: ctx.env, configPath: opts.config }).readConfigFileSnapshot();
    if (!snapshot.valid) {
      throw new ConfigValidationError(snapshot.path, snapshot.issues);
    }
    ctx.config = snapshot.config;
    configureLogging({
      ...snapshot.config.logging,
      ...(opts.logLevel ? { level: opts.logLevel } : {}),
    });
    setColorEnabled(opts.color !== false && snapshot.config.output?.color !== false);
    log.debug("running command", {
      command: commandPath(actionCommand),
      configPath: snapshot.path,
      configFound: snapshot.exists,
    });
  });
}
