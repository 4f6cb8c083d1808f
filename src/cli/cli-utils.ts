import { createSubsystemLogger } from "../logging/subsystem.js";
import type { RuntimeEnv } from "../runtime.js";
import { danger } from "../terminal/theme.js";

const log = createSubsystemLogger("cli");

export function formatCliError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Runs a command action, turning a thrown error into a red stderr line and exit code 1. */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void> | void,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    log.error("command failed", {
      error: formatCliError(err),
      name: err instanceof Error ? err.name : undefined,
    });
    runtime.error(danger(formatCliError(err)));
    runtime.exit(1);
  }
}
