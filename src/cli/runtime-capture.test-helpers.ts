import { vi } from "vitest";
import type { RuntimeEnv } from "../runtime.js";

export type CliRuntimeCapture = {
  runtime: RuntimeEnv;
  runtimeLogs: string[];
  runtimeErrors: string[];
  exitCodes: () => number[];
  resetRuntimeCapture: () => void;
};

/** A RuntimeEnv whose exit only records the code, so a test can inspect output after it. */
export function createCliRuntimeCapture(): CliRuntimeCapture {
  const runtimeLogs: string[] = [];
  const runtimeErrors: string[] = [];
  const stringifyArgs = (args: unknown[]) => args.map((value) => String(value)).join(" ");
  const exit = vi.fn<(code: number) => never>();
  return {
    runtime: {
      log: (...args: unknown[]) => {
        runtimeLogs.push(stringifyArgs(args));
      },
      error: (...args: unknown[]) => {
        runtimeErrors.push(stringifyArgs(args));
      },
      exit,
    },
    runtimeLogs,
    runtimeErrors,
    exitCodes: () => exit.mock.calls.map(([code]) => code),
    resetRuntimeCapture: () => {
      runtimeLogs.length = 0;
      runtimeErrors.length = 0;
      exit.mockClear();
    },
  };
}
