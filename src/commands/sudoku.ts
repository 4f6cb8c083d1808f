import fs from "node:fs/promises";
import type { GridcheckConfig } from "../config/types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { RuntimeEnv } from "../runtime.js";
import { parseSudokuText } from "../sudoku/parse.js";
import type { SudokuViolation } from "../sudoku/types.js";
import { formatSudokuViolation, inspectSudoku } from "../sudoku/validate.js";
import { theme } from "../terminal/theme.js";
import { type OutputOptions, padStatus, resolveOutputFormat } from "./output.js";

const log = createSubsystemLogger("sudoku");

export const STDIN_PATH = "-";

export class BoardReadError extends Error {
  constructor(
    public readonly file: string,
    public readonly cause?: Error,
  ) {
    super(`Cannot read board ${file}${cause ? `: ${cause.message}` : ""}`);
    this.name = "BoardReadError";
  }
}

export type SudokuCommandOptions = OutputOptions & {
  files: string[];
};

export type SudokuCommandDeps = {
  readFile: (file: string) => Promise<string>;
  readStdin: () => Promise<string>;
};

export type SudokuCheckResult =
  | { file: string; valid: true; size: number; filled: number }
  | { file: string; valid: false; violation: SudokuViolation; explanation: string };

async function readStdinText(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

const defaultDeps: SudokuCommandDeps = {
  readFile: (file) => fs.readFile(file, "utf8"),
  readStdin: readStdinText,
};

async function readBoardText(file: string, deps: SudokuCommandDeps): Promise<string> {
  try {
    return file === STDIN_PATH ? await deps.readStdin() : await deps.readFile(file);
  } catch (err) {
    throw new BoardReadError(file, err instanceof Error ? err : undefined);
  }
}

export function checkSudokuText(file: string, text: string): SudokuCheckResult {
  const inspection = inspectSudoku(parseSudokuText(text));
  if (inspection.ok) {
    return { file, valid: true, size: inspection.size, filled: inspection.filled };
  }
  return {
    file,
    valid: false,
    violation: inspection.violation,
    explanation: formatSudokuViolation(inspection.violation),
  };
}

function formatTextResult(result: SudokuCheckResult): string {
  if (result.valid) {
    return `${theme.success(padStatus(true))} ${result.file} ${theme.muted(
      `(${result.size}x${result.size}, ${result.filled} filled)`,
    )}`;
  }
  return `${theme.error(padStatus(false))} ${result.file}: ${theme.muted(result.explanation)}`;
}

function toJsonResult(result: SudokuCheckResult) {
  return result.valid
    ? { file: result.file, valid: true, size: result.size, filled: result.filled }
    : { file: result.file, valid: false, violation: result.violation };
}

export async function sudokuCommand(
  opts: SudokuCommandOptions,
  config: GridcheckConfig,
  runtime: RuntimeEnv,
  deps: SudokuCommandDeps = defaultDeps,
): Promise<void> {
  const results: SudokuCheckResult[] = [];
  for (const file of opts.files) {
    const text = await readBoardText(file, deps);
    const result = checkSudokuText(file, text);
    if (result.valid) {
      log.debug("board valid", { file, size: result.size, filled: result.filled });
    } else {
      log.debug("board invalid", { file, violation: result.violation.kind });
    }
    results.push(result);
  }
  const invalidCount = results.filter((result) => !result.valid).length;
  log.info("checked sudoku boards", { total: results.length, invalid: invalidCount });

  if (!opts.quiet) {
    if (resolveOutputFormat(opts, config) === "json") {
      runtime.log(JSON.stringify(results.map(toJsonResult), null, 2));
    } else {
      for (const result of results) {
        runtime.log(formatTextResult(result));
      }
    }
  }
  if (invalidCount > 0) {
    runtime.exit(1);
  }
}
