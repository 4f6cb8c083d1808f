import path from "node:path";
import { fileURLToPath } from "node:url";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createCliRuntimeCapture } from "../cli/runtime-capture.test-helpers.js";
import { BoardReadError, type SudokuCommandDeps, checkSudokuText, sudokuCommand } from "./sudoku.js";

const FIXTURES = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../test/fixtures");
const fixture = (name: string) => path.join(FIXTURES, name);

const capture = createCliRuntimeCapture();

describe("checkSudokuText", () => {
  it("reports size and filled count, or the violation", () => {
    expect(checkSudokuText("inline", "1-\n--\n")).toEqual({
      file: "inline",
      valid: false,
      violation: { kind: "not-perfect-square", size: 2 },
      explanation: "board size 2 is not a perfect square",
    });
    expect(checkSudokuText("inline", "1 - - 4\n- - - -\n- - - -\n4 - - 1\n")).toEqual({
      file: "inline",
      valid: true,
      size: 4,
      filled: 4,
    });
  });

  it("treats text without rows as an empty board", () => {
    expect(checkSudokuText("blank", "\n# nothing here\n")).toMatchObject({
      valid: false,
      explanation: "board has no rows",
    });
  });
});

describe("sudokuCommand", () => {
  beforeEach(() => {
    capture.resetRuntimeCapture();
  });

  it("checks board files and prints a line per file", async () => {
    const valid = fixture("valid-9x9.txt");
    const spaced = fixture("spaced-4x4.txt");
    await sudokuCommand({ files: [valid, spaced] }, {}, capture.runtime);
    expect(capture.runtimeLogs).toEqual([
      `valid   ${valid} (9x9, 54 filled)`,
      `valid   ${spaced} (4x4, 8 filled)`,
    ]);
    expect(capture.exitCodes()).toEqual([]);
  });

  it("explains the first violation and exits 1", async () => {
    const duplicate = fixture("column-duplicate-9x9.txt");
    const ragged = fixture("ragged-4x4.txt");
    await sudokuCommand({ files: [duplicate, ragged] }, {}, capture.runtime);
    expect(capture.runtimeLogs).toEqual([
      `invalid ${duplicate}: cell r5c1 repeats 8 in column 1`,
      `invalid ${ragged}: row 3 has 3 cells, expected 4`,
    ]);
    expect(capture.exitCodes()).toEqual([1]);
  });

  it("prints JSON results with the structured violation", async () => {
    const duplicate = fixture("column-duplicate-9x9.txt");
    await sudokuCommand({ files: [duplicate], json: true }, {}, capture.runtime);
    expect(JSON.parse(capture.runtimeLogs[0] ?? "null")).toEqual([
      {
        file: duplicate,
        valid: false,
        violation: {
          kind: "duplicate",
          row: 4,
          col: 0,
          symbol: "8",
          value: 8,
          unit: "column",
          unitIndex: 0,
        },
      },
    ]);
  });

  it("reads '-' from stdin", async () => {
    const deps: SudokuCommandDeps = {
      readFile: vi.fn(async () => ""),
      readStdin: vi.fn(async () => "12\n21\n"),
    };
    await sudokuCommand({ files: ["-"], json: true }, {}, capture.runtime, deps);
    expect(deps.readStdin).toHaveBeenCalledTimes(1);
    expect(deps.readFile).not.toHaveBeenCalled();
    expect(JSON.parse(capture.runtimeLogs[0] ?? "null")).toEqual([
      { file: "-", valid: false, violation: { kind: "not-perfect-square", size: 2 } },
    ]);
  });

  it("fails with BoardReadError when a file cannot be read", async () => {
    const missing = fixture("does-not-exist.txt");
    const run = sudokuCommand({ files: [missing] }, {}, capture.runtime);
    await expect(run).rejects.toBeInstanceOf(BoardReadError);
    await expect(run).rejects.toMatchObject({ name: "BoardReadError", file: missing });
    expect(capture.runtimeLogs).toEqual([]);
  });

  it("stays quiet with --quiet", async () => {
    await sudokuCommand({ files: [fixture("ragged-4x4.txt")], quiet: true }, {}, capture.runtime);
    expect(capture.runtimeLogs).toEqual([]);
    expect(capture.exitCodes()).toEqual([1]);
  });
});
