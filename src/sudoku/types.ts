/** Rows of single-character symbols; `-` marks an empty cell. */
export type SudokuGrid = ReadonlyArray<ReadonlyArray<string>>;

export type SudokuUnit = "row" | "column" | "box";

export type SudokuViolation =
  | { kind: "empty-board" }
  | { kind: "ragged-row"; row: number; length: number; expected: number }
  | { kind: "not-perfect-square"; size: number }
  | { kind: "too-large"; size: number; maxSize: number }
  | { kind: "invalid-symbol"; row: number; col: number; symbol: string }
  | { kind: "out-of-range"; row: number; col: number; symbol: string; value: number; size: number }
  | {
      kind: "duplicate";
      row: number;
      col: number;
      symbol: string;
      value: number;
      unit: SudokuUnit;
      unitIndex: number;
    };

export type SudokuInspection =
  | { ok: true; size: number; boxSize: number; filled: number }
  | { ok: false; violation: SudokuViolation };
