import { EMPTY_CELL, MAX_SYMBOL_VALUE, decodeSymbol } from "./symbols.js";
import type { SudokuGrid, SudokuInspection, SudokuUnit, SudokuViolation } from "./types.js";

function perfectSquareRoot(size: number): number | undefined {
  const root = Math.round(Math.sqrt(size));
  return root * root === size ? root : undefined;
}

function checkShape(
  board: SudokuGrid,
): { size: number; boxSize: number } | { violation: SudokuViolation } {
  const size = board.length;
  if (size === 0) {
    return { violation: { kind: "empty-board" } };
  }
  for (const [row, cells] of board.entries()) {
    if (cells.length !== size) {
      return { violation: { kind: "ragged-row", row, length: cells.length, expected: size } };
    }
  }
  const boxSize = perfectSquareRoot(size);
  if (boxSize === undefined) {
    return { violation: { kind: "not-perfect-square", size } };
  }
  if (size > MAX_SYMBOL_VALUE) {
    return { violation: { kind: "too-large", size, maxSize: MAX_SYMBOL_VALUE } };
  }
  return { size, boxSize };
}

/**
 * Validates a partially or fully filled board in one row-major pass.
 *
 * Seen values are tracked as one bitmask per row, column and box (bit `v` set
 * once value `v` has been placed in that unit). The first violation ends the
 * scan; the board itself is never written to.
 */
export function inspectSudoku(board: SudokuGrid): SudokuInspection {
  const shape = checkShape(board);
  if ("violation" in shape) {
    return { ok: false, violation: shape.violation };
  }
  const { size, boxSize } = shape;
  const seen: Record<SudokuUnit, Uint32Array> = {
    row: new Uint32Array(size),
    column: new Uint32Array(size),
    box: new Uint32Array(size),
  };
  let filled = 0;

  for (const [row, cells] of board.entries()) {
    for (const [col, symbol] of cells.entries()) {
      if (symbol === EMPTY_CELL) {
        continue;
      }
      const value = decodeSymbol(symbol);
      if (value === undefined) {
        return { ok: false, violation: { kind: "invalid-symbol", row, col, symbol } };
      }
      if (value < 1 || value > size) {
        return {
          ok: false,
          violation: { kind: "out-of-range", row, col, symbol, value, size },
        };
      }
      const box = Math.floor(row / boxSize) * boxSize + Math.floor(col / boxSize);
      const bit = 1 << value;
      const units: Array<[SudokuUnit, number]> = [
        ["row", row],
        ["column", col],
        ["box", box],
      ];
      for (const [unit, unitIndex] of units) {
        const mask = seen[unit][unitIndex] ?? 0;
        if ((mask & bit) !== 0) {
          return {
            ok: false,
            violation: { kind: "duplicate", row, col, symbol, value, unit, unitIndex },
          };
        }
      }
      for (const [unit, unitIndex] of units) {
        seen[unit][unitIndex] = (seen[unit][unitIndex] ?? 0) | bit;
      }
      filled++;
    }
  }

  return { ok: true, size, boxSize, filled };
}

export function isValidSudoku(board: SudokuGrid): boolean {
  return inspectSudoku(board).ok;
}

export function formatSudokuViolation(violation: SudokuViolation): string {
  switch (violation.kind) {
    case "empty-board":
      return "board has no rows";
    case "ragged-row":
      return `row ${violation.row + 1} has ${violation.length} cells, expected ${violation.expected}`;
    case "not-perfect-square":
      return `board size ${violation.size} is not a perfect square`;
    case "too-large":
      return `board size ${violation.size} exceeds the largest encodable value ${violation.maxSize}`;
    case "invalid-symbol":
      return `cell r${violation.row + 1}c${violation.col + 1} holds unknown symbol ${JSON.stringify(violation.symbol)}`;
    case "out-of-range":
      return `cell r${violation.row + 1}c${violation.col + 1} value ${violation.value} is outside 1-${violation.size}`;
    case "duplicate":
      return `cell r${violation.row + 1}c${violation.col + 1} repeats ${violation.symbol} in ${violation.unit} ${violation.unitIndex + 1}`;
  }
}
