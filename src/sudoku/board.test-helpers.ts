import { EMPTY_CELL, encodeValue } from "./symbols.js";

export function emptyBoard(size: number): string[][] {
  return Array.from({ length: size }, () => Array.from({ length: size }, () => EMPTY_CELL));
}

/** A completely filled, conflict-free board of size boxSize². */
export function solvedBoard(boxSize: number): string[][] {
  const size = boxSize * boxSize;
  return Array.from({ length: size }, (_, r) =>
    Array.from({ length: size }, (_, c) => {
      const value = ((boxSize * (r % boxSize) + Math.floor(r / boxSize) + c) % size) + 1;
      return encodeValue(value) ?? EMPTY_CELL;
    }),
  );
}

export function withCells(
  board: ReadonlyArray<ReadonlyArray<string>>,
  cells: Array<[row: number, col: number, symbol: string]>,
): string[][] {
  const next = board.map((row) => [...row]);
  for (const [row, col, symbol] of cells) {
    const target = next[row];
    if (!target) {
      throw new Error(`row ${row} is outside the board`);
    }
    target[col] = symbol;
  }
  return next;
}
