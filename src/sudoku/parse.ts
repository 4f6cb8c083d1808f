import type { SudokuGrid } from "./types.js";

const COMMENT_PREFIX = "#";

/**
 * Turns board text into rows of symbols without judging them.
 *
 * Blank lines and `#` comment lines are skipped. A line with whitespace
 * between symbols is split into whitespace-separated tokens (one per cell);
 * any other line contributes one cell per character.
 */
export function parseSudokuText(text: string): SudokuGrid {
  const rows: string[][] = [];
  for (const rawLine of text.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith(COMMENT_PREFIX)) {
      continue;
    }
    rows.push(/\s/.test(trimmed) ? trimmed.split(/\s+/) : Array.from(trimmed));
  }
  return rows;
}
