export { formatIPv4Issue, inspectIPv4, isValidIPv4 } from "./shared/net/ipv4.js";
export type { IPv4Inspection, IPv4Octets, IPv4SegmentIssue } from "./shared/net/ipv4.js";
export { parseSudokuText } from "./sudoku/parse.js";
export { EMPTY_CELL, MAX_SYMBOL_VALUE, decodeSymbol, encodeValue } from "./sudoku/symbols.js";
export type {
  SudokuGrid,
  SudokuInspection,
  SudokuUnit,
  SudokuViolation,
} from "./sudoku/types.js";
export { formatSudokuViolation, inspectSudoku, isValidSudoku } from "./sudoku/validate.js";
export {
  ConfigValidationError,
  createConfigIO,
  loadConfig,
  readConfigFileSnapshot,
} from "./config/io.js";
export type { GridcheckConfig } from "./config/types.js";
export { runCli } from "./cli/run-main.js";
