export const EMPTY_CELL = "-";

// Digits cover 0-9 and uppercase letters 10-35.
export const MAX_SYMBOL_VALUE = 35;

const CODE_0 = 48;
const CODE_9 = 57;
const CODE_A = 65;
const CODE_Z = 90;

export function decodeSymbol(symbol: string): number | undefined {
  if (typeof symbol !== "string" || symbol.length !== 1) {
    return undefined;
  }
  const code = symbol.charCodeAt(0);
  if (code >= CODE_0 && code <= CODE_9) {
    return code - CODE_0;
  }
  if (code >= CODE_A && code <= CODE_Z) {
    return 10 + (code - CODE_A);
  }
  return undefined;
}

export function encodeValue(value: number): string | undefined {
  if (!Number.isInteger(value) || value < 0 || value > MAX_SYMBOL_VALUE) {
    return undefined;
  }
  return value < 10
    ? String.fromCharCode(CODE_0 + value)
    : String.fromCharCode(CODE_A + value - 10);
}
