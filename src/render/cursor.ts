const CSI = "\x1b[";

/**
 * Absolute cursor move, zero-based column and row
 */
export function moveTo(col: number, row: number): string {
  return `${CSI}${row + 1};${col + 1}H`;
}
