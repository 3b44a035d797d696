/**
 * Terminal Control Sequences
 */

export const ESC = '\x1b';
export const CSI = `${ESC}[`;

export const cursorHide = (): string => `${CSI}?25l`;
export const cursorShow = (): string => `${CSI}?25h`;
export const cursorHome = (): string => `${CSI}H`;

/**
 * Move the cursor to a 0-indexed row and column.
 */
export function cursorToZero(row: number, col: number): string {
  return `${CSI}${row + 1};${col + 1}H`;
}

export const clearScreen = (): string => `${CSI}2J`;

export const alternateScreenOn = (): string => `${CSI}?1049h`;
export const alternateScreenOff = (): string => `${CSI}?1049l`;

// Button, drag and motion tracking with SGR coordinates
export const mouseFullOn = (): string => `${CSI}?1003h${CSI}?1006h`;
export const mouseFullOff = (): string => `${CSI}?1006l${CSI}?1003l`;
