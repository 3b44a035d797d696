/**
 * Character Width
 *
 * Terminal cell widths for Unicode text. Log lines are arbitrary bytes, so
 * everything drawn to the screen goes through these helpers first.
 */

type Range = readonly [number, number];

// Combining marks, joiners and variation selectors
const ZERO_WIDTH: readonly Range[] = [
  [0x0300, 0x036f],
  [0x0483, 0x0489],
  [0x0591, 0x05bd],
  [0x1ab0, 0x1aff],
  [0x1dc0, 0x1dff],
  [0x200b, 0x200f],
  [0x2028, 0x202f],
  [0x2060, 0x206f],
  [0x20d0, 0x20ff],
  [0xfe00, 0xfe0f],
  [0xfe20, 0xfe2f],
  [0xfeff, 0xfeff],
  [0xe0100, 0xe01ef],
];

// East Asian wide and emoji presentation
const WIDE: readonly Range[] = [
  [0x1100, 0x115f],
  [0x231a, 0x231b],
  [0x23e9, 0x23f3],
  [0x23f8, 0x23fa],
  [0x26aa, 0x26ab],
  [0x26bd, 0x26be],
  [0x2705, 0x2705],
  [0x274c, 0x274c],
  [0x2753, 0x2755],
  [0x2757, 0x2757],
  [0x2b1b, 0x2b1c],
  [0x2b50, 0x2b55],
  [0x2e80, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe1f],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f004, 0x1f0cf],
  [0x1f1e0, 0x1f1ff],
  [0x1f300, 0x1f9ff],
  [0x20000, 0x2ffff],
];

function inRanges(code: number, ranges: readonly Range[]): boolean {
  for (const [lo, hi] of ranges) {
    if (code < lo) return false;
    if (code <= hi) return true;
  }
  return false;
}

/**
 * Cells taken by one code point: 0, 1 or 2.
 */
export function getCharWidth(char: string): number {
  const code = char.codePointAt(0) ?? 0;

  if (code < 32 || code === 0x7f) return 0;
  if (code < 127) return 1;
  if (inRanges(code, ZERO_WIDTH)) return 0;
  if (inRanges(code, WIDE)) return 2;
  return 1;
}

export function getDisplayWidth(str: string): number {
  let width = 0;
  for (const char of str) {
    width += getCharWidth(char);
  }
  return width;
}

/**
 * Cut a string to at most `maxWidth` cells. A wide character that would
 * straddle the edge is dropped.
 */
export function clipToWidth(str: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  let width = 0;
  let result = '';
  for (const char of str) {
    const charWidth = getCharWidth(char);
    if (width + charWidth > maxWidth) break;
    result += char;
    width += charWidth;
  }
  return result;
}

/**
 * Clip or pad to exactly `width` cells.
 */
export function padToWidth(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  const clipped = clipToWidth(str, width);
  const padding = ' '.repeat(Math.max(0, width - getDisplayWidth(clipped)));
  return align === 'right' ? padding + clipped : clipped + padding;
}

/**
 * Make raw line text safe to draw: tabs become a space, other control
 * characters are removed.
 */
export function toDisplayText(str: string): string {
  return str.replace(/\t/g, ' ').replace(/[\u0000-\u001f\u007f]/g, '');
}
