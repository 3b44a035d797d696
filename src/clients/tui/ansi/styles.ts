/**
 * ANSI Styles
 *
 * SGR attribute sequences and the minimal transition between two cells.
 */

import type { Cell } from '../types.ts';
import { bgColor, fgColor } from './colors.ts';

const CSI = '\x1b[';

export const bold = (): string => `${CSI}1m`;
export const dim = (): string => `${CSI}2m`;
// SGR 22 clears both bold and dim
export const boldDimOff = (): string => `${CSI}22m`;
export const italic = (): string => `${CSI}3m`;
export const italicOff = (): string => `${CSI}23m`;
export const underline = (): string => `${CSI}4m`;
export const underlineOff = (): string => `${CSI}24m`;

/**
 * Escape sequence that turns the style of `prev` into the style of `next`.
 * With no previous cell, every attribute is written out.
 */
export function transitionStyle(prev: Cell | null, next: Cell): string {
  const parts: string[] = [];

  if (!prev || prev.fg !== next.fg) {
    parts.push(fgColor(next.fg));
  }
  if (!prev || prev.bg !== next.bg) {
    parts.push(bgColor(next.bg));
  }

  const prevBold = prev?.bold ?? false;
  const prevDim = prev?.dim ?? false;
  const nextBold = next.bold ?? false;
  const nextDim = next.dim ?? false;
  if (!prev || prevBold !== nextBold || prevDim !== nextDim) {
    if ((prevBold && !nextBold) || (prevDim && !nextDim) || !prev) {
      parts.push(boldDimOff());
    }
    if (nextBold) parts.push(bold());
    if (nextDim) parts.push(dim());
  }

  const nextItalic = next.italic ?? false;
  if (!prev || (prev.italic ?? false) !== nextItalic) {
    parts.push(nextItalic ? italic() : italicOff());
  }

  const nextUnderline = next.underline ?? false;
  if (!prev || (prev.underline ?? false) !== nextUnderline) {
    parts.push(nextUnderline ? underline() : underlineOff());
  }

  return parts.join('');
}
