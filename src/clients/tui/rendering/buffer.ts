/**
 * Screen Buffer
 *
 * Cell grid that elements draw into. Tracks which cells changed since the
 * last flush so the renderer only writes those.
 */

import {
  type Cell,
  type Rect,
  type Size,
  createEmptyCell,
  cellsEqual,
  cloneCell,
} from '../types.ts';
import { getCharWidth } from '../../../core/char-width.ts';

export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  dim?: boolean;
}

export type BoxStyle = 'single' | 'rounded';

// ============================================
// ScreenBuffer Class
// ============================================

export class ScreenBuffer {
  private width: number;
  private height: number;
  // Row-major, index = y * width + x
  private cells: Cell[] = [];
  private dirty: boolean[] = [];

  constructor(size: Size) {
    this.width = Math.max(0, size.width);
    this.height = Math.max(0, size.height);
    this.allocate();
  }

  private allocate(): void {
    const count = this.width * this.height;
    this.cells = Array.from({ length: count }, () => createEmptyCell());
    this.dirty = new Array<boolean>(count).fill(true);
  }

  private inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size Management
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { width: this.width, height: this.height };
  }

  /**
   * Resize the buffer. Contents are cleared and everything is dirty.
   */
  resize(size: Size): void {
    this.width = Math.max(0, size.width);
    this.height = Math.max(0, size.height);
    this.allocate();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cell Access
  // ─────────────────────────────────────────────────────────────────────────

  get(x: number, y: number): Cell | null {
    if (!this.inBounds(x, y)) return null;
    return this.cells[y * this.width + x] ?? null;
  }

  /**
   * Set a cell. Out of bounds writes are ignored.
   */
  set(x: number, y: number, cell: Cell): void {
    if (!this.inBounds(x, y)) return;

    const index = y * this.width + x;
    const existing = this.cells[index];
    if (existing === undefined || !cellsEqual(existing, cell)) {
      this.cells[index] = cloneCell(cell);
      this.dirty[index] = true;
    }
  }

  /**
   * Text of one row, wide-character placeholders skipped.
   */
  getRowText(y: number): string {
    if (y < 0 || y >= this.height) return '';
    let text = '';
    for (let x = 0; x < this.width; x++) {
      text += this.cells[y * this.width + x]?.char ?? '';
    }
    return text;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Drawing
  // ─────────────────────────────────────────────────────────────────────────

  clear(bg = 'default', fg = 'default'): void {
    this.fillRect({ x: 0, y: 0, width: this.width, height: this.height }, createEmptyCell(bg, fg));
  }

  /**
   * Write a string starting at a position, returning the columns used.
   * Wide characters take two cells; the second holds an empty placeholder.
   */
  writeString(x: number, y: number, text: string, fg: string, bg: string, style: TextStyle = {}): number {
    if (y < 0 || y >= this.height) return 0;

    let px = x;
    for (const char of text) {
      if (px >= this.width) break;

      const charWidth = getCharWidth(char);
      if (charWidth === 0) continue;
      if (charWidth === 2 && px + 1 >= this.width) break;

      this.set(px, y, { char, fg, bg, ...style });
      if (charWidth === 2) {
        this.set(px + 1, y, { char: '', fg, bg, ...style });
      }
      px += charWidth;
    }
    return px - x;
  }

  fillRect(rect: Rect, cell: Cell): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.set(x, y, cell);
      }
    }
  }

  drawBox(rect: Rect, fg: string, bg: string, style: BoxStyle = 'single'): void {
    const chars = BOX_CHARS[style];
    const { x, y, width, height } = rect;
    if (width < 2 || height < 2) return;

    const right = x + width - 1;
    const bottom = y + height - 1;

    this.set(x, y, { char: chars.topLeft, fg, bg });
    this.set(right, y, { char: chars.topRight, fg, bg });
    this.set(x, bottom, { char: chars.bottomLeft, fg, bg });
    this.set(right, bottom, { char: chars.bottomRight, fg, bg });
    this.drawHLine(x + 1, y, width - 2, fg, bg);
    this.drawHLine(x + 1, bottom, width - 2, fg, bg);
    this.drawVLine(x, y + 1, height - 2, fg, bg);
    this.drawVLine(right, y + 1, height - 2, fg, bg);
  }

  drawHLine(x: number, y: number, length: number, fg: string, bg: string): void {
    for (let i = 0; i < length; i++) {
      this.set(x + i, y, { char: '─', fg, bg });
    }
  }

  drawVLine(x: number, y: number, length: number, fg: string, bg: string): void {
    for (let i = 0; i < length; i++) {
      this.set(x, y + i, { char: '│', fg, bg });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Dirty Tracking
  // ─────────────────────────────────────────────────────────────────────────

  isDirty(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return false;
    return this.dirty[y * this.width + x] ?? false;
  }

  markAllDirty(): void {
    this.dirty.fill(true);
  }

  clearDirty(): void {
    this.dirty.fill(false);
  }

  /**
   * Changed cells in row-major order.
   */
  getDirtyCells(): Array<{ x: number; y: number; cell: Cell }> {
    const result: Array<{ x: number; y: number; cell: Cell }> = [];
    this.dirty.forEach((isDirty, index) => {
      const cell = this.cells[index];
      if (isDirty && cell !== undefined) {
        result.push({ x: index % this.width, y: Math.floor(index / this.width), cell });
      }
    });
    return result;
  }

  getDirtyCount(): number {
    return this.dirty.filter(Boolean).length;
  }
}

// ============================================
// Box Drawing Characters
// ============================================

interface BoxChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
}

const BOX_CHARS: Record<BoxStyle, BoxChars> = {
  single: { topLeft: '┌', topRight: '┐', bottomLeft: '└', bottomRight: '┘' },
  rounded: { topLeft: '╭', topRight: '╮', bottomLeft: '╰', bottomRight: '╯' },
};

// ============================================
// Factory Function
// ============================================

export function createScreenBuffer(size: Size): ScreenBuffer {
  return new ScreenBuffer(size);
}
