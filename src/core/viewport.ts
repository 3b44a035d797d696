/**
 * Viewport
 *
 * Cursor and scroll state for a vertically scrolling list of lines, with
 * vim-style motions. All positions are 1-based line numbers.
 *
 * Every public mutator writes raw cursor/offset values and then runs clamp(),
 * the single transition rule that restores:
 *   - 1 <= cursor <= totalLines (both pinned to 1 when there are no lines)
 *   - offset <= cursor <= offset + height - 1
 *   - 1 <= offset <= max(1, totalLines - height + 1)
 *
 * Out-of-range input is never rejected; it lands on the nearest valid state.
 */

// ============================================
// Types
// ============================================

export interface VisibleRange {
  start: number;
  end: number;
}

export interface ViewportSnapshot {
  cursor: number;
  offset: number;
  height: number;
  totalLines: number;
}

// ============================================
// Viewport Class
// ============================================

export class Viewport {
  private _totalLines: number;
  private _height: number;
  private _cursor = 1;
  private _offset = 1;

  constructor(totalLines: number, height: number) {
    this._totalLines = Math.max(0, toInt(totalLines));
    this._height = Math.max(1, toInt(height));
    this.clamp();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State Access
  // ─────────────────────────────────────────────────────────────────────────

  get cursor(): number {
    return this._cursor;
  }

  get offset(): number {
    return this._offset;
  }

  get height(): number {
    return this._height;
  }

  get totalLines(): number {
    return this._totalLines;
  }

  snapshot(): ViewportSnapshot {
    return {
      cursor: this._cursor,
      offset: this._offset,
      height: this._height,
      totalLines: this._totalLines,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reconfiguration
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Update the number of visible rows (floored to 1).
   */
  setHeight(height: number): void {
    this._height = Math.max(1, toInt(height));
    this.clamp();
  }

  /**
   * Update the number of navigable lines, e.g. after a reload.
   */
  setTotalLines(totalLines: number): void {
    this._totalLines = Math.max(0, toInt(totalLines));
    this.clamp();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Clamp
  // ─────────────────────────────────────────────────────────────────────────

  private clamp(): void {
    if (this._totalLines < 1) {
      this._cursor = 1;
      this._offset = 1;
      return;
    }

    if (this._cursor < 1) this._cursor = 1;
    if (this._cursor > this._totalLines) this._cursor = this._totalLines;

    // Keep the cursor on screen
    if (this._cursor < this._offset) {
      this._offset = this._cursor;
    }
    if (this._cursor >= this._offset + this._height) {
      this._offset = Math.max(1, this._cursor - this._height + 1);
    }

    const maxOffset = Math.max(1, this._totalLines - this._height + 1);
    if (this._offset < 1) this._offset = 1;
    if (this._offset > maxOffset) this._offset = maxOffset;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * First and last visible line, inclusive.
   */
  visibleRange(): VisibleRange {
    return {
      start: this._offset,
      end: Math.min(this._offset + this._height - 1, this._totalLines),
    };
  }

  isVisible(line: number): boolean {
    const { start, end } = this.visibleRange();
    return line >= start && line <= end;
  }

  /**
   * 0-based row of the cursor within the visible window.
   */
  cursorRelative(): number {
    return this._cursor - this._offset;
  }

  /**
   * One-line summary for status bars and debug logs.
   */
  state(): string {
    const { start, end } = this.visibleRange();
    return `cursor=${this._cursor} offset=${this._offset} visible=[${start},${end}] total=${this._totalLines} height=${this._height}`;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Line Motions
  // ─────────────────────────────────────────────────────────────────────────

  down(n = 1): void {
    const count = toInt(n);
    if (count < 1) return;
    this._cursor += count;
    this.clamp();
  }

  up(n = 1): void {
    const count = toInt(n);
    if (count < 1) return;
    this._cursor -= count;
    this.clamp();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Page Motions
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Advance one screen; cursor lands on the first line of the new screen.
   */
  pageDown(): void {
    this._offset += this._height;
    this._cursor = this._offset;
    this.clamp();
  }

  /**
   * Back one screen; cursor lands on the last line of the new screen.
   */
  pageUp(): void {
    this._offset = Math.max(1, this._offset - this._height);
    this._cursor = Math.min(this._offset + this._height - 1, this._totalLines);
    this.clamp();
  }

  halfPageDown(): void {
    const half = this.halfPage();
    this._offset += half;
    this._cursor += half;
    this.clamp();
  }

  halfPageUp(): void {
    const half = this.halfPage();
    this._offset -= half;
    this._cursor -= half;
    this.clamp();
  }

  private halfPage(): number {
    return Math.max(1, Math.floor(this._height / 2));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Scrolling
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Move the window without moving the cursor. The clamp keeps the cursor
   * visible, so the window cannot leave it behind.
   */
  scrollDown(n = 1): void {
    const count = toInt(n);
    if (count < 1) return;
    this._offset += count;
    this.clamp();
  }

  scrollUp(n = 1): void {
    const count = toInt(n);
    if (count < 1) return;
    this._offset -= count;
    this.clamp();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Jumps
  // ─────────────────────────────────────────────────────────────────────────

  goto(line: number): void {
    this._cursor = toInt(line);
    this.clamp();
  }

  gotoTop(): void {
    this.goto(1);
  }

  gotoBottom(): void {
    this.goto(this._totalLines);
  }

  /** H: first visible line */
  gotoLineTop(): void {
    this._cursor = this._offset;
    this.clamp();
  }

  /** M: middle visible line */
  gotoLineMiddle(): void {
    this._cursor = Math.min(this._offset + Math.floor(this._height / 2), this._totalLines);
    this.clamp();
  }

  /** L: last visible line */
  gotoLineBottom(): void {
    this._cursor = Math.min(this._offset + this._height - 1, this._totalLines);
    this.clamp();
  }

  /**
   * Jump to the line at `percent` (clamped to 1..100) of the file.
   */
  jumpToPercent(percent: number): void {
    const p = Math.min(100, Math.max(1, toInt(percent)));
    const line = Math.floor((this._totalLines * p) / 100);
    this.goto(Math.max(1, line));
  }

  /**
   * Select the line shown at a 0-based row of the window.
   */
  clickAt(relativeRow: number): void {
    const row = Math.min(this._height - 1, Math.max(0, toInt(relativeRow)));
    this._cursor = this._offset + row;
    this.clamp();
  }
}

// ============================================
// Helpers
// ============================================

function toInt(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (!Number.isFinite(value)) return value > 0 ? Number.MAX_SAFE_INTEGER : -Number.MAX_SAFE_INTEGER;
  return Math.trunc(value);
}

// ============================================
// Factory Function
// ============================================

export function createViewport(totalLines: number, height: number): Viewport {
  return new Viewport(totalLines, height);
}
