/**
 * Record Detail Element
 *
 * Pretty-printed view of the record under the cursor, scrolled vertically
 * with its own offset. The offset resets whenever the cursor moves to a
 * different line.
 */

import { BaseElement, type ElementContext } from './base.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';
import type { Viewport } from '../../../core/viewport.ts';
import type { LineSource } from './log-table.ts';
import { formatPretty } from '../../../core/log-record.ts';
import { InvalidLineError, RecordParseError } from '../../../core/errors.ts';
import { padToWidth, toDisplayText } from '../../../core/char-width.ts';

export class RecordDetail extends BaseElement {
  private source: LineSource;
  private viewport: Viewport;
  private scrollTop = 0;
  private lastLine = 0;

  constructor(id: string, ctx: ElementContext, source: LineSource, viewport: Viewport) {
    super('RecordDetail', id, ctx);
    this.source = source;
    this.viewport = viewport;
  }

  /**
   * Lines shown for the cursor record.
   */
  getContentLines(): string[] {
    if (this.source.lineCount() === 0) return [];

    let raw: string;
    try {
      raw = this.source.getLineString(this.viewport.cursor);
    } catch (error) {
      if (error instanceof InvalidLineError) return [`Error: ${error.message}`];
      throw error;
    }

    try {
      return formatPretty(raw).split('\n');
    } catch (error) {
      if (error instanceof RecordParseError) return [raw];
      throw error;
    }
  }

  getScrollTop(): number {
    this.syncWithCursor();
    return this.scrollTop;
  }

  /**
   * Scroll by `delta` lines, kept within the content.
   */
  scrollBy(delta: number): void {
    this.syncWithCursor();
    const maxTop = Math.max(0, this.getContentLines().length - 1);
    this.scrollTop = Math.min(maxTop, Math.max(0, this.scrollTop + delta));
    this.ctx.markDirty();
  }

  private syncWithCursor(): void {
    if (this.viewport.cursor !== this.lastLine) {
      this.lastLine = this.viewport.cursor;
      this.scrollTop = 0;
    }
  }

  render(buffer: ScreenBuffer): void {
    const { x, y, width, height } = this.bounds;
    if (width <= 0 || height <= 0) return;

    const bg = this.ctx.getThemeColor('editor.background', '#1e1e1e');
    const fg = this.ctx.getThemeColor('editor.foreground', '#d4d4d4');

    this.syncWithCursor();
    const lines = this.getContentLines();

    // Header row stays blank to line up with the table header
    buffer.writeString(x, y, ' '.repeat(width), fg, bg);

    for (let i = 0; i < height - 1; i++) {
      const text = lines[this.scrollTop + i] ?? '';
      buffer.writeString(x, y + 1 + i, padToWidth(' ' + toDisplayText(text), width), fg, bg);
    }
  }
}
