/**
 * Log Table Element
 *
 * One row per log line in the viewport's visible range: row number, time,
 * short level and message. The cursor row is highlighted; other rows take
 * the colour of their level.
 */

import { BaseElement, type ElementContext } from './base.ts';
import type { MouseEvent } from '../types.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';
import type { Viewport } from '../../../core/viewport.ts';
import {
  DEFAULT_MAX_MESSAGE_LENGTH,
  levelColor,
  parseRecord,
  shortenLevel,
  truncate,
  type LogEntry,
} from '../../../core/log-record.ts';
import { RecordParseError, errorMessage } from '../../../core/errors.ts';
import { padToWidth, toDisplayText } from '../../../core/char-width.ts';
import { debugLog } from '../../../debug.ts';

// ============================================
// Types
// ============================================

/**
 * Random access to line text. LineIndex satisfies this.
 */
export interface LineSource {
  lineCount(): number;
  getLineString(n: number): string;
}

export interface LogTableOptions {
  /** Longest message kept before truncating */
  maxMessageLength?: number;
  /** Lines moved per mouse wheel notch */
  scrollWheelLines?: number;
}

const ROW_WIDTH = 6;
const TIME_WIDTH = 20;
const LEVEL_WIDTH = 6;

/**
 * Lay out the four table columns: `%6s %-20s %-6s %s`.
 */
export function formatColumns(row: string, time: string, level: string, message: string): string {
  return `${row.padStart(ROW_WIDTH)} ${time.padEnd(TIME_WIDTH)} ${level.padEnd(LEVEL_WIDTH)} ${message}`;
}

export const TABLE_HEADER = formatColumns('Row', 'Time', 'Lvl', 'Message');

// ============================================
// Log Table Element
// ============================================

export class LogTable extends BaseElement {
  private source: LineSource;
  private viewport: Viewport;
  private maxMessageLength: number;
  private scrollWheelLines: number;

  constructor(
    id: string,
    ctx: ElementContext,
    source: LineSource,
    viewport: Viewport,
    options: LogTableOptions = {}
  ) {
    super('LogTable', id, ctx);
    this.source = source;
    this.viewport = viewport;
    this.maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH;
    this.scrollWheelLines = options.scrollWheelLines ?? 3;
  }

  setScrollWheelLines(lines: number): void {
    this.scrollWheelLines = lines;
  }

  setMaxMessageLength(length: number): void {
    this.maxMessageLength = length;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Row Formatting
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Table entry for a line. Lines that are not JSON keep their raw text as
   * the message. Returns null when the line cannot be read.
   */
  entryFor(line: number): LogEntry | null {
    let raw: string;
    try {
      raw = this.source.getLineString(line);
    } catch (error) {
      debugLog(`[LogTable] Skipping line ${line}: ${errorMessage(error)}`);
      return null;
    }

    try {
      return parseRecord(raw, line, { maxMessageLength: this.maxMessageLength });
    } catch (error) {
      if (!(error instanceof RecordParseError)) throw error;
      return { row: line, time: '', level: '', msg: raw, raw };
    }
  }

  formatEntry(entry: LogEntry): string {
    return formatColumns(
      String(entry.row),
      truncate(entry.time, TIME_WIDTH),
      shortenLevel(entry.level),
      toDisplayText(entry.msg)
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  render(buffer: ScreenBuffer): void {
    const { x, y, width, height } = this.bounds;
    if (width <= 0 || height <= 0) return;

    const bg = this.ctx.getThemeColor('editor.background', '#1e1e1e');
    const fg = this.ctx.getThemeColor('editor.foreground', '#d4d4d4');
    const headerBg = this.ctx.getThemeColor('tableHeader.background', '#252526');
    const headerFg = this.ctx.getThemeColor('tableHeader.foreground', '#ffffff');
    const selectedBg = this.ctx.getThemeColor('list.activeSelectionBackground', '#094771');
    const selectedFg = this.ctx.getThemeColor('list.activeSelectionForeground', '#ffffff');

    buffer.writeString(x, y, padToWidth(TABLE_HEADER, width), headerFg, headerBg, { bold: true });

    const { start, end } = this.viewport.visibleRange();
    const cursor = this.viewport.cursor;

    for (let i = 0; i < height - 1; i++) {
      const line = start + i;
      const screenY = y + 1 + i;
      const entry = this.source.lineCount() > 0 && line <= end ? this.entryFor(line) : null;

      if (!entry) {
        buffer.writeString(x, screenY, ' '.repeat(width), fg, bg);
        continue;
      }

      const text = padToWidth(this.formatEntry(entry), width);
      if (line === cursor) {
        buffer.writeString(x, screenY, text, selectedFg, selectedBg, { bold: true });
      } else {
        buffer.writeString(x, screenY, text, levelColor(entry.level) || fg, bg);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mouse
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Wheel scrolls the view; a left press on a data row selects it.
   */
  override handleMouse(event: MouseEvent): boolean {
    if (event.type === 'scroll') {
      if (event.scrollDirection === 1) {
        this.viewport.scrollDown(this.scrollWheelLines);
      } else {
        this.viewport.scrollUp(this.scrollWheelLines);
      }
      this.ctx.markDirty();
      return true;
    }

    if (event.type === 'press' && event.button === 'left') {
      const row = event.y - this.bounds.y - 1;
      if (row < 0 || row >= this.bounds.height - 1) return false;
      this.viewport.clickAt(row);
      this.ctx.markDirty();
      return true;
    }

    return false;
  }
}
