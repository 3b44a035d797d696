/**
 * Renderer
 *
 * Writes the ScreenBuffer to the terminal with ANSI escape sequences.
 * Output goes through a function so tests can capture it.
 */

import type { Size, Cell } from '../types.ts';
import { ScreenBuffer } from './buffer.ts';
import {
  cursorHide,
  cursorShow,
  cursorToZero,
  cursorHome,
  clearScreen,
  alternateScreenOn,
  alternateScreenOff,
  mouseFullOn,
  mouseFullOff,
} from '../ansi/sequences.ts';
import { resetColor } from '../ansi/colors.ts';
import { transitionStyle } from '../ansi/styles.ts';

// ============================================
// Types
// ============================================

export interface RendererOptions {
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Enable alternate screen buffer */
  alternateScreen?: boolean;
  /** Enable mouse tracking */
  mouseTracking?: boolean;
}

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private buffer: ScreenBuffer;
  private size: Size;
  private output: (data: string) => void;
  private alternateScreen: boolean;
  private mouseTracking: boolean;
  private initialized = false;

  // Style of the last written cell, so only changes are emitted
  private lastCell: Cell | null = null;

  constructor(size: Size, options: RendererOptions = {}) {
    this.size = size;
    this.buffer = new ScreenBuffer(size);
    this.output = options.output ?? ((data: string) => process.stdout.write(data));
    this.alternateScreen = options.alternateScreen ?? true;
    this.mouseTracking = options.mouseTracking ?? true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  initialize(): void {
    if (this.initialized) return;

    let sequence = cursorHide();
    if (this.alternateScreen) sequence += alternateScreenOn();
    sequence += clearScreen() + cursorHome();
    if (this.mouseTracking) sequence += mouseFullOn();

    this.output(sequence);
    this.initialized = true;
  }

  /**
   * Restore the terminal. Safe to call more than once.
   */
  cleanup(): void {
    if (!this.initialized) return;

    let sequence = '';
    if (this.mouseTracking) sequence += mouseFullOff();
    if (this.alternateScreen) sequence += alternateScreenOff();
    sequence += cursorShow() + resetColor();

    this.output(sequence);
    this.initialized = false;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size & Buffer
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { ...this.size };
  }

  resize(size: Size): void {
    this.size = size;
    this.buffer.resize(size);
    this.lastCell = null;
  }

  getBuffer(): ScreenBuffer {
    return this.buffer;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write dirty cells to the terminal.
   */
  flush(): void {
    const dirtyCells = this.buffer.getDirtyCells();
    if (dirtyCells.length === 0) return;

    this.output(this.buildOutput(dirtyCells));
    this.buffer.clearDirty();
  }

  fullRedraw(): void {
    this.buffer.markAllDirty();
    this.lastCell = null;
    this.flush();
  }

  private buildOutput(cells: Array<{ x: number; y: number; cell: Cell }>): string {
    let out = '';
    let cursorX = -1;
    let cursorY = -1;

    for (const { x, y, cell } of cells) {
      // Second half of a wide character; the terminal already advanced past it
      if (cell.char === '') continue;

      // Non-ASCII may advance differently than we think, so always reposition
      const isAscii = (cell.char.codePointAt(0) ?? 0) < 128;
      if (y !== cursorY || x !== cursorX || !isAscii) {
        out += cursorToZero(y, x);
      }

      out += transitionStyle(this.lastCell, cell);
      out += cell.char;

      this.lastCell = cell;
      cursorY = y;
      cursorX = isAscii ? x + 1 : -1;
    }

    return out;
  }
}

// ============================================
// Factory Functions
// ============================================

export function createRenderer(size: Size, options?: RendererOptions): Renderer {
  return new Renderer(size, options);
}

/**
 * Create a renderer that captures output (for testing).
 */
export function createTestRenderer(
  size: Size
): { renderer: Renderer; getOutput: () => string; clearOutput: () => void } {
  let captured = '';

  const renderer = new Renderer(size, {
    output: (data: string) => {
      captured += data;
    },
    alternateScreen: false,
    mouseTracking: false,
  });

  return {
    renderer,
    getOutput: () => captured,
    clearOutput: () => {
      captured = '';
    },
  };
}
