/**
 * Status Bar
 *
 * Bottom row: prioritised items joined with " | ", or a prompt that
 * temporarily replaces them.
 */

import type { Rect } from '../types.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';
import { padToWidth } from '../../../core/char-width.ts';

// ============================================
// Types
// ============================================

export interface StatusItem {
  id: string;
  content: string;
  /** Lower comes first */
  priority: number;
}

export interface StatusBarCallbacks {
  getThemeColor: (key: string, fallback: string) => string;
}

const SEPARATOR = ' | ';

// ============================================
// Status Bar
// ============================================

export class StatusBar {
  private items = new Map<string, StatusItem>();
  private prompt: string | null = null;
  private bounds: Rect = { x: 0, y: 0, width: 0, height: 1 };
  private callbacks: StatusBarCallbacks;

  constructor(callbacks: StatusBarCallbacks) {
    this.callbacks = callbacks;
  }

  setBounds(bounds: Rect): void {
    this.bounds = { ...bounds };
  }

  setItem(id: string, content: string, priority: number): void {
    this.items.set(id, { id, content, priority });
  }

  removeItem(id: string): void {
    this.items.delete(id);
  }

  /**
   * Show a prompt in place of the items, or null to clear it.
   */
  setPrompt(prompt: string | null): void {
    this.prompt = prompt;
  }

  getPrompt(): string | null {
    return this.prompt;
  }

  getText(): string {
    if (this.prompt !== null) return this.prompt;
    return [...this.items.values()]
      .sort((a, b) => a.priority - b.priority)
      .map((item) => item.content)
      .join(SEPARATOR);
  }

  render(buffer: ScreenBuffer): void {
    const { x, y, width } = this.bounds;
    if (width <= 0) return;

    const bg = this.callbacks.getThemeColor('statusBar.background', '#007acc');
    const fg = this.callbacks.getThemeColor('statusBar.foreground', '#ffffff');
    const promptFg = this.callbacks.getThemeColor('statusBar.promptForeground', '#ffff00');

    const isPrompt = this.prompt !== null;
    buffer.writeString(x, y, padToWidth(` ${this.getText()}`, width), isPrompt ? promptFg : fg, bg, {
      bold: isPrompt,
    });
  }
}
