/**
 * Help Overlay
 *
 * Lists every key binding with what it does. Closed by q or Esc; F1 and ?
 * toggle it through the normal bindings.
 */

import { BaseDialog, type OverlayCallbacks } from './dialog.ts';
import { isKeyEvent, type InputEvent } from '../types.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';
import { clipToWidth } from '../../../core/char-width.ts';

export interface HelpEntry {
  keys: string;
  description: string;
}

const FOOTER = 'q/Esc: close';

export class HelpOverlay extends BaseDialog {
  private getEntries: () => HelpEntry[];

  constructor(callbacks: OverlayCallbacks, getEntries: () => HelpEntry[]) {
    super('help', callbacks);
    this.getEntries = getEntries;
  }

  /**
   * Text of each content row.
   */
  getLines(): string[] {
    const entries = this.getEntries();
    const keyWidth = Math.max(0, ...entries.map((e) => e.keys.length));
    return entries.map((e) => `${e.keys.padEnd(keyWidth)}  ${e.description}`);
  }

  render(buffer: ScreenBuffer): void {
    if (!this.visible) return;

    const lines = this.getLines();
    const contentWidth = Math.max(FOOTER.length, ...lines.map((l) => l.length));
    // Border, one space padding each side, and a blank line before the footer
    this.setBounds(this.centerIn(this.callbacks.getScreenSize(), contentWidth + 4, lines.length + 4));
    this.drawDialogBox(buffer, 'Help');

    const { x, y, width, height } = this.bounds;
    const fg = this.callbacks.getThemeColor('panel.foreground', '#cccccc');
    const bg = this.callbacks.getThemeColor('panel.background', '#252526');
    const dim = this.callbacks.getThemeColor('descriptionForeground', '#888888');
    const inner = width - 4;
    const rows = height - 4;

    for (let i = 0; i < Math.min(rows, lines.length); i++) {
      buffer.writeString(x + 2, y + 1 + i, clipToWidth(lines[i] ?? '', inner), fg, bg);
    }
    buffer.writeString(x + 2, y + height - 2, clipToWidth(FOOTER, inner), dim, bg);
  }

  handleInput(event: InputEvent): boolean {
    if (!this.visible || !isKeyEvent(event)) return false;
    if (event.ctrl || event.alt || event.meta) return false;
    if (event.key === 'Escape' || event.key === 'q') {
      this.hide();
      return true;
    }
    return false;
  }
}
