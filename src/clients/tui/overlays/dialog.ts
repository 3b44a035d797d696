/**
 * Dialog Base
 *
 * Boxed overlay drawn on top of the panes.
 */

import type { Rect, Size, InputEvent } from '../types.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';

export interface OverlayCallbacks {
  /** Request a re-render */
  onDirty: () => void;
  getThemeColor: (key: string, fallback: string) => string;
  getScreenSize: () => Size;
}

export abstract class BaseDialog {
  readonly id: string;

  protected visible = false;
  protected bounds: Rect = { x: 0, y: 0, width: 40, height: 10 };
  protected callbacks: OverlayCallbacks;

  constructor(id: string, callbacks: OverlayCallbacks) {
    this.id = id;
    this.callbacks = callbacks;
  }

  isVisible(): boolean {
    return this.visible;
  }

  show(): void {
    this.visible = true;
    this.callbacks.onDirty();
  }

  hide(): void {
    this.visible = false;
    this.callbacks.onDirty();
  }

  toggle(): void {
    if (this.visible) {
      this.hide();
    } else {
      this.show();
    }
  }

  setBounds(bounds: Rect): void {
    this.bounds = { ...bounds };
  }

  getBounds(): Rect {
    return { ...this.bounds };
  }

  abstract render(buffer: ScreenBuffer): void;

  /**
   * @returns true if the dialog consumed the event
   */
  abstract handleInput(event: InputEvent): boolean;

  /**
   * Centre a box of the given size on screen, shrunk to fit.
   */
  protected centerIn(screen: Size, width: number, height: number): Rect {
    const w = Math.max(2, Math.min(width, screen.width));
    const h = Math.max(2, Math.min(height, screen.height));
    return {
      x: Math.floor((screen.width - w) / 2),
      y: Math.floor((screen.height - h) / 2),
      width: w,
      height: h,
    };
  }

  protected drawDialogBox(buffer: ScreenBuffer, title?: string): void {
    const { x, y, width, height } = this.bounds;
    const bg = this.callbacks.getThemeColor('panel.background', '#252526');
    const fg = this.callbacks.getThemeColor('panel.foreground', '#cccccc');
    const border = this.callbacks.getThemeColor('panel.border', '#404040');

    buffer.fillRect(this.bounds, { char: ' ', fg, bg });
    buffer.drawBox({ x, y, width, height }, border, bg, 'rounded');

    if (title) {
      const titleText = ` ${title} `;
      const titleX = x + Math.floor((width - titleText.length) / 2);
      buffer.writeString(titleX, y, titleText, fg, bg, { bold: true });
    }
  }
}
