/**
 * Base Element
 *
 * Abstract base class for the viewer's panes. An element draws itself into
 * its bounds and may take mouse input; keys go through the keybinding
 * adapter instead.
 */

import type { Rect, Size, ElementType, MouseEvent } from '../types.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';

// ============================================
// Element Context
// ============================================

/**
 * Services the client hands to every element.
 */
export interface ElementContext {
  /** Request a re-render */
  markDirty: () => void;
  /** Get a color from the current theme */
  getThemeColor: (key: string, fallback: string) => string;
}

/**
 * Create a minimal element context for testing.
 */
export function createTestContext(overrides: Partial<ElementContext> = {}): ElementContext {
  return {
    markDirty: () => {},
    getThemeColor: (_key: string, fallback: string) => fallback,
    ...overrides,
  };
}

// ============================================
// Base Element Class
// ============================================

export abstract class BaseElement {
  readonly type: ElementType;
  readonly id: string;

  protected bounds: Rect = { x: 0, y: 0, width: 0, height: 0 };
  protected ctx: ElementContext;

  constructor(type: ElementType, id: string, ctx: ElementContext) {
    this.type = type;
    this.id = id;
    this.ctx = ctx;
  }

  /**
   * Called when the element's size changes.
   */
  onResize(_size: Size): void {
    this.ctx.markDirty();
  }

  /**
   * Draw into the buffer at the element's bounds (absolute coordinates).
   */
  abstract render(buffer: ScreenBuffer): void;

  /**
   * Handle mouse input in screen coordinates.
   * @returns true if handled
   */
  handleMouse(_event: MouseEvent): boolean {
    return false;
  }

  getBounds(): Rect {
    return { ...this.bounds };
  }

  setBounds(bounds: Rect): void {
    const needsResize = this.bounds.width !== bounds.width || this.bounds.height !== bounds.height;
    this.bounds = { ...bounds };
    if (needsResize) {
      this.onResize({ width: bounds.width, height: bounds.height });
    }
  }
}
