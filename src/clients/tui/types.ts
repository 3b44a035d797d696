/**
 * Terminal Types
 *
 * Screen geometry, cells and input events shared by the viewer's panes,
 * overlays and renderer. Coordinates are 0-based terminal columns and rows.
 */

// ============================================
// Geometry
// ============================================

/** Screen area owned by a pane, the status bar or a dialog */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Terminal size in cells */
export interface Size {
  width: number;
  height: number;
}

// ============================================
// Panes
// ============================================

/** The log table on the left, the pretty-printed record on the right */
export type ElementType = 'LogTable' | 'RecordDetail';

// ============================================
// Cells
// ============================================

/**
 * One terminal cell. Colours are '#rrggbb' or 'default' for the terminal's
 * own; a wide character's trailing cell holds ''.
 */
export interface Cell {
  char: string;
  fg: string;
  bg: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  dim?: boolean;
}

export function createEmptyCell(bg = 'default', fg = 'default'): Cell {
  return { char: ' ', fg, bg };
}

export function cloneCell(cell: Cell): Cell {
  return { ...cell };
}

/** Same glyph and style, so the renderer can skip the cell */
export function cellsEqual(a: Cell, b: Cell): boolean {
  return (
    a.char === b.char &&
    a.fg === b.fg &&
    a.bg === b.bg &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline &&
    a.dim === b.dim
  );
}

// ============================================
// Input
// ============================================

/**
 * A decoded key press. `key` is the printable character ('j', 'G', '%')
 * or a name ('Enter', 'Escape', 'ArrowDown', 'PageUp', 'F1').
 */
export interface KeyEvent {
  key: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}

/**
 * An SGR mouse report. The table selects rows on left presses and scrolls
 * on wheel events; other kinds are decoded but ignored.
 */
export interface MouseEvent {
  type: 'press' | 'release' | 'drag' | 'scroll' | 'move';
  button: 'left' | 'middle' | 'right' | 'none';
  x: number;
  y: number;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  /** 1 for wheel down, -1 for wheel up; scroll events only */
  scrollDirection?: 1 | -1;
}

export type InputEvent = KeyEvent | MouseEvent;

export function isKeyEvent(event: InputEvent): event is KeyEvent {
  return 'key' in event;
}

export function isMouseEvent(event: InputEvent): event is MouseEvent {
  return 'type' in event && 'button' in event;
}

/**
 * Whether a mouse position falls inside an area, e.g. a click on the table.
 */
export function containsPoint(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}
