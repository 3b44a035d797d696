/**
 * ScreenBuffer Unit Tests
 */

import { describe, test, expect } from 'vitest';
import { ScreenBuffer, createScreenBuffer } from '../../../../../src/clients/tui/rendering/buffer.ts';
import { containsPoint } from '../../../../../src/clients/tui/types.ts';

describe('ScreenBuffer', () => {
  // ─────────────────────────────────────────────────────────────────────────
  // Dirty Tracking
  // ─────────────────────────────────────────────────────────────────────────

  describe('dirty tracking', () => {
    test('starts fully dirty', () => {
      const buffer = createScreenBuffer({ width: 5, height: 2 });
      expect(buffer.getDirtyCount()).toBe(10);
      buffer.clearDirty();
      expect(buffer.getDirtyCount()).toBe(0);
    });

    test('only marks cells whose content changed', () => {
      const buffer = new ScreenBuffer({ width: 5, height: 2 });
      buffer.clearDirty();

      buffer.set(1, 1, { char: ' ', fg: 'default', bg: 'default' });
      expect(buffer.getDirtyCount()).toBe(0);

      buffer.set(1, 1, { char: 'x', fg: 'default', bg: 'default' });
      expect(buffer.isDirty(1, 1)).toBe(true);
      expect(buffer.getDirtyCells()).toEqual([
        { x: 1, y: 1, cell: { char: 'x', fg: 'default', bg: 'default' } },
      ]);
    });

    test('ignores writes outside the grid', () => {
      const buffer = new ScreenBuffer({ width: 2, height: 2 });
      buffer.clearDirty();
      buffer.set(5, 0, { char: 'x', fg: 'default', bg: 'default' });
      expect(buffer.getDirtyCount()).toBe(0);
      expect(buffer.get(5, 0)).toBeNull();
    });

    test('resize clears the grid', () => {
      const buffer = new ScreenBuffer({ width: 2, height: 1 });
      buffer.writeString(0, 0, 'ab', 'default', 'default');
      buffer.clearDirty();

      buffer.resize({ width: 3, height: 2 });

      expect(buffer.getSize()).toEqual({ width: 3, height: 2 });
      expect(buffer.getRowText(0)).toBe('   ');
      expect(buffer.getDirtyCount()).toBe(6);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Text
  // ─────────────────────────────────────────────────────────────────────────

  describe('writeString', () => {
    test('writes text and returns the columns used', () => {
      const buffer = new ScreenBuffer({ width: 5, height: 1 });
      expect(buffer.writeString(0, 0, 'hi', '#ffffff', '#000000', { bold: true })).toBe(2);
      expect(buffer.getRowText(0)).toBe('hi   ');
      expect(buffer.get(1, 0)).toEqual({ char: 'i', fg: '#ffffff', bg: '#000000', bold: true });
    });

    test('stops at the right edge', () => {
      const buffer = new ScreenBuffer({ width: 3, height: 1 });
      expect(buffer.writeString(1, 0, 'abcdef', 'default', 'default')).toBe(2);
      expect(buffer.getRowText(0)).toBe(' ab');
    });

    test('gives wide characters two cells', () => {
      const buffer = new ScreenBuffer({ width: 5, height: 1 });
      expect(buffer.writeString(0, 0, '中a', 'default', 'default')).toBe(3);
      expect(buffer.get(1, 0)?.char).toBe('');
      expect(buffer.getRowText(0)).toBe('中a  ');
    });

    test('does not split a wide character at the edge', () => {
      const buffer = new ScreenBuffer({ width: 3, height: 1 });
      expect(buffer.writeString(2, 0, '中', 'default', 'default')).toBe(0);
      expect(buffer.getRowText(0)).toBe('   ');
    });

    test('skips zero-width characters', () => {
      const buffer = new ScreenBuffer({ width: 3, height: 1 });
      expect(buffer.writeString(0, 0, 'e\u0301x', 'default', 'default')).toBe(2);
      expect(buffer.getRowText(0)).toBe('ex ');
    });

    test('ignores rows outside the grid', () => {
      const buffer = new ScreenBuffer({ width: 3, height: 1 });
      expect(buffer.writeString(0, 4, 'x', 'default', 'default')).toBe(0);
      expect(buffer.getRowText(4)).toBe('');
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Shapes
  // ─────────────────────────────────────────────────────────────────────────

  describe('shapes', () => {
    test('draws a single box', () => {
      const buffer = new ScreenBuffer({ width: 4, height: 3 });
      buffer.drawBox({ x: 0, y: 0, width: 4, height: 3 }, 'default', 'default');
      expect(buffer.getRowText(0)).toBe('┌──┐');
      expect(buffer.getRowText(1)).toBe('│  │');
      expect(buffer.getRowText(2)).toBe('└──┘');
    });

    test('draws a rounded box', () => {
      const buffer = new ScreenBuffer({ width: 3, height: 2 });
      buffer.drawBox({ x: 0, y: 0, width: 3, height: 2 }, 'default', 'default', 'rounded');
      expect(buffer.getRowText(0)).toBe('╭─╮');
      expect(buffer.getRowText(1)).toBe('╰─╯');
    });

    test('fills and clears rectangles', () => {
      const buffer = new ScreenBuffer({ width: 3, height: 2 });
      buffer.fillRect({ x: 1, y: 0, width: 2, height: 2 }, { char: '#', fg: 'default', bg: 'default' });
      expect(buffer.getRowText(1)).toBe(' ##');
      buffer.clear();
      expect(buffer.getRowText(1)).toBe('   ');
    });
  });
});

describe('containsPoint', () => {
  test('includes the top-left edge and excludes the bottom-right', () => {
    const rect = { x: 2, y: 1, width: 3, height: 2 };
    expect(containsPoint(rect, 2, 1)).toBe(true);
    expect(containsPoint(rect, 4, 2)).toBe(true);
    expect(containsPoint(rect, 5, 2)).toBe(false);
    expect(containsPoint(rect, 2, 3)).toBe(false);
  });
});
