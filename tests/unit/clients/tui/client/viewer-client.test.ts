/**
 * ViewerClient Tests
 *
 * Drives the client through a fake terminal: raw input in, viewport state
 * and screen buffer out.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { ViewerClient, createViewerClient } from '../../../../../src/clients/tui/client/viewer-client.ts';
import { createTestRenderer } from '../../../../../src/clients/tui/rendering/renderer.ts';
import { createInputHandler } from '../../../../../src/clients/tui/input/input-handler.ts';
import { TABLE_HEADER } from '../../../../../src/clients/tui/elements/log-table.ts';
import type { KeyEvent, Size } from '../../../../../src/clients/tui/types.ts';
import { LineIndex } from '../../../../../src/core/line-index.ts';
import { Settings } from '../../../../../src/config/settings.ts';
import { FakeTerminalInput, FakeTerminalOutput } from '../../../../helpers/fake-terminal.ts';
import { jsonLogLines } from '../../../../helpers/temp-files.ts';

interface Harness {
  client: ViewerClient;
  index: LineIndex;
  input: FakeTerminalInput;
  output: FakeTerminalOutput;
  settings: Settings;
  onExit: ReturnType<typeof vi.fn>;
}

function setup(options: { lines?: number; size?: Size; settings?: Settings } = {}): Harness {
  const size = options.size ?? { width: 120, height: 13 };
  const settings = options.settings ?? new Settings();
  const index = LineIndex.fromBytes(jsonLogLines(options.lines ?? 100), 'test.log');
  const input = new FakeTerminalInput();
  const output = new FakeTerminalOutput(size.width, size.height);
  const { renderer } = createTestRenderer(size);
  const onExit = vi.fn();

  const client = createViewerClient({
    index,
    version: '0.1.0',
    settings,
    size,
    renderer,
    inputHandler: createInputHandler({ input, output }),
    onExit,
  });
  client.start();

  return { client, index, input, output, settings, onExit };
}

function escape(): KeyEvent {
  return { key: 'Escape', ctrl: false, alt: false, shift: false, meta: false };
}

function row(client: ViewerClient, y: number): string {
  return client.getRenderer().getBuffer().getRowText(y);
}

describe('ViewerClient', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  afterEach(() => {
    h.client.stop();
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Setup
  // ─────────────────────────────────────────────────────────────────────────

  describe('setup', () => {
    test('sizes the viewport to the rows between title, header and status', () => {
      expect(h.client.getViewport().snapshot()).toEqual({ cursor: 1, offset: 1, height: 10, totalLines: 100 });
      expect(h.client.isRunning()).toBe(true);
      expect(h.input.rawMode).toBe(true);
    });

    test('follows terminal resizes', () => {
      h.output.resizeTo(120, 23);
      expect(h.client.getViewport().height).toBe(20);
      expect(h.client.getRenderer().getSize()).toEqual({ width: 120, height: 23 });
    });

    test('keeps at least one data row', () => {
      h.output.resizeTo(120, 2);
      expect(h.client.getViewport().height).toBe(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  describe('navigation', () => {
    test('j and k move one line', () => {
      h.input.type('jjjk');
      expect(h.client.getViewport().cursor).toBe(3);
    });

    test('arrow keys and page keys', () => {
      h.input.type('\x1b[B\x1b[B');
      expect(h.client.getViewport().cursor).toBe(3);
      h.input.type('\x1b[6~');
      expect(h.client.getViewport().snapshot()).toMatchObject({ cursor: 11, offset: 11 });
      h.input.type('\x02');
      expect(h.client.getViewport().snapshot()).toMatchObject({ cursor: 10, offset: 1 });
    });

    test('ctrl+d and ctrl+u move half a page', () => {
      h.input.type('\x04');
      expect(h.client.getViewport().snapshot()).toMatchObject({ cursor: 6, offset: 6 });
      h.input.type('\x15');
      expect(h.client.getViewport().snapshot()).toMatchObject({ cursor: 1, offset: 1 });
    });

    test('ctrl+e scrolls the view under the cursor', () => {
      h.input.type('jjj\x05');
      expect(h.client.getViewport().snapshot()).toMatchObject({ cursor: 4, offset: 2 });
    });

    test('H, M and L pick screen rows', () => {
      h.input.type('29G');
      h.input.type('M');
      expect(h.client.getViewport().cursor).toBe(25);
      h.input.type('H');
      expect(h.client.getViewport().cursor).toBe(20);
      h.input.type('L');
      expect(h.client.getViewport().cursor).toBe(29);
    });

    test('Home and End jump to the ends', () => {
      h.input.type('\x1b[F');
      expect(h.client.getViewport().cursor).toBe(100);
      h.input.type('\x1b[H');
      expect(h.client.getViewport().cursor).toBe(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Counts and Jumps
  // ─────────────────────────────────────────────────────────────────────────

  describe('counts', () => {
    test('G goes to the last line, {n}G to line n', () => {
      h.input.type('G');
      expect(h.client.getViewport().cursor).toBe(100);
      h.input.type('42G');
      expect(h.client.getViewport().cursor).toBe(42);
      expect(h.client.getPendingCount()).toBe('');
    });

    test('0G leaves the cursor where it is', () => {
      h.input.type('5G0G');
      expect(h.client.getViewport().cursor).toBe(5);
    });

    test('gg goes to the first line, {n}gg to line n', () => {
      h.input.type('G');
      h.input.type('gg');
      expect(h.client.getViewport().cursor).toBe(1);
      h.input.type('37gg');
      expect(h.client.getViewport().cursor).toBe(37);
    });

    test('a key between the two g presses cancels gg', () => {
      h.input.type('G');
      h.input.type('gjg');
      expect(h.client.getViewport().cursor).toBe(100);
      h.input.type('g');
      expect(h.client.getViewport().cursor).toBe(1);
    });

    test('an unbound key cancels a pending g', () => {
      h.input.type('Ggzg');
      expect(h.client.getViewport().cursor).toBe(100);
    });

    test('{n}% jumps into the file', () => {
      h.input.type('50%');
      expect(h.client.getViewport().cursor).toBe(50);
      h.input.type('%');
      expect(h.client.getViewport().cursor).toBe(50);
    });

    test('motions drop a pending count', () => {
      h.input.type('12j');
      expect(h.client.getPendingCount()).toBe('');
      expect(h.client.getViewport().cursor).toBe(2);
      h.input.type('G');
      expect(h.client.getViewport().cursor).toBe(100);
    });

    test('scroll keys keep a pending count', () => {
      h.input.type('30\x05\x06');
      expect(h.client.getPendingCount()).toBe('30');
      h.input.type('G');
      expect(h.client.getViewport().cursor).toBe(30);

      h.input.type('40lhG');
      expect(h.client.getViewport().cursor).toBe(40);
    });

    test('page keys drop a pending count', () => {
      h.input.type('12\x1b[6~');
      expect(h.client.getPendingCount()).toBe('');
      h.input.type('G');
      expect(h.client.getViewport().cursor).toBe(100);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Detail Pane
  // ─────────────────────────────────────────────────────────────────────────

  describe('detail pane', () => {
    test('l and h scroll the detail, moving the cursor resets it', () => {
      h.input.type('ll');
      expect(h.client.getDetailScrollTop()).toBe(2);
      h.input.type('h');
      expect(h.client.getDetailScrollTop()).toBe(1);
      h.input.type('j');
      expect(h.client.getDetailScrollTop()).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Help and Quit
  // ─────────────────────────────────────────────────────────────────────────

  describe('help', () => {
    test('? and F1 toggle the overlay', () => {
      h.input.type('?');
      expect(h.client.isHelpVisible()).toBe(true);
      h.input.type('\x1bOP');
      expect(h.client.isHelpVisible()).toBe(false);
    });

    test('q closes help before it quits', () => {
      h.input.type('?q');
      expect(h.client.isHelpVisible()).toBe(false);
      expect(h.onExit).not.toHaveBeenCalled();

      h.input.type('q');
      expect(h.onExit).toHaveBeenCalledTimes(1);
    });

    test('Escape closes help without asking to quit', () => {
      h.input.type('?');
      h.client.handleKey(escape());
      expect(h.client.isHelpVisible()).toBe(false);
      expect(h.client.isConfirmingExit()).toBe(false);
    });
  });

  describe('quit', () => {
    test('q stops the client and closes the index', () => {
      h.input.type('q');
      expect(h.onExit).toHaveBeenCalledTimes(1);
      expect(h.client.isRunning()).toBe(false);
      expect(h.index.isClosed()).toBe(true);
      expect(h.input.rawMode).toBe(false);
    });

    test('ctrl+c quits', () => {
      h.input.type('\x03');
      expect(h.onExit).toHaveBeenCalledTimes(1);
    });

    test('Escape asks first, y confirms', () => {
      h.client.handleKey(escape());
      expect(h.client.isConfirmingExit()).toBe(true);
      expect(h.onExit).not.toHaveBeenCalled();

      h.input.type('Y');
      expect(h.onExit).toHaveBeenCalledTimes(1);
    });

    test('any other key cancels the question', () => {
      h.client.handleKey(escape());
      h.input.type('j');
      expect(h.client.isConfirmingExit()).toBe(false);
      expect(h.client.getViewport().cursor).toBe(1);
      expect(h.onExit).not.toHaveBeenCalled();
    });

    test('Escape quits at once when confirmation is off', () => {
      h.client.stop();
      h = setup({ settings: new Settings({ 'viewer.confirmExit': false }) });
      h.client.handleKey(escape());
      expect(h.onExit).toHaveBeenCalledTimes(1);
    });

    test('stopping twice is harmless', () => {
      h.client.stop();
      h.client.stop();
      expect(h.index.isClosed()).toBe(true);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Mouse
  // ─────────────────────────────────────────────────────────────────────────

  describe('mouse', () => {
    test('clicking a table row selects it', () => {
      h.input.type('\x1b[<0;1;5M');
      expect(h.client.getViewport().cursor).toBe(3);
    });

    test('clicks outside the table are ignored', () => {
      h.input.type('\x1b[<0;100;5M');
      expect(h.client.getViewport().cursor).toBe(1);
    });

    test('the wheel scrolls three lines', () => {
      h.input.type('50G');
      expect(h.client.getViewport().offset).toBe(41);
      h.input.type('\x1b[<65;100;5M');
      expect(h.client.getViewport().snapshot()).toMatchObject({ cursor: 50, offset: 44 });
    });

    test('the mouse does nothing while help is open', () => {
      h.input.type('?');
      h.input.type('\x1b[<0;1;5M');
      expect(h.client.getViewport().cursor).toBe(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  describe('render', () => {
    test('draws title, table, separator, detail and status', () => {
      h.client.render();

      expect(row(h.client, 0).trimEnd()).toBe(' JSON Log Viewer  100 lines | Line 1');
      expect(row(h.client, 1).slice(0, 74)).toBe(TABLE_HEADER.padEnd(74));
      expect(row(h.client, 1).charAt(74)).toBe('│');
      expect(row(h.client, 2).slice(0, 74).trimEnd()).toBe('     1 2024-01-01T00:00:01Z INF    event 1');
      expect(row(h.client, 2).slice(75)).toBe(' {'.padEnd(45));
      expect(row(h.client, 3).slice(75).trimEnd()).toBe('   "time": "2024-01-01T00:00:01Z",');
      expect(row(h.client, 12).trimEnd()).toBe(
        ' F1: Help | q: Quit | cursor=1 offset=1 visible=[1,10] total=100 height=10 | v0.1.0'
      );
    });

    test('shows the quit prompt while confirming', () => {
      h.client.handleKey(escape());
      h.client.render();
      expect(row(h.client, 12).trimEnd()).toBe(' Quit? (y/n)');
    });

    test('follows table width changes from settings', () => {
      h.settings.set('viewer.tableWidth', 60);
      h.client.render();
      expect(h.client.getTableWidth()).toBe(60);
      expect(row(h.client, 5).charAt(60)).toBe('│');
    });

    test('draws the help overlay on top', () => {
      h.input.type('?');
      h.client.render();
      const screen = Array.from({ length: 13 }, (_, y) => row(h.client, y)).join('\n');
      expect(screen).toContain(' Help ');
      expect(screen).toContain('q/Esc: close');
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Resize Mode
// ─────────────────────────────────────────────────────────────────────────────

describe('ViewerClient resize mode', () => {
  let h: Harness;

  beforeEach(() => {
    vi.useFakeTimers();
    h = setup();
  });

  afterEach(() => {
    h.client.stop();
    vi.useRealTimers();
  });

  test('< and > do nothing outside resize mode', () => {
    h.input.type('>');
    expect(h.client.getTableWidth()).toBe(74);
    expect(h.client.isResizeMode()).toBe(false);
  });

  test('ctrl+w enters resize mode, < and > change the width', () => {
    h.input.type('\x17');
    expect(h.client.isResizeMode()).toBe(true);

    h.input.type('>');
    expect(h.client.getTableWidth()).toBe(75);
    h.input.type('<<');
    expect(h.client.getTableWidth()).toBe(73);
  });

  test('resize mode ends after the timeout', () => {
    h.input.type('\x17');
    vi.advanceTimersByTime(1999);
    expect(h.client.isResizeMode()).toBe(true);
    vi.advanceTimersByTime(1);
    expect(h.client.isResizeMode()).toBe(false);

    h.input.type('>');
    expect(h.client.getTableWidth()).toBe(74);
  });

  test('each resize restarts the timeout', () => {
    h.input.type('\x17');
    vi.advanceTimersByTime(1500);
    h.input.type('>');
    vi.advanceTimersByTime(1500);
    expect(h.client.isResizeMode()).toBe(true);
  });

  test('both panes keep the minimum width', () => {
    h.input.type('\x17');
    h.input.type('>'.repeat(20));
    expect(h.client.getTableWidth()).toBe(80);
    h.input.type('<'.repeat(60));
    expect(h.client.getTableWidth()).toBe(40);
  });

  test('a motion leaves resize mode', () => {
    h.input.type('\x17j');
    expect(h.client.isResizeMode()).toBe(false);
    expect(h.client.getViewport().cursor).toBe(2);
  });
});
