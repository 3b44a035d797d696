/**
 * TUI Input Handler
 *
 * Turns raw terminal bytes into key and mouse events. Reads from stdin by
 * default; when the log itself arrives on stdin the caller passes a
 * /dev/tty stream instead.
 */

import type { KeyEvent, MouseEvent, InputEvent } from '../types.ts';

// ============================================
// Constants
// ============================================

const ESC = '\x1b';

const ESCAPE_SEQUENCES: Record<string, string> = {
  '[A': 'ArrowUp',
  '[B': 'ArrowDown',
  '[C': 'ArrowRight',
  '[D': 'ArrowLeft',
  'OA': 'ArrowUp',
  'OB': 'ArrowDown',
  'OC': 'ArrowRight',
  'OD': 'ArrowLeft',
  '[H': 'Home',
  '[F': 'End',
  'OH': 'Home',
  'OF': 'End',
  '[1~': 'Home',
  '[4~': 'End',
  '[7~': 'Home',
  '[8~': 'End',
  '[3~': 'Delete',
  '[5~': 'PageUp',
  '[6~': 'PageDown',
  'OP': 'F1',
  '[11~': 'F1',
  '[[A': 'F1',
};

// Longest first so '[1~' wins over '[1'
const SORTED_SEQUENCES = Object.entries(ESCAPE_SEQUENCES).sort((a, b) => b[0].length - a[0].length);

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;

// ============================================
// Types
// ============================================

export type KeyEventCallback = (event: KeyEvent) => void;
export type MouseEventCallback = (event: MouseEvent) => void;
export type ResizeCallback = (width: number, height: number) => void;
export type InputEventCallback = (event: InputEvent) => void;

/**
 * The parts of a readable terminal stream the handler uses.
 * process.stdin and tty.ReadStream both fit.
 */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
}

export interface TerminalOutput {
  columns?: number;
  rows?: number;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export interface InputHandlerOptions {
  input?: TerminalInput;
  output?: TerminalOutput;
  /** How long a lone ESC waits for the rest of a sequence (ms) */
  escapeTimeout?: number;
}

function key(name: string, mods: Partial<Omit<KeyEvent, 'key'>> = {}): KeyEvent {
  return {
    key: name,
    ctrl: mods.ctrl ?? false,
    alt: mods.alt ?? false,
    shift: mods.shift ?? false,
    meta: mods.meta ?? false,
  };
}

// ============================================
// TUI Input Handler
// ============================================

export class TUIInputHandler {
  private keyCallbacks: Set<KeyEventCallback> = new Set();
  private mouseCallbacks: Set<MouseEventCallback> = new Set();
  private resizeCallbacks: Set<ResizeCallback> = new Set();
  private inputCallbacks: Set<InputEventCallback> = new Set();

  private readonly input: TerminalInput;
  private readonly output: TerminalOutput;
  private readonly escapeTimeout: number;

  private isRunning = false;
  private buffer = '';
  private escapeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: InputHandlerOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.escapeTimeout = options.escapeTimeout ?? 50;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.setEncoding('utf8');
    this.input.on('data', this.handleData);
    this.input.resume();
    this.output.on('resize', this.handleResize);
  }

  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }

    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.off('data', this.handleData);
    this.input.pause();
    this.output.off('resize', this.handleResize);
  }

  isActive(): boolean {
    return this.isRunning;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Event Registration
  // ─────────────────────────────────────────────────────────────────────────

  onKey(callback: KeyEventCallback): () => void {
    this.keyCallbacks.add(callback);
    return () => this.keyCallbacks.delete(callback);
  }

  onMouse(callback: MouseEventCallback): () => void {
    this.mouseCallbacks.add(callback);
    return () => this.mouseCallbacks.delete(callback);
  }

  onResize(callback: ResizeCallback): () => void {
    this.resizeCallbacks.add(callback);
    return () => this.resizeCallbacks.delete(callback);
  }

  onInput(callback: InputEventCallback): () => void {
    this.inputCallbacks.add(callback);
    return () => this.inputCallbacks.delete(callback);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Event Handlers
  // ─────────────────────────────────────────────────────────────────────────

  private handleData = (chunk: string | Buffer): void => {
    this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    this.parseBuffer();
  };

  private handleResize = (): void => {
    const width = this.output.columns || 80;
    const height = this.output.rows || 24;
    for (const callback of this.resizeCallbacks) {
      callback(width, height);
    }
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Parsing
  // ─────────────────────────────────────────────────────────────────────────

  private parseBuffer(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }

    while (this.buffer.length > 0) {
      const consumed = this.tryParse();
      if (consumed > 0) {
        this.buffer = this.buffer.slice(consumed);
        continue;
      }

      // Incomplete escape sequence: wait briefly, then treat ESC as a key
      if (this.buffer.startsWith(ESC) && this.buffer.length < 20) {
        this.escapeTimer = setTimeout(() => {
          this.escapeTimer = null;
          if (this.buffer.startsWith(ESC)) {
            this.buffer = this.buffer.slice(1);
            this.emitKey(key('Escape'));
            this.parseBuffer();
          }
        }, this.escapeTimeout);
        return;
      }
      this.buffer = this.buffer.slice(1);
    }
  }

  /**
   * Parse one event from the front of the buffer. Returns the number of
   * characters consumed, or 0 if more input is needed.
   */
  private tryParse(): number {
    const first = this.buffer.charAt(0);
    const code = first.charCodeAt(0);

    if (first === ESC) {
      return this.tryParseEscape();
    }

    if (code === 127 || code === 8) {
      this.emitKey(key('Backspace'));
      return 1;
    }
    if (code === 9) {
      this.emitKey(key('Tab'));
      return 1;
    }
    if (code === 10 || code === 13) {
      this.emitKey(key('Enter'));
      return 1;
    }
    if (code >= 1 && code <= 26) {
      // Ctrl+A .. Ctrl+Z
      this.emitKey(key(String.fromCharCode(code + 96), { ctrl: true }));
      return 1;
    }
    if (code < 32) {
      return 1;
    }

    // Surrogate pairs arrive together in a utf8-decoded chunk
    const char = String.fromCodePoint(this.buffer.codePointAt(0) ?? code);
    const isLetter = char.toLowerCase() !== char.toUpperCase();
    this.emitKey(key(char, { shift: isLetter && char !== char.toLowerCase() }));
    return char.length;
  }

  private tryParseEscape(): number {
    if (this.buffer.length === 1) return 0;

    const mouse = SGR_MOUSE.exec(this.buffer);
    if (mouse) {
      this.parseSGRMouse(mouse);
      return mouse[0].length;
    }
    if (this.buffer.startsWith(`${ESC}[<`)) {
      return 0;
    }

    for (const [seq, name] of SORTED_SEQUENCES) {
      if (this.buffer.startsWith(ESC + seq)) {
        this.emitKey(key(name));
        return 1 + seq.length;
      }
    }

    // ESC ESC: the first one is a real Escape press
    const next = this.buffer.charAt(1);
    if (next === ESC) {
      this.emitKey(key('Escape'));
      return 1;
    }

    // Alt+key
    const nextCode = next.charCodeAt(0);
    if (next !== '[' && next !== 'O' && nextCode >= 32 && nextCode < 127) {
      this.emitKey(key(next, { alt: true, shift: next !== next.toLowerCase() }));
      return 2;
    }

    // Unknown CSI sequence: drop it once its final byte has arrived
    if (next === '[') {
      const unknown = /^\x1b\[[0-9;?]*[@-~]/.exec(this.buffer);
      return unknown ? unknown[0].length : 0;
    }

    return 0;
  }

  private parseSGRMouse(match: RegExpExecArray): void {
    const cb = parseInt(match[1] ?? '0', 10);
    const x = parseInt(match[2] ?? '1', 10) - 1;
    const y = parseInt(match[3] ?? '1', 10) - 1;
    const isRelease = match[4] === 'm';

    const buttonNum = cb & 0x03;
    const shift = (cb & 0x04) !== 0;
    const alt = (cb & 0x08) !== 0;
    const ctrl = (cb & 0x10) !== 0;
    const motion = (cb & 0x20) !== 0;
    const wheel = (cb & 0x40) !== 0;

    const pressed: MouseEvent['button'] =
      buttonNum === 0 ? 'left' : buttonNum === 1 ? 'middle' : buttonNum === 2 ? 'right' : 'none';

    if (wheel) {
      // buttonNum 0 = wheel up, 1 = wheel down
      const scrollDirection = buttonNum === 0 ? -1 : 1;
      this.emitMouse({ type: 'scroll', button: 'none', x, y, ctrl, alt, shift, scrollDirection });
    } else if (motion) {
      this.emitMouse({ type: pressed === 'none' ? 'move' : 'drag', button: pressed, x, y, ctrl, alt, shift });
    } else if (isRelease) {
      this.emitMouse({ type: 'release', button: pressed, x, y, ctrl, alt, shift });
    } else {
      this.emitMouse({ type: 'press', button: pressed, x, y, ctrl, alt, shift });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Event Emission
  // ─────────────────────────────────────────────────────────────────────────

  private emitKey(event: KeyEvent): void {
    for (const callback of this.keyCallbacks) {
      callback(event);
    }
    for (const callback of this.inputCallbacks) {
      callback(event);
    }
  }

  private emitMouse(event: MouseEvent): void {
    for (const callback of this.mouseCallbacks) {
      callback(event);
    }
    for (const callback of this.inputCallbacks) {
      callback(event);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Testing Support
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Feed raw terminal input without a stream.
   */
  simulateInput(data: string): void {
    this.buffer += data;
    this.parseBuffer();
  }
}

// ============================================
// Factory Function
// ============================================

export function createInputHandler(options?: InputHandlerOptions): TUIInputHandler {
  return new TUIInputHandler(options);
}
