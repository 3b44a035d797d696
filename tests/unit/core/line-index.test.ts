/**
 * LineIndex Unit Tests
 *
 * Offset table construction, 1-based line access and lifecycle.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { Readable } from 'stream';
import { LineIndex, buildOffsets } from '../../../src/core/line-index.ts';
import type { ByteSource } from '../../../src/core/byte-source.ts';
import {
  CloseError,
  EmptyInputError,
  InvalidLineError,
  OpenError,
} from '../../../src/core/errors.ts';
import { createTempDir, type TempDir } from '../../helpers/temp-files.ts';

function fakeSource(content: string, release: () => void = () => {}): ByteSource & { released: number } {
  const source = {
    name: 'fake',
    released: 0,
    bytes: () => Buffer.from(content),
    release: () => {
      source.released++;
      release();
    },
  };
  return source;
}

describe('LineIndex', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Offsets
  // ─────────────────────────────────────────────────────────────────────────

  describe('buildOffsets', () => {
    test('records the start of every line', () => {
      expect(Array.from(buildOffsets(Buffer.from('ab\ncd\nef\n')))).toEqual([0, 3, 6]);
    });

    test('does not add a line after the final newline', () => {
      expect(Array.from(buildOffsets(Buffer.from('x\n')))).toEqual([0]);
    });

    test('grows past its initial capacity', () => {
      const offsets = buildOffsets(Buffer.from('a\n'.repeat(5000)));
      expect(offsets.length).toBe(5000);
      expect(offsets[4999]).toBe(9998);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Line Access
  // ─────────────────────────────────────────────────────────────────────────

  describe('getLine', () => {
    test('returns each line without its terminator', () => {
      const path = tmp.write('a.log', 'line1\nline2\nline3\n');
      const index = LineIndex.open(path);

      expect(index.lineCount()).toBe(3);
      expect(index.getLineString(1)).toBe('line1');
      expect(index.getLineString(3)).toBe('line3');
      expect(index.getLine(2).toString()).toBe('line2');
      index.close();
    });

    test('counts a last line with no trailing newline', () => {
      const index = LineIndex.fromBytes('first\nsecond', 'mem');
      expect(index.lineCount()).toBe(2);
      expect(index.getLineString(2)).toBe('second');
    });

    test('strips CRLF terminators', () => {
      const index = LineIndex.fromBytes('a\r\nb\r\n', 'mem');
      expect(index.lineCount()).toBe(2);
      expect(index.getLineString(1)).toBe('a');
      expect(index.getLineString(2)).toBe('b');
    });

    test('keeps a carriage return inside a line', () => {
      const index = LineIndex.fromBytes('a\rb\n', 'mem');
      expect(index.lineCount()).toBe(1);
      expect(index.getLineString(1)).toBe('a\rb');
    });

    test('counts blank lines', () => {
      const index = LineIndex.fromBytes('\n\n', 'mem');
      expect(index.lineCount()).toBe(2);
      expect(index.getLineString(1)).toBe('');
      expect(index.getLineString(2)).toBe('');
    });

    test('reads mixed terminators and blank CRLF lines', () => {
      const index = LineIndex.fromBytes('a\r\n\r\nb', 'mem');
      expect(index.lineCount()).toBe(3);
      expect(index.getLineString(2)).toBe('');
      expect(index.getLineString(3)).toBe('b');
    });

    test('reassembles the file content', () => {
      const content = '{"a":1}\n{"b":2}\nplain\n';
      const index = LineIndex.fromBytes(content, 'mem');
      const lines: string[] = [];
      for (let n = 1; n <= index.lineCount(); n++) {
        lines.push(index.getLineString(n));
      }
      expect(lines.join('\n') + '\n').toBe(content);
    });

    test('decodes multi-byte UTF-8', () => {
      const index = LineIndex.fromBytes('héllo\n日本\n', 'mem');
      expect(index.getLineString(2)).toBe('日本');
      expect(index.getLine(1).length).toBe(6);
    });

    test('hands out a copy of the bytes', () => {
      const index = LineIndex.fromBytes('abc\n', 'mem');
      const line = index.getLine(1);
      line[0] = 0x7a;
      expect(index.getLineString(1)).toBe('abc');
    });

    test('rejects line numbers outside 1..lineCount', () => {
      const index = LineIndex.fromBytes('one\ntwo\n', 'mem');
      expect(() => index.getLine(0)).toThrow(InvalidLineError);
      expect(() => index.getLine(3)).toThrow(InvalidLineError);
      expect(() => index.getLineString(-1)).toThrow(InvalidLineError);
      expect(() => index.getLine(1.5)).toThrow('invalid line number 1.5 (have 2 lines)');
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Opening
  // ─────────────────────────────────────────────────────────────────────────

  describe('open', () => {
    test('rejects an empty file', () => {
      const path = tmp.write('empty.log', '');
      expect(() => LineIndex.open(path)).toThrow(EmptyInputError);
      expect(() => LineIndex.openFile(path)).toThrow(`${path}: file is empty`);
    });

    test('reports a missing file as an OpenError', () => {
      const path = `${tmp.path}/missing.log`;
      expect(() => LineIndex.open(path)).toThrow(OpenError);
      expect(() => LineIndex.openFile(path)).toThrow(OpenError);
    });

    test('openFile reads the whole file', () => {
      const path = tmp.write('b.log', 'x\ny\n');
      const index = LineIndex.openFile(path);
      expect(index.lineCount()).toBe(2);
      expect(index.name()).toBe(path);
      expect(index.byteLength()).toBe(4);
      index.close();
    });

    test('releases the source when indexing fails', () => {
      const source = fakeSource('');
      expect(() => LineIndex.fromSource(source)).toThrow(EmptyInputError);
      expect(source.released).toBe(1);
    });
  });

  describe('openReader', () => {
    test('indexes a drained stream', async () => {
      const stream = Readable.from([Buffer.from('a\nb'), Buffer.from('\nc\n')]);
      const index = await LineIndex.openReader(stream, 'stdin');

      expect(index.name()).toBe('stdin');
      expect(index.lineCount()).toBe(3);
      expect(index.getLineString(2)).toBe('b');
    });

    test('accepts string chunks', async () => {
      const index = await LineIndex.openReader(Readable.from(['x\n', 'y\n']), 'stdin');
      expect(index.getLineString(2)).toBe('y');
    });

    test('rejects an empty stream', async () => {
      await expect(LineIndex.openReader(Readable.from([]), 'stdin')).rejects.toThrow('stdin: file is empty');
    });

    test('wraps stream failures', async () => {
      const stream = new Readable({
        read() {
          this.destroy(new Error('boom'));
        },
      });
      await expect(LineIndex.openReader(stream, 'stdin')).rejects.toThrow('failed to read stdin: boom');
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  describe('close', () => {
    test('releases the source once', () => {
      const source = fakeSource('a\n');
      const index = LineIndex.fromSource(source);

      index.close();
      index.close();

      expect(index.isClosed()).toBe(true);
      expect(source.released).toBe(1);
    });

    test('wraps release failures in a CloseError', () => {
      const failure = new Error('EBADF');
      const release = vi.fn(() => {
        throw failure;
      });
      const index = LineIndex.fromSource(fakeSource('a\n', release));

      let caught: unknown;
      try {
        index.close();
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CloseError);
      expect(caught).toHaveProperty('cause', failure);

      expect(() => index.close()).not.toThrow();
      expect(release).toHaveBeenCalledTimes(1);
    });
  });
});
