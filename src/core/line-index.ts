/**
 * Line Index
 *
 * Holds the full content of a log source and a table of line-start offsets,
 * giving O(1) access to any line by its 1-based number without re-scanning.
 *
 * The table is built by a single forward pass at open time and never changes
 * afterwards, so concurrent readers need no locking as long as close() runs
 * after the last read.
 */

import type { Readable } from 'stream';
import {
  FileHandleSource,
  StreamSource,
  WholeFileSource,
  type ByteSource,
} from './byte-source.ts';
import { CloseError, EmptyInputError, InvalidLineError } from './errors.ts';

// ============================================
// Constants
// ============================================

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const INITIAL_CAPACITY = 1024;

// ============================================
// Offset Table
// ============================================

/**
 * Scan once for line starts. Offsets are 8-byte numbers, exact to 2^53.
 */
export function buildOffsets(data: Uint8Array): Float64Array {
  let offsets = new Float64Array(INITIAL_CAPACITY);
  let count = 0;

  offsets[count++] = 0;

  const length = data.length;
  for (let i = 0; i < length; i++) {
    if (data[i] === NEWLINE && i + 1 < length) {
      if (count === offsets.length) {
        const grown = new Float64Array(offsets.length * 2);
        grown.set(offsets);
        offsets = grown;
      }
      offsets[count++] = i + 1;
    }
  }

  // A final offset at the very end would be an empty phantom line
  if (count > 1 && offsets[count - 1] >= length) {
    count--;
  }

  return offsets.slice(0, count);
}

// ============================================
// LineIndex Class
// ============================================

export class LineIndex {
  private readonly data: Buffer;
  private readonly offsets: Float64Array;
  private readonly source: ByteSource;
  private closed = false;

  private constructor(source: ByteSource, data: Buffer, offsets: Float64Array) {
    this.source = source;
    this.data = data;
    this.offsets = offsets;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Construction
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Build an index over any byte source. On failure the source is released
   * before the error propagates.
   */
  static fromSource(source: ByteSource): LineIndex {
    let data: Buffer;
    try {
      data = source.bytes();
      if (data.length === 0) {
        throw new EmptyInputError(source.name);
      }
    } catch (error) {
      source.release();
      throw error;
    }
    return new LineIndex(source, data, buildOffsets(data));
  }

  /**
   * Index bytes already in memory.
   */
  static fromBytes(bytes: Uint8Array | string, name: string): LineIndex {
    return LineIndex.fromSource(StreamSource.fromBytes(bytes, name));
  }

  /**
   * Open a file through a descriptor held until close().
   */
  static open(path: string): LineIndex {
    return LineIndex.fromSource(new FileHandleSource(path));
  }

  /**
   * Read a file in one go; no descriptor stays open.
   */
  static openFile(path: string): LineIndex {
    return LineIndex.fromSource(new WholeFileSource(path));
  }

  /**
   * Drain a stream (e.g. piped stdin) and index its content.
   */
  static async openReader(stream: Readable, name: string): Promise<LineIndex> {
    const source = await StreamSource.drain(stream, name);
    return LineIndex.fromSource(source);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  lineCount(): number {
    return this.offsets.length;
  }

  name(): string {
    return this.source.name;
  }

  byteLength(): number {
    return this.data.length;
  }

  /**
   * Raw bytes of a 1-based line, without its line terminator.
   * Returns a copy; the indexed content is never handed out.
   */
  getLine(n: number): Buffer {
    const [start, end] = this.lineRange(n);
    return Buffer.from(this.data.subarray(start, end));
  }

  /**
   * A 1-based line decoded as UTF-8, without its line terminator.
   */
  getLineString(n: number): string {
    const [start, end] = this.lineRange(n);
    return this.data.toString('utf8', start, end);
  }

  private lineRange(n: number): [number, number] {
    const count = this.offsets.length;
    if (!Number.isInteger(n) || n < 1 || n > count) {
      throw new InvalidLineError(n, count);
    }

    const start = this.offsets[n - 1];
    let end = n < count ? this.offsets[n] : this.data.length;

    if (end > start && this.data[end - 1] === NEWLINE) end--;
    if (end > start && this.data[end - 1] === CARRIAGE_RETURN) end--;

    return [start, end];
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Release the source. Later calls do nothing.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.source.release();
    } catch (error) {
      throw new CloseError(this.source.name, { cause: error });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }
}
