/**
 * Byte Sources
 *
 * The one capability the line index needs from its input: produce the
 * complete, immutable content as bytes, and release whatever was held to
 * produce it. Files and streams are the two kinds of input.
 */

import * as fs from 'fs';
import type { Readable } from 'stream';
import { OpenError, errorMessage } from './errors.ts';

// ============================================
// Types
// ============================================

export interface ByteSource {
  /** Display name (file path, or e.g. "stdin") */
  readonly name: string;
  /** Full content. Callers must not write to it. */
  bytes(): Buffer;
  /** Release any handle held for the content. Called exactly once. */
  release(): void;
}

// ============================================
// File Handle Source
// ============================================

/**
 * Reads a file through a descriptor that stays open until release.
 */
export class FileHandleSource implements ByteSource {
  readonly name: string;
  private fd: number | null;
  private content: Buffer | null = null;

  constructor(path: string) {
    this.name = path;
    try {
      this.fd = fs.openSync(path, 'r');
    } catch (error) {
      throw new OpenError(path, `failed to open ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  bytes(): Buffer {
    if (this.content) return this.content;
    if (this.fd === null) {
      throw new OpenError(this.name, `${this.name}: source already released`);
    }

    try {
      const size = fs.fstatSync(this.fd).size;
      const content = Buffer.allocUnsafe(size);
      let read = 0;
      while (read < size) {
        const n = fs.readSync(this.fd, content, read, size - read, read);
        if (n === 0) break;
        read += n;
      }
      this.content = read === size ? content : content.subarray(0, read);
      return this.content;
    } catch (error) {
      throw new OpenError(this.name, `failed to read ${this.name}: ${errorMessage(error)}`, { cause: error });
    }
  }

  release(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

// ============================================
// Whole File Source
// ============================================

/**
 * Reads the whole file up front; holds no handle afterwards.
 */
export class WholeFileSource implements ByteSource {
  readonly name: string;
  private readonly content: Buffer;

  constructor(path: string) {
    this.name = path;
    try {
      this.content = fs.readFileSync(path);
    } catch (error) {
      throw new OpenError(path, `failed to open ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  bytes(): Buffer {
    return this.content;
  }

  release(): void {}
}

// ============================================
// Stream Source
// ============================================

/**
 * Content drained from a stream that has no random access (stdin, pipes).
 */
export class StreamSource implements ByteSource {
  readonly name: string;
  private readonly content: Buffer;

  private constructor(name: string, content: Buffer) {
    this.name = name;
    this.content = content;
  }

  /**
   * Read the stream to its end.
   */
  static async drain(stream: Readable, name: string): Promise<StreamSource> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of stream) {
        const data: unknown = chunk;
        if (typeof data === 'string') {
          chunks.push(Buffer.from(data, 'utf8'));
        } else if (data instanceof Uint8Array) {
          chunks.push(Buffer.from(data));
        } else {
          throw new TypeError(`unexpected ${typeof data} chunk in byte stream`);
        }
      }
    } catch (error) {
      throw new OpenError(name, `failed to read ${name}: ${errorMessage(error)}`, { cause: error });
    }
    return new StreamSource(name, Buffer.concat(chunks));
  }

  /**
   * Wrap bytes already in memory.
   */
  static fromBytes(bytes: Uint8Array | string, name: string): StreamSource {
    const content = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : Buffer.from(bytes);
    return new StreamSource(name, content);
  }

  bytes(): Buffer {
    return this.content;
  }

  release(): void {}
}
