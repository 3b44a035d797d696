/**
 * In-process stand-ins for the terminal streams the input handler binds to.
 */

import { EventEmitter } from 'events';

export class FakeTerminalInput extends EventEmitter {
  isTTY = true;
  rawMode = false;
  encoding: BufferEncoding | null = null;
  paused = true;

  setRawMode(mode: boolean): this {
    this.rawMode = mode;
    return this;
  }

  setEncoding(encoding: BufferEncoding): this {
    this.encoding = encoding;
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }

  type(data: string): void {
    this.emit('data', data);
  }
}

export class FakeTerminalOutput extends EventEmitter {
  columns: number;
  rows: number;

  constructor(columns: number, rows: number) {
    super();
    this.columns = columns;
    this.rows = rows;
  }

  resizeTo(columns: number, rows: number): void {
    this.columns = columns;
    this.rows = rows;
    this.emit('resize');
  }
}
