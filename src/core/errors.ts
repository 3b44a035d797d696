/**
 * Error Types
 *
 * Errors raised by the line index and record layer. The viewport has none:
 * navigation input is clamped, never rejected.
 */

// ============================================
// Types
// ============================================

export type LogPagerErrorCode =
  | 'OPEN_FAILED'
  | 'EMPTY_INPUT'
  | 'INVALID_LINE'
  | 'CLOSE_FAILED'
  | 'RECORD_PARSE';

// ============================================
// Base Error
// ============================================

export class LogPagerError extends Error {
  readonly code: LogPagerErrorCode;

  constructor(code: LogPagerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ============================================
// Index Errors
// ============================================

/**
 * The source could not be opened or read. Fatal to startup.
 */
export class OpenError extends LogPagerError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('OPEN_FAILED', message, options);
    this.source = source;
  }
}

/**
 * The source has zero bytes. Treated as a usage error.
 */
export class EmptyInputError extends LogPagerError {
  readonly source: string;

  constructor(source: string) {
    super('EMPTY_INPUT', `${source}: file is empty`);
    this.source = source;
  }
}

/**
 * A lookup asked for a line outside [1, lineCount].
 */
export class InvalidLineError extends LogPagerError {
  readonly line: number;
  readonly lineCount: number;

  constructor(line: number, lineCount: number) {
    super('INVALID_LINE', `invalid line number ${line} (have ${lineCount} lines)`);
    this.line = line;
    this.lineCount = lineCount;
  }
}

/**
 * Releasing the source's handle failed. Logged, never fatal.
 */
export class CloseError extends LogPagerError {
  constructor(source: string, options?: { cause?: unknown }) {
    super('CLOSE_FAILED', `${source}: failed to close`, options);
  }
}

// ============================================
// Record Errors
// ============================================

export class RecordParseError extends LogPagerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RECORD_PARSE', message, options);
  }
}

// ============================================
// Utility Functions
// ============================================

/**
 * Message of an unknown thrown value, for logging.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
