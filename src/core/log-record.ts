/**
 * Log Records
 *
 * Field extraction and pretty-printing for one-JSON-object-per-line logs.
 * Works on a single line's text as returned by LineIndex.getLineString;
 * line terminators are already gone and are not stripped again here.
 */

import { RecordParseError, errorMessage } from './errors.ts';

// ============================================
// Types
// ============================================

export interface LogEntry {
  /** 1-based line number in the source */
  row: number;
  time: string;
  level: string;
  msg: string;
  /** The complete line */
  raw: string;
}

export interface ParseOptions {
  /** Longest message kept before truncating with "..." */
  maxMessageLength?: number;
}

// ============================================
// Constants
// ============================================

export const DEFAULT_MAX_MESSAGE_LENGTH = 100;

const TIME_KEYS = ['time', 'Time', 'timestamp', 'Timestamp', 'ts'];
const LEVEL_KEYS = ['level', 'Level', 'severity', 'Severity'];
const MESSAGE_KEYS = ['msg', 'Msg', 'message', 'Message'];

const INDENT = '  ';

// ============================================
// Parsing
// ============================================

function parseJson(raw: string): unknown {
  if (raw.length === 0) {
    throw new RecordParseError('empty line');
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new RecordParseError(`invalid JSON: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Parse a line for field lookup. Raw control characters inside strings,
 * such as a literal tab, are escaped first so the fields still read.
 */
function parseFields(raw: string): unknown {
  return parseJson(escapeControlCharacters(raw));
}

/**
 * Escape characters below U+0020 that appear inside JSON strings.
 * Whitespace between tokens is left alone.
 */
export function escapeControlCharacters(raw: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    const code = raw.charCodeAt(i);

    if (!inString) {
      if (ch === '"') inString = true;
    } else if (escaped) {
      escaped = false;
    } else if (ch === '\\') {
      escaped = true;
    } else if (ch === '"') {
      inString = false;
    } else if (code < 0x20) {
      out += '\\u' + code.toString(16).padStart(4, '0');
      continue;
    }

    out += ch;
  }

  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a JSON value as table text.
 */
function valueToString(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function firstField(record: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = valueToString(record[key]);
    if (value !== '') return value;
  }
  return '';
}

/**
 * Truncate to `maxLength` characters, marking the cut with "...".
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, Math.max(0, maxLength));
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Extract the table fields of one log line.
 */
export function parseRecord(raw: string, row: number, options: ParseOptions = {}): LogEntry {
  const parsed = parseFields(raw);
  const record = isRecord(parsed) ? parsed : {};
  const maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH;

  return {
    row,
    raw,
    time: firstField(record, TIME_KEYS),
    level: firstField(record, LEVEL_KEYS),
    msg: truncate(firstField(record, MESSAGE_KEYS), maxMessageLength),
  };
}

/**
 * Look up a dotted path such as "user.name" or "items.0.id".
 * Returns '' when the line is not JSON or the path is absent.
 */
export function extractField(raw: string, path: string): string {
  let current: unknown;
  try {
    current = parseFields(raw);
  } catch {
    return '';
  }

  for (const part of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(part);
      if (!Number.isInteger(index) || index < 0) return '';
      current = current[index];
    } else if (isRecord(current)) {
      current = current[part];
    } else {
      return '';
    }
  }

  return valueToString(current);
}

// ============================================
// Pretty Printing
// ============================================

/**
 * Indent a JSON line with two spaces per level. Works on the text itself,
 * so key order and number literals (including ones beyond 2^53) are kept
 * exactly as written. Unlike the table fields, strings holding raw control
 * characters are rejected.
 */
export function formatPretty(raw: string): string {
  parseJson(raw);

  let out = '';
  let depth = 0;
  let i = 0;
  const length = raw.length;

  const newline = (): void => {
    out += '\n' + INDENT.repeat(depth);
  };

  while (i < length) {
    const ch = raw[i];

    if (ch === '"') {
      let j = i + 1;
      while (j < length && raw[j] !== '"') {
        j += raw[j] === '\\' ? 2 : 1;
      }
      out += raw.slice(i, j + 1);
      i = j + 1;
      continue;
    }

    if (ch === '{' || ch === '[') {
      const close = ch === '{' ? '}' : ']';
      const next = skipWhitespace(raw, i + 1);
      if (raw[next] === close) {
        out += ch + close;
        i = next + 1;
        continue;
      }
      out += ch;
      depth++;
      newline();
      i++;
      continue;
    }

    if (ch === '}' || ch === ']') {
      depth--;
      newline();
      out += ch;
      i++;
      continue;
    }

    if (ch === ',') {
      out += ',';
      newline();
      i++;
      continue;
    }

    if (ch === ':') {
      out += ': ';
      i++;
      continue;
    }

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      i++;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t' || text[i] === '\n' || text[i] === '\r')) {
    i++;
  }
  return i;
}

// ============================================
// Levels
// ============================================

/**
 * Display colour for a level, or '' for unknown levels.
 */
export function levelColor(level: string): string {
  switch (level.toUpperCase()) {
    case 'DEBUG':
    case 'TRACE':
      return '#808080';
    case 'INFO':
      return '#00FF00';
    case 'WARN':
    case 'WARNING':
      return '#FFFF00';
    case 'ERROR':
      return '#FF0000';
    case 'FATAL':
    case 'PANIC':
      return '#FF00FF';
    default:
      return '';
  }
}

/**
 * Three-letter level for the table column.
 */
export function shortenLevel(level: string): string {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return 'DBG';
    case 'INFO':
      return 'INF';
    case 'WARN':
    case 'WARNING':
      return 'WRN';
    case 'ERROR':
      return 'ERR';
    case 'FATAL':
      return 'FTL';
    case 'PANIC':
      return 'PNC';
    case 'TRACE':
      return 'TRC';
    default:
      return level.length > 3 ? level.slice(0, 3) : level;
  }
}
