/**
 * Debug Logging
 *
 * Session log written only when --debug is given. Each enabled session gets
 * its own file, ./logs/logpager-YYYYMMDD-HHMMSS.log. Disabled logging is a
 * no-op, so call sites never need to check first.
 */

import * as fs from 'fs';
import * as path from 'path';

let debugEnabled = false;
let logFilePath: string | null = null;

/**
 * Format a date as YYYYMMDD-HHMMSS in local time.
 */
export function formatLogTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Enable or disable debug logging. Enabling creates the log directory and
 * picks a fresh file name; if the directory cannot be created, log lines
 * go to stderr instead.
 */
export function setDebugEnabled(enabled: boolean, logsDir = './logs'): void {
  debugEnabled = enabled;
  logFilePath = null;
  if (!enabled) return;

  try {
    fs.mkdirSync(logsDir, { recursive: true });
    logFilePath = path.join(logsDir, `logpager-${formatLogTimestamp(new Date())}.log`);
  } catch (error) {
    process.stderr.write(`[debug] cannot create ${logsDir}, logging to stderr: ${String(error)}\n`);
  }
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function getDebugLogPath(): string | null {
  return logFilePath;
}

/**
 * Append a line to the session log.
 */
export function debugLog(message: string): void {
  if (!debugEnabled) return;

  const line = `[${new Date().toISOString()}] ${message}\n`;
  if (logFilePath === null) {
    process.stderr.write(line);
    return;
  }

  try {
    fs.appendFileSync(logFilePath, line);
  } catch {
    // Log file became unwritable
    process.stderr.write(line);
  }
}
