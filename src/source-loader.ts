/**
 * Source Loader
 *
 * Picks where the log comes from: a file named on the command line, or
 * data piped to stdin. File access goes through a held descriptor first,
 * falling back to a whole-file read.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { LineIndex } from './core/line-index.ts';
import { OpenError, errorMessage } from './core/errors.ts';
import { debugLog } from './debug.ts';

export const STDIN_NAME = 'stdin';

export interface StdinLike extends Readable {
  isTTY?: boolean;
}

/**
 * Expand a leading ~ to the home directory.
 */
export function expandHome(filePath: string): string {
  const home = process.env.HOME || process.env.USERPROFILE || '';
  if (filePath === '~') return home;
  if (filePath.startsWith('~/')) return path.join(home, filePath.slice(2));
  return filePath;
}

/**
 * Check that a path names an existing regular file.
 */
export function checkFile(filePath: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new OpenError(filePath, `file not found: ${filePath}`, { cause: error });
    }
    throw new OpenError(filePath, `cannot access ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  if (stat.isDirectory()) {
    throw new OpenError(filePath, `path is a directory: ${filePath}`);
  }
}

/**
 * Index a file, preferring a held descriptor.
 */
export function loadFile(filePath: string): LineIndex {
  checkFile(filePath);
  try {
    return LineIndex.open(filePath);
  } catch (error) {
    if (!(error instanceof OpenError)) throw error;
    debugLog(`[SourceLoader] Descriptor open failed (${error.message}), reading whole file`);
    return LineIndex.openFile(filePath);
  }
}

/**
 * Index the named file, or stdin when no path is given. Stdin attached to
 * a terminal is rejected rather than waited on.
 */
export async function loadSource(filePath: string | undefined, stdin: StdinLike = process.stdin): Promise<LineIndex> {
  if (filePath !== undefined) {
    const expanded = expandHome(filePath);
    debugLog(`[SourceLoader] Loading file ${path.resolve(expanded)}`);
    return loadFile(expanded);
  }

  if (stdin.isTTY) {
    throw new OpenError(STDIN_NAME, 'no input provided: specify a file or pipe data via stdin');
  }

  debugLog('[SourceLoader] Reading from stdin');
  return LineIndex.openReader(stdin, STDIN_NAME);
}
