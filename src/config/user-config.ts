/**
 * User Configuration
 *
 * Loads ~/.logpager/settings.json (comments allowed) over the defaults.
 * A missing file is normal; an unreadable or malformed one is logged and
 * the defaults stay in effect.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { debugLog } from '../debug.ts';
import { errorMessage } from '../core/errors.ts';
import { Settings } from './settings.ts';

// ============================================
// Paths
// ============================================

export interface ConfigPaths {
  /** Base directory (~/.logpager/) */
  baseDir: string;
  /** User settings file (~/.logpager/settings.json) */
  userSettings: string;
}

export function getDefaultConfigPaths(): ConfigPaths {
  const home = process.env.HOME || process.env.USERPROFILE || '';
  const baseDir = path.join(home, '.logpager');
  return {
    baseDir,
    userSettings: path.join(baseDir, 'settings.json'),
  };
}

// ============================================
// JSON With Comments
// ============================================

/**
 * Parse JSON that may contain // and /* *\/ comments.
 */
export function parseJsonWithComments(content: string): unknown {
  const cleanContent = content
    .replace(/\/\*[\s\S]*?\*\//g, '') // Multi-line comments
    .replace(/^\s*\/\/.*$/gm, ''); // Single line comments
  return JSON.parse(cleanContent);
}

// ============================================
// User Config Manager
// ============================================

export class UserConfigManager {
  private readonly paths: ConfigPaths;
  private readonly settings: Settings;

  constructor(settings: Settings = new Settings(), paths: ConfigPaths = getDefaultConfigPaths()) {
    this.settings = settings;
    this.paths = paths;
  }

  getPaths(): ConfigPaths {
    return { ...this.paths };
  }

  getSettings(): Settings {
    return this.settings;
  }

  /**
   * Load the user settings file into the settings. Returns true if a file
   * was found and applied.
   */
  async load(): Promise<boolean> {
    const file = this.paths.userSettings;

    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        debugLog(`[UserConfig] No settings file at ${file}, using defaults`);
      } else {
        debugLog(`[UserConfig] Cannot read ${file}: ${errorMessage(error)}`);
      }
      return false;
    }

    let parsed: unknown;
    try {
      parsed = parseJsonWithComments(content);
    } catch (error) {
      debugLog(`[UserConfig] Invalid JSON in ${file}: ${errorMessage(error)}`);
      return false;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      debugLog(`[UserConfig] ${file} must contain an object, ignoring`);
      return false;
    }

    const rejected = this.settings.update(Object.fromEntries(Object.entries(parsed)));
    for (const key of rejected) {
      debugLog(`[UserConfig] Ignoring unknown or mistyped setting '${key}'`);
    }
    debugLog(`[UserConfig] Loaded ${file}`);
    return true;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
