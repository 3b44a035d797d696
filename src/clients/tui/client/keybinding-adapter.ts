/**
 * Keybinding Adapter
 *
 * Maps key events to viewer commands. Bindings are strings such as
 * "ctrl+d" or "shift+g"; a binding with a `when` clause only applies while
 * its context providers agree.
 */

import type { KeyEvent } from '../types.ts';
import { debugLog } from '../../../debug.ts';
import { errorMessage } from '../../../core/errors.ts';

// ============================================
// Types
// ============================================

export interface KeyBinding {
  key: string;
  command: string;
  /** Context clause, e.g. "resizeMode" or "!resizeMode" */
  when?: string;
  /** Passed to the command handler */
  args?: unknown;
}

export type CommandHandler = (args?: unknown) => void;

/**
 * Returns true if the context condition is met.
 */
export type ContextProvider = () => boolean;

export type Unsubscribe = () => void;

// Names the input handler emits, mapped to binding names
const KEY_ALIASES: Record<string, string> = {
  arrowup: 'up',
  arrowdown: 'down',
  arrowleft: 'left',
  arrowright: 'right',
  escape: 'esc',
};

/**
 * Args of the scroll keys, which leave a typed count pending.
 */
export const KEEP_COUNT = { keepCount: true } as const;

export function keepsCount(args: unknown): boolean {
  return typeof args === 'object' && args !== null && 'keepCount' in args && args.keepCount === true;
}

const DIGIT_BINDINGS: KeyBinding[] = Array.from({ length: 10 }, (_, digit) => ({
  key: String(digit),
  command: 'count.digit',
  args: digit,
}));

export const DEFAULT_KEYBINDINGS: KeyBinding[] = [
  // Cursor
  { key: 'up', command: 'cursor.up' },
  { key: 'k', command: 'cursor.up' },
  { key: 'down', command: 'cursor.down' },
  { key: 'j', command: 'cursor.down' },

  // Pages
  { key: 'pageup', command: 'page.up' },
  { key: 'ctrl+b', command: 'page.up', args: KEEP_COUNT },
  { key: 'pagedown', command: 'page.down' },
  { key: 'ctrl+f', command: 'page.down', args: KEEP_COUNT },
  { key: 'ctrl+u', command: 'page.halfUp', args: KEEP_COUNT },
  { key: 'ctrl+d', command: 'page.halfDown', args: KEEP_COUNT },
  { key: 'ctrl+y', command: 'view.scrollUp', args: KEEP_COUNT },
  { key: 'ctrl+e', command: 'view.scrollDown', args: KEEP_COUNT },

  // Jumps
  { key: 'home', command: 'goto.top' },
  { key: 'end', command: 'goto.bottom' },
  { key: 'g', command: 'goto.g' },
  { key: 'shift+g', command: 'goto.line' },
  { key: '%', command: 'goto.percent' },
  { key: 'shift+h', command: 'screen.top' },
  { key: 'shift+m', command: 'screen.middle' },
  { key: 'shift+l', command: 'screen.bottom' },
  ...DIGIT_BINDINGS,

  // Detail pane
  { key: 'h', command: 'detail.scrollUp', args: KEEP_COUNT },
  { key: 'l', command: 'detail.scrollDown', args: KEEP_COUNT },

  // Layout
  { key: 'ctrl+w', command: 'resize.enter' },
  { key: '<', command: 'resize.shrink', when: 'resizeMode' },
  { key: '>', command: 'resize.grow', when: 'resizeMode' },

  // App
  { key: 'f1', command: 'help.toggle' },
  { key: '?', command: 'help.toggle' },
  { key: 'q', command: 'app.quit' },
  { key: 'esc', command: 'app.confirmQuit' },
  { key: 'ctrl+c', command: 'app.quit' },
];

export const COMMAND_DESCRIPTIONS: Record<string, string> = {
  'cursor.up': 'Move up one line',
  'cursor.down': 'Move down one line',
  'page.up': 'Page up',
  'page.down': 'Page down',
  'page.halfUp': 'Half page up',
  'page.halfDown': 'Half page down',
  'view.scrollUp': 'Scroll view up one line',
  'view.scrollDown': 'Scroll view down one line',
  'goto.top': 'First line',
  'goto.bottom': 'Last line',
  'goto.g': 'gg: first line, {n}gg: line n',
  'goto.line': 'Last line, {n}G: line n',
  'goto.percent': '{n}%: n percent into the file',
  'screen.top': 'Top of screen',
  'screen.middle': 'Middle of screen',
  'screen.bottom': 'Bottom of screen',
  'count.digit': 'Count for G, gg and %',
  'detail.scrollUp': 'Scroll detail up',
  'detail.scrollDown': 'Scroll detail down',
  'resize.enter': 'Resize panes (then < or >)',
  'resize.shrink': 'Narrow the table',
  'resize.grow': 'Widen the table',
  'help.toggle': 'Toggle help',
  'app.quit': 'Quit',
  'app.confirmQuit': 'Quit with confirmation',
};

// ============================================
// Keybinding Adapter
// ============================================

export class KeybindingAdapter {
  private commandHandlers = new Map<string, CommandHandler>();
  private contextProviders = new Map<string, ContextProvider>();
  private readonly bindings: KeyBinding[];

  constructor(bindings: KeyBinding[] = DEFAULT_KEYBINDINGS) {
    this.bindings = [...bindings];
  }

  registerCommand(commandId: string, handler: CommandHandler): Unsubscribe {
    this.commandHandlers.set(commandId, handler);
    return () => {
      this.commandHandlers.delete(commandId);
    };
  }

  registerCommands(commands: Record<string, CommandHandler>): Unsubscribe {
    const unsubscribes: Unsubscribe[] = [];
    for (const [commandId, handler] of Object.entries(commands)) {
      unsubscribes.push(this.registerCommand(commandId, handler));
    }
    return () => {
      for (const unsub of unsubscribes) {
        unsub();
      }
    };
  }

  /**
   * Register a context provider for when clauses.
   */
  registerContext(contextKey: string, provider: ContextProvider): Unsubscribe {
    this.contextProviders.set(contextKey, provider);
    return () => {
      this.contextProviders.delete(contextKey);
    };
  }

  /**
   * Run the command bound to a key event.
   * Returns true if a command was executed.
   */
  handleKeyEvent(event: KeyEvent): boolean {
    const binding = this.resolveBinding(event);
    if (!binding) return false;

    const handler = this.commandHandlers.get(binding.command);
    if (!handler) return false;

    try {
      handler(binding.args);
    } catch (error) {
      debugLog(`[Keybindings] Command ${binding.command} failed: ${errorMessage(error)}`);
      throw error;
    }
    return true;
  }

  /**
   * First binding for the key whose when clause holds.
   */
  resolveBinding(event: KeyEvent): KeyBinding | null {
    const keyString = this.keyToString(event);

    for (const binding of this.bindings) {
      if (this.parseKeyString(binding.key) !== keyString) continue;
      if (binding.when && !this.evaluateWhen(binding.when)) continue;
      return binding;
    }

    return null;
  }

  /**
   * Normalised form of a key event: sorted modifiers, then the key name.
   */
  keyToString(event: KeyEvent): string {
    const modifiers: string[] = [];
    if (event.ctrl) modifiers.push('ctrl');
    if (event.shift) modifiers.push('shift');
    if (event.alt) modifiers.push('alt');
    if (event.meta) modifiers.push('meta');
    modifiers.sort();
    modifiers.push(normalizeKeyName(event.key));
    return modifiers.join('+');
  }

  private parseKeyString(keyString: string): string {
    // A lone "+" is the key itself
    const parts = keyString === '+' ? ['+'] : keyString.toLowerCase().split('+');
    const modifiers: string[] = [];
    let key = '';

    for (const part of parts) {
      const trimmed = part.trim();
      if (['ctrl', 'control'].includes(trimmed)) {
        modifiers.push('ctrl');
      } else if (trimmed === 'shift') {
        modifiers.push('shift');
      } else if (['alt', 'option'].includes(trimmed)) {
        modifiers.push('alt');
      } else if (['meta', 'cmd', 'super'].includes(trimmed)) {
        modifiers.push('meta');
      } else {
        key = trimmed;
      }
    }

    modifiers.sort();
    modifiers.push(normalizeKeyName(key));
    return modifiers.join('+');
  }

  /**
   * Supports: contextKey, !contextKey, a && b
   */
  private evaluateWhen(when: string): boolean {
    for (const part of when.split('&&').map((p) => p.trim())) {
      const negated = part.startsWith('!');
      const contextKey = negated ? part.slice(1) : part;
      const provider = this.contextProviders.get(contextKey);
      // Unknown context keys are false
      const value = provider ? provider() : false;
      if (value === negated) return false;
    }
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Display
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Format a key binding for display, e.g. "ctrl+d" -> "Ctrl+D".
   */
  formatKeyBinding(key: string): string {
    if (key.length === 1) return key;
    return key
      .split('+')
      .map((part) => {
        const trimmed = part.trim();
        switch (trimmed.toLowerCase()) {
          case 'ctrl':
            return 'Ctrl';
          case 'shift':
            return 'Shift';
          case 'alt':
            return 'Alt';
          case 'meta':
            return 'Meta';
          case 'esc':
            return 'Esc';
          case 'up':
            return '↑';
          case 'down':
            return '↓';
          case 'pageup':
            return 'PgUp';
          case 'pagedown':
            return 'PgDn';
          default:
            return trimmed.length === 1 ? trimmed.toUpperCase() : trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
        }
      })
      .join('+');
  }

  /**
   * One entry per command, in binding order, with all of its keys.
   */
  getHelpEntries(): Array<{ keys: string; description: string }> {
    const byCommand = new Map<string, string[]>();
    for (const binding of this.bindings) {
      const keys = byCommand.get(binding.command) ?? [];
      keys.push(this.formatKeyBinding(binding.key));
      byCommand.set(binding.command, keys);
    }

    return [...byCommand].map(([command, keys]) => ({
      keys: formatKeyList(keys),
      description: COMMAND_DESCRIPTIONS[command] ?? command,
    }));
  }
}

// ============================================
// Helpers
// ============================================

function normalizeKeyName(key: string): string {
  const lower = key.toLowerCase();
  return KEY_ALIASES[lower] ?? lower;
}

/**
 * Join display keys, collapsing a full run of digits to "0-9".
 */
function formatKeyList(keys: string[]): string {
  if (keys.length > 2 && keys.every((k) => /^\d$/.test(k))) {
    return `${keys[0]}-${keys[keys.length - 1]}`;
  }
  return keys.join(', ');
}

// ============================================
// Factory Function
// ============================================

export function createKeybindingAdapter(bindings?: KeyBinding[]): KeybindingAdapter {
  return new KeybindingAdapter(bindings);
}
