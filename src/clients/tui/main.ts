/**
 * TUI Main
 *
 * Loads settings and the log source, then runs the viewer until the user
 * quits. When the log is piped in, keys are read from /dev/tty.
 */

import * as fs from 'fs';
import * as tty from 'tty';
import { ViewerClient, createViewerClient } from './client/viewer-client.ts';
import { createInputHandler, type TerminalInput } from './input/input-handler.ts';
import { parseArgs } from '../../cli-args.ts';
import { loadSource } from '../../source-loader.ts';
import { Settings } from '../../config/settings.ts';
import { UserConfigManager } from '../../config/user-config.ts';
import { OpenError, errorMessage } from '../../core/errors.ts';
import type { LineIndex } from '../../core/line-index.ts';
import { setDebugEnabled, debugLog, getDebugLogPath } from '../../debug.ts';
import { VERSION } from '../../version.ts';

const options = parseArgs(process.argv.slice(2));
setDebugEnabled(options.debug);

let client: ViewerClient | null = null;

/**
 * Keyboard input for the viewer. stdin is taken by the log when piped.
 */
function openTerminalInput(stdinIsLog: boolean): TerminalInput {
  if (!stdinIsLog) return process.stdin;
  try {
    return new tty.ReadStream(fs.openSync('/dev/tty', 'r'));
  } catch (error) {
    throw new OpenError('/dev/tty', 'no terminal available for keyboard input', { cause: error });
  }
}

async function main(): Promise<void> {
  debugLog(`[Main] Starting logpager v${VERSION}`);
  const logPath = getDebugLogPath();
  if (logPath) {
    debugLog(`[Main] Debug log: ${logPath}`);
  }

  const settings = new Settings();
  await new UserConfigManager(settings).load();

  const index: LineIndex = await loadSource(options.path);
  debugLog(`[Main] Indexed ${index.name()}: ${index.lineCount()} lines, ${index.byteLength()} bytes`);

  let input: TerminalInput;
  try {
    input = openTerminalInput(options.path === undefined);
  } catch (error) {
    index.close();
    throw error;
  }

  client = createViewerClient({
    index,
    version: VERSION,
    settings,
    inputHandler: createInputHandler({ input }),
    onExit: () => {
      debugLog('[Main] Client exited, terminating process');
      process.exit(0);
    },
  });

  client.start();
}

// Handle graceful shutdown
function shutdown(): void {
  debugLog('[Main] Shutting down...');
  client?.stop();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

process.on('uncaughtException', (error: Error) => {
  debugLog(`[CRASH] Uncaught Exception:\n${error.stack || error.message}`);
  client?.stop();
  console.error(`Error: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  debugLog(`[CRASH] Unhandled Rejection:\n${reason instanceof Error ? reason.stack : String(reason)}`);
  client?.stop();
  console.error(`Error: ${errorMessage(reason)}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  debugLog(`[Main] Fatal error: ${errorMessage(error)}`);
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
