#!/usr/bin/env tsx
/**
 * logpager
 *
 * Entry point for the application.
 */

import { USAGE, parseArgs } from './cli-args.ts';
import { VERSION } from './version.ts';

const options = parseArgs(process.argv.slice(2));

if (options.help) {
  console.log(USAGE);
  process.exit(0);
}

if (options.version) {
  console.log(`logpager v${VERSION}`);
  process.exit(0);
}

if (options.unknown.length > 0) {
  console.error(`Unknown option: ${options.unknown.join(', ')}`);
  console.error('Run logpager --help for usage.');
  process.exit(2);
}

// Import and run the TUI
import('./clients/tui/main.ts').catch((error: unknown) => {
  console.error('Failed to load TUI:', error);
  process.exit(1);
});
