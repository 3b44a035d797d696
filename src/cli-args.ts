/**
 * Command Line Arguments
 */

export interface CliOptions {
  help: boolean;
  version: boolean;
  debug: boolean;
  /** Log file; stdin when absent */
  path?: string;
  /** Flags that were not recognised */
  unknown: string[];
}

export const USAGE = `
logpager - line-indexed viewer for JSON log files

Usage: logpager [options] [file]
       <command> | logpager [options]

Options:
  -h, --help       Show this help message
  -v, --version    Show version number
  --debug          Write a debug log to ./logs/

Keys:
  j/k, arrows      Move the cursor
  Ctrl+F/Ctrl+B    Page down/up
  gg, G, {n}G      First line, last line, line n
  F1 or ?          All key bindings
  q                Quit
`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false, version: false, debug: false, unknown: [] };
  let onlyPaths = false;

  for (const arg of argv) {
    if (!onlyPaths && arg.startsWith('-') && arg !== '-') {
      switch (arg) {
        case '-h':
        case '--help':
          options.help = true;
          break;
        case '-v':
        case '--version':
          options.version = true;
          break;
        case '--debug':
          options.debug = true;
          break;
        case '--':
          onlyPaths = true;
          break;
        default:
          options.unknown.push(arg);
      }
      continue;
    }
    // "-" reads stdin, same as no path
    if (arg === '-') continue;
    // First path wins
    if (options.path === undefined) {
      options.path = arg;
    }
  }

  return options;
}
