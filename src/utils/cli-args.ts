import { z } from 'zod';
import type { LogLevel } from '../lib/logger';
import { AppError } from './app-error';
import { CliOptions, cliOptionsSchema } from '../schemas/cli.schemas';

export const USAGE = `Usage: noteref -i <INPUT FILE> [-o <OUTPUT FILE>] [-v <NUMBER>]

Turns "note N" and "notes N-M" cross-references in the footnotes of a .docx
file into NOTEREF fields linked to bookmarked footnotes.

Options:
  -i, --input <INPUT FILE>    The .docx file to process
  -o, --output <OUTPUT FILE>  The .docx file to write (default: overwrite input)
  -v, --verbose <NUMBER>      Verbosity from 0 (errors) to 5 (trace), default 3
  -h, --help                  Show this help
  -V, --version               Show the version`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: CliOptions };

type ValueFlag = 'input' | 'output' | 'verbose';

const VALUE_FLAGS: Record<string, ValueFlag | undefined> = {
  '-i': 'input',
  '--input': 'input',
  '-o': 'output',
  '--output': 'output',
  '-v': 'verbose',
  '--verbose': 'verbose',
};

/**
 * Parse command-line arguments (without the node and script entries).
 * Accepts "--flag value" and "--flag=value".
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const raw: Partial<Record<ValueFlag, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg === '-V' || arg === '--version') return { kind: 'version' };

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw AppError.invalidArguments(`Unknown argument: ${arg}\n\n${USAGE}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw AppError.invalidArguments(`Missing value for ${flag}\n\n${USAGE}`);
    }
    raw[key] = value;
  }

  try {
    return { kind: 'run', options: cliOptionsSchema.parse(raw) };
  } catch (error) {
    if (error instanceof z.ZodError) {
      const message = error.issues.map(issue => issue.message).join('; ');
      throw AppError.invalidArguments(`${message}\n\n${USAGE}`, error.issues);
    }
    throw error;
  }
}

export function verbosityToLogLevel(verbosity: number): LogLevel {
  switch (verbosity) {
    case 0:
    case 1:
      return 'error';
    case 2:
      return 'warn';
    case 3:
      return 'info';
    case 4:
      return 'debug';
    case 5:
      return 'trace';
    default:
      return 'info';
  }
}
