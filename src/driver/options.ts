/**
 * Driver configuration and command-line argument parsing
 */

import type { InferenceConfig } from '../constraint/index.js';

export type OutputFormat = 'report' | 'json' | 'inline';

export interface DriverOptions {
  /** Output format for a successful or failed inference */
  format: OutputFormat;
  /** Evaluate the program after it type-checks */
  evaluate: boolean;
  /** Print constraints, classes and failure details on stderr */
  verbose: boolean;
  /** Operand typing for ordering comparisons */
  comparisonOperands: InferenceConfig['comparisonOperands'];
}

export const DEFAULT_DRIVER_OPTIONS: Readonly<DriverOptions> = Object.freeze({
  format: 'report',
  evaluate: false,
  verbose: false,
  comparisonOperands: 'int',
});

export interface ParsedArgs {
  /** Source file path; null means read stdin */
  file: string | null;
  options: Partial<DriverOptions>;
  help: boolean;
  errors: string[];
}

export const USAGE = [
  'Usage: npm run infer -- [file] [options]',
  '',
  'Reads the program from [file], or from stdin when no file is given.',
  '',
  'Options:',
  '  --format=report   Program type and one line per let binder (default)',
  '  --format=json     Machine-readable JSON output',
  '  --format=inline   Source code with inline type comments',
  '  --comparison=int  Operands of < <= > >= must be int (default)',
  '  --comparison=same Operands of < <= > >= must share a type, like =',
  '  --eval            Evaluate the program after it type-checks',
  '  --verbose         Print constraints and equivalence classes on stderr',
  '  --help            Show this message',
].join('\n');

const FORMATS: readonly OutputFormat[] = ['report', 'json', 'inline'];

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some(format => format === value);
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { file: null, options: {}, help: false, errors: [] };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--eval') {
      parsed.options.evaluate = true;
    } else if (arg === '--verbose') {
      parsed.options.verbose = true;
    } else if (arg.startsWith('--format=')) {
      const format = arg.slice('--format='.length);
      if (isOutputFormat(format)) {
        parsed.options.format = format;
      } else {
        parsed.errors.push(`Unknown format '${format}'`);
      }
    } else if (arg.startsWith('--comparison=')) {
      const mode = arg.slice('--comparison='.length);
      if (mode === 'int' || mode === 'same') {
        parsed.options.comparisonOperands = mode;
      } else {
        parsed.errors.push(`Unknown comparison mode '${mode}'`);
      }
    } else if (arg === '-') {
      parsed.file = null;
    } else if (arg.startsWith('-')) {
      parsed.errors.push(`Unknown option '${arg}'`);
    } else if (parsed.file !== null) {
      parsed.errors.push(`Unexpected argument '${arg}'`);
    } else {
      parsed.file = arg;
    }
  }

  return parsed;
}
