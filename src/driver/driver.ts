/**
 * Driver - Source text in, verdict out
 *
 * Parses, scope-checks and type-checks one program and formats the
 * outcome. Nothing is written directly: the caller decides where the
 * returned stdout and stderr lines go.
 */

import { parse } from '../parser/index.js';
import { evaluate, findUndefinedVariables, inferTypes } from '../analysis/index.js';
import {
  formatClasses,
  formatConstraints,
  formatInline,
  formatJSON,
  formatReport,
} from '../output/index.js';
import type { InferenceResult } from '../analysis/index.js';
import { DEFAULT_DRIVER_OPTIONS, type DriverOptions } from './options.js';

export const PARSE_ERROR = 'Parse error';
export const DEF_ERROR = 'Def error';

export interface DriverOutput {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

function formatResult(source: string, result: InferenceResult, options: DriverOptions): string {
  switch (options.format) {
    case 'report':
      return formatReport(result);
    case 'json':
      return formatJSON(result);
    case 'inline':
      return formatInline(source, result);
  }
}

function indentLines(text: string): string[] {
  return text === '' ? [] : text.split('\n').map(line => `  ${line}`);
}

/**
 * Run the whole pipeline on one source text
 */
export function runDriver(source: string, options: Partial<DriverOptions> = {}): DriverOutput {
  const opts: DriverOptions = { ...DEFAULT_DRIVER_OPTIONS, ...options };
  const out: DriverOutput = { stdout: [], stderr: [], exitCode: 0 };
  const log = (line: string): void => {
    if (opts.verbose) out.stderr.push(line);
  };

  const { ast, errors } = parse(source);
  if (ast === null) {
    out.stdout.push(PARSE_ERROR);
    for (const err of errors) {
      out.stderr.push(`  line ${err.line}, column ${err.column}: ${err.message}`);
    }
    out.exitCode = 1;
    return out;
  }

  const undefinedNames = findUndefinedVariables(ast);
  if (undefinedNames.size > 0) {
    out.stdout.push(DEF_ERROR);
    log(`Undefined variables: ${[...undefinedNames].join(', ')}`);
    out.exitCode = 1;
    return out;
  }

  const result = inferTypes(ast, { comparisonOperands: opts.comparisonOperands });

  log(`Generated ${result.constraints.length} constraints:`);
  indentLines(formatConstraints(result.constraints)).forEach(log);
  log('Equivalence classes:');
  indentLines(formatClasses(result.classes)).forEach(log);
  if (!result.success) {
    log(`${result.error.kind}: ${result.error.message}`);
  }

  out.stdout.push(formatResult(source, result, opts));
  if (!result.success) {
    out.exitCode = 1;
    return out;
  }

  if (opts.evaluate) {
    const evaluated = evaluate(ast);
    if (evaluated.success) {
      out.stdout.push(`Value is ${String(evaluated.value)}`);
    } else {
      out.stderr.push(`Evaluation error: ${evaluated.error.message}`);
      out.exitCode = 1;
    }
  }

  return out;
}
