#!/usr/bin/env npx tsx
/**
 * CLI script to run type inference on a program
 * Usage: npx tsx scripts/infer.ts [file] [options]
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseArgs, runDriver, USAGE } from '../src/driver/index.js';

function main(): number {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  if (args.errors.length > 0) {
    for (const err of args.errors) {
      console.error(`Error: ${err}`);
    }
    console.error('');
    console.error(USAGE);
    return 2;
  }

  let source: string;
  const absolutePath = args.file === null ? null : resolve(process.cwd(), args.file);

  try {
    source = absolutePath === null ? readFileSync(process.stdin.fd, 'utf-8') : readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Error: Could not read ${absolutePath ?? 'stdin'}: ${reason}`);
    return 2;
  }

  if (args.options.verbose) {
    console.error(`Checking ${args.file ?? 'stdin'}...`);
  }

  const output = runDriver(source, args.options);
  for (const line of output.stderr) {
    console.error(line);
  }
  for (const line of output.stdout) {
    console.log(line);
  }
  return output.exitCode;
}

process.exitCode = main();
