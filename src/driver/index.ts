/**
 * Driver module exports
 */

export { runDriver, PARSE_ERROR, DEF_ERROR } from './driver.js';
export type { DriverOutput } from './driver.js';

export { parseArgs, DEFAULT_DRIVER_OPTIONS, USAGE } from './options.js';
export type { DriverOptions, OutputFormat, ParsedArgs } from './options.js';
