/**
 * Command-line front end.
 *
 * ```
 * satframe decode --schema <xml> --input <bin> --output <csv> [--plugin <module.js>] [--csv-delimiter <c>]
 * satframe search-obt --input <bin> --frame-size <n> [--min-obt <s>] [--max-obt <s>] [--max-step <s>]
 * ```
 *
 * This is the only layer that catches errors: each failure is printed once
 * as `[<LABEL> ERROR] message` and mapped to an exit code.
 *
 * @module cli/commands
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { parseArgs } from 'util';
import { default_plugin } from '../calibration/plugin';
import { DEFAULT_CSV_DELIMITER, EXIT_FAILURE, EXIT_OK, EXIT_USAGE } from '../protocol/constants';
import { ERROR_LABELS, PluginError, SatframeError } from '../protocol/errors';
import type { CalibrationPlugin } from '../protocol/types';
import { run_reader } from '../run/reader_run';
import { find_obt_candidates } from '../tools/obt_search';

export const USAGE = [
  'Usage:',
  '  satframe decode --schema <xml> --input <bin> --output <csv> [--plugin <module.js>] [--csv-delimiter <c>]',
  '  satframe search-obt --input <bin> --frame-size <n> [--min-obt <s>] [--max-obt <s>] [--max-step <s>]'
].join('\n');

/** Bad command line; reported with the usage text and exit code 2. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Run one CLI invocation.
 *
 * @param argv - Arguments after the executable and script path.
 * @returns The process exit code.
 */
export async function run_cli(argv: readonly string[]): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case 'decode':
        return await decode_command(rest);
      case 'search-obt':
        return await search_obt_command(rest);
      case '-h':
      case '--help':
      case 'help':
        console.log(USAGE);
        return EXIT_OK;
      case undefined:
        throw new UsageError('Missing command');
      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (err) {
    return report(err);
  }
}

function report(err: unknown): number {
  if (err instanceof UsageError) {
    console.error(`[USAGE ERROR] ${err.message}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }
  if (err instanceof SatframeError) {
    console.error(`[${ERROR_LABELS[err.category]} ERROR] ${err.message}`);
    return EXIT_FAILURE;
  }
  console.error(`[ERROR] ${err instanceof Error ? err.message : String(err)}`);
  return EXIT_FAILURE;
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

type ParsedValues = Record<string, string | boolean | Array<string | boolean> | undefined>;

function parse_options(
  args: readonly string[],
  names: readonly string[]
): ParsedValues {
  const options: Record<string, { type: 'string' }> = {};
  for (const name of names) options[name] = { type: 'string' };
  try {
    return parseArgs({ args: [...args], options, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function optional_string(values: ParsedValues, name: string): string | undefined {
  const value = values[name];
  return typeof value === 'string' ? value : undefined;
}

function required_string(values: ParsedValues, name: string): string {
  const value = optional_string(values, name);
  if (value === undefined || value === '') {
    throw new UsageError(`--${name} is required`);
  }
  return value;
}

function optional_integer(values: ParsedValues, name: string): number | undefined {
  const text = optional_string(values, name);
  if (text === undefined) return undefined;
  if (!/^[+-]?\d+$/.test(text)) {
    throw new UsageError(`--${name} must be an integer, got '${text}'`);
  }
  return Number.parseInt(text, 10);
}

function parse_delimiter(text: string | undefined): string {
  if (text === undefined) return DEFAULT_CSV_DELIMITER;
  const delimiter = text === '\\t' ? '\t' : text;
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\r' || delimiter === '\n') {
    throw new UsageError(`--csv-delimiter must be a single character other than a quote or newline, got '${text}'`);
  }
  return delimiter;
}

/** Load a CommonJS module of calibration functions, merged over the built-ins. */
function load_plugin_module(path: string): CalibrationPlugin {
  const full_path = resolve(path);
  let loaded: unknown;
  try {
    loaded = require(full_path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PluginError(path, `Cannot load calibration plugin from ${path}: ${message}`, { cause: err });
  }
  if (typeof loaded !== 'object' || loaded === null) {
    throw new PluginError(path, `Calibration plugin ${path} must export an object of functions`);
  }
  const table = Object.fromEntries(Object.entries(loaded));
  console.log(`[PLUGIN] Loaded ${Object.keys(table).length} exports from ${full_path}`);
  return default_plugin(table);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function decode_command(args: readonly string[]): Promise<number> {
  const values = parse_options(args, ['schema', 'input', 'output', 'plugin', 'csv-delimiter']);
  const schema_path = required_string(values, 'schema');
  const input_path = required_string(values, 'input');
  const output_path = required_string(values, 'output');
  const delimiter = parse_delimiter(optional_string(values, 'csv-delimiter'));

  const plugin_path = optional_string(values, 'plugin');
  const plugin = plugin_path !== undefined ? load_plugin_module(plugin_path) : default_plugin();

  await run_reader({ schema_path, input_path, output_path, plugin, delimiter });
  return EXIT_OK;
}

async function search_obt_command(args: readonly string[]): Promise<number> {
  const values = parse_options(args, ['input', 'frame-size', 'min-obt', 'max-obt', 'max-step']);
  const input_path = required_string(values, 'input');
  const frame_size = optional_integer(values, 'frame-size');
  if (frame_size === undefined) throw new UsageError('--frame-size is required');

  const data = await readFile(input_path);
  const result = find_obt_candidates(new Uint8Array(data.buffer, data.byteOffset, data.length), {
    frame_size,
    min_obt: optional_integer(values, 'min-obt'),
    max_obt: optional_integer(values, 'max-obt'),
    max_step_s: optional_integer(values, 'max-step')
  });

  console.log(`[OBT] Searched ${result.frame_count} frames of ${frame_size} bytes`);
  for (const c of result.initial) {
    console.log(`[OBT] ${c.offset} is a candidate: ${c.first_value} (${c.first_time.toISOString()})`);
  }
  for (const r of result.rejected) {
    console.log(`[OBT] ${r.offset} fails at frame ${r.frame_index}: value ${r.value}, previous ${r.previous}`);
  }
  console.log(`[OBT] Surviving offsets: [${result.candidates.map((c) => c.offset).join(', ')}]`);
  return EXIT_OK;
}
