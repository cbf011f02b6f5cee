/**
 * End-to-end decode run: schema file + dump file in, CSV file out.
 *
 * The schema's `read_in_memory` setting picks the path. The in-memory path
 * reads the whole dump, decodes it, optionally sorts by `sort_by` and
 * writes the CSV. The streaming path decodes and writes frame by frame.
 * Either way the first error aborts the run.
 *
 * @module run/reader_run
 */

import { stat, readFile } from 'fs/promises';
import { default_plugin } from '../calibration/plugin';
import { CsvWriter, write_csv_from_rows } from '../export/csv_writer';
import { DEFAULT_CSV_DELIMITER } from '../protocol/constants';
import { FrameSizeError, SchemaError } from '../protocol/errors';
import { column_keys, decode_frame, decode_frames } from '../protocol/frame_decoder';
import type { CalibrationPlugin, Row, RowValue, Schema } from '../protocol/types';
import { load_schema } from '../schema/schema_loader';
import { read_frames } from '../transport/frame_stream';

export interface ReaderRunOptions {
  schema_path: string;
  input_path: string;
  output_path: string;
  /** Defaults to the built-in calibration functions. */
  plugin?: CalibrationPlugin;
  delimiter?: string;
}

export interface ReaderRunResult {
  rows: number;
  mode: 'in_memory' | 'streaming';
}

/**
 * Decode `input_path` with the schema at `schema_path` into `output_path`.
 *
 * @throws SchemaError, FrameSizeError or any decode error of the first
 *   failing frame.
 */
export async function run_reader(options: ReaderRunOptions): Promise<ReaderRunResult> {
  const plugin = options.plugin ?? default_plugin();
  const delimiter = options.delimiter ?? DEFAULT_CSV_DELIMITER;

  const schema = await load_schema(options.schema_path);
  const size = await input_size(options.input_path);

  if (size % schema.frame_size !== 0) {
    throw new FrameSizeError(
      `Input size ${size} is not a multiple of frame size ${schema.frame_size} ` +
        `(${size % schema.frame_size} trailing bytes)`,
      schema.frame_size,
      size
    );
  }

  console.log(
    `[READER] ${options.input_path}: ${size / schema.frame_size} frames of ${schema.frame_size} bytes, ` +
      (schema.read_in_memory ? 'in memory' : 'streaming')
  );

  const result = schema.read_in_memory
    ? await run_in_memory(schema, plugin, options.input_path, options.output_path, delimiter)
    : await run_streaming(schema, plugin, options.input_path, options.output_path, delimiter);

  console.log(`[READER] Wrote ${result.rows} rows to ${options.output_path}`);
  return result;
}

async function input_size(path: string): Promise<number> {
  try {
    const info = await stat(path);
    if (!info.isFile()) throw new Error(`Input path is not a file: ${path}`);
    return info.size;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new Error(`Input file not found: ${path}`, { cause: err });
    }
    throw err;
  }
}

async function run_in_memory(
  schema: Schema,
  plugin: CalibrationPlugin,
  input_path: string,
  output_path: string,
  delimiter: string
): Promise<ReaderRunResult> {
  const columns = column_keys(schema);
  const data = await readFile(input_path);
  let rows = decode_frames(new Uint8Array(data.buffer, data.byteOffset, data.length), schema, plugin);

  if (schema.sort_by !== undefined) {
    rows = sort_rows(rows, columns, schema.sort_by);
  }

  await write_csv_from_rows(output_path, rows, columns, delimiter);
  return { rows: rows.length, mode: 'in_memory' };
}

async function run_streaming(
  schema: Schema,
  plugin: CalibrationPlugin,
  input_path: string,
  output_path: string,
  delimiter: string
): Promise<ReaderRunResult> {
  const writer = await CsvWriter.open(output_path, column_keys(schema), delimiter);
  let frame_index = 0;

  try {
    for await (const frame of read_frames(input_path, schema.frame_size)) {
      await writer.write_row(decode_frame(frame, schema, plugin, frame_index));
      frame_index++;
    }
  } catch (err) {
    writer.destroy();
    throw err;
  }

  await writer.close();
  return { rows: writer.row_count, mode: 'streaming' };
}

// ---------------------------------------------------------------------------
// Sorting
// ---------------------------------------------------------------------------

function sort_key(value: RowValue | undefined): number | bigint | string {
  if (value === undefined) return '';
  if (value instanceof Date) return value.getTime();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function compare_values(a: RowValue | undefined, b: RowValue | undefined): number {
  const ka = sort_key(a);
  const kb = sort_key(b);
  if (typeof ka === 'string' || typeof kb === 'string') {
    const sa = String(ka);
    const sb = String(kb);
    return sa < sb ? -1 : sa > sb ? 1 : 0;
  }
  if (ka < kb) return -1;
  if (ka > kb) return 1;
  return 0;
}

/**
 * Stable sort of rows by one column.
 *
 * @throws SchemaError if `sort_by` is not one of the schema's columns.
 */
export function sort_rows(rows: readonly Row[], columns: readonly string[], sort_by: string): Row[] {
  if (!columns.includes(sort_by)) {
    throw new SchemaError(`sort_by column '${sort_by}' not found in schema columns`);
  }
  return [...rows].sort((a, b) => compare_values(a.get(sort_by), b.get(sort_by)));
}
