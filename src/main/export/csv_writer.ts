/**
 * CSV serialisation of decoded rows.
 *
 * Header is the schema's column keys. Cells containing the delimiter, a
 * quote, CR or LF are quoted, with inner quotes doubled. Lines end in CRLF.
 *
 * @module export/csv_writer
 */

import { createWriteStream, type WriteStream } from 'fs';
import { writeFile } from 'fs/promises';
import { once } from 'events';
import { finished } from 'stream/promises';
import { CSV_LINE_TERMINATOR, CSV_QUOTE, DEFAULT_CSV_DELIMITER } from '../protocol/constants';
import type { Row, RowValue } from '../protocol/types';

/** Text of one cell, before quoting. */
export function format_cell(value: RowValue | undefined): string {
  if (value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  return String(value);
}

function quote_cell(text: string, delimiter: string): string {
  const needs_quotes =
    text.includes(delimiter) || text.includes(CSV_QUOTE) || text.includes('\r') || text.includes('\n');
  if (!needs_quotes) return text;
  return CSV_QUOTE + text.split(CSV_QUOTE).join(CSV_QUOTE + CSV_QUOTE) + CSV_QUOTE;
}

/** One CSV line, terminator included. */
export function format_csv_line(cells: readonly string[], delimiter: string = DEFAULT_CSV_DELIMITER): string {
  return cells.map((cell) => quote_cell(cell, delimiter)).join(delimiter) + CSV_LINE_TERMINATOR;
}

/** One row as a CSV line, cells in `columns` order. */
export function format_row(row: Row, columns: readonly string[], delimiter: string = DEFAULT_CSV_DELIMITER): string {
  return format_csv_line(columns.map((key) => format_cell(row.get(key))), delimiter);
}

/**
 * Incremental CSV writer over a file stream. Writes the header on open and
 * respects back-pressure on every row. A write failure is kept and
 * rethrown by the next `write_row` or `close`.
 *
 * Usage:
 * ```ts
 * const writer = await CsvWriter.open('out.csv', columns);
 * await writer.write_row(row);
 * await writer.close();
 * ```
 */
export class CsvWriter {
  private rows_written = 0;
  private failure: Error | null = null;

  private constructor(
    private readonly stream: WriteStream,
    private readonly columns: readonly string[],
    private readonly delimiter: string
  ) {
    this.stream.on('error', (err) => {
      this.failure ??= err;
    });
  }

  /** Create (or truncate) `path` and write the header line. */
  static async open(
    path: string,
    columns: readonly string[],
    delimiter: string = DEFAULT_CSV_DELIMITER
  ): Promise<CsvWriter> {
    const stream = createWriteStream(path, { encoding: 'utf-8' });
    await once(stream, 'open');
    const writer = new CsvWriter(stream, columns, delimiter);
    await writer.write_line(format_csv_line(columns, delimiter));
    return writer;
  }

  get row_count(): number {
    return this.rows_written;
  }

  async write_row(row: Row): Promise<void> {
    await this.write_line(format_row(row, this.columns, this.delimiter));
    this.rows_written++;
  }

  /** Flush and close the file. */
  async close(): Promise<void> {
    if (this.failure) throw this.failure;
    this.stream.end();
    await finished(this.stream);
  }

  /** Abandon the file after a failure; buffered data is discarded. */
  destroy(): void {
    this.stream.destroy();
  }

  private async write_line(line: string): Promise<void> {
    if (this.failure) throw this.failure;
    if (!this.stream.write(line)) {
      await once(this.stream, 'drain');
    }
  }
}

/**
 * Write all rows to `path` in one go.
 *
 * With no rows the file is created empty, without a header.
 */
export async function write_csv_from_rows(
  path: string,
  rows: readonly Row[],
  columns: readonly string[],
  delimiter: string = DEFAULT_CSV_DELIMITER
): Promise<void> {
  if (rows.length === 0) {
    await writeFile(path, '');
    return;
  }
  const writer = await CsvWriter.open(path, columns, delimiter);
  try {
    for (const row of rows) await writer.write_row(row);
  } catch (err) {
    writer.destroy();
    throw err;
  }
  await writer.close();
}
