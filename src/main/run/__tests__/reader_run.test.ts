import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { run_reader, sort_rows } from '../reader_run';
import { FrameSizeError, SchemaError } from '../../protocol/errors';
import type { Row, RowValue } from '../../protocol/types';
import {
  HK_FRAME_0,
  HK_FRAME_1,
  HK_HEADER,
  HK_LINE_0,
  HK_LINE_1,
  build_dump,
  build_hk_frame,
  hk_schema_xml,
  type HkSettings
} from '../../../../test/fixtures/frames';

describe('run_reader', () => {
  let dir: string;
  let case_index = 0;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'satframe-run-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  /** Write a schema and dump, run, and return the CSV text. */
  async function run_case(settings: HkSettings, dump: Uint8Array): Promise<{ csv: string; rows: number; mode: string }> {
    case_index++;
    const schema_path = join(dir, `schema_${case_index}.xml`);
    const input_path = join(dir, `dump_${case_index}.bin`);
    const output_path = join(dir, `out_${case_index}.csv`);
    await writeFile(schema_path, hk_schema_xml(settings));
    await writeFile(input_path, dump);

    const result = await run_reader({ schema_path, input_path, output_path });
    return { csv: await readFile(output_path, 'utf-8'), ...result };
  }

  const dump = build_dump([build_hk_frame(HK_FRAME_0), build_hk_frame(HK_FRAME_1)]);
  const expected_csv = `${HK_HEADER}\r\n${HK_LINE_0}\r\n${HK_LINE_1}\r\n`;

  it('decodes in memory', async () => {
    const result = await run_case({ read_in_memory: true, include_frame_index: true }, dump);
    expect(result.mode).toBe('in_memory');
    expect(result.rows).toBe(2);
    expect(result.csv).toBe(expected_csv);
  });

  it('decodes streaming with the same output', async () => {
    const result = await run_case({ read_in_memory: false, include_frame_index: true }, dump);
    expect(result.mode).toBe('streaming');
    expect(result.rows).toBe(2);
    expect(result.csv).toBe(expected_csv);
  });

  it('sorts by the sort_by column', async () => {
    const reversed = build_dump([build_hk_frame(HK_FRAME_1), build_hk_frame(HK_FRAME_0)]);
    const result = await run_case({ read_in_memory: true, include_frame_index: true, sort_by: 'CDH.OBT' }, reversed);
    const lines = result.csv.split('\r\n');
    expect(lines[1].startsWith('1,1116547200,')).toBe(true);
    expect(lines[2].startsWith('0,1116547208,')).toBe(true);
  });

  it('writes an empty file for an empty dump in memory', async () => {
    const result = await run_case({ read_in_memory: true, include_frame_index: true }, new Uint8Array(0));
    expect(result.csv).toBe('');
  });

  it('writes only the header for an empty dump when streaming', async () => {
    const result = await run_case({ read_in_memory: false, include_frame_index: true }, new Uint8Array(0));
    expect(result.csv).toBe(`${HK_HEADER}\r\n`);
  });

  it('rejects a dump that is not a whole number of frames', async () => {
    await expect(
      run_case({ read_in_memory: false, include_frame_index: false }, new Uint8Array(4001))
    ).rejects.toThrow(new FrameSizeError('Input size 4001 is not a multiple of frame size 4000 (1 trailing bytes)', 4000, 4001));
  });

  it('rejects a sort_by column the schema does not have', async () => {
    await expect(
      run_case({ read_in_memory: true, include_frame_index: false, sort_by: 'CDH.missing' }, dump)
    ).rejects.toBeInstanceOf(SchemaError);
  });

  it('fails when the input file does not exist', async () => {
    const schema_path = join(dir, 'lonely.xml');
    await writeFile(schema_path, hk_schema_xml({ read_in_memory: true, include_frame_index: false }));
    await expect(
      run_reader({ schema_path, input_path: join(dir, 'nope.bin'), output_path: join(dir, 'nope.csv') })
    ).rejects.toThrow(`Input file not found: ${join(dir, 'nope.bin')}`);
  });
});

describe('sort_rows', () => {
  const rows: Row[] = [
    new Map<string, RowValue>([['k', 3], ['tag', 'a']]),
    new Map<string, RowValue>([['k', 1], ['tag', 'b']]),
    new Map<string, RowValue>([['k', 3], ['tag', 'c']]),
    new Map<string, RowValue>([['k', 2], ['tag', 'd']])
  ];

  it('is stable for equal keys', () => {
    expect(sort_rows(rows, ['k', 'tag'], 'k').map((r) => r.get('tag'))).toEqual(['b', 'd', 'a', 'c']);
  });

  it('does not reorder its input', () => {
    sort_rows(rows, ['k', 'tag'], 'k');
    expect(rows.map((r) => r.get('tag'))).toEqual(['a', 'b', 'c', 'd']);
  });

  it('orders dates chronologically', () => {
    const dated: Row[] = [new Map([['t', new Date(2000)]]), new Map([['t', new Date(1000)]])];
    expect(sort_rows(dated, ['t'], 't').map((r) => r.get('t'))).toEqual([new Date(1000), new Date(2000)]);
  });
});
