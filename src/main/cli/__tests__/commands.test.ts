import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { run_cli, USAGE } from '../commands';
import {
  HK_FRAME_0,
  HK_FRAME_1,
  HK_HEADER,
  build_dump,
  build_hk_frame,
  hk_schema_xml
} from '../../../../test/fixtures/frames';

describe('run_cli', () => {
  let dir: string;
  let schema_path: string;
  let input_path: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'satframe-cli-'));
    schema_path = join(dir, 'hk.xml');
    input_path = join(dir, 'hk.bin');
    await writeFile(schema_path, hk_schema_xml({ read_in_memory: false, include_frame_index: false }));
    await writeFile(input_path, build_dump([build_hk_frame(HK_FRAME_0), build_hk_frame(HK_FRAME_1)]));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // --- Usage -----------------------------------------------------------------

  it('prints usage for --help', async () => {
    expect(await run_cli(['--help'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(USAGE);
  });

  it('exits 2 without a command', async () => {
    expect(await run_cli([])).toBe(2);
    expect(console.error).toHaveBeenCalledWith('[USAGE ERROR] Missing command');
  });

  it('exits 2 on an unknown command', async () => {
    expect(await run_cli(['plot'])).toBe(2);
    expect(console.error).toHaveBeenCalledWith("[USAGE ERROR] Unknown command 'plot'");
  });

  it('exits 2 when a required option is missing', async () => {
    expect(await run_cli(['decode', '--schema', schema_path])).toBe(2);
    expect(console.error).toHaveBeenCalledWith('[USAGE ERROR] --input is required');
  });

  it('exits 2 on an unknown option', async () => {
    expect(await run_cli(['decode', '--verbose'])).toBe(2);
  });

  it('exits 2 on a multi-character delimiter', async () => {
    const args = ['decode', '--schema', schema_path, '--input', input_path, '--output', join(dir, 'x.csv')];
    expect(await run_cli([...args, '--csv-delimiter', ';;'])).toBe(2);
  });

  // --- decode ----------------------------------------------------------------

  it('decodes a dump to CSV', async () => {
    const output = join(dir, 'out.csv');
    expect(await run_cli(['decode', '--schema', schema_path, '--input', input_path, '--output', output])).toBe(0);

    const lines = (await readFile(output, 'utf-8')).split('\r\n');
    expect(lines[0]).toBe(HK_HEADER.replace('frame_index,', ''));
    expect(lines).toHaveLength(4);
  });

  it('uses the requested delimiter', async () => {
    const output = join(dir, 'semi.csv');
    const code = await run_cli([
      'decode', '--schema', schema_path, '--input', input_path, '--output', output, '--csv-delimiter', ';'
    ]);
    expect(code).toBe(0);
    const [header] = (await readFile(output, 'utf-8')).split('\r\n');
    expect(header).toBe('CDH.OBT;CDH.OBT_UTC;CDH.mode;PCS.vBatAverage;PCS.tempBoard;COM.callsign');
  });

  it('prints a labelled error and exits 1 on a decode failure', async () => {
    const short_input = join(dir, 'short.bin');
    await writeFile(short_input, new Uint8Array(4001));
    const code = await run_cli(['decode', '--schema', schema_path, '--input', short_input, '--output', join(dir, 'y.csv')]);
    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '[FRAME SIZE ERROR] Input size 4001 is not a multiple of frame size 4000 (1 trailing bytes)'
    );
  });

  it('prints a schema error with its label', async () => {
    const bad_schema = join(dir, 'bad.xml');
    await writeFile(bad_schema, '<frames/>');
    const code = await run_cli(['decode', '--schema', bad_schema, '--input', input_path, '--output', join(dir, 'z.csv')]);
    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith('[SCHEMA ERROR] Root element must be <schema>');
  });

  // --- search-obt ------------------------------------------------------------

  it('searches for OBT candidates', async () => {
    const code = await run_cli(['search-obt', '--input', input_path, '--frame-size', '4000']);
    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith('[OBT] Searched 2 frames of 4000 bytes');
    expect(console.log).toHaveBeenCalledWith('[OBT] Surviving offsets: [4]');
  });

  it('exits 2 on a non-numeric frame size', async () => {
    expect(await run_cli(['search-obt', '--input', input_path, '--frame-size', 'big'])).toBe(2);
    expect(console.error).toHaveBeenCalledWith("[USAGE ERROR] --frame-size must be an integer, got 'big'");
  });
});
