import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { read_frames } from '../frame_stream';
import { FrameSizeError } from '../../protocol/errors';

async function collect(path: string, frame_size: number): Promise<Uint8Array[]> {
  const frames: Uint8Array[] = [];
  for await (const frame of read_frames(path, frame_size)) frames.push(frame);
  return frames;
}

describe('read_frames', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'satframe-stream-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('yields whole frames in file order', async () => {
    const path = join(dir, 'small.bin');
    await writeFile(path, Buffer.from([1, 2, 3, 4, 5, 6]));
    const frames = await collect(path, 2);
    expect(frames.map((f) => Array.from(f))).toEqual([
      [1, 2],
      [3, 4],
      [5, 6]
    ]);
  });

  it('reassembles frames split across read chunks', async () => {
    const frame_size = 4000;
    const count = 40;
    const data = Buffer.alloc(frame_size * count);
    for (let i = 0; i < count; i++) data.writeUInt32BE(i, i * frame_size + 3996);

    const path = join(dir, 'large.bin');
    await writeFile(path, data);
    const frames = await collect(path, frame_size);

    expect(frames).toHaveLength(count);
    frames.forEach((frame, i) => {
      expect(frame.length).toBe(frame_size);
      expect(Buffer.from(frame).readUInt32BE(3996)).toBe(i);
    });
  });

  it('yields nothing for an empty file', async () => {
    const path = join(dir, 'empty.bin');
    await writeFile(path, Buffer.alloc(0));
    expect(await collect(path, 8)).toEqual([]);
  });

  it('fails on a partial trailing frame after the whole ones', async () => {
    const path = join(dir, 'partial.bin');
    await writeFile(path, Buffer.from([1, 2, 3, 4, 5]));
    const seen: number[][] = [];
    let failure: unknown;
    try {
      for await (const frame of read_frames(path, 2)) seen.push(Array.from(frame));
    } catch (err) {
      failure = err;
    }
    expect(seen).toEqual([
      [1, 2],
      [3, 4]
    ]);
    expect(failure).toBeInstanceOf(FrameSizeError);
    expect(failure instanceof FrameSizeError && failure.message).toBe(
      'Partial frame at end of input: 1 of 2 bytes [frame 2]'
    );
  });
});
