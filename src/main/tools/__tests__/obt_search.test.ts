import { describe, it, expect } from 'vitest';
import { find_obt_candidates, obt_to_date } from '../obt_search';
import { FrameSizeError } from '../../protocol/errors';

const FRAME_SIZE = 16;

/**
 * Frames with a real OBT counter at offset 4 (+8 s per frame) and a decoy at
 * offset 12 that starts in range but jumps by 1000 s per frame.
 */
function build_dump(frame_count: number): Uint8Array {
  const data = new Uint8Array(FRAME_SIZE * frame_count);
  const view = new DataView(data.buffer);
  for (let i = 0; i < frame_count; i++) {
    view.setUint32(i * FRAME_SIZE + 4, 1_116_547_300 + 8 * i, false);
    view.setUint32(i * FRAME_SIZE + 12, 1_116_547_400 + 1000 * i, false);
  }
  return data;
}

describe('find_obt_candidates', () => {
  it('finds in-range values in the first frame', () => {
    const result = find_obt_candidates(build_dump(1), { frame_size: FRAME_SIZE });
    expect(result.initial.map((c) => [c.offset, c.first_value])).toEqual([
      [4, 1_116_547_300],
      [12, 1_116_547_400]
    ]);
  });

  it('keeps a steadily advancing counter and drops a jumping one', () => {
    const result = find_obt_candidates(build_dump(3), { frame_size: FRAME_SIZE });
    expect(result.frame_count).toBe(3);
    expect(result.candidates.map((c) => c.offset)).toEqual([4]);
    expect(result.rejected).toEqual([
      { offset: 12, frame_index: 1, value: 1_116_548_400, previous: 1_116_547_400 }
    ]);
  });

  it('reports the first value as a UTC date', () => {
    const [candidate] = find_obt_candidates(build_dump(1), { frame_size: FRAME_SIZE }).candidates;
    expect(candidate.first_time.toISOString()).toBe('2015-05-25T00:01:40.000Z');
  });

  it('honours custom bounds and step', () => {
    const result = find_obt_candidates(build_dump(3), {
      frame_size: FRAME_SIZE,
      min_obt: 1_116_547_350,
      max_step_s: 2000
    });
    expect(result.candidates.map((c) => c.offset)).toEqual([12]);
  });

  it('ignores trailing bytes and returns nothing without a whole frame', () => {
    expect(find_obt_candidates(new Uint8Array(10), { frame_size: FRAME_SIZE }).initial).toEqual([]);
  });

  it('rejects a frame smaller than the counter', () => {
    expect(() => find_obt_candidates(new Uint8Array(8), { frame_size: 3 })).toThrow(FrameSizeError);
  });
});

describe('obt_to_date', () => {
  it('counts from 1980-01-06', () => {
    expect(obt_to_date(0).toISOString()).toBe('1980-01-06T00:00:00.000Z');
  });
});
