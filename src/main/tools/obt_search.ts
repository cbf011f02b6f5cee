/**
 * On-board time (OBT) field search.
 *
 * Looks for 32-bit big-endian counters that hold a plausible OBT in the
 * first frame and keep advancing at roughly the frame rate through the
 * rest of the dump. Useful for locating the time field of an undocumented
 * frame layout before writing its schema.
 *
 * @module tools/obt_search
 */

import {
  OBT_EPOCH_MS,
  OBT_SEARCH_MAX,
  OBT_SEARCH_MAX_STEP_S,
  OBT_SEARCH_MIN
} from '../protocol/constants';
import { FrameSizeError } from '../protocol/errors';

const OBT_WIDTH = 4;

export interface ObtSearchOptions {
  frame_size: number;
  /** Smallest accepted OBT in seconds. */
  min_obt?: number;
  /** Largest accepted OBT in seconds. */
  max_obt?: number;
  /** Largest tolerated jump beyond the expected step, in seconds. */
  max_step_s?: number;
}

export interface ObtCandidate {
  offset: number;
  /** Value in the first frame. */
  first_value: number;
  first_time: Date;
}

/** A first-frame candidate that a later frame ruled out. */
export interface ObtRejection {
  offset: number;
  frame_index: number;
  value: number;
  previous: number;
}

export interface ObtSearchResult {
  frame_count: number;
  /** First-frame candidates, before refinement. */
  initial: ObtCandidate[];
  /** Candidates that survived every frame. */
  candidates: ObtCandidate[];
  rejected: ObtRejection[];
}

/** UTC date of an OBT in seconds. */
export function obt_to_date(seconds: number): Date {
  return new Date(OBT_EPOCH_MS + seconds * 1000);
}

function read_u32_be(data: Uint8Array, offset: number): number {
  return new DataView(data.buffer, data.byteOffset + offset, OBT_WIDTH).getUint32(0, false);
}

/**
 * Search `data` for OBT counters.
 *
 * Only whole frames are searched; trailing bytes are ignored.
 *
 * @throws FrameSizeError if `frame_size` is not a positive integer or
 *   smaller than a counter.
 */
export function find_obt_candidates(data: Uint8Array, options: ObtSearchOptions): ObtSearchResult {
  const { frame_size } = options;
  const min_obt = options.min_obt ?? OBT_SEARCH_MIN;
  const max_obt = options.max_obt ?? OBT_SEARCH_MAX;
  const max_step_s = options.max_step_s ?? OBT_SEARCH_MAX_STEP_S;

  if (!Number.isInteger(frame_size) || frame_size < OBT_WIDTH) {
    throw new FrameSizeError(
      `Frame size must be an integer of at least ${OBT_WIDTH} bytes, got ${frame_size}`,
      OBT_WIDTH,
      frame_size
    );
  }

  const frame_count = Math.floor(data.length / frame_size);
  const result: ObtSearchResult = { frame_count, initial: [], candidates: [], rejected: [] };
  if (frame_count === 0) return result;

  for (let offset = 0; offset + OBT_WIDTH <= frame_size; offset++) {
    const value = read_u32_be(data, offset);
    if (value >= min_obt && value <= max_obt) {
      result.initial.push({ offset, first_value: value, first_time: obt_to_date(value) });
    }
  }

  for (const candidate of result.initial) {
    const rejection = refine(data, frame_size, frame_count, candidate.offset, max_step_s);
    if (rejection) {
      result.rejected.push(rejection);
    } else {
      result.candidates.push(candidate);
    }
  }
  return result;
}

/**
 * Follow one offset through the dump. The drift test compares each value
 * with the previous value plus the frame index.
 */
function refine(
  data: Uint8Array,
  frame_size: number,
  frame_count: number,
  offset: number,
  max_step_s: number
): ObtRejection | null {
  let previous = read_u32_be(data, offset);
  for (let i = 1; i < frame_count; i++) {
    const value = read_u32_be(data, i * frame_size + offset);
    if (value - (previous + i) > max_step_s) {
      return { offset, frame_index: i, value, previous };
    }
    previous = value;
  }
  return null;
}
