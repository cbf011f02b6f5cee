/**
 * Constants for the satframe decoder, schema loader and tools.
 *
 * @module protocol/constants
 */

import type { NumericTypeTag } from './types';

// ---------------------------------------------------------------------------
// Type codec
// ---------------------------------------------------------------------------

/** Byte width of every fixed-width type tag. */
export const NUMERIC_TYPE_SIZES: Record<NumericTypeTag, number> = {
  u8: 1,
  i8: 1,
  u16: 2,
  i16: 2,
  u32: 4,
  i32: 4,
  u64: 8,
  i64: 8,
  f32: 4,
  float32: 4,
  f64: 8,
  float64: 8
};

/** Type tag of the variable-length raw byte type. */
export const BYTES_TYPE = 'bytes';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** Attribute spellings accepted as boolean true in schema documents. */
export const TRUTH_STRINGS: ReadonlySet<string> = new Set(['true', 'yes', '1']);

/** Attribute spellings accepted as boolean false in schema documents. */
export const FALSE_STRINGS: ReadonlySet<string> = new Set(['false', 'no', '0']);

/** Byte order used when `<schema_settings>` has no `endian` attribute. */
export const DEFAULT_ENDIAN = 'little';

/** Largest `round` value; the rounding primitive accepts 0..100 digits. */
export const MAX_ROUND_DIGITS = 100;

// ---------------------------------------------------------------------------
// CSV output
// ---------------------------------------------------------------------------

export const DEFAULT_CSV_DELIMITER = ',';

export const CSV_QUOTE = '"';

export const CSV_LINE_TERMINATOR = '\r\n';

// ---------------------------------------------------------------------------
// On-board time
// ---------------------------------------------------------------------------

/** OBT epoch: 1980-01-06T00:00:00Z, in milliseconds since the Unix epoch. */
export const OBT_EPOCH_MS = Date.UTC(1980, 0, 6, 0, 0, 0);

/** Default lower bound of the OBT candidate search (2015-05-25). */
export const OBT_SEARCH_MIN = 1_116_547_200;

/** Default upper bound of the OBT candidate search (2015-06-09). */
export const OBT_SEARCH_MAX = 1_117_843_200;

/** Default tolerated OBT drift between consecutive frames, in seconds. */
export const OBT_SEARCH_MAX_STEP_S = 8;

// ---------------------------------------------------------------------------
// CLI exit codes
// ---------------------------------------------------------------------------

export const EXIT_OK = 0;

export const EXIT_FAILURE = 1;

export const EXIT_USAGE = 2;
