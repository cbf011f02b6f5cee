/**
 * Schema and row types for the satframe frame decoder.
 *
 * A {@link Schema} describes one fixed-size telemetry frame as an ordered
 * list of subsystems, each owning an ordered list of typed fields. The
 * decoder walks it in declaration order and produces one {@link Row} per
 * frame.
 *
 * @module protocol/types
 */

// ---------------------------------------------------------------------------
// Type tags
// ---------------------------------------------------------------------------

/** Fixed-width numeric type tags understood by the codec. */
export type NumericTypeTag =
  | 'u8'
  | 'i8'
  | 'u16'
  | 'i16'
  | 'u32'
  | 'i32'
  | 'u64'
  | 'i64'
  | 'f32'
  | 'float32'
  | 'f64'
  | 'float64';

/** Variable-length raw byte type; its size comes from `byte_length`. */
export type BytesTypeTag = 'bytes';

export type TypeTag = NumericTypeTag | BytesTypeTag;

/** Byte order applied to every numeric field of a frame. */
export type Endian = 'little' | 'big';

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/**
 * A value as decoded straight from the frame bytes.
 *
 * 64-bit integers decode to `bigint` so that no precision is lost.
 */
export type RawValue = number | bigint | Uint8Array;

/** A value after calibration. Plugin functions may return any of these. */
export type CalibratedValue = number | bigint | Uint8Array | string | boolean | Date;

/** One cell of a decoded row. */
export type RowValue = CalibratedValue;

/**
 * One decoded frame, keyed `"<subsystem>.<field>"`, with an optional
 * leading `frame_index` entry. Insertion order is column order.
 */
export type Row = Map<string, RowValue>;

/** Column key of the synthetic frame index. */
export const FRAME_INDEX_KEY = 'frame_index';

// ---------------------------------------------------------------------------
// Schema model
// ---------------------------------------------------------------------------

/** A single typed value at a fixed offset within a subsystem. */
export interface Field {
  /** Unique within its subsystem. */
  name: string;
  type: TypeTag;
  /** Byte offset relative to the subsystem start. */
  offset: number;
  /** Length in bytes; required when `type` is `'bytes'`. */
  byte_length?: number;
  /** Calibration expression over `raw`. Never set together with `calibration_function`. */
  calibration_expression?: string;
  /** Name of a plugin calibration function. */
  calibration_function?: string;
  /** Engineering units, display only. */
  units?: string;
  /** Decimal digits to round numeric calibrated values to. */
  round_digits?: number;
}

/**
 * A named byte region of the frame. Identity is `(name, offset)`; the
 * field list is content.
 */
export interface Subsystem {
  name: string;
  /** Byte offset relative to the frame start. */
  offset: number;
  fields: readonly Field[];
}

/** Validated, immutable description of a frame layout and read policy. */
export interface Schema {
  /** Bytes per frame. */
  frame_size: number;
  default_endian: Endian;
  /** Prepend a `frame_index` column to every row. */
  include_frame_index: boolean;
  /** Buffer the whole dump in memory instead of streaming frame by frame. */
  read_in_memory: boolean;
  /** Column key to sort rows by; only valid with `read_in_memory`. */
  sort_by?: string;
  subsystems: readonly Subsystem[];
}

// ---------------------------------------------------------------------------
// Plugin capability
// ---------------------------------------------------------------------------

/** A calibration function exposed through a plugin. */
export type CalibrationFunction = (raw: RawValue) => CalibratedValue;

/**
 * Calibration functions supplied by the caller. The decoder only ever
 * calls through this interface; it never loads code itself.
 */
export interface CalibrationPlugin {
  /** True if `name` is present and callable. */
  has(name: string): boolean;
  /**
   * Invoke `name` on a raw value.
   *
   * @throws PluginError if `name` is absent or not callable.
   */
  call(name: string, raw: RawValue): CalibratedValue;
}

// ---------------------------------------------------------------------------
// Error context
// ---------------------------------------------------------------------------

/** Where in the schema and frame an error was raised. */
export interface DecodeContext {
  frame_index?: number;
  subsystem?: string;
  field?: string;
  /** Absolute byte offset within the frame. */
  offset?: number;
  size?: number;
  raw?: RawValue;
}
