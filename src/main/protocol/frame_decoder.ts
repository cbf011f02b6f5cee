/**
 * Schema-driven frame decoder.
 *
 * Turns one fixed-size frame into a row of calibrated values, walking
 * subsystems and fields in declared order. Decoding is all-or-nothing: the
 * first failing field aborts the frame with an error that carries the frame
 * index, subsystem, field, absolute offset and raw value.
 *
 * @module protocol/frame_decoder
 */

import { evaluate_expression } from '../calibration/expr_eval';
import { round_to_digits } from '../calibration/rounding';
import { BoundsError, FieldTypeError, FrameSizeError, PluginError, SatframeError } from './errors';
import { decode_value, type_size } from './type_codec';
import { FRAME_INDEX_KEY } from './types';
import type {
  CalibratedValue,
  CalibrationPlugin,
  DecodeContext,
  Field,
  RawValue,
  Row,
  Schema,
  Subsystem
} from './types';

/** Column key of a field: `"<subsystem>.<field>"`. */
export function column_key(subsystem: Subsystem, field: Field): string {
  return `${subsystem.name}.${field.name}`;
}

/**
 * Ordered column keys every row of `schema` carries. Duplicate keys appear
 * once, at their first position.
 */
export function column_keys(schema: Schema): string[] {
  const keys = new Set<string>();
  if (schema.include_frame_index) keys.add(FRAME_INDEX_KEY);
  for (const subsystem of schema.subsystems) {
    for (const field of subsystem.fields) {
      keys.add(column_key(subsystem, field));
    }
  }
  return [...keys];
}

/**
 * Decode one frame.
 *
 * @param frame_index - Zero-based position of the frame in the dump.
 * @throws FrameSizeError if `frame.length` differs from `schema.frame_size`.
 * @throws BoundsError, FieldTypeError, ExpressionError or PluginError for
 *   the first field that fails, with decode context attached.
 */
export function decode_frame(
  frame: Uint8Array,
  schema: Schema,
  plugin: CalibrationPlugin,
  frame_index: number
): Row {
  if (frame.length !== schema.frame_size) {
    throw new FrameSizeError(
      `Frame length ${frame.length} does not match frame size ${schema.frame_size}`,
      schema.frame_size,
      frame.length,
      { frame_index }
    );
  }
  return decode_frame_unchecked(frame, schema, plugin, frame_index);
}

/**
 * Decode one frame whose length the caller has already checked.
 *
 * `frame` may be a view into a larger buffer; only the first
 * `schema.frame_size` bytes are read.
 */
export function decode_frame_unchecked(
  frame: Uint8Array,
  schema: Schema,
  plugin: CalibrationPlugin,
  frame_index: number
): Row {
  const row: Row = new Map();
  if (schema.include_frame_index) row.set(FRAME_INDEX_KEY, frame_index);

  for (const subsystem of schema.subsystems) {
    for (const field of subsystem.fields) {
      const context: DecodeContext = {
        frame_index,
        subsystem: subsystem.name,
        field: field.name,
        offset: subsystem.offset + field.offset
      };
      try {
        row.set(column_key(subsystem, field), decode_field(frame, schema, plugin, subsystem, field, context));
      } catch (err) {
        if (err instanceof SatframeError) throw err.with_context(context);
        throw err;
      }
    }
  }
  return row;
}

/**
 * Decode a buffer holding a whole number of frames.
 *
 * @returns One row per frame, in buffer order.
 * @throws FrameSizeError if the length is not a multiple of the frame size.
 */
export function decode_frames(data: Uint8Array, schema: Schema, plugin: CalibrationPlugin): Row[] {
  const { frame_size } = schema;
  if (data.length % frame_size !== 0) {
    throw new FrameSizeError(
      `Data length ${data.length} is not a multiple of frame size ${frame_size} ` +
        `(${data.length % frame_size} trailing bytes)`,
      frame_size,
      data.length
    );
  }

  const rows: Row[] = [];
  for (let start = 0, index = 0; start < data.length; start += frame_size, index++) {
    rows.push(decode_frame_unchecked(data.subarray(start, start + frame_size), schema, plugin, index));
  }
  return rows;
}

// ---------------------------------------------------------------------------
// Per-field pipeline
// ---------------------------------------------------------------------------

function decode_field(
  frame: Uint8Array,
  schema: Schema,
  plugin: CalibrationPlugin,
  subsystem: Subsystem,
  field: Field,
  context: DecodeContext
): CalibratedValue {
  const offset = subsystem.offset + field.offset;
  const size = type_size(field.type, field.byte_length);
  context.size = size;

  if (offset + size > schema.frame_size) {
    throw new BoundsError(subsystem.name, field.name, offset, size, schema.frame_size);
  }

  const raw = decode_value(frame.subarray(offset, offset + size), field.type, schema.default_endian);
  context.raw = raw;

  const value = calibrate(field, raw, plugin);
  if (field.round_digits !== undefined && typeof value === 'number') {
    return round_to_digits(value, field.round_digits);
  }
  return value;
}

function calibrate(field: Field, raw: RawValue, plugin: CalibrationPlugin): CalibratedValue {
  if (field.calibration_expression !== undefined) {
    if (raw instanceof Uint8Array) {
      throw new FieldTypeError(`Calibration expression needs a numeric raw value, field is ${field.type}`);
    }
    return evaluate_expression(field.calibration_expression, Number(raw));
  }

  if (field.calibration_function !== undefined) {
    if (!plugin.has(field.calibration_function)) {
      throw new PluginError(
        field.calibration_function,
        `Calibration function '${field.calibration_function}' not found in plugin.`
      );
    }
    return plugin.call(field.calibration_function, raw);
  }

  return raw;
}
