/**
 * Fixed-width binary codec for schema type tags.
 *
 * Maps a type tag to its byte width and decodes (or encodes) one value
 * under a declared byte order. No calibration happens here.
 *
 * @module protocol/type_codec
 */

import { NUMERIC_TYPE_SIZES, BYTES_TYPE } from './constants';
import { FieldTypeError } from './errors';
import type { Endian, NumericTypeTag, RawValue, TypeTag } from './types';

/** True if `tag` names a fixed-width numeric type. */
export function is_numeric_type(tag: string): tag is NumericTypeTag {
  return Object.prototype.hasOwnProperty.call(NUMERIC_TYPE_SIZES, tag);
}

/** True if `tag` names a type the codec understands. */
export function is_type_tag(tag: string): tag is TypeTag {
  return tag === BYTES_TYPE || is_numeric_type(tag);
}

/**
 * Size in bytes of a field of the given type.
 *
 * @param byte_length - Required for `bytes`; ignored otherwise.
 * @throws FieldTypeError for an unknown tag or a missing/non-positive length.
 */
export function type_size(tag: string, byte_length?: number): number {
  if (tag === BYTES_TYPE) {
    if (byte_length === undefined || !Number.isInteger(byte_length) || byte_length <= 0) {
      throw new FieldTypeError(
        `bytes type requires a positive integer 'bytes' attribute, got ${String(byte_length)}`
      );
    }
    return byte_length;
  }
  if (!is_numeric_type(tag)) {
    throw new FieldTypeError(`Unknown field type '${tag}'`);
  }
  return NUMERIC_TYPE_SIZES[tag];
}

/**
 * Decode one value from `bytes`.
 *
 * `bytes.length` must equal the type's size. 64-bit integers decode to
 * `bigint`; the `bytes` type returns a copy of its input.
 */
export function decode_value(bytes: Uint8Array, tag: string, endian: Endian): RawValue {
  if (tag === BYTES_TYPE) {
    return bytes.slice();
  }
  if (!is_numeric_type(tag)) {
    throw new FieldTypeError(`Unknown field type '${tag}'`);
  }
  const size = NUMERIC_TYPE_SIZES[tag];
  if (bytes.length !== size) {
    throw new FieldTypeError(`Type '${tag}' needs ${size} bytes, got ${bytes.length}`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const little = endian === 'little';
  return read_numeric(view, tag, little);
}

function read_numeric(view: DataView, tag: NumericTypeTag, little: boolean): number | bigint {
  switch (tag) {
    case 'u8':
      return view.getUint8(0);
    case 'i8':
      return view.getInt8(0);
    case 'u16':
      return view.getUint16(0, little);
    case 'i16':
      return view.getInt16(0, little);
    case 'u32':
      return view.getUint32(0, little);
    case 'i32':
      return view.getInt32(0, little);
    case 'u64':
      return view.getBigUint64(0, little);
    case 'i64':
      return view.getBigInt64(0, little);
    case 'f32':
    case 'float32':
      return view.getFloat32(0, little);
    case 'f64':
    case 'float64':
      return view.getFloat64(0, little);
  }
}

/**
 * Encode one value as the given type. Used to build frames for tests and
 * fixtures.
 *
 * Integer types take a `number` or `bigint`; out-of-range values wrap the
 * way `DataView` setters do.
 */
export function encode_value(value: RawValue, tag: string, endian: Endian, byte_length?: number): Uint8Array {
  const size = type_size(tag, byte_length);
  if (tag === BYTES_TYPE) {
    if (!(value instanceof Uint8Array) || value.length !== size) {
      throw new FieldTypeError(`bytes value must be a Uint8Array of length ${size}`);
    }
    return value.slice();
  }
  if (value instanceof Uint8Array || !is_numeric_type(tag)) {
    throw new FieldTypeError(`Cannot encode ${typeof value} as '${tag}'`);
  }

  const out = new Uint8Array(size);
  const view = new DataView(out.buffer);
  const little = endian === 'little';

  switch (tag) {
    case 'u8':
      view.setUint8(0, Number(value));
      break;
    case 'i8':
      view.setInt8(0, Number(value));
      break;
    case 'u16':
      view.setUint16(0, Number(value), little);
      break;
    case 'i16':
      view.setInt16(0, Number(value), little);
      break;
    case 'u32':
      view.setUint32(0, Number(value), little);
      break;
    case 'i32':
      view.setInt32(0, Number(value), little);
      break;
    case 'u64':
      view.setBigUint64(0, BigInt(value), little);
      break;
    case 'i64':
      view.setBigInt64(0, BigInt(value), little);
      break;
    case 'f32':
    case 'float32':
      view.setFloat32(0, Number(value), little);
      break;
    case 'f64':
    case 'float64':
      view.setFloat64(0, Number(value), little);
      break;
  }
  return out;
}
