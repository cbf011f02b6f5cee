import { describe, it, expect } from 'vitest';
import { decode_value, encode_value, is_type_tag, type_size } from '../type_codec';
import { FieldTypeError } from '../errors';
import type { Endian, NumericTypeTag } from '../types';

describe('type_size', () => {
  it('returns the width of every numeric tag', () => {
    const sizes: Record<NumericTypeTag, number> = {
      u8: 1, i8: 1, u16: 2, i16: 2, u32: 4, i32: 4, u64: 8, i64: 8,
      f32: 4, float32: 4, f64: 8, float64: 8
    };
    for (const [tag, size] of Object.entries(sizes)) {
      expect(type_size(tag)).toBe(size);
    }
  });

  it('uses the byte length for bytes', () => {
    expect(type_size('bytes', 6)).toBe(6);
  });

  it('rejects bytes without a positive integer length', () => {
    expect(() => type_size('bytes')).toThrow(
      "bytes type requires a positive integer 'bytes' attribute, got undefined"
    );
    expect(() => type_size('bytes', 0)).toThrow(FieldTypeError);
    expect(() => type_size('bytes', 2.5)).toThrow(FieldTypeError);
  });

  it('rejects an unknown tag by name', () => {
    expect(() => type_size('u24')).toThrow("Unknown field type 'u24'");
  });
});

describe('is_type_tag', () => {
  it('accepts known tags only', () => {
    expect(is_type_tag('float64')).toBe(true);
    expect(is_type_tag('bytes')).toBe(true);
    expect(is_type_tag('toString')).toBe(false);
  });
});

describe('decode_value', () => {
  it('honours the byte order of multi-byte integers', () => {
    const bytes = new Uint8Array([0x12, 0x34]);
    expect(decode_value(bytes, 'u16', 'big')).toBe(0x1234);
    expect(decode_value(bytes, 'u16', 'little')).toBe(0x3412);
  });

  it('sign-extends signed integers', () => {
    expect(decode_value(new Uint8Array([0xff]), 'i8', 'little')).toBe(-1);
    expect(decode_value(new Uint8Array([0xfe, 0xff]), 'i16', 'little')).toBe(-2);
    expect(decode_value(new Uint8Array([0xff, 0xff, 0xff, 0xfd]), 'i32', 'big')).toBe(-3);
  });

  it('decodes 64-bit integers to bigint', () => {
    const bytes = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
    expect(decode_value(bytes, 'u64', 'little')).toBe(18446744073709551615n);
    expect(decode_value(bytes, 'i64', 'little')).toBe(-1n);
  });

  it('decodes floats', () => {
    expect(decode_value(new Uint8Array([0x3f, 0xc0, 0x00, 0x00]), 'f32', 'big')).toBe(1.5);
    expect(decode_value(new Uint8Array([0x00, 0x00, 0xc0, 0x3f]), 'float32', 'little')).toBe(1.5);
  });

  it('copies bytes fields', () => {
    const source = new Uint8Array([1, 2, 3]);
    const value = decode_value(source, 'bytes', 'big');
    source[0] = 9;
    expect(value).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('decodes from a view into a larger buffer', () => {
    const frame = new Uint8Array([0xaa, 0x01, 0x00, 0xbb]);
    expect(decode_value(frame.subarray(1, 3), 'u16', 'little')).toBe(1);
  });

  it('rejects a length that does not match the type', () => {
    expect(() => decode_value(new Uint8Array(3), 'u32', 'little')).toThrow(
      "Type 'u32' needs 4 bytes, got 3"
    );
  });
});

describe('encode_value', () => {
  const cases: Array<[string, number | bigint]> = [
    ['u8', 200],
    ['i8', -100],
    ['u16', 65000],
    ['i16', -30000],
    ['u32', 4_000_000_000],
    ['i32', -2_000_000_000],
    ['u64', 2n ** 63n + 5n],
    ['i64', -(2n ** 62n)],
    ['f32', 1234],
    ['float32', -0.5],
    ['f64', -1234.5678],
    ['float64', 1e-300]
  ];
  const endians: Endian[] = ['little', 'big'];

  it.each(cases)('encodes and decodes %s in both byte orders', (tag, value) => {
    for (const endian of endians) {
      expect(decode_value(encode_value(value, tag, endian), tag, endian)).toBe(value);
    }
  });

  it('writes big-endian bytes most significant first', () => {
    expect(Array.from(encode_value(0x01020304, 'u32', 'big'))).toEqual([1, 2, 3, 4]);
  });

  it('rejects a bytes value of the wrong length', () => {
    expect(() => encode_value(new Uint8Array(2), 'bytes', 'big', 3)).toThrow(FieldTypeError);
  });
});
