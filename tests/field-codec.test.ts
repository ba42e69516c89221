/**
 * heapform — field codec
 *
 * Byte-level contract of each field type: widths, byte order, char padding,
 * truncation and fill stripping, and the two failure modes.
 */

import { describe, it, expect } from 'vitest';
import {
  decodeChar,
  decodeField,
  encodeChar,
  encodeField,
  FieldError,
  type FieldDescriptor,
} from '../src/index';

const idField:     FieldDescriptor = { name: 'id',     type: { kind: 'int' },               offset: 0, width: 4 };
const salaryField: FieldDescriptor = { name: 'salary', type: { kind: 'float' },             offset: 0, width: 4 };
const nameField:   FieldDescriptor = { name: 'name',   type: { kind: 'char', length: 5 },   offset: 0, width: 5 };

function encoded(field: FieldDescriptor, value: number | string): number[] {
  const out = new Uint8Array(field.width);
  encodeField(field, value, out, 0);
  return [...out];
}

function fieldErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof FieldError) return err.code;
    throw err;
  }
  return undefined;
}

// ─── int ──────────────────────────────────────────────────────────────────────

describe('int fields', () => {
  it('encode as 4 little-endian bytes', () => {
    expect(encoded(idField, 7)).toEqual([0x07, 0x00, 0x00, 0x00]);
    expect(encoded(idField, 0x01020304)).toEqual([0x04, 0x03, 0x02, 0x01]);
    expect(encoded(idField, -2)).toEqual([0xfe, 0xff, 0xff, 0xff]);
  });

  it('decode the extremes of the 32-bit range', () => {
    for (const v of [-2147483648, -1, 0, 1, 2147483647]) {
      const buf = new Uint8Array(4);
      encodeField(idField, v, buf, 0);
      expect(decodeField(idField, buf, 0)).toBe(v);
    }
  });

  it.each([
    ['a string',           'seven'],
    ['a fraction',         1.5],
    ['an overflowing int', 2147483648],
    ['an underflowing int', -2147483649],
    ['NaN',                Number.NaN],
  ])('reject %s with TYPE_MISMATCH', (_label, value) => {
    expect(fieldErrorCode(() => encoded(idField, value))).toBe('TYPE_MISMATCH');
  });
});

// ─── float ────────────────────────────────────────────────────────────────────

describe('float fields', () => {
  it('encode as IEEE-754 single precision, little-endian', () => {
    expect(encoded(salaryField, 5000.5)).toEqual([0x00, 0x44, 0x9c, 0x45]);
  });

  it('decode exactly representable values unchanged', () => {
    const buf = new Uint8Array([0x00, 0x44, 0x9c, 0x45]);
    expect(decodeField(salaryField, buf, 0)).toBe(5000.5);
  });

  it('round other values to the nearest float32', () => {
    const buf = new Uint8Array(4);
    encodeField(salaryField, 0.1, buf, 0);
    expect(decodeField(salaryField, buf, 0)).toBe(Math.fround(0.1));
  });

  it('accept integers', () => {
    const buf = new Uint8Array(4);
    encodeField(salaryField, 4900, buf, 0);
    expect(decodeField(salaryField, buf, 0)).toBe(4900);
  });

  it('reject strings with TYPE_MISMATCH', () => {
    expect(fieldErrorCode(() => encoded(salaryField, '5000.5'))).toBe('TYPE_MISMATCH');
  });
});

// ─── char(n) ──────────────────────────────────────────────────────────────────

describe('char fields', () => {
  it('pad short strings with fill byte 0', () => {
    expect(encoded(nameField, 'Bob')).toEqual([0x42, 0x6f, 0x62, 0x00, 0x00]);
    expect(encoded(nameField, '')).toEqual([0, 0, 0, 0, 0]);
  });

  it('store a string of exactly n bytes without padding', () => {
    expect(encoded(nameField, 'Alice')).toEqual([0x41, 0x6c, 0x69, 0x63, 0x65]);
  });

  it('truncate long strings to the first n bytes', () => {
    expect(encoded(nameField, 'Charlie')).toEqual([0x43, 0x68, 0x61, 0x72, 0x6c]);
  });

  it('count bytes, not characters', () => {
    // 'é' is two UTF-8 bytes (c3 a9), so 'héllo' is six bytes long.
    expect(encoded(nameField, 'héllo')).toEqual([0x68, 0xc3, 0xa9, 0x6c, 0x6c]);
  });

  it('strip trailing fill bytes on decode', () => {
    const buf = new Uint8Array([0x61, 0x62, 0, 0, 0]);
    expect(decodeField(nameField, buf, 0)).toBe('ab');
  });

  it("decode('ab' padded to 5) yields 'ab' exactly", () => {
    const buf = new Uint8Array(5);
    encodeField(nameField, 'ab', buf, 0);
    const decoded = decodeField(nameField, buf, 0);
    expect(decoded).toBe('ab');
    expect(decoded).not.toBe('ab\0\0\0');
  });

  it('keep interior zero bytes', () => {
    expect(decodeChar(new Uint8Array([0x61, 0x00, 0x62, 0x00]))).toBe('a\0b');
  });

  it('decode a cut multi-byte character as U+FFFD', () => {
    const bytes = encodeChar('aé', 2);
    expect([...bytes]).toEqual([0x61, 0xc3]);
    expect(decodeChar(bytes)).toBe('a�');
  });

  it('reject numbers with TYPE_MISMATCH', () => {
    expect(fieldErrorCode(() => encoded(nameField, 42))).toBe('TYPE_MISMATCH');
  });
});

// ─── Positioning & truncated buffers ──────────────────────────────────────────

describe('offsets and short buffers', () => {
  it('write exactly width bytes at the given offset and nothing else', () => {
    const buf = new Uint8Array(9).fill(0xaa);
    encodeField(nameField, 'xy', buf, 2);
    expect([...buf]).toEqual([0xaa, 0xaa, 0x78, 0x79, 0, 0, 0, 0xaa, 0xaa]);
  });

  it('decode from an offset within a larger buffer', () => {
    const buf = new Uint8Array([0xff, 0x07, 0x00, 0x00, 0x00]);
    expect(decodeField(idField, buf, 1)).toBe(7);
  });

  it('decode from a subarray view', () => {
    const backing = new Uint8Array([0xff, 0xff, 0x07, 0x00, 0x00, 0x00]);
    expect(decodeField(idField, backing.subarray(2), 0)).toBe(7);
  });

  it('fail with TRUNCATED when fewer than width bytes remain', () => {
    expect(fieldErrorCode(() => decodeField(idField, new Uint8Array(3), 0))).toBe('TRUNCATED');
    expect(fieldErrorCode(() => decodeField(nameField, new Uint8Array(6), 2))).toBe('TRUNCATED');
    expect(fieldErrorCode(() => encodeField(idField, 1, new Uint8Array(4), 1))).toBe('TRUNCATED');
  });

  it('name the field on the error', () => {
    let caught: unknown;
    try {
      decodeField(salaryField, new Uint8Array(2), 0);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FieldError);
    expect(caught).toMatchObject({ code: 'TRUNCATED', field: 'salary' });
  });
});
