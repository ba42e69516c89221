/**
 * heapform — field codec
 *
 * Pure per-type conversions between a FieldValue and exactly `field.width`
 * bytes at a given position. A small closed switch over FieldType.kind; no
 * per-type classes, no registry.
 *
 *   int    setInt32 / getInt32,     little-endian
 *   float  setFloat32 / getFloat32, little-endian (value rounds to float32)
 *   char   UTF-8, padded with FILL_BYTE or cut to the first `length` bytes;
 *          trailing FILL_BYTEs stripped on decode
 */

import { FILL_BYTE, INT32_MAX, INT32_MIN, LITTLE_ENDIAN } from './constants';
import { FieldError } from './errors';
import type { FieldDescriptor, FieldValue } from './types';

// Shared across calls: TextEncoder is stateless, and TextDecoder is too when
// not used in streaming mode.
const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function checkSpan(field: FieldDescriptor, bytes: Uint8Array, offset: number): void {
  if (offset < 0 || offset + field.width > bytes.length) {
    throw new FieldError(
      'TRUNCATED',
      field.name,
      `Field '${field.name}' needs ${field.width} bytes at offset ${offset}; ` +
      `only ${Math.max(0, bytes.length - offset)} available.`,
    );
  }
}

function mismatch(field: FieldDescriptor, expected: string, value: unknown): FieldError {
  const got = typeof value === 'number' ? `number ${value}` : typeof value;
  return new FieldError(
    'TYPE_MISMATCH',
    field.name,
    `Field '${field.name}' expects ${expected}; received ${got}.`,
  );
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Encode a string into a fixed-width char slot.
 *
 * Shorter strings are padded with FILL_BYTE. Longer strings keep exactly their
 * first `length` UTF-8 bytes, which may split a multi-byte character; the
 * partial sequence decodes as U+FFFD.
 */
export function encodeChar(value: string, length: number): Uint8Array {
  const out   = new Uint8Array(length).fill(FILL_BYTE);
  const bytes = utf8Encoder.encode(value);
  out.set(bytes.length > length ? bytes.subarray(0, length) : bytes);
  return out;
}

/**
 * Write `value` as exactly `field.width` bytes at `offset` in `target`.
 *
 * @throws FieldError TYPE_MISMATCH  the value's type does not match field.type
 * @throws FieldError TRUNCATED      target has fewer than width bytes from offset
 */
export function encodeField(
  field:  FieldDescriptor,
  value:  FieldValue,
  target: Uint8Array,
  offset: number,
): void {
  checkSpan(field, target, offset);

  switch (field.type.kind) {
    case 'int':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
        throw mismatch(field, 'a 32-bit integer', value);
      }
      viewOf(target).setInt32(offset, value, LITTLE_ENDIAN);
      return;

    case 'float':
      if (typeof value !== 'number') throw mismatch(field, 'a number', value);
      viewOf(target).setFloat32(offset, value, LITTLE_ENDIAN);
      return;

    case 'char':
      if (typeof value !== 'string') throw mismatch(field, 'a string', value);
      target.set(encodeChar(value, field.type.length), offset);
      return;
  }
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/** Decode a char slot: strip trailing fill bytes, then UTF-8 decode. */
export function decodeChar(bytes: Uint8Array): string {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === FILL_BYTE) end--;
  return utf8Decoder.decode(bytes.subarray(0, end));
}

/**
 * Read the value of `field` from `field.width` bytes at `offset` in `source`.
 *
 * @throws FieldError TRUNCATED  source has fewer than width bytes from offset
 */
export function decodeField(field: FieldDescriptor, source: Uint8Array, offset: number): FieldValue {
  checkSpan(field, source, offset);

  switch (field.type.kind) {
    case 'int':
      return viewOf(source).getInt32(offset, LITTLE_ENDIAN);
    case 'float':
      return viewOf(source).getFloat32(offset, LITTLE_ENDIAN);
    case 'char':
      return decodeChar(source.subarray(offset, offset + field.width));
  }
}
