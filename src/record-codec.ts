/**
 * heapform — record codec
 *
 * Composes the field codec over a Schema: one TableRecord ↔ one buffer of
 * exactly schema.recordSize() bytes, fields in declaration order.
 *
 * Encoding is strict. Every declared field must be present with a value of
 * the declared type, and no undeclared key may appear.
 */

import { decodeField, encodeField } from './field-codec';
import { FieldError, RecordError } from './errors';
import type { Schema } from './schema';
import type { FieldValue, RecordBuffer, TableRecord } from './types';

/**
 * Encode `record` into a fresh buffer of schema.recordSize() bytes.
 * The same (schema, record) pair always yields byte-identical output.
 *
 * @throws RecordError EXTRA_FIELD    a key the schema does not declare (checked first)
 * @throws RecordError MISSING_FIELD  a declared field absent from the record
 * @throws RecordError TYPE_MISMATCH  a value of the wrong type; cause is the FieldError
 */
export function encodeRecord(schema: Schema, record: TableRecord): RecordBuffer {
  for (const key of Object.keys(record)) {
    if (schema.field(key) === undefined) throw RecordError.extraField(key);
  }

  const out = new Uint8Array(schema.recordSize());

  for (const field of schema.fields) {
    // Own keys only: a field named `constructor` must not resolve through the prototype.
    const value: FieldValue | undefined =
      Object.hasOwn(record, field.name) ? record[field.name] : undefined;
    if (value === undefined) throw RecordError.missingField(field.name);

    try {
      encodeField(field, value, out, field.offset);
    } catch (err) {
      if (err instanceof FieldError && err.code === 'TYPE_MISMATCH') {
        throw new RecordError('TYPE_MISMATCH', err.message, { field: field.name, cause: err });
      }
      throw err;
    }
  }

  return out;
}

/**
 * Decode a buffer produced by encodeRecord(). Keys come back in schema order.
 *
 * @throws RecordError SIZE_MISMATCH  buffer.length !== schema.recordSize()
 */
export function decodeRecord(schema: Schema, buffer: Uint8Array): TableRecord {
  if (buffer.length !== schema.recordSize()) {
    throw new RecordError(
      'SIZE_MISMATCH',
      `Table '${schema.tableName}' records are ${schema.recordSize()} bytes; buffer has ${buffer.length}.`,
    );
  }

  // fromEntries defines own properties, so `__proto__` survives as a field.
  return Object.fromEntries(
    schema.fields.map(field => [field.name, decodeField(field, buffer, field.offset)] as const),
  );
}
