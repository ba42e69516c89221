/**
 * heapform — type definitions
 *
 * These types describe the fixed-width record contract. A table's bytes on
 * disk are the truth; a TableRecord is only a lens onto one slot of them.
 */

// ─── Field Types ──────────────────────────────────────────────────────────────

/**
 * Supported column types in a table schema.
 *
 * int:   signed 32-bit integer, 4 bytes, little-endian two's complement.
 * float: IEEE-754 single precision, 4 bytes, little-endian.
 * char:  fixed-width UTF-8 text of exactly `length` bytes. Shorter strings are
 *        padded with FILL_BYTE; longer ones are cut at byte `length`. Trailing
 *        fill bytes are stripped on decode, so a stored value can never end
 *        in U+0000.
 *
 * Variable-length columns are deliberately absent: every record of a table
 * has the same byte length.
 */
export type FieldType =
  | { readonly kind: 'int' }
  | { readonly kind: 'float' }
  | { readonly kind: 'char'; readonly length: number };

export type FieldKind = FieldType['kind'];

// ─── Schema ───────────────────────────────────────────────────────────────────

/**
 * One column of a table schema.
 *
 * offset is the field's absolute start within the record buffer. Offsets are
 * assigned in declaration order with no padding between fields:
 *   offset[0] = 0, offset[i + 1] = offset[i] + width[i]
 */
export interface FieldDescriptor {
  readonly name:   string;
  readonly type:   FieldType;
  readonly offset: number;
  readonly width:  number;
}

/** A field as declared, before offsets are assigned. */
export interface FieldDefinition {
  readonly name: string;
  readonly type: FieldType;
}

/**
 * The on-file description format, exactly as it appears in schema.json.
 * file_name is optional; it defaults to `<table_name>.heap`.
 */
export interface TableDescription {
  readonly table_name: string;
  readonly file_name?: string;
  readonly fields:     ReadonlyArray<{ readonly name: string; readonly type: string }>;
}

// ─── Records ──────────────────────────────────────────────────────────────────

/** int and float columns hold numbers; char columns hold strings. */
export type FieldValue = number | string;

/**
 * A structured record: field name → value. Transient; its persisted form is
 * always the RecordBuffer produced by encodeRecord().
 */
export type TableRecord = Readonly<Record<string, FieldValue>>;

/** Exactly schema.recordSize() bytes. */
export type RecordBuffer = Uint8Array;

// ─── Storage ──────────────────────────────────────────────────────────────────

/** Record identifier: the page number and slot index assigned by the heap file. */
export interface RID {
  readonly page: number;
  readonly slot: number;
}

export function formatRid(rid: RID): string {
  return `${rid.page}:${rid.slot}`;
}
