/**
 * heapform — layout constants
 *
 * These constants define the binary contract of records and heap pages.
 * Any change to a width, fill byte or page offset is a BREAKING CHANGE for
 * every heap file already written.
 *
 * Record layout (all numerics little-endian):
 *
 *   [field 0][field 1] … [field n-1]      no header, no padding
 *
 * Heap page layout (page-level integers are big-endian u16):
 *
 *   [0 .. free_offset)                     record bytes, packed upward
 *   [.. slot table ..]                     grows downward from the footer
 *     slot i at pageSize - 4 - (i + 1) × 4:
 *       [offset: u16][length: u16]         length 0 marks a deleted slot
 *   [pageSize - 4 .. pageSize - 2)         slot_count  u16
 *   [pageSize - 2 .. pageSize)             free_offset u16
 */

// ─── Field widths ─────────────────────────────────────────────────────────────

export const INT_WIDTH   = 4;
export const FLOAT_WIDTH = 4;

export const INT32_MIN = -0x80000000;
export const INT32_MAX =  0x7fffffff;

/** Pads a char field out to its declared width. Stripped from the tail on decode. */
export const FILL_BYTE = 0x00;

/** Byte order of every numeric field. Part of the on-disk contract. */
export const LITTLE_ENDIAN = true;

// ─── Heap pages ───────────────────────────────────────────────────────────────

export const DEFAULT_PAGE_SIZE = 4096;

// Slot offsets are u16, so no byte inside a page may sit past 0xffff.
export const MIN_PAGE_SIZE = 512;
export const MAX_PAGE_SIZE = 65536;

export const PAGE_FOOTER_SIZE = 4;
export const SLOT_ENTRY_SIZE  = 4;

/** Slot length written by a delete. Real records are never empty. */
export const TOMBSTONE_LENGTH = 0;

/** Byte position of slot `index` inside a page of `pageSize` bytes. */
export function slotPosition(pageSize: number, index: number): number {
  return pageSize - PAGE_FOOTER_SIZE - (index + 1) * SLOT_ENTRY_SIZE;
}

/** Largest record a single empty page can hold. */
export function maxRecordBytes(pageSize: number): number {
  return pageSize - PAGE_FOOTER_SIZE - SLOT_ENTRY_SIZE;
}
