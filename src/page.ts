/**
 * heapform — slotted page primitives
 *
 * A page is a Uint8Array of `pageSize` bytes. Records pack upward from byte
 * 0; the slot table grows downward from the 4-byte footer. Slot numbers are
 * stable for a page's lifetime: delete writes a tombstone (length 0) and never
 * compacts, so a RID handed out once keeps pointing at the same slot.
 *
 * Page-level integers are big-endian u16. See constants.ts for the diagram.
 */

import {
  PAGE_FOOTER_SIZE,
  SLOT_ENTRY_SIZE,
  TOMBSTONE_LENGTH,
  slotPosition,
} from './constants';
import { StorageError } from './errors';

export interface PageFooter {
  readonly slotCount:  number;
  readonly freeOffset: number;
}

export interface SlotEntry {
  readonly offset: number;
  readonly length: number;
}

function viewOf(page: Uint8Array): DataView {
  return new DataView(page.buffer, page.byteOffset, page.byteLength);
}

export function initPage(pageSize: number): Uint8Array {
  // slot_count = 0, free_offset = 0: an all-zero page is already valid.
  return new Uint8Array(pageSize);
}

/**
 * Read and validate the footer.
 *
 * @throws StorageError CORRUPT_PAGE  records and slot table overlap
 */
export function readFooter(page: Uint8Array): PageFooter {
  const dv         = viewOf(page);
  const slotCount  = dv.getUint16(page.length - PAGE_FOOTER_SIZE);
  const freeOffset = dv.getUint16(page.length - 2);

  if (freeOffset + slotCount * SLOT_ENTRY_SIZE + PAGE_FOOTER_SIZE > page.length) {
    throw new StorageError(
      'CORRUPT_PAGE',
      `Page footer is inconsistent: ${slotCount} slots and free offset ${freeOffset} ` +
      `overflow a ${page.length}-byte page.`,
    );
  }
  return { slotCount, freeOffset };
}

function writeFooter(page: Uint8Array, footer: PageFooter): void {
  const dv = viewOf(page);
  dv.setUint16(page.length - PAGE_FOOTER_SIZE, footer.slotCount);
  dv.setUint16(page.length - 2,                footer.freeOffset);
}

/** Bytes between the end of the record area and the start of the slot table. */
export function freeSpace(page: Uint8Array): number {
  const { slotCount, freeOffset } = readFooter(page);
  return page.length - PAGE_FOOTER_SIZE - slotCount * SLOT_ENTRY_SIZE - freeOffset;
}

/**
 * Returns undefined for a slot index the page never assigned.
 *
 * @throws StorageError CORRUPT_PAGE  the slot points outside the record area
 */
export function readSlot(page: Uint8Array, slot: number): SlotEntry | undefined {
  const { slotCount, freeOffset } = readFooter(page);
  if (!Number.isInteger(slot) || slot < 0 || slot >= slotCount) return undefined;

  const dv     = viewOf(page);
  const pos    = slotPosition(page.length, slot);
  const offset = dv.getUint16(pos);
  const length = dv.getUint16(pos + 2);

  if (offset + length > freeOffset) {
    throw new StorageError(
      'CORRUPT_PAGE',
      `Slot ${slot} spans bytes ${offset}..${offset + length}, past the record area end ${freeOffset}.`,
    );
  }
  return { offset, length };
}

/**
 * Append `record` to the page in place and return its new slot index, or
 * undefined when the page lacks room for the record plus one slot entry.
 */
export function insertIntoPage(page: Uint8Array, record: Uint8Array): number | undefined {
  if (freeSpace(page) < record.length + SLOT_ENTRY_SIZE) return undefined;

  const { slotCount, freeOffset } = readFooter(page);
  page.set(record, freeOffset);

  const pos = slotPosition(page.length, slotCount);
  const dv  = viewOf(page);
  dv.setUint16(pos,     freeOffset);
  dv.setUint16(pos + 2, record.length);

  writeFooter(page, { slotCount: slotCount + 1, freeOffset: freeOffset + record.length });
  return slotCount;
}

/** A copy of the live record in `slot`, or undefined if unassigned or deleted. */
export function recordAt(page: Uint8Array, slot: number): Uint8Array | undefined {
  const entry = readSlot(page, slot);
  if (entry === undefined || entry.length === TOMBSTONE_LENGTH) return undefined;
  return page.slice(entry.offset, entry.offset + entry.length);
}

/** Tombstone `slot` in place. Returns false if it was not live. */
export function deleteFromPage(page: Uint8Array, slot: number): boolean {
  const entry = readSlot(page, slot);
  if (entry === undefined || entry.length === TOMBSTONE_LENGTH) return false;
  viewOf(page).setUint16(slotPosition(page.length, slot) + 2, TOMBSTONE_LENGTH);
  return true;
}

/** A live slot's bytes, or the error that stopped them being read. */
export type SlotContent = Uint8Array | StorageError;

/**
 * Live slots in ascending order, each with a copy of its bytes. A slot entry
 * that points outside the record area is yielded as its CORRUPT_PAGE error;
 * the slots after it are still read.
 *
 * @throws StorageError CORRUPT_PAGE  the footer itself is inconsistent
 */
export function* liveSlots(page: Uint8Array): Generator<[slot: number, content: SlotContent]> {
  const { slotCount } = readFooter(page);
  for (let slot = 0; slot < slotCount; slot++) {
    let content: SlotContent | undefined;
    try {
      content = recordAt(page, slot);
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      content = err;
    }
    if (content !== undefined) yield [slot, content];
  }
}
