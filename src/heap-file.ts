/**
 * heapform — heap file contract and the shared paged implementation
 *
 * The Table consumes storage only through HeapFile. PagedHeapFile supplies
 * the slotted-page logic once; MemoryHeapFile and DiskHeapFile differ only
 * in where the pages live.
 */

import { MAX_PAGE_SIZE, MIN_PAGE_SIZE, maxRecordBytes } from './constants';
import { NotFoundError, StorageError } from './errors';
import { deleteFromPage, initPage, insertIntoPage, liveSlots, recordAt, type SlotContent } from './page';
import type { RID } from './types';

export type { SlotContent } from './page';

export interface HeapFile {
  /** @throws StorageError NO_SPACE when the record cannot fit in any page */
  insertRecord(bytes: Uint8Array): RID;
  /** @throws NotFoundError for an unassigned or deleted RID */
  getRecord(rid: RID): Uint8Array;
  /** @throws NotFoundError for an unassigned or deleted RID */
  deleteRecord(rid: RID): void;
  /**
   * Live records in page then slot order. A fresh call restarts from page 0.
   * A slot that cannot be read is yielded as its StorageError so the scan
   * can go on past it.
   */
  scanRecords(): Iterable<[RID, SlotContent]>;
  close(): void;
}

export interface HeapFileOptions {
  /** Defaults to HEAPFORM_PAGE_SIZE. */
  pageSize?: number;
}

export function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize < MIN_PAGE_SIZE || pageSize > MAX_PAGE_SIZE) {
    throw new RangeError(
      `Page size must be an integer in [${MIN_PAGE_SIZE}, ${MAX_PAGE_SIZE}]; got ${pageSize}.`,
    );
  }
}

export abstract class PagedHeapFile implements HeapFile {
  private closed = false;

  protected constructor(readonly pageSize: number) {
    assertPageSize(pageSize);
  }

  protected abstract pageCount(): number;
  protected abstract readPage(pageNo: number): Uint8Array;
  protected abstract writePage(pageNo: number, page: Uint8Array): void;
  /** Release the backing store. Called once, from close(). */
  protected abstract release(): void;

  get isClosed(): boolean {
    return this.closed;
  }

  insertRecord(bytes: Uint8Array): RID {
    this.ensureOpen();
    if (bytes.length === 0) {
      throw new StorageError('INVALID_RECORD', 'Cannot store an empty record.');
    }
    if (bytes.length > maxRecordBytes(this.pageSize)) {
      throw new StorageError(
        'NO_SPACE',
        `A ${bytes.length}-byte record cannot fit in a ${this.pageSize}-byte page ` +
        `(max ${maxRecordBytes(this.pageSize)}).`,
      );
    }

    const count = this.pageCount();
    for (let pageNo = 0; pageNo < count; pageNo++) {
      const page = this.readPage(pageNo);
      const slot = insertIntoPage(page, bytes);
      if (slot !== undefined) {
        this.writePage(pageNo, page);
        return { page: pageNo, slot };
      }
    }

    const page = initPage(this.pageSize);
    const slot = insertIntoPage(page, bytes);
    if (slot === undefined) {
      throw new StorageError('NO_SPACE', `A ${bytes.length}-byte record does not fit in an empty page.`);
    }
    this.writePage(count, page);
    return { page: count, slot };
  }

  getRecord(rid: RID): Uint8Array {
    this.ensureOpen();
    const bytes = this.hasPage(rid.page) ? recordAt(this.readPage(rid.page), rid.slot) : undefined;
    if (bytes === undefined) throw new NotFoundError(rid);
    return bytes;
  }

  deleteRecord(rid: RID): void {
    this.ensureOpen();
    if (!this.hasPage(rid.page)) throw new NotFoundError(rid);
    const page = this.readPage(rid.page);
    if (!deleteFromPage(page, rid.slot)) throw new NotFoundError(rid);
    this.writePage(rid.page, page);
  }

  *scanRecords(): Generator<[RID, SlotContent]> {
    this.ensureOpen();
    const count = this.pageCount();
    for (let pageNo = 0; pageNo < count; pageNo++) {
      for (const [slot, content] of liveSlots(this.readPage(pageNo))) {
        yield [{ page: pageNo, slot }, content];
      }
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.release();
  }

  private hasPage(pageNo: number): boolean {
    return Number.isInteger(pageNo) && pageNo >= 0 && pageNo < this.pageCount();
  }

  protected ensureOpen(): void {
    if (this.closed) throw new StorageError('CLOSED', 'Heap file is closed.');
  }
}
