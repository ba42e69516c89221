/**
 * heapform — DiskHeapFile
 *
 * Heap file backed by a regular file: page n occupies bytes
 * [n × pageSize, (n + 1) × pageSize). All I/O is synchronous; every write
 * lands before the call returns, so a RID handed back by insertRecord()
 * addresses bytes that are already in the file.
 */

import { closeSync, existsSync, fstatSync, openSync, readSync, writeSync } from 'node:fs';
import { loadConfig } from './config';
import { StorageError } from './errors';
import { PagedHeapFile, assertPageSize, type HeapFileOptions } from './heap-file';

function io<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new StorageError('IO', `Failed to ${action}: ${reason}`, { cause: err });
  }
}

export class DiskHeapFile extends PagedHeapFile {
  private pages: number;

  private constructor(
    readonly path: string,
    private readonly fd: number,
    pageSize: number,
    pages: number,
  ) {
    super(pageSize);
    this.pages = pages;
  }

  /**
   * Open an existing heap file.
   *
   * @throws StorageError IO            the file cannot be opened
   * @throws StorageError CORRUPT_PAGE  the file size is not a whole number of pages
   */
  static open(path: string, options: HeapFileOptions = {}): DiskHeapFile {
    const pageSize = options.pageSize ?? loadConfig().pageSize;
    assertPageSize(pageSize);

    const fd   = io(`open heap file '${path}'`, () => openSync(path, 'r+'));
    const size = io(`stat heap file '${path}'`, () => fstatSync(fd).size);
    if (size % pageSize !== 0) {
      closeSync(fd);
      throw new StorageError(
        'CORRUPT_PAGE',
        `Heap file '${path}' is ${size} bytes, not a multiple of the ${pageSize}-byte page size.`,
      );
    }
    return new DiskHeapFile(path, fd, pageSize, size / pageSize);
  }

  /** Create an empty heap file, truncating any existing one. */
  static create(path: string, options: HeapFileOptions = {}): DiskHeapFile {
    const pageSize = options.pageSize ?? loadConfig().pageSize;
    assertPageSize(pageSize);

    const fd = io(`create heap file '${path}'`, () => openSync(path, 'w+'));
    return new DiskHeapFile(path, fd, pageSize, 0);
  }

  static openOrCreate(path: string, options: HeapFileOptions = {}): DiskHeapFile {
    return existsSync(path) ? DiskHeapFile.open(path, options) : DiskHeapFile.create(path, options);
  }

  protected pageCount(): number {
    return this.pages;
  }

  protected readPage(pageNo: number): Uint8Array {
    const page = new Uint8Array(this.pageSize);
    const read = io(`read page ${pageNo} of '${this.path}'`, () =>
      readSync(this.fd, page, 0, this.pageSize, pageNo * this.pageSize),
    );
    if (read !== this.pageSize) {
      throw new StorageError(
        'IO',
        `Short read on page ${pageNo} of '${this.path}': ${read} of ${this.pageSize} bytes.`,
      );
    }
    return page;
  }

  protected writePage(pageNo: number, page: Uint8Array): void {
    io(`write page ${pageNo} of '${this.path}'`, () =>
      writeSync(this.fd, page, 0, this.pageSize, pageNo * this.pageSize),
    );
    if (pageNo >= this.pages) this.pages = pageNo + 1;
  }

  protected release(): void {
    io(`close heap file '${this.path}'`, () => closeSync(this.fd));
  }
}
