import { loadConfig } from './config';
import { PagedHeapFile, type HeapFileOptions } from './heap-file';

/**
 * Heap file whose pages live in process memory. Same page format and RID
 * assignment as DiskHeapFile; nothing survives close().
 */
export class MemoryHeapFile extends PagedHeapFile {
  private pages: Uint8Array[] = [];

  constructor(options: HeapFileOptions = {}) {
    super(options.pageSize ?? loadConfig().pageSize);
  }

  protected pageCount(): number {
    return this.pages.length;
  }

  protected readPage(pageNo: number): Uint8Array {
    const page = this.pages[pageNo];
    if (page === undefined) throw new RangeError(`Page ${pageNo} does not exist.`);
    return page;
  }

  protected writePage(pageNo: number, page: Uint8Array): void {
    this.pages[pageNo] = page;
  }

  protected release(): void {
    this.pages = [];
  }
}
