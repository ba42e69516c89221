/**
 * heapform — Table
 *
 * Binds one Schema to one HeapFile. Encodes on the way in, decodes on the
 * way out, and leaves every physical concern (page choice, RID assignment,
 * I/O) to the heap file. Storage errors pass through unchanged.
 *
 *   const table = new Table(parseSchema(json), DiskHeapFile.openOrCreate(path));
 *   const rid   = table.insert({ id: 7, name: 'Bob', salary: 5000.5 });
 *   table.get(rid);                         // { id: 7, name: 'Bob', salary: 5000.5 }
 *   for (const entry of table.scan()) {
 *     if (entry.ok) render(entry.record);
 *     else          report(entry.rid, entry.error);
 *   }
 */

import { HeapformError } from './errors';
import { defaultLogger, type Logger } from './logger';
import { decodeRecord, encodeRecord } from './record-codec';
import { formatRid, type RID, type TableRecord } from './types';
import type { HeapFile } from './heap-file';
import type { Schema } from './schema';

/**
 * One item of a scan. A slot whose bytes do not decode is reported in place
 * so one corrupt record never hides the rest of the table.
 */
export type ScanEntry =
  | { readonly ok: true;  readonly rid: RID; readonly record: TableRecord }
  | { readonly ok: false; readonly rid: RID; readonly error: HeapformError };

export interface TableOptions {
  logger?: Logger;
}

export class Table {
  private readonly log: Logger;

  constructor(
    readonly schema: Schema,
    private readonly heap: HeapFile,
    options: TableOptions = {},
  ) {
    this.log = (options.logger ?? defaultLogger('table'))
      .child({ table: schema.tableName });
  }

  get name(): string {
    return this.schema.tableName;
  }

  /**
   * @throws RecordError   the record does not match the schema
   * @throws StorageError  the heap file has no room or failed
   */
  insert(record: TableRecord): RID {
    const rid = this.heap.insertRecord(encodeRecord(this.schema, record));
    this.log.debug({ rid: formatRid(rid) }, 'record inserted');
    return rid;
  }

  /** @throws NotFoundError for an unassigned or deleted RID */
  get(rid: RID): TableRecord {
    return decodeRecord(this.schema, this.heap.getRecord(rid));
  }

  /** @throws NotFoundError for an unassigned or deleted RID */
  delete(rid: RID): void {
    this.heap.deleteRecord(rid);
    this.log.debug({ rid: formatRid(rid) }, 'record deleted');
  }

  /**
   * Lazily decode every live record in heap order. Each call starts a fresh
   * pass from the first page.
   */
  *scan(): Generator<ScanEntry, void, undefined> {
    for (const [rid, content] of this.heap.scanRecords()) {
      let entry: ScanEntry;
      if (content instanceof HeapformError) {
        entry = this.failed(rid, content);
      } else {
        try {
          entry = { ok: true, rid, record: decodeRecord(this.schema, content) };
        } catch (err) {
          if (!(err instanceof HeapformError)) throw err;
          entry = this.failed(rid, err);
        }
      }
      yield entry;
    }
  }

  private failed(rid: RID, error: HeapformError): ScanEntry {
    this.log.warn({ rid: formatRid(rid), code: error.code }, 'skipping undecodable record');
    return { ok: false, rid, error };
  }

  /** Every record that decodes, in heap order. */
  records(): TableRecord[] {
    const out: TableRecord[] = [];
    for (const entry of this.scan()) {
      if (entry.ok) out.push(entry.record);
    }
    return out;
  }

  close(): void {
    this.heap.close();
  }
}
