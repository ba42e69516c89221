/**
 * heapform — Catalog
 *
 * Explicit owner of every open Table, keyed by table name. Callers create a
 * Catalog, pass it where tables are needed, and close it when done.
 *
 * A schema file may hold one table description, a list of them, or an
 * object keyed by table name:
 *
 *   { "table_name": "Dept", "fields": [...] }
 *   [ { "table_name": "Employee", ... }, { "table_name": "Dept", ... } ]
 *   { "Employee": { "table_name": "Employee", ... }, "Dept": { ... } }
 */

import { resolve } from 'node:path';
import { DiskHeapFile } from './disk-heap';
import { CatalogError, SchemaError } from './errors';
import { defaultLogger, type Logger } from './logger';
import { parseSchema, type Schema } from './schema';
import { Table } from './table';
import type { HeapFile, HeapFileOptions } from './heap-file';

export type HeapOpener = (schema: Schema) => HeapFile;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a schema file into one Schema per table, in file order.
 *
 * @throws SchemaError MALFORMED  invalid JSON, an unrecognised shape, or a
 *                                table name declared twice
 */
export function loadSchemas(source: unknown): Schema[] {
  let value: unknown = source;
  if (typeof source === 'string') {
    try {
      value = JSON.parse(source);
    } catch (err) {
      throw new SchemaError('MALFORMED', 'Schema file is not valid JSON.', { cause: err });
    }
  }

  let descriptions: unknown[];
  if (Array.isArray(value)) {
    descriptions = value;
  } else if (isPlainObject(value)) {
    descriptions = 'table_name' in value ? [value] : Object.values(value);
  } else {
    throw new SchemaError('MALFORMED', 'Schema file must hold an object or an array of table descriptions.');
  }

  const schemas = descriptions.map(desc => parseSchema(desc));
  const seen = new Set<string>();
  for (const schema of schemas) {
    if (seen.has(schema.tableName)) {
      throw new SchemaError('MALFORMED', `Table '${schema.tableName}' is declared more than once.`);
    }
    seen.add(schema.tableName);
  }
  return schemas;
}

/**
 * Open each table's heap file under `directory` (default: the working
 * directory), creating it on first use.
 */
export function diskHeapOpener(directory = '.', options: HeapFileOptions = {}): HeapOpener {
  return schema => DiskHeapFile.openOrCreate(resolve(directory, schema.fileName), options);
}

export interface CatalogOptions {
  logger?: Logger;
}

export class Catalog {
  private readonly schemas = new Map<string, Schema>();
  private readonly handles = new Map<string, Table>();
  private readonly log:    Logger;

  constructor(
    schemas: readonly Schema[],
    private readonly openHeap: HeapOpener,
    options: CatalogOptions = {},
  ) {
    this.log = options.logger ?? defaultLogger('catalog');
    for (const schema of schemas) {
      if (this.schemas.has(schema.tableName)) {
        throw new CatalogError('DUPLICATE_TABLE', `Table '${schema.tableName}' is declared more than once.`);
      }
      this.schemas.set(schema.tableName, schema);
    }
  }

  /** Declared table names, in declaration order. */
  tableNames(): string[] {
    return [...this.schemas.keys()];
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  schema(name: string): Schema {
    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new CatalogError('UNKNOWN_TABLE', `Unknown table '${name}'.`);
    }
    return schema;
  }

  isOpen(name: string): boolean {
    return this.handles.has(name);
  }

  /** Open `name`, or return its handle if it is already open. */
  open(name: string): Table {
    const existing = this.handles.get(name);
    if (existing !== undefined) return existing;

    const schema = this.schema(name);
    const table  = new Table(schema, this.openHeap(schema), { logger: this.log.child({ component: 'table' }) });
    this.handles.set(name, table);
    this.log.info({ table: name, file: schema.fileName, recordSize: schema.recordSize() }, 'table opened');
    return table;
  }

  /** Alias of open(): tables open lazily on first use. */
  table(name: string): Table {
    return this.open(name);
  }

  close(name: string): void {
    const table = this.handles.get(name);
    if (table === undefined) return;
    this.handles.delete(name);
    table.close();
    this.log.info({ table: name }, 'table closed');
  }

  closeAll(): void {
    for (const name of [...this.handles.keys()]) this.close(name);
  }
}
