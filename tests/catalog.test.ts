/**
 * heapform — Catalog and schema files
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, statSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  Catalog,
  CatalogError,
  diskHeapOpener,
  loadSchemas,
  MemoryHeapFile,
  SchemaError,
  type HeapFile,
  type Schema,
} from '../src/index';

const EMPLOYEE = {
  table_name: 'Employee',
  file_name:  'employee.heap',
  fields: [
    { name: 'id',     type: 'int' },
    { name: 'name',   type: 'char(20)' },
    { name: 'salary', type: 'float' },
  ],
};

const DEPT = {
  table_name: 'Dept',
  file_name:  'dept.heap',
  fields: [
    { name: 'id',   type: 'int' },
    { name: 'name', type: 'char(20)' },
  ],
};

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function memoryCatalog() {
  const opened: string[] = [];
  const catalog = new Catalog(loadSchemas([EMPLOYEE, DEPT]), (schema: Schema): HeapFile => {
    opened.push(schema.tableName);
    return new MemoryHeapFile({ pageSize: 512 });
  });
  return { catalog, opened };
}

// ─── loadSchemas ──────────────────────────────────────────────────────────────

describe('loadSchemas', () => {
  it('accepts a single table description', () => {
    const schemas = loadSchemas(JSON.stringify(EMPLOYEE));
    expect(schemas.map(s => s.tableName)).toEqual(['Employee']);
  });

  it('accepts a list of descriptions, keeping file order', () => {
    const schemas = loadSchemas(JSON.stringify([EMPLOYEE, DEPT]));
    expect(schemas.map(s => [s.tableName, s.fileName, s.recordSize()])).toEqual([
      ['Employee', 'employee.heap', 28],
      ['Dept',     'dept.heap',     24],
    ]);
  });

  it('accepts an object keyed by table name', () => {
    const schemas = loadSchemas(JSON.stringify({ Employee: EMPLOYEE, Dept: DEPT }));
    expect(schemas.map(s => s.tableName)).toEqual(['Employee', 'Dept']);
  });

  it('rejects a table declared twice', () => {
    const err = caught(() => loadSchemas([EMPLOYEE, EMPLOYEE]));
    expect(err).toBeInstanceOf(SchemaError);
    expect(err).toMatchObject({ code: 'MALFORMED' });
  });

  it('rejects invalid JSON and scalar roots', () => {
    expect(caught(() => loadSchemas('[{'))).toMatchObject({ code: 'MALFORMED' });
    expect(caught(() => loadSchemas('"Employee"'))).toMatchObject({ code: 'MALFORMED' });
  });

  it('surfaces the first bad table description', () => {
    const bad = { table_name: 'Bad', fields: [{ name: 'x', type: 'varchar(10)' }] };
    expect(caught(() => loadSchemas([EMPLOYEE, bad]))).toMatchObject({ code: 'UNKNOWN_TYPE' });
  });
});

// ─── Catalog ──────────────────────────────────────────────────────────────────

describe('Catalog', () => {
  it('lists declared tables without opening any', () => {
    const { catalog, opened } = memoryCatalog();
    expect(catalog.tableNames()).toEqual(['Employee', 'Dept']);
    expect(catalog.has('Dept')).toBe(true);
    expect(catalog.has('Payroll')).toBe(false);
    expect(opened).toEqual([]);
  });

  it('opens a table once and hands back the same handle', () => {
    const { catalog, opened } = memoryCatalog();
    const first  = catalog.open('Employee');
    const second = catalog.table('Employee');

    expect(second).toBe(first);
    expect(first.name).toBe('Employee');
    expect(catalog.isOpen('Employee')).toBe(true);
    expect(catalog.isOpen('Dept')).toBe(false);
    expect(opened).toEqual(['Employee']);
  });

  it('throws UNKNOWN_TABLE for an undeclared table', () => {
    const { catalog } = memoryCatalog();
    const err = caught(() => catalog.open('Payroll'));
    expect(err).toBeInstanceOf(CatalogError);
    expect(err).toMatchObject({ code: 'UNKNOWN_TABLE' });
  });

  it('rejects duplicate schemas passed directly', () => {
    const [employee] = loadSchemas([EMPLOYEE]);
    const err = caught(() => new Catalog(
      employee ? [employee, employee] : [],
      () => new MemoryHeapFile({ pageSize: 512 }),
    ));
    expect(err).toMatchObject({ code: 'DUPLICATE_TABLE' });
  });

  it('close() closes the handle; the next open() gets a fresh one', () => {
    const { catalog, opened } = memoryCatalog();
    const first = catalog.open('Dept');
    first.insert({ id: 10, name: 'HR' });

    catalog.close('Dept');
    expect(catalog.isOpen('Dept')).toBe(false);
    expect(caught(() => first.records())).toMatchObject({ code: 'CLOSED' });

    const second = catalog.open('Dept');
    expect(second).not.toBe(first);
    expect(opened).toEqual(['Dept', 'Dept']);
  });

  it('closeAll() closes every open table', () => {
    const { catalog } = memoryCatalog();
    catalog.open('Employee');
    catalog.open('Dept');
    catalog.closeAll();
    expect(catalog.isOpen('Employee')).toBe(false);
    expect(catalog.isOpen('Dept')).toBe(false);
    catalog.close('Employee'); // closing an unopened table is a no-op
  });
});

// ─── Disk-backed catalog ──────────────────────────────────────────────────────

describe('diskHeapOpener', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'heapform-catalog-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps each table in its own file and survives a reopen', () => {
    const schemas = loadSchemas([EMPLOYEE, DEPT]);

    const first = new Catalog(schemas, diskHeapOpener(dir, { pageSize: 1024 }));
    first.open('Employee').insert({ id: 1, name: 'Alice', salary: 4500 });
    first.open('Dept').insert({ id: 10, name: 'HR' });
    first.closeAll();

    expect(statSync(join(dir, 'employee.heap')).size).toBe(1024);
    expect(statSync(join(dir, 'dept.heap')).size).toBe(1024);

    const second = new Catalog(schemas, diskHeapOpener(dir, { pageSize: 1024 }));
    expect(second.open('Employee').records()).toEqual([{ id: 1, name: 'Alice', salary: 4500 }]);
    expect(second.open('Dept').records()).toEqual([{ id: 10, name: 'HR' }]);
    second.closeAll();
  });
});
