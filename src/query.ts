/**
 * heapform — query processor
 *
 * Two statement forms over a Catalog, keywords case-insensitive, trailing
 * semicolon optional:
 *
 *   INSERT INTO Employee (id, name, salary) VALUES (4, 'David', 4900)
 *   SELECT * FROM Employee
 *   SELECT name, salary FROM Employee WHERE id = 2
 *
 * Literals: 'text' (a doubled '' is a literal quote), integers, decimals.
 * WHERE is a single strict equality against the decoded column value.
 */

import { QueryError } from './errors';
import type { Catalog } from './catalog';
import type { Table } from './table';
import type { FieldValue, RID, TableRecord } from './types';

// ─── Statements ───────────────────────────────────────────────────────────────

export interface InsertStatement {
  readonly table:  string;
  readonly fields: readonly string[];
  readonly values: readonly FieldValue[];
}

export interface SelectStatement {
  readonly table:  string;
  readonly fields: '*' | readonly string[];
  readonly where?: { readonly field: string; readonly value: FieldValue };
}

export type QueryResult =
  | { readonly kind: 'insert'; readonly rid: RID }
  | { readonly kind: 'select'; readonly rows: TableRecord[] };

const INSERT_PATTERN = /^INSERT\s+INTO\s+(\w+)\s*\(([^)]*)\)\s*VALUES\s*\((.*)\)$/is;
const SELECT_PATTERN = /^SELECT\s+(.+?)\s+FROM\s+(\w+)(?:\s+WHERE\s+(.+))?$/is;
const CONDITION      = /^(\w+)\s*=\s*(.+)$/s;
const IDENTIFIER     = /^\w+$/;
const STRING_LITERAL = /^'(.*)'$/s;
const INTEGER        = /^[+-]?\d+$/;
const DECIMAL        = /^[+-]?(?:\d+\.\d*|\.\d+|\d+(?=[eE]))(?:[eE][+-]?\d+)?$/;

// ─── Lexing helpers ───────────────────────────────────────────────────────────

function stripStatement(sql: string): string {
  return sql.trim().replace(/;\s*$/, '').trim();
}

/** Split on commas that are not inside a quoted literal. */
function splitList(text: string): string[] {
  const out: string[] = [];
  let current = '';
  let quoted  = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "'") {
      if (quoted && text.charAt(i + 1) === "'") {
        current += "''";
        i++;
        continue;
      }
      quoted = !quoted;
      current += ch;
    } else if (ch === ',' && !quoted) {
      out.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  if (quoted) throw new QueryError('SYNTAX', `Unterminated string literal in '${text}'.`);
  out.push(current.trim());
  return out;
}

function parseIdentifiers(text: string): string[] {
  const names = text.split(',').map(s => s.trim());
  for (const name of names) {
    if (!IDENTIFIER.test(name)) {
      throw new QueryError('SYNTAX', `Invalid column name '${name}'.`);
    }
  }
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) throw new QueryError('SYNTAX', `Column '${name}' is listed twice.`);
    seen.add(name);
  }
  return names;
}

export function parseLiteral(raw: string): FieldValue {
  const text = raw.trim();
  const quoted = STRING_LITERAL.exec(text);
  if (quoted) return (quoted[1] ?? '').replace(/''/g, "'");
  if (INTEGER.test(text) || DECIMAL.test(text)) return Number(text);
  throw new QueryError('SYNTAX', `Invalid literal '${raw}'.`);
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

export function parseInsert(sql: string): InsertStatement {
  const m = INSERT_PATTERN.exec(stripStatement(sql));
  if (!m) throw new QueryError('SYNTAX', 'Invalid INSERT statement.');
  const [, table = '', fieldList = '', valueList = ''] = m;

  const fields = parseIdentifiers(fieldList);
  const values = splitList(valueList).map(parseLiteral);
  if (fields.length !== values.length) {
    throw new QueryError(
      'ARITY',
      `INSERT lists ${fields.length} columns but ${values.length} values.`,
    );
  }
  return { table, fields, values };
}

export function parseSelect(sql: string): SelectStatement {
  const m = SELECT_PATTERN.exec(stripStatement(sql));
  if (!m) throw new QueryError('SYNTAX', 'Invalid SELECT statement.');
  const [, fieldList = '', table = '', condition] = m;

  const fields = fieldList.trim() === '*' ? '*' : parseIdentifiers(fieldList);
  if (condition === undefined) return { table, fields };

  const c = CONDITION.exec(condition.trim());
  if (!c) throw new QueryError('SYNTAX', `Invalid WHERE condition '${condition.trim()}'.`);
  const [, field = '', value = ''] = c;
  return { table, fields, where: { field, value: parseLiteral(value) } };
}

// ─── Execution ────────────────────────────────────────────────────────────────

function tableFor(catalog: Catalog, name: string): Table {
  if (!catalog.has(name)) throw new QueryError('UNKNOWN_TABLE', `Unknown table '${name}'.`);
  return catalog.open(name);
}

function checkField(table: Table, field: string): void {
  if (table.schema.field(field) === undefined) {
    throw new QueryError('UNKNOWN_FIELD', `Table '${table.name}' has no field '${field}'.`);
  }
}

function runSelect(catalog: Catalog, stmt: SelectStatement): TableRecord[] {
  const table = tableFor(catalog, stmt.table);
  const { fields, where } = stmt;
  if (fields !== '*') fields.forEach(f => checkField(table, f));
  if (where) checkField(table, where.field);

  const rows = table.records().filter(row =>
    !where || (Object.hasOwn(row, where.field) && row[where.field] === where.value));
  if (fields === '*') return rows;

  // Rows are built from own entries: a column named `__proto__` stays a column.
  return rows.map(row => {
    const entries: Array<[string, FieldValue]> = [];
    for (const f of fields) {
      const value = Object.hasOwn(row, f) ? row[f] : undefined;
      if (value !== undefined) entries.push([f, value]);
    }
    return Object.fromEntries(entries);
  });
}

/**
 * Run one statement against `catalog`, opening its table on first use.
 * Inserts go through Table.insert(), so every record-codec error applies.
 *
 * @throws QueryError SYNTAX | UNKNOWN_TABLE | UNKNOWN_FIELD | ARITY
 */
export function executeQuery(catalog: Catalog, sql: string): QueryResult {
  const verb = sql.trimStart().slice(0, 6).toUpperCase();

  if (verb === 'INSERT') {
    const stmt   = parseInsert(sql);
    const table  = tableFor(catalog, stmt.table);
    const entries: Array<[string, FieldValue]> = [];
    stmt.fields.forEach((f, i) => {
      const value = stmt.values[i];
      if (value !== undefined) entries.push([f, value]);
    });
    const record: TableRecord = Object.fromEntries(entries);
    return { kind: 'insert', rid: table.insert(record) };
  }

  if (verb === 'SELECT') {
    return { kind: 'select', rows: runSelect(catalog, parseSelect(sql)) };
  }

  throw new QueryError('SYNTAX', 'Statement must start with SELECT or INSERT.');
}
