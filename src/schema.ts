/**
 * heapform — schema model
 *
 * Parses and validates a table description into an immutable Schema: the
 * ordered field list, each field's byte offset and width, and the total
 * record size. Parsing is pure: the same input always yields the same
 * Schema or the same SchemaError.
 *
 * Description format (schema.json):
 *
 *   {
 *     "table_name": "Employee",
 *     "file_name":  "employee.heap",          ← optional
 *     "fields": [
 *       { "name": "id",     "type": "int" },
 *       { "name": "name",   "type": "char(20)" },
 *       { "name": "salary", "type": "float" }
 *     ]
 *   }
 */

import { z } from 'zod';
import { FLOAT_WIDTH, INT_WIDTH } from './constants';
import { SchemaError } from './errors';
import type {
  FieldDefinition,
  FieldDescriptor,
  FieldType,
  TableDescription,
} from './types';

// ─── Description validation ───────────────────────────────────────────────────

export const TableDescriptionSchema = z.object({
  table_name: z.string().min(1),
  file_name:  z.string().min(1).optional(),
  fields: z
    .array(z.object({
      name: z.string().min(1),
      type: z.string(),
    }))
    .min(1),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ─── Field types ──────────────────────────────────────────────────────────────

const CHAR_TYPE = /^char\((.*)\)$/;
const INTEGER   = /^[+-]?\d+$/;

/**
 * Parse a type token: `int`, `float` or `char(N)`.
 *
 * A width that is not an integer (`char(x)`, `char(2.5)`) is an unknown type;
 * an integer width of zero or less is an invalid width.
 */
export function parseFieldType(token: string): FieldType {
  const t = token.trim();
  if (t === 'int')   return { kind: 'int' };
  if (t === 'float') return { kind: 'float' };

  const m = CHAR_TYPE.exec(t);
  const raw = m?.[1]?.trim();
  if (raw === undefined || !INTEGER.test(raw)) {
    throw new SchemaError('UNKNOWN_TYPE', `Unknown field type '${token}'.`);
  }

  const length = Number(raw);
  if (length <= 0 || !Number.isSafeInteger(length)) {
    throw new SchemaError(
      'INVALID_WIDTH',
      `Field type '${token}' declares width ${raw}; char width must be a positive integer.`,
    );
  }
  return { kind: 'char', length };
}

export function fieldWidth(type: FieldType): number {
  switch (type.kind) {
    case 'int':   return INT_WIDTH;
    case 'float': return FLOAT_WIDTH;
    case 'char':  return type.length;
  }
}

export function formatFieldType(type: FieldType): string {
  return type.kind === 'char' ? `char(${type.length})` : type.kind;
}

// ─── Schema ───────────────────────────────────────────────────────────────────

/**
 * Immutable description of one table's record layout.
 * Construct through parseSchema() or buildSchema().
 */
export class Schema {
  readonly tableName: string;
  readonly fileName:  string;
  readonly fields:    readonly FieldDescriptor[];
  private readonly byName: ReadonlyMap<string, FieldDescriptor>;
  private readonly size:   number;

  private constructor(tableName: string, fileName: string, fields: readonly FieldDescriptor[]) {
    this.tableName = tableName;
    this.fileName  = fileName;
    this.fields    = Object.freeze(fields);
    this.byName    = new Map(fields.map(f => [f.name, f]));
    this.size      = fields.reduce((total, f) => total + f.width, 0);
    Object.freeze(this);
  }

  /** @internal — use buildSchema() */
  static create(tableName: string, fileName: string, fields: readonly FieldDescriptor[]): Schema {
    return new Schema(tableName, fileName, fields);
  }

  field(name: string): FieldDescriptor | undefined {
    return this.byName.get(name);
  }

  /** Total fixed byte width of one record. */
  recordSize(): number {
    return this.size;
  }
}

/**
 * Build a Schema from typed field definitions.
 *
 * Fields are laid out in declaration order with no alignment padding, so
 * offset[0] = 0 and each offset is the previous offset plus its width.
 */
export function buildSchema(
  tableName: string,
  fields: readonly FieldDefinition[],
  fileName?: string,
): Schema {
  if (tableName.length === 0) {
    throw new SchemaError('MALFORMED', 'buildSchema: table name must be non-empty.');
  }
  if (fields.length === 0) {
    throw new SchemaError(
      'MALFORMED',
      `buildSchema: table '${tableName}' must declare at least one field.`,
    );
  }

  const seen = new Set<string>();
  const resolved: FieldDescriptor[] = [];
  let offset = 0;

  for (const f of fields) {
    if (f.name.length === 0) {
      throw new SchemaError('MALFORMED', `buildSchema: table '${tableName}' has a field with an empty name.`);
    }
    if (seen.has(f.name)) {
      throw new SchemaError(
        'DUPLICATE_FIELD',
        `buildSchema: duplicate field name '${f.name}' in table '${tableName}'.`,
      );
    }
    seen.add(f.name);

    if (f.type.kind === 'char' && (!Number.isSafeInteger(f.type.length) || f.type.length <= 0)) {
      throw new SchemaError(
        'INVALID_WIDTH',
        `buildSchema: field '${f.name}' has char width ${f.type.length}; it must be a positive integer.`,
      );
    }

    const width = fieldWidth(f.type);
    resolved.push(Object.freeze({ name: f.name, type: Object.freeze({ ...f.type }), offset, width }));
    offset += width;
  }

  return Schema.create(tableName, fileName ?? `${tableName}.heap`, resolved);
}

/**
 * Parse a table description, given either as JSON text or as an already
 * parsed value.
 *
 * @throws SchemaError MALFORMED       invalid JSON or a structurally invalid description
 * @throws SchemaError UNKNOWN_TYPE    a type token other than int, float, char(N)
 * @throws SchemaError DUPLICATE_FIELD a field name declared twice
 * @throws SchemaError INVALID_WIDTH   char(N) with N ≤ 0
 */
export function parseSchema(source: unknown): Schema {
  let value: unknown = source;
  if (typeof source === 'string') {
    try {
      value = JSON.parse(source);
    } catch (err) {
      throw new SchemaError('MALFORMED', 'Schema description is not valid JSON.', { cause: err });
    }
  }

  const result = TableDescriptionSchema.safeParse(value);
  if (!result.success) {
    throw new SchemaError(
      'MALFORMED',
      `Invalid table description: ${describeIssues(result.error)}`,
      { cause: result.error },
    );
  }

  const desc = result.data;
  const fields = desc.fields.map(f => ({ name: f.name, type: parseFieldType(f.type) }));
  return buildSchema(desc.table_name, fields, desc.file_name);
}

/** Render a Schema back into the description format. */
export function describeSchema(schema: Schema): TableDescription {
  return {
    table_name: schema.tableName,
    file_name:  schema.fileName,
    fields:     schema.fields.map(f => ({ name: f.name, type: formatFieldType(f.type) })),
  };
}
