/**
 * heapform — error taxonomy
 *
 * Every error this package throws is a HeapformError with a machine-readable
 * `code`. Subclasses narrow the code to their own union so callers can switch
 * on it exhaustively.
 */

import { formatRid, type RID } from './types';

export class HeapformError<C extends string = string> extends Error {
  readonly code: C;

  constructor(code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HeapformError';
    this.code = code;
  }
}

// ─── Schema ───────────────────────────────────────────────────────────────────

export type SchemaErrorCode = 'MALFORMED' | 'UNKNOWN_TYPE' | 'DUPLICATE_FIELD' | 'INVALID_WIDTH';

/** Fatal at table-open time. Never retried. */
export class SchemaError extends HeapformError<SchemaErrorCode> {
  constructor(code: SchemaErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'SchemaError';
  }
}

// ─── Codecs ───────────────────────────────────────────────────────────────────

export type FieldErrorCode = 'TYPE_MISMATCH' | 'TRUNCATED';

export class FieldError extends HeapformError<FieldErrorCode> {
  constructor(
    code: FieldErrorCode,
    readonly field: string,
    message: string,
  ) {
    super(code, message);
    this.name = 'FieldError';
  }
}

export type RecordErrorCode = 'MISSING_FIELD' | 'EXTRA_FIELD' | 'TYPE_MISMATCH' | 'SIZE_MISMATCH';

/**
 * Local to a single encode/decode call. `field` names the offending column
 * for MISSING_FIELD, EXTRA_FIELD and TYPE_MISMATCH.
 */
export class RecordError extends HeapformError<RecordErrorCode> {
  readonly field: string | undefined;

  constructor(
    code: RecordErrorCode,
    message: string,
    options?: { field?: string; cause?: unknown },
  ) {
    super(code, message, { cause: options?.cause });
    this.name  = 'RecordError';
    this.field = options?.field;
  }

  static missingField(name: string): RecordError {
    return new RecordError('MISSING_FIELD', `Record is missing field '${name}'.`, { field: name });
  }

  static extraField(name: string): RecordError {
    return new RecordError(
      'EXTRA_FIELD',
      `Record has field '${name}', which the schema does not declare.`,
      { field: name },
    );
  }
}

// ─── Storage ──────────────────────────────────────────────────────────────────

export type StorageErrorCode = 'NO_SPACE' | 'IO' | 'CORRUPT_PAGE' | 'INVALID_RECORD' | 'CLOSED';

export class StorageError extends HeapformError<StorageErrorCode> {
  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'StorageError';
  }
}

/** The RID does not address a live record: never assigned, or deleted. */
export class NotFoundError extends HeapformError<'NOT_FOUND'> {
  constructor(readonly rid: RID) {
    super('NOT_FOUND', `No record at RID ${formatRid(rid)}.`);
    this.name = 'NotFoundError';
  }
}

// ─── Catalog & query ──────────────────────────────────────────────────────────

export type CatalogErrorCode = 'UNKNOWN_TABLE' | 'DUPLICATE_TABLE';

export class CatalogError extends HeapformError<CatalogErrorCode> {
  constructor(code: CatalogErrorCode, message: string) {
    super(code, message);
    this.name = 'CatalogError';
  }
}

export type QueryErrorCode = 'SYNTAX' | 'UNKNOWN_TABLE' | 'UNKNOWN_FIELD' | 'ARITY';

export class QueryError extends HeapformError<QueryErrorCode> {
  constructor(code: QueryErrorCode, message: string) {
    super(code, message);
    this.name = 'QueryError';
  }
}
