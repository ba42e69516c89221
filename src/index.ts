// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  FieldType,
  FieldKind,
  FieldDescriptor,
  FieldDefinition,
  FieldValue,
  TableDescription,
  TableRecord,
  RecordBuffer,
  RID,
} from './types';

export { formatRid } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  INT_WIDTH,
  FLOAT_WIDTH,
  INT32_MIN,
  INT32_MAX,
  FILL_BYTE,
  DEFAULT_PAGE_SIZE,
  MIN_PAGE_SIZE,
  MAX_PAGE_SIZE,
  PAGE_FOOTER_SIZE,
  SLOT_ENTRY_SIZE,
  maxRecordBytes,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  HeapformError,
  SchemaError,
  FieldError,
  RecordError,
  StorageError,
  NotFoundError,
  CatalogError,
  QueryError,
} from './errors';
export type {
  SchemaErrorCode,
  FieldErrorCode,
  RecordErrorCode,
  StorageErrorCode,
  CatalogErrorCode,
  QueryErrorCode,
} from './errors';

// ─── Config & logging ─────────────────────────────────────────────────────────
export { loadConfig, LOG_LEVELS } from './config';
export type { HeapformConfig, LogLevel } from './config';
export { createLogger, defaultLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';

// ─── Schema ───────────────────────────────────────────────────────────────────
export {
  Schema,
  buildSchema,
  parseSchema,
  parseFieldType,
  fieldWidth,
  formatFieldType,
  describeSchema,
} from './schema';

// ─── Codecs ───────────────────────────────────────────────────────────────────
export { encodeField, decodeField, encodeChar, decodeChar } from './field-codec';
export { encodeRecord, decodeRecord } from './record-codec';

// ─── Storage ──────────────────────────────────────────────────────────────────
export { PagedHeapFile } from './heap-file';
export type { HeapFile, HeapFileOptions, SlotContent } from './heap-file';
export { MemoryHeapFile } from './memory-heap';
export { DiskHeapFile } from './disk-heap';

// ─── Tables ───────────────────────────────────────────────────────────────────
export { Table } from './table';
export type { ScanEntry, TableOptions } from './table';
export { Catalog, loadSchemas, diskHeapOpener } from './catalog';
export type { CatalogOptions, HeapOpener } from './catalog';

// ─── Query ────────────────────────────────────────────────────────────────────
export { executeQuery, parseInsert, parseSelect, parseLiteral } from './query';
export type { InsertStatement, SelectStatement, QueryResult } from './query';
