// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  ColumnType,
  NumericColumnType,
  ColumnTypeName,
  NumericArrays,
  ColumnValues,
  ColumnValue,
  ColumnInfo,
  ColumnPayload,
  FilterOp,
  FilterValue,
  FilterPredicate,
  FilterLiteral,
} from './types';

export { COLUMN_TYPES, NUMERIC_COLUMN_TYPES, isNumericColumnType } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  DEFAULT_ROW_GROUP_SIZE,
  Eq,
  Ne,
  Lt,
  Le,
  Gt,
  Ge,
  FILTER_OPS,
  EQUALITY_OPS,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  TableIOError,
  TypeMismatchError,
  ColumnNotFoundError,
  IndexOutOfRangeError,
  FieldNotRegisteredError,
  StaleColumnError,
  WriterClosedError,
  ConfigError,
} from './errors';

// ─── Logging ──────────────────────────────────────────────────────────────────
export {
  createLogger,
  createConsoleLogger,
  createTestLogger,
  formatEntry,
  isLevelEnabled,
  noopLogger,
} from './logging';
export type {
  LogLevel,
  LogContext,
  LogContextValue,
  LogEntry,
  Logger,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
} from './logging';

// ─── Configuration ────────────────────────────────────────────────────────────
export { ChunkframeConfigSchema, LogLevelSchema, resolveConfig, configFromEnv } from './config';
export type { ChunkframeConfig, ChunkframeConfigInput } from './config';

// ─── Chunks ───────────────────────────────────────────────────────────────────
export { ChunkView, CrossChunkIterator, ChunkedColumn } from './chunk';
export type { ColumnLease } from './chunk';

// ─── Bitsets ──────────────────────────────────────────────────────────────────
export {
  createBitset,
  setBit,
  testBit,
  computeIntersection,
  popcount,
  forEachSet,
  collectSet,
  unpackBits,
} from './bitset';

// ─── Engine ───────────────────────────────────────────────────────────────────
export type { TableEngine, TableHandle, QueryHandle, WriterHandle } from './engine';
export { ArrowEngine, createEngine, defaultEngine } from './arrow-engine';
export type { ArrowEngineOptions } from './arrow-engine';
export { FileStore, MemoryStore } from './store';
export type { TableStore } from './store';
export { columnTypeOf, describeSchema } from './schema';

// ─── Table ────────────────────────────────────────────────────────────────────
export { Table } from './table';
export type { TableOptions } from './table';

// ─── Codec ────────────────────────────────────────────────────────────────────
export { RecordCodec, defineRecord, getCodec } from './codec';
export type { FieldKey, FieldDescriptor, ColumnSink, RecordType } from './codec';

// ─── Query ────────────────────────────────────────────────────────────────────
export { QueryBuilder, RecordQuery, resolveLiteral } from './query';
export type { QueryOptions } from './query';

// ─── Writer ───────────────────────────────────────────────────────────────────
export { TableWriter } from './writer';
export type { TableWriterOptions } from './writer';
