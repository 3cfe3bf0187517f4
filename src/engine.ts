/**
 * chunkframe — table engine boundary
 *
 * The engine owns file decoding, projection, predicate evaluation and
 * writing. The rest of the package reaches it only through this interface,
 * so another columnar backend can replace ArrowEngine without touching
 * Table, RecordCodec or the query builders.
 *
 * Handles are opaque tokens. Memory returned by chunks() belongs to the
 * engine and stays valid until close(handle) or rechunk(handle).
 */

import type {
  ColumnInfo,
  ColumnPayload,
  FilterPredicate,
  NumericArrays,
  NumericColumnType,
} from './types';

export interface TableHandle {
  readonly kind: 'table';
  readonly path: string;
}

export interface QueryHandle {
  readonly kind: 'query';
  readonly path: string;
}

export interface WriterHandle {
  readonly kind: 'writer';
  readonly path: string;
}

export interface TableEngine {
  /**
   * Whether tables opened on this engine run the lifetime check in their
   * column accessors unless told otherwise.
   */
  readonly checkLifetimes?: boolean;

  // ── Tables ────────────────────────────────────────────────────────────────

  /** @throws TableIOError */
  open(path: string): TableHandle;
  /** @throws TableIOError, ColumnNotFoundError */
  openProjected(path: string, columns: readonly string[]): TableHandle;

  rowCount(handle: TableHandle): number;
  columnCount(handle: TableHandle): number;
  columns(handle: TableHandle): ColumnInfo[];

  /** Compact every column into a single chunk. Returns whether anything changed. */
  rechunk(handle: TableHandle): boolean;

  /**
   * Zero-copy views of a numeric column, one per chunk, in row order.
   * @throws ColumnNotFoundError, TypeMismatchError
   */
  chunks<T extends NumericColumnType>(handle: TableHandle, column: string, type: T): NumericArrays[T][];

  /** Allocating string read. Null cells read as ''. */
  stringColumn(handle: TableHandle, column: string): string[];

  /** Materializing bool read. Null cells read as false. */
  boolColumn(handle: TableHandle, column: string): boolean[];

  /** Null cells in a column of any type. @throws ColumnNotFoundError */
  nullCount(handle: TableHandle, column: string): number;

  close(handle: TableHandle): void;

  // ── Queries ───────────────────────────────────────────────────────────────

  newQuery(path: string): QueryHandle;
  querySelect(query: QueryHandle, columns: readonly string[]): void;
  queryFilter(query: QueryHandle, predicate: FilterPredicate): void;
  /** Run the query once. The query handle is consumed. */
  queryCollect(query: QueryHandle): TableHandle;

  // ── Writers ───────────────────────────────────────────────────────────────

  newWriter(path: string): WriterHandle;
  writerAddColumn(writer: WriterHandle, name: string, column: ColumnPayload): void;
  /** Write every added column to `path`. The writer handle is consumed. */
  writerFinish(writer: WriterHandle): void;
  /** Drop a writer without writing anything. */
  writerAbort(writer: WriterHandle): void;
}
