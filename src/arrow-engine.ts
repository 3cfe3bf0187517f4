/**
 * chunkframe — Apache Arrow table engine
 *
 * Tables are Arrow IPC files kept in a TableStore. Every record batch of a
 * file becomes one chunk of every column, so a file written with N row
 * groups reads back as N-chunk columns.
 *
 * Predicates run one bitset per filter over the scanned rows; the AND of all
 * bitsets selects the rows gathered into the result table:
 *
 *   score > 80   [0 1 1 0 1]
 *   flag == true [1 1 0 0 1]
 *   AND          [0 1 0 0 1]  → rows 1, 4
 *
 * Null cells never match a predicate. Filtering and rechunking keep nulls.
 */

import {
  Bool,
  Field,
  RecordBatch,
  Schema,
  Table,
  Utf8,
  makeVector,
  tableFromIPC,
  tableToIPC,
  vectorFromArray,
  type Vector,
} from 'apache-arrow';
import { collectSet, computeIntersection, createBitset, setBit, unpackBits } from './bitset';
import { ChunkedColumn } from './chunk';
import { resolveConfig, configFromEnv, type ChunkframeConfig, type ChunkframeConfigInput } from './config';
import { EQUALITY_OPS } from './constants';
import type { QueryHandle, TableEngine, TableHandle, WriterHandle } from './engine';
import {
  ColumnNotFoundError,
  StaleColumnError,
  TableIOError,
  TypeMismatchError,
  WriterClosedError,
} from './errors';
import { createConsoleLogger, type Logger } from './logging';
import { NUMERIC_VIEWS, columnTypeOf, describeSchema } from './schema';
import { FileStore, type TableStore } from './store';
import {
  isNumericColumnType,
  type ColumnInfo,
  type ColumnPayload,
  type ColumnTypeName,
  type FilterOp,
  type FilterPredicate,
  type NumericArrays,
  type NumericColumnType,
} from './types';

// ─── Engine State ─────────────────────────────────────────────────────────────

interface TableState {
  readonly path: string;
  table: Table;
}

interface QueryState {
  readonly path: string;
  columns?: readonly string[];
  readonly predicates: FilterPredicate[];
}

interface WriterState {
  readonly path: string;
  readonly columns: Map<string, Vector>;
  rows?: number;
}

export interface ArrowEngineOptions {
  store:           TableStore;
  /** Rows per record batch on write (default: config default, 65536). */
  rowGroupSize?:   number;
  checkLifetimes?: boolean;
  logger:          Logger;
}

// ─── Row Matching ─────────────────────────────────────────────────────────────

type Matcher = (cell: unknown) => boolean;

/** -1, 0 or 1; NaN when either side is NaN. Mixed number/bigint compares exactly. */
function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  if ((typeof a === 'number' && Number.isNaN(a)) || (typeof b === 'number' && Number.isNaN(b))) {
    return NaN;
  }
  return 0;
}

function applyOp(op: FilterOp, order: number): boolean {
  if (Number.isNaN(order)) return op === 'ne';
  switch (op) {
    case 'eq': return order === 0;
    case 'ne': return order !== 0;
    case 'lt': return order <  0;
    case 'le': return order <= 0;
    case 'gt': return order >  0;
    case 'ge': return order >= 0;
  }
}

function buildMatcher(predicate: FilterPredicate, columnType: ColumnTypeName): Matcher {
  const { column, op, value } = predicate;
  switch (value.type) {
    case 'i32':
    case 'i64':
    case 'u64':
    case 'f32':
    case 'f64': {
      if (!isNumericColumnType(columnType)) {
        throw new TypeMismatchError(column, value.type, columnType, 'Numeric filters apply to numeric columns only.');
      }
      const literal = value.value;
      return (cell) =>
        (typeof cell === 'number' || typeof cell === 'bigint') && applyOp(op, compareNumeric(cell, literal));
    }
    case 'utf8': {
      if (columnType !== 'utf8') {
        throw new TypeMismatchError(column, 'utf8', columnType, 'String filters apply to utf8 columns only.');
      }
      const literal = value.value;
      return (cell) =>
        typeof cell === 'string' && applyOp(op, cell < literal ? -1 : cell > literal ? 1 : 0);
    }
    case 'bool': {
      if (columnType !== 'bool') {
        throw new TypeMismatchError(column, 'bool', columnType, 'Boolean filters apply to bool columns only.');
      }
      const literal = value.value;
      return (cell) => typeof cell === 'boolean' && applyOp(op, cell === literal ? 0 : 1);
    }
  }
}

// ─── Table Construction ───────────────────────────────────────────────────────

/** IPC files open with these six bytes. */
const ARROW_FILE_MAGIC = 'ARROW1';

function hasFileMagic(bytes: Uint8Array): boolean {
  if (bytes.length < ARROW_FILE_MAGIC.length) return false;
  for (let i = 0; i < ARROW_FILE_MAGIC.length; i++) {
    if (bytes[i] !== ARROW_FILE_MAGIC.charCodeAt(i)) return false;
  }
  return true;
}

/**
 * A zero-row table that still carries its schema. A table with no record
 * batches at all loses its schema on an IPC round trip.
 */
function emptyTable(schema: Schema): Table {
  // RecordBatch takes its one-argument form as a name → Data map, so pass
  // the data slot explicitly to get empty children.
  return new Table(schema, [new RecordBatch(schema, undefined)]);
}

function tableOf(columns: ReadonlyMap<string, Vector>): Table {
  const rows = columns.size === 0 ? 0 : [...columns.values()][0].length;
  if (rows === 0) {
    const fields = [...columns].map(([name, vector]) => new Field(name, vector.type, true));
    return emptyTable(new Schema(fields));
  }
  return new Table(Object.fromEntries(columns));
}

function vectorOfPayload(payload: ColumnPayload): Vector {
  switch (payload.type) {
    case 'i32':  return makeVector(payload.values);
    case 'i64':  return makeVector(payload.values);
    case 'u64':  return makeVector(payload.values);
    case 'f32':  return makeVector(payload.values);
    case 'f64':  return makeVector(payload.values);
    case 'utf8':
      return vectorFromArray(payload.values, new Utf8());
    case 'bool':
      return vectorFromArray(Array.from(payload.values, (b) => b !== 0), new Bool());
  }
}

/**
 * Copy `rows` of `vector` cell by cell into a vector of the same Arrow type.
 * Keeps nulls, and works for every type the builders know, including the
 * ones outside the column tags (int16, timestamps, dictionaries, ...).
 */
function gather(vector: Vector, rows: Uint32Array): Vector {
  return vectorFromArray(Array.from(rows, (r) => vector.get(r)), vector.type);
}

// ─── ArrowEngine ──────────────────────────────────────────────────────────────

export class ArrowEngine implements TableEngine {
  readonly checkLifetimes: boolean;
  readonly rowGroupSize:   number;

  private readonly store:   TableStore;
  private readonly logger:  Logger;
  private readonly tables  = new WeakMap<TableHandle, TableState>();
  private readonly queries = new WeakMap<QueryHandle, QueryState>();
  private readonly writers = new WeakMap<WriterHandle, WriterState>();

  constructor(options: ArrowEngineOptions) {
    const defaults = resolveConfig({});
    this.store          = options.store;
    this.logger         = options.logger;
    this.rowGroupSize   = options.rowGroupSize ?? defaults.rowGroupSize;
    this.checkLifetimes = options.checkLifetimes ?? defaults.checkLifetimes;
    if (!Number.isInteger(this.rowGroupSize) || this.rowGroupSize <= 0) {
      throw new RangeError(`rowGroupSize must be a positive integer, got ${this.rowGroupSize}.`);
    }
  }

  // ── Tables ────────────────────────────────────────────────────────────────

  open(path: string): TableHandle {
    return this.register(path, this.decode(path));
  }

  openProjected(path: string, columns: readonly string[]): TableHandle {
    return this.register(path, this.project(path, this.decode(path), columns));
  }

  rowCount(handle: TableHandle): number {
    return this.table(handle).table.numRows;
  }

  columnCount(handle: TableHandle): number {
    return this.table(handle).table.numCols;
  }

  columns(handle: TableHandle): ColumnInfo[] {
    return describeSchema(this.table(handle).table.schema);
  }

  rechunk(handle: TableHandle): boolean {
    const state = this.table(handle);
    if (state.table.batches.length <= 1) return false;
    const rows = Uint32Array.from({ length: state.table.numRows }, (_, i) => i);
    state.table = this.takeRows(state.table, rows);
    this.logger.debug('rechunked table', { path: state.path, rows: state.table.numRows });
    return true;
  }

  chunks<T extends NumericColumnType>(handle: TableHandle, column: string, type: T): NumericArrays[T][] {
    const vector = this.child(this.table(handle).table, column);
    const actual = columnTypeOf(vector.type);
    if (actual !== type) throw new TypeMismatchError(column, type, actual);
    return this.numericViews(column, vector, type);
  }

  stringColumn(handle: TableHandle, column: string): string[] {
    const vector = this.child(this.table(handle).table, column);
    const actual = columnTypeOf(vector.type);
    if (actual !== 'utf8') throw new TypeMismatchError(column, 'utf8', actual);

    const out: string[] = [];
    for (const cell of vector) {
      const value: unknown = cell;
      out.push(typeof value === 'string' ? value : '');
    }
    return out;
  }

  boolColumn(handle: TableHandle, column: string): boolean[] {
    const vector = this.child(this.table(handle).table, column);
    const actual = columnTypeOf(vector.type);
    if (actual !== 'bool') throw new TypeMismatchError(column, 'bool', actual);

    const out: boolean[] = [];
    let base = 0;
    for (const data of vector.data) {
      const bytes: unknown = data.values;
      if (data.length > 0 && !(bytes instanceof Uint8Array)) {
        throw new TypeMismatchError(column, 'bool', actual, 'The value buffer is not a bitmap.');
      }
      const bits = bytes instanceof Uint8Array ? unpackBits(bytes, data.offset, data.length) : [];
      for (let i = 0; i < bits.length; i++) {
        out.push(bits[i] && (data.nullCount === 0 || vector.isValid(base + i)));
      }
      base += data.length;
    }
    return out;
  }

  nullCount(handle: TableHandle, column: string): number {
    return this.child(this.table(handle).table, column).nullCount;
  }

  close(handle: TableHandle): void {
    if (this.tables.delete(handle)) {
      this.logger.debug('closed table', { path: handle.path });
    }
  }

  // ── Queries ───────────────────────────────────────────────────────────────

  newQuery(path: string): QueryHandle {
    const handle: QueryHandle = { kind: 'query', path };
    this.queries.set(handle, { path, predicates: [] });
    return handle;
  }

  querySelect(query: QueryHandle, columns: readonly string[]): void {
    this.query(query).columns = [...columns];
  }

  queryFilter(query: QueryHandle, predicate: FilterPredicate): void {
    if (predicate.value.type === 'bool' && !EQUALITY_OPS.has(predicate.op)) {
      throw new TypeError(
        `Operator '${predicate.op}' is not defined for bool values (column '${predicate.column}'). Use 'eq' or 'ne'.`,
      );
    }
    this.query(query).predicates.push(predicate);
  }

  queryCollect(query: QueryHandle): TableHandle {
    const state = this.query(query);
    this.queries.delete(query);

    let table = this.decode(state.path);
    if (state.columns !== undefined) {
      table = this.project(state.path, table, state.columns);
    }

    if (state.predicates.length > 0) {
      const rows   = table.numRows;
      const masks  = state.predicates.map((predicate) => this.evaluate(table, predicate));
      const keep   = collectSet(computeIntersection(masks), rows);
      table = this.takeRows(table, keep);
      this.logger.debug('filtered table', {
        path:       state.path,
        operation:  'queryCollect',
        rows:       table.numRows,
        scanned:    rows,
        predicates: state.predicates.length,
      });
    }

    return this.register(state.path, table);
  }

  // ── Writers ───────────────────────────────────────────────────────────────

  newWriter(path: string): WriterHandle {
    const handle: WriterHandle = { kind: 'writer', path };
    this.writers.set(handle, { path, columns: new Map() });
    return handle;
  }

  writerAddColumn(writer: WriterHandle, name: string, column: ColumnPayload): void {
    const state = this.writer(writer);
    if (state.columns.has(name)) {
      throw new TypeError(`Column '${name}' was already added to the writer for '${state.path}'.`);
    }
    const vector = vectorOfPayload(column);
    if (state.rows !== undefined && vector.length !== state.rows) {
      throw new TypeError(
        `Column '${name}' has ${vector.length} rows, but earlier columns have ${state.rows}.`,
      );
    }
    state.rows = vector.length;
    state.columns.set(name, vector);
  }

  writerFinish(writer: WriterHandle): void {
    const state = this.writer(writer);
    this.writers.delete(writer);

    const rows   = state.rows ?? 0;
    const groups: Table[] = [];
    for (let start = 0; start < rows; start += this.rowGroupSize) {
      const end   = Math.min(start + this.rowGroupSize, rows);
      const slice = new Map<string, Vector>();
      for (const [name, vector] of state.columns) slice.set(name, vector.slice(start, end));
      groups.push(tableOf(slice));
    }
    const table = groups.length === 0 ? tableOf(state.columns) : groups[0].concat(...groups.slice(1));

    this.store.write(state.path, tableToIPC(table, 'file'));
    this.logger.debug('wrote table', {
      path:    state.path,
      rows,
      columns: [...state.columns.keys()],
      groups:  groups.length,
    });
  }

  writerAbort(writer: WriterHandle): void {
    this.writers.delete(writer);
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private register(path: string, table: Table): TableHandle {
    const handle: TableHandle = { kind: 'table', path };
    this.tables.set(handle, { path, table });
    this.logger.debug('opened table', {
      path,
      rows:    table.numRows,
      columns: table.schema.fields.map((f) => f.name),
      chunks:  table.batches.length,
    });
    return handle;
  }

  private table(handle: TableHandle): TableState {
    const state = this.tables.get(handle);
    if (state === undefined) throw new StaleColumnError(`Table '${handle.path}' is closed.`);
    return state;
  }

  private query(handle: QueryHandle): QueryState {
    const state = this.queries.get(handle);
    if (state === undefined) throw new TypeError(`Query on '${handle.path}' was already collected.`);
    return state;
  }

  private writer(handle: WriterHandle): WriterState {
    const state = this.writers.get(handle);
    if (state === undefined) throw new WriterClosedError(`Writer for '${handle.path}' is already finished.`);
    return state;
  }

  private decode(path: string): Table {
    const bytes = this.store.read(path);
    if (!hasFileMagic(bytes)) {
      throw new TableIOError(`'${path}' is not an Arrow IPC file.`);
    }
    try {
      return tableFromIPC(bytes);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TableIOError(`'${path}' is not a readable Arrow table: ${reason}`, { cause: error });
    }
  }

  private names(table: Table): string[] {
    return table.schema.fields.map((f) => f.name);
  }

  private child(table: Table, column: string): Vector {
    const vector = table.getChild(column);
    if (vector === null) throw new ColumnNotFoundError(column, this.names(table));
    return vector;
  }

  private project(path: string, table: Table, columns: readonly string[]): Table {
    const present = new Set(this.names(table));
    for (const column of columns) {
      if (!present.has(column)) throw new ColumnNotFoundError(column, this.names(table));
    }
    this.logger.debug('projected table', { path, columns: [...columns] });
    return table.select([...new Set(columns)]);
  }

  private evaluate(table: Table, predicate: FilterPredicate): Uint32Array {
    const vector  = this.child(table, predicate.column);
    const matches = buildMatcher(predicate, columnTypeOf(vector.type));
    const mask    = createBitset(table.numRows);
    let row = 0;
    for (const cell of vector) {
      const value: unknown = cell;
      if (value !== null && matches(value)) setBit(mask, row);
      row++;
    }
    return mask;
  }

  /** Gather `rows` of every column into a single-batch table. */
  private takeRows(table: Table, rows: Uint32Array): Table {
    if (rows.length === 0) return emptyTable(table.schema);
    const columns = new Map<string, Vector>();
    for (const field of table.schema.fields) {
      columns.set(field.name, this.takeVector(field.name, this.child(table, field.name), rows));
    }
    return tableOf(columns);
  }

  private takeVector(name: string, vector: Vector, rows: Uint32Array): Vector {
    const type = columnTypeOf(vector.type);
    if (!isNumericColumnType(type) || vector.nullCount > 0) return gather(vector, rows);

    switch (type) {
      case 'i32': {
        const chunks = this.chunked(name, vector, 'i32');
        return makeVector(Int32Array.from(rows, (r) => chunks.get(r)));
      }
      case 'i64': {
        const chunks = this.chunked(name, vector, 'i64');
        return makeVector(BigInt64Array.from(rows, (r) => chunks.get(r)));
      }
      case 'u64': {
        const chunks = this.chunked(name, vector, 'u64');
        return makeVector(BigUint64Array.from(rows, (r) => chunks.get(r)));
      }
      case 'f32': {
        const chunks = this.chunked(name, vector, 'f32');
        return makeVector(Float32Array.from(rows, (r) => chunks.get(r)));
      }
      case 'f64': {
        const chunks = this.chunked(name, vector, 'f64');
        return makeVector(Float64Array.from(rows, (r) => chunks.get(r)));
      }
    }
  }

  private numericViews<T extends NumericColumnType>(name: string, vector: Vector, type: T): NumericArrays[T][] {
    const view = NUMERIC_VIEWS[type];
    const out: NumericArrays[T][] = [];
    for (const data of vector.data) {
      if (data.length === 0) continue;
      const values = view(data.values, data.length);
      if (values === null) {
        throw new TypeMismatchError(name, type, columnTypeOf(vector.type), 'The value buffer does not hold that element type.');
      }
      out.push(values);
    }
    return out;
  }

  /** Random access over a numeric vector's chunks, for gathers. */
  private chunked<T extends NumericColumnType>(name: string, vector: Vector, type: T): ChunkedColumn<NumericArrays[T]> {
    const column = new ChunkedColumn<NumericArrays[T]>();
    for (const values of this.numericViews(name, vector, type)) column.addChunk(values);
    return column;
  }
}

// ─── Factories ────────────────────────────────────────────────────────────────

/**
 * Build an ArrowEngine from validated configuration.
 *
 * @param config  Partial configuration; defaults fill the rest.
 * @param store   Defaults to a FileStore rooted at the working directory.
 * @param logger  Defaults to a console logger at `config.logLevel`.
 */
export function createEngine(
  config: ChunkframeConfigInput = {},
  store:  TableStore = new FileStore(),
  logger?: Logger,
): ArrowEngine {
  const resolved = resolveConfig(config);
  return engineFrom(resolved, store, logger ?? createConsoleLogger({ minLevel: resolved.logLevel }));
}

function engineFrom(config: ChunkframeConfig, store: TableStore, logger: Logger): ArrowEngine {
  return new ArrowEngine({
    store,
    logger,
    rowGroupSize:   config.rowGroupSize,
    checkLifetimes: config.checkLifetimes,
  });
}

let shared: ArrowEngine | undefined;

/**
 * The engine used when a Table, query or writer is given none: a FileStore
 * over the working directory, configured from CHUNKFRAME_* environment
 * variables on first use.
 */
export function defaultEngine(): ArrowEngine {
  if (shared === undefined) {
    const config = configFromEnv();
    shared = engineFrom(config, new FileStore(), createConsoleLogger({ minLevel: config.logLevel }));
  }
  return shared;
}
