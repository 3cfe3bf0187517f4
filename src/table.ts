/**
 * chunkframe — Table
 *
 * An open handle to a columnar table. Numeric columns come back as
 * ChunkedColumn views straight into the engine's buffers; string and bool
 * columns are materialized.
 *
 * Column views borrow the table's memory. Every close() and every rechunk()
 * that changes the layout bumps the table's generation; a view taken under an
 * older generation throws StaleColumnError from its checked accessors
 * (at, chunk, begin, iteration). The unchecked get() is never guarded.
 *
 *   const table = Table.open('trades.arrow');
 *   const price = table.getColumn('price', 'f64');
 *   table.rechunk();
 *   price.at(0);          // StaleColumnError
 */

import { ChunkedColumn, type ColumnLease } from './chunk';
import type { RecordCodec } from './codec';
import { defaultEngine } from './arrow-engine';
import type { TableEngine, TableHandle } from './engine';
import { StaleColumnError } from './errors';
import type { ColumnInfo, NumericArrays, NumericColumnType } from './types';

export interface TableOptions {
  /** Defaults to the shared engine over the working directory. */
  engine?:         TableEngine;
  /** Open only these columns. */
  columns?:        readonly string[];
  /** Guard column views against use after close() or rechunk(). */
  checkLifetimes?: boolean;
}

export class Table {
  private _generation = 0;
  private _closed     = false;

  private constructor(
    private readonly _engine: TableEngine,
    private readonly _handle: TableHandle,
    readonly path: string,
    private readonly _checkLifetimes: boolean,
  ) {}

  /**
   * Open the table at `path`, optionally projected to `options.columns`.
   *
   * @throws TableIOError         when the path is missing or unreadable
   * @throws ColumnNotFoundError  when a projected column does not exist
   */
  static open(path: string, options: TableOptions = {}): Table {
    const engine = options.engine ?? defaultEngine();
    const handle = options.columns === undefined
      ? engine.open(path)
      : engine.openProjected(path, options.columns);
    return Table.fromHandle(engine, handle, options.checkLifetimes);
  }

  /** Wrap a handle the engine already opened. The table takes ownership of it. */
  static fromHandle(engine: TableEngine, handle: TableHandle, checkLifetimes?: boolean): Table {
    return new Table(engine, handle, handle.path, checkLifetimes ?? engine.checkLifetimes ?? true);
  }

  // ─── Metadata ───────────────────────────────────────────────────────────────

  get rowCount(): number {
    this.assertOpen();
    return this._engine.rowCount(this._handle);
  }

  get columnCount(): number {
    this.assertOpen();
    return this._engine.columnCount(this._handle);
  }

  /** Column names and types in schema order. */
  columns(): ColumnInfo[] {
    this.assertOpen();
    return this._engine.columns(this._handle);
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Incremented by close() and by every rechunk() that changes the layout. */
  get generation(): number {
    return this._generation;
  }

  // ─── Column Access ──────────────────────────────────────────────────────────

  /**
   * Zero-copy view of a numeric column, one chunk per row group.
   *
   * @throws ColumnNotFoundError, TypeMismatchError
   */
  getColumn<T extends NumericColumnType>(name: string, type: T): ChunkedColumn<NumericArrays[T]> {
    this.assertOpen();
    const column = new ChunkedColumn<NumericArrays[T]>(this.lease());
    for (const chunk of this._engine.chunks(this._handle, name, type)) {
      column.addChunk(chunk);
    }
    return column;
  }

  /** Copy of a utf8 column. Null cells read as ''. */
  getStringColumn(name: string): string[] {
    this.assertOpen();
    return this._engine.stringColumn(this._handle, name);
  }

  /** Copy of a bool column. Null cells read as false. */
  getBoolColumn(name: string): boolean[] {
    this.assertOpen();
    return this._engine.boolColumn(this._handle, name);
  }

  /** Null cells in a column of any type, supported or not. */
  nullCount(name: string): number {
    this.assertOpen();
    return this._engine.nullCount(this._handle, name);
  }

  /** Decode every row into records of the codec's type. */
  readAllAs<R extends object>(codec: RecordCodec<R>, columns?: readonly string[]): R[] {
    return codec.readAll(this, columns);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Compact every column into a single chunk.
   *
   * Returns false, and leaves existing views valid, when the table already
   * has at most one chunk per column.
   */
  rechunk(): boolean {
    this.assertOpen();
    const changed = this._engine.rechunk(this._handle);
    if (changed) this._generation++;
    return changed;
  }

  /** Release the engine handle. Idempotent. */
  close(): void {
    if (this._closed) return;
    this._engine.close(this._handle);
    this._closed = true;
    this._generation++;
  }

  private assertOpen(): void {
    if (this._closed) throw new StaleColumnError(`Table '${this.path}' is closed.`);
  }

  private lease(): ColumnLease | undefined {
    if (!this._checkLifetimes) return undefined;
    const generation = this._generation;
    return () => {
      if (this._generation === generation) return;
      throw new StaleColumnError(
        this._closed
          ? `Column of '${this.path}' was used after the table was closed.`
          : `Column of '${this.path}' was used after the table was rechunked.`,
      );
    };
  }
}
