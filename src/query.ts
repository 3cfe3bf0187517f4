/**
 * chunkframe — query builders
 *
 * QueryBuilder collects a projection and a list of predicates by column
 * name; RecordQuery does the same by record key and decodes the result
 * through the record type's codec.
 *
 * A predicate's column is always scanned, even when it is not selected:
 *
 *   new QueryBuilder('scores.arrow')
 *     .select('id')
 *     .filter('score', Gt, 80)
 *     .scanColumns();           // ['id', 'score']
 *
 * Predicates combine with AND. collect() calls the engine exactly once.
 */

import { defaultEngine } from './arrow-engine';
import type { RecordType } from './codec';
import type { TableEngine, TableHandle } from './engine';
import { TypeMismatchError } from './errors';
import type { Logger } from './logging';
import { Table } from './table';
import type {
  ColumnType,
  FilterLiteral,
  FilterOp,
  FilterPredicate,
  FilterValue,
} from './types';

export interface QueryOptions {
  /** Defaults to the shared engine over the working directory. */
  engine?:         TableEngine;
  checkLifetimes?: boolean;
  logger?:         Logger;
}

// ─── Literals ─────────────────────────────────────────────────────────────────

function literalMismatch(column: string, type: ColumnType, value: FilterLiteral): TypeMismatchError {
  return new TypeMismatchError(
    column, type, typeof value,
    `Filter literal ${String(value)} cannot be compared as ${type}.`,
  );
}

function defaultLiteral(value: FilterLiteral): FilterValue {
  if (typeof value === 'number') return { type: 'f64',  value };
  if (typeof value === 'bigint') return { type: 'i64',  value };
  if (typeof value === 'string') return { type: 'utf8', value };
  return { type: 'bool', value };
}

/**
 * Tag a filter literal with the engine entry point that evaluates it.
 *
 * Without `type`: number → f64, bigint → i64, string → utf8, boolean → bool.
 * With `type`, the literal must fit it; an integral number may stand in for
 * an i64 or u64 literal.
 */
export function resolveLiteral(column: string, value: FilterLiteral, type?: ColumnType): FilterValue {
  if (type === undefined) return defaultLiteral(value);

  switch (type) {
    case 'i32':
    case 'f32':
    case 'f64':
      if (typeof value !== 'number') throw literalMismatch(column, type, value);
      return { type, value };
    case 'i64':
    case 'u64':
      if (typeof value === 'bigint') return { type, value };
      if (typeof value === 'number' && Number.isInteger(value)) return { type, value: BigInt(value) };
      throw literalMismatch(column, type, value);
    case 'utf8':
      if (typeof value !== 'string') throw literalMismatch(column, type, value);
      return { type, value };
    case 'bool':
      if (typeof value !== 'boolean') throw literalMismatch(column, type, value);
      return { type, value };
  }
}

function appendUnique(target: string[], names: readonly string[]): void {
  for (const name of names) {
    if (!target.includes(name)) target.push(name);
  }
}

// ─── QueryBuilder ─────────────────────────────────────────────────────────────

export class QueryBuilder {
  private readonly _selected: string[]          = [];
  private readonly _filters:  FilterPredicate[] = [];

  constructor(
    readonly path: string,
    private readonly _options: QueryOptions = {},
  ) {}

  /** Add columns to the projection. Repeated names are kept once. */
  select(...columns: (string | readonly string[])[]): this {
    appendUnique(this._selected, columns.flat());
    return this;
  }

  /** Add a predicate. See resolveLiteral() for how `value` is typed. */
  filter(column: string, op: FilterOp, value: FilterLiteral, type?: ColumnType): this {
    return this.where({ column, op, value: resolveLiteral(column, value, type) });
  }

  /** Add an already-typed predicate. */
  where(predicate: FilterPredicate): this {
    this._filters.push(predicate);
    return this;
  }

  get selectedColumns(): readonly string[] {
    return this._selected;
  }

  get filters(): readonly FilterPredicate[] {
    return this._filters;
  }

  /**
   * Columns the engine reads: the selection followed by every filter column
   * not already in it. undefined means the whole table.
   */
  scanColumns(): string[] | undefined {
    if (this._selected.length === 0) return undefined;
    const scan = [...this._selected];
    appendUnique(scan, this._filters.map((f) => f.column));
    return scan;
  }

  /**
   * Run the query. The result holds the scanned columns of every row that
   * satisfies all predicates, in source order.
   *
   * @throws TableIOError, ColumnNotFoundError, TypeMismatchError
   */
  collect(): Table {
    const engine = this._options.engine ?? defaultEngine();
    const scan   = this.scanColumns();

    let handle: TableHandle;
    if (this._filters.length === 0) {
      handle = scan === undefined ? engine.open(this.path) : engine.openProjected(this.path, scan);
    } else {
      const query = engine.newQuery(this.path);
      if (scan !== undefined) engine.querySelect(query, scan);
      for (const predicate of this._filters) engine.queryFilter(query, predicate);
      handle = engine.queryCollect(query);
    }

    const table = Table.fromHandle(engine, handle, this._options.checkLifetimes);
    this._options.logger?.debug('collected query', {
      path:    this.path,
      rows:    table.rowCount,
      columns: scan ?? [],
      filters: this._filters.length,
    });
    return table;
  }
}

// ─── RecordQuery ──────────────────────────────────────────────────────────────

/**
 * Query addressed by record keys. Keys translate to column names through
 * the record type's codec; filter literals take the field's registered type.
 *
 *   const rows = new RecordQuery('scores.arrow', ScoreRecord)
 *     .select('id', 'score')
 *     .filter('score', Gt, 80)
 *     .collect();
 */
export class RecordQuery<R extends object> {
  private readonly _selected: string[]          = [];
  private readonly _filters:  FilterPredicate[] = [];

  constructor(
    readonly path: string,
    private readonly _recordType: RecordType<R>,
    private readonly _options: QueryOptions = {},
  ) {}

  /** Select fields by record key. @throws FieldNotRegisteredError */
  select(...keys: (keyof R & string)[]): this {
    const codec = this._recordType.codec();
    appendUnique(this._selected, keys.map((key) => codec.findColumnName(key)));
    return this;
  }

  /** Select fields by column name. @throws ColumnNotFoundError */
  selectColumns(...columns: string[]): this {
    const codec = this._recordType.codec();
    for (const column of columns) codec.fieldForColumn(column);
    appendUnique(this._selected, columns);
    return this;
  }

  /** @throws FieldNotRegisteredError, TypeMismatchError */
  filter<K extends keyof R & string>(key: K, op: FilterOp, value: R[K] & FilterLiteral): this {
    const field = this._recordType.codec().fieldForKey(key);
    this._filters.push({ column: field.column, op, value: resolveLiteral(field.column, value, field.type) });
    return this;
  }

  /**
   * Run the query and decode each result row into a record. Fields outside
   * the selection keep the record factory's defaults.
   */
  collect(): R[] {
    const codec     = this._recordType.codec();
    const selection = this._selected.length > 0 ? [...this._selected] : codec.columnNames;

    const builder = new QueryBuilder(this.path, this._options).select(selection);
    for (const predicate of this._filters) builder.where(predicate);

    const table = builder.collect();
    try {
      return codec.readAll(table, selection);
    } finally {
      table.close();
    }
  }
}
