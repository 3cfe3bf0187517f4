/**
 * chunkframe — record codec
 *
 * A RecordCodec binds column names to fields of a plain record type. Each
 * field carries a column-type tag; reads and writes dispatch on that tag,
 * so one codec holds fields of every type in a single homogeneous list.
 *
 *   interface Trade { id: number; symbol: string; price: number; live: boolean }
 *
 *   const TradeRecord = defineRecord<Trade>(
 *     'Trade',
 *     () => ({ id: 0, symbol: '', price: 0, live: false }),
 *     (codec) => codec
 *       .field('id',     'id',     'i32')
 *       .field('symbol', 'symbol', 'utf8')
 *       .field('price',  'price',  'f64')
 *       .field('live',   'live',   'bool'),
 *   );
 *
 *   const trades = getCodec(TradeRecord).readAll(table);
 *
 * The key of each field must name a property whose type matches the tag:
 * number for i32/f32/f64, bigint for i64/u64, string for utf8, boolean for bool.
 */

import type { Table } from './table';
import {
  ColumnNotFoundError,
  FieldNotRegisteredError,
  TypeMismatchError,
} from './errors';
import {
  isNumericColumnType,
  type ColumnPayload,
  type ColumnType,
  type ColumnValue,
} from './types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Keys of R whose (required) property type accepts values of column type T. */
export type FieldKey<R, T extends ColumnType> = keyof R & string & {
  [K in keyof R]-?: ColumnValue<T> extends R[K] ? K : never;
}[keyof R];

export interface FieldDescriptor<R> {
  readonly column: string;
  readonly key:    keyof R & string;
  readonly type:   ColumnType;
}

/** Receives one column at a time from RecordCodec.writeAll(). */
export interface ColumnSink {
  addColumn(name: string, column: ColumnPayload): void;
}

// ─── RecordCodec ──────────────────────────────────────────────────────────────

export class RecordCodec<R extends object> {
  private readonly _fields:   FieldDescriptor<R>[] = [];
  private readonly _byColumn = new Map<string, FieldDescriptor<R>>();
  private readonly _byKey    = new Map<string, FieldDescriptor<R>>();
  private _sealed = false;

  constructor(
    private readonly _create: () => R,
    readonly name: string = 'record',
  ) {}

  /**
   * Register `key` as the field holding column `column` of type `type`.
   * Registration order is read order.
   */
  field<T extends ColumnType>(column: string, key: FieldKey<R, T>, type: T): this {
    if (this._sealed) {
      throw new TypeError(`Codec '${this.name}' is already built; fields can only be added during registration.`);
    }
    if (this._byColumn.has(column)) {
      throw new TypeError(`Column '${column}' is already registered in codec '${this.name}'.`);
    }
    if (this._byKey.has(key)) {
      throw new TypeError(`Field '${key}' is already bound to column '${this.findColumnName(key)}' in codec '${this.name}'.`);
    }
    const descriptor: FieldDescriptor<R> = { column, key, type };
    this._fields.push(descriptor);
    this._byColumn.set(column, descriptor);
    this._byKey.set(key, descriptor);
    return this;
  }

  /** Stop accepting fields. Called once registration is complete. */
  seal(): this {
    this._sealed = true;
    return this;
  }

  get fields(): readonly FieldDescriptor<R>[] {
    return this._fields;
  }

  /** Registered column names in registration order. */
  get columnNames(): string[] {
    return this._fields.map((f) => f.column);
  }

  /** Reverse lookup: the column bound to a record key. */
  findColumnName(key: keyof R & string): string {
    const descriptor = this._byKey.get(key);
    if (descriptor === undefined) {
      throw new FieldNotRegisteredError(key, [...this._byKey.keys()]);
    }
    return descriptor.column;
  }

  fieldForColumn(column: string): FieldDescriptor<R> {
    const descriptor = this._byColumn.get(column);
    if (descriptor === undefined) throw new ColumnNotFoundError(column, this.columnNames);
    return descriptor;
  }

  fieldForKey(key: keyof R & string): FieldDescriptor<R> {
    const descriptor = this._byKey.get(key);
    if (descriptor === undefined) {
      throw new FieldNotRegisteredError(key, [...this._byKey.keys()]);
    }
    return descriptor;
  }

  // ─── Read ───────────────────────────────────────────────────────────────────

  /**
   * Build one record per row. With `columns`, only those fields are read and
   * the rest keep the values the factory gave them.
   *
   * @throws ColumnNotFoundError when `columns` names a column the codec lacks,
   *         or a registered column is missing from the table
   * @throws TypeMismatchError when a stored column type differs from the tag
   */
  readAll(table: Table, columns?: readonly string[]): R[] {
    let selected: readonly FieldDescriptor<R>[] = this._fields;
    if (columns !== undefined) {
      const wanted = new Set(columns);
      for (const column of wanted) this.fieldForColumn(column);
      selected = this._fields.filter((f) => wanted.has(f.column));
    }

    const rows    = table.rowCount;
    const records = Array.from({ length: rows }, () => this._create());
    for (const field of selected) {
      this.readField(table, field, records);
    }
    return records;
  }

  private readField(table: Table, field: FieldDescriptor<R>, records: R[]): void {
    const { column, type } = field;
    if (isNumericColumnType(type)) {
      let row = 0;
      for (const value of table.getColumn(column, type)) {
        if (row >= records.length) break;
        this.assign(records[row++], field, value);
      }
      return;
    }
    const values = type === 'utf8' ? table.getStringColumn(column) : table.getBoolColumn(column);
    const count  = Math.min(values.length, records.length);
    for (let row = 0; row < count; row++) {
      this.assign(records[row], field, values[row]);
    }
  }

  private assign(record: R, field: FieldDescriptor<R>, value: unknown): void {
    if (!Reflect.set(record, field.key, value)) {
      throw new TypeError(`Cannot set field '${field.key}' on a ${this.name} record.`);
    }
  }

  // ─── Write ──────────────────────────────────────────────────────────────────

  /**
   * Hand one column per registered field to `sink`, in registration order.
   *
   * @throws TypeMismatchError when a record holds a value of the wrong JS type
   */
  writeAll(sink: ColumnSink, records: readonly R[]): void {
    for (const field of this._fields) {
      sink.addColumn(field.column, this.payloadOf(field, records));
    }
  }

  private payloadOf(field: FieldDescriptor<R>, records: readonly R[]): ColumnPayload {
    switch (field.type) {
      case 'i32':
        return { type: 'i32', values: Int32Array.from(records, (r, i) => this.numberAt(field, r, i)) };
      case 'f32':
        return { type: 'f32', values: Float32Array.from(records, (r, i) => this.numberAt(field, r, i)) };
      case 'f64':
        return { type: 'f64', values: Float64Array.from(records, (r, i) => this.numberAt(field, r, i)) };
      case 'i64':
        return { type: 'i64', values: BigInt64Array.from(records, (r, i) => this.bigintAt(field, r, i)) };
      case 'u64':
        return { type: 'u64', values: BigUint64Array.from(records, (r, i) => this.bigintAt(field, r, i)) };
      case 'utf8':
        return { type: 'utf8', values: records.map((r, i) => this.stringAt(field, r, i)) };
      case 'bool':
        return { type: 'bool', values: Uint8Array.from(records, (r, i) => (this.booleanAt(field, r, i) ? 1 : 0)) };
    }
  }

  private valueAt(field: FieldDescriptor<R>, record: R): unknown {
    return record[field.key];
  }

  private mismatch(field: FieldDescriptor<R>, value: unknown, row: number): TypeMismatchError {
    return new TypeMismatchError(
      field.column, field.type, typeof value,
      `Field '${field.key}' of record ${row} holds a ${typeof value}.`,
    );
  }

  private numberAt(field: FieldDescriptor<R>, record: R, row: number): number {
    const value = this.valueAt(field, record);
    if (typeof value !== 'number') throw this.mismatch(field, value, row);
    return value;
  }

  private bigintAt(field: FieldDescriptor<R>, record: R, row: number): bigint {
    const value = this.valueAt(field, record);
    if (typeof value !== 'bigint') throw this.mismatch(field, value, row);
    return value;
  }

  private stringAt(field: FieldDescriptor<R>, record: R, row: number): string {
    const value = this.valueAt(field, record);
    if (typeof value !== 'string') throw this.mismatch(field, value, row);
    return value;
  }

  private booleanAt(field: FieldDescriptor<R>, record: R, row: number): boolean {
    const value = this.valueAt(field, record);
    if (typeof value !== 'boolean') throw this.mismatch(field, value, row);
    return value;
  }
}

// ─── Record Types ─────────────────────────────────────────────────────────────

/**
 * A record type with its field registration. The codec is built on first
 * use and shared by every caller for the life of the process.
 */
export interface RecordType<R extends object> {
  readonly name:   string;
  readonly create: () => R;
  codec(): RecordCodec<R>;
}

export function defineRecord<R extends object>(
  name:     string,
  create:   () => R,
  register: (codec: RecordCodec<R>) => void,
): RecordType<R> {
  let built: RecordCodec<R> | undefined;
  return {
    name,
    create,
    codec(): RecordCodec<R> {
      if (built === undefined) {
        const codec = new RecordCodec(create, name);
        register(codec);
        built = codec.seal();
      }
      return built;
    },
  };
}

/** The shared codec of a record type. Repeated calls return the same instance. */
export function getCodec<R extends object>(type: RecordType<R>): RecordCodec<R> {
  return type.codec();
}
