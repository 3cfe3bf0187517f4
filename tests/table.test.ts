import { describe, it, expect } from 'vitest';
import {
  ColumnNotFoundError,
  StaleColumnError,
  Table,
  TableIOError,
  TypeMismatchError,
} from '../src/index';
import { memoryEngine, writeColumns, writeMixed, writeReadings, writeSparse } from './fixtures';

// ─── Opening ───────────────────────────────────────────────────────────────────

describe('Table.open', () => {
  it('reports shape and schema in table order', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });

    expect(table.rowCount).toBe(10);
    expect(table.columnCount).toBe(5);
    expect(table.columns()).toEqual([
      { name: 'id',    type: 'i32' },
      { name: 'price', type: 'f64' },
      { name: 'big',   type: 'i64' },
      { name: 'sym',   type: 'utf8' },
      { name: 'live',  type: 'bool' },
    ]);
  });

  it('reads only the projected columns', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine, columns: ['price', 'id'] });

    expect(table.columnCount).toBe(2);
    expect(table.columns().map((c) => c.name)).toEqual(['price', 'id']);
    expect(table.rowCount).toBe(10);
    expect(() => table.getStringColumn('sym')).toThrow(ColumnNotFoundError);
  });

  it('rejects an unknown projected column, listing the available ones', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    expect(() => Table.open('mixed.arrow', { engine, columns: ['id', 'volume'] })).toThrow(
      "Column 'volume' not found. Available columns: id, price, big, sym, live.",
    );
  });

  it('throws TableIOError for a missing path', () => {
    const { engine } = memoryEngine();
    expect(() => Table.open('nowhere.arrow', { engine })).toThrow(TableIOError);
  });

  it('throws TableIOError for bytes that are not an Arrow file', () => {
    const { engine, store } = memoryEngine();
    store.write('junk.arrow', Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8));
    expect(() => Table.open('junk.arrow', { engine })).toThrow("'junk.arrow' is not an Arrow IPC file.");
  });
});

// ─── Numeric columns ───────────────────────────────────────────────────────────

describe('Table.getColumn', () => {
  it('returns one chunk per row group', () => {
    const { engine } = memoryEngine(4);
    writeMixed(engine);
    const id = Table.open('mixed.arrow', { engine }).getColumn('id', 'i32');

    expect(id.numChunks).toBe(3);
    expect(id.prefixSums).toEqual([4, 8, 10]);
    expect(id.toArray()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(id.chunk(2).data).toBeInstanceOf(Int32Array);
    expect(id.at(9)).toBe(9);
  });

  it('views the table memory without copying', () => {
    const { engine } = memoryEngine(4);
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });
    const a = table.getColumn('price', 'f64');
    const b = table.getColumn('price', 'f64');

    expect(a.chunk(1).data.buffer).toBe(b.chunk(1).data.buffer);
    expect(a.chunk(1).data.byteOffset).toBe(b.chunk(1).data.byteOffset);
  });

  it('reads f64 and i64 values', () => {
    const { engine } = memoryEngine(4);
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });

    let sum = 0;
    for (const price of table.getColumn('price', 'f64')) sum += price;
    expect(sum).toBe(67.5);
    expect(table.getColumn('big', 'i64').toArray()).toEqual([0n, 10n, 20n, 30n, 40n, 50n, 60n, 70n, 80n, 90n]);
  });

  it('refuses a type other than the stored one', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });

    expect(() => table.getColumn('id', 'f64')).toThrow(TypeMismatchError);
    expect(() => table.getColumn('id', 'i64')).toThrow("Column 'id' has type 'i32', expected 'i64'.");
    expect(() => table.getColumn('sym', 'i32')).toThrow(TypeMismatchError);
  });

  it('refuses an unknown column', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });
    expect(() => table.getColumn('volume', 'f64')).toThrow(ColumnNotFoundError);
  });
});

// ─── Strings and bools ─────────────────────────────────────────────────────────

describe('string and bool columns', () => {
  it('getStringColumn copies every value', () => {
    const { engine } = memoryEngine(4);
    writeMixed(engine);
    const sym = Table.open('mixed.arrow', { engine }).getStringColumn('sym');
    expect(sym).toEqual(['s0', 's1', 's2', 's3', 's4', 's5', 's6', 's7', 's8', 's9']);
  });

  it('getBoolColumn unpacks across row groups', () => {
    const { engine } = memoryEngine(4);
    writeMixed(engine);
    const live = Table.open('mixed.arrow', { engine }).getBoolColumn('live');
    expect(live).toEqual([true, false, false, true, false, false, true, false, false, true]);
  });

  it('typed string and bool reads check the stored type', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });
    expect(() => table.getStringColumn('id')).toThrow(TypeMismatchError);
    expect(() => table.getBoolColumn('sym')).toThrow(TypeMismatchError);
  });
});

// ─── Rechunk and close ─────────────────────────────────────────────────────────

describe('Table.rechunk', () => {
  it('compacts a multi-chunk table into one chunk', () => {
    const { engine } = memoryEngine(4);
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });

    expect(table.rechunk()).toBe(true);
    const id = table.getColumn('id', 'i32');
    expect(id.numChunks).toBe(1);
    expect(id.toArray()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(table.getStringColumn('sym')[9]).toBe('s9');
    expect(table.getBoolColumn('live')).toEqual([true, false, false, true, false, false, true, false, false, true]);
    expect(table.rechunk()).toBe(false);
  });

  it('invalidates columns taken before a rechunk', () => {
    const { engine } = memoryEngine(4);
    writeMixed(engine);
    const table  = Table.open('mixed.arrow', { engine });
    const before = table.getColumn('id', 'i32');

    table.rechunk();
    expect(() => before.at(0)).toThrow(StaleColumnError);
    expect(() => before.toArray()).toThrow('was used after the table was rechunked');
    expect(before.get(3)).toBe(3);
  });

  it('leaves columns valid when nothing changed', () => {
    const { engine } = memoryEngine(100);
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });
    const id    = table.getColumn('id', 'i32');

    expect(id.numChunks).toBe(1);
    expect(table.rechunk()).toBe(false);
    expect(id.at(5)).toBe(5);
    expect(table.generation).toBe(0);
  });
});

describe('Table.close', () => {
  it('invalidates the table and its columns', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });
    const id    = table.getColumn('id', 'i32');

    table.close();
    expect(table.closed).toBe(true);
    expect(() => table.rowCount).toThrow(StaleColumnError);
    expect(() => table.getColumn('id', 'i32')).toThrow("Table 'mixed.arrow' is closed.");
    expect(() => id.at(0)).toThrow('was used after the table was closed');
  });

  it('is idempotent', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine });
    table.close();
    table.close();
    expect(table.generation).toBe(1);
  });

  it('skips the lifetime check when checkLifetimes is false', () => {
    const { engine } = memoryEngine();
    writeMixed(engine);
    const table = Table.open('mixed.arrow', { engine, checkLifetimes: false });
    const id    = table.getColumn('id', 'i32');

    table.close();
    expect(id.at(1)).toBe(1);
  });
});

// ─── Edge shapes ───────────────────────────────────────────────────────────────

describe('edge shapes', () => {
  it('a zero-row table keeps its schema', () => {
    const { engine } = memoryEngine();
    writeColumns(engine, 'empty.arrow', {
      id:   { type: 'i32',  values: new Int32Array(0) },
      name: { type: 'utf8', values: [] },
    });
    const table = Table.open('empty.arrow', { engine });

    expect(table.rowCount).toBe(0);
    expect(table.columns()).toEqual([{ name: 'id', type: 'i32' }, { name: 'name', type: 'utf8' }]);
    expect(table.getColumn('id', 'i32').size).toBe(0);
    expect(table.getStringColumn('name')).toEqual([]);
  });

  it('u64 and f32 columns round-trip their extremes', () => {
    const { engine } = memoryEngine();
    writeColumns(engine, 'wide.arrow', {
      u: { type: 'u64', values: BigUint64Array.of(0n, 2n ** 64n - 1n) },
      f: { type: 'f32', values: Float32Array.of(1.5, -0.25) },
    });
    const table = Table.open('wide.arrow', { engine });

    expect(table.getColumn('u', 'u64').toArray()).toEqual([0n, 18446744073709551615n]);
    expect(table.getColumn('f', 'f32').toArray()).toEqual([1.5, -0.25]);
  });
});

// ─── Other Arrow types and nulls ──────────────────────────────────────────────

describe('columns outside the type tags', () => {
  it('are listed as unsupported and refuse typed reads', () => {
    const { engine, store } = memoryEngine();
    writeReadings(store);
    const table = Table.open('readings.arrow', { engine });

    expect(table.columns()).toEqual([
      { name: 'id',    type: 'i32' },
      { name: 'small', type: 'unsupported' },
      { name: 'ts',    type: 'unsupported' },
    ]);
    expect(() => table.getColumn('small', 'i32')).toThrow(TypeMismatchError);
  });

  it('survive a rechunk', () => {
    const { engine, store } = memoryEngine();
    writeReadings(store);
    const table = Table.open('readings.arrow', { engine });
    expect(table.getColumn('id', 'i32').numChunks).toBe(2);

    expect(table.rechunk()).toBe(true);
    expect(table.getColumn('id', 'i32').numChunks).toBe(1);
    expect(table.getColumn('id', 'i32').toArray()).toEqual([1, 2, 3, 4]);
    expect(table.columns().map((c) => c.type)).toEqual(['i32', 'unsupported', 'unsupported']);
    expect(table.rowCount).toBe(4);
  });
});

describe('Table.nullCount', () => {
  it('counts nulls across chunks', () => {
    const { engine, store } = memoryEngine();
    writeSparse(store);
    const table = Table.open('sparse.arrow', { engine });

    expect(table.nullCount('x')).toBe(2);
    expect(table.nullCount('label')).toBe(1);
    expect(table.nullCount('id')).toBe(0);
    expect(() => table.nullCount('missing')).toThrow(ColumnNotFoundError);
  });

  it('rechunk keeps nulls and values', () => {
    const { engine, store } = memoryEngine();
    writeSparse(store);
    const table = Table.open('sparse.arrow', { engine });

    table.rechunk();
    const x = table.getColumn('x', 'f64');
    expect(x.numChunks).toBe(1);
    expect(x.at(0)).toBe(1.5);
    expect(x.at(3)).toBe(4);
    expect(table.nullCount('x')).toBe(2);
    expect(table.nullCount('label')).toBe(1);
    expect(table.getStringColumn('label')).toEqual(['a', '', 'c', 'd']);
  });
});
