/**
 * Shared test fixtures: in-memory engines and small tables written through
 * the engine's own writer.
 */

import {
  Float64,
  Int16,
  Int32,
  Table as ArrowTable,
  TimestampMillisecond,
  Utf8,
  tableToIPC,
  vectorFromArray,
} from 'apache-arrow';
import {
  createEngine,
  defineRecord,
  MemoryStore,
  noopLogger,
  type ArrowEngine,
  type ColumnPayload,
  type Logger,
} from '../src/index';

export interface MemoryEngine {
  engine: ArrowEngine;
  store:  MemoryStore;
}

export function memoryEngine(rowGroupSize = 4, logger: Logger = noopLogger): MemoryEngine {
  const store  = new MemoryStore();
  const engine = createEngine({ rowGroupSize }, store, logger);
  return { engine, store };
}

export function writeColumns(
  engine:  ArrowEngine,
  path:    string,
  columns: Record<string, ColumnPayload>,
): void {
  const writer = engine.newWriter(path);
  for (const [name, payload] of Object.entries(columns)) {
    engine.writerAddColumn(writer, name, payload);
  }
  engine.writerFinish(writer);
}

// ─── Scores ───────────────────────────────────────────────────────────────────

export interface Score {
  id:    bigint;
  name:  string;
  score: number;
}

export const ScoreRecord = defineRecord<Score>(
  'Score',
  () => ({ id: 0n, name: '', score: 0 }),
  (codec) => codec
    .field('id',    'id',    'i64')
    .field('name',  'name',  'utf8')
    .field('score', 'score', 'f64'),
);

/** {1, alice, 85.5}, {2, bob, 92.0}, {3, charlie, 78.5} */
export function writeScores(engine: ArrowEngine, path = 'scores.arrow'): void {
  writeColumns(engine, path, {
    id:    { type: 'i64',  values: BigInt64Array.of(1n, 2n, 3n) },
    name:  { type: 'utf8', values: ['alice', 'bob', 'charlie'] },
    score: { type: 'f64',  values: Float64Array.of(85.5, 92.0, 78.5) },
  });
}

// ─── Ten-row mixed table ──────────────────────────────────────────────────────

/**
 * Rows 0..9:
 *   id    i32   i
 *   price f64   i * 1.5
 *   big   i64   i * 10
 *   sym   utf8  's' + i
 *   live  bool  i % 3 === 0
 */
export function writeMixed(engine: ArrowEngine, path = 'mixed.arrow'): void {
  const rows = Array.from({ length: 10 }, (_, i) => i);
  writeColumns(engine, path, {
    id:    { type: 'i32',  values: Int32Array.from(rows) },
    price: { type: 'f64',  values: Float64Array.from(rows, (i) => i * 1.5) },
    big:   { type: 'i64',  values: BigInt64Array.from(rows, (i) => BigInt(i * 10)) },
    sym:   { type: 'utf8', values: rows.map((i) => `s${i}`) },
    live:  { type: 'bool', values: Uint8Array.from(rows, (i) => (i % 3 === 0 ? 1 : 0)) },
  });
}

// ─── Raw Arrow files ──────────────────────────────────────────────────────────

/** Store `batches` as one IPC file, one record batch each. */
export function writeArrow(store: MemoryStore, path: string, batches: readonly ArrowTable[]): void {
  const [first, ...rest] = batches;
  store.write(path, tableToIPC(first.concat(...rest), 'file'));
}

/**
 * Two batches carrying types outside the column tags:
 *   id i32 [1, 2] | [3, 4]
 *   small int16 [10, 20] | [30, 40]
 *   ts timestamp[ms] [1000, 2000] | [3000, 4000]
 */
export function writeReadings(store: MemoryStore, path = 'readings.arrow'): void {
  const batch = (ids: number[], small: number[], ts: number[]): ArrowTable => new ArrowTable({
    id:    vectorFromArray(ids,   new Int32()),
    small: vectorFromArray(small, new Int16()),
    ts:    vectorFromArray(ts,    new TimestampMillisecond()),
  });
  writeArrow(store, path, [batch([1, 2], [10, 20], [1000, 2000]), batch([3, 4], [30, 40], [3000, 4000])]);
}

/**
 * Two batches with null cells:
 *   id i32 [0, 1] | [2, 3]
 *   x f64 [1.5, null] | [null, 4]
 *   label utf8 ['a', null] | ['c', 'd']
 */
export function writeSparse(store: MemoryStore, path = 'sparse.arrow'): void {
  const batch = (ids: number[], x: (number | null)[], label: (string | null)[]): ArrowTable => new ArrowTable({
    id:    vectorFromArray(ids,   new Int32()),
    x:     vectorFromArray(x,     new Float64()),
    label: vectorFromArray(label, new Utf8()),
  });
  writeArrow(store, path, [batch([0, 1], [1.5, null], ['a', null]), batch([2, 3], [null, 4], ['c', 'd'])]);
}
