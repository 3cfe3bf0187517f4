import { describe, it, expect } from 'vitest';
import {
  ChunkedColumn,
  ChunkView,
  CrossChunkIterator,
  IndexOutOfRangeError,
  StaleColumnError,
} from '../src/index';

// ─── Helpers ───────────────────────────────────────────────────────────────────

/** Column whose elements are 0, 1, 2, ... laid out over chunks of `lengths`. */
function sequential(lengths: readonly number[]): ChunkedColumn<Int32Array> {
  const column = new ChunkedColumn<Int32Array>();
  let next = 0;
  for (const length of lengths) {
    column.addChunk(Int32Array.from({ length }, () => next++));
  }
  return column;
}

/** Deterministic chunk lengths in [0, 7]. */
function lengthsFromSeed(seed: number, count: number): number[] {
  const out: number[] = [];
  let state = seed;
  for (let i = 0; i < count; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    out.push(state % 8);
  }
  return out;
}

// ─── Construction ──────────────────────────────────────────────────────────────

describe('ChunkedColumn construction', () => {
  it('drops zero-length chunks: [3, 0, 5, 2] gives 3 chunks of 10 elements', () => {
    const column = sequential([3, 0, 5, 2]);
    expect(column.size).toBe(10);
    expect(column.numChunks).toBe(3);
    expect(column.prefixSums).toEqual([3, 8, 10]);
  });

  it('an empty column has size 0 and no chunks', () => {
    const column = new ChunkedColumn<Float64Array>();
    expect(column.size).toBe(0);
    expect(column.isEmpty).toBe(true);
    expect(column.numChunks).toBe(0);
    expect(column.toArray()).toEqual([]);
  });

  it('respects an explicit chunk length shorter than the array', () => {
    const column = new ChunkedColumn<Int32Array>();
    column.addChunk(Int32Array.of(7, 8, 9), 2);
    expect(column.size).toBe(2);
    expect(column.toArray()).toEqual([7, 8]);
    expect(column.chunk(0).length).toBe(2);
    expect(column.chunk(0).data.length).toBe(3);
  });

  it('works over plain arrays as well as typed arrays', () => {
    const column = new ChunkedColumn<string[]>();
    column.addChunk(['a', 'b']);
    column.addChunk([]);
    column.addChunk(['c']);
    expect(column.toArray()).toEqual(['a', 'b', 'c']);
    expect(column.get(2)).toBe('c');
  });
});

// ─── Random access ─────────────────────────────────────────────────────────────

describe('ChunkedColumn random access', () => {
  it('get() resolves the owning chunk by upper bound over prefix sums', () => {
    const column = sequential([3, 5, 2]);
    expect(column.get(0)).toBe(0);
    expect(column.get(2)).toBe(2);
    expect(column.get(3)).toBe(3);
    expect(column.get(5)).toBe(5);
    expect(column.get(7)).toBe(7);
    expect(column.get(8)).toBe(8);
    expect(column.get(9)).toBe(9);
  });

  it('at() matches get() inside the range', () => {
    const column = sequential([4, 1, 6]);
    for (let i = 0; i < column.size; i++) {
      expect(column.at(i)).toBe(column.get(i));
    }
  });

  it('at() throws IndexOutOfRangeError at and past the end', () => {
    const column = sequential([3, 5, 2]);
    expect(() => column.at(10)).toThrow(IndexOutOfRangeError);
    expect(() => column.at(11)).toThrow(IndexOutOfRangeError);
    expect(() => column.at(10)).toThrow('Index 10 is out of range for a column of size 10.');
  });

  it('at() rejects negative and fractional indices', () => {
    const column = sequential([3]);
    expect(() => column.at(-1)).toThrow(IndexOutOfRangeError);
    expect(() => column.at(1.5)).toThrow(IndexOutOfRangeError);
  });

  it('IndexOutOfRangeError is a RangeError', () => {
    const column = sequential([1]);
    expect(() => column.at(1)).toThrow(RangeError);
  });

  it('chunk(i) exposes raw chunk views and range-checks i', () => {
    const column = sequential([3, 5, 2]);
    const middle = column.chunk(1);
    expect(middle.length).toBe(5);
    expect(Array.from(middle.data)).toEqual([3, 4, 5, 6, 7]);
    expect(middle.get(4)).toBe(7);
    expect(() => column.chunk(3)).toThrow(IndexOutOfRangeError);
  });

  it('supports chunk-by-chunk loops over same-shaped columns', () => {
    const a = new ChunkedColumn<Float64Array>();
    const b = new ChunkedColumn<Float64Array>();
    a.addChunk(Float64Array.of(1, 2));
    a.addChunk(Float64Array.of(3));
    b.addChunk(Float64Array.of(10, 20));
    b.addChunk(Float64Array.of(30));

    let dot = 0;
    for (let c = 0; c < a.numChunks; c++) {
      const x = a.chunk(c).data;
      const y = b.chunk(c).data;
      for (let i = 0; i < x.length; i++) dot += x[i] * y[i];
    }
    expect(dot).toBe(140);
  });
});

// ─── Iteration ─────────────────────────────────────────────────────────────────

describe('cross-chunk iteration', () => {
  it('visits every element once, in chunk order', () => {
    const column = sequential([3, 0, 5, 2]);
    expect([...column]).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('begin() walks to end() with advance()', () => {
    const column = sequential([2, 3]);
    const seen: number[] = [];
    const end = column.end();
    for (const it = column.begin(); !it.equals(end); it.advance()) {
      seen.push(it.value);
    }
    expect(seen).toEqual([0, 1, 2, 3, 4]);
  });

  it('end() sits at (numChunks, 0)', () => {
    const column = sequential([2, 3]);
    const end = column.end();
    expect(end.chunkIndex).toBe(2);
    expect(end.elementIndex).toBe(0);
    expect(end.done).toBe(true);
  });

  it('begin() equals end() on an empty column', () => {
    const column = new ChunkedColumn<Int32Array>();
    expect(column.begin().equals(column.end())).toBe(true);
  });

  it('clone() advances independently', () => {
    const column = sequential([2, 2]);
    const it = column.begin();
    const copy = it.clone();
    it.advance().advance();
    expect(it.value).toBe(2);
    expect(copy.value).toBe(0);
    expect(it.equals(copy)).toBe(false);
  });

  it('next() reports done after the last element', () => {
    const column = sequential([1]);
    const it = column.begin();
    expect(it.next()).toEqual({ done: false, value: 0 });
    expect(it.next()).toEqual({ done: true, value: undefined });
  });

  it('skips zero-length chunks injected directly into the chunk list', () => {
    const chunks = [
      new ChunkView(new Int32Array(0)),
      new ChunkView(Int32Array.of(1, 2)),
      new ChunkView(new Int32Array(0)),
      new ChunkView(new Int32Array(0)),
      new ChunkView(Int32Array.of(3)),
      new ChunkView(new Int32Array(0)),
    ];
    const it = new CrossChunkIterator(chunks);
    expect(it.chunkIndex).toBe(1);
    expect([...it]).toEqual([1, 2, 3]);
    expect(it.chunkIndex).toBe(chunks.length);
  });

  it('agrees with get() for many chunk layouts', () => {
    for (let seed = 1; seed <= 25; seed++) {
      const lengths = lengthsFromSeed(seed, 12);
      const column  = sequential(lengths);
      const total   = lengths.reduce((sum, n) => sum + n, 0);
      const flat    = column.toArray();

      expect(column.size).toBe(total);
      expect(column.numChunks).toBe(lengths.filter((n) => n > 0).length);
      expect(flat.length).toBe(total);
      flat.forEach((value, i) => expect(column.get(i)).toBe(value));
    }
  });
});

// ─── Leases ────────────────────────────────────────────────────────────────────

describe('column leases', () => {
  function leased(): { column: ChunkedColumn<Int32Array>; revoke: () => void } {
    let valid = true;
    const column = new ChunkedColumn<Int32Array>(() => {
      if (!valid) throw new StaleColumnError('revoked');
    });
    column.addChunk(Int32Array.of(4, 5, 6));
    return { column, revoke: () => { valid = false; } };
  }

  it('checked accessors run the lease', () => {
    const { column, revoke } = leased();
    expect(column.at(0)).toBe(4);
    revoke();
    expect(() => column.at(0)).toThrow(StaleColumnError);
    expect(() => column.chunk(0)).toThrow(StaleColumnError);
    expect(() => column.begin()).toThrow(StaleColumnError);
    expect(() => [...column]).toThrow(StaleColumnError);
    expect(() => column.toArray()).toThrow(StaleColumnError);
  });

  it('get() never runs the lease', () => {
    const { column, revoke } = leased();
    revoke();
    expect(column.get(2)).toBe(6);
  });
});
