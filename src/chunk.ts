/**
 * chunkframe — chunked column access
 *
 * A column's data physically lives in several non-contiguous chunks, one per
 * row group of the source table. ChunkedColumn stitches them into one logical
 * sequence without copying:
 *
 *   chunks:       [ a0 a1 a2 ] [ b0 b1 b2 b3 b4 ] [ c0 c1 ]
 *   prefix sums:        3              8              10
 *
 *   get(5)  → upper_bound(prefix, 5) = chunk 1, offset 5 - 3 = 2  → b2
 *
 * Sequential access goes through CrossChunkIterator, which walks chunk by
 * chunk and never repeats the O(log n) lookup.
 *
 * Consumer pattern:
 *
 *   const close = table.getColumn('close', 'f64');
 *
 *   let sum = 0;
 *   for (const v of close) sum += v;          // flat iteration, zero-copy
 *
 *   for (let c = 0; c < close.numChunks; c++) {
 *     const a = close.chunk(c);               // Float64Array view
 *     const b = volume.chunk(c);              // same-shaped column
 *     for (let i = 0; i < a.length; i++) acc += a.data[i] * b.data[i];
 *   }
 *
 * A chunk's `data` may be longer than the chunk when addChunk() was given an
 * explicit length; loop to `chunk(c).length`, not `data.length`.
 */

import { IndexOutOfRangeError } from './errors';

/**
 * Validity check carried by columns that point into a table's memory.
 * Throws StaleColumnError when the owning table has been closed or rechunked.
 */
export type ColumnLease = () => void;

// ─── ChunkView ────────────────────────────────────────────────────────────────

/**
 * Immutable, non-owning view of one contiguous run of same-typed elements.
 *
 * `data` is typically a typed-array `subarray()` of an engine buffer. The view
 * is valid only while the table that produced it is alive. Only the first
 * `length` elements of `data` belong to the view.
 */
export class ChunkView<A extends ArrayLike<unknown>> {
  constructor(
    readonly data:   A,
    readonly length: number = data.length,
  ) {}

  get isEmpty(): boolean {
    return this.length === 0;
  }

  /** Unchecked element read. */
  get(index: number): A[number] {
    return this.data[index];
  }
}

// ─── CrossChunkIterator ───────────────────────────────────────────────────────

/**
 * Forward iterator over a chunk list, giving the illusion of one flat array.
 *
 * Position is the tuple (chunkIndex, elementIndex). The end position is
 * (chunks.length, 0). Zero-length chunks are skipped on construction and on
 * every advance, so traversal visits exactly sum(chunk.length) elements even
 * when empty chunks are injected into the list directly.
 *
 * Comparing iterators over different chunk lists is meaningless; equals()
 * only looks at the position tuple.
 */
export class CrossChunkIterator<A extends ArrayLike<unknown>> implements IterableIterator<A[number]> {
  private _chunkIndex:   number;
  private _elementIndex: number;

  constructor(
    private readonly _chunks: readonly ChunkView<A>[],
    chunkIndex:   number = 0,
    elementIndex: number = 0,
  ) {
    this._chunkIndex   = chunkIndex;
    this._elementIndex = elementIndex;
    this.skipEmptyChunks();
  }

  get chunkIndex():   number { return this._chunkIndex; }
  get elementIndex(): number { return this._elementIndex; }

  /** True once the iterator has moved past the last non-empty chunk. */
  get done(): boolean {
    return this._chunkIndex >= this._chunks.length;
  }

  /** Dereference. Unchecked: reading at the end position is a caller error. */
  get value(): A[number] {
    return this._chunks[this._chunkIndex].data[this._elementIndex];
  }

  advance(): this {
    this._elementIndex++;
    if (this._elementIndex >= this._chunks[this._chunkIndex].length) {
      this._chunkIndex++;
      this._elementIndex = 0;
      this.skipEmptyChunks();
    }
    return this;
  }

  equals(other: CrossChunkIterator<A>): boolean {
    return this._chunkIndex === other._chunkIndex && this._elementIndex === other._elementIndex;
  }

  clone(): CrossChunkIterator<A> {
    return new CrossChunkIterator(this._chunks, this._chunkIndex, this._elementIndex);
  }

  next(): IteratorResult<A[number]> {
    if (this.done) return { done: true, value: undefined };
    const value = this.value;
    this.advance();
    return { done: false, value };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private skipEmptyChunks(): void {
    while (this._chunkIndex < this._chunks.length && this._chunks[this._chunkIndex].length === 0) {
      this._chunkIndex++;
    }
  }
}

// ─── ChunkedColumn ────────────────────────────────────────────────────────────

/**
 * An ordered sequence of chunks plus a prefix-sum index.
 *
 * Invariants:
 *   - no chunk in the sequence has length 0 (addChunk drops them)
 *   - prefixSums[i] === sum of chunk lengths [0..=i]
 *   - size === prefixSums[last] (0 when there are no chunks)
 *
 * Two access paths with deliberately different contracts:
 *   get(i)  unchecked, O(log numChunks). Index outside [0, size) is a caller
 *           error and its result is undefined.
 *   at(i)   bounds-checked; throws IndexOutOfRangeError.
 */
export class ChunkedColumn<A extends ArrayLike<unknown>> implements Iterable<A[number]> {
  private readonly _chunks:     ChunkView<A>[] = [];
  private readonly _prefixSums: number[]       = [];
  private _size = 0;

  /**
   * @param _lease  Optional validity check, run by every checked accessor.
   *                Tables pass one tied to their generation counter.
   */
  constructor(private readonly _lease?: ColumnLease) {}

  /**
   * Append a chunk. Zero-length input is silently dropped — empty chunks never
   * enter the sequence, so lookup and iteration need not special-case them.
   */
  addChunk(data: A, length: number = data.length): void {
    if (length <= 0) return;
    this._chunks.push(new ChunkView(data, length));
    this._size += length;
    this._prefixSums.push(this._size);
  }

  get size(): number {
    return this._size;
  }

  get isEmpty(): boolean {
    return this._size === 0;
  }

  get numChunks(): number {
    return this._chunks.length;
  }

  /** Cumulative chunk lengths, one entry per chunk. */
  get prefixSums(): readonly number[] {
    return this._prefixSums;
  }

  /**
   * Unchecked random access.
   *
   * Standard upper_bound: the owning chunk is the first whose prefix sum is
   * strictly greater than `index`.
   */
  get(index: number): A[number] {
    const chunkIndex = this.findChunk(index);
    const start      = chunkIndex === 0 ? 0 : this._prefixSums[chunkIndex - 1];
    return this._chunks[chunkIndex].data[index - start];
  }

  /** Bounds-checked random access. */
  at(index: number): A[number] {
    this._lease?.();
    if (!Number.isInteger(index) || index < 0 || index >= this._size) {
      throw new IndexOutOfRangeError(index, this._size);
    }
    return this.get(index);
  }

  /** Raw chunk access for chunk-aware loops. */
  chunk(index: number): ChunkView<A> {
    this._lease?.();
    if (!Number.isInteger(index) || index < 0 || index >= this._chunks.length) {
      throw new IndexOutOfRangeError(index, this._chunks.length);
    }
    return this._chunks[index];
  }

  begin(): CrossChunkIterator<A> {
    this._lease?.();
    return new CrossChunkIterator(this._chunks, 0, 0);
  }

  end(): CrossChunkIterator<A> {
    return new CrossChunkIterator(this._chunks, this._chunks.length, 0);
  }

  [Symbol.iterator](): Iterator<A[number]> {
    return this.begin();
  }

  /** Copy every element into one array. */
  toArray(): A[number][] {
    return Array.from(this);
  }

  private findChunk(index: number): number {
    const sums = this._prefixSums;
    let lo = 0;
    let hi = sums.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (sums[mid] <= index) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
